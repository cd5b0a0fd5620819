import { describe, expect, it } from 'vitest';

import {
  ConfigError,
  CryptoError,
  EwpeError,
  InvalidValueError,
  InvalidVariableError,
  IoError,
  NotBoundError,
  NotFoundError,
  SerializationError,
  TimeoutError,
  errorMessage,
  httpStatusFor,
} from '../src/errors.js';

describe('errors', () => {
  it('names errors after their class', () => {
    const err = new NotFoundError('den');
    expect(err).toBeInstanceOf(EwpeError);
    expect(err.name).toBe('NotFoundError');
    expect(err.kind).toBe('not-found');
    expect(err.message).toBe('Device not found: den');
  });

  it('keeps the cause', () => {
    const cause = new Error('EADDRINUSE');
    expect(new IoError('bind failed', { cause }).cause).toBe(cause);
  });

  it('maps not found to 404', () => {
    expect(httpStatusFor(new NotFoundError('aa01'))).toBe(404);
  });

  it('maps timeouts and socket failures to 503', () => {
    expect(httpStatusFor(new TimeoutError(3000))).toBe(503);
    expect(httpStatusFor(new IoError('closed'))).toBe(503);
  });

  it('maps everything else to 400', () => {
    for (const err of [
      new CryptoError('bad'),
      new SerializationError('bad'),
      new NotBoundError('aa01'),
      new InvalidVariableError('Volume'),
      new InvalidValueError('Pow', '2'),
      new ConfigError('bad'),
      new Error('plain'),
      'thrown string',
    ]) {
      expect(httpStatusFor(err)).toBe(400);
    }
  });

  it('reads messages from anything thrown', () => {
    expect(errorMessage(new TimeoutError(250))).toBe('No response within 250ms');
    expect(errorMessage(42)).toBe('42');
  });
});

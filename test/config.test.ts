import { describe, expect, it } from 'vitest';

import { parseClientConfig, parsePlatformOptions } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('parseClientConfig', () => {
  it('fills in defaults', () => {
    expect(parseClientConfig()).toEqual({
      broadcastAddress: '255.255.255.255',
      port: 7000,
      bindPort: 0,
      maxCount: 10,
      recvTimeoutMs: 3000,
      minScanAgeMs: 60000,
      maxScanAgeMs: 86400000,
      bufferSize: 2048,
      aliases: {},
      retainSessionKeys: false,
    });
  });

  it('ignores the Homebridge platform keys', () => {
    const config = parseClientConfig({ platform: 'EwpeAirconPlatform', name: 'Aircon', maxCount: 4, aliases: { den: 'f4911e000001' } });
    expect(config.maxCount).toBe(4);
    expect(config.aliases).toEqual({ den: 'f4911e000001' });
    expect('platform' in config).toBe(false);
  });

  it('requires minScanAgeMs below maxScanAgeMs', () => {
    expect(() => parseClientConfig({ minScanAgeMs: 5000, maxScanAgeMs: 5000 }))
      .toThrow('Invalid configuration - minScanAgeMs: minScanAgeMs must be less than maxScanAgeMs');
  });

  it('rejects a broadcast address that is not IPv4', () => {
    expect(() => parseClientConfig({ broadcastAddress: 'everyone' })).toThrow(ConfigError);
  });

  it('rejects ports out of range', () => {
    expect(() => parseClientConfig({ port: 70000 })).toThrow(/port/);
  });
});

describe('parsePlatformOptions', () => {
  it('fills in defaults', () => {
    expect(parsePlatformOptions({ platform: 'EwpeAirconPlatform' })).toEqual({ name: 'EWPE Aircon', pollIntervalMs: 60000, devices: [] });
  });

  it('keeps display names', () => {
    const options = parsePlatformOptions({ devices: [{ mac: 'f4911e000001', name: 'Den' }], pollIntervalMs: 0 });
    expect(options.devices).toEqual([{ mac: 'f4911e000001', name: 'Den' }]);
    expect(options.pollIntervalMs).toBe(0);
  });

  it('rejects entries without a MAC', () => {
    expect(() => parsePlatformOptions({ devices: [{ name: 'Den' }] })).toThrow('Invalid configuration - devices.0.mac: Required');
  });
});

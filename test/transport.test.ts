import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { IoError, SerializationError, TimeoutError } from '../src/errors.js';
import type { GenericMessage } from '../src/messages.js';
import { DEFAULT_TRANSPORT_OPTIONS, Transport } from '../src/transport.js';
import { FakeSocket, createLog } from './fakeNetwork.js';

const DEVICE = '192.168.1.20';

function datagram(cid: string): string {
  return JSON.stringify({ t: 'pack', cid, pack: '' });
}

const acceptOk = (message: GenericMessage) => (message.cid.startsWith('ok') ? message.cid : undefined);

describe('Transport', () => {
  let socket: FakeSocket;
  let log: ReturnType<typeof createLog>;
  let transport: Transport;

  beforeEach(async () => {
    socket = new FakeSocket();
    log = createLog();
    transport = new Transport({ ...DEFAULT_TRANSPORT_OPTIONS, bufferSize: 256 }, log, socket);
    await transport.open();
  });

  afterEach(async () => {
    await transport.close();
  });

  it('binds and enables broadcast on open', () => {
    expect(socket.bound).toBe(true);
    expect(socket.broadcast).toBe(true);
    expect(transport.isOpen).toBe(true);
    expect(log.debug).toHaveBeenCalledWith('Transport listening on UDP port 50123');
  });

  it('refuses to send once closed', async () => {
    await transport.close();
    await expect(transport.sendUnicast(Buffer.from('{}'), DEVICE, 7000)).rejects.toThrow(IoError);
    expect(socket.closed).toBe(true);
  });

  it('broadcasts to the configured address', async () => {
    await transport.sendBroadcast(Buffer.from('{"t":"scan"}'), 7000);
    expect(socket.sent).toHaveLength(1);
    expect(socket.sent[0]?.address).toBe('255.255.255.255');
    expect(socket.sent[0]?.port).toBe(7000);
  });

  it('returns the first reply from the target that is accepted', async () => {
    setTimeout(() => socket.inject('192.168.1.99', datagram('ok-stranger')), 5);
    setTimeout(() => socket.inject(DEVICE, datagram('late')), 10);
    setTimeout(() => socket.inject(DEVICE, datagram('ok-reply')), 15);

    const result = await transport.exchange(DEVICE, 7000, Buffer.from('{}'), acceptOk, 500);

    expect(result).toBe('ok-reply');
    expect(socket.sent[0]?.address).toBe(DEVICE);
  });

  it('drops datagrams queued before the exchange', async () => {
    socket.inject(DEVICE, datagram('ok-stale'));
    setTimeout(() => socket.inject(DEVICE, datagram('ok-fresh')), 5);

    await expect(transport.exchange(DEVICE, 7000, Buffer.from('{}'), acceptOk, 500)).resolves.toBe('ok-fresh');
  });

  it('times out when nothing acceptable arrives', async () => {
    setTimeout(() => socket.inject(DEVICE, datagram('late')), 5);

    const started = Date.now();
    await expect(transport.exchange(DEVICE, 7000, Buffer.from('{}'), acceptOk, 40)).rejects.toThrow(TimeoutError);
    expect(Date.now() - started).toBeLessThan(400);
  });

  it('drops oversized datagrams with a warning', async () => {
    socket.inject(DEVICE, 'x'.repeat(300));

    await expect(transport.receive(20)).rejects.toThrow(TimeoutError);
    expect(log.warn).toHaveBeenCalledWith(`[${DEVICE}] dropping 300 byte datagram (buffer is 256)`);
  });

  it('reports malformed datagrams', async () => {
    socket.inject(DEVICE, 'not json');
    await expect(transport.receive(20)).rejects.toThrow(SerializationError);
  });

  it('fails a pending receive on close', async () => {
    const pending = expect(transport.receive(1000)).rejects.toThrow('Transport closed');
    await transport.close();
    await pending;
  });

  it('fails a pending receive on a socket error', async () => {
    const pending = transport.receive(1000);
    socket.emit('error', new Error('ENETDOWN'));

    await expect(pending).rejects.toThrow('Socket error: ENETDOWN');
    expect(log.error).toHaveBeenCalledWith('Network - Error:', 'ENETDOWN');
  });

  it('allows one pending receive at a time', async () => {
    const first = transport.receive(50);
    await expect(transport.receive(50)).rejects.toThrow('A receive is already pending');
    await expect(first).rejects.toThrow(TimeoutError);
  });
});

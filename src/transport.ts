import { createSocket } from 'node:dgram';

import { CLIENT_DEFAULTS } from './constants.js';
import { IoError, TimeoutError, errorMessage } from './errors.js';
import { type GenericMessage, parseGenericMessage } from './messages.js';
import type { DatagramSocket, InboundDatagram, Log, RemoteInfo } from './types.js';

export interface TransportOptions {
  broadcastAddress: string;
  bindAddress?: string;
  bindPort: number;
  bufferSize: number;
}

export interface ReceivedMessage {
  address: string;
  message: GenericMessage;
}

interface Waiter {
  resolve: (datagram: InboundDatagram) => void;
  reject: (reason: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * UDP transport.
 * The socket's message listener is the background receiver: it stamps every
 * datagram with the current generation and queues it for the foreground.
 */
export class Transport {
  private readonly inbox: InboundDatagram[] = [];
  private waiter: Waiter | undefined;
  private generation = 0;
  private opened = false;

  constructor(
    private readonly options: TransportOptions,
    private readonly log: Log,
    private readonly socket: DatagramSocket = createSocket({ type: 'udp4', reuseAddr: true }),
  ) {
    this.socket.on('message', this.handleMessage);
    this.socket.on('error', this.handleError);
  }

  get isOpen(): boolean {
    return this.opened;
  }

  /**
   * Bind the socket and enable broadcast
   */
  async open(): Promise<void> {
    if (this.opened) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => reject(new IoError(`Failed to bind UDP socket: ${err.message}`, { cause: err }));
      this.socket.once('error', onError);
      this.socket.bind(this.options.bindPort, this.options.bindAddress, () => {
        this.socket.off('error', onError);
        try {
          this.socket.setBroadcast(true);
        } catch (err) {
          reject(new IoError(`Failed to enable broadcast: ${errorMessage(err)}`, { cause: err }));
          return;
        }
        resolve();
      });
    });
    this.opened = true;
    this.log.debug(`Transport listening on UDP port ${this.socket.address().port}`);
  }

  async close(): Promise<void> {
    if (!this.opened) {
      return;
    }
    this.opened = false;
    this.failWaiter(new IoError('Transport closed'));
    this.inbox.length = 0;
    await new Promise<void>(resolve => this.socket.close(() => resolve()));
    this.log.debug('Transport closed');
  }

  async sendBroadcast(payload: Uint8Array, port: number): Promise<void> {
    await this.send(payload, this.options.broadcastAddress, port);
  }

  async sendUnicast(datagram: Uint8Array, address: string, port: number): Promise<void> {
    await this.send(datagram, address, port);
  }

  /**
   * Start a new receive generation and drop everything queued before it.
   * Callers do this before sending a request.
   */
  beginGeneration(): number {
    if (this.inbox.length > 0) {
      this.log.debug(`Dropping ${this.inbox.length} stale datagram(s)`);
      this.inbox.length = 0;
    }
    return ++this.generation;
  }

  /**
   * Next datagram of at least `generation`, parsed as an envelope
   */
  async receive(timeoutMs: number, generation = this.generation): Promise<ReceivedMessage> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const datagram = await this.next(Math.max(0, deadline - Date.now()), timeoutMs);
      if (datagram.generation < generation) {
        this.log.debug(`[${datagram.address}] discarding datagram from generation ${datagram.generation}`);
        continue;
      }
      this.log.debug(`[${datagram.address}] raw: ${datagram.data.toString()}`);
      return { address: datagram.address, message: parseGenericMessage(datagram.data) };
    }
  }

  /**
   * Send `request` to `address` and wait for the reply that `accept` takes.
   * Datagrams from other senders, and replies `accept` returns undefined for,
   * are skipped. The whole exchange shares one deadline.
   */
  async exchange<T>(
    address: string,
    port: number,
    request: Uint8Array,
    accept: (message: GenericMessage) => T | undefined,
    timeoutMs: number,
  ): Promise<T> {
    const generation = this.beginGeneration();
    await this.sendUnicast(request, address, port);
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new TimeoutError(timeoutMs);
      }
      const received = await this.receive(remaining, generation);
      if (received.address !== address) {
        this.log.debug(`[${received.address}] ignoring datagram while waiting for ${address}`);
        continue;
      }
      const result = accept(received.message);
      if (result !== undefined) {
        return result;
      }
      this.log.debug(`[${address}] ignoring reply to an earlier request`);
    }
  }

  private send(payload: Uint8Array, address: string, port: number): Promise<void> {
    if (!this.opened) {
      return Promise.reject(new IoError('Transport is not open'));
    }
    return new Promise<void>((resolve, reject) => {
      this.socket.send(payload, port, address, (err) => {
        if (err) {
          reject(new IoError(`Failed to send to ${address}:${port}: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  private next(waitMs: number, timeoutMs: number): Promise<InboundDatagram> {
    const queued = this.inbox.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.waiter) {
      return Promise.reject(new IoError('A receive is already pending'));
    }
    return new Promise<InboundDatagram>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = undefined;
        reject(new TimeoutError(timeoutMs));
      }, waitMs);
      this.waiter = { resolve, reject, timer };
    });
  }

  private failWaiter(err: Error): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      clearTimeout(waiter.timer);
      waiter.reject(err);
    }
  }

  private readonly handleMessage = (data: Buffer, rinfo: RemoteInfo): void => {
    if (data.length > this.options.bufferSize) {
      this.log.warn(`[${rinfo.address}] dropping ${data.length} byte datagram (buffer is ${this.options.bufferSize})`);
      return;
    }
    const datagram: InboundDatagram = { address: rinfo.address, port: rinfo.port, data, generation: this.generation };
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      clearTimeout(waiter.timer);
      waiter.resolve(datagram);
    } else {
      this.inbox.push(datagram);
    }
  };

  private readonly handleError = (err: Error): void => {
    this.log.error('Network - Error:', err.message);
    this.failWaiter(new IoError(`Socket error: ${err.message}`, { cause: err }));
  };
}

export const DEFAULT_TRANSPORT_OPTIONS: TransportOptions = {
  broadcastAddress: CLIENT_DEFAULTS.BROADCAST_ADDRESS,
  bindPort: CLIENT_DEFAULTS.BIND_PORT,
  bufferSize: CLIENT_DEFAULTS.BUFFER_SIZE,
};

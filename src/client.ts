import type { z } from 'zod';

import { EWPE_PROTOCOL } from './constants.js';
import { CryptoError, SerializationError, TimeoutError, errorMessage } from './errors.js';
import {
  type BindResponsePack,
  BindResponsePackSchema,
  type CommandResponsePack,
  CommandResponsePackSchema,
  type GenericMessage,
  type OutboundMessage,
  RESPONSE_TYPES,
  ScanResponsePackSchema,
  type StatusResponsePack,
  StatusResponsePackSchema,
  bindRequest,
  commandRequest,
  openPackOfType,
  scanRequest,
  serialize,
  statusRequest,
} from './messages.js';
import type { ReceivedMessage, Transport } from './transport.js';
import type { Log, ScanResult } from './types.js';
import type { VariableName, VariableValue } from './variables.js';

export interface DeviceClientOptions {
  port: number;
  maxCount: number;
  recvTimeoutMs: number;
}

/**
 * Low-level EWPE API: one request and one reply per call, with the device
 * address, MAC and key given explicitly. Keeps no device state.
 */
export class DeviceClient {
  constructor(
    private readonly transport: Transport,
    private readonly options: DeviceClientOptions,
    private readonly log: Log,
  ) {}

  open(): Promise<void> {
    return this.transport.open();
  }

  close(): Promise<void> {
    return this.transport.close();
  }

  /**
   * Broadcast a scan and collect replies until `maxCount` distinct devices
   * answered or a receive times out
   */
  async scan(): Promise<ScanResult[]> {
    const generation = this.transport.beginGeneration();
    await this.transport.sendBroadcast(scanRequest(), this.options.port);
    this.log.debug('Scan request broadcast');

    const results = new Map<string, ScanResult>();
    while (results.size < this.options.maxCount) {
      let received: ReceivedMessage;
      try {
        received = await this.transport.receive(this.options.recvTimeoutMs, generation);
      } catch (err) {
        if (err instanceof TimeoutError) {
          break;
        }
        if (err instanceof SerializationError) {
          this.log.debug(`Skipping unreadable datagram during scan: ${err.message}`);
          continue;
        }
        throw err;
      }
      const metadata = this.tryOpen(ScanResponsePackSchema, received.message, EWPE_PROTOCOL.GENERIC_KEY, RESPONSE_TYPES.scan, received.address);
      if (metadata === undefined) {
        this.log.debug(`[${received.address}] ignoring non-scan reply during scan`);
        continue;
      }
      this.log.debug(`[${received.address}] scan reply: ${JSON.stringify(metadata)}`);
      results.set(metadata.mac, { address: received.address, metadata });
    }
    return [...results.values()];
  }

  /**
   * Ask the device for its session key
   */
  bind(address: string, mac: string): Promise<BindResponsePack> {
    return this.request(address, mac, bindRequest(mac), EWPE_PROTOCOL.GENERIC_KEY, BindResponsePackSchema, RESPONSE_TYPES.bind);
  }

  getVars(address: string, mac: string, key: string, names: readonly VariableName[]): Promise<StatusResponsePack> {
    return this.request(address, mac, statusRequest(mac, key, names), key, StatusResponsePackSchema, RESPONSE_TYPES.status);
  }

  setVars(
    address: string,
    mac: string,
    key: string,
    names: readonly VariableName[],
    values: readonly VariableValue[],
  ): Promise<CommandResponsePack> {
    return this.request(address, mac, commandRequest(mac, key, names, values), key, CommandResponsePackSchema, RESPONSE_TYPES.command);
  }

  private async request<T extends z.ZodType<{ mac: string }>>(
    address: string,
    mac: string,
    request: OutboundMessage,
    key: string,
    schema: T,
    type: string,
  ): Promise<z.infer<T>> {
    const pack = await this.transport.exchange(address, this.options.port, serialize(request), (message) => {
      const candidate = this.tryOpen(schema, message, key, type, address);
      // same address, other unit (or a reply we do not want)
      return candidate !== undefined && (candidate.mac === '' || candidate.mac === mac) ? candidate : undefined;
    }, this.options.recvTimeoutMs);
    this.log.debug(`[${address}] ${type} pack: ${JSON.stringify(pack)}`);
    return pack;
  }

  /**
   * The pack, or undefined when it is of another type or sealed with another
   * key, as a late reply to an earlier request is
   */
  private tryOpen<T extends z.ZodTypeAny>(
    schema: T,
    message: GenericMessage,
    key: string,
    type: string,
    address: string,
  ): z.infer<T> | undefined {
    try {
      return openPackOfType(schema, message, key, type);
    } catch (err) {
      if (err instanceof CryptoError || err instanceof SerializationError) {
        this.log.debug(`[${address}] skipping pack that does not open as ${type}: ${errorMessage(err)}`);
        return undefined;
      }
      throw err;
    }
  }
}

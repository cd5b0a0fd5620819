import { EventEmitter } from 'node:events';

import { DeviceClient } from './client.js';
import { type ClientConfigInput, parseClientConfig } from './config.js';
import { NotBoundError, errorMessage } from './errors.js';
import { DeviceRegistry } from './registry.js';
import { Transport } from './transport.js';
import type { DatagramSocket, Device, Log, MacAddress } from './types.js';
import type { VariableBag } from './variables.js';

export type Operation =
  | { kind: 'bind' }
  | { kind: 'netRead'; bag: VariableBag }
  | { kind: 'netWrite'; bag: VariableBag };

export interface ScanFreshness {
  minScanAgeMs: number;
  maxScanAgeMs: number;
}

export interface SessionOptions {
  /** Injected for tests */
  now?: () => number;
  /** Injected for tests; a udp4 socket otherwise */
  socket?: DatagramSocket;
}

/**
 * High-level EWPE client.
 *
 * Keeps the device registry consistent with the network by rescanning:
 * routine operations rescan only once the last scan is older than
 * `maxScanAgeMs`; a failed operation forces a rescan (still no more often
 * than `minScanAgeMs`) and is retried exactly once.
 *
 * Not safe for interleaved calls. Front ends serialize access through a
 * JobQueue.
 *
 * Events: `scanned` (devices), `bound` (mac).
 */
export class AirconSession extends EventEmitter {
  private lastScanAt: number | undefined;
  private readonly now: () => number;

  constructor(
    private readonly client: DeviceClient,
    private readonly registry: DeviceRegistry,
    private readonly freshness: ScanFreshness,
    private readonly log: Log,
    now: () => number = Date.now,
  ) {
    super();
    this.now = now;
  }

  /**
   * Build a session and everything under it from configuration
   */
  static create(config: ClientConfigInput, log: Log, options: SessionOptions = {}): AirconSession {
    const cfg = parseClientConfig(config);
    const transport = new Transport({
      broadcastAddress: cfg.broadcastAddress,
      bindAddress: cfg.bindAddress,
      bindPort: cfg.bindPort,
      bufferSize: cfg.bufferSize,
    }, log, options.socket);
    const client = new DeviceClient(transport, {
      port: cfg.port,
      maxCount: cfg.maxCount,
      recvTimeoutMs: cfg.recvTimeoutMs,
    }, log);
    const registry = new DeviceRegistry(cfg.aliases, { retainSessionKeys: cfg.retainSessionKeys });
    return new AirconSession(client, registry, cfg, log, options.now);
  }

  open(): Promise<void> {
    return this.client.open();
  }

  close(): Promise<void> {
    return this.client.close();
  }

  get lastScanTime(): number | undefined {
    return this.lastScanAt;
  }

  get devices(): Device[] {
    return this.registry.list();
  }

  // ===========================================
  // Public operations
  // ===========================================

  /**
   * Scan now, whatever the age of the last scan
   */
  async scan(): Promise<Device[]> {
    await this.runScan();
    return this.registry.list();
  }

  bind(target: string): Promise<void> {
    return this.applyWithRetry(target, { kind: 'bind' });
  }

  /**
   * Fill the bag's read-pending slots from the device
   */
  netRead(target: string, bag: VariableBag): Promise<void> {
    return this.applyWithRetry(target, { kind: 'netRead', bag });
  }

  /**
   * Commit the bag's write-pending slots; slots take the values the device echoes
   */
  netWrite(target: string, bag: VariableBag): Promise<void> {
    return this.applyWithRetry(target, { kind: 'netWrite', bag });
  }

  execute(target: string, operation: Operation): Promise<void> {
    return this.applyWithRetry(target, operation);
  }

  /**
   * Project over the target's device record, rescanning once if it is unknown
   */
  async withDevice<R>(target: string, projector: (device: Readonly<Device>) => R): Promise<R> {
    await this.maybeScan(false);
    const device = this.registry.find(this.registry.resolve(target));
    if (device) {
      return projector(device);
    }
    await this.maybeScan(true);
    return projector(this.registry.get(this.registry.resolve(target)));
  }

  async withState<R>(projector: (registry: DeviceRegistry) => R): Promise<R> {
    await this.maybeScan(false);
    return projector(this.registry);
  }

  // ===========================================
  // State machine
  // ===========================================

  /**
   * Scan if there never was one, if the last is older than maxScanAgeMs,
   * or if forced and the last is at least minScanAgeMs old.
   * Returns whether a scan ran.
   */
  async maybeScan(force: boolean): Promise<boolean> {
    if (this.lastScanAt !== undefined) {
      const age = this.now() - this.lastScanAt;
      const due = age >= this.freshness.maxScanAgeMs || (force && age >= this.freshness.minScanAgeMs);
      if (!due) {
        this.log.debug(`Scan skipped (age ${age}ms, forced: ${force})`);
        return false;
      }
    }
    await this.runScan();
    return true;
  }

  /**
   * Bind the device unless it already holds a session key
   */
  async ensureBound(mac: MacAddress): Promise<Device> {
    const device = this.registry.get(mac);
    if (device.key !== undefined) {
      return device;
    }
    const pack = await this.client.bind(device.address, mac);
    if (!pack.key) {
      throw new NotBoundError(mac);
    }
    this.registry.recordBind(mac, pack.key, this.now());
    this.log.info(`Bound ${mac} at ${device.address}`);
    this.emit('bound', mac);
    return this.registry.get(mac);
  }

  async apply(target: string, operation: Operation): Promise<void> {
    const mac = this.registry.resolve(target);
    const device = await this.ensureBound(mac);
    const key = device.key;
    if (key === undefined) {
      throw new NotBoundError(mac);
    }

    switch (operation.kind) {
    case 'bind':
      return;
    case 'netRead': {
      const names = operation.bag.pendingReads();
      if (names.length === 0) {
        return;
      }
      const pack = await this.client.getVars(device.address, mac, key, names);
      pack.cols.forEach((name, i) => {
        const value = pack.dat[i];
        if (value !== undefined) {
          operation.bag.applyReadResult(name, value);
        }
      });
      return;
    }
    case 'netWrite': {
      const writes = operation.bag.pendingWrites();
      if (writes.length === 0) {
        return;
      }
      const pack = await this.client.setVars(
        device.address,
        mac,
        key,
        writes.map(([name]) => name),
        writes.map(([, value]) => value),
      );
      // the echoed request values, not `val`
      pack.opt.forEach((name, i) => {
        const value = pack.p[i];
        if (value !== undefined) {
          operation.bag.applyWriteResult(name, value);
        }
      });
      return;
    }
    }
  }

  /**
   * Routine rescan, attempt, and on failure one forced rescan and one more attempt
   */
  async applyWithRetry(target: string, operation: Operation): Promise<void> {
    await this.maybeScan(false);
    try {
      await this.apply(target, operation);
      return;
    } catch (err) {
      this.log.debug(`${operation.kind} on ${target} failed, retrying after rescan: ${errorMessage(err)}`);
    }
    await this.maybeScan(true);
    await this.apply(target, operation);
  }

  private async runScan(): Promise<void> {
    const results = await this.client.scan();
    const now = this.now();
    this.registry.recordScan(results, now);
    this.lastScanAt = now;
    this.log.info(`Scan found ${results.length} device(s)${results.length ? ': ' + results.map(r => `${r.metadata.mac}@${r.address}`).join(', ') : ''}`);
    this.emit('scanned', this.registry.list());
  }
}

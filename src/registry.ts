import { NotFoundError } from './errors.js';
import type { Device, MacAddress, ScanResult } from './types.js';

export interface RegistryOptions {
  /** Keep a device's session key when a rescan reports the same MAC again */
  retainSessionKeys: boolean;
}

/**
 * Devices by MAC, plus friendly-name aliases.
 * Changed only by scan and bind results.
 */
export class DeviceRegistry {
  private devices = new Map<MacAddress, Device>();
  private readonly aliases: Map<string, MacAddress>;

  constructor(
    aliases: Record<string, MacAddress> = {},
    private readonly options: RegistryOptions = { retainSessionKeys: false },
  ) {
    this.aliases = new Map(Object.entries(aliases));
  }

  /**
   * Replace the whole device map with the scan results
   */
  recordScan(results: readonly ScanResult[], now: number = Date.now()): void {
    const previous = this.devices;
    this.devices = new Map();
    for (const { address, metadata } of results) {
      const device: Device = { mac: metadata.mac, address, metadata, scannedAt: now };
      const known = previous.get(metadata.mac);
      if (this.options.retainSessionKeys && known?.key !== undefined) {
        device.key = known.key;
        device.boundAt = known.boundAt;
      }
      this.devices.set(metadata.mac, device);
    }
  }

  recordBind(mac: MacAddress, key: string, now: number = Date.now()): void {
    const device = this.get(mac);
    device.key = key;
    device.boundAt = now;
  }

  /**
   * Alias to MAC; anything else is taken to be a MAC already
   */
  resolve(target: string): MacAddress {
    return this.aliases.get(target) ?? target;
  }

  get(mac: MacAddress): Device {
    const device = this.devices.get(mac);
    if (!device) {
      throw new NotFoundError(mac);
    }
    return device;
  }

  find(mac: MacAddress): Device | undefined {
    return this.devices.get(mac);
  }

  list(): Device[] {
    return [...this.devices.values()];
  }

  get size(): number {
    return this.devices.size;
  }

  setAlias(name: string, mac: MacAddress): void {
    this.aliases.set(name, mac);
  }

  removeAlias(name: string): boolean {
    return this.aliases.delete(name);
  }

  aliasesOf(mac: MacAddress): string[] {
    return [...this.aliases].filter(([, target]) => target === mac).map(([name]) => name);
  }
}

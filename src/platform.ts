import type { API, Characteristic, DynamicPlatformPlugin, Logger, PlatformAccessory, PlatformConfig, Service } from 'homebridge';

import { type PlatformOptions, parseClientConfig, parsePlatformOptions } from './config.js';
import { ConfigError, errorMessage } from './errors.js';
import { JobQueue } from './jobQueue.js';
import { EwpeAirconAccessory } from './platformAccessory.js';
import { refreshAll } from './polling.js';
import { AirconSession } from './session.js';
import { PLATFORM_NAME, PLUGIN_NAME, VERSION } from './settings.js';
import type { AccessoryContext, Device } from './types.js';

/**
 * HomebridgePlatform
 * Builds the session from the platform config, scans on launch and
 * registers one HeaterCooler accessory per device found.
 */
export class EwpeAirconPlatform implements DynamicPlatformPlugin {
  public readonly Service: typeof Service;
  public readonly Characteristic: typeof Characteristic;

  // this is used to track restored cached accessories
  public readonly accessories: PlatformAccessory[] = [];

  /** The session is not safe for interleaved calls; every use goes through here */
  public readonly jobQueue = new JobQueue();

  private readonly session: AirconSession | undefined;
  private readonly options: PlatformOptions | undefined;
  private readonly handlers = new Map<string, EwpeAirconAccessory>();
  private pollTimer: NodeJS.Timeout | undefined;

  constructor(
    public readonly log: Logger,
    public readonly config: PlatformConfig,
    public readonly api: API,
  ) {
    this.Service = api.hap.Service;
    this.Characteristic = api.hap.Characteristic;

    let options: PlatformOptions;
    let session: AirconSession;
    try {
      options = parsePlatformOptions(config);
      session = AirconSession.create(parseClientConfig(config), log);
    } catch (err) {
      log.error('Invalid platform configuration:', errorMessage(err));
      return;
    }
    this.options = options;
    this.session = session;
    this.log.debug('Finished initializing platform:', options.name);

    session.on('scanned', (devices: Device[]) => this.syncAccessories(devices));
    session.on('bound', (mac: string) => this.log.debug('Session key obtained for', mac));

    // When this event is fired it means Homebridge has restored all cached accessories from disk.
    // Dynamic Platform plugins should only register new accessories after this event was fired,
    // in order to ensure they weren't added to homebridge already.
    this.api.on('didFinishLaunching', () => {
      log.debug('Executed didFinishLaunching callback');
      this.start().catch((err: unknown) => {
        log.error('Failed to start:', errorMessage(err));
      });
      log.info('finish launching version:' + VERSION);
    });

    this.api.on('shutdown', () => {
      this.stop().catch((err: unknown) => {
        log.error('Failed to close the session:', errorMessage(err));
      });
    });
  }

  /**
   * This function is invoked when homebridge restores cached accessories from disk at startup.
   * Handlers are attached once a scan finds the device again.
   */
  configureAccessory(accessory: PlatformAccessory): void {
    this.log.info('Loading accessory from cache:', accessory.displayName);

    // add the restored accessory to the accessories cache so we can track if it has already been registered
    this.accessories.push(accessory);
  }

  /**
   * Queue `job` against the session
   */
  run<T>(job: (session: AirconSession) => Promise<T>): Promise<T> {
    const session = this.session;
    if (!session) {
      return Promise.reject(new ConfigError('Platform is not configured'));
    }
    return this.jobQueue.addJob(() => job(session));
  }

  private async start(): Promise<void> {
    const session = this.session;
    if (!session) {
      return;
    }
    await session.open();
    // registration happens in the `scanned` listener
    await this.run(s => s.scan());

    const interval = this.options?.pollIntervalMs ?? 0;
    if (interval > 0) {
      this.pollTimer = setInterval(() => {
        this.poll().catch((err: unknown) => {
          this.log.error('Polling failed:', errorMessage(err));
        });
      }, interval);
    }
  }

  private async stop(): Promise<void> {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = undefined;
    }
    await this.session?.close();
  }

  private async poll(): Promise<void> {
    const failed = await refreshAll(this.handlers, this.log);
    if (failed.length > 0) {
      this.log.debug(`Polled ${this.handlers.size - failed.length} of ${this.handlers.size} device(s)`);
    }
  }

  /**
   * Register accessories for devices seen for the first time.
   * Accessories must only be registered once, previously created accessories
   * must not be registered again to prevent "duplicate UUID" errors.
   */
  private syncAccessories(devices: Device[]): void {
    for (const device of devices) {
      if (this.handlers.has(device.mac)) {
        continue;
      }
      const uuid = this.api.hap.uuid.generate(device.mac);
      const context: AccessoryContext = { mac: device.mac, address: device.address, metadata: device.metadata };
      const existingAccessory = this.accessories.find(accessory => accessory.UUID === uuid);

      if (existingAccessory) {
        this.log.info('Restoring existing accessory from cache:', existingAccessory.displayName);
        existingAccessory.context = context;
        this.api.updatePlatformAccessories([existingAccessory]);
        this.handlers.set(device.mac, new EwpeAirconAccessory(this, existingAccessory, device));
      } else {
        const displayName = this.displayNameFor(device);
        this.log.info('Adding new accessory:', displayName);

        const accessory = new this.api.platformAccessory(displayName, uuid);
        accessory.context = context;
        this.handlers.set(device.mac, new EwpeAirconAccessory(this, accessory, device));

        // link the accessory to your platform
        this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
        this.accessories.push(accessory);
      }
    }
  }

  private displayNameFor(device: Device): string {
    const configured = this.options?.devices.find(entry => entry.mac.toLowerCase() === device.mac.toLowerCase());
    return configured?.name ?? (device.metadata.name || `Air Conditioner ${device.mac}`);
  }
}

import type { CharacteristicValue, PlatformAccessory, Service } from 'homebridge';

import { DEFAULT_POLLING_CONFIG, TEMPERATURE_LIMITS } from './constants.js';
import { errorMessage } from './errors.js';
import type { EwpeAirconPlatform } from './platform.js';
import { StateCache } from './polling.js';
import type { Device } from './types.js';
import {
  clampToHomeKitRange,
  convertHomeKitToMode,
  convertModeToHomeKit,
  currentStateFor,
  fanSpeedToRotation,
  hapStatusFor,
  isSwinging,
  parseSensorTemperature,
  rotationToFanSpeed,
  swingToPosition,
  toNumber,
} from './utils.js';
import { OperationMode, VariableBag, type VariableName } from './variables.js';

/** Variables behind the HeaterCooler characteristics */
const STATE_VARIABLES = ['Pow', 'Mod', 'SetTem', 'TemSen', 'WdSpd', 'SwUpDn'] as const satisfies readonly VariableName[];

interface AirconState {
  power: boolean;
  mode: number;
  setTemperature: number;
  sensorTemperature?: number;
  fanSpeed: number;
  swing: number;
}

/**
 * Platform Accessory
 * One HeaterCooler service per air conditioner. Reads share one network read
 * per `stateTtlMs`, and concurrent reads share one in flight; every network
 * call is queued on the platform's JobQueue.
 */
export class EwpeAirconAccessory {
  private readonly service: Service;
  private readonly mac: string;
  private readonly state: StateCache<AirconState>;

  constructor(
    private readonly platform: EwpeAirconPlatform,
    private readonly accessory: PlatformAccessory,
    device: Device,
  ) {
    this.mac = device.mac;
    this.state = new StateCache(() => this.fetchState(), DEFAULT_POLLING_CONFIG.stateTtlMs);
    const { Characteristic } = this.platform;

    const information = this.accessory.getService(this.platform.Service.AccessoryInformation)
      ?? this.accessory.addService(this.platform.Service.AccessoryInformation);
    information
      .setCharacteristic(Characteristic.Manufacturer, device.metadata.brand || 'Gree')
      .setCharacteristic(Characteristic.Model, device.metadata.model || device.metadata.mid || 'EWPE Air Conditioner')
      .setCharacteristic(Characteristic.SerialNumber, device.mac);

    // get the HeaterCooler service if it exists, otherwise create a new HeaterCooler service
    this.service = this.accessory.getService(this.platform.Service.HeaterCooler)
      ?? this.accessory.addService(this.platform.Service.HeaterCooler);

    this.service.setCharacteristic(Characteristic.Name, accessory.displayName);

    this.service.getCharacteristic(Characteristic.Active)
      .onGet(this.handleActiveGet.bind(this))
      .onSet(this.handleActiveSet.bind(this));

    this.service.getCharacteristic(Characteristic.CurrentHeaterCoolerState)
      .onGet(this.handleCurrentHeaterCoolerStateGet.bind(this));

    this.service.getCharacteristic(Characteristic.TargetHeaterCoolerState)
      .onGet(this.handleTargetHeaterCoolerStateGet.bind(this))
      .onSet(this.handleTargetHeaterCoolerStateSet.bind(this));

    this.service.getCharacteristic(Characteristic.CurrentTemperature)
      .setProps({ minValue: -40, maxValue: 100, minStep: 1 })
      .onGet(this.handleCurrentTemperatureGet.bind(this));

    this.service.getCharacteristic(Characteristic.CoolingThresholdTemperature)
      .setProps({ minValue: TEMPERATURE_LIMITS.SET_MIN_C, maxValue: TEMPERATURE_LIMITS.SET_MAX_C, minStep: 1 })
      .onGet(this.handleThresholdTemperatureGet.bind(this))
      .onSet(this.handleThresholdTemperatureSet.bind(this));

    this.service.getCharacteristic(Characteristic.HeatingThresholdTemperature)
      .setProps({ minValue: TEMPERATURE_LIMITS.SET_MIN_C, maxValue: TEMPERATURE_LIMITS.SET_MAX_C, minStep: 1 })
      .onGet(this.handleThresholdTemperatureGet.bind(this))
      .onSet(this.handleThresholdTemperatureSet.bind(this));

    this.service.getCharacteristic(Characteristic.RotationSpeed)
      .setProps({ minValue: 0, maxValue: 100, minStep: 20 })
      .onGet(this.handleRotationSpeedGet.bind(this))
      .onSet(this.handleRotationSpeedSet.bind(this));

    this.service.getCharacteristic(Characteristic.SwingMode)
      .onGet(this.handleSwingModeGet.bind(this))
      .onSet(this.handleSwingModeSet.bind(this));
  }

  async handleActiveGet(): Promise<CharacteristicValue> {
    this.platform.log.debug('Triggered GET Active');
    const { power } = await this.readState('Active');
    const { Active } = this.platform.Characteristic;
    return power ? Active.ACTIVE : Active.INACTIVE;
  }

  async handleActiveSet(value: CharacteristicValue): Promise<void> {
    this.platform.log.debug('Triggered SET Active:', value);
    await this.write('Active', [['Pow', value === this.platform.Characteristic.Active.ACTIVE ? '1' : '0']]);
  }

  async handleCurrentHeaterCoolerStateGet(): Promise<CharacteristicValue> {
    this.platform.log.debug('Triggered GET CurrentHeaterCoolerState');
    const state = await this.readState('CurrentHeaterCoolerState');
    return currentStateFor(state.power, state.mode, state.sensorTemperature, state.setTemperature);
  }

  async handleTargetHeaterCoolerStateGet(): Promise<CharacteristicValue> {
    this.platform.log.debug('Triggered GET TargetHeaterCoolerState');
    const { mode } = await this.readState('TargetHeaterCoolerState');
    return convertModeToHomeKit(mode);
  }

  async handleTargetHeaterCoolerStateSet(value: CharacteristicValue): Promise<void> {
    this.platform.log.debug('Triggered SET TargetHeaterCoolerState:', value);
    await this.write('TargetHeaterCoolerState', [['Mod', String(convertHomeKitToMode(Number(value)))]]);
  }

  async handleCurrentTemperatureGet(): Promise<CharacteristicValue> {
    this.platform.log.debug('Triggered GET CurrentTemperature');
    const state = await this.readState('CurrentTemperature');
    // units without a sensor report the set point
    return state.sensorTemperature ?? state.setTemperature;
  }

  async handleThresholdTemperatureGet(): Promise<CharacteristicValue> {
    this.platform.log.debug('Triggered GET ThresholdTemperature');
    const { setTemperature } = await this.readState('ThresholdTemperature');
    return setTemperature;
  }

  async handleThresholdTemperatureSet(value: CharacteristicValue): Promise<void> {
    this.platform.log.debug('Triggered SET ThresholdTemperature:', value);
    const temperature = clampToHomeKitRange(Number(value), 'SetTemperature');
    await this.write('ThresholdTemperature', [['SetTem', String(temperature)]]);
  }

  async handleRotationSpeedGet(): Promise<CharacteristicValue> {
    this.platform.log.debug('Triggered GET RotationSpeed');
    const { fanSpeed } = await this.readState('RotationSpeed');
    return fanSpeedToRotation(fanSpeed);
  }

  async handleRotationSpeedSet(value: CharacteristicValue): Promise<void> {
    this.platform.log.debug('Triggered SET RotationSpeed:', value);
    await this.write('RotationSpeed', [['WdSpd', String(rotationToFanSpeed(Number(value)))]]);
  }

  async handleSwingModeGet(): Promise<CharacteristicValue> {
    this.platform.log.debug('Triggered GET SwingMode');
    const { swing } = await this.readState('SwingMode');
    const { SwingMode } = this.platform.Characteristic;
    return isSwinging(swing) ? SwingMode.SWING_ENABLED : SwingMode.SWING_DISABLED;
  }

  async handleSwingModeSet(value: CharacteristicValue): Promise<void> {
    this.platform.log.debug('Triggered SET SwingMode:', value);
    const enabled = value === this.platform.Characteristic.SwingMode.SWING_ENABLED;
    await this.write('SwingMode', [['SwUpDn', String(swingToPosition(enabled))]]);
  }

  /**
   * Read the device now and push every characteristic
   */
  async refresh(): Promise<void> {
    this.state.invalidate();
    const state = await this.readState('refresh');
    this.updateStates(state);
  }

  private updateStates(state: AirconState): void {
    const { Characteristic } = this.platform;
    this.service.updateCharacteristic(Characteristic.Active, state.power ? Characteristic.Active.ACTIVE : Characteristic.Active.INACTIVE);
    this.service.updateCharacteristic(Characteristic.TargetHeaterCoolerState, convertModeToHomeKit(state.mode));
    this.service.updateCharacteristic(Characteristic.CurrentHeaterCoolerState,
      currentStateFor(state.power, state.mode, state.sensorTemperature, state.setTemperature));
    this.service.updateCharacteristic(Characteristic.CurrentTemperature, state.sensorTemperature ?? state.setTemperature);
    this.service.updateCharacteristic(Characteristic.CoolingThresholdTemperature, state.setTemperature);
    this.service.updateCharacteristic(Characteristic.HeatingThresholdTemperature, state.setTemperature);
    this.service.updateCharacteristic(Characteristic.RotationSpeed, fanSpeedToRotation(state.fanSpeed));
    this.service.updateCharacteristic(Characteristic.SwingMode,
      isSwinging(state.swing) ? Characteristic.SwingMode.SWING_ENABLED : Characteristic.SwingMode.SWING_DISABLED);
  }

  /**
   * Cached state if it is fresh enough, a network read otherwise
   */
  private async readState(what: string): Promise<AirconState> {
    try {
      return await this.state.get();
    } catch (err) {
      throw this.failure(`Failed to get ${what}:`, err);
    }
  }

  private async fetchState(): Promise<AirconState> {
    const bag = VariableBag.fromNames(STATE_VARIABLES);
    await this.platform.run(session => session.netRead(this.mac, bag));
    return stateFromBag(bag);
  }

  private async write(what: string, assignments: Array<[VariableName, string]>): Promise<void> {
    try {
      const bag = VariableBag.fromNameValuePairs(assignments);
      await this.platform.run(session => session.netWrite(this.mac, bag));
    } catch (err) {
      throw this.failure(`Failed to set ${what}:`, err);
    }
    // next read goes to the device
    this.state.invalidate();
  }

  private failure(message: string, err: unknown): Error {
    this.platform.log.error(message, errorMessage(err));
    return new this.platform.api.hap.HapStatusError(hapStatusFor(err));
  }
}

function stateFromBag(bag: VariableBag): AirconState {
  return {
    power: toNumber(bag.get('Pow')) === 1,
    mode: toNumber(bag.get('Mod')) ?? OperationMode.AUTO,
    setTemperature: clampToHomeKitRange(toNumber(bag.get('SetTem')) ?? TEMPERATURE_LIMITS.SET_MIN_C, 'SetTemperature'),
    sensorTemperature: parseSensorTemperature(bag.get('TemSen')),
    fanSpeed: toNumber(bag.get('WdSpd')) ?? 0,
    swing: toNumber(bag.get('SwUpDn')) ?? 0,
  };
}

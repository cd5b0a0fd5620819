/**
 * Conversions between EWPE variables and HomeKit characteristic values
 */

import { EWPE_PROTOCOL, FAN_SPEED_STEPS, TEMPERATURE_LIMITS } from './constants.js';
import { IoError, NotFoundError, TimeoutError } from './errors.js';
import { FanSpeed, OperationMode, VerticalSwing, type VariableValue } from './variables.js';

/** Characteristic.TargetHeaterCoolerState */
export enum HomeKitTargetState {
  AUTO = 0,
  HEAT = 1,
  COOL = 2,
}

/** Characteristic.CurrentHeaterCoolerState */
export enum HomeKitCurrentState {
  INACTIVE = 0,
  IDLE = 1,
  HEATING = 2,
  COOLING = 3,
}

/**
 * The HAPStatus values the accessory reports.
 * Kept as plain numbers: hap-nodejs declares HAPStatus as a const enum.
 */
export const HAP_STATUS = {
  SERVICE_COMMUNICATION_FAILURE: -70402,
  RESOURCE_DOES_NOT_EXIST: -70409,
  INVALID_VALUE_IN_REQUEST: -70410,
} as const;

/**
 * Error to HAP status: the same split as httpStatusFor
 */
export function hapStatusFor(err: unknown): number {
  if (err instanceof NotFoundError) {
    return HAP_STATUS.RESOURCE_DOES_NOT_EXIST;
  }
  if (err instanceof TimeoutError || err instanceof IoError) {
    return HAP_STATUS.SERVICE_COMMUNICATION_FAILURE;
  }
  return HAP_STATUS.INVALID_VALUE_IN_REQUEST;
}

/**
 * Numeric view of a wire value; null for anything that is not a whole number
 */
export function toNumber(value: VariableValue | null | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  const n = typeof value === 'number' ? value : Number(value.trim());
  return Number.isInteger(n) && String(value).trim() !== '' ? n : null;
}

/**
 * Convert an EWPE operation mode to a HomeKit target state
 */
export function convertModeToHomeKit(mode: number): HomeKitTargetState {
  switch (mode) {
  case OperationMode.HEAT:
    return HomeKitTargetState.HEAT;
  case OperationMode.COOL:
  case OperationMode.DRY:
    return HomeKitTargetState.COOL;
  case OperationMode.AUTO:
  case OperationMode.FAN:
  default:
    return HomeKitTargetState.AUTO;
  }
}

export function convertHomeKitToMode(state: number): OperationMode {
  switch (state) {
  case HomeKitTargetState.HEAT:
    return OperationMode.HEAT;
  case HomeKitTargetState.COOL:
    return OperationMode.COOL;
  default:
    return OperationMode.AUTO;
  }
}

/**
 * HomeKit has no current state for AUTO; pick one from the temperatures,
 * IDLE when the unit is only moving air or the temperatures are unknown
 */
export function currentStateFor(
  power: boolean,
  mode: number,
  currentTemp?: number,
  targetTemp?: number,
): HomeKitCurrentState {
  if (!power) {
    return HomeKitCurrentState.INACTIVE;
  }
  switch (mode) {
  case OperationMode.HEAT:
    return HomeKitCurrentState.HEATING;
  case OperationMode.COOL:
  case OperationMode.DRY:
    return HomeKitCurrentState.COOLING;
  case OperationMode.FAN:
    return HomeKitCurrentState.IDLE;
  default:
    if (currentTemp === undefined || targetTemp === undefined || currentTemp === targetTemp) {
      return HomeKitCurrentState.IDLE;
    }
    return targetTemp > currentTemp ? HomeKitCurrentState.HEATING : HomeKitCurrentState.COOLING;
  }
}

/**
 * TemSen carries Celsius + 40. Returns undefined when the unit reports no sensor.
 */
export function parseSensorTemperature(value: VariableValue | null | undefined): number | undefined {
  const raw = toNumber(value);
  if (raw === null || raw <= 0) {
    return undefined;
  }
  return clampToHomeKitRange(raw - EWPE_PROTOCOL.SENSOR_OFFSET, 'CurrentTemperature');
}

/**
 * Clamp value to HomeKit valid range
 */
export function clampToHomeKitRange(value: number, characteristic: 'SetTemperature' | 'CurrentTemperature'): number {
  switch (characteristic) {
  case 'SetTemperature':
    return Math.max(TEMPERATURE_LIMITS.SET_MIN_C, Math.min(TEMPERATURE_LIMITS.SET_MAX_C, Math.round(value)));
  case 'CurrentTemperature':
    return Math.max(TEMPERATURE_LIMITS.HOMEKIT_CURRENT_MIN, Math.min(TEMPERATURE_LIMITS.HOMEKIT_CURRENT_MAX, value));
  }
}

/**
 * WdSpd to RotationSpeed percent; AUTO is 0
 */
export function fanSpeedToRotation(speed: number): number {
  const clamped = Math.max(FanSpeed.AUTO, Math.min(FanSpeed.HIGH, Math.round(speed)));
  return clamped * (100 / FAN_SPEED_STEPS);
}

export function rotationToFanSpeed(percent: number): FanSpeed {
  const step = Math.round(Math.max(0, Math.min(100, percent)) / (100 / FAN_SPEED_STEPS));
  return Math.max(FanSpeed.AUTO, Math.min(FanSpeed.HIGH, step));
}

/**
 * Any swinging SwUpDn setting counts as swing enabled
 */
export function isSwinging(position: number): boolean {
  return position === VerticalSwing.FULL || position >= VerticalSwing.SWING_BOTTOM;
}

export function swingToPosition(enabled: boolean): VerticalSwing {
  return enabled ? VerticalSwing.FULL : VerticalSwing.DEFAULT;
}

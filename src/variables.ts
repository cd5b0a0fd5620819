/**
 * Protocol variables: the fixed catalog and the VariableBag that carries
 * values between callers and the network.
 */

import { InvalidValueError, InvalidVariableError } from './errors.js';

export type VariableDomain = 'boolean' | 'integer' | 'string';

export interface VariableDefinition {
  readonly name: string;
  readonly domain: VariableDomain;
  readonly description: string;
  readonly readOnly?: boolean;
}

export const VARIABLE_CATALOG = [
  { name: 'Pow', domain: 'boolean', description: 'power state' },
  { name: 'Mod', domain: 'integer', description: 'mode of operation (see OperationMode)' },
  { name: 'SetTem', domain: 'integer', description: 'set temperature, in the unit given by TemUn' },
  { name: 'TemUn', domain: 'boolean', description: 'temperature unit: 0 Celsius, 1 Fahrenheit' },
  { name: 'WdSpd', domain: 'integer', description: 'fan speed (see FanSpeed)' },
  { name: 'Air', domain: 'boolean', description: 'fresh air valve' },
  { name: 'Blo', domain: 'boolean', description: 'X-Fan: keep the fan running after shutdown in Dry and Cool' },
  { name: 'Health', domain: 'boolean', description: 'health (cold plasma) mode' },
  { name: 'SwhSlp', domain: 'boolean', description: 'sleep mode' },
  { name: 'Lig', domain: 'boolean', description: 'display and indicator lights' },
  { name: 'SwingLfRig', domain: 'integer', description: 'horizontal swing (see HorizontalSwing)' },
  { name: 'SwUpDn', domain: 'integer', description: 'vertical swing (see VerticalSwing)' },
  { name: 'Quiet', domain: 'boolean', description: 'quiet mode' },
  { name: 'Tur', domain: 'boolean', description: 'turbo fan' },
  { name: 'StHt', domain: 'boolean', description: 'keep the room at 8°C' },
  { name: 'HeatCoolType', domain: 'string', description: 'unknown' },
  { name: 'TemRec', domain: 'integer', description: 'distinguishes two Fahrenheit values sharing a Celsius set point' },
  { name: 'SvSt', domain: 'boolean', description: 'energy saving mode' },
  { name: 'TemSen', domain: 'string', description: 'internal temperature sensor, Celsius + 40', readOnly: true },
  { name: 'time', domain: 'string', description: 'device time, "2018-05-11 19:42:01"' },
] as const satisfies readonly VariableDefinition[];

export type VariableName = typeof VARIABLE_CATALOG[number]['name'];

export const VARIABLE_NAMES: readonly VariableName[] = VARIABLE_CATALOG.map(v => v.name);

/** Read by the front ends when nothing more specific is asked for */
export const DEFAULT_VARIABLES: readonly VariableName[] = ['Pow', 'Mod', 'SetTem', 'TemUn', 'WdSpd'];

export enum OperationMode {
  AUTO = 0,
  COOL = 1,
  DRY = 2,
  FAN = 3,
  HEAT = 4,
}

export enum FanSpeed {
  AUTO = 0,
  LOW = 1,
  MEDIUM_LOW = 2,   // not on 3-speed units
  MEDIUM = 3,
  MEDIUM_HIGH = 4,  // not on 3-speed units
  HIGH = 5,
}

export enum TemperatureUnit {
  CELSIUS = 0,
  FAHRENHEIT = 1,
}

export enum HorizontalSwing {
  DEFAULT = 0,
  FULL = 1,
  LEFTMOST = 2,
  MIDDLE_LEFT = 3,
  MIDDLE = 4,
  MIDDLE_RIGHT = 5,
  RIGHTMOST = 6,
}

/**
 * 2-6 fix the blades from top to bottom, 7-11 swing within a region from bottom to top
 */
export enum VerticalSwing {
  DEFAULT = 0,
  FULL = 1,
  FIXED_TOP = 2,
  FIXED_MIDDLE_UP = 3,
  FIXED_MIDDLE = 4,
  FIXED_MIDDLE_LOW = 5,
  FIXED_BOTTOM = 6,
  SWING_BOTTOM = 7,
  SWING_MIDDLE_LOW = 8,
  SWING_MIDDLE = 9,
  SWING_MIDDLE_UP = 10,
  SWING_TOP = 11,
}

export type VariableValue = number | string;

const definitions = new Map<string, VariableDefinition>(VARIABLE_CATALOG.map(v => [v.name, v]));

export function isVariableName(name: string): name is VariableName {
  return definitions.has(name);
}

export function definitionOf(name: string): VariableDefinition {
  const definition = definitions.get(name);
  if (!definition) {
    throw new InvalidVariableError(name);
  }
  return definition;
}

/**
 * Parse a user supplied literal against the variable's domain
 */
export function parseValue(name: VariableName, literal: string): VariableValue {
  const { domain } = definitionOf(name);
  if (domain === 'string') {
    return literal;
  }
  if (!/^\d{1,3}$/.test(literal)) {
    throw new InvalidValueError(name, literal);
  }
  const value = parseInt(literal, 10);
  if (value > (domain === 'boolean' ? 1 : 255)) {
    throw new InvalidValueError(name, literal);
  }
  return value;
}

export interface VariableSlot {
  value: VariableValue | null;
  readPending: boolean;
  writePending: boolean;
}

/**
 * Named variables with pending-read and pending-write flags.
 * Owned by the caller; the session only changes slot contents.
 */
export class VariableBag {
  private readonly slots = new Map<VariableName, VariableSlot>();

  /**
   * Slots to be filled by the next network read
   */
  static fromNames(names: Iterable<string>): VariableBag {
    const bag = new VariableBag();
    for (const name of names) {
      if (!isVariableName(name)) {
        throw new InvalidVariableError(name);
      }
      bag.slots.set(name, { value: null, readPending: true, writePending: false });
    }
    return bag;
  }

  /**
   * Slots to be committed by the next network write
   */
  static fromNameValuePairs(pairs: Iterable<readonly [string, string]>): VariableBag {
    const bag = new VariableBag();
    for (const [name, literal] of pairs) {
      bag.set(name, literal);
    }
    return bag;
  }

  /**
   * "Pow,Mod,SetTem"
   */
  static parseNames(text: string): VariableBag {
    return VariableBag.fromNames(splitList(text));
  }

  /**
   * "Pow=1,SetTem=24"
   */
  static parseAssignments(text: string): VariableBag {
    const pairs = splitList(text).map((item): [string, string] => {
      const separator = item.indexOf('=');
      if (separator < 0) {
        throw new InvalidValueError(item, '');
      }
      return [item.slice(0, separator).trim(), item.slice(separator + 1).trim()];
    });
    return VariableBag.fromNameValuePairs(pairs);
  }

  /**
   * Set a value locally and mark it for the next write
   */
  set(name: string, literal: string): void {
    if (!isVariableName(name)) {
      throw new InvalidVariableError(name);
    }
    if (definitionOf(name).readOnly) {
      throw new InvalidVariableError(name, 'read-only');
    }
    const value = parseValue(name, literal);
    const slot = this.slots.get(name);
    if (slot) {
      slot.value = value;
      slot.writePending = true;
    } else {
      this.slots.set(name, { value, readPending: false, writePending: true });
    }
  }

  get(name: VariableName): VariableValue | null {
    return this.slots.get(name)?.value ?? null;
  }

  slot(name: VariableName): Readonly<VariableSlot> | undefined {
    return this.slots.get(name);
  }

  has(name: string): name is VariableName {
    return isVariableName(name) && this.slots.has(name);
  }

  names(): VariableName[] {
    return [...this.slots.keys()];
  }

  get size(): number {
    return this.slots.size;
  }

  pendingReads(): VariableName[] {
    return [...this.slots].filter(([, slot]) => slot.readPending).map(([name]) => name);
  }

  pendingWrites(): Array<[VariableName, VariableValue]> {
    const writes: Array<[VariableName, VariableValue]> = [];
    for (const [name, slot] of this.slots) {
      if (slot.writePending && slot.value !== null) {
        writes.push([name, slot.value]);
      }
    }
    return writes;
  }

  /**
   * Returns false when the bag has no slot for `name`
   */
  applyReadResult(name: string, value: VariableValue): boolean {
    const slot = this.has(name) ? this.slots.get(name) : undefined;
    if (!slot) {
      return false;
    }
    slot.value = value;
    slot.readPending = false;
    return true;
  }

  applyWriteResult(name: string, value: VariableValue): boolean {
    const slot = this.has(name) ? this.slots.get(name) : undefined;
    if (!slot) {
      return false;
    }
    slot.value = value;
    slot.readPending = false;
    slot.writePending = false;
    return true;
  }

  toReportMap(): Record<string, VariableValue | null> {
    const report: Record<string, VariableValue | null> = {};
    for (const [name, slot] of this.slots) {
      report[name] = slot.value;
    }
    return report;
  }
}

function splitList(text: string): string[] {
  return text.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

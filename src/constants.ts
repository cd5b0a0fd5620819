/**
 * Constants for the EWPE Aircon Platform
 */

// EWPE protocol constants
export const EWPE_PROTOCOL = {
  DEVICE_PORT: 7000,
  GENERIC_KEY: 'a3K8Bx%2r8Y7#xDh',
  BLOCK_SIZE: 16,
  CLIENT_ID: 'app',
  SCAN_REQUEST: '{"t":"scan"}',
  SENSOR_OFFSET: 40,               // TemSen reports Celsius + 40
} as const;

// Client defaults
export const CLIENT_DEFAULTS = {
  BROADCAST_ADDRESS: '255.255.255.255',
  BIND_PORT: 0,                    // ephemeral
  MAX_COUNT: 10,                   // devices per scan
  RECV_TIMEOUT_MS: 3000,
  MIN_SCAN_AGE_MS: 60 * 1000,      // routine rescans are suppressed below this age
  MAX_SCAN_AGE_MS: 24 * 3600 * 1000,
  BUFFER_SIZE: 2048,
} as const;

// Polling configuration defaults
export const DEFAULT_POLLING_CONFIG = {
  intervalMs: 60000, // 1 minute, 0 disables
  stateTtlMs: 2000,  // characteristic reads within this window share one network read
} as const;

// Temperature limits
export const TEMPERATURE_LIMITS = {
  HOMEKIT_CURRENT_MIN: -270,
  HOMEKIT_CURRENT_MAX: 100,
  SET_MIN_C: 16,
  SET_MAX_C: 30,
} as const;

// Fan speeds usable from HomeKit RotationSpeed (WdSpd 0 is auto)
export const FAN_SPEED_STEPS = 5;

/**
 * Client configuration: schema, defaults and parsing
 */

import { z } from 'zod';

import { CLIENT_DEFAULTS, DEFAULT_POLLING_CONFIG, EWPE_PROTOCOL } from './constants.js';
import { ConfigError } from './errors.js';

const IPV4_PATTERN = /^(25[0-5]|2[0-4]\d|1?\d?\d)(\.(25[0-5]|2[0-4]\d|1?\d?\d)){3}$/;

export const ClientConfigSchema = z.object({
  broadcastAddress: z.string().regex(IPV4_PATTERN, 'must be an IPv4 address')
    .default(CLIENT_DEFAULTS.BROADCAST_ADDRESS)
    .describe('Where scan requests are broadcast'),
  port: z.number().int().min(1).max(65535).default(EWPE_PROTOCOL.DEVICE_PORT)
    .describe('UDP port the devices listen on'),
  bindAddress: z.string().regex(IPV4_PATTERN, 'must be an IPv4 address').optional()
    .describe('Local address to bind, all interfaces when unset'),
  bindPort: z.number().int().min(0).max(65535).default(CLIENT_DEFAULTS.BIND_PORT)
    .describe('Local UDP port, 0 for an ephemeral one'),
  maxCount: z.number().int().positive().default(CLIENT_DEFAULTS.MAX_COUNT)
    .describe('Stop a scan after this many devices answered'),
  recvTimeoutMs: z.number().int().positive().default(CLIENT_DEFAULTS.RECV_TIMEOUT_MS)
    .describe('Receive timeout of every exchange'),
  minScanAgeMs: z.number().int().nonnegative().default(CLIENT_DEFAULTS.MIN_SCAN_AGE_MS)
    .describe('Rescans are suppressed while the last scan is younger than this'),
  maxScanAgeMs: z.number().int().positive().default(CLIENT_DEFAULTS.MAX_SCAN_AGE_MS)
    .describe('A scan older than this is always redone'),
  bufferSize: z.number().int().positive().default(CLIENT_DEFAULTS.BUFFER_SIZE)
    .describe('Largest datagram accepted'),
  aliases: z.record(z.string(), z.string()).default({})
    .describe('Friendly name to MAC address'),
  retainSessionKeys: z.boolean().default(false)
    .describe('Keep session keys of devices that reappear in a rescan'),
}).refine(config => config.minScanAgeMs < config.maxScanAgeMs, {
  message: 'minScanAgeMs must be less than maxScanAgeMs',
  path: ['minScanAgeMs'],
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

function configError(error: z.ZodError): ConfigError {
  const details = error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`).join('; ');
  return new ConfigError(`Invalid configuration - ${details}`, { cause: error });
}

/**
 * Validate `input` and fill in defaults
 */
export function parseClientConfig(input: unknown = {}): ClientConfig {
  const result = ClientConfigSchema.safeParse(input);
  if (!result.success) {
    throw configError(result.error);
  }
  return result.data;
}

/**
 * Homebridge-only settings, next to the client ones in the platform block
 */
export const PlatformOptionsSchema = z.object({
  name: z.string().default('EWPE Aircon'),
  pollIntervalMs: z.number().int().nonnegative().default(DEFAULT_POLLING_CONFIG.intervalMs)
    .describe('State refresh interval, 0 to disable'),
  devices: z.array(z.object({
    mac: z.string().min(1),
    name: z.string().min(1),
  })).default([])
    .describe('Display names by MAC address'),
});

export type PlatformOptions = z.infer<typeof PlatformOptionsSchema>;

export function parsePlatformOptions(input: unknown = {}): PlatformOptions {
  const result = PlatformOptionsSchema.safeParse(input);
  if (!result.success) {
    throw configError(result.error);
  }
  return result.data;
}

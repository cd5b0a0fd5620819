/**
 * Message builders and response schemas for the EWPE protocol.
 * Schemas are the source of truth; types are derived with z.infer<>.
 */

import { z } from 'zod';

import { decode, encode } from './codec.js';
import { EWPE_PROTOCOL } from './constants.js';
import { SerializationError, errorMessage } from './errors.js';
import type { VariableName, VariableValue } from './variables.js';

// =============================================================================
// Envelope
// =============================================================================

/**
 * Outer message. Every field may be missing on the wire.
 */
export const GenericMessageSchema = z.object({
  cid: z.string().default(''),
  i: z.number().int().default(0),
  pack: z.string().default(''),
  t: z.string().default(''),
  tcid: z.string().default(''),
  uid: z.number().int().default(0),
});

export type GenericMessage = z.infer<typeof GenericMessageSchema>;

/** Envelope as sent by this client */
export interface OutboundMessage {
  cid: typeof EWPE_PROTOCOL.CLIENT_ID;
  i: 0 | 1;
  pack: string;
  t: 'pack';
  tcid: string;
  uid: 0;
}

// =============================================================================
// Response packs
// =============================================================================

const WireValueSchema = z.union([z.number(), z.string()]);

const PackTypeSchema = z.object({ t: z.string().default('') });

export const ScanResponsePackSchema = z.object({
  t: z.string().default(''),
  cid: z.string().default(''),
  bc: z.string().default(''),
  brand: z.string().default(''),
  catalog: z.string().default(''),
  mac: z.string().default(''),
  mid: z.string().default(''),
  model: z.string().default(''),
  name: z.string().default(''),
  lock: z.number().int().default(0),
  series: z.string().default(''),
  vender: z.string().default(''),
  ver: z.string().default(''),
});

export type ScanResponsePack = z.infer<typeof ScanResponsePackSchema>;

export const BindResponsePackSchema = z.object({
  t: z.string(),
  mac: z.string(),
  key: z.string(),
  r: z.number().int(),
});

export type BindResponsePack = z.infer<typeof BindResponsePackSchema>;

export const StatusResponsePackSchema = z.object({
  t: z.string(),
  mac: z.string(),
  r: z.number().int(),
  cols: z.array(z.string()),
  dat: z.array(WireValueSchema),
});

export type StatusResponsePack = z.infer<typeof StatusResponsePackSchema>;

export const CommandResponsePackSchema = z.object({
  t: z.string(),
  mac: z.string(),
  r: z.number().int(),
  opt: z.array(z.string()),
  p: z.array(WireValueSchema),
  val: z.array(WireValueSchema).default([]),
});

export type CommandResponsePack = z.infer<typeof CommandResponsePackSchema>;

/** Inner `t` of each response type */
export const RESPONSE_TYPES = {
  scan: 'dev',
  bind: 'bindok',
  status: 'dat',
  command: 'res',
} as const;

// =============================================================================
// Builders
// =============================================================================

export function scanRequest(): Buffer {
  return Buffer.from(EWPE_PROTOCOL.SCAN_REQUEST, 'utf8');
}

function envelope(mac: string, pack: string, i: 0 | 1): OutboundMessage {
  return { cid: EWPE_PROTOCOL.CLIENT_ID, i, pack, t: 'pack', tcid: mac, uid: 0 };
}

export function bindRequest(mac: string, key: string = EWPE_PROTOCOL.GENERIC_KEY): OutboundMessage {
  const pack = encode(JSON.stringify({ mac, t: 'bind', uid: 0 }), key);
  return envelope(mac, pack, 1);
}

export function statusRequest(mac: string, key: string, names: readonly VariableName[]): OutboundMessage {
  const pack = encode(JSON.stringify({ cols: names, mac, t: 'status' }), key);
  return envelope(mac, pack, 0);
}

export function commandRequest(
  mac: string,
  key: string,
  names: readonly VariableName[],
  values: readonly VariableValue[],
): OutboundMessage {
  const pack = encode(JSON.stringify({ opt: names, p: values, t: 'cmd' }), key);
  return envelope(mac, pack, 0);
}

export function serialize(message: OutboundMessage): Buffer {
  return Buffer.from(JSON.stringify(message), 'utf8');
}

// =============================================================================
// Parsers
// =============================================================================

function parseJson<T extends z.ZodTypeAny>(schema: T, text: string, what: string): z.infer<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new SerializationError(`Malformed ${what}: ${errorMessage(err)}`, { cause: err });
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new SerializationError(`Unexpected ${what}: ${result.error.issues.map(i => `${i.path.join('.')} ${i.message}`).join('; ')}`);
  }
  return result.data;
}

export function parseGenericMessage(datagram: Buffer | string): GenericMessage {
  return parseJson(GenericMessageSchema, datagram.toString(), 'envelope');
}

/**
 * Decrypt a response pack and check it against `schema`
 */
export function openPack<T extends z.ZodTypeAny>(schema: T, message: GenericMessage, key: string): z.infer<T> {
  return parseJson(schema, decode(message.pack, key), 'pack');
}

/**
 * Like openPack, but returns undefined for a well-formed pack of another type,
 * which is how a late reply to an earlier request shows up.
 */
export function openPackOfType<T extends z.ZodTypeAny>(
  schema: T,
  message: GenericMessage,
  key: string,
  type: string,
): z.infer<T> | undefined {
  const { t } = openPack(PackTypeSchema, message, key);
  if (t !== type) {
    return undefined;
  }
  return openPack(schema, message, key);
}

/**
 * Library entry point: the session engine without the Homebridge front end
 */

export { AirconSession } from './session.js';
export type { Operation, ScanFreshness, SessionOptions } from './session.js';
export { DeviceClient } from './client.js';
export type { DeviceClientOptions } from './client.js';
export { DeviceRegistry } from './registry.js';
export type { RegistryOptions } from './registry.js';
export { Transport, DEFAULT_TRANSPORT_OPTIONS } from './transport.js';
export type { ReceivedMessage, TransportOptions } from './transport.js';
export { JobQueue } from './jobQueue.js';
export { encode, decode, pkcs7Pad, pkcs7Unpad } from './codec.js';
export * from './messages.js';
export * from './variables.js';
export * from './errors.js';
export { ClientConfigSchema, parseClientConfig } from './config.js';
export type { ClientConfig, ClientConfigInput } from './config.js';
export { CLIENT_DEFAULTS, EWPE_PROTOCOL } from './constants.js';
export type { DatagramSocket, Device, DeviceMetadata, Log, MacAddress, ScanResult } from './types.js';

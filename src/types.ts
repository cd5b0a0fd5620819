/**
 * Type definitions shared by the engine and the Homebridge front end
 */

import type { AddressInfo } from 'node:net';
import type { Logger } from 'homebridge';

import type { ScanResponsePack } from './messages.js';

/** The subset of the Homebridge logger the engine writes to */
export type Log = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

export type MacAddress = string;

export type DeviceMetadata = ScanResponsePack;

export interface Device {
  mac: MacAddress;
  address: string;
  metadata: DeviceMetadata;
  key?: string;
  scannedAt: number;
  boundAt?: number;
}

/** One reply to a broadcast scan */
export interface ScanResult {
  address: string;
  metadata: DeviceMetadata;
}

export interface RemoteInfo {
  address: string;
  family: string;
  port: number;
  size: number;
}

/**
 * The part of a node:dgram socket the transport uses.
 * Tests pass an in-process stand-in.
 */
export interface DatagramSocket {
  on(event: 'message', listener: (msg: Buffer, rinfo: RemoteInfo) => void): void;
  on(event: 'error', listener: (err: Error) => void): void;
  once(event: 'error', listener: (err: Error) => void): void;
  off(event: 'error', listener: (err: Error) => void): void;
  bind(port?: number, address?: string, callback?: () => void): void;
  setBroadcast(flag: boolean): void;
  send(msg: Uint8Array, port: number, address: string, callback?: (error: Error | null, bytes: number) => void): void;
  address(): AddressInfo;
  close(callback?: () => void): void;
}

export interface InboundDatagram {
  address: string;
  port: number;
  data: Buffer;
  generation: number;
}

export interface JobResolveReject {
  resolve: () => void;
  reject: (reason?: unknown) => void;
}

/** Stored on each PlatformAccessory; a type alias so it fits Homebridge's context record */
export type AccessoryContext = {
  mac: MacAddress;
  address: string;
  metadata?: DeviceMetadata;
};

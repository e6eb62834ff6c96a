/**
 * Polling engine contract.
 *
 * The engine owns the device connection and calls back once per attribute read;
 * a read that times out produces no callback for that cycle.
 */

import { DeviceAttribute } from './DeviceAttributes';

export interface DeviceAddress {
  host: string;
  port: number;
}

export type AttributeCallback = (attribute: DeviceAttribute, values: number[]) => void;

export interface PollSubscriptionRequest {
  address: DeviceAddress;
  attributes: readonly DeviceAttribute[];
  cycleMs: number;
  timeoutMs: number;
  callback: AttributeCallback;
  onTimeout?: (attribute: DeviceAttribute) => void;
}

export interface PollSubscription {
  stop(): Promise<void>;
}

export interface PollingEngine {
  subscribe(request: PollSubscriptionRequest): PollSubscription;
}

/**
 * Industrial-protocol client plugged into IntervalPollingEngine.
 * read() resolves with the attribute's value list.
 */
export interface AttributeReader {
  connect?(address: DeviceAddress): Promise<void>;
  read(attribute: DeviceAttribute, timeoutMs: number): Promise<number[]>;
  close?(): Promise<void>;
}

export type AttributeReaderFactory = (address: DeviceAddress) => AttributeReader;

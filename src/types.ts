import { EventEmitter } from 'events';

/**
 * Power state of the strip as observed through the notification protocol.
 * UNKNOWN is the default and the result of a query that got no valid answer.
 */
export enum LedState {
  ON = 'ON',
  OFF = 'OFF',
  UNKNOWN = 'UNKNOWN'
}

/**
 * How a single notification frame was classified
 * - on / off: header matched and the state byte is 1 / 0
 * - unrecognized: header matched but the state byte is something else
 * - ignored: too short or wrong header
 */
export type NotificationClass = 'on' | 'off' | 'unrecognized' | 'ignored';

export type NotificationHandler = (data: Buffer) => void;

/**
 * Reasons a transport operation can fail
 */
export enum TransportErrorKind {
  CONNECT_FAILED = 'connect_failed',
  DEVICE_NOT_FOUND = 'device_not_found',
  LINK_LOST = 'link_lost',
  WRITE_NOT_ACKNOWLEDGED = 'write_not_acknowledged',
  CHARACTERISTIC_MISSING = 'characteristic_missing'
}

// ============================================================================
// Configuration
// ============================================================================

export interface LedStripConfig {
  /** HCI adapter to use, e.g. "hci0" */
  adapter: string;
  /** Peripheral MAC address, e.g. "CE:36:35:30:1D:52" */
  address: string;
  /** Characteristic command frames are written to */
  writeCharUuid: string;
  /** Characteristic the strip notifies its state on */
  readCharUuid: string;
  /**
   * How long a state query waits for a notification (ms)
   * Default: 8000
   */
  queryTimeoutMs: number;
  /**
   * How long connect() may take, including finding the device (ms)
   * Default: 20000
   */
  connectTimeoutMs: number;
}

/**
 * Options for state queries
 */
export interface QueryOptions {
  /**
   * Timeout in milliseconds (default: config.queryTimeoutMs)
   */
  timeout?: number;
}

// ============================================================================
// Transport
// ============================================================================

export interface ConnectOptions {
  adapter: string;
  address: string;
  timeoutMs: number;
}

export interface GattCharacteristicInfo {
  uuid: string;
  description: string;
  /** e.g. read, write, writeWithoutResponse, notify */
  properties: string[];
}

export interface GattServiceInfo {
  uuid: string;
  description: string;
  characteristics: GattCharacteristicInfo[];
}

/**
 * One connected link to one peripheral
 */
export interface GattTransport {
  readonly address: string;
  readonly isConnected: boolean;
  /**
   * @param requireAck - write with response; resolves once the link layer acknowledged receipt
   */
  writeCharacteristic(uuid: string, data: Buffer, requireAck: boolean): Promise<void>;
  subscribeNotify(uuid: string, handler: NotificationHandler): Promise<void>;
  unsubscribeNotify(uuid: string): Promise<void>;
  listServices(): Promise<GattServiceInfo[]>;
  disconnect(): Promise<void>;
}

export interface GattConnector {
  connect(options: ConnectOptions): Promise<GattTransport>;
}

// ============================================================================
// Session
// ============================================================================

export type ToggleResult =
  | { outcome: 'toggled'; previous: LedState.ON | LedState.OFF; current: LedState.ON | LedState.OFF }
  | { outcome: 'indeterminate' };

export interface LedStripEvents {
  // Every raw frame received while a query is armed
  notification: (frame: Buffer) => void;
  // Emitted whenever lastKnownState changes
  state: (state: LedState) => void;
  // A query got no valid answer within its timeout
  timeout: (timeoutMs: number) => void;
}

export type LedStripEventEmitter = EventEmitter & {
  on<U extends keyof LedStripEvents>(event: U, listener: LedStripEvents[U]): LedStripEventEmitter;
  off<U extends keyof LedStripEvents>(event: U, listener: LedStripEvents[U]): LedStripEventEmitter;
  emit<U extends keyof LedStripEvents>(event: U, ...args: Parameters<LedStripEvents[U]>): boolean;
};

import { LedState, NotificationClass } from '../types';
import { xorChecksum } from '../utils/codec';
import { dbg } from '../utils/debug';

// Every frame is FRAME_LENGTH bytes: head bytes, zero padding, XOR of all preceding bytes
export const FRAME_LENGTH = 20;

export const Header = {
  COMMAND: 0x33,
  STATUS: 0xaa
} as const;

export const CommandType = {
  POWER: 0x01,
  STATUS_QUERY: 0x01
} as const;

export const StateByte = {
  OFF: 0x00,
  ON: 0x01
} as const;

// Offset of the power state inside a status notification (AA ?? <state> ...)
export const NOTIFY_STATE_OFFSET = 2;
export const NOTIFY_MIN_LENGTH = 3;

export function buildFrame(head: number[]): Buffer {
  if (head.length > FRAME_LENGTH - 1) {
    throw new RangeError(`Frame head too long: ${head.length} bytes`);
  }
  const buf = Buffer.alloc(FRAME_LENGTH, 0);
  Buffer.from(head).copy(buf, 0);
  buf[FRAME_LENGTH - 1] = xorChecksum(buf.subarray(0, FRAME_LENGTH - 1));
  return buf;
}

export function hasValidChecksum(frame: Uint8Array): boolean {
  if (frame.length < 2) return false;
  return xorChecksum(frame.subarray(0, frame.length - 1)) === frame[frame.length - 1];
}

// 33 01 01 00..00 33
const ON_FRAME = buildFrame([Header.COMMAND, CommandType.POWER, StateByte.ON]);
// 33 01 00 00..00 32
const OFF_FRAME = buildFrame([Header.COMMAND, CommandType.POWER, StateByte.OFF]);
// AA 01 00..00 AB
const QUERY_TRIGGER_FRAME = buildFrame([Header.STATUS, CommandType.STATUS_QUERY]);

// Accessors hand out copies so the constants can't be mutated by callers
export function onFrame(): Buffer { return Buffer.from(ON_FRAME); }
export function offFrame(): Buffer { return Buffer.from(OFF_FRAME); }
export function queryTriggerFrame(): Buffer { return Buffer.from(QUERY_TRIGGER_FRAME); }

export function powerFrame(on: boolean): Buffer {
  return on ? onFrame() : offFrame();
}

/**
 * Status notification as the strip sends it after a query trigger
 */
export function encodeStatusNotification(on: boolean): Buffer {
  return buildFrame([Header.STATUS, CommandType.STATUS_QUERY, on ? StateByte.ON : StateByte.OFF]);
}

/**
 * Classify a notification frame. The trailing checksum is not checked:
 * headed frames are taken at face value.
 */
export function classifyNotification(data: Uint8Array): NotificationClass {
  if (data.length < NOTIFY_MIN_LENGTH || data[0] !== Header.STATUS) return 'ignored';
  switch (data[NOTIFY_STATE_OFFSET]) {
    case StateByte.ON:
      return 'on';
    case StateByte.OFF:
      return 'off';
    default:
      return 'unrecognized';
  }
}

/**
 * Total: never throws, frames it can't interpret are UNKNOWN
 */
export function decodeNotification(data: Uint8Array): LedState {
  const cls = classifyNotification(data);
  switch (cls) {
    case 'on':
      return LedState.ON;
    case 'off':
      return LedState.OFF;
    case 'unrecognized':
      dbg(`Unrecognized state byte: 0x${data[NOTIFY_STATE_OFFSET].toString(16).padStart(2, '0')}`);
      return LedState.UNKNOWN;
    case 'ignored':
      return LedState.UNKNOWN;
  }
}

import { EventEmitter } from 'events';
import {
  GattConnector,
  GattTransport,
  LedState,
  LedStripConfig,
  LedStripEventEmitter,
  QueryOptions,
  ToggleResult,
  TransportErrorKind
} from '../types';
import { awaitState } from '../core/NotificationCorrelator';
import { powerFrame, queryTriggerFrame } from '../core/LedPayloads';
import { ConnectionFailureError, SessionBusyError, TransportError, WriteFailureError, describeCause } from '../utils/errors';
import { hex } from '../utils/codec';
import { dbg, dbgV } from '../utils/debug';

/**
 * State-level operations on one connected strip.
 *
 * The session never opens or closes the link itself: it works on a transport the
 * caller already connected (see withLedStrip). Operations are strictly sequential;
 * starting one while another is in flight throws SessionBusyError.
 */
export class LedStripSession {
  private ev: LedStripEventEmitter = new EventEmitter() as LedStripEventEmitter;
  private transport: GattTransport;
  private config: LedStripConfig;
  private state: LedState = LedState.UNKNOWN;
  private inFlight?: string;

  constructor(transport: GattTransport, config: LedStripConfig) {
    this.transport = transport;
    this.config = config;
  }

  get events(): LedStripEventEmitter { return this.ev; }

  /**
   * State as last observed through this session. Not re-verified after setState().
   */
  get lastKnownState(): LedState { return this.state; }

  get address(): string { return this.transport.address; }

  /**
   * Ask the strip for its power state
   * @returns ON / OFF, or UNKNOWN if no valid notification arrived in time
   * @throws ConnectionFailureError if the link is down, WriteFailureError if the trigger write failed
   * @example
   * const state = await session.queryState({ timeout: 3000 });
   */
  async queryState(options?: QueryOptions): Promise<LedState> {
    return this.exclusive('queryState', () => this.doQuery(options));
  }

  /**
   * Switch the strip on or off. Confirmed at link layer only, no notification is awaited.
   */
  async setState(on: boolean): Promise<void> {
    return this.exclusive('setState', () => this.doSet(on));
  }

  /**
   * Query, then write the opposite state. Performs no write when the state can't be determined.
   */
  async toggleState(): Promise<ToggleResult> {
    return this.exclusive<ToggleResult>('toggleState', async () => {
      const previous = await this.doQuery();
      if (previous === LedState.UNKNOWN) {
        dbg('Toggle skipped: current state unknown');
        return { outcome: 'indeterminate' };
      }
      const turnOn = previous === LedState.OFF;
      await this.doSet(turnOn);
      return { outcome: 'toggled', previous, current: turnOn ? LedState.ON : LedState.OFF };
    });
  }

  private async doQuery(options?: QueryOptions): Promise<LedState> {
    this.ensureConnected();
    const timeoutMs = options?.timeout ?? this.config.queryTimeoutMs;
    const state = await awaitState(this.transport, {
      writeCharUuid: this.config.writeCharUuid,
      readCharUuid: this.config.readCharUuid,
      trigger: queryTriggerFrame(),
      timeoutMs,
      onNotification: (frame) => this.ev.emit('notification', frame)
    });
    if (state === LedState.UNKNOWN) this.ev.emit('timeout', timeoutMs);
    this.updateState(state);
    return state;
  }

  private async doSet(on: boolean): Promise<void> {
    this.ensureConnected();
    const frame = powerFrame(on);
    dbgV(`Power ${on ? 'ON' : 'OFF'} -> ${this.config.writeCharUuid}: ${hex(frame)}`);
    try {
      await this.transport.writeCharacteristic(this.config.writeCharUuid, frame, true);
    } catch (err) {
      throw err instanceof TransportError ? err : new WriteFailureError(this.config.writeCharUuid, err);
    }
    this.updateState(on ? LedState.ON : LedState.OFF);
  }

  private ensureConnected() {
    if (!this.transport.isConnected) {
      throw new ConnectionFailureError(TransportErrorKind.LINK_LOST, this.transport.address);
    }
  }

  private updateState(next: LedState) {
    if (next === this.state) return;
    dbg(`State: ${this.state} → ${next}`);
    this.state = next;
    this.ev.emit('state', next);
  }

  private async exclusive<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    if (this.inFlight) throw new SessionBusyError(operation, this.inFlight);
    this.inFlight = operation;
    try {
      return await fn();
    } finally {
      this.inFlight = undefined;
    }
  }
}

/**
 * Connect and check the link is actually up
 * @throws ConnectionFailureError
 */
export async function openTransport(connector: GattConnector, config: LedStripConfig): Promise<GattTransport> {
  dbg(`Connecting to ${config.address} using adapter ${config.adapter}...`);
  let transport: GattTransport;
  try {
    transport = await connector.connect({
      adapter: config.adapter,
      address: config.address,
      timeoutMs: config.connectTimeoutMs
    });
  } catch (err) {
    if (err instanceof TransportError) throw err;
    throw new ConnectionFailureError(TransportErrorKind.CONNECT_FAILED, describeCause(err), { address: config.address });
  }
  if (!transport.isConnected) {
    await closeTransport(transport);
    throw new ConnectionFailureError(TransportErrorKind.CONNECT_FAILED, config.address);
  }
  dbg(`Connected to ${transport.address}`);
  return transport;
}

export async function closeTransport(transport: GattTransport): Promise<void> {
  try {
    await transport.disconnect();
  } catch (err) {
    // Nothing left to do with a link we're dropping anyway
    dbg(`Disconnect from ${transport.address} failed: ${describeCause(err)}`);
  }
}

/**
 * Scoped acquisition: connect, run fn against a fresh session, always disconnect
 */
export async function withLedStrip<T>(
  connector: GattConnector,
  config: LedStripConfig,
  fn: (session: LedStripSession) => Promise<T>
): Promise<T> {
  const transport = await openTransport(connector, config);
  try {
    return await fn(new LedStripSession(transport, config));
  } finally {
    await closeTransport(transport);
  }
}

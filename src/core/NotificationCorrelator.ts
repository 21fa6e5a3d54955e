import { GattTransport, LedState } from '../types';
import { classifyNotification } from './LedPayloads';
import { TransportError, WriteFailureError, describeCause } from '../utils/errors';
import { hex } from '../utils/codec';
import { dbg, dbgV } from '../utils/debug';

export interface CorrelationRequest {
  /** Characteristic the trigger is written to */
  writeCharUuid: string;
  /** Characteristic the answer is notified on */
  readCharUuid: string;
  trigger: Buffer;
  /** Counted from the moment the trigger write was acknowledged */
  timeoutMs: number;
  /** Observer for every frame received while armed */
  onNotification?: (frame: Buffer) => void;
}

/**
 * Send a trigger frame and wait for the notification that answers it.
 *
 * The listener is armed before the trigger is written, so a peripheral that answers
 * before the write call returns is still observed. The first frame that decodes to
 * ON or OFF wins; anything else keeps the wait open. Resolves UNKNOWN on timeout.
 *
 * The subscription is released on every exit path. A failed trigger write rejects
 * with a WriteFailureError; it is never reported as UNKNOWN.
 */
export async function awaitState(transport: GattTransport, request: CorrelationRequest): Promise<LedState> {
  const { writeCharUuid, readCharUuid, trigger, timeoutMs, onNotification } = request;

  let done = false;
  let timer: NodeJS.Timeout | undefined;
  let settle: (state: LedState) => void = () => {};
  const completion = new Promise<LedState>((resolve) => { settle = resolve; });

  const finish = (state: LedState) => {
    if (done) return;
    done = true;
    if (timer) { clearTimeout(timer); timer = undefined; }
    settle(state);
  };

  const onFrame = (frame: Buffer) => {
    // A late frame after completion must not touch the result
    if (done) return;
    dbgV(`Notification on ${readCharUuid}: ${hex(frame)}`);
    onNotification?.(frame);
    const cls = classifyNotification(frame);
    if (cls === 'on') finish(LedState.ON);
    else if (cls === 'off') finish(LedState.OFF);
    else if (cls === 'unrecognized') dbg(`Unrecognized state byte in ${hex(frame)}, still waiting`);
  };

  await transport.subscribeNotify(readCharUuid, onFrame);
  try {
    dbgV(`Trigger -> ${writeCharUuid}: ${hex(trigger)}`);
    try {
      await transport.writeCharacteristic(writeCharUuid, trigger, true);
    } catch (err) {
      done = true;
      throw err instanceof TransportError ? err : new WriteFailureError(writeCharUuid, err);
    }

    if (!done) {
      timer = setTimeout(() => {
        dbg(`No valid notification within ${timeoutMs}ms`);
        finish(LedState.UNKNOWN);
      }, timeoutMs);
    }
    return await completion;
  } finally {
    await releaseSubscription(transport, readCharUuid);
  }
}

async function releaseSubscription(transport: GattTransport, uuid: string): Promise<void> {
  try {
    await transport.unsubscribeNotify(uuid);
  } catch (err) {
    // The handler is already inert (done === true); keep the settled outcome
    dbg(`Failed to unsubscribe from ${uuid}: ${describeCause(err)}`);
  }
}

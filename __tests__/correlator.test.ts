import { awaitState, CorrelationRequest } from '../src/core/NotificationCorrelator';
import { encodeStatusNotification, queryTriggerFrame } from '../src/core/LedPayloads';
import { DEFAULT_READ_CHAR_UUID, DEFAULT_WRITE_CHAR_UUID } from '../src/config';
import { LedState } from '../src/types';
import { WriteFailureError } from '../src/utils/errors';
import { SimulatedLedStrip } from './helpers/SimulatedLedStrip';

function request(timeoutMs: number, extra: Partial<CorrelationRequest> = {}): CorrelationRequest {
  return {
    writeCharUuid: DEFAULT_WRITE_CHAR_UUID,
    readCharUuid: DEFAULT_READ_CHAR_UUID,
    trigger: queryTriggerFrame(),
    timeoutMs,
    ...extra
  };
}

describe('awaitState', () => {
  test('resolves the notified state and releases the subscription', async () => {
    const strip = new SimulatedLedStrip({ on: true, responseMode: 'async' });
    const state = await awaitState(strip, request(1000));
    expect(state).toBe(LedState.ON);
    expect(strip.activeSubscriptions).toBe(0);
    expect(strip.subscribeCalls).toBe(1);
    expect(strip.unsubscribeCalls).toBe(1);
  });

  test('writes the trigger with response', async () => {
    const strip = new SimulatedLedStrip({ on: false });
    await awaitState(strip, request(1000));
    expect(strip.writes).toHaveLength(1);
    expect(strip.writes[0].data).toEqual(queryTriggerFrame());
    expect(strip.writes[0].requireAck).toBe(true);
  });

  test('observes a responder that answers from inside the write', async () => {
    const strip = new SimulatedLedStrip({ on: false, responseMode: 'sync' });
    const state = await awaitState(strip, request(1000));
    expect(state).toBe(LedState.OFF);
    expect(strip.activeSubscriptions).toBe(0);
  });

  test('times out to UNKNOWN after the configured delay', async () => {
    const strip = new SimulatedLedStrip({ responseMode: 'silent' });
    const started = Date.now();
    const state = await awaitState(strip, request(60));
    const elapsed = Date.now() - started;
    expect(state).toBe(LedState.UNKNOWN);
    expect(elapsed).toBeGreaterThanOrEqual(55);
    expect(elapsed).toBeLessThan(1000);
    expect(strip.activeSubscriptions).toBe(0);
    expect(strip.unsubscribeCalls).toBe(1);
  });

  test('end to end: AA 00 01 after the trigger reads ON', async () => {
    const strip = new SimulatedLedStrip({ responseMode: 'silent' });
    setTimeout(() => strip.notify(Buffer.from([0xaa, 0x00, 0x01])), 5);
    await expect(awaitState(strip, request(1000))).resolves.toBe(LedState.ON);
  });

  test('end to end: AA 00 00 after the trigger reads OFF', async () => {
    const strip = new SimulatedLedStrip({ responseMode: 'silent' });
    setTimeout(() => strip.notify(Buffer.from([0xaa, 0x00, 0x00])), 5);
    await expect(awaitState(strip, request(1000))).resolves.toBe(LedState.OFF);
  });

  test('unrecognized and unheaded frames keep the wait open', async () => {
    const strip = new SimulatedLedStrip({
      on: false,
      preamble: [Buffer.from([0x01, 0x02, 0x03]), Buffer.from([0xaa, 0x01]), Buffer.from([0xaa, 0x01, 0x07])]
    });
    const seen: Buffer[] = [];
    const state = await awaitState(strip, request(1000, { onNotification: (frame) => seen.push(frame) }));
    expect(state).toBe(LedState.OFF);
    expect(seen).toHaveLength(4);
  });

  test('first valid frame wins', async () => {
    const strip = new SimulatedLedStrip({ on: false, preamble: [encodeStatusNotification(true)] });
    await expect(awaitState(strip, request(1000))).resolves.toBe(LedState.ON);
  });

  test('a late notification after timeout does not touch the result', async () => {
    const strip = new SimulatedLedStrip({ responseMode: 'silent' });
    const subscribe = jest.spyOn(strip, 'subscribeNotify');
    const onNotification = jest.fn();

    const state = await awaitState(strip, request(20, { onNotification }));
    expect(state).toBe(LedState.UNKNOWN);

    // Nothing is subscribed any more, and the captured handler is inert
    expect(strip.notify(encodeStatusNotification(true))).toBe(false);
    const handler = subscribe.mock.calls[0][1];
    handler(encodeStatusNotification(true));
    expect(onNotification).not.toHaveBeenCalled();
  });

  test('a failed trigger write rejects instead of reporting UNKNOWN', async () => {
    const strip = new SimulatedLedStrip({ failWrites: true });
    await expect(awaitState(strip, request(1000))).rejects.toBeInstanceOf(WriteFailureError);
    expect(strip.activeSubscriptions).toBe(0);
    expect(strip.unsubscribeCalls).toBe(1);
  });

  test('foreign write errors are wrapped as WriteFailureError', async () => {
    const strip = new SimulatedLedStrip();
    jest.spyOn(strip, 'writeCharacteristic').mockRejectedValue(new Error('GATT busy'));
    const pending = awaitState(strip, request(1000));
    await expect(pending).rejects.toBeInstanceOf(WriteFailureError);
    await expect(pending).rejects.toThrow(
      `Characteristic write was not acknowledged: ${DEFAULT_WRITE_CHAR_UUID} (GATT busy)`
    );
    expect(strip.activeSubscriptions).toBe(0);
  });

  test('a failing unsubscribe keeps the outcome', async () => {
    const strip = new SimulatedLedStrip({ on: true, failUnsubscribe: true });
    await expect(awaitState(strip, request(1000))).resolves.toBe(LedState.ON);
    expect(strip.activeSubscriptions).toBe(0);
  });
});

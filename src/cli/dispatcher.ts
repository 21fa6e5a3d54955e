import { GattConnector, LedState, LedStripConfig } from '../types';
import { withLedStrip, openTransport, closeTransport } from '../device/LedStripSession';
import { formatServiceListing } from '../device/discovery';
import { ConnectionFailureError, WriteFailureError, describeCause } from '../utils/errors';

export const VERBS = ['on', 'off', 'check', 'toggle', 'scan'] as const;
export type Verb = typeof VERBS[number];

export const USAGE = [
  'Usage: ledstrip [options] <on|off|check|toggle|scan>',
  '  on     - Turn the LED strip ON',
  '  off    - Turn the LED strip OFF',
  '  check  - Query and print the current LED state',
  '  toggle - Toggle the LED state (ON->OFF or OFF->ON)',
  '  scan   - List all GATT services and characteristics with their properties'
].join('\n');

export interface Reporter {
  info(message: string): void;
  error(message: string): void;
}

export const consoleReporter: Reporter = {
  info: (message) => console.log(message),
  error: (message) => console.error(message)
};

export interface DispatchContext {
  connector: GattConnector;
  config: LedStripConfig;
  reporter?: Reporter;
}

export const ExitCode = {
  OK: 0,
  FAILURE: 1
} as const;

export function parseVerb(raw: string | undefined): Verb | null {
  if (raw === undefined) return null;
  const verb = raw.toLowerCase();
  return VERBS.find((v) => v === verb) ?? null;
}

/**
 * Run one verb against the configured strip and report the outcome.
 * Timeouts and an undeterminable toggle are informational (exit 0);
 * connection and write failures exit 1.
 */
export async function dispatch(verb: Verb, ctx: DispatchContext): Promise<number> {
  const { connector, config } = ctx;
  const reporter = ctx.reporter ?? consoleReporter;

  try {
    switch (verb) {
      case 'scan':
        await scan(connector, config, reporter);
        break;
      case 'check':
        await withLedStrip(connector, config, async (session) => {
          const state = await session.queryState();
          reporter.info(describeState(state, config.queryTimeoutMs));
        });
        break;
      case 'toggle':
        await withLedStrip(connector, config, async (session) => {
          const result = await session.toggleState();
          if (result.outcome === 'indeterminate') {
            reporter.info('⚠️ Could not determine LED state to toggle.');
            return;
          }
          reporter.info(`🔁 Toggled ${result.previous} -> ${result.current}`);
          reporter.info(`✅ Sent ${result.current} command.`);
        });
        break;
      case 'on':
      case 'off':
        await withLedStrip(connector, config, async (session) => {
          await session.setState(verb === 'on');
          reporter.info(`✅ Sent ${verb.toUpperCase()} command.`);
        });
        break;
    }
    return ExitCode.OK;
  } catch (err) {
    reporter.error(describeFailure(err));
    return ExitCode.FAILURE;
  }
}

async function scan(connector: GattConnector, config: LedStripConfig, reporter: Reporter): Promise<void> {
  reporter.info(`Connecting to ${config.address} using adapter ${config.adapter}...`);
  const transport = await openTransport(connector, config);
  try {
    const services = await transport.listServices();
    for (const line of formatServiceListing(services)) reporter.info(line);
  } finally {
    await closeTransport(transport);
  }
}

export function describeState(state: LedState, timeoutMs: number): string {
  switch (state) {
    case LedState.ON:
      return '🟢 LED state: ON';
    case LedState.OFF:
      return '⚫ LED state: OFF';
    case LedState.UNKNOWN:
      return `⏰ No notification received within ${timeoutMs} ms. LED state: UNKNOWN`;
  }
}

export function describeFailure(err: unknown): string {
  if (err instanceof ConnectionFailureError) return `❌ Failed to connect to the device: ${err.message}`;
  if (err instanceof WriteFailureError) return `❌ Write failed: ${err.message}`;
  return `❌ Error: ${describeCause(err)}`;
}

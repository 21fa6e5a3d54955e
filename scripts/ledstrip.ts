#!/usr/bin/env node
/**
 * Command-line control for a BLE LED strip
 *
 *   ledstrip check
 *   ledstrip --address CE:36:35:30:1D:52 --adapter hci0 toggle
 */

import { program } from 'commander';
import { resolveConfig } from '../src/config';
import { dispatch, parseVerb, USAGE, describeFailure } from '../src/cli/dispatcher';
import { NobleConnector } from '../src/transport/NobleTransport';
import { setDebugLevel, getDebugLevel } from '../src/utils/debug';
import { LedStripConfig } from '../src/types';

interface CliOptions {
  adapter?: string;
  address?: string;
  writeChar?: string;
  readChar?: string;
  timeout?: string;
  connectTimeout?: string;
  verbose?: boolean;
}

async function main(): Promise<number> {
  program
    .name('ledstrip')
    .description('Switch and query a BLE LED strip')
    .argument('[command]', 'on | off | check | toggle | scan')
    .option('--adapter <name>', 'HCI adapter (env LEDSTRIP_ADAPTER)')
    .option('--address <mac>', 'device MAC address (env LEDSTRIP_ADDRESS)')
    .option('--write-char <uuid>', 'write characteristic UUID (env LEDSTRIP_WRITE_CHAR)')
    .option('--read-char <uuid>', 'notify characteristic UUID (env LEDSTRIP_READ_CHAR)')
    .option('--timeout <ms>', 'state query timeout (env LEDSTRIP_QUERY_TIMEOUT)')
    .option('--connect-timeout <ms>', 'connect timeout (env LEDSTRIP_CONNECT_TIMEOUT)')
    .option('--verbose', 'log frames and connection steps', false)
    .addHelpText('after', `\n${USAGE}`)
    .allowExcessArguments(true)
    .parse();

  const verb = program.args.length === 1 ? parseVerb(program.args[0]) : null;
  if (!verb) {
    console.error(USAGE);
    return 1;
  }

  const opts = program.opts<CliOptions>();
  if (opts.verbose) setDebugLevel(Math.max(getDebugLevel(), 2));

  let config: LedStripConfig;
  try {
    config = resolveConfig({
      adapter: opts.adapter,
      address: opts.address,
      writeCharUuid: opts.writeChar,
      readCharUuid: opts.readChar,
      queryTimeoutMs: opts.timeout,
      connectTimeoutMs: opts.connectTimeout
    });
  } catch (err) {
    console.error(describeFailure(err));
    return 1;
  }

  return dispatch(verb, { connector: new NobleConnector(), config });
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error('❌ Unexpected error:', error);
    process.exit(1);
  }
);

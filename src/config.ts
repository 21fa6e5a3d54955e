import { LedStripConfig } from './types';
import { ConfigurationError } from './utils/errors';

/**
 * Default query timeout: the strip usually answers within a second, but can take several
 * while it is busy with an effect
 */
export const QUERY_TIMEOUT_MS = 8000;
export const CONNECT_TIMEOUT_MS = 20000;
// Largest delay setTimeout honours; anything above fires after 1 ms
export const MAX_TIMEOUT_MS = 2147483647;

// Characteristics exposed by the H617A family
export const DEFAULT_WRITE_CHAR_UUID = '00010203-0405-0607-0809-0a0b0c0d2b11'; // read, write-without-response, write, notify
export const DEFAULT_READ_CHAR_UUID = '00010203-0405-0607-0809-0a0b0c0d2b10'; // read, notify

export const DEFAULT_CONFIG: Readonly<LedStripConfig> = {
  adapter: 'hci1',
  address: 'CE:36:35:30:1D:52',
  writeCharUuid: DEFAULT_WRITE_CHAR_UUID,
  readCharUuid: DEFAULT_READ_CHAR_UUID,
  queryTimeoutMs: QUERY_TIMEOUT_MS,
  connectTimeoutMs: CONNECT_TIMEOUT_MS
};

/**
 * Environment variables consulted by resolveConfig()
 */
export const ENV_KEYS = {
  adapter: 'LEDSTRIP_ADAPTER',
  address: 'LEDSTRIP_ADDRESS',
  writeCharUuid: 'LEDSTRIP_WRITE_CHAR',
  readCharUuid: 'LEDSTRIP_READ_CHAR',
  queryTimeoutMs: 'LEDSTRIP_QUERY_TIMEOUT',
  connectTimeoutMs: 'LEDSTRIP_CONNECT_TIMEOUT'
} as const satisfies Record<keyof LedStripConfig, string>;

/**
 * Raw (string) configuration input, as it comes from CLI flags or the environment
 */
export type ConfigInput = Partial<Record<keyof LedStripConfig, string | number>>;

const ADAPTER_RE = /^hci\d+$/;
const ADDRESS_RE = /^[0-9a-f]{2}(:[0-9a-f]{2}){5}$/i;
const UUID128_RE = /^[0-9a-f]{8}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{12}$/i;
const UUID16_RE = /^(0x)?[0-9a-f]{4}$/i;

/**
 * Build the effective configuration.
 * Precedence: overrides > environment > DEFAULT_CONFIG
 * @throws ConfigurationError on the first invalid field
 */
export function resolveConfig(overrides: ConfigInput = {}, env: NodeJS.ProcessEnv = process.env): LedStripConfig {
  const pick = (key: keyof LedStripConfig): string => {
    const override = overrides[key];
    if (override !== undefined && override !== '') return String(override);
    const fromEnv = env[ENV_KEYS[key]];
    if (fromEnv !== undefined && fromEnv !== '') return fromEnv;
    return String(DEFAULT_CONFIG[key]);
  };

  const adapter = pick('adapter');
  if (!ADAPTER_RE.test(adapter)) throw new ConfigurationError('adapter', adapter);

  const address = pick('address');
  if (!ADDRESS_RE.test(address)) throw new ConfigurationError('address', address);

  const writeCharUuid = pick('writeCharUuid');
  if (!isUuid(writeCharUuid)) throw new ConfigurationError('writeCharUuid', writeCharUuid);

  const readCharUuid = pick('readCharUuid');
  if (!isUuid(readCharUuid)) throw new ConfigurationError('readCharUuid', readCharUuid);

  return {
    adapter,
    address: address.toUpperCase(),
    writeCharUuid: writeCharUuid.toLowerCase(),
    readCharUuid: readCharUuid.toLowerCase(),
    queryTimeoutMs: parseTimeout('queryTimeoutMs', pick('queryTimeoutMs')),
    connectTimeoutMs: parseTimeout('connectTimeoutMs', pick('connectTimeoutMs'))
  };
}

function isUuid(value: string): boolean {
  return UUID128_RE.test(value) || UUID16_RE.test(value);
}

function parseTimeout(field: string, raw: string): number {
  if (!/^\d+$/.test(raw)) throw new ConfigurationError(field, raw);
  const ms = Number.parseInt(raw, 10);
  if (ms <= 0 || ms > MAX_TIMEOUT_MS) throw new ConfigurationError(field, raw);
  return ms;
}

/**
 * "hci1" -> 1
 */
export function adapterIndex(adapter: string): number {
  if (!ADAPTER_RE.test(adapter)) throw new ConfigurationError('adapter', adapter);
  return Number.parseInt(adapter.slice(3), 10);
}

import { resolveConfig, adapterIndex, ConfigInput, DEFAULT_CONFIG, MAX_TIMEOUT_MS } from '../src/config';
import { ConfigurationError, ConnectionFailureError, WriteFailureError } from '../src/utils/errors';
import { TransportErrorKind } from '../src/types';

describe('resolveConfig', () => {
  test('falls back to the defaults', () => {
    expect(resolveConfig({}, {})).toEqual(DEFAULT_CONFIG);
  });

  test('reads the environment', () => {
    const config = resolveConfig({}, {
      LEDSTRIP_ADAPTER: 'hci0',
      LEDSTRIP_ADDRESS: 'aa:bb:cc:dd:ee:ff',
      LEDSTRIP_QUERY_TIMEOUT: '3000'
    });
    expect(config.adapter).toBe('hci0');
    expect(config.address).toBe('AA:BB:CC:DD:EE:FF');
    expect(config.queryTimeoutMs).toBe(3000);
    expect(config.connectTimeoutMs).toBe(20000);
  });

  test('overrides beat the environment and empty values are skipped', () => {
    const config = resolveConfig(
      { adapter: 'hci2', address: '' },
      { LEDSTRIP_ADAPTER: 'hci0', LEDSTRIP_ADDRESS: '11:22:33:44:55:66' }
    );
    expect(config.adapter).toBe('hci2');
    expect(config.address).toBe('11:22:33:44:55:66');
  });

  test('accepts short and undashed characteristic UUIDs', () => {
    const config = resolveConfig({ writeCharUuid: 'FFE1', readCharUuid: '0x2A19' }, {});
    expect(config.writeCharUuid).toBe('ffe1');
    expect(config.readCharUuid).toBe('0x2a19');
    expect(resolveConfig({ readCharUuid: '000102030405060708090A0B0C0D2B10' }, {}).readCharUuid).toBe(
      '000102030405060708090a0b0c0d2b10'
    );
  });

  const invalid: Array<[ConfigInput, string]> = [
    [{ adapter: 'usb0' }, 'Invalid adapter: "usb0"'],
    [{ address: 'CE:36:35:30:1D' }, 'Invalid address: "CE:36:35:30:1D"'],
    [{ writeCharUuid: 'not-a-uuid' }, 'Invalid writeCharUuid: "not-a-uuid"'],
    [{ queryTimeoutMs: '0' }, 'Invalid queryTimeoutMs: "0"'],
    [{ connectTimeoutMs: '5s' }, 'Invalid connectTimeoutMs: "5s"'],
    [{ queryTimeoutMs: -1 }, 'Invalid queryTimeoutMs: "-1"'],
    [{ queryTimeoutMs: '3000000000' }, 'Invalid queryTimeoutMs: "3000000000"'],
    [{ connectTimeoutMs: 2147483648 }, 'Invalid connectTimeoutMs: "2147483648"']
  ];

  test.each(invalid)('rejects %o', (input, message) => {
    expect(() => resolveConfig(input, {})).toThrow(ConfigurationError);
    expect(() => resolveConfig(input, {})).toThrow(message);
  });

  test('accepts the largest timer delay', () => {
    expect(resolveConfig({ queryTimeoutMs: '2147483647' }, {}).queryTimeoutMs).toBe(MAX_TIMEOUT_MS);
  });

  test('rejects an out-of-range timeout from the environment', () => {
    expect(() => resolveConfig({}, { LEDSTRIP_QUERY_TIMEOUT: '3000000000' })).toThrow(
      'Invalid queryTimeoutMs: "3000000000"'
    );
  });

  test('rejects invalid environment values too', () => {
    expect(() => resolveConfig({}, { LEDSTRIP_CONNECT_TIMEOUT: 'soon' })).toThrow(
      'Invalid connectTimeoutMs: "soon"'
    );
  });
});

describe('adapterIndex', () => {
  test('extracts the HCI index', () => {
    expect(adapterIndex('hci0')).toBe(0);
    expect(adapterIndex('hci1')).toBe(1);
    expect(adapterIndex('hci12')).toBe(12);
    expect(() => adapterIndex('bt0')).toThrow(ConfigurationError);
  });
});

describe('errors', () => {
  test('transport errors serialize their kind and context', () => {
    const err = new ConnectionFailureError(TransportErrorKind.DEVICE_NOT_FOUND, 'CE:36:35:30:1D:52', {
      adapter: 'hci1'
    });
    expect(err.name).toBe('ConnectionFailureError');
    expect(err.toJSON()).toEqual({
      name: 'ConnectionFailureError',
      message: 'Device not found: CE:36:35:30:1D:52',
      kind: 'device_not_found',
      context: { adapter: 'hci1' }
    });
  });

  test('write failures carry the characteristic', () => {
    const err = new WriteFailureError('2b11');
    expect(err.message).toBe('Characteristic write was not acknowledged: 2b11');
    expect(err.kind).toBe(TransportErrorKind.WRITE_NOT_ACKNOWLEDGED);
    expect(err.toJSON().context).toEqual({ characteristic: '2b11' });
  });
});

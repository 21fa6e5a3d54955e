import type { Characteristic, Peripheral } from '@abandonware/noble';
import {
  ConnectOptions,
  GattConnector,
  GattServiceInfo,
  GattTransport,
  NotificationHandler,
  TransportErrorKind
} from '../types';
import { adapterIndex } from '../config';
import { ConnectionFailureError, TransportError, WriteFailureError, describeCause } from '../utils/errors';
import { normalizeUuid } from '../utils/codec';
import { dbg, dbgV } from '../utils/debug';

type Noble = typeof import('@abandonware/noble');

let nobleInstance: Noble | undefined;

/**
 * noble picks its HCI adapter from NOBLE_HCI_DEVICE_ID when it is first loaded,
 * so the adapter has to be chosen before the require
 */
function loadNoble(adapter: string): Noble {
  const index = String(adapterIndex(adapter));
  if (!nobleInstance) {
    process.env.NOBLE_HCI_DEVICE_ID = index;
    dbg(`Loading noble on adapter ${adapter}`);
    // The export is a Noble instance; import() interop would copy only its own
    // properties and lose the prototype methods
    const noble: Noble = require('@abandonware/noble');
    nobleInstance = noble;
  } else if (process.env.NOBLE_HCI_DEVICE_ID !== index) {
    dbg(`noble already bound to hci${process.env.NOBLE_HCI_DEVICE_ID}, ignoring adapter ${adapter}`);
  }
  return nobleInstance;
}

function waitPoweredOn(noble: Noble, timeoutMs: number): Promise<void> {
  if (noble._state === 'poweredOn') return Promise.resolve();
  return new Promise<void>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;
    const onState = (state: string) => {
      if (state !== 'poweredOn') {
        dbg(`Adapter state: ${state}`);
        return;
      }
      clearTimeout(timer);
      noble.removeListener('stateChange', onState);
      resolve();
    };
    noble.on('stateChange', onState);
    timer = setTimeout(() => {
      noble.removeListener('stateChange', onState);
      reject(new ConnectionFailureError(TransportErrorKind.CONNECT_FAILED, `adapter not powered on (state=${noble._state})`));
    }, timeoutMs);
  });
}

function findPeripheral(noble: Noble, address: string, timeoutMs: number): Promise<Peripheral> {
  const wanted = address.toLowerCase();
  return new Promise<Peripheral>((resolve, reject) => {
    let done = false;
    let timer: NodeJS.Timeout | undefined;
    const finish = (err: Error | null, peripheral?: Peripheral) => {
      if (done) return;
      done = true;
      clearTimeout(timer);
      noble.removeListener('discover', onDiscover);
      noble.stopScanningAsync().then(
        () => (peripheral ? resolve(peripheral) : reject(err)),
        (stopErr: unknown) => reject(err ?? new ConnectionFailureError(TransportErrorKind.CONNECT_FAILED, describeCause(stopErr)))
      );
    };
    const onDiscover = (peripheral: Peripheral) => {
      dbgV(`Discovered ${peripheral.address} (${peripheral.advertisement?.localName ?? 'no name'})`);
      if (peripheral.address.toLowerCase() === wanted) finish(null, peripheral);
    };
    noble.on('discover', onDiscover);
    noble.startScanningAsync([], false).catch((err: unknown) => {
      finish(new ConnectionFailureError(TransportErrorKind.CONNECT_FAILED, `scan failed: ${describeCause(err)}`));
    });
    // Armed last, and only while still searching
    if (!done) {
      timer = setTimeout(() => {
        finish(new ConnectionFailureError(TransportErrorKind.DEVICE_NOT_FOUND, `${address} not seen within ${timeoutMs}ms`));
      }, timeoutMs);
    }
  });
}

/**
 * Connects through BlueZ's HCI socket with noble
 */
export class NobleConnector implements GattConnector {
  async connect(options: ConnectOptions): Promise<GattTransport> {
    const deadline = Date.now() + options.timeoutMs;
    const remaining = () => Math.max(0, deadline - Date.now());

    const noble = loadNoble(options.adapter);
    await waitPoweredOn(noble, remaining());

    dbg(`Scanning for ${options.address}...`);
    const peripheral = await findPeripheral(noble, options.address, remaining());

    try {
      await peripheral.connectAsync();
      const { characteristics } = await peripheral.discoverAllServicesAndCharacteristicsAsync();
      dbg(`Connected to ${peripheral.address}, ${characteristics.length} characteristics`);
      return new NobleTransport(peripheral, characteristics);
    } catch (err) {
      throw new ConnectionFailureError(TransportErrorKind.CONNECT_FAILED, describeCause(err), { address: options.address });
    }
  }
}

/**
 * GattTransport over a connected noble peripheral
 */
export class NobleTransport implements GattTransport {
  private characteristics = new Map<string, Characteristic>();
  private listeners = new Map<string, (data: Buffer, isNotification: boolean) => void>();

  constructor(private peripheral: Peripheral, characteristics: Characteristic[]) {
    for (const char of characteristics) this.characteristics.set(normalizeUuid(char.uuid), char);
    peripheral.once('disconnect', () => dbg(`Peripheral ${peripheral.address} disconnected`));
  }

  get address(): string { return this.peripheral.address.toUpperCase(); }

  get isConnected(): boolean { return this.peripheral.state === 'connected'; }

  async writeCharacteristic(uuid: string, data: Buffer, requireAck: boolean): Promise<void> {
    const char = this.characteristics.get(normalizeUuid(uuid));
    if (!char) throw new WriteFailureError(uuid, undefined, TransportErrorKind.CHARACTERISTIC_MISSING);
    try {
      // noble's flag is the inverse: withoutResponse
      await char.writeAsync(data, !requireAck);
    } catch (err) {
      throw new WriteFailureError(uuid, err);
    }
  }

  async subscribeNotify(uuid: string, handler: NotificationHandler): Promise<void> {
    const char = this.requireCharacteristic(uuid);
    const key = normalizeUuid(uuid);
    const previous = this.listeners.get(key);
    if (previous) char.removeListener('data', previous);

    const listener = (data: Buffer, isNotification: boolean) => {
      if (isNotification) handler(data);
    };
    this.listeners.set(key, listener);
    char.on('data', listener);
    try {
      await char.subscribeAsync();
    } catch (err) {
      char.removeListener('data', listener);
      this.listeners.delete(key);
      throw new ConnectionFailureError(TransportErrorKind.LINK_LOST, `subscribe to ${uuid} failed: ${describeCause(err)}`);
    }
  }

  async unsubscribeNotify(uuid: string): Promise<void> {
    const char = this.requireCharacteristic(uuid);
    const key = normalizeUuid(uuid);
    const listener = this.listeners.get(key);
    if (listener) {
      char.removeListener('data', listener);
      this.listeners.delete(key);
    }
    if (this.isConnected) await char.unsubscribeAsync();
  }

  async listServices(): Promise<GattServiceInfo[]> {
    const services = this.peripheral.services ?? [];
    return services.map((service) => ({
      uuid: service.uuid,
      description: service.name ?? '',
      characteristics: (service.characteristics ?? []).map((char) => ({
        uuid: char.uuid,
        description: char.name ?? '',
        properties: [...char.properties]
      }))
    }));
  }

  async disconnect(): Promise<void> {
    for (const [key, listener] of this.listeners) {
      this.characteristics.get(key)?.removeListener('data', listener);
    }
    this.listeners.clear();
    if (this.peripheral.state === 'disconnected') return;
    await this.peripheral.disconnectAsync();
  }

  private requireCharacteristic(uuid: string): Characteristic {
    const char = this.characteristics.get(normalizeUuid(uuid));
    if (!char) throw new TransportError(TransportErrorKind.CHARACTERISTIC_MISSING, uuid);
    return char;
  }
}

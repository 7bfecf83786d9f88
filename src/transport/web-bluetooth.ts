/**
 * Web Bluetooth implementation of the session transport.
 *
 * Works against any object exposing the Web Bluetooth `getDevices()` call:
 * `navigator.bluetooth` in a browser, or a Node binding that implements the
 * same object model.
 */

import { resolveTransportOptions, type TransportOptionsInput } from '../config';
import { BLEConnectionError, SubscriptionError, toError } from '../exceptions';
import { defaultLogger, type Logger } from '../logger';
import type { BLETransport, NotificationCallback } from './transport';

/**
 * The parts of a Web Bluetooth characteristic used here.
 */
export interface NotifyingCharacteristic extends EventTarget {
  readonly value?: DataView | null;
  startNotifications(): Promise<unknown>;
  stopNotifications(): Promise<unknown>;
}

export interface GattService {
  getCharacteristic(uuid: string): Promise<NotifyingCharacteristic>;
}

export interface GattServer {
  readonly connected: boolean;
  getPrimaryService(uuid: string): Promise<GattService>;
  disconnect(): void;
}

export interface BluetoothDeviceLike {
  readonly id: string;
  readonly name?: string;
  readonly gatt?: { connect(): Promise<GattServer> };
}

/**
 * Source of devices the host already has permission to use.
 */
export interface BluetoothDeviceProvider {
  getDevices(): Promise<BluetoothDeviceLike[]>;
}

export type WebBluetoothTransportOptions = TransportOptionsInput & {
  logger?: Logger;
};

interface ActiveSubscription {
  characteristic: NotifyingCharacteristic;
  listener: () => void;
}

/**
 * Open link to one device.
 */
export interface WebBluetoothHandle {
  device: BluetoothDeviceLike;
  server: GattServer;
  subscriptions: Map<string, ActiveSubscription>;
}

export class WebBluetoothTransport implements BLETransport<WebBluetoothHandle> {
  private readonly serviceUuid: string;
  private readonly connectAttempts: number;
  private readonly logger: Logger;

  /**
   * @throws {ConfigError} If the options are invalid
   */
  constructor(
    private readonly provider: BluetoothDeviceProvider,
    options: WebBluetoothTransportOptions = {}
  ) {
    const { logger, ...transportOptions } = options;
    const resolved = resolveTransportOptions(transportOptions);
    this.serviceUuid = resolved.serviceUuid;
    this.connectAttempts = resolved.connectAttempts;
    this.logger = logger ?? defaultLogger;
  }

  /**
   * Connect to a previously permitted device by id.
   *
   * @throws {BLEConnectionError} If the device is unknown or every attempt fails
   */
  async connect(address: string): Promise<WebBluetoothHandle> {
    let devices: BluetoothDeviceLike[];
    try {
      devices = await this.provider.getDevices();
    } catch (error) {
      throw new BLEConnectionError(
        `Failed to list Bluetooth devices: ${toError(error).message}`,
        { cause: error }
      );
    }

    const device = devices.find((candidate) => candidate.id === address);
    if (!device) {
      throw new BLEConnectionError(`Device ${address} not found`);
    }
    const gatt = device.gatt;
    if (!gatt) {
      throw new BLEConnectionError('Device does not support GATT');
    }

    let lastError: Error = new Error('No connection attempt made');
    for (let attempt = 1; attempt <= this.connectAttempts; attempt++) {
      try {
        const server = await gatt.connect();
        this.logger.debug(`Connected to ${device.name ?? address} (attempt ${attempt})`);
        return { device, server, subscriptions: new Map() };
      } catch (error) {
        lastError = toError(error);
        this.logger.debug(
          `Connect attempt ${attempt}/${this.connectAttempts} to ${address} failed: ${lastError.message}`
        );
      }
    }

    throw new BLEConnectionError(
      `Failed to connect to ${address} after ${this.connectAttempts} attempts: ${lastError.message}`,
      { cause: lastError }
    );
  }

  /**
   * Start notifications on a characteristic of the measurement service.
   *
   * @throws {SubscriptionError} If the characteristic is missing or refuses notifications
   */
  async subscribe(
    handle: WebBluetoothHandle,
    characteristicUuid: string,
    callback: NotificationCallback
  ): Promise<void> {
    try {
      const service = await handle.server.getPrimaryService(this.serviceUuid);
      const characteristic = await service.getCharacteristic(characteristicUuid);

      const listener = (): void => {
        const value = characteristic.value;
        if (!value) {
          return;
        }
        callback(new Uint8Array(value.buffer, value.byteOffset, value.byteLength));
      };

      characteristic.addEventListener('characteristicvaluechanged', listener);
      handle.subscriptions.set(characteristicUuid, { characteristic, listener });
      await characteristic.startNotifications();
    } catch (error) {
      throw new SubscriptionError(
        `Failed to start notifications on ${characteristicUuid}: ${toError(error).message}`,
        { cause: error }
      );
    }
  }

  /**
   * Stop notifications and remove the listener added by `subscribe`.
   */
  async unsubscribe(handle: WebBluetoothHandle, characteristicUuid: string): Promise<void> {
    const subscription = handle.subscriptions.get(characteristicUuid);
    if (!subscription) {
      return;
    }

    handle.subscriptions.delete(characteristicUuid);
    subscription.characteristic.removeEventListener(
      'characteristicvaluechanged',
      subscription.listener
    );
    await subscription.characteristic.stopNotifications();
  }

  async disconnect(handle: WebBluetoothHandle): Promise<void> {
    handle.subscriptions.clear();
    if (handle.server.connected) {
      handle.server.disconnect();
    }
  }
}

/**
 * Passive advertisement handling for blood-pressure cuffs.
 */

import { defaultLogger, type Logger } from './logger';
import {
  shortAddress,
  type AdvertisementContext,
  type DeviceIdentity,
} from './models/advertisement';
import { DEVICE_MODEL, MANUFACTURER, UPDATE_INTERVAL_MS } from './protocol/constants';

export interface PassiveListenerOptions {
  /** Minimum time between polls in milliseconds (default: 60000) */
  updateIntervalMs?: number;

  /** Clock returning epoch milliseconds (default: Date.now) */
  now?: () => number;

  logger?: Logger;
}

/**
 * Tracks device identity from advertisements and decides when to poll.
 *
 * Never opens a connection itself.
 */
export class PassiveListener {
  private readonly updateIntervalMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  private _identity: DeviceIdentity | null = null;
  private _lastAdvertisement: AdvertisementContext | null = null;

  constructor(options: PassiveListenerOptions = {}) {
    this.updateIntervalMs = options.updateIntervalMs ?? UPDATE_INTERVAL_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? defaultLogger;
  }

  get identity(): DeviceIdentity | null {
    return this._identity;
  }

  get lastAdvertisement(): AdvertisementContext | null {
    return this._lastAdvertisement;
  }

  /**
   * Update device identity from an advertisement.
   */
  onAdvertisement(context: AdvertisementContext): DeviceIdentity {
    this.logger.debug(
      `Advertisement from ${context.address} (${context.name}, ${context.rssi} dBm)`
    );

    const name = `${context.name} ${shortAddress(context.address)}`;
    this._identity = {
      address: context.address,
      manufacturer: MANUFACTURER,
      model: DEVICE_MODEL,
      name,
      title: name,
    };
    this._lastAdvertisement = context;

    return this._identity;
  }

  /**
   * Whether an active poll is due.
   *
   * @param lastPollTimestamp - Epoch milliseconds of the last poll, if any
   */
  isPollDue(lastPollTimestamp?: number | null): boolean {
    if (lastPollTimestamp === undefined || lastPollTimestamp === null) {
      return true;
    }
    return this.now() - lastPollTimestamp > this.updateIntervalMs;
  }
}

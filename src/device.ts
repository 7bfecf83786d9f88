/**
 * Blood-pressure cuff device: advertisements in, measurements out.
 */

import { resolveOptions, type BloodPressureOptionsInput } from './config';
import { BloodPressureError } from './exceptions';
import { PassiveListener } from './listener';
import { defaultLogger, type Logger } from './logger';
import type { AdvertisementContext, DeviceIdentity } from './models/advertisement';
import type { SessionState } from './models/enums';
import type { AcquisitionOutcome } from './models/sensor';
import { AcquisitionSession } from './session';
import type { BLETransport } from './transport/transport';

export type BloodPressureDeviceOptions = BloodPressureOptionsInput & {
  logger?: Logger;

  /** Clock returning epoch milliseconds (default: Date.now) */
  now?: () => number;

  /** Forwarded to every session this device starts */
  onStateChange?: (state: SessionState) => void;
};

/**
 * One blood-pressure cuff.
 *
 * Feeds advertisements to a {@link PassiveListener} and runs at most one
 * {@link AcquisitionSession} at a time.
 *
 * @example
 * ```typescript
 * const cuff = new BloodPressureDevice(new WebBluetoothTransport(navigator.bluetooth));
 *
 * scanner.on('advertisement', async (adv) => {
 *   cuff.update(adv);
 *   if (cuff.pollNeeded(lastPoll)) {
 *     const outcome = await cuff.poll();
 *     lastPoll = cuff.lastPollAt;
 *     publish(outcome);
 *   }
 * });
 * ```
 */
export class BloodPressureDevice<H = unknown> {
  readonly listener: PassiveListener;

  private readonly timeoutMs: number;
  private readonly characteristicUuid: string;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly onStateChange?: (state: SessionState) => void;

  private inFlight: Promise<AcquisitionOutcome> | null = null;
  private _lastOutcome: AcquisitionOutcome | null = null;
  private _lastPollAt: number | null = null;

  /**
   * @throws {ConfigError} If the options are invalid
   */
  constructor(
    private readonly transport: BLETransport<H>,
    options: BloodPressureDeviceOptions = {}
  ) {
    const { logger, now, onStateChange, ...sessionOptions } = options;
    const resolved = resolveOptions(sessionOptions);

    this.timeoutMs = resolved.timeoutMs;
    this.characteristicUuid = resolved.characteristicUuid;
    this.logger = logger ?? defaultLogger;
    this.now = now ?? Date.now;
    this.onStateChange = onStateChange;
    this.listener = new PassiveListener({
      updateIntervalMs: resolved.updateIntervalMs,
      now: this.now,
      logger: this.logger,
    });
  }

  get identity(): DeviceIdentity | null {
    return this.listener.identity;
  }

  get isPolling(): boolean {
    return this.inFlight !== null;
  }

  get lastOutcome(): AcquisitionOutcome | null {
    return this._lastOutcome;
  }

  /**
   * Epoch milliseconds at which the last poll finished.
   */
  get lastPollAt(): number | null {
    return this._lastPollAt;
  }

  /**
   * Update identity from an advertisement. Never connects.
   */
  update(advertisement: AdvertisementContext): DeviceIdentity {
    return this.listener.onAdvertisement(advertisement);
  }

  /**
   * Whether a poll should be started now.
   *
   * Always false while a session is running.
   */
  pollNeeded(lastPollTimestamp?: number | null): boolean {
    if (this.inFlight) {
      return false;
    }
    return this.listener.isPollDue(lastPollTimestamp);
  }

  /**
   * Take one measurement from the last advertised address.
   *
   * Calls made while a session is running share its outcome.
   *
   * @throws {BloodPressureError} If no advertisement has been seen yet
   */
  async poll(): Promise<AcquisitionOutcome> {
    if (this.inFlight) {
      this.logger.debug('Poll already in progress, joining running session');
      return this.inFlight;
    }

    const advertisement = this.listener.lastAdvertisement;
    const identity = this.listener.identity;
    if (!advertisement || !identity) {
      throw new BloodPressureError('Cannot poll before an advertisement has been received');
    }

    const session = new AcquisitionSession(this.transport, {
      address: advertisement.address,
      device: identity,
      rssi: advertisement.rssi,
      timeoutMs: this.timeoutMs,
      characteristicUuid: this.characteristicUuid,
      logger: this.logger,
      onStateChange: this.onStateChange,
    });

    const running = this.runSession(session);
    this.inFlight = running;
    return running;
  }

  private async runSession(session: AcquisitionSession<H>): Promise<AcquisitionOutcome> {
    try {
      const outcome = await session.run();
      this._lastOutcome = outcome;
      return outcome;
    } finally {
      this._lastPollAt = this.now();
      this.inFlight = null;
    }
  }
}

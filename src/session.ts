/**
 * Single acquisition of a blood-pressure measurement over BLE.
 */

import { resolveOptions } from './config';
import {
  BLEConnectionError,
  NotificationTimeoutError,
  SessionStateError,
  SubscriptionError,
  TeardownError,
  toError,
} from './exceptions';
import { defaultLogger, type Logger } from './logger';
import type { DeviceIdentity } from './models/advertisement';
import { AcquisitionStatus, SessionState } from './models/enums';
import type { AcquisitionOutcome } from './models/sensor';
import { decodeMeasurement } from './protocol/measurement';
import { MeasurementSink } from './sensor/measurement-sink';
import { CompletionSignal } from './transport/completion-signal';
import type { BLETransport } from './transport/transport';

export interface AcquisitionSessionOptions {
  /** Address passed to `transport.connect` */
  address: string;

  /** Identity reported with the outcome */
  device: DeviceIdentity;

  /** Signal strength of the advertisement that triggered the poll (dBm) */
  rssi?: number;

  /** Maximum wait for the measurement notification (default: 15000) */
  timeoutMs?: number;

  characteristicUuid?: string;

  logger?: Logger;

  onStateChange?: (state: SessionState) => void;
}

/**
 * One connect → subscribe → wait → unsubscribe → disconnect cycle.
 *
 * Only a failed connect ends the session early. Subscription, decode and
 * teardown failures are logged and reflected in the outcome status; once a
 * connection exists, unsubscribe and disconnect are each attempted exactly
 * once, whatever happened before.
 *
 * @example
 * ```typescript
 * const session = new AcquisitionSession(transport, {
 *   address: 'AA:BB:CC:DD:EE:FF',
 *   device: listener.identity,
 * });
 * const outcome = await session.run();
 * if (outcome.status === AcquisitionStatus.MEASURED) {
 *   report(outcome.readings);
 * }
 * ```
 */
export class AcquisitionSession<H = unknown> {
  readonly sink = new MeasurementSink();

  private readonly address: string;
  private readonly device: DeviceIdentity;
  private readonly timeoutMs: number;
  private readonly characteristicUuid: string;
  private readonly logger: Logger;
  private readonly onStateChange?: (state: SessionState) => void;

  private readonly signal = new CompletionSignal();
  private _state = SessionState.IDLE;
  private _outcome: AcquisitionOutcome | null = null;
  private notificationReceived = false;
  private decodeError: Error | null = null;
  private waitError: Error | null = null;

  /**
   * @throws {ConfigError} If timeoutMs or characteristicUuid are invalid
   */
  constructor(
    private readonly transport: BLETransport<H>,
    options: AcquisitionSessionOptions
  ) {
    const resolved = resolveOptions({
      timeoutMs: options.timeoutMs,
      characteristicUuid: options.characteristicUuid,
    });

    this.address = options.address;
    this.device = options.device;
    this.timeoutMs = resolved.timeoutMs;
    this.characteristicUuid = resolved.characteristicUuid;
    this.logger = options.logger ?? defaultLogger;
    this.onStateChange = options.onStateChange;

    if (options.rssi !== undefined) {
      this.sink.recordSignalStrength(options.rssi);
    }
  }

  get state(): SessionState {
    return this._state;
  }

  /**
   * Outcome of the session, once closed.
   */
  get outcome(): AcquisitionOutcome | null {
    return this._outcome;
  }

  /**
   * Run the session to completion.
   *
   * Never rejects because of the device or transport; failures show up in
   * the outcome status.
   *
   * @throws {SessionStateError} If the session was already started
   */
  async run(): Promise<AcquisitionOutcome> {
    if (this._state !== SessionState.IDLE) {
      throw new SessionStateError(`Session already started (state: ${this._state})`);
    }

    this.transition(SessionState.CONNECTING);
    this.logger.debug(`Connecting to BLE device: ${this.address}`);

    let handle: H;
    try {
      handle = await this.transport.connect(this.address);
    } catch (error) {
      const connectionError =
        error instanceof BLEConnectionError
          ? error
          : new BLEConnectionError(
              `Failed to connect to ${this.address}: ${toError(error).message}`,
              { cause: error }
            );
      this.logger.error(connectionError.message);
      this.transition(SessionState.FINALIZING);
      return this.close(AcquisitionStatus.CONNECTION_FAILED, connectionError);
    }

    try {
      await this.subscribe(handle);
      this.transition(SessionState.AWAITING_NOTIFICATION);
      await this.awaitNotification();
    } finally {
      this.transition(SessionState.FINALIZING);
      await this.teardown(handle);
    }

    if (!this.notificationReceived) {
      return this.close(AcquisitionStatus.TIMED_OUT, this.waitError ?? undefined);
    }
    if (this.decodeError) {
      return this.close(AcquisitionStatus.NO_MEASUREMENT, this.decodeError);
    }
    return this.close(AcquisitionStatus.MEASURED);
  }

  /**
   * Notification callback: decode, record, signal.
   *
   * Only the first call is consumed. Errors are logged, and the completion
   * signal fires regardless so the waiting session never hangs.
   */
  handleNotification(data: Uint8Array): void {
    if (this.notificationReceived) {
      this.logger.debug(`Ignoring extra notification from ${this.address}`);
      return;
    }
    this.notificationReceived = true;

    try {
      this.logger.debug(`Raw data received from ${this.address}: ${toHex(data)}`);

      const measurement = decodeMeasurement(data);
      this.sink.recordMeasurement(measurement);

      if (!measurement.measuredAt.ok) {
        this.logger.error(
          `Failed to parse measured date: ${measurement.measuredAt.error.message}`
        );
      }

      this.logger.log(
        `Parsed measurement (systolic: ${measurement.systolic}, ` +
          `diastolic: ${measurement.diastolic}, pulse: ${measurement.pulse})`
      );
    } catch (error) {
      this.decodeError = toError(error);
      this.logger.error(
        `Unexpected error while handling BLE notification: ${this.decodeError.message}`
      );
    } finally {
      this.signal.set();
    }
  }

  private async subscribe(handle: H): Promise<void> {
    try {
      await this.transport.subscribe(handle, this.characteristicUuid, (data) =>
        this.handleNotification(data)
      );
      this.transition(SessionState.SUBSCRIBED);
    } catch (error) {
      // The wait still runs; without a subscription it can only time out.
      const subscriptionError =
        error instanceof SubscriptionError
          ? error
          : new SubscriptionError(
              `Failed to start notify on ${this.address}: ${toError(error).message}`,
              { cause: error }
            );
      this.logger.error(subscriptionError.message);
    }
  }

  private async awaitNotification(): Promise<void> {
    try {
      await this.signal.wait(this.timeoutMs);
    } catch (error) {
      this.waitError = toError(error);
      if (error instanceof NotificationTimeoutError) {
        this.logger.warn(
          `Timeout while waiting for measurement from ${this.address}: ${error.message}`
        );
      } else {
        this.logger.error(
          `Unexpected error while waiting for BLE response: ${this.waitError.message}`
        );
      }
    }
  }

  private async teardown(handle: H): Promise<void> {
    try {
      await this.transport.unsubscribe(handle, this.characteristicUuid);
    } catch (error) {
      this.logTeardownError('stop notifications on', error);
    }

    try {
      await this.transport.disconnect(handle);
    } catch (error) {
      this.logTeardownError('disconnect from', error);
    }

    this.logger.debug(`Disconnected from ${this.address}`);
  }

  private logTeardownError(step: string, error: unknown): void {
    const teardownError = new TeardownError(
      `Failed to ${step} ${this.address}: ${toError(error).message}`,
      { cause: error }
    );
    this.logger.error(teardownError.message);
  }

  private close(status: AcquisitionStatus, error?: Error): AcquisitionOutcome {
    this.transition(SessionState.CLOSED);

    const outcome: AcquisitionOutcome = {
      status,
      device: { ...this.device },
      readings: this.sink.snapshot(),
    };
    if (error) {
      outcome.error = error;
    }

    this._outcome = outcome;
    return outcome;
  }

  private transition(state: SessionState): void {
    this._state = state;
    try {
      this.onStateChange?.(state);
    } catch (error) {
      this.logger.error(`State observer failed on ${state}: ${toError(error).message}`);
    }
  }
}

function toHex(data: Uint8Array): string {
  return Array.from(data, (byte) => byte.toString(16).padStart(2, '0')).join(' ');
}

/**
 * Decoded blood-pressure measurement structures.
 */

import type { InvalidTimestampError } from '../exceptions';

/**
 * Measurement time read in the host's local timezone.
 */
export interface LocalTimestamp {
  date: Date;

  /** Offset from UTC in effect for `date`, in minutes (east positive) */
  utcOffsetMinutes: number;

  /** ISO 8601 rendering carrying the local offset */
  iso: string;
}

export type TimestampResult =
  | { ok: true; value: LocalTimestamp }
  | { ok: false; error: InvalidTimestampError };

/**
 * One measurement notification, decoded.
 *
 * Layout (17 bytes, 16-bit fields little-endian):
 *
 * - [0]: Flags (ignored)
 * - [1-2]: Systolic pressure (mmHg)
 * - [3-4]: Diastolic pressure (mmHg)
 * - [5-6]: Mean arterial pressure (mmHg)
 * - [7-8]: Year
 * - [9]: Month, [10]: Day, [11]: Hour, [12]: Minute
 * - [13]: Seconds (ignored)
 * - [14-15]: Pulse rate (bpm)
 * - [16]: User slot
 */
export interface MeasurementRecord {
  readonly systolic: number;
  readonly diastolic: number;

  /** Decoded but never reported as a sensor */
  readonly arterial: number;

  readonly pulse: number;
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;

  /** Decoded but never reported as a sensor */
  readonly userSlot: number;

  readonly measuredAt: TimestampResult;
}

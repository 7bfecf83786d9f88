/**
 * Blood-pressure measurement notification decoding.
 */

import { formatISO, isValid, parse } from 'date-fns';
import { InvalidTimestampError, MalformedPayloadError } from '../exceptions';
import type { MeasurementRecord, TimestampResult } from '../models/measurement';
import { MIN_PAYLOAD_LENGTH, PayloadOffset } from './constants';

const TIMESTAMP_FORMAT = 'yyyy/M/d H:mm';

// `yyyy` also takes one to three digits
const MIN_YEAR = 1000;

/**
 * Decode a measurement notification.
 *
 * A timestamp that is not a real calendar instant does not fail the decode;
 * it is reported through `measuredAt` instead.
 *
 * @param data - Raw notification bytes (at least 17)
 * @throws {MalformedPayloadError} If data is too short
 */
export function decodeMeasurement(data: Uint8Array): MeasurementRecord {
  if (data.length < MIN_PAYLOAD_LENGTH) {
    throw new MalformedPayloadError(
      `Measurement payload too short: ${data.length} bytes (need ${MIN_PAYLOAD_LENGTH})`
    );
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);

  const year = view.getUint16(PayloadOffset.YEAR, true);
  const month = data[PayloadOffset.MONTH];
  const day = data[PayloadOffset.DAY];
  const hour = data[PayloadOffset.HOUR];
  const minute = data[PayloadOffset.MINUTE];

  return Object.freeze({
    systolic: view.getUint16(PayloadOffset.SYSTOLIC, true),
    diastolic: view.getUint16(PayloadOffset.DIASTOLIC, true),
    arterial: view.getUint16(PayloadOffset.ARTERIAL, true),
    pulse: view.getUint16(PayloadOffset.PULSE, true),
    year,
    month,
    day,
    hour,
    minute,
    userSlot: data[PayloadOffset.USER_SLOT],
    measuredAt: decodeTimestamp(year, month, day, hour, minute),
  });
}

/**
 * Build the local-time instant for the device's date fields.
 *
 * Parsing is strict: month 0, day 32, hour 24 or minute 60 are rejected,
 * and so is any year without four digits (including 0, "unknown").
 */
export function decodeTimestamp(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number
): TimestampResult {
  const text = `${year}/${month}/${day} ${hour}:${String(minute).padStart(2, '0')}`;
  const date = parse(text, TIMESTAMP_FORMAT, new Date(0));

  if (year < MIN_YEAR || !isValid(date)) {
    return {
      ok: false,
      error: new InvalidTimestampError(`Invalid measurement date: ${text}`),
    };
  }

  return {
    ok: true,
    value: Object.freeze({
      date,
      utcOffsetMinutes: 0 - date.getTimezoneOffset(), // avoid -0 at UTC
      iso: formatISO(date),
    }),
  };
}

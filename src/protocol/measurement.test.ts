import { describe, it, expect } from 'vitest';
import { InvalidTimestampError, MalformedPayloadError } from '../exceptions';
import { decodeMeasurement, decodeTimestamp } from './measurement';

// 120/80 mmHg, MAP 100, 2024-06-15 10:30, pulse 72, user 1
const PAYLOAD = [
  0x00, 0x78, 0x00, 0x50, 0x00, 0x64, 0x00, 0xe8, 0x07, 0x06, 0x0f, 0x0a, 0x1e, 0x00, 0x48,
  0x00, 0x01,
];

function withDate(month: number, day: number, hour: number, minute: number): Uint8Array {
  const data = Uint8Array.from(PAYLOAD);
  data[9] = month;
  data[10] = day;
  data[11] = hour;
  data[12] = minute;
  return data;
}

describe('decodeMeasurement', () => {
  it('decodes every field of a measurement notification', () => {
    const record = decodeMeasurement(Uint8Array.from(PAYLOAD));

    expect(record.systolic).toBe(120);
    expect(record.diastolic).toBe(80);
    expect(record.arterial).toBe(100);
    expect(record.year).toBe(2024);
    expect(record.month).toBe(6);
    expect(record.day).toBe(15);
    expect(record.hour).toBe(10);
    expect(record.minute).toBe(30);
    expect(record.pulse).toBe(72);
    expect(record.userSlot).toBe(1);
  });

  it('reads the date in the local timezone', () => {
    const record = decodeMeasurement(Uint8Array.from(PAYLOAD));
    const expected = new Date(2024, 5, 15, 10, 30);

    expect(record.measuredAt.ok).toBe(true);
    if (!record.measuredAt.ok) return;

    expect(record.measuredAt.value.date.getTime()).toBe(expected.getTime());
    expect(record.measuredAt.value.utcOffsetMinutes).toBe(0 - expected.getTimezoneOffset());
    expect(record.measuredAt.value.iso).toMatch(/^2024-06-15T10:30:00(Z|[+-]\d{2}:\d{2})$/);
  });

  it('combines high and low bytes of 16-bit fields', () => {
    const data = Uint8Array.from(PAYLOAD);
    data[1] = 0x2c;
    data[2] = 0x01; // 300
    data[14] = 0xff;
    data[15] = 0xff; // 65535

    const record = decodeMeasurement(data);

    expect(record.systolic).toBe(300);
    expect(record.pulse).toBe(65535);
  });

  it('ignores the flags and seconds bytes', () => {
    const data = Uint8Array.from(PAYLOAD);
    data[0] = 0x1e;
    data[13] = 0x3b;

    expect(decodeMeasurement(data)).toEqual(decodeMeasurement(Uint8Array.from(PAYLOAD)));
  });

  it('is deterministic and leaves the input untouched', () => {
    const data = Uint8Array.from(PAYLOAD);

    const first = decodeMeasurement(data);
    const second = decodeMeasurement(data);

    expect(second).toEqual(first);
    expect(Array.from(data)).toEqual(PAYLOAD);
  });

  it('returns a frozen record', () => {
    expect(Object.isFrozen(decodeMeasurement(Uint8Array.from(PAYLOAD)))).toBe(true);
  });

  it('accepts payloads longer than 17 bytes', () => {
    const record = decodeMeasurement(Uint8Array.from([...PAYLOAD, 0xaa, 0xbb]));

    expect(record.systolic).toBe(120);
    expect(record.userSlot).toBe(1);
  });

  it('honours the byte offset of a view into a larger buffer', () => {
    const buffer = Uint8Array.from([0xde, 0xad, 0xbe, ...PAYLOAD]);
    const view = buffer.subarray(3);

    const record = decodeMeasurement(view);

    expect(record.systolic).toBe(120);
    expect(record.diastolic).toBe(80);
    expect(record.year).toBe(2024);
  });

  it('rejects payloads shorter than 17 bytes', () => {
    const data = Uint8Array.from(PAYLOAD.slice(0, 16));

    expect(() => decodeMeasurement(data)).toThrow(MalformedPayloadError);
    expect(() => decodeMeasurement(data)).toThrow(
      'Measurement payload too short: 16 bytes (need 17)'
    );
  });

  it('rejects an empty payload', () => {
    expect(() => decodeMeasurement(new Uint8Array(0))).toThrow(MalformedPayloadError);
  });

  it('keeps pressure and pulse when the date is invalid', () => {
    const record = decodeMeasurement(withDate(0, 15, 10, 30));

    expect(record.systolic).toBe(120);
    expect(record.diastolic).toBe(80);
    expect(record.pulse).toBe(72);
    expect(record.measuredAt.ok).toBe(false);
    if (record.measuredAt.ok) return;

    expect(record.measuredAt.error).toBeInstanceOf(InvalidTimestampError);
    expect(record.measuredAt.error.message).toBe('Invalid measurement date: 2024/0/15 10:30');
  });

  it.each([
    ['month 13', 13, 15, 10, 30],
    ['day 32', 6, 32, 10, 30],
    ['31 June', 6, 31, 10, 30],
    ['hour 24', 6, 15, 24, 30],
    ['minute 60', 6, 15, 10, 60],
    ['unset fields', 255, 255, 255, 255],
  ])('flags an invalid date (%s)', (_label, month, day, hour, minute) => {
    const record = decodeMeasurement(withDate(month, day, hour, minute));

    expect(record.measuredAt.ok).toBe(false);
    expect(record.systolic).toBe(120);
  });
});

describe('decodeTimestamp', () => {
  it('accepts a leap day', () => {
    const result = decodeTimestamp(2024, 2, 29, 8, 0);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.date.getTime()).toBe(new Date(2024, 1, 29, 8, 0).getTime());
  });

  it('rejects 29 February outside leap years', () => {
    const result = decodeTimestamp(2023, 2, 29, 8, 0);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Invalid measurement date: 2023/2/29 8:00');
  });

  it('rejects years without four digits', () => {
    const result = decodeTimestamp(24, 6, 15, 10, 30);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Invalid measurement date: 24/6/15 10:30');
  });

  it('rejects the unknown year 0', () => {
    const result = decodeTimestamp(0, 6, 15, 10, 30);

    expect(result.ok).toBe(false);
  });

  it('accepts the first four-digit year', () => {
    const result = decodeTimestamp(1000, 1, 1, 0, 0);

    expect(result.ok).toBe(true);
  });

  it('pads single-digit minutes', () => {
    const result = decodeTimestamp(2023, 12, 31, 23, 5);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.date.getTime()).toBe(new Date(2023, 11, 31, 23, 5).getTime());
  });
});

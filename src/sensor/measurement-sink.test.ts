import { describe, it, expect } from 'vitest';
import { SensorDeviceClass, SensorKey, Units } from '../models/enums';
import type { LocalTimestamp } from '../models/measurement';
import type { SensorReadingOf } from '../models/sensor';
import { decodeMeasurement } from '../protocol/measurement';
import { MeasurementSink } from './measurement-sink';

const PAYLOAD = Uint8Array.from([
  0x00, 0x78, 0x00, 0x50, 0x00, 0x64, 0x00, 0xe8, 0x07, 0x06, 0x0f, 0x0a, 0x1e, 0x00, 0x48,
  0x00, 0x01,
]);

describe('MeasurementSink', () => {
  it('stores a reading with its unit and display name', () => {
    const sink = new MeasurementSink();

    sink.record({ key: SensorKey.PULSE, unit: Units.BEATS_PER_MINUTE, value: 72, name: 'Pulse' });

    expect(sink.snapshot()).toEqual([
      { key: 'pulse', unit: 'bpm', value: 72, name: 'Pulse' },
    ]);
  });

  it('keeps the device class when one is given', () => {
    const sink = new MeasurementSink();

    sink.record({
      key: SensorKey.SYSTOLIC,
      unit: Units.PRESSURE_MMHG,
      value: 120,
      name: 'Systolic',
      deviceClass: SensorDeviceClass.PRESSURE,
    });

    expect(sink.get(SensorKey.SYSTOLIC)).toEqual({
      key: 'systolic',
      unit: 'mmHg',
      value: 120,
      name: 'Systolic',
      deviceClass: 'pressure',
    });
  });

  it('copies the reading it is given', () => {
    const sink = new MeasurementSink();
    const reading: SensorReadingOf<SensorKey.PULSE> = {
      key: SensorKey.PULSE,
      unit: Units.BEATS_PER_MINUTE,
      value: 72,
      name: 'Pulse',
    };

    sink.record(reading);
    reading.value = 90;

    expect(sink.get(SensorKey.PULSE)?.value).toBe(72);
  });

  it('replaces a key in place, last write wins', () => {
    const sink = new MeasurementSink();

    sink.recordStandard(SensorKey.SYSTOLIC, 120);
    sink.recordStandard(SensorKey.PULSE, 72);
    sink.recordStandard(SensorKey.SYSTOLIC, 135);

    const snapshot = sink.snapshot();
    expect(snapshot.map((reading) => reading.key)).toEqual(['systolic', 'pulse']);
    expect(snapshot[0].value).toBe(135);
    expect(sink.size).toBe(2);
  });

  it('does not clear readings when taking a snapshot', () => {
    const sink = new MeasurementSink();
    sink.recordSignalStrength(-61);

    const first = sink.snapshot();
    const second = sink.snapshot();

    expect(second).toEqual(first);
    expect(sink.size).toBe(1);
    expect(sink.has(SensorKey.SIGNAL_STRENGTH)).toBe(true);
  });

  it('returns copies that do not write back into the sink', () => {
    const sink = new MeasurementSink();
    sink.recordStandard(SensorKey.DIASTOLIC, 80);

    const [reading] = sink.snapshot();
    reading.name = 'Changed';

    expect(sink.get(SensorKey.DIASTOLIC)?.name).toBe('Diastolic');
  });

  it('stores values as given without range checks', () => {
    const sink = new MeasurementSink();

    sink.recordStandard(SensorKey.SYSTOLIC, 65535);
    sink.recordStandard(SensorKey.PULSE, 0);

    expect(sink.get(SensorKey.SYSTOLIC)?.value).toBe(65535);
    expect(sink.get(SensorKey.PULSE)?.value).toBe(0);
  });

  it('records signal strength in dBm', () => {
    const sink = new MeasurementSink();

    sink.recordSignalStrength(-58);

    expect(sink.snapshot()).toEqual([
      {
        key: 'signal_strength',
        unit: 'dBm',
        value: -58,
        name: 'Signal Strength',
        deviceClass: 'signal_strength',
      },
    ]);
  });

  it('records a decoded measurement without arterial pressure or user slot', () => {
    const sink = new MeasurementSink();

    sink.recordMeasurement(decodeMeasurement(PAYLOAD));

    const snapshot = sink.snapshot();
    expect(snapshot.map((reading) => reading.key)).toEqual([
      'timestamp',
      'systolic',
      'diastolic',
      'pulse',
    ]);
    expect(snapshot.slice(1)).toEqual([
      { key: 'systolic', unit: 'mmHg', value: 120, name: 'Systolic', deviceClass: 'pressure' },
      { key: 'diastolic', unit: 'mmHg', value: 80, name: 'Diastolic', deviceClass: 'pressure' },
      { key: 'pulse', unit: 'bpm', value: 72, name: 'Pulse' },
    ]);

    const timestamp = sink.get(SensorKey.TIMESTAMP);
    expect(timestamp?.unit).toBeNull();
    expect(timestamp?.name).toBe('Measured Date');
    expect(timestamp?.value.date.getTime()).toBe(new Date(2024, 5, 15, 10, 30).getTime());
  });

  it('skips the timestamp when the measured date is invalid', () => {
    const data = Uint8Array.from(PAYLOAD);
    data[10] = 32;
    const sink = new MeasurementSink();

    sink.recordMeasurement(decodeMeasurement(data));

    expect(sink.has(SensorKey.TIMESTAMP)).toBe(false);
    expect(sink.snapshot().map((reading) => reading.key)).toEqual([
      'systolic',
      'diastolic',
      'pulse',
    ]);
  });

  it('refuses a number for the timestamp key', () => {
    const sink = new MeasurementSink();
    // Untyped input, as from a host bridge
    const stamp: LocalTimestamp = JSON.parse('120');

    expect(() => sink.recordStandard(SensorKey.TIMESTAMP, stamp)).toThrow(
      new TypeError('Value of type number does not match sensor key timestamp')
    );
    expect(sink.size).toBe(0);
  });

  it('refuses a non-number for a numeric key', () => {
    const sink = new MeasurementSink();
    const pulse: number = JSON.parse('"72"');

    expect(() => sink.recordStandard(SensorKey.PULSE, pulse)).toThrow(
      new TypeError('Value of type string does not match sensor key pulse')
    );
    expect(sink.has(SensorKey.PULSE)).toBe(false);
  });
});

/**
 * Accumulator for decoded sensor readings.
 */

import { SensorKey } from '../models/enums';
import type { LocalTimestamp, MeasurementRecord } from '../models/measurement';
import { SENSOR_DESCRIPTIONS, type SensorReading } from '../models/sensor';

type NumericSensorKey = Exclude<SensorKey, SensorKey.TIMESTAMP>;

/**
 * Keyed, insertion-ordered store of readings for one session.
 *
 * Recording a key again replaces its reading in place. Values are stored
 * as given; no range checking is done.
 */
export class MeasurementSink {
  private readings = new Map<SensorKey, SensorReading>();

  /**
   * Record a reading, replacing any earlier one for the same key.
   */
  record(reading: SensorReading): void {
    this.readings.set(reading.key, { ...reading });
  }

  /**
   * Record a value with the canonical unit, name and class for its key.
   *
   * @throws {TypeError} If the value does not fit the key
   */
  recordStandard(key: SensorKey.TIMESTAMP, value: LocalTimestamp): void;
  recordStandard(key: NumericSensorKey, value: number): void;
  recordStandard(key: SensorKey, value: number | LocalTimestamp): void {
    const description = SENSOR_DESCRIPTIONS[key];
    if (key === SensorKey.TIMESTAMP) {
      if (typeof value === 'object' && value !== null) {
        this.record({ key, value, ...description });
        return;
      }
    } else if (typeof value === 'number') {
      this.record({ key, value, ...description });
      return;
    }
    throw new TypeError(`Value of type ${typeof value} does not match sensor key ${key}`);
  }

  /**
   * Record every reported field of a decoded measurement.
   *
   * The timestamp is skipped when the device's date fields were invalid.
   * Arterial pressure and user slot are not reported.
   */
  recordMeasurement(measurement: MeasurementRecord): void {
    if (measurement.measuredAt.ok) {
      this.recordStandard(SensorKey.TIMESTAMP, measurement.measuredAt.value);
    }
    this.recordStandard(SensorKey.SYSTOLIC, measurement.systolic);
    this.recordStandard(SensorKey.DIASTOLIC, measurement.diastolic);
    this.recordStandard(SensorKey.PULSE, measurement.pulse);
  }

  recordSignalStrength(rssi: number): void {
    this.recordStandard(SensorKey.SIGNAL_STRENGTH, rssi);
  }

  get<K extends SensorKey>(key: K): Extract<SensorReading, { key: K }> | undefined {
    const reading = this.readings.get(key);
    return reading && isReadingFor(reading, key) ? reading : undefined;
  }

  has(key: SensorKey): boolean {
    return this.readings.has(key);
  }

  get size(): number {
    return this.readings.size;
  }

  /**
   * Current readings in first-recorded order. Does not clear the sink.
   */
  snapshot(): SensorReading[] {
    return Array.from(this.readings.values(), (reading) => ({ ...reading }));
  }
}

function isReadingFor<K extends SensorKey>(
  reading: SensorReading,
  key: K
): reading is Extract<SensorReading, { key: K }> {
  return reading.key === key;
}

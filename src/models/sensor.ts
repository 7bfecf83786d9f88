/**
 * Sensor reading and acquisition outcome structures.
 */

import type { DeviceIdentity } from './advertisement';
import { AcquisitionStatus, SensorDeviceClass, SensorKey, Units } from './enums';
import type { LocalTimestamp } from './measurement';

/**
 * Value type carried by each sensor key.
 */
export interface SensorValueMap {
  [SensorKey.SYSTOLIC]: number;
  [SensorKey.DIASTOLIC]: number;
  [SensorKey.PULSE]: number;
  [SensorKey.SIGNAL_STRENGTH]: number;
  [SensorKey.TIMESTAMP]: LocalTimestamp;
}

export type SensorValue = SensorValueMap[SensorKey];

export interface SensorReadingOf<K extends SensorKey> {
  key: K;
  unit: Units | null;
  value: SensorValueMap[K];
  name: string;
  deviceClass?: SensorDeviceClass;
}

/**
 * A single reading, discriminated on `key`.
 */
export type SensorReading = {
  [K in SensorKey]: SensorReadingOf<K>;
}[SensorKey];

export interface SensorDescription {
  unit: Units | null;
  name: string;
  deviceClass?: SensorDeviceClass;
}

/**
 * Canonical unit, display name and class for every sensor key.
 */
export const SENSOR_DESCRIPTIONS: Record<SensorKey, SensorDescription> = {
  [SensorKey.SYSTOLIC]: {
    unit: Units.PRESSURE_MMHG,
    name: 'Systolic',
    deviceClass: SensorDeviceClass.PRESSURE,
  },
  [SensorKey.DIASTOLIC]: {
    unit: Units.PRESSURE_MMHG,
    name: 'Diastolic',
    deviceClass: SensorDeviceClass.PRESSURE,
  },
  [SensorKey.PULSE]: {
    unit: Units.BEATS_PER_MINUTE,
    name: 'Pulse',
  },
  [SensorKey.SIGNAL_STRENGTH]: {
    unit: Units.SIGNAL_STRENGTH_DBM,
    name: 'Signal Strength',
    deviceClass: SensorDeviceClass.SIGNAL_STRENGTH,
  },
  [SensorKey.TIMESTAMP]: {
    unit: null,
    name: 'Measured Date',
    deviceClass: SensorDeviceClass.TIMESTAMP,
  },
};

/**
 * Terminal result of one acquisition session.
 */
export interface AcquisitionOutcome {
  status: AcquisitionStatus;
  device: DeviceIdentity;

  /** Readings in the order they were first recorded */
  readings: SensorReading[];

  /** Connection failure, timeout or decode failure behind a non-measured status */
  error?: Error;
}

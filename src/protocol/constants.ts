/**
 * BLE protocol constants for Silvercrest blood-pressure cuffs.
 */

export const BLOOD_PRESSURE_SERVICE_UUID = '00001810-0000-1000-8000-00805f9b34fb';
export const BLOOD_PRESSURE_MEASUREMENT_UUID = '00002a35-0000-1000-8000-00805f9b34fb';

export const MIN_PAYLOAD_LENGTH = 17;

// Timing (milliseconds)
export const NOTIFICATION_TIMEOUT_MS = 15000;
export const UPDATE_INTERVAL_MS = 60000;
export const CONNECT_ATTEMPTS = 3;

export const MANUFACTURER = 'Silvercrest';
export const DEVICE_MODEL = 'Blood Pressure Measurement';

/**
 * Byte offsets inside a measurement notification.
 *
 * Bytes 0 (flags) and 13 (seconds) are not used.
 */
export enum PayloadOffset {
  SYSTOLIC = 1,
  DIASTOLIC = 3,
  ARTERIAL = 5,
  YEAR = 7,
  MONTH = 9,
  DAY = 10,
  HOUR = 11,
  MINUTE = 12,
  PULSE = 14,
  USER_SLOT = 16,
}

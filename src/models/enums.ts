/**
 * Enums for blood-pressure sensor readings and acquisition sessions.
 */

/**
 * Keys of the readings a cuff can report.
 */
export enum SensorKey {
  SYSTOLIC = 'systolic',
  DIASTOLIC = 'diastolic',
  PULSE = 'pulse',
  SIGNAL_STRENGTH = 'signal_strength',
  TIMESTAMP = 'timestamp',
}

/**
 * Units of measurement attached to readings.
 */
export enum Units {
  PRESSURE_MMHG = 'mmHg',
  BEATS_PER_MINUTE = 'bpm',
  SIGNAL_STRENGTH_DBM = 'dBm',
}

export enum SensorDeviceClass {
  PRESSURE = 'pressure',
  SIGNAL_STRENGTH = 'signal_strength',
  TIMESTAMP = 'timestamp',
}

/**
 * Lifecycle of a single acquisition session.
 */
export enum SessionState {
  IDLE = 'idle',
  CONNECTING = 'connecting',
  SUBSCRIBED = 'subscribed',
  AWAITING_NOTIFICATION = 'awaiting_notification',
  FINALIZING = 'finalizing',
  CLOSED = 'closed',
}

/**
 * How an acquisition session ended.
 */
export enum AcquisitionStatus {
  /** Notification decoded into a blood-pressure reading */
  MEASURED = 'measured',
  /** Notification arrived but could not be decoded */
  NO_MEASUREMENT = 'no_measurement',
  TIMED_OUT = 'timed_out',
  CONNECTION_FAILED = 'connection_failed',
}

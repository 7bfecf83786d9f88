/**
 * Exception classes for the blood-pressure cuff library.
 */

export class BloodPressureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BloodPressureError';
  }
}

export class BLEConnectionError extends BloodPressureError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BLEConnectionError';
  }
}

/**
 * Raised when the notification subscription could not be armed.
 */
export class SubscriptionError extends BloodPressureError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SubscriptionError';
  }
}

export class NotificationTimeoutError extends BloodPressureError {
  constructor(message: string) {
    super(message);
    this.name = 'NotificationTimeoutError';
  }
}

export class ProtocolError extends BloodPressureError {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

export class MalformedPayloadError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedPayloadError';
  }
}

export class InvalidTimestampError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTimestampError';
  }
}

/**
 * Raised (and only ever logged) when unsubscribe or disconnect fails.
 */
export class TeardownError extends BloodPressureError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TeardownError';
  }
}

export class SessionStateError extends BloodPressureError {
  constructor(message: string) {
    super(message);
    this.name = 'SessionStateError';
  }
}

export class ConfigError extends BloodPressureError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Normalise anything thrown into an Error.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : String(value));
}

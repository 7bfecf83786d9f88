/**
 * Option schemas for devices, sessions and transports.
 */

import { z } from 'zod';
import { ConfigError } from './exceptions';
import {
  BLOOD_PRESSURE_MEASUREMENT_UUID,
  BLOOD_PRESSURE_SERVICE_UUID,
  CONNECT_ATTEMPTS,
  NOTIFICATION_TIMEOUT_MS,
  UPDATE_INTERVAL_MS,
} from './protocol/constants';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const uuid = z
  .string()
  .regex(UUID_PATTERN, 'Expected a 128-bit UUID')
  .transform((value) => value.toLowerCase());

export const BloodPressureOptionsSchema = z.object({
  /** How long a session waits for the measurement notification */
  timeoutMs: z.number().int().positive().default(NOTIFICATION_TIMEOUT_MS),

  /** Minimum time between two polls of the same device */
  updateIntervalMs: z.number().int().positive().default(UPDATE_INTERVAL_MS),

  characteristicUuid: uuid.default(BLOOD_PRESSURE_MEASUREMENT_UUID),
});

export const TransportOptionsSchema = z.object({
  serviceUuid: uuid.default(BLOOD_PRESSURE_SERVICE_UUID),
  connectAttempts: z.number().int().min(1).max(10).default(CONNECT_ATTEMPTS),
});

export type BloodPressureOptionsInput = z.input<typeof BloodPressureOptionsSchema>;
export type BloodPressureOptions = z.output<typeof BloodPressureOptionsSchema>;
export type TransportOptionsInput = z.input<typeof TransportOptionsSchema>;
export type TransportOptions = z.output<typeof TransportOptionsSchema>;

function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  label: string
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${label}: ${issues}`);
  }
  return result.data;
}

/**
 * Validate device/session options and fill in defaults.
 *
 * @throws {ConfigError} Listing every invalid field
 */
export function resolveOptions(input: BloodPressureOptionsInput = {}): BloodPressureOptions {
  return parseWith(BloodPressureOptionsSchema, input, 'options');
}

/**
 * Validate transport options and fill in defaults.
 *
 * @throws {ConfigError} Listing every invalid field
 */
export function resolveTransportOptions(input: TransportOptionsInput = {}): TransportOptions {
  return parseWith(TransportOptionsSchema, input, 'transport options');
}

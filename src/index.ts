/**
 * bp-cuff-ble - TypeScript library for Silvercrest BLE blood-pressure cuffs
 *
 * Main entry point exporting the public API.
 */

// Core device API
export { BloodPressureDevice, type BloodPressureDeviceOptions } from './device';
export { AcquisitionSession, type AcquisitionSessionOptions } from './session';
export { PassiveListener, type PassiveListenerOptions } from './listener';
export { MeasurementSink } from './sensor/measurement-sink';

// Transport
export type { BLETransport, NotificationCallback } from './transport/transport';
export {
  WebBluetoothTransport,
  type BluetoothDeviceProvider,
  type WebBluetoothHandle,
  type WebBluetoothTransportOptions,
} from './transport/web-bluetooth';
export { CompletionSignal } from './transport/completion-signal';

// Protocol
export * from './protocol';

// Models and types
export * from './models';

// Configuration and logging
export * from './config';
export type { Logger } from './logger';

// Exceptions
export * from './exceptions';

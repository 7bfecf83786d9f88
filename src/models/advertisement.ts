/**
 * BLE advertisement and device identity structures.
 */

/**
 * One advertisement observed from a cuff.
 */
export interface AdvertisementContext {
  /** Device address (MAC, or the host's opaque device id) */
  address: string;

  /** Advertised local name */
  name: string;

  /** Received signal strength in dBm */
  rssi: number;

  /** Epoch milliseconds when the advertisement was seen */
  observedAt: number;
}

/**
 * Identity metadata reported alongside readings.
 */
export interface DeviceIdentity {
  address: string;
  manufacturer: string;
  model: string;
  name: string;
  title: string;
}

/**
 * Shorten a device address for display.
 *
 * Keeps the last four hex digits: `AA:BB:CC:DD:EE:FF` becomes `EEFF`.
 * Opaque platform ids (base64 Web Bluetooth ids, UUIDs) are reduced to
 * their hex characters first.
 */
export function shortAddress(address: string): string {
  return address.replace(/[^0-9a-f]/gi, '').toUpperCase().slice(-4);
}

/**
 * Transport contract used by acquisition sessions.
 */

/**
 * Callback receiving raw notification bytes.
 */
export type NotificationCallback = (data: Uint8Array) => void;

/**
 * Minimal BLE link operations needed to take one measurement.
 *
 * Every method may reject independently; callers never assume success.
 *
 * @typeParam H - Connection handle type owned by the caller until `disconnect`
 */
export interface BLETransport<H = unknown> {
  connect(address: string): Promise<H>;
  subscribe(handle: H, characteristicUuid: string, callback: NotificationCallback): Promise<void>;
  unsubscribe(handle: H, characteristicUuid: string): Promise<void>;
  disconnect(handle: H): Promise<void>;
}

/**
 * Protocol layer exports for blood-pressure cuff communication.
 */

export * from './constants';
export * from './measurement';

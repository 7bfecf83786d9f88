/**
 * Models layer exports for blood-pressure cuff structures.
 */

export * from './enums';
export * from './advertisement';
export * from './measurement';
export * from './sensor';

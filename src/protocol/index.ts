/**
 * Protocol layer exports for the hub's BLE wire format.
 */

export * from './constants';
export * from './crc';
export * from './framing';
export * from './messages';

/**
 * Models layer exports for hub messages and results.
 */

export * from './enums';
export * from './messages';
export * from './results';

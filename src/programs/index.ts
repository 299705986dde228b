/**
 * Hub program sources and the default action catalog.
 */

export * from './builders';
export * from './catalog';
export * from './patterns';

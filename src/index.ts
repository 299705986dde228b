/**
 * hub-link - TypeScript library for SPIKE Prime class hubs over BLE
 *
 * Main entry point exporting the public API.
 */

// Core hub API
export { HubSession } from './session';
export type {
  ConsoleListener,
  FlowOptions,
  HubSessionOptions,
  HubTimeouts,
  OperationOptions,
  UploadOptions,
} from './session';
export { SlotRegistry } from './slots';
export type {
  InteractiveOptions,
  InteractiveReport,
  PreloadReport,
  RunOptions,
  SequenceOptions,
  SequenceReport,
  SlotEntry,
  SlotRegistryOptions,
} from './slots';
export { SignalQueue } from './signals';
export type { ConsoleSource, Signal, SignalQueueOptions } from './signals';

// Transport
export { BLEConnection } from './transport/connection';
export type { BLEConnectionOptions, HubTransport, PacketHandler } from './transport/connection';

// Models, wire format and programs
export * from './models';
export * from './protocol';
export * from './programs';

// Exceptions
export * from './exceptions';

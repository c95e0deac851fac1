/**
 * oximeter-ble - reconnecting BLE client for OxySmart pulse oximeters
 *
 * Main entry point exporting the public API.
 */

// Supervisor and sessions
export * from './supervisor';
export { Session, sessionOpener } from './transport/session';
export type {
  ChunkOutcome,
  NextChunkOptions,
  SessionHandle,
  SessionOpener,
  SessionOptions,
} from './transport/session';
export { NobleAdapter } from './transport/noble-adapter';
export * from './transport/adapter';

// Sinks
export * from './sink';

// Models and protocol
export * from './models';
export * from './protocol';

// Exceptions
export * from './exceptions';

/**
 * Protocol layer exports for the oximeter notification stream.
 */

export * from './constants';
export * from './checksum';
export * from './decoder';

/**
 * Models layer exports.
 */

export * from './reading';
export * from './identity';
export * from './state';

/**
 * Main engine exports.
 */

export * from './types';
export * from './date';
export * from './models';
export * from './errors';
export * from './expression';
export * from './resolution';
export * from './rng';
export * from './games';
export * from './stats';

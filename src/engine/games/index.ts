/**
 * Quiz game exports.
 */

export * from './types';
export * from './leftRight';
export * from './whichDate';
export * from './decades';
export * from './orderEntities';
export * from './wereTheyAliveWhen';

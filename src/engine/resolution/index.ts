/**
 * Timeline resolution exports.
 */

// Types
export * from './types';

// Stages
export { createResolutionSnapshot, loadResolutionSnapshot, snapshotGraph } from './snapshot';
export type { SnapshotParts } from './snapshot';
export { resolveContributing } from './graph';
export { composeEntitySet, matchingEntities } from './composer';
export { compareEntities, sortChronologically } from './sorter';

// Pipeline
export { renderTimeline, resolveSnapshot } from './pipeline';

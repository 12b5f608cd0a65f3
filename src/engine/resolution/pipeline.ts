/**
 * Timeline rendering pipeline.
 *
 * snapshot -> contributing timelines -> entity set -> chronological order.
 * Only the snapshot load suspends; the rest is pure over the snapshot.
 */

import type { TimelineId } from '../types';
import type { Entity } from '../models';
import { NotFoundError, describeWarning } from '../errors';
import type { TimelineStore } from '@storage/types';
import { composeEntitySet } from './composer';
import { resolveContributing } from './graph';
import { loadResolutionSnapshot, snapshotGraph } from './snapshot';
import { sortChronologically } from './sorter';
import type { RenderResult, ResolutionOptions, ResolutionSnapshot } from './types';

/**
 * Resolve a loaded snapshot into its view.
 * Dangling references are logged and returned as warnings.
 */
export function resolveSnapshot(
  snapshot: ResolutionSnapshot,
  options: ResolutionOptions = {}
): RenderResult {
  const root = snapshot.timelines.get(snapshot.rootId);
  if (!root) {
    return { success: false, error: new NotFoundError('TIMELINE', snapshot.rootId) };
  }

  const graph = resolveContributing(root.id, snapshotGraph(snapshot));
  if (!graph.success) {
    return graph;
  }

  const composed = composeEntitySet(graph.timelineIds, snapshot, options);
  if (!composed.success) {
    return composed;
  }

  const entities: Entity[] = [];
  for (const id of composed.entityIds) {
    const entity = snapshot.entities.get(id);
    if (entity) entities.push(entity);
  }

  const warnings = [...graph.warnings, ...composed.warnings];
  for (const warning of warnings) {
    console.warn(`[Resolver] ${describeWarning(warning)}`);
  }

  return {
    success: true,
    view: { id: root.id, name: root.name, entities: sortChronologically(entities) },
    contributingTimelineIds: graph.timelineIds,
    warnings,
  };
}

/**
 * Render a timeline: every entity it and its subtimelines contribute, in
 * chronological order.
 *
 * Resolves to a failure result for a missing root, a cycle or a malformed
 * expression; rejects only when the store itself fails.
 */
export async function renderTimeline(
  store: TimelineStore,
  rootId: TimelineId,
  options: ResolutionOptions = {}
): Promise<RenderResult> {
  const snapshot = await loadResolutionSnapshot(store, rootId);
  return resolveSnapshot(snapshot, options);
}

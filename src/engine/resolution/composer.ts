/**
 * Entity Set Composer.
 *
 * Unions, over every contributing timeline, its explicitly linked entities
 * and the entities its tag expression selects. Composition only ever adds.
 */

import type { EntityId, TimelineId } from '../types';
import { NotFoundError } from '../errors';
import type { ResolutionWarning } from '../errors';
import { ExpressionCache } from '../expression/cache';
import { evaluatePredicate, referencedTagNames } from '../expression/evaluator';
import type { Predicate } from '../expression/types';
import type { ComposeOutcome, ResolutionOptions, ResolutionSnapshot } from './types';

/**
 * Entities in the snapshot whose tags satisfy the predicate, in universe order.
 *
 * A leaf only looks at tags of its own name, so when an entity with no tags
 * fails the predicate, only entities carrying a referenced name can pass.
 */
export function matchingEntities(predicate: Predicate, snapshot: ResolutionSnapshot): EntityId[] {
  let candidates: ReadonlySet<EntityId> | null = null;
  if (!evaluatePredicate(predicate, [])) {
    const narrowed = new Set<EntityId>();
    for (const name of referencedTagNames(predicate)) {
      for (const id of snapshot.tagIndex.get(name) ?? []) {
        narrowed.add(id);
      }
    }
    candidates = narrowed;
  }

  const matches: EntityId[] = [];
  for (const id of snapshot.entities.keys()) {
    if (candidates !== null && !candidates.has(id)) continue;
    if (evaluatePredicate(predicate, snapshot.tags.get(id) ?? [])) {
      matches.push(id);
    }
  }
  return matches;
}

export function composeEntitySet(
  timelineIds: readonly TimelineId[],
  snapshot: ResolutionSnapshot,
  options: ResolutionOptions = {}
): ComposeOutcome {
  // Without a shared cache, each composition parses into its own
  const cache = options.expressionCache ?? new ExpressionCache();
  const entityIds = new Set<EntityId>();
  const warnings: ResolutionWarning[] = [];

  for (const timelineId of timelineIds) {
    const timeline = snapshot.timelines.get(timelineId);
    if (!timeline) continue;

    for (const entityId of snapshot.links.get(timelineId) ?? []) {
      if (snapshot.entities.has(entityId)) {
        entityIds.add(entityId);
      } else {
        warnings.push({
          type: 'DanglingEntityLink',
          referencedBy: timelineId,
          error: new NotFoundError('ENTITY', entityId),
        });
      }
    }

    const outcome = cache.parse(timeline.boolExpression);
    if (!outcome.success) {
      return { success: false, error: outcome.error.forTimeline(timelineId) };
    }
    if (outcome.predicate === null) continue;

    for (const entityId of matchingEntities(outcome.predicate, snapshot)) {
      entityIds.add(entityId);
    }
  }

  return { success: true, entityIds, warnings };
}

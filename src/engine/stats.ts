/**
 * Dataset statistics.
 *
 * Row counts, tag usage and per-timeline entity counts, with the sort
 * orders a listing offers for them.
 */

import type { EntityId } from './types';
import type { ReducedTimeline, Tag } from './models';
import { ExpressionCache } from './expression/cache';
import { renderTimeline } from './resolution/pipeline';
import type { ResolutionOptions } from './resolution/types';
import type { TimelineDataset, TimelineStore } from '@storage/types';

export type SortByNumber = 'ASCENDING' | 'DESCENDING';

export type SortAlphabetically = 'A_TO_Z' | 'Z_TO_A';

// =============================================================================
// Record Counts
// =============================================================================

/** Row count per table */
export interface RecordCounts {
  readonly entities: number;
  readonly entityTags: number;
  readonly timelines: number;
  readonly timelineTags: number;
  readonly subtimelines: number;
  readonly timelineEntities: number;
}

export function countRecords(dataset: TimelineDataset): RecordCounts {
  return {
    entities: dataset.entities.length,
    entityTags: dataset.entityTags.length,
    timelines: dataset.timelines.length,
    timelineTags: dataset.timelineTags.length,
    subtimelines: dataset.subtimelines.length,
    timelineEntities: dataset.timelineEntities.length,
  };
}

// =============================================================================
// Tag Counts
// =============================================================================

export interface TagCount {
  readonly tag: Tag;
  readonly count: number;
}

/** Anonymous names sort before any named one */
function compareText(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return a < b ? -1 : 1;
}

function countTags(tags: readonly Tag[]): TagCount[] {
  const counts = new Map<string, TagCount>();
  for (const tag of tags) {
    const key = JSON.stringify([tag.name, tag.value]);
    counts.set(key, { tag, count: (counts.get(key)?.count ?? 0) + 1 });
  }
  return [...counts.values()].sort(
    (a, b) => compareText(a.tag.name, b.tag.name) || compareText(a.tag.value, b.tag.value)
  );
}

/**
 * Rows per distinct (name, value) entity tag, ordered by name then value.
 * A tag an entity carries twice counts twice.
 */
export function countEntityTags(dataset: TimelineDataset): TagCount[] {
  return countTags(dataset.entityTags.map(record => record.tag));
}

/** Rows per distinct (name, value) timeline tag, ordered by name then value */
export function countTimelineTags(dataset: TimelineDataset): TagCount[] {
  return countTags(dataset.timelineTags.map(record => record.tag));
}

/**
 * Number of distinct entities carrying each tag name, most used first
 * (ties by name). Anonymous tags are counted under `null`, listed last.
 */
export function countTagUsage(dataset: TimelineDataset): Array<{ name: string | null; count: number }> {
  const holders = new Map<string | null, Set<EntityId>>();
  for (const { entityId, tag } of dataset.entityTags) {
    const entities = holders.get(tag.name);
    if (entities) {
      entities.add(entityId);
    } else {
      holders.set(tag.name, new Set([entityId]));
    }
  }

  return [...holders.entries()]
    .map(([name, entities]) => ({ name, count: entities.size }))
    .sort((a, b) => {
      if (a.name === null) return 1;
      if (b.name === null) return -1;
      if (a.count !== b.count) return b.count - a.count;
      return compareText(a.name, b.name);
    });
}

export function sortTagCountsByName(counts: readonly TagCount[], order: SortAlphabetically): TagCount[] {
  const sign = order === 'A_TO_Z' ? 1 : -1;
  return [...counts].sort((a, b) => sign * compareText(a.tag.name, b.tag.name));
}

export function sortTagCountsByValue(counts: readonly TagCount[], order: SortAlphabetically): TagCount[] {
  const sign = order === 'A_TO_Z' ? 1 : -1;
  return [...counts].sort((a, b) => sign * compareText(a.tag.value, b.tag.value));
}

// =============================================================================
// Timeline Entity Counts
// =============================================================================

export interface TimelineEntityCount {
  readonly timeline: ReducedTimeline;
  /** Entities the resolved timeline shows; null when it does not resolve */
  readonly count: number | null;
}

/**
 * Resolve every timeline in the store and count the entities it shows,
 * in the store's listing order. Expressions shared between timelines are
 * parsed once.
 */
export async function countTimelineEntities(
  store: TimelineStore,
  options: ResolutionOptions = {}
): Promise<TimelineEntityCount[]> {
  const resolution: ResolutionOptions = {
    expressionCache: options.expressionCache ?? new ExpressionCache(),
  };
  const timelines = await store.listTimelines();

  return Promise.all(
    timelines.map(async ({ id, name }) => {
      const result = await renderTimeline(store, id, resolution);
      if (!result.success) {
        console.warn(`[Stats] Could not count entities of ${id}:`, result.error.message);
        return { timeline: { id, name }, count: null };
      }
      return { timeline: { id, name }, count: result.view.entities.length };
    })
  );
}

/**
 * Order by count. Timelines that do not resolve go last either way;
 * equal counts keep their order.
 */
export function sortByCount<T extends { readonly count: number | null }>(
  counts: readonly T[],
  order: SortByNumber
): T[] {
  const sign = order === 'ASCENDING' ? 1 : -1;
  return [...counts].sort((a, b) => {
    if (a.count === null || b.count === null) {
      return (a.count === null ? 1 : 0) - (b.count === null ? 1 : 0);
    }
    return sign * (a.count - b.count);
  });
}

export function sortTimelineCountsByName(
  counts: readonly TimelineEntityCount[],
  order: SortAlphabetically
): TimelineEntityCount[] {
  const sign = order === 'A_TO_Z' ? 1 : -1;
  return [...counts].sort((a, b) => sign * compareText(a.timeline.name, b.timeline.name));
}

/**
 * Snapshot loading.
 *
 * All storage reads for one resolution happen here, before any evaluation.
 * The crawl walks subtimeline edges breadth-first with a visited set, so it
 * terminates on cyclic data; cycle detection itself is left to the graph
 * resolver.
 */

import type { EntityId, TimelineId } from '../types';
import type { Entity, Tag, Timeline } from '../models';
import type { TimelineStore } from '@storage/types';
import type { ResolutionSnapshot, SubtimelineGraph } from './types';

// =============================================================================
// Construction
// =============================================================================

export interface SnapshotParts {
  readonly rootId: TimelineId;
  readonly timelines: readonly Timeline[];
  readonly children: ReadonlyMap<TimelineId, readonly TimelineId[]>;
  readonly links: ReadonlyMap<TimelineId, readonly EntityId[]>;
  readonly entities: readonly Entity[];
  readonly tags: ReadonlyMap<EntityId, readonly Tag[]>;
}

/**
 * Assemble a snapshot and its tag-name index.
 */
export function createResolutionSnapshot(parts: SnapshotParts): ResolutionSnapshot {
  const timelines = new Map<TimelineId, Timeline>();
  for (const timeline of parts.timelines) {
    timelines.set(timeline.id, timeline);
  }

  const entities = new Map<EntityId, Entity>();
  for (const entity of parts.entities) {
    entities.set(entity.id, entity);
  }

  const tagIndex = new Map<string, Set<EntityId>>();
  for (const [entityId, tags] of parts.tags) {
    for (const tag of tags) {
      if (tag.name === null) continue;
      const holders = tagIndex.get(tag.name);
      if (holders) {
        holders.add(entityId);
      } else {
        tagIndex.set(tag.name, new Set([entityId]));
      }
    }
  }

  return {
    rootId: parts.rootId,
    timelines,
    children: parts.children,
    links: parts.links,
    entities,
    tags: parts.tags,
    tagIndex,
  };
}

/**
 * Adjacency view over a snapshot.
 */
export function snapshotGraph(snapshot: ResolutionSnapshot): SubtimelineGraph {
  return {
    hasTimeline: id => snapshot.timelines.has(id),
    childrenOf: id => snapshot.children.get(id) ?? [],
  };
}

// =============================================================================
// Loading
// =============================================================================

function hasExpression(timeline: Timeline): boolean {
  return timeline.boolExpression !== null && timeline.boolExpression.trim().length > 0;
}

/**
 * Read everything a resolution of `rootId` can touch.
 *
 * When no reachable timeline carries an expression only the linked entities
 * are read; otherwise the whole entity universe and its tags are.
 * Storage failures reject the returned promise.
 */
export async function loadResolutionSnapshot(
  store: TimelineStore,
  rootId: TimelineId
): Promise<ResolutionSnapshot> {
  const timelines: Timeline[] = [];
  const children = new Map<TimelineId, readonly TimelineId[]>();
  const links = new Map<TimelineId, readonly EntityId[]>();
  const seen = new Set<TimelineId>([rootId]);

  let frontier: TimelineId[] = [rootId];
  while (frontier.length > 0) {
    const fetched = await Promise.all(
      frontier.map(async id => {
        const timeline = await store.getTimeline(id);
        if (timeline === null) return null;
        const [childIds, linkedIds] = await Promise.all([
          store.listSubtimelineChildren(id),
          store.listLinkedEntities(id),
        ]);
        return { timeline, childIds, linkedIds };
      })
    );

    const next: TimelineId[] = [];
    for (const entry of fetched) {
      if (entry === null) continue;
      const { timeline, childIds, linkedIds } = entry;
      timelines.push(timeline);
      children.set(timeline.id, childIds);
      links.set(timeline.id, linkedIds);
      for (const childId of childIds) {
        if (!seen.has(childId)) {
          seen.add(childId);
          next.push(childId);
        }
      }
    }
    frontier = next;
  }

  let entities: readonly Entity[];
  if (timelines.some(hasExpression)) {
    entities = await store.listEntities();
  } else {
    const linkedIds = [...new Set([...links.values()].flat())];
    const found = await Promise.all(linkedIds.map(id => store.getEntity(id)));
    entities = found.filter((entity): entity is Entity => entity !== null);
  }

  const tagLists = await Promise.all(entities.map(entity => store.getTags(entity.id)));
  const tags = new Map<EntityId, readonly Tag[]>();
  entities.forEach((entity, index) => {
    tags.set(entity.id, tagLists[index] ?? []);
  });

  return createResolutionSnapshot({ rootId, timelines, children, links, entities, tags });
}

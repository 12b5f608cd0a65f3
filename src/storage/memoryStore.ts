/**
 * In-memory TimelineStore.
 * Holds a TimelineDataset and answers the read contract from indexed maps.
 */

import type { EntityId, TimelineId } from '@engine/types';
import type { Entity, Tag, Timeline } from '@engine/models';
import { createEmptyDataset } from './types';
import type { TimelineDataset, TimelineStore } from './types';

function indexById<T extends { readonly id: string; readonly name: string }>(
  records: readonly T[],
  label: string
): Map<string, T> {
  const byId = new Map<string, T>();
  const names = new Set<string>();
  for (const record of records) {
    if (byId.has(record.id)) {
      throw new Error(`Duplicate ${label} id: ${record.id}`);
    }
    if (names.has(record.name)) {
      throw new Error(`Duplicate ${label} name: ${record.name}`);
    }
    byId.set(record.id, record);
    names.add(record.name);
  }
  return byId;
}

function groupBy<T, V>(
  records: readonly T[],
  keyOf: (record: T) => string,
  valueOf: (record: T) => V
): Map<string, V[]> {
  const groups = new Map<string, V[]>();
  for (const record of records) {
    const key = keyOf(record);
    const group = groups.get(key);
    if (group) {
      group.push(valueOf(record));
    } else {
      groups.set(key, [valueOf(record)]);
    }
  }
  return groups;
}

/**
 * Store backed by plain arrays.
 * Entity and timeline ids and names must be unique; references between
 * tables are not checked, so dangling links and cyclic edges are allowed.
 */
export class InMemoryTimelineStore implements TimelineStore {
  private readonly dataset: TimelineDataset;
  private readonly entitiesById: Map<EntityId, Entity>;
  private readonly timelinesById: Map<TimelineId, Timeline>;
  private readonly tagsByEntity: Map<EntityId, Tag[]>;
  private readonly tagsByTimeline: Map<TimelineId, Tag[]>;
  private readonly childrenByParent: Map<TimelineId, TimelineId[]>;
  private readonly linksByTimeline: Map<TimelineId, EntityId[]>;

  constructor(dataset: TimelineDataset = createEmptyDataset()) {
    this.dataset = dataset;
    this.entitiesById = indexById(dataset.entities, 'entity');
    this.timelinesById = indexById(dataset.timelines, 'timeline');
    this.tagsByEntity = groupBy(dataset.entityTags, r => r.entityId, r => r.tag);
    this.tagsByTimeline = groupBy(dataset.timelineTags, r => r.timelineId, r => r.tag);
    this.childrenByParent = groupBy(dataset.subtimelines, r => r.parentId, r => r.childId);
    this.linksByTimeline = groupBy(dataset.timelineEntities, r => r.timelineId, r => r.entityId);
  }

  async getEntity(id: EntityId): Promise<Entity | null> {
    return this.entitiesById.get(id) ?? null;
  }

  async listEntities(): Promise<readonly Entity[]> {
    return [...this.dataset.entities];
  }

  async getTags(entityId: EntityId): Promise<readonly Tag[]> {
    return [...(this.tagsByEntity.get(entityId) ?? [])];
  }

  async getTimeline(id: TimelineId): Promise<Timeline | null> {
    return this.timelinesById.get(id) ?? null;
  }

  async listTimelines(): Promise<readonly Timeline[]> {
    return [...this.dataset.timelines];
  }

  async listSubtimelineChildren(parentId: TimelineId): Promise<readonly TimelineId[]> {
    return [...(this.childrenByParent.get(parentId) ?? [])];
  }

  async listLinkedEntities(timelineId: TimelineId): Promise<readonly EntityId[]> {
    return [...(this.linksByTimeline.get(timelineId) ?? [])];
  }

  /**
   * Tags annotating a timeline itself (not used for resolution).
   */
  async getTimelineTags(timelineId: TimelineId): Promise<readonly Tag[]> {
    return [...(this.tagsByTimeline.get(timelineId) ?? [])];
  }
}

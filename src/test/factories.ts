/**
 * Test data builders shared by the engine, storage and store tests.
 */

import { createDate } from '@engine/date';
import type { PartialDate } from '@engine/date';
import { createEntity, createTag } from '@engine/models';
import type { Entity } from '@engine/models';
import { InMemoryTimelineStore } from '@storage/memoryStore';
import type { TimelineDataset } from '@storage/types';

export type DateParts = readonly [number, number?, number?];

export interface TestEntity {
  id: string;
  name?: string;
  start: DateParts;
  end?: DateParts;
  tags?: ReadonlyArray<readonly [string | null, string]>;
}

export interface TestTimeline {
  id: string;
  name?: string;
  expression?: string | null;
  links?: readonly string[];
  children?: readonly string[];
}

export function toDate([year, month, day]: DateParts): PartialDate {
  return createDate(year, month, day);
}

/**
 * Create an entity named after its id unless a name is given.
 */
export function createTestEntity(entity: TestEntity): Entity {
  return createEntity({
    id: entity.id,
    name: entity.name ?? `Entity ${entity.id}`,
    start: toDate(entity.start),
    end: entity.end ? toDate(entity.end) : null,
  });
}

export function createTestDataset(
  entities: readonly TestEntity[],
  timelines: readonly TestTimeline[]
): TimelineDataset {
  return {
    entities: entities.map(createTestEntity),
    entityTags: entities.flatMap(entity =>
      (entity.tags ?? []).map(([name, value]) => ({ entityId: entity.id, tag: createTag(name, value) }))
    ),
    timelines: timelines.map(timeline => ({
      id: timeline.id,
      name: timeline.name ?? `Timeline ${timeline.id}`,
      boolExpression: timeline.expression ?? null,
    })),
    timelineTags: [],
    subtimelines: timelines.flatMap(timeline =>
      (timeline.children ?? []).map(childId => ({ parentId: timeline.id, childId }))
    ),
    timelineEntities: timelines.flatMap(timeline =>
      (timeline.links ?? []).map(entityId => ({ timelineId: timeline.id, entityId }))
    ),
  };
}

export function createTestStore(
  entities: readonly TestEntity[],
  timelines: readonly TestTimeline[]
): InMemoryTimelineStore {
  return new InMemoryTimelineStore(createTestDataset(entities, timelines));
}

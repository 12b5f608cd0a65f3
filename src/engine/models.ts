/**
 * Record shapes consumed by the engine.
 *
 * Uses immutable patterns - records are read-only snapshots of what the
 * storage layer holds.
 */

import type { EntityId, TimelineId } from './types';
import type { PartialDate } from './date';
import { compareAtSharedPrecision } from './date';

// =============================================================================
// Tags
// =============================================================================

/**
 * A (possibly anonymous) name/value annotation.
 * Names are multi-valued: the same name may appear with several values.
 */
export interface Tag {
  readonly name: string | null;
  readonly value: string;
}

export function createTag(name: string | null, value: string): Tag {
  return { name, value };
}

/** Whether any tag carries the given name */
export function hasTagName(tags: readonly Tag[], name: string): boolean {
  return tags.some(tag => tag.name === name);
}

/** All values recorded under a tag name, in record order */
export function getTagValues(tags: readonly Tag[], name: string): readonly string[] {
  return tags.filter(tag => tag.name === name).map(tag => tag.value);
}

/** "name:value", or just "value" for an anonymous tag */
export function formatTag(tag: Tag): string {
  return tag.name === null ? tag.value : `${tag.name}:${tag.value}`;
}

// =============================================================================
// Entities
// =============================================================================

/**
 * A person, event or period.
 * `end` is null when the entity has not ended, or its end is unknown.
 */
export interface Entity {
  readonly id: EntityId;
  readonly name: string;
  readonly start: PartialDate;
  readonly end: PartialDate | null;
}

export type EntityErrorReason =
  | 'EMPTY_NAME'
  | 'END_BEFORE_START';

export class EntityError extends Error {
  readonly reason: EntityErrorReason;
  readonly entityId: EntityId;

  constructor(reason: EntityErrorReason, entityId: EntityId, message: string) {
    super(message);
    this.name = 'EntityError';
    this.reason = reason;
    this.entityId = entityId;
  }
}

/** Whether the end date (if any) is not before the start at their shared precision */
export function hasValidDates(start: PartialDate, end: PartialDate | null): boolean {
  return end === null || compareAtSharedPrecision(end, start) >= 0;
}

/**
 * Create a validated entity.
 *
 * @throws EntityError for a blank name, or an end date before the start date
 */
export function createEntity(fields: {
  id: EntityId;
  name: string;
  start: PartialDate;
  end?: PartialDate | null;
}): Entity {
  const name = fields.name.trim();
  if (name.length === 0) {
    throw new EntityError('EMPTY_NAME', fields.id, `Entity ${fields.id} has an empty name`);
  }

  const end = fields.end ?? null;
  if (!hasValidDates(fields.start, end)) {
    throw new EntityError(
      'END_BEFORE_START',
      fields.id,
      `Entity "${name}" ends before it starts`
    );
  }

  return { id: fields.id, name, start: fields.start, end };
}

// =============================================================================
// Timelines
// =============================================================================

/**
 * A named, curated view. The expression is kept as authored; it is only
 * parsed at resolution time.
 */
export interface Timeline {
  readonly id: TimelineId;
  readonly name: string;
  readonly boolExpression: string | null;
}

/** Id and name only, as listed beside a count */
export interface ReducedTimeline {
  readonly id: TimelineId;
  readonly name: string;
}

/**
 * Everything needed to draw a timeline: its own identity plus every entity
 * contributed by it and its subtimelines, in chronological order.
 */
export interface TimelineView {
  readonly id: TimelineId;
  readonly name: string;
  readonly entities: readonly Entity[];
}

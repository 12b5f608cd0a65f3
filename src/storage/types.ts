/**
 * Storage types and interfaces.
 * The engine only reads; every write belongs to the storage collaborator.
 */

import type { EntityId, TimelineId } from '@engine/types';
import type { Entity, Tag, Timeline } from '@engine/models';

// =============================================================================
// Read-only Store Interface
// =============================================================================

/**
 * Read-only accessor the resolution engine consumes.
 * Implementations can wrap a database, a backup file, or plain memory.
 * A null result means the record does not exist.
 */
export interface TimelineStore {
  /**
   * Get an entity by ID.
   */
  getEntity(id: EntityId): Promise<Entity | null>;

  /**
   * List every entity (the candidate universe for expression matching).
   */
  listEntities(): Promise<readonly Entity[]>;

  /**
   * Get an entity's tags. Duplicates and anonymous tags are kept.
   */
  getTags(entityId: EntityId): Promise<readonly Tag[]>;

  /**
   * Get a timeline by ID.
   */
  getTimeline(id: TimelineId): Promise<Timeline | null>;

  /**
   * List every timeline.
   */
  listTimelines(): Promise<readonly Timeline[]>;

  /**
   * Direct children of a timeline in the subtimeline relation.
   */
  listSubtimelineChildren(parentId: TimelineId): Promise<readonly TimelineId[]>;

  /**
   * Entities explicitly linked to a timeline.
   */
  listLinkedEntities(timelineId: TimelineId): Promise<readonly EntityId[]>;
}

// =============================================================================
// Relational Records
// =============================================================================

export interface EntityTagRecord {
  readonly entityId: EntityId;
  readonly tag: Tag;
}

export interface TimelineTagRecord {
  readonly timelineId: TimelineId;
  readonly tag: Tag;
}

export interface SubtimelineEdge {
  readonly parentId: TimelineId;
  readonly childId: TimelineId;
}

export interface TimelineEntityLink {
  readonly timelineId: TimelineId;
  readonly entityId: EntityId;
}

/**
 * The full relational content of a store, one array per table.
 * Nothing here is checked for dangling references; the engine tolerates them.
 */
export interface TimelineDataset {
  readonly entities: readonly Entity[];
  readonly entityTags: readonly EntityTagRecord[];
  readonly timelines: readonly Timeline[];
  readonly timelineTags: readonly TimelineTagRecord[];
  readonly subtimelines: readonly SubtimelineEdge[];
  readonly timelineEntities: readonly TimelineEntityLink[];
}

export function createEmptyDataset(): TimelineDataset {
  return {
    entities: [],
    entityTags: [],
    timelines: [],
    timelineTags: [],
    subtimelines: [],
    timelineEntities: [],
  };
}

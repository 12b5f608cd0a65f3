/**
 * Resolution pipeline types.
 */

import type { EntityId, TimelineId } from '../types';
import type { Entity, Tag, Timeline, TimelineView } from '../models';
import type { CycleError, NotFoundError, ParseError, ResolutionError, ResolutionWarning } from '../errors';
import type { ExpressionCache } from '../expression/cache';

// =============================================================================
// Snapshot
// =============================================================================

/**
 * Everything one resolution reads, fetched up front.
 *
 * `timelines` holds every existing timeline reachable from the root; ids
 * reached through an edge but absent here are dangling. `children` and
 * `links` are keyed by those same timelines.
 */
export interface ResolutionSnapshot {
  readonly rootId: TimelineId;
  readonly timelines: ReadonlyMap<TimelineId, Timeline>;
  readonly children: ReadonlyMap<TimelineId, readonly TimelineId[]>;
  readonly links: ReadonlyMap<TimelineId, readonly EntityId[]>;
  /** Candidate universe, in store order */
  readonly entities: ReadonlyMap<EntityId, Entity>;
  readonly tags: ReadonlyMap<EntityId, readonly Tag[]>;
  /** Tag name -> entities carrying at least one tag of that name */
  readonly tagIndex: ReadonlyMap<string, ReadonlySet<EntityId>>;
}

/**
 * The part of a snapshot the graph resolver needs.
 */
export interface SubtimelineGraph {
  hasTimeline(id: TimelineId): boolean;
  childrenOf(id: TimelineId): readonly TimelineId[];
}

// =============================================================================
// Outcomes
// =============================================================================

export type GraphOutcome =
  | {
      readonly success: true;
      /** Root first, depth-first pre-order, no duplicates */
      readonly timelineIds: readonly TimelineId[];
      readonly warnings: readonly ResolutionWarning[];
    }
  | { readonly success: false; readonly error: CycleError | NotFoundError };

export type ComposeOutcome =
  | {
      readonly success: true;
      /** Insertion-ordered, no duplicates */
      readonly entityIds: ReadonlySet<EntityId>;
      readonly warnings: readonly ResolutionWarning[];
    }
  | { readonly success: false; readonly error: ParseError };

export type RenderResult =
  | {
      readonly success: true;
      readonly view: TimelineView;
      readonly contributingTimelineIds: readonly TimelineId[];
      readonly warnings: readonly ResolutionWarning[];
    }
  | { readonly success: false; readonly error: ResolutionError };

// =============================================================================
// Options
// =============================================================================

export interface ResolutionOptions {
  /** Shared parse cache; each resolution parses into a fresh one when omitted */
  readonly expressionCache?: ExpressionCache;
}

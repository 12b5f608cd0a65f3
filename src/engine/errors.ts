/**
 * Resolution failures.
 *
 * Every condition a resolution can detect is one of three kinds. None of them
 * is retried: cycles and parse failures are facts of the data, and missing
 * records stay missing within one snapshot.
 */

import type { EntityId, RecordKind, TimelineId } from './types';

// =============================================================================
// Error Types (Discriminated by `kind`)
// =============================================================================

export type ResolutionErrorKind =
  | 'PARSE'
  | 'CYCLE'
  | 'NOT_FOUND';

export abstract class ResolutionFailure extends Error {
  abstract readonly kind: ResolutionErrorKind;
}

/**
 * A malformed boolean tag expression.
 * `position` is the zero-based offset of the offending character.
 */
export class ParseError extends ResolutionFailure {
  readonly kind = 'PARSE' as const;
  readonly position: number;
  readonly reason: string;
  readonly expression: string;
  readonly timelineId: TimelineId | null;

  constructor(
    position: number,
    reason: string,
    expression: string,
    timelineId: TimelineId | null = null
  ) {
    const owner = timelineId === null ? '' : ` in timeline ${timelineId}`;
    super(`Invalid expression${owner} at position ${position}: ${reason}`);
    this.name = 'ParseError';
    this.position = position;
    this.reason = reason;
    this.expression = expression;
    this.timelineId = timelineId;
  }

  /** The same error, attributed to the timeline that owns the expression */
  forTimeline(timelineId: TimelineId): ParseError {
    return new ParseError(this.position, this.reason, this.expression, timelineId);
  }
}

/**
 * A subtimeline chain that re-enters one of its own ancestors.
 * `path` starts and ends at the re-entered timeline, e.g. [A, B, A].
 */
export class CycleError extends ResolutionFailure {
  readonly kind = 'CYCLE' as const;
  readonly path: readonly TimelineId[];

  constructor(path: readonly TimelineId[]) {
    super(`Subtimeline cycle: ${path.join(' -> ')}`);
    this.name = 'CycleError';
    this.path = path;
  }
}

/** A referenced entity or timeline that no longer exists */
export class NotFoundError extends ResolutionFailure {
  readonly kind = 'NOT_FOUND' as const;
  readonly recordKind: RecordKind;
  readonly id: EntityId | TimelineId;

  constructor(recordKind: RecordKind, id: EntityId | TimelineId) {
    super(`${recordKind === 'ENTITY' ? 'Entity' : 'Timeline'} not found: ${id}`);
    this.name = 'NotFoundError';
    this.recordKind = recordKind;
    this.id = id;
  }
}

export type ResolutionError = ParseError | CycleError | NotFoundError;

// =============================================================================
// Warnings
// =============================================================================

/**
 * A dangling reference skipped during resolution.
 * `referencedBy` is the timeline whose link or edge pointed at the record.
 */
export interface ResolutionWarning {
  readonly type: 'DanglingEntityLink' | 'DanglingSubtimeline';
  readonly referencedBy: TimelineId;
  readonly error: NotFoundError;
}

export function describeWarning(warning: ResolutionWarning): string {
  const what = warning.type === 'DanglingEntityLink' ? 'links missing entity' : 'includes missing subtimeline';
  return `Timeline ${warning.referencedBy} ${what} ${warning.error.id}`;
}

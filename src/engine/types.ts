/**
 * Core type definitions for the timeline resolution engine.
 *
 * Identifiers are opaque strings owned by the storage layer; the engine
 * never mints them.
 */

// =============================================================================
// ID Types
// =============================================================================

/** Unique identifier for an entity (person, event, period) */
export type EntityId = string;

/** Unique identifier for a timeline */
export type TimelineId = string;

/** Year value (may be negative for BCE) */
export type Year = number;

/** Month value (1-12) */
export type Month = number;

/** Day value (1-31) */
export type Day = number;

// =============================================================================
// Constants
// =============================================================================

/** Earliest year a date may carry */
export const MIN_YEAR: Year = -50000;

/** Latest year a date may carry */
export const MAX_YEAR: Year = 10000;

/** Number of parsed expressions kept by the default expression cache */
export const EXPRESSION_CACHE_SIZE = 256;

/** Entities shown per "order entities" round */
export const ORDER_ENTITIES_MIN = 4;
export const ORDER_ENTITIES_MAX = 15;

/** Options offered per multiple-choice quiz question */
export const QUIZ_OPTION_COUNT = 3;

// =============================================================================
// Enums
// =============================================================================

/** Kinds of record the engine reads from storage */
export type RecordKind =
  | 'ENTITY'
  | 'TIMELINE';

/**
 * Types for boolean tag expressions.
 *
 * Source text is tokenized by the lexer, then compiled by the parser into a
 * Predicate tree that the evaluator runs against one tag multiset.
 */

import type { ParseError } from '../errors';

// =============================================================================
// Tokens
// =============================================================================

export type TokenType =
  | 'IDENT'
  | 'STRING'
  | 'EQUALS'
  | 'NOT_EQUALS'
  | 'LPAREN'
  | 'RPAREN'
  | 'AND'
  | 'OR'
  | 'NOT'
  | 'EXISTS'
  | 'NOT_LOWER'
  | 'EOF';

export interface Token {
  readonly type: TokenType;

  /** Identifier name, or the unescaped string value */
  readonly text: string;

  /** Zero-based offset of the token's first character */
  readonly position: number;
}

/** Words with a fixed meaning; they cannot be used as tag names */
export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
  ['AND', 'AND'],
  ['OR', 'OR'],
  ['NOT', 'NOT'],
  ['exists', 'EXISTS'],
  ['not', 'NOT_LOWER'],
]);

// =============================================================================
// Predicate Tree (Discriminated Union)
// =============================================================================

/** `name = "value"` */
export interface EqualsPredicate {
  readonly type: 'Equals';
  readonly name: string;
  readonly value: string;
}

/** `name != "value"` */
export interface NotEqualsPredicate {
  readonly type: 'NotEquals';
  readonly name: string;
  readonly value: string;
}

/** `name exists` */
export interface ExistsPredicate {
  readonly type: 'Exists';
  readonly name: string;
}

/** `name not exists` */
export interface NotExistsPredicate {
  readonly type: 'NotExists';
  readonly name: string;
}

export interface AndPredicate {
  readonly type: 'And';
  readonly operands: readonly Predicate[];
}

export interface OrPredicate {
  readonly type: 'Or';
  readonly operands: readonly Predicate[];
}

export interface NotPredicate {
  readonly type: 'Not';
  readonly operand: Predicate;
}

export type LeafPredicate =
  | EqualsPredicate
  | NotEqualsPredicate
  | ExistsPredicate
  | NotExistsPredicate;

export type Predicate =
  | LeafPredicate
  | AndPredicate
  | OrPredicate
  | NotPredicate;

// =============================================================================
// Parse Outcome
// =============================================================================

/**
 * Result of parsing an expression.
 * A null predicate means the expression was empty: it matches nothing.
 */
export type ParseOutcome =
  | { readonly success: true; readonly predicate: Predicate | null }
  | { readonly success: false; readonly error: ParseError };

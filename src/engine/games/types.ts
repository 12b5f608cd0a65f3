/**
 * Shared quiz game types.
 *
 * A game is a pair of pure functions: one draws a question from an entity
 * pool using a SeededRNG, the other marks an answer. Each question carries
 * its own correct answer, so marking needs no other state.
 */

import type { Entity } from '../models';
import type { SeededRNG } from '../rng';

// =============================================================================
// Errors
// =============================================================================

export type GameErrorCode =
  | 'NO_CORRECT_ANSWER'
  | 'POOL_NOT_FULL_ENOUGH'
  | 'GENERATING_QUESTION';

export class GameError extends Error {
  readonly code: GameErrorCode;

  constructor(code: GameErrorCode, message: string) {
    super(message);
    this.name = 'GameError';
    this.code = code;
  }
}

// =============================================================================
// Rounds
// =============================================================================

export type AnswerOutcome = 'CORRECT' | 'INCORRECT';

export type RoundResult<Q> =
  | { readonly success: true; readonly question: Q }
  | { readonly success: false; readonly error: GameError };

/** Redraws allowed before a round gives up on producing a fair question */
export const MAX_QUESTION_ATTEMPTS = 10;

export interface Game<Q, A> {
  readonly description: string;
  setupRound(pool: readonly Entity[], rng: SeededRNG): RoundResult<Q>;
  checkAnswer(question: Q, answer: A): AnswerOutcome;
}

export function poolTooSmall<Q>(needed: number, available: number): RoundResult<Q> {
  return {
    success: false,
    error: new GameError(
      'POOL_NOT_FULL_ENOUGH',
      `Need at least ${needed} suitable entities, found ${available}`
    ),
  };
}

// =============================================================================
// Stats
// =============================================================================

export interface GameStats {
  readonly round: number;
  readonly correct: number;
  readonly incorrect: number;
}

export function createStats(): GameStats {
  return { round: 0, correct: 0, incorrect: 0 };
}

export function startRound(stats: GameStats): GameStats {
  return { ...stats, round: stats.round + 1 };
}

export function recordAnswer(stats: GameStats, outcome: AnswerOutcome): GameStats {
  return outcome === 'CORRECT'
    ? { ...stats, correct: stats.correct + 1 }
    : { ...stats, incorrect: stats.incorrect + 1 };
}

/**
 * Whole-number percentage of answered rounds that were correct (0 before
 * any answer).
 */
export function percentCorrect(stats: GameStats): number {
  const answered = stats.correct + stats.incorrect;
  if (answered === 0) return 0;
  return Math.floor((100 * stats.correct) / answered);
}

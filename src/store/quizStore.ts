/**
 * Quiz session state using Zustand.
 *
 * Drives any Game over an entity pool. All randomness comes from one
 * SeededRNG, so a session replays exactly from its seed.
 */

import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type { Entity } from '@engine/models';
import { SeededRNG } from '@engine/rng';
import { GameError, createStats, recordAnswer, startRound } from '@engine/games/types';
import type { AnswerOutcome, Game, GameStats } from '@engine/games/types';

// =============================================================================
// Store Interface
// =============================================================================

export interface QuizState<Q, A> {
  // State
  game: Game<Q, A>;
  pool: readonly Entity[];
  rng: SeededRNG;
  stats: GameStats;
  question: Q | null;
  /** Whether the current question has been marked */
  answered: boolean;
  lastAnswer: AnswerOutcome | null;
  error: GameError | null;

  /**
   * Reset stats and the question. A new seed restarts the sequence from it;
   * otherwise the current seed's sequence is replayed.
   */
  newGame: (seed?: number) => void;

  setPool: (entities: readonly Entity[]) => void;

  /**
   * Draw the next question. Returns false (and records `error`) when the
   * pool cannot produce one.
   */
  nextRound: () => boolean;

  /**
   * Mark an answer to the current question. Returns null when there is no
   * unanswered question.
   */
  answer: (choice: A) => AnswerOutcome | null;
}

// =============================================================================
// Store Implementation
// =============================================================================

export function createQuizStore<Q, A>(
  game: Game<Q, A>,
  entities: readonly Entity[],
  seed: number
): StoreApi<QuizState<Q, A>> {
  return createStore<QuizState<Q, A>>()((set, get) => ({
    game,
    pool: entities,
    rng: new SeededRNG(seed),
    stats: createStats(),
    question: null,
    answered: false,
    lastAnswer: null,
    error: null,

    newGame: (nextSeed?: number) => {
      const { rng } = get();
      let fresh: SeededRNG;
      if (nextSeed === undefined) {
        rng.reset();
        fresh = rng;
      } else {
        fresh = new SeededRNG(nextSeed);
      }
      set({
        rng: fresh,
        stats: createStats(),
        question: null,
        answered: false,
        lastAnswer: null,
        error: null,
      });
    },

    setPool: (pool: readonly Entity[]) => {
      set({ pool });
    },

    nextRound: () => {
      const { game: current, pool, rng, stats } = get();
      const result = current.setupRound(pool, rng);

      if (!result.success) {
        set({ question: null, answered: false, error: result.error });
        console.warn('[QuizStore] Could not set up round:', result.error.message);
        return false;
      }

      set({
        question: result.question,
        answered: false,
        stats: startRound(stats),
        error: null,
      });
      return true;
    },

    answer: (choice: A) => {
      const { game: current, question, answered, stats } = get();
      if (question === null || answered) {
        set({ error: new GameError('NO_CORRECT_ANSWER', 'There is no open question to answer') });
        return null;
      }

      const outcome = current.checkAnswer(question, choice);
      set({
        stats: recordAnswer(stats, outcome),
        answered: true,
        lastAnswer: outcome,
        error: null,
      });
      return outcome;
    },
  }));
}

/**
 * Decades: pick the decade an entity started (or ended) in from a short list.
 */

import { decadeOf } from '../date';
import type { Year } from '../types';
import { QUIZ_OPTION_COUNT } from '../types';
import type { Entity } from '../models';
import type { SeededRNG } from '../rng';
import { poolTooSmall } from './types';
import type { AnswerOutcome, Game, RoundResult } from './types';

export type DecadesVariant = 'DECADE_OF_START' | 'DECADE_OF_END';

export interface DecadesQuestion {
  readonly entity: Entity;
  /** Shuffled; exactly one is `correct` */
  readonly options: readonly Year[];
  readonly correct: Year;
}

/**
 * Distinct wrong decades, each 10 to 250 years away from the correct one.
 */
export function generateIncorrectDecades(count: number, correct: Year, rng: SeededRNG): Year[] {
  const incorrect = new Set<Year>();
  while (incorrect.size < count) {
    const distance = 10 * rng.nextInt(1, 5) * rng.nextInt(1, 5);
    incorrect.add(rng.nextBoolean() ? correct + distance : correct - distance);
  }
  return [...incorrect];
}

export function createDecadesGame(
  variant: DecadesVariant = 'DECADE_OF_START'
): Game<DecadesQuestion, Year> {
  const yearOf = (entity: Entity): Year | null =>
    variant === 'DECADE_OF_START' ? entity.start.year : (entity.end?.year ?? null);

  return {
    description: 'Put entities into the correct decade',

    setupRound(pool: readonly Entity[], rng: SeededRNG): RoundResult<DecadesQuestion> {
      const eligible = pool.filter(entity => yearOf(entity) !== null);
      const entity = rng.pick(eligible);
      const year = entity ? yearOf(entity) : null;
      if (!entity || year === null) {
        return poolTooSmall(1, eligible.length);
      }

      const correct = decadeOf(year);
      const incorrect = generateIncorrectDecades(QUIZ_OPTION_COUNT - 1, correct, rng);
      const options = rng.shuffle([correct, ...incorrect]);
      return { success: true, question: { entity, options, correct } };
    },

    checkAnswer(question: DecadesQuestion, answer: Year): AnswerOutcome {
      return answer === question.correct ? 'CORRECT' : 'INCORRECT';
    },
  };
}

/**
 * Which date: enter the year or decade in which an entity started (or ended).
 */

import { decadeOf } from '../date';
import type { Year } from '../types';
import type { Entity } from '../models';
import type { SeededRNG } from '../rng';
import { poolTooSmall } from './types';
import type { AnswerOutcome, Game, RoundResult } from './types';

export type WhichDateVariant = 'START_DATE' | 'END_DATE';
export type YearOrDecade = 'YEAR' | 'DECADE';

export interface WhichDateQuestion {
  readonly entity: Entity;
  readonly correct: Year;
}

export interface WhichDateOptions {
  readonly variant?: WhichDateVariant;
  readonly yearOrDecade?: YearOrDecade;
}

export function createWhichDateGame(
  options: WhichDateOptions = {}
): Game<WhichDateQuestion, Year> {
  const variant = options.variant ?? 'START_DATE';
  const yearOrDecade = options.yearOrDecade ?? 'YEAR';

  const yearOf = (entity: Entity): Year | null =>
    variant === 'START_DATE' ? entity.start.year : (entity.end?.year ?? null);

  return {
    description: `What is the ${variant === 'START_DATE' ? 'start' : 'end'} ${yearOrDecade === 'YEAR' ? 'year' : 'decade'}?`,

    setupRound(pool: readonly Entity[], rng: SeededRNG): RoundResult<WhichDateQuestion> {
      const eligible = pool.filter(entity => yearOf(entity) !== null);
      const entity = rng.pick(eligible);
      const year = entity ? yearOf(entity) : null;
      if (!entity || year === null) {
        return poolTooSmall(1, eligible.length);
      }

      const correct = yearOrDecade === 'DECADE' ? decadeOf(year) : year;
      return { success: true, question: { entity, correct } };
    },

    checkAnswer(question: WhichDateQuestion, answer: Year): AnswerOutcome {
      return answer === question.correct ? 'CORRECT' : 'INCORRECT';
    },
  };
}

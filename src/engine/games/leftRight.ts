/**
 * Left/right: which of two entities started (or ended) first?
 */

import { compareDates } from '../date';
import type { PartialDate } from '../date';
import type { Entity } from '../models';
import type { SeededRNG } from '../rng';
import { GameError, MAX_QUESTION_ATTEMPTS, poolTooSmall } from './types';
import type { AnswerOutcome, Game, RoundResult } from './types';

export type LeftRightVariant = 'FIRST_STARTED' | 'FIRST_ENDED';
export type LeftOrRight = 'LEFT' | 'RIGHT';

export interface LeftRightQuestion {
  readonly left: Entity;
  readonly right: Entity;
  readonly correct: LeftOrRight;
}

function dateFor(entity: Entity, variant: LeftRightVariant): PartialDate | null {
  return variant === 'FIRST_STARTED' ? entity.start : entity.end;
}

export function createLeftRightGame(
  variant: LeftRightVariant = 'FIRST_STARTED'
): Game<LeftRightQuestion, LeftOrRight> {
  return {
    description: variant === 'FIRST_STARTED'
      ? 'Which started first, left or right?'
      : 'Which ended first, left or right?',

    setupRound(pool: readonly Entity[], rng: SeededRNG): RoundResult<LeftRightQuestion> {
      const eligible = pool.filter(entity => dateFor(entity, variant) !== null);
      if (eligible.length < 2) {
        return poolTooSmall(2, eligible.length);
      }

      // Equal dates have no right answer, so draw again
      for (let attempt = 0; attempt < MAX_QUESTION_ATTEMPTS; attempt++) {
        const [left, right] = rng.sample(eligible, 2);
        if (!left || !right) break;
        const leftDate = dateFor(left, variant);
        const rightDate = dateFor(right, variant);
        if (!leftDate || !rightDate) break;

        const order = compareDates(leftDate, rightDate);
        if (order !== 0) {
          return { success: true, question: { left, right, correct: order < 0 ? 'LEFT' : 'RIGHT' } };
        }
      }

      return {
        success: false,
        error: new GameError('GENERATING_QUESTION', 'Could not find two entities with different dates'),
      };
    },

    checkAnswer(question: LeftRightQuestion, answer: LeftOrRight): AnswerOutcome {
      return answer === question.correct ? 'CORRECT' : 'INCORRECT';
    },
  };
}

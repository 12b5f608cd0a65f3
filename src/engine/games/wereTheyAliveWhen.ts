/**
 * Were they alive when: true/false questions pairing a person with an event.
 */

import { compareAtSharedPrecision } from '../date';
import type { PartialDate } from '../date';
import type { Entity } from '../models';
import type { SeededRNG } from '../rng';
import { poolTooSmall } from './types';
import type { AnswerOutcome, Game, RoundResult } from './types';

export type EventMoment = 'STARTED' | 'ENDED';

export interface AliveWhenQuestion {
  readonly person: Entity;
  readonly event: Entity;
  readonly moment: EventMoment;
  readonly text: string;
  readonly correct: boolean;
}

/**
 * Whether a person's lifespan covers a moment. A person with no end date is
 * taken to be alive from their start onwards.
 *
 * Bounds are compared at the precision both dates share, so a death in 1918
 * still covers 11 Nov 1918.
 */
export function wasAliveAt(person: Entity, moment: PartialDate): boolean {
  if (compareAtSharedPrecision(person.start, moment) > 0) return false;
  return person.end === null || compareAtSharedPrecision(person.end, moment) >= 0;
}

/**
 * Build the question for one pairing. "Ended" falls back to "started" for an
 * event with no end date.
 */
export function buildAliveWhenQuestion(
  person: Entity,
  event: Entity,
  moment: EventMoment
): AliveWhenQuestion {
  if (moment === 'ENDED' && event.end !== null) {
    return {
      person,
      event,
      moment: 'ENDED',
      text: `Was ${person.name} alive when ${event.name} ended?`,
      correct: wasAliveAt(person, event.end),
    };
  }
  return {
    person,
    event,
    moment: 'STARTED',
    text: `Was ${person.name} alive when ${event.name} started?`,
    correct: wasAliveAt(person, event.start),
  };
}

/**
 * @param isPerson - Splits the pool into people and everything else
 */
export function createWereTheyAliveWhenGame(
  isPerson: (entity: Entity) => boolean
): Game<AliveWhenQuestion, boolean> {
  return {
    description: 'State whether the person was alive when some event happened/started/ended',

    setupRound(pool: readonly Entity[], rng: SeededRNG): RoundResult<AliveWhenQuestion> {
      const people = pool.filter(isPerson);
      const events = pool.filter(entity => !isPerson(entity));
      const person = rng.pick(people);
      const event = rng.pick(events);
      if (!person || !event) {
        return poolTooSmall(1, Math.min(people.length, events.length));
      }

      const moment: EventMoment = rng.nextBoolean() ? 'STARTED' : 'ENDED';
      return { success: true, question: buildAliveWhenQuestion(person, event, moment) };
    },

    checkAnswer(question: AliveWhenQuestion, answer: boolean): AnswerOutcome {
      return answer === question.correct ? 'CORRECT' : 'INCORRECT';
    },
  };
}

/**
 * Order entities: put a handful of entities in order of their start (or end)
 * date, earliest first.
 */

import { compareDates } from '../date';
import type { PartialDate } from '../date';
import type { EntityId } from '../types';
import { ORDER_ENTITIES_MAX, ORDER_ENTITIES_MIN } from '../types';
import type { Entity } from '../models';
import type { SeededRNG } from '../rng';
import { sortChronologically } from '../resolution/sorter';
import { poolTooSmall } from './types';
import type { AnswerOutcome, Game, RoundResult } from './types';

export type OrderEntitiesVariant = 'ORDER_BY_FIRST_STARTED' | 'ORDER_BY_FIRST_ENDED';

export interface OrderEntitiesOptions {
  readonly variant?: OrderEntitiesVariant;
  readonly minEntities?: number;
  readonly maxEntities?: number;
}

export interface OrderEntitiesQuestion {
  /** Shuffled */
  readonly entities: readonly Entity[];
  /** One valid ordering */
  readonly correct: readonly EntityId[];
}

export function createOrderEntitiesGame(
  options: OrderEntitiesOptions = {}
): Game<OrderEntitiesQuestion, readonly EntityId[]> {
  const variant = options.variant ?? 'ORDER_BY_FIRST_STARTED';
  const minEntities = options.minEntities ?? ORDER_ENTITIES_MIN;
  const maxEntities = options.maxEntities ?? ORDER_ENTITIES_MAX;
  if (minEntities < 2 || maxEntities < minEntities) {
    throw new Error(`Invalid entity range: ${minEntities}..${maxEntities}`);
  }

  const dateFor = (entity: Entity): PartialDate | null =>
    variant === 'ORDER_BY_FIRST_STARTED' ? entity.start : entity.end;

  const sortByDate = (entities: readonly Entity[]): Entity[] => {
    if (variant === 'ORDER_BY_FIRST_STARTED') return sortChronologically(entities);
    return [...entities].sort((a, b) => {
      const aEnd = dateFor(a);
      const bEnd = dateFor(b);
      if (!aEnd || !bEnd) return 0;
      return compareDates(aEnd, bEnd);
    });
  };

  return {
    description: variant === 'ORDER_BY_FIRST_STARTED'
      ? 'Order the entities by their start date (earliest at the top)'
      : 'Order the entities by their end date (earliest at the top)',

    setupRound(pool: readonly Entity[], rng: SeededRNG): RoundResult<OrderEntitiesQuestion> {
      const eligible = pool.filter(entity => dateFor(entity) !== null);
      if (eligible.length < minEntities) {
        return poolTooSmall(minEntities, eligible.length);
      }

      const count = rng.nextInt(minEntities, Math.min(maxEntities, eligible.length));
      const chosen = rng.sample(eligible, count);
      const correct = sortByDate(chosen).map(entity => entity.id);
      return { success: true, question: { entities: rng.shuffle(chosen), correct } };
    },

    /**
     * Any ordering of exactly the question's entities whose dates never go
     * backwards is correct, so entities sharing a date may come either way.
     */
    checkAnswer(question: OrderEntitiesQuestion, answer: readonly EntityId[]): AnswerOutcome {
      const byId = new Map(question.entities.map(entity => [entity.id, entity]));
      if (answer.length !== byId.size || new Set(answer).size !== answer.length) {
        return 'INCORRECT';
      }

      let previous: PartialDate | null = null;
      for (const id of answer) {
        const entity = byId.get(id);
        const date = entity ? dateFor(entity) : null;
        if (!date) return 'INCORRECT';
        if (previous && compareDates(previous, date) > 0) return 'INCORRECT';
        previous = date;
      }
      return 'CORRECT';
    },
  };
}

/**
 * Predicate evaluation against one tag multiset.
 *
 * Absence is never a third truth value. `!=` in particular needs the tag to
 * be present: an entity with no "conflict" tag at all does not satisfy
 * `conflict != "war"`.
 */

import type { Tag } from '../models';
import type { LeafPredicate, Predicate } from './types';

/**
 * Evaluate a predicate against a tag multiset.
 * Deterministic and side-effect free.
 */
export function evaluatePredicate(predicate: Predicate, tags: readonly Tag[]): boolean {
  switch (predicate.type) {
    case 'And':
      return predicate.operands.every(operand => evaluatePredicate(operand, tags));

    case 'Or':
      return predicate.operands.some(operand => evaluatePredicate(operand, tags));

    case 'Not':
      return !evaluatePredicate(predicate.operand, tags);

    default:
      return evaluateLeaf(predicate, tags);
  }
}

function evaluateLeaf(leaf: LeafPredicate, tags: readonly Tag[]): boolean {
  const named = tags.filter(tag => tag.name === leaf.name);

  switch (leaf.type) {
    case 'Equals':
      return named.some(tag => tag.value === leaf.value);

    case 'NotEquals':
      return named.length > 0 && named.every(tag => tag.value !== leaf.value);

    case 'Exists':
      return named.length > 0;

    case 'NotExists':
      return named.length === 0;
  }
}

/**
 * Tag names a predicate refers to, in first-seen order.
 */
export function referencedTagNames(predicate: Predicate): readonly string[] {
  const names = new Set<string>();
  const visit = (node: Predicate): void => {
    switch (node.type) {
      case 'And':
      case 'Or':
        node.operands.forEach(visit);
        return;
      case 'Not':
        visit(node.operand);
        return;
      default:
        names.add(node.name);
    }
  };
  visit(predicate);
  return [...names];
}

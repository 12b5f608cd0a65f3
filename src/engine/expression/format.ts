/**
 * Canonical text for a predicate tree.
 *
 * The output parses back to an equal tree, so it can be stored in place of
 * the author's text once an expression has been validated.
 */

import type { Predicate } from './types';

/** Binding strength, higher binds tighter */
function precedence(predicate: Predicate): number {
  switch (predicate.type) {
    case 'Or':
      return 1;
    case 'And':
      return 2;
    case 'Not':
      return 3;
    default:
      return 4;
  }
}

export function quoteValue(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t')
    .replace(/\r/g, '\\r');
  return `"${escaped}"`;
}

export function formatPredicate(predicate: Predicate): string {
  const wrap = (child: Predicate, minimum: number): string => {
    const text = formatPredicate(child);
    return precedence(child) < minimum ? `(${text})` : text;
  };

  switch (predicate.type) {
    case 'Or':
      return predicate.operands.map(operand => wrap(operand, 2)).join(' OR ');
    case 'And':
      return predicate.operands.map(operand => wrap(operand, 3)).join(' AND ');
    case 'Not':
      return `NOT ${wrap(predicate.operand, 3)}`;
    case 'Equals':
      return `${predicate.name} = ${quoteValue(predicate.value)}`;
    case 'NotEquals':
      return `${predicate.name} != ${quoteValue(predicate.value)}`;
    case 'Exists':
      return `${predicate.name} exists`;
    case 'NotExists':
      return `${predicate.name} not exists`;
  }
}

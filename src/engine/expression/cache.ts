/**
 * Memoised expression parsing.
 *
 * One expression is typically evaluated against many entities, and the same
 * text is often shared by several timelines. Outcomes (including failures)
 * are cached by exact source text, least recently used evicted first.
 */

import { EXPRESSION_CACHE_SIZE } from '../types';
import { parseExpression } from './parser';
import type { ParseOutcome } from './types';

export class ExpressionCache {
  private readonly entries = new Map<string, ParseOutcome>();
  private readonly capacity: number;
  private hitCount = 0;
  private missCount = 0;

  constructor(capacity: number = EXPRESSION_CACHE_SIZE) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Invalid cache capacity: ${capacity}`);
    }
    this.capacity = capacity;
  }

  /**
   * Parse an expression, reusing a previous outcome for the same text.
   */
  parse(expression: string | null | undefined): ParseOutcome {
    if (expression === null || expression === undefined) {
      return parseExpression(expression);
    }

    const cached = this.entries.get(expression);
    if (cached) {
      this.hitCount++;
      // Re-insert to mark as most recently used
      this.entries.delete(expression);
      this.entries.set(expression, cached);
      return cached;
    }

    this.missCount++;
    const outcome = parseExpression(expression);
    this.entries.set(expression, outcome);

    if (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }

    return outcome;
  }

  get size(): number {
    return this.entries.size;
  }

  getStats(): { hits: number; misses: number; size: number } {
    return { hits: this.hitCount, misses: this.missCount, size: this.entries.size };
  }

  clear(): void {
    this.entries.clear();
    this.hitCount = 0;
    this.missCount = 0;
  }
}

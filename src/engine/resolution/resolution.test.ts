/**
 * Tests for timeline resolution.
 *
 * Tests cover:
 * - renderTimeline() end to end over an in-memory store
 * - Cycle detection, diamond absorption and dangling references
 * - Union composition and chronological ordering
 * - Snapshot loading reads only what the resolution needs
 */

import { describe, it, expect, vi } from 'vitest';
import { CycleError, NotFoundError, ParseError } from '../errors';
import type { ResolutionError } from '../errors';
import { ExpressionCache } from '../expression/cache';
import { parseExpression } from '../expression/parser';
import { createTestEntity, createTestStore } from '../../test/factories';
import type { TestEntity, TestTimeline } from '../../test/factories';
import { composeEntitySet, matchingEntities } from './composer';
import { resolveContributing } from './graph';
import { renderTimeline } from './pipeline';
import { loadResolutionSnapshot } from './snapshot';
import { compareEntities, sortChronologically } from './sorter';
import type { RenderResult, SubtimelineGraph } from './types';

// =============================================================================
// Test Helpers
// =============================================================================

async function render(
  entities: readonly TestEntity[],
  timelines: readonly TestTimeline[],
  rootId: string
): Promise<RenderResult> {
  return renderTimeline(createTestStore(entities, timelines), rootId);
}

async function renderIds(
  entities: readonly TestEntity[],
  timelines: readonly TestTimeline[],
  rootId: string
): Promise<string[]> {
  const result = await render(entities, timelines, rootId);
  if (!result.success) {
    throw new Error(`Expected ${rootId} to resolve: ${result.error.message}`);
  }
  return result.view.entities.map(entity => entity.id);
}

async function renderError(
  entities: readonly TestEntity[],
  timelines: readonly TestTimeline[],
  rootId: string
): Promise<ResolutionError> {
  const result = await render(entities, timelines, rootId);
  if (result.success) {
    throw new Error(`Expected ${rootId} to fail`);
  }
  return result.error;
}

/**
 * Graph from a plain adjacency record; ids missing from it do not exist.
 */
function createTestGraph(adjacency: Record<string, string[]>): SubtimelineGraph {
  const edges = new Map(Object.entries(adjacency));
  return {
    hasTimeline: id => edges.has(id),
    childrenOf: id => edges.get(id) ?? [],
  };
}

// =============================================================================
// End to End
// =============================================================================

describe('renderTimeline', () => {
  const entities: TestEntity[] = [
    { id: 'A', start: [1917, 4, 6], tags: [['note', 'linked only']] },
    { id: 'B', start: [1914], tags: [['era', 'ww1']] },
    { id: 'C', start: [1916, 3], tags: [['country', 'France']] },
    { id: 'D', start: [1918, 11, 11], tags: [['era', 'ww1'], ['country', 'Germany']] },
    { id: 'E', start: [1939, 9, 1], tags: [['era', 'ww2']] },
  ];
  const timelines: TestTimeline[] = [
    { id: 'T', name: 'The Great War', expression: 'era = "ww1"', links: ['A'], children: ['S'] },
    { id: 'S', name: 'Nations', expression: 'country exists' },
  ];

  it('orders entities by date regardless of which rule contributed them', async () => {
    const result = await render(entities, timelines, 'T');
    expect(result.success).toBe(true);
    if (!result.success) return;

    expect(result.view.id).toBe('T');
    expect(result.view.name).toBe('The Great War');
    expect(result.view.entities.map(e => e.id)).toEqual(['B', 'C', 'A', 'D']);
    expect(result.contributingTimelineIds).toEqual(['T', 'S']);
    expect(result.warnings).toEqual([]);
  });

  it('renders a subtimeline on its own', async () => {
    expect(await renderIds(entities, timelines, 'S')).toEqual(['C', 'D']);
  });

  it('contributes only links when the expression is empty', async () => {
    const ids = await renderIds(entities, [{ id: 'T', expression: '   ', links: ['E', 'B'] }], 'T');
    expect(ids).toEqual(['B', 'E']);
  });

  it('fails with NotFoundError for a missing root', async () => {
    const error = await renderError(entities, timelines, 'nope');
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.kind).toBe('NOT_FOUND');
    expect(error.message).toBe('Timeline not found: nope');
  });

  it('propagates storage failures', async () => {
    const store = createTestStore(entities, timelines);
    vi.spyOn(store, 'getTimeline').mockRejectedValue(new Error('disk unavailable'));
    await expect(renderTimeline(store, 'T')).rejects.toThrow('disk unavailable');
  });
});

// =============================================================================
// Graph Resolution
// =============================================================================

describe('resolveContributing', () => {
  it('lists the root first, then descendants depth-first', () => {
    const outcome = resolveContributing('R', createTestGraph({
      R: ['X', 'Y'],
      X: ['X1'],
      X1: [],
      Y: [],
    }));
    expect(outcome).toEqual({ success: true, timelineIds: ['R', 'X', 'X1', 'Y'], warnings: [] });
  });

  it('visits a shared descendant once', () => {
    const outcome = resolveContributing('R', createTestGraph({
      R: ['X', 'Y'],
      X: ['Z'],
      Y: ['Z'],
      Z: [],
    }));
    expect(outcome.success && outcome.timelineIds).toEqual(['R', 'X', 'Z', 'Y']);
  });

  it('reports the full cycle path', () => {
    const outcome = resolveContributing('R', createTestGraph({
      R: ['A'],
      A: ['B'],
      B: ['C'],
      C: ['A'],
    }));
    expect(outcome.success).toBe(false);
    if (outcome.success) return;
    expect(outcome.error).toBeInstanceOf(CycleError);
    expect(outcome.error.kind === 'CYCLE' && outcome.error.path).toEqual(['A', 'B', 'C', 'A']);
  });

  it('treats a self-reference as a cycle', () => {
    const outcome = resolveContributing('A', createTestGraph({ A: ['A'] }));
    expect(outcome.success ? null : outcome.error.message).toBe('Subtimeline cycle: A -> A');
  });

  it('finds a cycle behind an already-visited branch', () => {
    const outcome = resolveContributing('R', createTestGraph({
      R: ['X', 'Y'],
      X: [],
      Y: ['X', 'Z'],
      Z: ['Y'],
    }));
    expect(outcome.success ? null : outcome.error.message).toBe('Subtimeline cycle: Y -> Z -> Y');
  });

  it('skips missing children with a warning', () => {
    const outcome = resolveContributing('R', createTestGraph({ R: ['gone', 'X'], X: [] }));
    expect(outcome.success).toBe(true);
    if (!outcome.success) return;
    expect(outcome.timelineIds).toEqual(['R', 'X']);
    expect(outcome.warnings).toHaveLength(1);
    expect(outcome.warnings[0]?.type).toBe('DanglingSubtimeline');
    expect(outcome.warnings[0]?.referencedBy).toBe('R');
    expect(outcome.warnings[0]?.error.id).toBe('gone');
  });

  it('fails for a missing root', () => {
    const outcome = resolveContributing('R', createTestGraph({}));
    expect(outcome.success ? null : outcome.error.kind).toBe('NOT_FOUND');
  });
});

describe('renderTimeline over cyclic data', () => {
  const entities: TestEntity[] = [{ id: 'e1', start: [1900] }];

  it('fails the whole root on a cycle', async () => {
    const error = await renderError(entities, [
      { id: 'A', links: ['e1'], children: ['B'] },
      { id: 'B', children: ['A'] },
    ], 'A');
    expect(error).toBeInstanceOf(CycleError);
    expect(error.message).toBe('Subtimeline cycle: A -> B -> A');
  });

  it('resolves a diamond with the shared entity once', async () => {
    const ids = await renderIds(entities, [
      { id: 'R', children: ['X', 'Y'] },
      { id: 'X', children: ['Z'], links: ['e1'] },
      { id: 'Y', children: ['Z'], links: ['e1'] },
      { id: 'Z', links: ['e1'] },
    ], 'R');
    expect(ids).toEqual(['e1']);
  });
});

// =============================================================================
// Composition
// =============================================================================

describe('composeEntitySet', () => {
  it('unions links and expression matches without duplicates', async () => {
    const ids = await renderIds(
      [
        { id: 'e1', start: [1914], tags: [['era', 'ww1']] },
        { id: 'e2', start: [1915], tags: [['era', 'ww1'], ['era', 'ww1']] },
      ],
      [
        { id: 'T', expression: 'era = "ww1"', links: ['e1', 'e1'], children: ['S'] },
        { id: 'S', expression: 'era exists', links: ['e2'] },
      ],
      'T'
    );
    expect(ids).toEqual(['e1', 'e2']);
  });

  it('matches untagged entities with a negated expression', async () => {
    const entities: TestEntity[] = [
      { id: 'bare', start: [1900] },
      { id: 'tagged', start: [1901], tags: [['era', 'ww2']] },
      { id: 'anonymous', start: [1902], tags: [[null, 'era']] },
    ];
    expect(await renderIds(entities, [{ id: 'T', expression: 'NOT era exists' }], 'T'))
      .toEqual(['bare', 'anonymous']);
    expect(await renderIds(entities, [{ id: 'T', expression: 'era != "ww1"' }], 'T'))
      .toEqual(['tagged']);
  });

  it('fails with the owning timeline on a malformed expression', async () => {
    const error = await renderError(
      [{ id: 'e1', start: [1914] }],
      [
        { id: 'T', links: ['e1'], children: ['S'] },
        { id: 'S', expression: 'era = "' },
      ],
      'T'
    );
    expect(error).toBeInstanceOf(ParseError);
    if (!(error instanceof ParseError)) return;
    expect(error.timelineId).toBe('S');
    expect(error.position).toBe(6);
    expect(error.message).toBe('Invalid expression in timeline S at position 6: Unterminated string');
  });

  it('skips dangling links with a logged warning', async () => {
    const result = await render(
      [{ id: 'e1', start: [1914] }],
      [{ id: 'T', links: ['e1', 'ghost'], children: ['lost'] }],
      'T'
    );
    expect(result.success).toBe(true);
    if (!result.success) return;

    expect(result.view.entities.map(e => e.id)).toEqual(['e1']);
    expect(result.warnings.map(w => [w.type, w.referencedBy, w.error.id])).toEqual([
      ['DanglingSubtimeline', 'T', 'lost'],
      ['DanglingEntityLink', 'T', 'ghost'],
    ]);
    expect(console.warn).toHaveBeenCalledWith('[Resolver] Timeline T includes missing subtimeline lost');
    expect(console.warn).toHaveBeenCalledWith('[Resolver] Timeline T links missing entity ghost');
  });

  it('parses each distinct expression once through a shared cache', async () => {
    const store = createTestStore(
      [{ id: 'e1', start: [1914], tags: [['era', 'ww1']] }],
      [
        { id: 'T', expression: 'era exists', children: ['S', 'U'] },
        { id: 'S', expression: 'era exists' },
        { id: 'U', expression: 'era = "ww1"' },
      ]
    );
    const expressionCache = new ExpressionCache();
    await renderTimeline(store, 'T', { expressionCache });
    await renderTimeline(store, 'T', { expressionCache });
    expect(expressionCache.getStats()).toEqual({ hits: 4, misses: 2, size: 2 });
  });

  it('parses into a fresh cache per render when none is shared', async () => {
    const parse = vi.spyOn(ExpressionCache.prototype, 'parse');
    const store = createTestStore(
      [{ id: 'e1', start: [1914], tags: [['era', 'ww1']] }],
      [{ id: 'T', expression: 'era exists' }]
    );
    await renderTimeline(store, 'T');
    await renderTimeline(store, 'T');

    expect(parse).toHaveBeenCalledTimes(2);
    const [first, second] = parse.mock.contexts;
    expect(first).toBeInstanceOf(ExpressionCache);
    expect(second).toBeInstanceOf(ExpressionCache);
    expect(first).not.toBe(second);
  });

  it('evaluates only entities carrying a referenced name', async () => {
    const store = createTestStore(
      [
        { id: 'e1', start: [1914], tags: [['era', 'ww1']] },
        { id: 'e2', start: [1915], tags: [['country', 'France']] },
      ],
      [{ id: 'T', expression: 'era = "ww1"' }]
    );
    const snapshot = await loadResolutionSnapshot(store, 'T');
    const outcome = parseExpression('era = "ww1"');
    if (!outcome.success || outcome.predicate === null) throw new Error('Expected a predicate');

    expect([...(snapshot.tagIndex.get('era') ?? [])]).toEqual(['e1']);
    expect(matchingEntities(outcome.predicate, snapshot)).toEqual(['e1']);
    expect(composeEntitySet(['T'], snapshot)).toEqual({
      success: true,
      entityIds: new Set(['e1']),
      warnings: [],
    });
  });
});

// =============================================================================
// Snapshot Loading
// =============================================================================

describe('loadResolutionSnapshot', () => {
  const entities: TestEntity[] = [
    { id: 'e1', start: [1914] },
    { id: 'e2', start: [1915] },
  ];

  it('reads only linked entities when no timeline has an expression', async () => {
    const store = createTestStore(entities, [{ id: 'T', links: ['e2'] }]);
    const listEntities = vi.spyOn(store, 'listEntities');

    const snapshot = await loadResolutionSnapshot(store, 'T');
    expect(listEntities).not.toHaveBeenCalled();
    expect([...snapshot.entities.keys()]).toEqual(['e2']);
  });

  it('reads the whole universe when an expression is present', async () => {
    const store = createTestStore(entities, [
      { id: 'T', children: ['S'] },
      { id: 'S', expression: 'era exists' },
    ]);
    const listEntities = vi.spyOn(store, 'listEntities');

    const snapshot = await loadResolutionSnapshot(store, 'T');
    expect(listEntities).toHaveBeenCalledTimes(1);
    expect([...snapshot.entities.keys()]).toEqual(['e1', 'e2']);
  });

  it('terminates on cyclic edges and reads each timeline once', async () => {
    const store = createTestStore(entities, [
      { id: 'A', children: ['B'] },
      { id: 'B', children: ['A', 'B'] },
    ]);
    const getTimeline = vi.spyOn(store, 'getTimeline');

    const snapshot = await loadResolutionSnapshot(store, 'A');
    expect([...snapshot.timelines.keys()]).toEqual(['A', 'B']);
    expect(getTimeline).toHaveBeenCalledTimes(2);
  });
});

// =============================================================================
// Sorting
// =============================================================================

describe('sortChronologically', () => {
  it('puts less precise dates first within the same year', () => {
    const entities = [
      createTestEntity({ id: 'day', start: [1914, 6, 28] }),
      createTestEntity({ id: 'year', start: [1914] }),
      createTestEntity({ id: 'month', start: [1914, 6] }),
    ];
    expect(sortChronologically(entities).map(e => e.id)).toEqual(['year', 'month', 'day']);
  });

  it('breaks date ties by name, then id', () => {
    const entities = [
      createTestEntity({ id: 'z', name: 'Beta', start: [1914] }),
      createTestEntity({ id: 'y', name: 'Alpha', start: [1914] }),
      createTestEntity({ id: 'x', name: 'Alpha', start: [1914] }),
    ];
    expect(sortChronologically(entities).map(e => e.id)).toEqual(['x', 'y', 'z']);
  });

  it('leaves its input untouched and is idempotent', () => {
    const entities = [
      createTestEntity({ id: 'b', start: [1918] }),
      createTestEntity({ id: 'a', start: [1914] }),
    ];
    const sorted = sortChronologically(entities);
    expect(entities.map(e => e.id)).toEqual(['b', 'a']);
    expect(sortChronologically(sorted)).toEqual(sorted);
  });

  it('compares BCE dates before CE dates', () => {
    const caesar = createTestEntity({ id: 'c', start: [-44, 3, 15] });
    const rome = createTestEntity({ id: 'r', start: [476] });
    expect(compareEntities(caesar, rome)).toBeLessThan(0);
  });
});

/**
 * Resolved timeline state using Zustand.
 *
 * Caches rendered views per root timeline on top of a read-only
 * TimelineStore. Views are never patched in place: after the data changes,
 * call invalidate() and load again.
 */

import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type { TimelineId } from '@engine/types';
import type { TimelineView } from '@engine/models';
import type { ResolutionWarning } from '@engine/errors';
import { ExpressionCache } from '@engine/expression/cache';
import { renderTimeline } from '@engine/resolution/pipeline';
import type { RenderResult, ResolutionOptions } from '@engine/resolution/types';
import type { TimelineStore } from '@storage/types';

// =============================================================================
// Helper Functions
// =============================================================================

function withEntry<V>(map: ReadonlyMap<TimelineId, V>, key: TimelineId, value: V): Map<TimelineId, V> {
  const next = new Map(map);
  next.set(key, value);
  return next;
}

function withoutEntry<V>(map: ReadonlyMap<TimelineId, V>, key: TimelineId): Map<TimelineId, V> {
  const next = new Map(map);
  next.delete(key);
  return next;
}

function adjustCount(
  counts: ReadonlyMap<TimelineId, number>,
  key: TimelineId,
  delta: number
): Map<TimelineId, number> {
  const count = (counts.get(key) ?? 0) + delta;
  return count > 0 ? withEntry(counts, key, count) : withoutEntry(counts, key);
}

// =============================================================================
// Store Interface
// =============================================================================

export interface TimelineStoreState {
  // State
  storage: TimelineStore;
  views: ReadonlyMap<TimelineId, TimelineView>;
  warnings: ReadonlyMap<TimelineId, readonly ResolutionWarning[]>;
  errors: ReadonlyMap<TimelineId, string>;
  /** Number of loads in flight per root */
  loading: ReadonlyMap<TimelineId, number>;

  /**
   * Resolve a root and cache its view. A resolution failure is recorded
   * under `errors`; a storage failure is recorded and rethrown.
   * Only the latest load of a root since its last invalidate() is recorded.
   */
  loadTimeline: (rootId: TimelineId) => Promise<RenderResult>;

  /**
   * Drop cached results for one root, or for every root when omitted.
   */
  invalidate: (rootId?: TimelineId) => void;

  getView: (rootId: TimelineId) => TimelineView | null;

  isLoading: (rootId: TimelineId) => boolean;
}

// =============================================================================
// Store Implementation
// =============================================================================

export function createTimelineStore(
  storage: TimelineStore,
  options: ResolutionOptions = {}
): StoreApi<TimelineStoreState> {
  // One parse cache per store unless the caller shares one
  const resolutionOptions: ResolutionOptions = {
    expressionCache: options.expressionCache ?? new ExpressionCache(),
  };

  // Token of the load allowed to record its result, per root
  const latestLoad = new Map<TimelineId, number>();
  let nextToken = 0;

  const claim = (rootId: TimelineId): number => {
    nextToken += 1;
    latestLoad.set(rootId, nextToken);
    return nextToken;
  };

  const isLatest = (rootId: TimelineId, token: number): boolean =>
    latestLoad.get(rootId) === token;

  return createStore<TimelineStoreState>()((set, get) => ({
    storage,
    views: new Map(),
    warnings: new Map(),
    errors: new Map(),
    loading: new Map(),

    loadTimeline: async (rootId: TimelineId) => {
      const token = claim(rootId);
      set(state => ({ loading: adjustCount(state.loading, rootId, 1) }));

      try {
        const result = await renderTimeline(get().storage, rootId, resolutionOptions);
        const current = isLatest(rootId, token);

        if (result.success) {
          set(state => current
            ? {
                views: withEntry(state.views, rootId, result.view),
                warnings: withEntry(state.warnings, rootId, result.warnings),
                errors: withoutEntry(state.errors, rootId),
                loading: adjustCount(state.loading, rootId, -1),
              }
            : { loading: adjustCount(state.loading, rootId, -1) });
        } else {
          set(state => current
            ? {
                views: withoutEntry(state.views, rootId),
                warnings: withoutEntry(state.warnings, rootId),
                errors: withEntry(state.errors, rootId, result.error.message),
                loading: adjustCount(state.loading, rootId, -1),
              }
            : { loading: adjustCount(state.loading, rootId, -1) });
          console.error(`[TimelineStore] Could not resolve ${rootId}:`, result.error.message);
        }

        return result;
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Failed to load timeline';
        const current = isLatest(rootId, token);
        set(state => current
          ? {
              errors: withEntry(state.errors, rootId, message),
              loading: adjustCount(state.loading, rootId, -1),
            }
          : { loading: adjustCount(state.loading, rootId, -1) });
        console.error('[TimelineStore] Storage read failed:', error);
        throw error;
      }
    },

    invalidate: (rootId?: TimelineId) => {
      if (rootId === undefined) {
        latestLoad.clear();
        set({ views: new Map(), warnings: new Map(), errors: new Map() });
        return;
      }
      latestLoad.delete(rootId);
      set(state => ({
        views: withoutEntry(state.views, rootId),
        warnings: withoutEntry(state.warnings, rootId),
        errors: withoutEntry(state.errors, rootId),
      }));
    },

    getView: (rootId: TimelineId) => get().views.get(rootId) ?? null,

    isLoading: (rootId: TimelineId) => (get().loading.get(rootId) ?? 0) > 0,
  }));
}

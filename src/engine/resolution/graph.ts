/**
 * Timeline Graph Resolver.
 *
 * Finds every timeline that contributes to a root: the root itself and
 * everything reachable through subtimeline edges. Shared descendants
 * (diamonds) are visited once; re-entering a timeline that is still on the
 * current path is a cycle and fails the whole resolution.
 */

import type { TimelineId } from '../types';
import { CycleError, NotFoundError } from '../errors';
import type { ResolutionWarning } from '../errors';
import type { GraphOutcome, SubtimelineGraph } from './types';

interface Frame {
  readonly id: TimelineId;
  readonly children: readonly TimelineId[];
  next: number;
}

export function resolveContributing(rootId: TimelineId, graph: SubtimelineGraph): GraphOutcome {
  if (!graph.hasTimeline(rootId)) {
    return { success: false, error: new NotFoundError('TIMELINE', rootId) };
  }

  const order: TimelineId[] = [];
  const warnings: ResolutionWarning[] = [];
  const visited = new Set<TimelineId>();
  const onPath = new Set<TimelineId>();
  const path: TimelineId[] = [];
  const stack: Frame[] = [];

  const enter = (id: TimelineId): void => {
    visited.add(id);
    onPath.add(id);
    path.push(id);
    order.push(id);
    stack.push({ id, children: graph.childrenOf(id), next: 0 });
  };

  enter(rootId);

  // Iterative so deep chains cannot exhaust the call stack
  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame === undefined) break;

    const child = frame.children[frame.next];
    if (child === undefined) {
      stack.pop();
      onPath.delete(frame.id);
      path.pop();
      continue;
    }
    frame.next++;

    if (onPath.has(child)) {
      const cycle = [...path.slice(path.indexOf(child)), child];
      return { success: false, error: new CycleError(cycle) };
    }
    if (visited.has(child)) continue;

    if (!graph.hasTimeline(child)) {
      warnings.push({
        type: 'DanglingSubtimeline',
        referencedBy: frame.id,
        error: new NotFoundError('TIMELINE', child),
      });
      continue;
    }

    enter(child);
  }

  return { success: true, timelineIds: order, warnings };
}

/**
 * Longest path computation with cycle detection
 * ARCHITECTURE: DFS with memoization, Result pattern instead of exceptions
 * Pattern: active-path set for cycle detection, PathCache for settled vertices
 * Rationale: shared sub-paths are explored once per graph session
 */

import { Vertex, VertexId } from './domain.js';
import { Result, ok, err } from './result.js';
import { PathwiseError, cycleDetected, invalidArgument } from './errors.js';
import { PathCache, InMemoryPathCache } from './path-cache.js';
import { Logger } from './interfaces.js';

export type TraversalMode = 'recursive' | 'iterative';

export interface PathEngineOptions {
  /** Cache to settle results into. A fresh one is created when omitted. */
  readonly cache?: PathCache;
  /**
   * 'iterative' walks an explicit stack and is safe for very deep graphs;
   * 'recursive' uses the call stack. Results are identical.
   */
  readonly traversal?: TraversalMode;
  readonly logger?: Logger;
}

/**
 * Explicit-stack frame: one per vertex on the active path
 */
interface Frame {
  readonly vertex: Vertex;
  nextEdge: number;
  maxLength: number;
}

/**
 * Computes the longest directed path (edge count) reachable from a vertex
 *
 * Vertex states per session: Unvisited -> Active (on the DFS path) -> Settled (cached).
 * Reaching an Active vertex again is a cycle and aborts the whole call.
 * Only fully computed vertices are ever cached, so an aborted call leaves the
 * cache consistent and later calls from cycle-free vertices stay correct.
 *
 * One caller per engine: concurrent sessions should use separate engines.
 */
export class PathEngine {
  private readonly cache: PathCache;
  private readonly traversal: TraversalMode;
  private readonly logger?: Logger;

  constructor(options: PathEngineOptions = {}) {
    this.cache = options.cache ?? new InMemoryPathCache();
    this.traversal = options.traversal ?? 'iterative';
    this.logger = options.logger;
  }

  /**
   * Length of the longest path starting at `start`
   *
   * @returns Ok(length), 0 for a vertex with no outgoing edges;
   *          Err(INVALID_ARGUMENT) when start is absent;
   *          Err(CYCLE_DETECTED) naming the re-entered vertex when a cycle is reachable
   */
  longestPath(start: Vertex | null | undefined): Result<number, PathwiseError> {
    if (!start) {
      return err(invalidArgument('Start vertex cannot be null'));
    }

    const settledBefore = this.cache.size;
    const result = this.traversal === 'recursive'
      ? this.visit(start, new Set())
      : this.walk(start);

    if (result.ok) {
      this.logger?.debug('Longest path resolved', {
        vertexId: start.id,
        length: result.value,
        explored: this.cache.size - settledBefore,
      });
    } else {
      this.logger?.warn('Traversal aborted', {
        vertexId: start.id,
        code: result.error.code,
        ...result.error.context,
      });
    }

    return result;
  }

  /**
   * Drop every settled result. Call before reusing the engine on an unrelated graph.
   */
  clearCache(): void {
    this.cache.clear();
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  /**
   * Recursive DFS
   *
   * @param vertex Current vertex
   * @param active Vertices on the current DFS path
   */
  private visit(vertex: Vertex, active: Set<VertexId>): Result<number, PathwiseError> {
    // Active check comes first: an in-progress vertex is never cached
    if (active.has(vertex.id)) {
      return err(cycleDetected(vertex.id));
    }

    const cached = this.cache.get(vertex.id);
    if (cached !== undefined) {
      return ok(cached);
    }

    active.add(vertex.id);

    let maxLength = 0;
    for (const edge of vertex.edges) {
      if (!edge.to) {
        continue;
      }

      const fromNeighbor = this.visit(edge.to, active);
      if (!fromNeighbor.ok) {
        return fromNeighbor;
      }

      // Every edge counts as 1
      maxLength = Math.max(maxLength, fromNeighbor.value + 1);
    }

    // Backtrack, so reaching this vertex again through another branch is not a cycle
    active.delete(vertex.id);

    this.cache.set(vertex.id, maxLength);
    return ok(maxLength);
  }

  /**
   * Iterative DFS over an explicit stack of frames
   * Same visiting order and error precedence as visit()
   */
  private walk(start: Vertex): Result<number, PathwiseError> {
    const active = new Set<VertexId>();
    const stack: Frame[] = [];

    const entered = this.enter(start, active, stack);
    if (!entered.ok) {
      return entered;
    }
    if (entered.value !== undefined) {
      return ok(entered.value);
    }

    let length = 0;
    for (let frame = stack.at(-1); frame; frame = stack.at(-1)) {
      if (frame.nextEdge < frame.vertex.edges.length) {
        const target = frame.vertex.edges[frame.nextEdge].to;
        frame.nextEdge++;
        if (!target) {
          continue;
        }

        const child = this.enter(target, active, stack);
        if (!child.ok) {
          return child;
        }
        if (child.value !== undefined) {
          frame.maxLength = Math.max(frame.maxLength, child.value + 1);
        }
        continue;
      }

      // All edges explored: settle and hand the length to the parent frame
      stack.pop();
      active.delete(frame.vertex.id);
      this.cache.set(frame.vertex.id, frame.maxLength);

      const parent = stack.at(-1);
      if (parent) {
        parent.maxLength = Math.max(parent.maxLength, frame.maxLength + 1);
      } else {
        length = frame.maxLength;
      }
    }

    return ok(length);
  }

  /**
   * Push a frame for `vertex`, or resolve it immediately
   * @returns Ok(cached length) on a cache hit, Ok(undefined) when a frame was pushed
   */
  private enter(
    vertex: Vertex,
    active: Set<VertexId>,
    stack: Frame[]
  ): Result<number | undefined, PathwiseError> {
    if (active.has(vertex.id)) {
      return err(cycleDetected(vertex.id));
    }

    const cached = this.cache.get(vertex.id);
    if (cached !== undefined) {
      return ok(cached);
    }

    active.add(vertex.id);
    stack.push({ vertex, nextEdge: 0, maxLength: 0 });
    return ok(undefined);
  }
}

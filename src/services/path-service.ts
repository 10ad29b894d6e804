/**
 * Path service - runs the engine over a whole graph session
 * ARCHITECTURE: one PathEngine (and cache) per call, so unrelated graphs never share results
 */

import { VertexId } from '../core/domain.js';
import { Logger } from '../core/interfaces.js';
import { PathEngine, TraversalMode } from '../core/path-engine.js';
import { PathwiseError, vertexNotFound } from '../core/errors.js';
import { Result, ok, err, map } from '../core/result.js';
import type { Graph } from '../graph/graph-builder.js';

export interface PathReport {
  readonly vertexId: VertexId;
  readonly length: number;
}

export interface PathFailure {
  readonly vertexId: VertexId;
  readonly error: PathwiseError;
}

export interface PathRunSummary {
  readonly reports: readonly PathReport[];
  /** Starts that hit a cycle and were skipped (stopOnCycle disabled) */
  readonly failures: readonly PathFailure[];
  /** Set when a cycle ended the run early */
  readonly cycle?: PathwiseError;
  readonly stopped: boolean;
}

/**
 * JSON-friendly view of a run summary
 */
export const summaryToJSON = (summary: PathRunSummary) => ({
  reports: summary.reports,
  failures: summary.failures.map((failure) => ({
    vertexId: failure.vertexId,
    error: failure.error.toJSON(),
  })),
  cycle: summary.cycle?.toJSON(),
  stopped: summary.stopped,
});

export interface PathServiceOptions {
  readonly traversal: TraversalMode;
  readonly stopOnCycle: boolean;
}

export class PathService {
  constructor(
    private readonly options: PathServiceOptions,
    private readonly logger: Logger
  ) {}

  /**
   * Longest path from the vertex with the given id
   */
  longestFrom(graph: Graph, vertexId: number): Result<PathReport, PathwiseError> {
    const vertex = graph.get(vertexId);
    if (!vertex) {
      return err(vertexNotFound(vertexId));
    }

    return map(this.createEngine().longestPath(vertex), (length) => ({ vertexId: vertex.id, length }));
  }

  /**
   * Longest path from every vertex, in graph order, sharing one cache
   */
  longestForAll(graph: Graph): Result<PathRunSummary, PathwiseError> {
    const engine = this.createEngine();
    const reports: PathReport[] = [];
    const failures: PathFailure[] = [];

    for (const vertex of graph.vertices) {
      const result = engine.longestPath(vertex);
      if (result.ok) {
        reports.push({ vertexId: vertex.id, length: result.value });
        continue;
      }

      if (this.options.stopOnCycle) {
        this.logger.warn('Further calculations on this graph are stopped due to detected cycle', {
          vertexId: vertex.id,
          completed: reports.length,
        });
        return ok({ reports, failures, cycle: result.error, stopped: true });
      }

      // Cache holds only settled vertices, so the run can continue from the next start
      failures.push({ vertexId: vertex.id, error: result.error });
    }

    this.logger.info('Path run complete', {
      vertices: graph.vertices.length,
      failures: failures.length,
      settled: engine.cacheSize,
    });
    return ok({ reports, failures, stopped: false });
  }

  private createEngine(): PathEngine {
    return new PathEngine({
      traversal: this.options.traversal,
      logger: this.logger.child({ module: 'path-engine' }),
    });
  }
}

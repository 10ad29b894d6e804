import { describe, it, expect, beforeEach } from 'vitest';
import { PathService, summaryToJSON } from '../../../src/services/path-service.js';
import { buildGraph, sampleGraph, type Graph } from '../../../src/graph/graph-builder.js';
import { ErrorCode } from '../../../src/core/errors.js';
import { TestLogger } from '../../../src/implementations/logger.js';

const graphOf = (edges: Array<[number, number]>, vertices?: number[]): Graph => {
  const result = buildGraph({ vertices, edges });
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
};

describe('PathService', () => {
  let logger: TestLogger;
  let service: PathService;

  beforeEach(() => {
    logger = new TestLogger();
    service = new PathService({ traversal: 'iterative', stopOnCycle: true }, logger);
  });

  describe('longestFrom', () => {
    it('should report the longest path for one vertex', () => {
      expect(service.longestFrom(sampleGraph(), 1)).toEqual({ ok: true, value: { vertexId: 1, length: 4 } });
      expect(service.longestFrom(sampleGraph(), 4)).toEqual({ ok: true, value: { vertexId: 4, length: 2 } });
    });

    it('should reject an unknown vertex id', () => {
      const result = service.longestFrom(sampleGraph(), 99);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ErrorCode.INVALID_ARGUMENT);
        expect(result.error.message).toBe('Vertex 99 not found');
      }
    });

    it('should not carry cached results between graphs that reuse ids', () => {
      expect(service.longestFrom(graphOf([[1, 2]]), 1)).toEqual({ ok: true, value: { vertexId: 1, length: 1 } });
      expect(service.longestFrom(graphOf([[1, 2], [2, 3]]), 1)).toEqual({ ok: true, value: { vertexId: 1, length: 2 } });
    });

    it('should surface cycles', () => {
      const result = service.longestFrom(graphOf([[1, 2], [2, 1]]), 2);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ErrorCode.CYCLE_DETECTED);
        expect(result.error.context).toEqual({ vertexId: 2 });
      }
    });
  });

  describe('longestForAll', () => {
    it('should report every vertex of the sample graph in order', () => {
      const result = service.longestForAll(sampleGraph());

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.reports).toEqual([
          { vertexId: 1, length: 4 },
          { vertexId: 2, length: 3 },
          { vertexId: 3, length: 1 },
          { vertexId: 4, length: 2 },
          { vertexId: 5, length: 2 },
          { vertexId: 6, length: 1 },
          { vertexId: 7, length: 0 },
        ]);
        expect(result.value.stopped).toBe(false);
        expect(result.value.cycle).toBeUndefined();
        expect(result.value.failures).toEqual([]);
      }
      expect(logger.hasLog('info', 'Path run complete')).toBe(true);
    });

    it('should stop at the first cycle by default', () => {
      // 1 -> 2 is fine, 3 <-> 4 is a cycle, 5 is never reached
      const graph = graphOf([[1, 2], [3, 4], [4, 3]], [1, 2, 3, 4, 5]);

      const result = service.longestForAll(graph);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.reports).toEqual([
          { vertexId: 1, length: 1 },
          { vertexId: 2, length: 0 },
        ]);
        expect(result.value.stopped).toBe(true);
        expect(result.value.cycle?.code).toBe(ErrorCode.CYCLE_DETECTED);
        expect(result.value.cycle?.context).toEqual({ vertexId: 3 });
      }
      expect(logger.hasLog('warn', 'Further calculations on this graph are stopped due to detected cycle')).toBe(true);
    });

    it('should skip cyclic starts and continue when stopOnCycle is disabled', () => {
      const lenient = new PathService({ traversal: 'recursive', stopOnCycle: false }, logger);
      const graph = graphOf([[1, 2], [3, 4], [4, 3]], [1, 2, 3, 4, 5]);

      const result = lenient.longestForAll(graph);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.reports).toEqual([
          { vertexId: 1, length: 1 },
          { vertexId: 2, length: 0 },
          { vertexId: 5, length: 0 },
        ]);
        expect(result.value.failures.map((f) => [f.vertexId, f.error.context?.vertexId])).toEqual([
          [3, 3],
          [4, 4],
        ]);
        expect(result.value.stopped).toBe(false);
      }
    });
  });

  describe('summaryToJSON', () => {
    it('should serialize errors through toJSON', () => {
      const result = service.longestForAll(graphOf([[1, 1]]));

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(summaryToJSON(result.value)).toEqual({
          reports: [],
          failures: [],
          cycle: {
            name: 'PathwiseError',
            code: 'CYCLE_DETECTED',
            message: 'Cycle detected involving vertex: 1',
            context: { vertexId: 1 },
          },
          stopped: true,
        });
      }
    });
  });
});

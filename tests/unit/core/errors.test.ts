import { describe, it, expect } from 'vitest';
import {
  PathwiseError,
  ErrorCode,
  invalidArgument,
  vertexNotFound,
  cycleDetected,
  invalidGraph,
  configurationError,
  systemError,
  isPathwiseError,
  toPathwiseError,
} from '../../../src/core/errors.js';

describe('PathwiseError', () => {
  it('should carry code, message and context', () => {
    const error = new PathwiseError(ErrorCode.INVALID_GRAPH, 'Bad edge', { index: 3 });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('PathwiseError');
    expect(error.code).toBe(ErrorCode.INVALID_GRAPH);
    expect(error.message).toBe('Bad edge');
    expect(error.context).toEqual({ index: 3 });
    expect(error.stack).toBeDefined();
  });

  it('should serialize to JSON', () => {
    const error = cycleDetected(4);

    expect(JSON.parse(JSON.stringify(error))).toEqual({
      name: 'PathwiseError',
      code: 'CYCLE_DETECTED',
      message: 'Cycle detected involving vertex: 4',
      context: { vertexId: 4 },
    });
  });
});

describe('Error factories', () => {
  it('should build traversal errors', () => {
    expect(invalidArgument('Start vertex cannot be null').code).toBe(ErrorCode.INVALID_ARGUMENT);
    expect(cycleDetected(2).context).toEqual({ vertexId: 2 });

    const notFound = vertexNotFound(42);
    expect(notFound.code).toBe(ErrorCode.INVALID_ARGUMENT);
    expect(notFound.message).toBe('Vertex 42 not found');
    expect(notFound.context).toEqual({ vertexId: 42 });
  });

  it('should build input and system errors', () => {
    expect(invalidGraph('Invalid graph definition').code).toBe(ErrorCode.INVALID_GRAPH);
    expect(configurationError('Unknown config key: x').code).toBe(ErrorCode.CONFIGURATION_ERROR);

    const wrapped = systemError('Disk failure', new Error('EIO'));
    expect(wrapped.code).toBe(ErrorCode.SYSTEM_ERROR);
    expect(wrapped.context).toEqual({ originalError: 'EIO' });
  });
});

describe('toPathwiseError', () => {
  it('should pass PathwiseError through unchanged', () => {
    const original = cycleDetected(1);

    expect(toPathwiseError(original)).toBe(original);
    expect(isPathwiseError(original)).toBe(true);
  });

  it('should wrap plain errors as SYSTEM_ERROR', () => {
    const converted = toPathwiseError(new TypeError('bad type'));

    expect(converted.code).toBe(ErrorCode.SYSTEM_ERROR);
    expect(converted.message).toBe('bad type');
    expect(isPathwiseError(new Error('x'))).toBe(false);
  });

  it('should handle message-like objects, strings and nullish values', () => {
    expect(toPathwiseError({ message: 'from object' }).message).toBe('from object');
    expect(toPathwiseError('plain string').message).toBe('plain string');
    expect(toPathwiseError(null).message).toBe('Unknown error');
    expect(toPathwiseError(undefined).message).toBe('Unknown error');
  });
});

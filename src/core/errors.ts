/**
 * Error types for Result pattern
 * Never throw these - always return them in Result.err()
 */

/**
 * Error codes used throughout the application
 */
export enum ErrorCode {
  // Traversal errors
  /** Start vertex is absent, or no vertex carries the requested id */
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  /** A vertex already on the active DFS path was reached again */
  CYCLE_DETECTED = 'CYCLE_DETECTED',

  // Input errors
  /** Literal graph data failed validation */
  INVALID_GRAPH = 'INVALID_GRAPH',

  // System errors
  /** Configuration validation, loading or saving failed */
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  /** Generic system error - check logs for details */
  SYSTEM_ERROR = 'SYSTEM_ERROR',
}

/**
 * Custom error class for Pathwise
 * Includes error code and optional context for debugging
 *
 * @example
 * return err(new PathwiseError(
 *   ErrorCode.CYCLE_DETECTED,
 *   'Cycle detected involving vertex: 4',
 *   { vertexId: 4 }
 * ));
 */
export class PathwiseError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PathwiseError';
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Error factory functions
 */
export const invalidArgument = (message: string, context?: Record<string, unknown>): PathwiseError =>
  new PathwiseError(ErrorCode.INVALID_ARGUMENT, message, context);

export const vertexNotFound = (vertexId: number): PathwiseError =>
  new PathwiseError(
    ErrorCode.INVALID_ARGUMENT,
    `Vertex ${vertexId} not found`,
    { vertexId }
  );

export const cycleDetected = (vertexId: number): PathwiseError =>
  new PathwiseError(
    ErrorCode.CYCLE_DETECTED,
    `Cycle detected involving vertex: ${vertexId}`,
    { vertexId }
  );

export const invalidGraph = (message: string, context?: Record<string, unknown>): PathwiseError =>
  new PathwiseError(ErrorCode.INVALID_GRAPH, message, context);

export const configurationError = (message: string, context?: Record<string, unknown>): PathwiseError =>
  new PathwiseError(ErrorCode.CONFIGURATION_ERROR, message, context);

export const systemError = (message: string, originalError?: Error): PathwiseError =>
  new PathwiseError(
    ErrorCode.SYSTEM_ERROR,
    message,
    { originalError: originalError?.message }
  );

/**
 * Type guard for PathwiseError
 */
export const isPathwiseError = (error: unknown): error is PathwiseError => {
  return error instanceof PathwiseError;
};

/**
 * Convert unknown errors to PathwiseError
 */
export const toPathwiseError = (error: unknown): PathwiseError => {
  if (isPathwiseError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return systemError(error.message, error);
  }

  // Handle objects with message property
  if (error && typeof error === 'object' && 'message' in error) {
    return systemError(String(error.message));
  }

  if (error == null) {
    return systemError('Unknown error');
  }

  return systemError(String(error));
};

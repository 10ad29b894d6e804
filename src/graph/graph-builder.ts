/**
 * Graph construction from literal data
 * Validates input with zod, then wires Vertex/Edge objects for the engine
 */

import { z } from 'zod';
import { readFileSync } from 'fs';
import { Vertex, VertexId } from '../core/domain.js';
import { Result, ok, err, flatMap, tryCatch } from '../core/result.js';
import { PathwiseError, invalidGraph } from '../core/errors.js';

const VertexIdSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

export const GraphDefinitionSchema = z.object({
  // Optional explicit vertex list: fixes iteration order and allows isolated vertices
  vertices: z.array(VertexIdSchema).optional(),
  // [from, to] pairs in attachment order; a null target yields an edge that traversal skips
  edges: z.array(z.tuple([VertexIdSchema, VertexIdSchema.nullable()])),
});

export type GraphDefinition = z.infer<typeof GraphDefinitionSchema>;

export interface Graph {
  /** Every vertex, in first-seen order */
  readonly vertices: readonly Vertex[];
  get(id: number): Vertex | undefined;
}

class VertexMap implements Graph {
  private readonly byId = new Map<VertexId, Vertex>();

  get vertices(): readonly Vertex[] {
    return Array.from(this.byId.values());
  }

  get(id: number): Vertex | undefined {
    return this.byId.get(VertexId(id));
  }

  getOrCreate(id: number): Vertex {
    const existing = this.get(id);
    if (existing) {
      return existing;
    }
    const vertex = new Vertex(id);
    this.byId.set(vertex.id, vertex);
    return vertex;
  }
}

/**
 * Build a graph from a definition
 * Duplicate edges are kept; the engine treats them as harmless
 */
export function buildGraph(definition: unknown): Result<Graph, PathwiseError> {
  const parsed = GraphDefinitionSchema.safeParse(definition);
  if (!parsed.success) {
    return err(invalidGraph('Invalid graph definition', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    }));
  }

  return ok(assemble(parsed.data));
}

function assemble(definition: GraphDefinition): Graph {
  const graph = new VertexMap();
  for (const id of definition.vertices ?? []) {
    graph.getOrCreate(id);
  }

  for (const [from, to] of definition.edges) {
    const source = graph.getOrCreate(from);
    source.connect(to === null ? null : graph.getOrCreate(to));
  }

  return graph;
}

/**
 * Parse JSON text into a graph
 */
export function parseGraphJson(text: string): Result<Graph, PathwiseError> {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    return err(invalidGraph('Graph file is not valid JSON', {
      reason: error instanceof Error ? error.message : String(error),
    }));
  }
  return buildGraph(data);
}

/**
 * Read and parse a JSON graph file
 */
export function loadGraphFile(filePath: string): Result<Graph, PathwiseError> {
  const text = tryCatch(
    () => readFileSync(filePath, 'utf-8'),
    (error) => invalidGraph(`Cannot read graph file: ${filePath}`, {
      filePath,
      reason: error instanceof Error ? error.message : String(error),
    })
  );
  return flatMap(text, parseGraphJson);
}

/**
 * Sample DAG used when no graph file is given
 * 1->2, 1->3, 1->4, 2->5, 3->7, 4->3, 4->7, 4->3 (duplicate), 5->6, 6->7
 */
export const SAMPLE_GRAPH: GraphDefinition = {
  vertices: [1, 2, 3, 4, 5, 6, 7],
  edges: [
    [1, 2], [1, 3], [1, 4],
    [2, 5],
    [3, 7],
    [4, 3], [4, 7], [4, 3],
    [5, 6],
    [6, 7],
  ],
};

export const sampleGraph = (): Graph => assemble(SAMPLE_GRAPH);

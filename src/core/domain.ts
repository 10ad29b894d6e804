/**
 * Core domain models
 * Vertices own their outgoing edges; the engine never mutates either
 */

export type VertexId = number & { readonly __brand: 'VertexId' };

export const VertexId = (id: number): VertexId => id as VertexId;

/**
 * Directed edge between two vertices
 * `from` is informational; traversal only follows `to`, and skips the edge when it is absent
 */
export class Edge {
  constructor(
    readonly from: Vertex | null,
    readonly to: Vertex | null
  ) {}

  toString(): string {
    const from = this.from ? String(this.from.id) : 'null';
    const to = this.to ? String(this.to.id) : 'null';
    return `${from}->${to}`;
  }
}

/**
 * Graph vertex with a stable identifier and an ordered list of outgoing edges
 *
 * Equality is by id only: two instances sharing an id are the same vertex
 * for caching and cycle detection.
 */
export class Vertex {
  readonly id: VertexId;
  readonly edges: Edge[] = [];

  constructor(id: number) {
    this.id = VertexId(id);
  }

  /**
   * Append an edge to `to`. Duplicate edges are kept as given.
   */
  connect(to: Vertex | null): Edge {
    const edge = new Edge(this, to);
    this.edges.push(edge);
    return edge;
  }

  equals(other: Vertex | null | undefined): boolean {
    return other != null && other.id === this.id;
  }

  toString(): string {
    return String(this.id);
  }
}

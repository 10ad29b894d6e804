/**
 * GraphFactory - Builder for hand-wired test graphs
 *
 * Usage:
 * const g = new GraphFactory().edges([1, 2], [2, 3]);
 * engine.longestPath(g.vertex(1));
 */

import { Vertex } from '../../src/core/domain.js';

export class GraphFactory {
  private readonly byId = new Map<number, Vertex>();

  /**
   * Vertex with the given id, created on first use
   */
  vertex(id: number): Vertex {
    let vertex = this.byId.get(id);
    if (!vertex) {
      vertex = new Vertex(id);
      this.byId.set(id, vertex);
    }
    return vertex;
  }

  edge(from: number, to: number): this {
    this.vertex(from).connect(this.vertex(to));
    return this;
  }

  edges(...pairs: Array<[number, number]>): this {
    for (const [from, to] of pairs) {
      this.edge(from, to);
    }
    return this;
  }

  /**
   * Chain 0 -> 1 -> ... -> length
   */
  chain(length: number): this {
    for (let i = 0; i < length; i++) {
      this.edge(i, i + 1);
    }
    return this;
  }
}

/**
 * Diamond-shaped DAG with a duplicate 4 -> 3 edge
 */
export const diamond = (): GraphFactory =>
  new GraphFactory().edges(
    [1, 2], [1, 3], [1, 4],
    [2, 5],
    [3, 7],
    [4, 3], [4, 7], [4, 3],
    [5, 6],
    [6, 7]
  );

/**
 * Memoization cache for settled longest-path lengths
 * ARCHITECTURE: Owned by one PathEngine per graph session - no process-wide state
 */

import { VertexId } from './domain.js';

export interface PathCache {
  get(id: VertexId): number | undefined;
  /**
   * Record a settled length. Returns false, leaving the stored value as is,
   * when the vertex is already cached.
   */
  set(id: VertexId, length: number): boolean;
  clear(): void;
  readonly size: number;
}

export class InMemoryPathCache implements PathCache {
  private readonly entries = new Map<VertexId, number>();

  get(id: VertexId): number | undefined {
    return this.entries.get(id);
  }

  set(id: VertexId, length: number): boolean {
    if (this.entries.has(id)) {
      return false;
    }
    this.entries.set(id, length);
    return true;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

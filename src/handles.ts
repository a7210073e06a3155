// VectraEdge - Resource Handles
// Caller-held values naming a server-side index or subscription. They hold no
// connection: every operation goes back through the client that created them.

import type { SearchResultPayload } from "./types.js";

/**
 * The client operations handles re-dispatch to.
 */
export interface HandleOwner {
  searchIndex(indexId: string, vector: number[], limit?: number): Promise<SearchResultPayload>;
  insertVector(
    indexId: string,
    id: string | number,
    vector: number[],
    metadata?: Record<string, unknown>
  ): Promise<void>;
  deleteIndex(indexId: string): Promise<void>;
  unsubscribe(subscriptionId: string): Promise<void>;
}

export class IndexHandle {
  constructor(
    private readonly owner: HandleOwner,
    readonly id: string,
    readonly table: string,
    readonly column: string,
    readonly status: string
  ) {}

  /**
   * Nearest neighbours of `vector`. `limit` defaults to 10.
   */
  search(vector: number[], limit?: number): Promise<SearchResultPayload> {
    return this.owner.searchIndex(this.id, vector, limit);
  }

  insertVector(
    id: string | number,
    vector: number[],
    metadata?: Record<string, unknown>
  ): Promise<void> {
    return this.owner.insertVector(this.id, id, vector, metadata);
  }

  /**
   * Discarding a handle leaves the index in place; call this to remove it.
   */
  deleteIndex(): Promise<void> {
    return this.owner.deleteIndex(this.id);
  }
}

export class SubscriptionHandle {
  private released = false;

  constructor(
    private readonly owner: HandleOwner,
    readonly id: string,
    readonly topic: string,
    readonly status: string
  ) {}

  /**
   * Cancel the subscription. Calls after the first successful one return
   * without contacting the transport.
   */
  async unsubscribe(): Promise<void> {
    if (this.released) return;
    await this.owner.unsubscribe(this.id);
    this.released = true;
  }
}

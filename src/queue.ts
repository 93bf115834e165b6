/**
 * BatchDB Query Queue — pending descriptors between batches
 *
 * Insertion order is call order. It does not order execution, but it does
 * decide which pooled connection each descriptor is paired with.
 */

import type { QueryDescriptor } from './types.js';

export class QueryQueue {
  private items: QueryDescriptor[] = [];

  get length(): number {
    return this.items.length;
  }

  push(descriptor: QueryDescriptor): void {
    this.items.push(descriptor);
  }

  peek(): readonly QueryDescriptor[] {
    return this.items;
  }

  /** Remove and return everything queued so far. */
  drain(): QueryDescriptor[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  /** Discard everything queued. Returns how many descriptors were dropped. */
  clear(): number {
    const discarded = this.items.length;
    this.items = [];
    return discarded;
  }
}

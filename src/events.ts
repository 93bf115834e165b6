/**
 * BatchDB Event System — Typed event emitter
 *
 * All lifecycle, query, batch, and error events flow through this.
 */

import { EventEmitter } from 'events';
import type { BatchDBEvents } from './types.js';

export class BatchDBEventEmitter extends EventEmitter {
  on<E extends keyof BatchDBEvents>(
    event: E,
    listener: (payload: BatchDBEvents[E]) => void,
  ): this {
    return super.on(event, listener as (...args: unknown[]) => void);
  }

  once<E extends keyof BatchDBEvents>(
    event: E,
    listener: (payload: BatchDBEvents[E]) => void,
  ): this {
    return super.once(event, listener as (...args: unknown[]) => void);
  }

  emit<E extends keyof BatchDBEvents>(
    event: E,
    payload: BatchDBEvents[E],
  ): boolean {
    // Node's EventEmitter throws on an unhandled 'error' event
    if (event === 'error' && this.listenerCount('error') === 0) return false;
    return super.emit(event, payload);
  }

  off<E extends keyof BatchDBEvents>(
    event: E,
    listener: (payload: BatchDBEvents[E]) => void,
  ): this {
    return super.off(event, listener as (...args: unknown[]) => void);
  }
}

// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { RunEvent } from '../types/events.js';

interface EventBusEvents {
  event: (event: RunEvent) => void;
}

/**
 * Typed event bus for report run progress.
 * Wraps eventemitter3 with typed RunEvent emission.
 */
export class EventBus extends EventEmitter<EventBusEvents> {
  /** Emit a typed run event, auto-injecting timestamp if missing. */
  emitEvent(event: RunEvent): void {
    const timestamped = event.timestamp ? event : { ...event, timestamp: new Date().toISOString() };
    this.emit('event', timestamped);
  }
}

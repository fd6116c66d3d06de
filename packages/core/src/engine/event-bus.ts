// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { MonitorEvent } from '../types/events.js';

interface EventBusEvents {
  event: (event: MonitorEvent) => void;
}

/**
 * Typed bus for monitor progress events.
 * Wraps eventemitter3; an empty timestamp is filled in on emission.
 */
export class EventBus extends EventEmitter<EventBusEvents> {
  emitEvent(event: MonitorEvent): void {
    const timestamped = !event.timestamp ? { ...event, timestamp: new Date().toISOString() } : event;
    this.emit('event', timestamped);
  }
}

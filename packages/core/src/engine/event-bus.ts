// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { ScanEvent, ScanEventInput } from '../types/events.js';

interface EventBusEvents {
  event: (event: ScanEvent) => void;
}

/**
 * Typed bus shared by the orchestrator and the fix executor.
 * Wraps eventemitter3; every emitted event carries an ISO timestamp.
 */
export class EventBus extends EventEmitter<EventBusEvents> {
  constructor(private readonly clock: () => Date = () => new Date()) {
    super();
  }

  emitEvent(event: ScanEventInput): void {
    const stamped: ScanEvent = { ...event, timestamp: event.timestamp ?? this.clock().toISOString() };
    this.emit('event', stamped);
  }
}

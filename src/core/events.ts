/**
 * Type-safe event emitter for the planner
 */

import EventEmitter from 'eventemitter3';
import { EventData, EventListener, Logger, PlannerEvent } from '../types';

/**
 * Event emitter with strong typing. Emission is synchronous; a throwing
 * listener is logged and does not stop the others.
 */
export class PlannerEventEmitter {
  private emitter: EventEmitter;
  private logger?: Logger;
  private onceOrigins: WeakMap<object, unknown>; // once wrapper -> caller's listener

  constructor(logger?: Logger) {
    this.emitter = new EventEmitter();
    this.logger = logger;
    this.onceOrigins = new WeakMap();
  }

  /**
   * Register an event listener
   */
  on<E extends PlannerEvent>(event: E, listener: EventListener<EventData[E]>): void {
    this.emitter.on(event, listener);
  }

  /**
   * Register a one-time event listener
   */
  once<E extends PlannerEvent>(event: E, listener: EventListener<EventData[E]>): void {
    const wrappedListener: EventListener<EventData[E]> = (data) => {
      this.emitter.off(event, wrappedListener);
      listener(data);
    };
    this.onceOrigins.set(wrappedListener, listener);
    this.on(event, wrappedListener);
  }

  /**
   * Remove an event listener, including one registered with once()
   */
  off<E extends PlannerEvent>(event: E, listener: EventListener<EventData[E]>): void {
    this.emitter.off(event, listener);
    for (const registered of this.emitter.listeners(event)) {
      if (this.onceOrigins.get(registered) === listener) {
        this.emitter.off(event, registered);
      }
    }
  }

  /**
   * Remove all listeners for an event (or all events if none specified)
   */
  removeAllListeners(event?: PlannerEvent): void {
    this.emitter.removeAllListeners(event);
  }

  /**
   * Emit an event
   */
  emit<E extends PlannerEvent>(event: E, data: EventData[E]): void {
    for (const listener of this.emitter.listeners(event)) {
      try {
        listener(data);
      } catch (error) {
        this.logger?.error(`Error in event listener for ${event}`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  /**
   * Get the number of listeners for an event
   */
  listenerCount(event: PlannerEvent): number {
    return this.emitter.listenerCount(event);
  }
}

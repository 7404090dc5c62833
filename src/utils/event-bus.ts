import EventEmitter from 'eventemitter3';
import type { SimulationEvent, SimulationEventOf, SimulationEventType } from '../core/types';

/**
 * Type-safe event handler
 */
type EventHandler<T> = (data: T) => void;

/**
 * Type-safe event bus for simulation observability events
 *
 * The engine publishes each tick's events here once the tick has finished,
 * so handlers never run in the middle of a scheduling decision.
 */
export class EventBus {
  private emitter: EventEmitter;
  private debug: boolean;

  constructor(options: { debug?: boolean } = {}) {
    this.emitter = new EventEmitter();
    this.debug = options.debug ?? false;
  }

  /**
   * Subscribe to an event
   */
  on<K extends SimulationEventType>(event: K, handler: EventHandler<SimulationEventOf<K>>): void {
    this.emitter.on(event, handler);
  }

  /**
   * Subscribe to an event once
   */
  once<K extends SimulationEventType>(event: K, handler: EventHandler<SimulationEventOf<K>>): void {
    this.emitter.once(event, handler);
  }

  /**
   * Unsubscribe from an event
   */
  off<K extends SimulationEventType>(event: K, handler: EventHandler<SimulationEventOf<K>>): void {
    this.emitter.off(event, handler);
  }

  /**
   * Subscribe to every event type
   */
  onAny(handler: EventHandler<SimulationEvent>): void {
    this.emitter.on('*', handler);
  }

  /**
   * Publish an event to its typed subscribers and to catch-all subscribers
   */
  emit(event: SimulationEvent): void {
    if (this.debug) {
      // eslint-disable-next-line no-console
      console.log(`[EventBus] ${event.type}:`, JSON.stringify(event));
    }
    this.emitter.emit(event.type, event);
    this.emitter.emit('*', event);
  }

  /**
   * Remove all listeners for an event
   */
  removeAllListeners(event?: SimulationEventType): void {
    if (event) {
      this.emitter.removeAllListeners(event);
    } else {
      this.emitter.removeAllListeners();
    }
  }

  /**
   * Get listener count for an event
   */
  listenerCount(event: SimulationEventType): number {
    return this.emitter.listenerCount(event);
  }
}

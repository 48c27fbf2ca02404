import EventEmitter from 'eventemitter3';
import type { SpvEvent } from '../types';

/**
 * Thin wrapper around EventEmitter3 to strongly type SPV events.
 */
export class SpvEventBus {
  private readonly emitter = new EventEmitter<SpvEvent['type']>();

  /**
   * Emit a typed SPV event to all listeners.
   */
  emit(event: SpvEvent) {
    this.emitter.emit(event.type, event);
  }

  /**
   * Subscribe to a specific SPV event type.
   */
  on<T extends SpvEvent['type']>(type: T, handler: (event: Extract<SpvEvent, { type: T }>) => void) {
    this.emitter.on(type, handler);
  }

  /**
   * Unsubscribe a handler from a specific SPV event type.
   */
  off<T extends SpvEvent['type']>(type: T, handler: (event: Extract<SpvEvent, { type: T }>) => void) {
    this.emitter.off(type, handler);
  }
}

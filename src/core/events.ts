import { EventEmitter } from 'eventemitter3';
import type { SafegateEvents } from './types.js';

/**
 * Typed event bus shared by the guardrail components.
 */
export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof SafegateEvents>(event: K, listener: (data: SafegateEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof SafegateEvents>(event: K, listener: (data: SafegateEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof SafegateEvents>(event: K, listener: (data: SafegateEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof SafegateEvents>(event: K, data: SafegateEvents[K]): void {
    this.emitter.emit(event, data);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}

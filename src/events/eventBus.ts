/**
 * Provider Event Bus
 *
 * Type-safe event emitter carrying registry diagnostics: registrations,
 * provider construction and fallbacks. Listeners never affect the operation
 * that emitted the event; a throwing handler is logged and counted.
 *
 * ## Usage
 *
 * ```typescript
 * const unsubscribe = eventBus.on('provider:fallback', ({ primary, fallback, reason }) => {
 *   alerts.notify(`${primary} unavailable (${reason}), using ${fallback}`);
 * });
 * unsubscribe();
 * ```
 */

import { EventEmitter } from 'events';
import { createLogger } from '../utils/logger';

const log = createLogger('EVENTS');

// =============================================================================
// Event Type Definitions
// =============================================================================

export interface ProviderEvents {
  'provider:registered': {
    category: string;
    name: string;
    typeName: string;
    replaced: boolean;
  };
  'provider:created': {
    category: string;
    name: string;
    typeName: string;
  };
  'provider:fallback': {
    category: string;
    primary: string;
    fallback: string;
    reason: string;
  };
}

export type EventTypes = ProviderEvents;

export type EventName = keyof EventTypes;

export type EventHandler<E extends EventName> = (data: EventTypes[E]) => void;

// =============================================================================
// Event Bus Implementation
// =============================================================================

export interface EventBusConfig {
  // Maximum listeners per event (prevents memory leaks)
  maxListeners: number;
}

const DEFAULT_CONFIG: EventBusConfig = {
  maxListeners: 100,
};

export class TypedEventBus {
  private emitter = new EventEmitter();
  private metrics = {
    emitted: new Map<string, number>(),
    errors: new Map<string, number>(),
  };

  constructor(config: Partial<EventBusConfig> = {}) {
    const resolved = { ...DEFAULT_CONFIG, ...config };
    this.emitter.setMaxListeners(resolved.maxListeners);
  }

  /**
   * Subscribe to an event. Returns an unsubscribe function.
   */
  on<E extends EventName>(event: E, handler: EventHandler<E>): () => void {
    const wrappedHandler = (data: EventTypes[E]) => {
      this.runHandler(event, handler, data);
    };

    this.emitter.on(event, wrappedHandler);

    return () => {
      this.emitter.off(event, wrappedHandler);
    };
  }

  /**
   * Subscribe to an event (one-time)
   */
  once<E extends EventName>(event: E, handler: EventHandler<E>): void {
    this.emitter.once(event, (data: EventTypes[E]) => {
      this.runHandler(event, handler, data);
    });
  }

  emit<E extends EventName>(event: E, data: EventTypes[E]): void {
    log.debug(`Event emitted: ${event}`, { data });
    this.metrics.emitted.set(event, (this.metrics.emitted.get(event) || 0) + 1);
    this.emitter.emit(event, data);
  }

  getMetrics(): { emitted: Record<string, number>; errors: Record<string, number> } {
    return {
      emitted: Object.fromEntries(this.metrics.emitted),
      errors: Object.fromEntries(this.metrics.errors),
    };
  }

  private runHandler<E extends EventName>(
    event: E,
    handler: EventHandler<E>,
    data: EventTypes[E]
  ): void {
    try {
      handler(data);
    } catch (error) {
      log.error(`Error in event handler for ${event}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      this.metrics.errors.set(event, (this.metrics.errors.get(event) || 0) + 1);
    }
  }
}

/**
 * Process-wide event bus
 */
export const eventBus = new TypedEventBus();

/**
 * Create an isolated event bus for tests
 */
export function createTestEventBus(config?: Partial<EventBusConfig>): TypedEventBus {
  return new TypedEventBus(config);
}

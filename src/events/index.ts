/**
 * Events Module Exports
 */

export {
  eventBus,
  createTestEventBus,
  TypedEventBus,
  type EventBusConfig,
  type EventTypes,
  type EventName,
  type EventHandler,
  type ProviderEvents,
} from './eventBus';

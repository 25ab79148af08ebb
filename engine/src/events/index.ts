export * from './EngineEvents.js';
export { EventBus, type EventHandler } from './EventBus.js';

export * from './EngineEvents.js';
export * from './EventBus.js';

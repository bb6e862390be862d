export * from './Handler.js';
export * from './BaseHandler.js';
export * from './HandlerRegistry.js';

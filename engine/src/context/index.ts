export * from './BindingResolver.js';

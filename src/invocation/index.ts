export * from './deployment-invoker.js';

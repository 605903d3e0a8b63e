export * from './types.js';
export * from './env-file.js';
export * from './loader.js';
export * from './validator.js';
export * from './template.js';

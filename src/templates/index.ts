export * from './types.js';
export * from './recipe.js';
export * from './dockerfile-generator.js';

export * from './executable.js';
export * from './process-runner.js';
export * from './preflight.js';

export * from './types.js';
export * from './runpod-client.js';
export * from './endpoint-manager.js';
export * from './endpoint-tester.js';

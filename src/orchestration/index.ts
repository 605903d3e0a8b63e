export * from './types.js';
export * from './deployment-orchestrator.js';
export * from './endpoint-provisioner.js';
export * from './endpoint-verifier.js';

// Main entry point for the OCR serverless deployment tool
export * from './types/index.js';
export * from './errors.js';
export * from './logger.js';
export * from './config/index.js';
export * from './preflight/index.js';
export * from './invocation/index.js';
export * from './provisioning/index.js';
export * from './orchestration/index.js';
export * from './templates/index.js';

// Main deployment function
export { deploy } from './orchestration/deployment-orchestrator.js';

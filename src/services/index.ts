export * from './process-launcher.service.js';
export * from './update-orchestrator.service.js';
export * from './winget.service.js';

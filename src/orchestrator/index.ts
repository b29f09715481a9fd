export * from './test-automation-orchestrator.js';

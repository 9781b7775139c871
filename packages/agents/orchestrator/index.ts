export { Orchestrator, type OrchestratorConfig, type RunOptions } from './coordinator.js';
export { BatchRunner, buildSummary, type BatchOptions, type BatchProgress, type BatchResult, type DocumentRunResult } from './batch-runner.js';
export { createAgent, createAgentSet, type AgentSet, type AgentSetDeps } from './agent-factory.js';

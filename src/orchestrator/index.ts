export { RefactorOrchestrator, isTestFile, needsRepair } from './RefactorOrchestrator.js';
export { createOrchestrator, type AssembledRun, type OrchestratorOverrides } from './createOrchestrator.js';
export type * from './types.js';

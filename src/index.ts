/**
 * codemender
 *
 * Library entry point: sandboxed file store, tool adapters, decision roles
 * and the repair orchestrator.
 */

// Core
export * from './core/types.js';
export { SandboxViolationError, ConfigurationError, errorMessage } from './core/errors.js';
export {
  getDefaultConfig,
  mergeConfig,
  validateConfig,
  withProviderCredential,
  resolveTargetDir,
  DEFAULT_MODELS,
  type CodemenderConfig,
  type ConfigOverrides,
  type ToolsConfig,
  type SelectionConfig
} from './core/config.js';
export { OutputSanitizer, getSanitizer, redactSecrets } from './core/OutputSanitizer.js';

// Sandbox and tools
export { SandboxFileStore, BACKUP_DIR_NAME, backupFileName } from './services/SandboxFileStore.js';
export { runCommand, splitCommand, type CommandRunner, type ProcessOutcome } from './capabilities/process/runCommand.js';
export { StaticAnalyzer } from './capabilities/analysis/StaticAnalyzer.js';
export { TestRunner, type TestRunnerOptions } from './capabilities/testing/TestRunner.js';
export { SyntaxChecker } from './capabilities/ast/SyntaxChecker.js';

// Language models
export * from './providers/index.js';
export { PromptBuilder, type Prompt } from './prompts/PromptBuilder.js';
export { extractJson, stripCodeFences } from './prompts/responseParsing.js';

// Roles, audit, orchestration
export * from './agents/index.js';
export { JsonlAuditLog } from './audit/AuditLog.js';
export type * from './audit/types.js';
export * from './orchestrator/index.js';

/**
 * Wires the real collaborators for a run from a validated configuration
 */

import * as path from 'path';
import { AuditorRole } from '../agents/AuditorRole.js';
import { FixerRole } from '../agents/FixerRole.js';
import { JudgeRole } from '../agents/JudgeRole.js';
import { JsonlAuditLog } from '../audit/AuditLog.js';
import type { AuditSink } from '../audit/types.js';
import { StaticAnalyzer } from '../capabilities/analysis/StaticAnalyzer.js';
import { SyntaxChecker } from '../capabilities/ast/SyntaxChecker.js';
import type { CommandRunner } from '../capabilities/process/runCommand.js';
import { TestRunner } from '../capabilities/testing/TestRunner.js';
import type { CodemenderConfig } from '../core/config.js';
import { ProviderFactory } from '../providers/ProviderFactory.js';
import type { LLMClient } from '../providers/types.js';
import { PromptBuilder } from '../prompts/PromptBuilder.js';
import { SandboxFileStore } from '../services/SandboxFileStore.js';
import { RefactorOrchestrator } from './RefactorOrchestrator.js';

export interface OrchestratorOverrides {
  client?: LLMClient;
  audit?: AuditSink;
  runner?: CommandRunner;
  /** Base for a relative audit log path (default: process.cwd()) */
  cwd?: string;
}

export interface AssembledRun {
  orchestrator: RefactorOrchestrator;
  store: SandboxFileStore;
  audit: AuditSink;
}

export function createOrchestrator(config: CodemenderConfig, overrides: OrchestratorOverrides = {}): AssembledRun {
  const cwd = overrides.cwd ?? process.cwd();
  const { tools, selection } = config;

  const store = new SandboxFileStore(config.targetDir, { extensions: config.extensions });
  const audit = overrides.audit
    ?? new JsonlAuditLog(path.isAbsolute(config.auditLogPath) ? config.auditLogPath : path.resolve(cwd, config.auditLogPath));
  const client = overrides.client ?? ProviderFactory.createClient(config.provider);
  const prompts = new PromptBuilder();
  const roleDeps = { client, audit, prompts };

  const orchestrator = new RefactorOrchestrator(
    {
      store,
      analyzer: new StaticAnalyzer(store, {
        command: tools.analyzerCommand,
        timeoutMs: tools.analyzerTimeoutMs,
        runner: overrides.runner
      }),
      testRunner: new TestRunner(store, {
        command: tools.testCommand,
        timeoutMs: tools.testTimeoutMs,
        runner: overrides.runner
      }),
      syntaxChecker: new SyntaxChecker(store, {
        pythonCommand: tools.pythonCommand,
        timeoutMs: tools.syntaxTimeoutMs,
        runner: overrides.runner
      }),
      auditor: new AuditorRole(roleDeps, {
        scoreThreshold: selection.scoreThreshold,
        issueLimit: selection.fallbackIssueLimit
      }),
      fixer: new FixerRole(roleDeps),
      judge: new JudgeRole(roleDeps),
      audit
    },
    { maxIterations: config.maxIterations, selection }
  );

  return { orchestrator, store, audit };
}

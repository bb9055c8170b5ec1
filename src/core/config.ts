/**
 * Configuration
 *
 * Default configuration and environment variable loading for codemender.
 * The CLI loads `.env` through dotenv before calling getDefaultConfig();
 * nothing below reads process.env on its own.
 */

import { existsSync, statSync } from 'fs';
import { isAbsolute, resolve } from 'path';
import type { Provider, ProviderConfig } from '../providers/types.js';
import { PROVIDERS } from '../providers/types.js';

export type Environment = Record<string, string | undefined>;

export interface ToolsConfig {
  /** Analyzer executable, optionally followed by fixed arguments */
  analyzerCommand: string;
  testCommand: string;
  pythonCommand: string;
  analyzerTimeoutMs: number;
  testTimeoutMs: number;
  syntaxTimeoutMs: number;
}

export interface SelectionConfig {
  /** Files scoring below this are repaired */
  scoreThreshold: number;
  /** Files with more issues than this are repaired */
  issueThreshold: number;
  /** Issues turned into plan steps when the auditor response is unusable */
  fallbackIssueLimit: number;
  /** Substrings of a relative path that mark it as a test file */
  testFileMarkers: string[];
}

export interface CodemenderConfig {
  targetDir: string;
  maxIterations: number;
  extensions: string[];
  provider: ProviderConfig;
  tools: ToolsConfig;
  selection: SelectionConfig;
  auditLogPath: string;
}

export interface ConfigOverrides {
  targetDir?: string;
  maxIterations?: number;
  extensions?: string[];
  provider?: Partial<ProviderConfig>;
  tools?: Partial<ToolsConfig>;
  selection?: Partial<SelectionConfig>;
  auditLogPath?: string;
}

export const DEFAULT_MODELS: Record<Provider, string> = {
  claude: 'claude-sonnet-4-20250514',
  openai: 'gpt-4o-mini',
  ollama: 'qwen2.5-coder:7b'
};

export function parseProvider(value: string | undefined): Provider {
  const candidate = (value ?? 'claude').trim().toLowerCase();
  const match = PROVIDERS.find(p => p === candidate);
  if (!match) {
    throw new Error(`Unknown provider "${value}". Expected one of: ${PROVIDERS.join(', ')}`);
  }
  return match;
}

export function parseExtensions(value: string | undefined): string[] {
  return (value ?? '.py')
    .split(',')
    .map(ext => ext.trim())
    .filter(ext => ext.length > 0)
    .map(ext => (ext.startsWith('.') ? ext : `.${ext}`));
}

export function apiKeyFor(provider: Provider, env: Environment): string | undefined {
  switch (provider) {
    case 'claude':
      return env.ANTHROPIC_API_KEY;
    case 'openai':
      return env.OPENAI_API_KEY;
    case 'ollama':
      return undefined;
  }
}

/**
 * Numeric variable; unset or blank gives the fallback. Anything Number()
 * cannot read in full (such as "60s") becomes NaN for validateConfig to report.
 */
export function numberFrom(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  return Number(value.trim());
}

export function getDefaultConfig(env: Environment = {}): CodemenderConfig {
  const provider = parseProvider(env.CODEMENDER_PROVIDER);

  return {
    targetDir: env.CODEMENDER_TARGET_DIR ?? './sandbox',
    maxIterations: numberFrom(env.CODEMENDER_MAX_ITERATIONS, 10),
    extensions: parseExtensions(env.CODEMENDER_EXTENSIONS),
    provider: {
      provider,
      model: env.CODEMENDER_MODEL ?? DEFAULT_MODELS[provider],
      apiKey: apiKeyFor(provider, env),
      apiEndpoint: env.CODEMENDER_API_ENDPOINT,
      maxTokens: numberFrom(env.CODEMENDER_MAX_TOKENS, 8192),
      timeoutMs: numberFrom(env.CODEMENDER_LLM_TIMEOUT_MS, 120000)
    },
    tools: {
      analyzerCommand: env.CODEMENDER_ANALYZER_CMD ?? 'pylint',
      testCommand: env.CODEMENDER_TEST_CMD ?? 'pytest',
      pythonCommand: env.CODEMENDER_PYTHON_CMD ?? 'python3',
      analyzerTimeoutMs: numberFrom(env.CODEMENDER_ANALYZER_TIMEOUT_MS, 30000),
      testTimeoutMs: numberFrom(env.CODEMENDER_TEST_TIMEOUT_MS, 60000),
      syntaxTimeoutMs: numberFrom(env.CODEMENDER_SYNTAX_TIMEOUT_MS, 10000)
    },
    selection: {
      scoreThreshold: numberFrom(env.CODEMENDER_SCORE_THRESHOLD, 8),
      issueThreshold: numberFrom(env.CODEMENDER_ISSUE_THRESHOLD, 5),
      fallbackIssueLimit: 5,
      testFileMarkers: ['test_', '/tests/']
    },
    auditLogPath: env.CODEMENDER_AUDIT_LOG ?? 'logs/experiment_data.jsonl'
  };
}

/**
 * Shallow merge that ignores undefined values, so unset CLI options keep the base value
 */
function assignDefined<T extends object>(base: T, patch: Partial<T> | undefined): T {
  const result = { ...base };
  if (!patch) return result;
  for (const [key, value] of Object.entries(patch)) {
    if (value !== undefined) {
      Reflect.set(result, key, value);
    }
  }
  return result;
}

export function mergeConfig(base: CodemenderConfig, overrides: ConfigOverrides): CodemenderConfig {
  const { provider: providerPatch, tools, selection, ...topLevel } = overrides;
  const provider = assignDefined(base.provider, providerPatch);

  // A different provider never inherits the old credential, nor the old model unless one is given
  if (providerPatch?.provider && providerPatch.provider !== base.provider.provider) {
    provider.apiKey = providerPatch.apiKey;
    provider.model = providerPatch.model ?? DEFAULT_MODELS[providerPatch.provider];
  }

  return {
    ...assignDefined(base, topLevel),
    provider,
    tools: assignDefined(base.tools, tools),
    selection: assignDefined(base.selection, selection)
  };
}

/**
 * Credential lookup after a provider override, since the key lives under a
 * provider-specific variable
 */
export function withProviderCredential(config: CodemenderConfig, env: Environment): CodemenderConfig {
  if (config.provider.apiKey) return config;
  return {
    ...config,
    provider: { ...config.provider, apiKey: apiKeyFor(config.provider.provider, env) }
  };
}

export function resolveTargetDir(config: CodemenderConfig, cwd: string): string {
  return isAbsolute(config.targetDir) ? config.targetDir : resolve(cwd, config.targetDir);
}

export interface ValidationOptions {
  /** Commands that never call a model skip the credential check */
  requireCredential?: boolean;
}

export function validateConfig(config: CodemenderConfig, options: ValidationOptions = {}): string[] {
  const errors: string[] = [];
  const requireCredential = options.requireCredential ?? true;

  if (requireCredential && config.provider.provider === 'claude' && !config.provider.apiKey) {
    errors.push('ANTHROPIC_API_KEY environment variable is required for the claude provider');
  }

  if (requireCredential && config.provider.provider === 'openai' && !config.provider.apiKey) {
    errors.push('OPENAI_API_KEY environment variable is required for the openai provider');
  }

  if (!existsSync(config.targetDir)) {
    errors.push(`Directory '${config.targetDir}' does not exist`);
  } else if (!statSync(config.targetDir).isDirectory()) {
    errors.push(`'${config.targetDir}' is not a directory`);
  }

  if (!Number.isInteger(config.maxIterations) || config.maxIterations <= 0) {
    errors.push('maxIterations must be a positive integer');
  }

  if (config.extensions.length === 0) {
    errors.push('At least one file extension is required');
  }

  const commands: Array<[string, string]> = [
    ['analyzerCommand', config.tools.analyzerCommand],
    ['testCommand', config.tools.testCommand],
    ['pythonCommand', config.tools.pythonCommand]
  ];
  for (const [name, command] of commands) {
    if (command.trim() === '') {
      errors.push(`${name} must not be empty`);
    }
  }

  const positives: Array<[string, number | undefined]> = [
    ['provider.maxTokens', config.provider.maxTokens],
    ['provider.timeoutMs', config.provider.timeoutMs],
    ['analyzerTimeoutMs', config.tools.analyzerTimeoutMs],
    ['testTimeoutMs', config.tools.testTimeoutMs],
    ['syntaxTimeoutMs', config.tools.syntaxTimeoutMs]
  ];
  for (const [name, value] of positives) {
    if (value !== undefined && (!Number.isFinite(value) || value <= 0)) {
      errors.push(`${name} must be a positive number`);
    }
  }

  if (!Number.isFinite(config.selection.scoreThreshold)) {
    errors.push('scoreThreshold must be a number');
  }

  if (!Number.isInteger(config.selection.issueThreshold) || config.selection.issueThreshold < 0) {
    errors.push('issueThreshold must be a non-negative integer');
  }

  return errors;
}

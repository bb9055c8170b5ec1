/**
 * Shared option handling for the CLI commands
 */

import chalk from 'chalk';
import {
  getDefaultConfig,
  mergeConfig,
  parseExtensions,
  parseProvider,
  resolveTargetDir,
  validateConfig,
  withProviderCredential,
  type CodemenderConfig,
  type ConfigOverrides,
  type Environment,
  type ValidationOptions
} from '../core/config.js';
import { ConfigurationError, errorMessage } from '../core/errors.js';

/** Raw option values as commander hands them over */
export interface CommonOptions {
  targetDir?: string;
  maxIterations?: string;
  provider?: string;
  model?: string;
  extensions?: string;
  auditLog?: string;
}

function parsePositiveInt(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError([`${name} must be a positive integer, got "${value}"`]);
  }
  return parsed;
}

export function toOverrides(options: CommonOptions): ConfigOverrides {
  let provider: ConfigOverrides['provider'];
  try {
    provider = {
      provider: options.provider ? parseProvider(options.provider) : undefined,
      model: options.model
    };
  } catch (error) {
    throw new ConfigurationError([errorMessage(error)]);
  }

  return {
    targetDir: options.targetDir,
    maxIterations: options.maxIterations ? parsePositiveInt(options.maxIterations, '--max-iterations') : undefined,
    extensions: options.extensions ? parseExtensions(options.extensions) : undefined,
    auditLogPath: options.auditLog,
    provider
  };
}

/**
 * Environment defaults, then CLI overrides, then validation.
 * Throws ConfigurationError listing every problem found.
 */
export function loadConfig(
  options: CommonOptions,
  validation: ValidationOptions = {},
  env: Environment = process.env,
  cwd: string = process.cwd()
): CodemenderConfig {
  let base: CodemenderConfig;
  try {
    base = getDefaultConfig(env);
  } catch (error) {
    throw new ConfigurationError([errorMessage(error)]);
  }

  const merged = withProviderCredential(mergeConfig(base, toOverrides(options)), env);
  const config = { ...merged, targetDir: resolveTargetDir(merged, cwd) };

  const problems = validateConfig(config, validation);
  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
  return config;
}

/**
 * Print a startup error and exit with status 1
 */
export function exitWithConfigError(error: unknown): never {
  if (error instanceof ConfigurationError) {
    console.error(chalk.red('Configuration error:'));
    for (const problem of error.problems) {
      console.error(chalk.red(`  - ${problem}`));
    }
  } else {
    console.error(chalk.red(errorMessage(error)));
  }
  process.exit(1);
}

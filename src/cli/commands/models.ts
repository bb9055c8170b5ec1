/**
 * Models Command
 *
 * Check which providers are usable with the current environment.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { apiKeyFor, DEFAULT_MODELS, getDefaultConfig, parseProvider } from '../../core/config.js';
import { errorMessage } from '../../core/errors.js';
import { ProviderFactory } from '../../providers/ProviderFactory.js';
import { PROVIDERS, type Provider, type ProviderConfig } from '../../providers/types.js';

interface ModelsOptions {
  provider?: string;
  model?: string;
}

export const modelsCommand = new Command('models')
  .description('Check provider availability')
  .option('-p, --provider <name>', 'Only check this provider')
  .option('-m, --model <model>', 'Model to check (with --provider)')
  .action(async (options: ModelsOptions) => {
    let providers: Provider[];
    try {
      providers = options.provider ? [parseProvider(options.provider)] : [...PROVIDERS];
    } catch (error) {
      console.error(chalk.red(errorMessage(error)));
      process.exit(1);
    }

    const defaults = getDefaultConfig(process.env).provider;
    let anyAvailable = false;

    console.log();
    for (const provider of providers) {
      const config: ProviderConfig = {
        provider,
        model: options.model && options.provider ? options.model
          : provider === defaults.provider ? defaults.model
          : DEFAULT_MODELS[provider],
        apiKey: apiKeyFor(provider, process.env),
        apiEndpoint: provider === defaults.provider ? defaults.apiEndpoint : undefined,
        timeoutMs: defaults.timeoutMs
      };

      const spinner = ora(`Checking ${provider} (${config.model})...`).start();
      const availability = await ProviderFactory.checkAvailability(config);
      if (availability.available) {
        anyAvailable = true;
        spinner.succeed(`${chalk.white(provider)} ${chalk.dim(config.model)}`);
      } else {
        spinner.fail(`${chalk.white(provider)} ${chalk.dim(config.model)} ${chalk.red(availability.error ?? 'unavailable')}`);
      }
    }
    console.log();

    if (!anyAvailable) {
      process.exit(1);
    }
  });

/**
 * Run Command
 *
 * Full discovery -> repair -> validation run over a sandbox.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CodemenderConfig } from '../../core/config.js';
import { errorMessage } from '../../core/errors.js';
import { createOrchestrator } from '../../orchestrator/createOrchestrator.js';
import type { FileOutcome, RunReport } from '../../orchestrator/types.js';
import { exitWithConfigError, loadConfig, type CommonOptions } from '../options.js';

interface RunOptions extends CommonOptions {
  json?: boolean;
}

function formatScore(score: number | undefined): string {
  return score === undefined ? 'n/a' : score.toFixed(2);
}

function statusLabel(status: FileOutcome['status']): string {
  switch (status) {
    case 'success':
      return chalk.green('success');
    case 'exhausted':
      return chalk.yellow('exhausted');
    case 'error':
      return chalk.red('error');
  }
}

export function printRunReport(report: RunReport): void {
  const { discovery, files, finalValidation } = report;

  console.log();
  console.log(chalk.cyan('Run Report'));
  console.log(chalk.dim('─'.repeat(50)));
  console.log(chalk.dim('Files found:'), chalk.white(discovery.filesFound.toString()));
  console.log(chalk.dim('Test files skipped:'), chalk.white(discovery.testFiles.length.toString()));
  console.log(chalk.dim('Selected for repair:'), chalk.white(discovery.selected.length.toString()));
  if (discovery.dropped.length > 0) {
    console.log(chalk.dim('Dropped (no plan):'), chalk.white(discovery.dropped.join(', ')));
  }
  console.log(chalk.dim('Total iterations:'), chalk.white(report.totalIterations.toString()));
  const processed = report.filesProcessed.length > 0 ? ` (${report.filesProcessed.join(', ')})` : '';
  console.log(chalk.dim('Files processed:'), chalk.white(`${report.filesProcessed.length}${processed}`));
  console.log();

  for (const file of files) {
    const scores = `${formatScore(file.initialScore)} -> ${formatScore(file.finalScore)}`;
    console.log(`  ${statusLabel(file.status)}  ${file.relativePath}  ${chalk.dim(`${file.iterations} it, score ${scores}`)}`);
    if (file.reason) {
      console.log(chalk.dim(`           ${file.reason}`));
    }
  }

  console.log();
  if (finalValidation) {
    const tests = finalValidation.testsPassed === undefined
      ? chalk.yellow(`not run (${finalValidation.testError ?? 'unknown error'})`)
      : finalValidation.testsPassed ? chalk.green('passed') : chalk.red('failed');
    console.log(chalk.dim('Final tests:'), tests);
    if (finalValidation.statistics) {
      const s = finalValidation.statistics;
      console.log(chalk.dim('Test counts:'), chalk.white(`${s.passed} passed, ${s.failed} failed, ${s.errors} errors, ${s.skipped} skipped`));
    }
    console.log(
      chalk.dim('Average score:'),
      chalk.white(`${discovery.averageScore.toFixed(2)} -> ${finalValidation.averageScore.toFixed(2)}`)
    );
  } else {
    console.log(chalk.dim('Nothing to repair; final validation skipped.'));
  }
  console.log();
}

export const runCommand = new Command('run')
  .description('Discover weak files in the sandbox and repair them until the tests pass')
  .option('-t, --target-dir <path>', 'Sandbox directory')
  .option('-n, --max-iterations <n>', 'Maximum repair iterations per file')
  .option('-p, --provider <name>', 'LLM provider (claude, openai, ollama)')
  .option('-m, --model <model>', 'Model identifier')
  .option('-e, --extensions <list>', 'Comma-separated source extensions (e.g. .py,.pyi)')
  .option('--audit-log <path>', 'Audit log file (JSON lines)')
  .option('--json', 'Print the report as JSON')
  .action(async (options: RunOptions) => {
    let config: CodemenderConfig;
    try {
      config = loadConfig(options);
    } catch (error) {
      exitWithConfigError(error);
    }

    console.log(chalk.cyan(`codemender: ${config.targetDir}`));
    console.log(chalk.dim(`Provider: ${config.provider.provider} (${config.provider.model}), max ${config.maxIterations} iterations`));

    try {
      const { orchestrator } = createOrchestrator(config);
      const report = await orchestrator.run();

      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        printRunReport(report);
      }
    } catch (error) {
      console.error(chalk.red('Run failed:'), errorMessage(error));
      process.exit(1);
    }
  });

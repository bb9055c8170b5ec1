/**
 * Analyze Command
 *
 * Read-only look at a sandbox: per-file scores, issue counts, and which
 * files a run would select. Optionally asks the auditor for an overview.
 */

import * as path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { AuditorRole } from '../../agents/AuditorRole.js';
import type { CodebaseFileSummary, CodebaseOverview } from '../../agents/types.js';
import { JsonlAuditLog } from '../../audit/AuditLog.js';
import { StaticAnalyzer } from '../../capabilities/analysis/StaticAnalyzer.js';
import type { CodemenderConfig } from '../../core/config.js';
import { errorMessage } from '../../core/errors.js';
import { isTestFile, needsRepair } from '../../orchestrator/RefactorOrchestrator.js';
import { ProviderFactory } from '../../providers/ProviderFactory.js';
import { SandboxFileStore } from '../../services/SandboxFileStore.js';
import { exitWithConfigError, loadConfig, type CommonOptions } from '../options.js';

interface AnalyzeOptions extends CommonOptions {
  json?: boolean;
  overview?: boolean;
}

interface FileRow extends CodebaseFileSummary {
  testFile: boolean;
  selected: boolean;
  error?: string;
}

export const analyzeCommand = new Command('analyze')
  .description('Score every source file in the sandbox without changing anything')
  .option('-t, --target-dir <path>', 'Sandbox directory')
  .option('-e, --extensions <list>', 'Comma-separated source extensions')
  .option('-p, --provider <name>', 'LLM provider for --overview')
  .option('-m, --model <model>', 'Model identifier for --overview')
  .option('--audit-log <path>', 'Audit log file (JSON lines)')
  .option('--overview', 'Ask the auditor for a prioritized codebase overview')
  .option('--json', 'Output as JSON')
  .action(async (options: AnalyzeOptions) => {
    let config: CodemenderConfig;
    try {
      config = loadConfig(options, { requireCredential: options.overview === true });
    } catch (error) {
      exitWithConfigError(error);
    }

    const spinner = ora('Analyzing sandbox...').start();

    try {
      const store = new SandboxFileStore(config.targetDir, { extensions: config.extensions });
      const analyzer = new StaticAnalyzer(store, {
        command: config.tools.analyzerCommand,
        timeoutMs: config.tools.analyzerTimeoutMs
      });

      const info = await store.info();
      const files = await store.enumerate();
      if (!files.success) {
        throw new Error(files.failure.message);
      }

      const rows: FileRow[] = [];
      for (const record of files.value) {
        spinner.text = `Analyzing ${record.relativePath}...`;
        const testFile = isTestFile(record.relativePath, config.selection.testFileMarkers);
        const result = await analyzer.analyze(record.path);
        rows.push({
          relativePath: record.relativePath,
          size: record.size,
          testFile,
          score: result.success ? result.value.score : undefined,
          totalIssues: result.success ? result.value.totalIssues : 0,
          selected: !testFile && result.success && needsRepair(result.value, config.selection),
          error: result.success ? undefined : result.failure.message
        });
      }
      spinner.succeed(`Analyzed ${rows.length} files`);

      let overview: CodebaseOverview | undefined;
      if (options.overview) {
        const candidates = rows.filter(row => !row.testFile && !row.error);
        const overviewSpinner = ora('Requesting codebase overview...').start();
        const auditor = new AuditorRole({
          client: ProviderFactory.createClient(config.provider),
          audit: new JsonlAuditLog(path.resolve(config.auditLogPath))
        });
        overview = await auditor.analyzeCodebase(candidates);
        if (overview.success) {
          overviewSpinner.succeed('Overview received');
        } else {
          overviewSpinner.fail(overview.error);
        }
      }

      if (options.json) {
        console.log(JSON.stringify({ sandbox: info, files: rows, overview }, null, 2));
        return;
      }

      console.log();
      console.log(chalk.cyan('Sandbox'));
      console.log(chalk.dim('─'.repeat(50)));
      console.log(chalk.dim('Root:'), chalk.white(info.root));
      console.log(chalk.dim('Backups:'), chalk.white(info.backupDir));
      console.log(chalk.dim('Source files:'), chalk.white(info.sourceFileCount.toString()));
      console.log();

      for (const row of rows) {
        const score = row.score === undefined ? '  n/a' : row.score.toFixed(2).padStart(5);
        const marker = row.testFile ? chalk.dim('test')
          : row.selected ? chalk.yellow('fix ')
          : chalk.green('ok  ');
        const suffix = row.error ? chalk.red(` (${row.error})`) : chalk.dim(` ${row.totalIssues} issues`);
        console.log(`  ${marker} ${score}  ${row.relativePath}${suffix}`);
      }

      const selectedCount = rows.filter(row => row.selected).length;
      console.log();
      console.log(chalk.dim('Would repair:'), chalk.white(selectedCount.toString()));

      if (overview?.success) {
        console.log();
        console.log(chalk.cyan('Auditor Overview'));
        console.log(chalk.dim('─'.repeat(50)));
        if (overview.summary) console.log(overview.summary);
        for (const item of overview.priorities) {
          console.log(`  [${item.priority}] ${item.file}${item.reason ? chalk.dim(` - ${item.reason}`) : ''}`);
        }
      }
      console.log();
    } catch (error) {
      spinner.fail(chalk.red('Analysis failed'));
      console.error(errorMessage(error));
      process.exit(1);
    }
  });

/**
 * Backups Command
 *
 * List the backups a sandbox has accumulated, newest first.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CodemenderConfig } from '../../core/config.js';
import { SandboxFileStore } from '../../services/SandboxFileStore.js';
import { exitWithConfigError, loadConfig, type CommonOptions } from '../options.js';

interface BackupsOptions extends CommonOptions {
  json?: boolean;
}

export const backupsCommand = new Command('backups')
  .description('List file backups in the sandbox')
  .option('-t, --target-dir <path>', 'Sandbox directory')
  .option('--json', 'Output as JSON')
  .action(async (options: BackupsOptions) => {
    let config: CodemenderConfig;
    try {
      config = loadConfig(options, { requireCredential: false });
    } catch (error) {
      exitWithConfigError(error);
    }

    const store = new SandboxFileStore(config.targetDir, { extensions: config.extensions });
    const backups = await store.listBackups();
    if (!backups.success) {
      console.error(chalk.red(backups.failure.message));
      process.exit(1);
    }

    if (options.json) {
      console.log(JSON.stringify(backups.value, null, 2));
      return;
    }

    if (backups.value.length === 0) {
      console.log(chalk.dim('No backups found.'));
      return;
    }

    console.log();
    console.log(chalk.cyan(`Backups in ${store.backupDir}`));
    console.log(chalk.dim('─'.repeat(50)));
    for (const backup of backups.value) {
      console.log(
        `  ${backup.name}`,
        chalk.dim(`${backup.originalStem}${backup.extension}, ${backup.createdAt.toLocaleString()}, ${backup.size} bytes`)
      );
    }
    console.log();
  });

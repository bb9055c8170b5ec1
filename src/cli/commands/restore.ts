/**
 * Restore Command
 *
 * Copy a backup over a sandbox file. A bare backup name is looked up in the
 * sandbox's backup directory.
 */

import * as path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import type { CodemenderConfig } from '../../core/config.js';
import { SandboxFileStore } from '../../services/SandboxFileStore.js';
import { exitWithConfigError, loadConfig, type CommonOptions } from '../options.js';

export const restoreCommand = new Command('restore')
  .description('Restore a sandbox file from one of its backups')
  .argument('<backup>', 'Backup file name or path')
  .argument('<target>', 'File to overwrite, relative to the sandbox')
  .option('-t, --target-dir <path>', 'Sandbox directory')
  .action(async (backup: string, target: string, options: CommonOptions) => {
    let config: CodemenderConfig;
    try {
      config = loadConfig(options, { requireCredential: false });
    } catch (error) {
      exitWithConfigError(error);
    }

    const store = new SandboxFileStore(config.targetDir, { extensions: config.extensions });
    const backupPath = backup.includes('/') || backup.includes(path.sep)
      ? backup
      : path.join(store.backupDir, backup);

    const restored = await store.restore(backupPath, target);
    if (!restored.success) {
      console.error(chalk.red(`Restore failed (${restored.failure.kind}): ${restored.failure.message}`));
      process.exit(1);
    }

    console.log(chalk.green(`Restored ${restored.value.path}`));
  });

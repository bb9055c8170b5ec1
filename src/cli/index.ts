#!/usr/bin/env node
/**
 * codemender CLI
 *
 * Command-line interface for the sandboxed code repair loop.
 */

import { config as loadDotenv } from 'dotenv';
import { Command } from 'commander';
import { runCommand } from './commands/run.js';
import { analyzeCommand } from './commands/analyze.js';
import { backupsCommand } from './commands/backups.js';
import { restoreCommand } from './commands/restore.js';
import { modelsCommand } from './commands/models.js';

loadDotenv();

const program = new Command();

program
  .name('codemender')
  .description('Static analysis, LLM repair and test-driven verification for a sandboxed codebase')
  .version('0.1.0');

program.addCommand(runCommand);
program.addCommand(analyzeCommand);
program.addCommand(backupsCommand);
program.addCommand(restoreCommand);
program.addCommand(modelsCommand);

await program.parseAsync();

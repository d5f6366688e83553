#!/usr/bin/env node
// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { program } from 'commander';
import chalk from 'chalk';
import {
  compareCommand,
  deleteCommand,
  handleCommandError,
  initCommand,
  listCommand,
  personasCommand,
  runCommand,
  showCommand,
  snapshotCommand,
  stagesCommand,
} from './cli/commands.js';
import type { GlobalOptions, ListOptions, RunOptions } from './cli/commands.js';
import { VERSION } from './version.js';
import { logger, parseLogLevel } from './logger.js';

// CLI setup
program
  .name('uxplore')
  .description('Staged UX exploration of mobile apps')
  .version(VERSION, '-v, --version', 'Output the current version')
  .option('-p, --provider <type>', 'Synthesis provider (auto, anthropic, openai, ollama, mock)')
  .option('-m, --model <name>', 'Model to use for synthesis')
  .option('--base-url <url>', 'Base URL for API (for self-hosted models)')
  .option('--database <path>', 'SQLite database file')
  .option('--prompts-dir <dir>', 'Directory of prompt templates overriding the bundled ones')
  .option('--agent-command <command>', 'Executable that runs the exploration agent')
  .option('--verbose', 'Show stage timing and agent narration')
  .option('--debug', 'Show store and provider details')
  .option('--trace', 'Show full prompts and completions')
  .hook('preAction', () => {
    logger.setLevel(parseLogLevel(globals()));
  });

function globals(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

program
  .command('run <app>')
  .description('Explore an app through all four stages')
  .option('-c, --category <name>', 'App category')
  .option('--persona <name>', 'Persona for stage 2 (UX Designer, QA Engineer, Product Manager)')
  .option('-n, --navigation <text>', 'Custom navigation instructions for stages 2 and 3')
  .option('-d, --max-depth <n>', 'Navigation depth, scales the agent step budget')
  .option('--save-to-memory', 'Save a comparison snapshot when the run completes')
  .option('--id <id>', 'Use this exploration id instead of a generated one')
  .action((app: string, options: RunOptions) => runCommand(app, options, globals()));

program
  .command('list')
  .description('List explorations, newest first')
  .option('-c, --category <name>', 'Only this category')
  .option('--persona <name>', 'Only this persona')
  .option('-l, --limit <n>', 'Maximum number of rows')
  .action((options: ListOptions) => listCommand(options, globals()));

program
  .command('show [id]')
  .description('Show the report of an exploration (latest when no id is given)')
  .option('--json', 'Print the raw report document')
  .action((id: string | undefined, options: { json?: boolean }) => showCommand(id, options, globals()));

program
  .command('stages <id>')
  .description('Show the stages of an exploration')
  .action((id: string) => stagesCommand(id, globals()));

program
  .command('compare')
  .description('Compare saved snapshots, best UX score first')
  .option('-c, --category <name>', 'Only this category')
  .option('--persona <name>', 'Only this persona')
  .action((options: { category?: string; persona?: string }) => compareCommand(options, globals()));

program
  .command('snapshot <id>')
  .description('Save a completed exploration for comparison')
  .option('--name <name>', 'Snapshot name (default "<app> - <date>")')
  .action((id: string, options: { name?: string }) => snapshotCommand(id, options, globals()));

program
  .command('delete <id>')
  .description('Delete an exploration and everything recorded for it')
  .action((id: string) => deleteCommand(id, globals()));

program
  .command('personas')
  .description('List personas and categories')
  .action(() => personasCommand());

program
  .command('init')
  .description('Write an example .uxplore.json in the current directory')
  .action(() => initCommand());

process.on('unhandledRejection', (reason) => {
  console.error(chalk.red(`\nUnhandled rejection: ${reason}`));
  process.exit(1);
});

program.parseAsync().catch(handleCommandError);

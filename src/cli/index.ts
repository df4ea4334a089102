#!/usr/bin/env node

import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { describeError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import { registerChannelCommand } from './commands/channel.js';
import { registerForumCommand } from './commands/forum.js';
import { registerRelayCommand } from './commands/relay.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('link-digest')
    .description('Summarize links shared in Discord channels and post the summaries back')
    .version('0.1.0');

  registerChannelCommand(program);
  registerForumCommand(program);
  registerRelayCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  dotenv.config();
  const program = buildProgram();
  try {
    await program.parseAsync(argv);
  } catch (error) {
    logger.error(`An unexpected error occurred: ${describeError(error)}`);
    process.exitCode = 1;
  }
}

if (process.env.NODE_ENV !== 'test') {
  void runCli();
}

#!/usr/bin/env node
/**
 * Helpdesk CLI Entry Point
 *
 * This is the main entry point for the `helpdesk` command.
 * It sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createContext } from './context.js';
import { createAskCommand } from './commands/ask.js';
import { createChatCommand } from './commands/chat.js';
import { createConfigCommand } from './commands/config.js';
import { createIndexCommand } from './commands/index.js';
import { createServeCommand } from './commands/serve.js';
import { GlobalOptionsSchema, parseInput } from './validation.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';
import {
  loadConfig,
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
} from '../config/index.js';
import { VERSION } from '../version.js';

// Create the root program
const program = new Command();

program
  .name('helpdesk')
  .description('Customer-support assistant answering from your knowledge base')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('helpdesk serve --port 8000')}                 Start the HTTP API
  ${chalk.cyan('helpdesk ask "How do I reset my password?"')}  Ask one question
  ${chalk.cyan('helpdesk ask "Transfer fees?" --fusion')}      Ask with RAG-Fusion
  ${chalk.cyan('helpdesk chat')}                              Multi-turn chat
  ${chalk.cyan('helpdesk index')}                             Build the persisted index
  ${chalk.cyan('helpdesk config set rag.hyde true')}          Change a setting
`);

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  return parseInput(GlobalOptionsSchema, program.opts());
}

const getContext = (): CommandContext => createContext(getGlobalOptions());

program.addCommand(createServeCommand(getContext));
program.addCommand(createAskCommand(getContext));
program.addCommand(createChatCommand(getContext));
program.addCommand(createIndexCommand(getContext));
program.addCommand(createConfigCommand(getContext));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

// Handle unknown commands gracefully
program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0] ?? ''}`,
    'Run: helpdesk --help  to see available commands'
  );
});

// Check provider keys before commands that call a provider
program.hook('preAction', (_thisCommand, actionCommand) => {
  const validationOptions = getValidationOptionsForCommand(actionCommand.name());
  if (validationOptions.skipLLM && validationOptions.skipEmbedding) {
    return;
  }

  const result = validateStartupConfig(loadConfig(), validationOptions);
  if (!result.valid) {
    printStartupValidation(result);
    throw new CLIError('Configuration validation failed', 'Fix the issues above and try again');
  }
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Catch errors that escape all try/catch blocks
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();

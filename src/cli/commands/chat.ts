/**
 * Chat Command
 *
 * Interactive multi-turn chat with the support assistant. The conversation
 * is kept in memory for the session and fed back into each prompt.
 *
 *   helpdesk chat
 *   helpdesk chat --fusion --rerank
 *
 * REPL Commands:
 *   /help      - Show available commands
 *   /history   - Show the conversation so far
 *   /clear     - Clear conversation history
 *   /exit      - Exit the chat (also: exit, quit)
 */

import * as readline from 'node:readline';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import type { SupportChatbot } from '../../agent/chatbot.js';
import { ConversationMemory } from '../../agent/memory.js';
import { PRODUCT_NAME } from '../../agent/prompts.js';
import { loadConfig } from '../../config/loader.js';
import { isCancellation } from '../../providers/errors.js';
import type { CommandContext } from '../types.js';
import { applyStrategyFlags, startChatbot } from '../utils/startup.js';
import { AskOptionsSchema, parseInput } from '../validation.js';
import { formatSources } from './ask.js';

// ============================================================================
// Types
// ============================================================================

interface ChatCommandOptions {
  topK?: string;
  fusion?: boolean;
  hyde?: boolean;
  rerank?: boolean;
}

/**
 * State for one chat session.
 */
export interface ChatState {
  chatbot: SupportChatbot;
  memory: ConversationMemory;
  /** Set while a question is being answered; Ctrl+C aborts it */
  inFlight?: AbortController;
}

interface REPLCommand {
  name: string;
  aliases: string[];
  description: string;
  /** Returns false to end the session */
  handler: (state: ChatState, ctx: CommandContext) => boolean;
}

// ============================================================================
// REPL Commands
// ============================================================================

const REPL_COMMANDS: REPLCommand[] = [
  {
    name: 'help',
    aliases: ['h', '?'],
    description: 'Show available commands',
    handler: (_state, ctx) => {
      ctx.log('');
      ctx.log(chalk.bold('Commands:'));
      for (const cmd of REPL_COMMANDS) {
        const aliases = cmd.aliases.length > 0 ? chalk.dim(` (/${cmd.aliases.join(', /')})`) : '';
        ctx.log(`  ${chalk.cyan(`/${cmd.name}`)}${aliases}  ${cmd.description}`);
      }
      ctx.log('');
      return true;
    },
  },
  {
    name: 'history',
    aliases: [],
    description: 'Show the conversation so far',
    handler: (state, ctx) => {
      const { turns } = state.memory;
      if (turns.length === 0) {
        ctx.log(chalk.dim('No messages yet.'));
        return true;
      }
      turns.forEach((turn, i) => {
        ctx.log(`${chalk.dim(`${i + 1}.`)} ${chalk.cyan('You:')} ${turn.query}`);
        ctx.log(`   ${chalk.green('Agent:')} ${turn.response}`);
      });
      return true;
    },
  },
  {
    name: 'clear',
    aliases: ['c'],
    description: 'Clear conversation history',
    handler: (state, ctx) => {
      state.memory.clear();
      ctx.log(chalk.dim('Conversation cleared.'));
      return true;
    },
  },
  {
    name: 'exit',
    aliases: ['quit', 'q'],
    description: 'Exit the chat',
    handler: (_state, ctx) => {
      ctx.log(chalk.dim('Goodbye!'));
      return false;
    },
  },
];

/**
 * Match `/name args` against the REPL commands (case-insensitive).
 * Bare `exit` and `quit` also match.
 *
 * @internal Exported for testing
 */
export function parseREPLCommand(input: string): REPLCommand | null {
  const trimmed = input.trim().toLowerCase();
  const name = trimmed.startsWith('/')
    ? (trimmed.slice(1).split(/\s+/)[0] ?? '')
    : trimmed === 'exit' || trimmed === 'quit'
      ? trimmed
      : null;
  if (name === null) return null;

  return REPL_COMMANDS.find((cmd) => cmd.name === name || cmd.aliases.includes(name)) ?? null;
}

// ============================================================================
// Line handling
// ============================================================================

/**
 * Handle one line of input.
 *
 * @returns false when the session should end
 * @internal Exported for testing
 */
export async function handleChatLine(
  line: string,
  state: ChatState,
  ctx: CommandContext
): Promise<boolean> {
  const input = line.trim();
  if (!input) return true;

  if (input.startsWith('/') || input.toLowerCase() === 'exit' || input.toLowerCase() === 'quit') {
    const command = parseREPLCommand(input);
    if (!command) {
      ctx.warn(`Unknown command: ${input.split(/\s+/)[0] ?? input}. Type /help for commands.`);
      return true;
    }
    return command.handler(state, ctx);
  }

  const controller = new AbortController();
  state.inFlight = controller;
  const spinner = process.stderr.isTTY && !ctx.options.json ? ora('Thinking...').start() : null;

  try {
    const answer = await state.chatbot.answer(input, {
      memory: state.memory,
      signal: controller.signal,
    });
    spinner?.stop();

    ctx.log('');
    ctx.log(`${chalk.green('Agent:')} ${answer.response}`);
    if (ctx.options.verbose && answer.sources.length > 0) {
      for (const source of formatSources(answer.sources)) {
        ctx.log(chalk.dim(`  ${source}`));
      }
    }
    ctx.log('');
  } catch (error) {
    spinner?.stop();
    if (!isCancellation(error) && !controller.signal.aborted) throw error;
    ctx.log(chalk.yellow('Cancelled.'));
  } finally {
    state.inFlight = undefined;
  }
  return true;
}

// ============================================================================
// REPL
// ============================================================================

function displayWelcome(ctx: CommandContext, strategy: string): void {
  ctx.log('');
  ctx.log(chalk.bold(`${PRODUCT_NAME} Support`));
  ctx.log(chalk.dim(`Retrieval: ${strategy}`));
  ctx.log(chalk.dim('Type /help for commands, "exit" to quit'));
  ctx.log('');
}

/**
 * Main REPL loop.
 *
 * Lines are handled one at a time: readline is paused while a question is
 * answered so typed-ahead input waits its turn.
 */
async function runChatREPL(state: ChatState, ctx: CommandContext): Promise<void> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: chalk.cyan('You: '),
    });

    let finished = false;
    const finish = (): void => {
      if (finished) return;
      finished = true;
      state.chatbot.close();
      resolve();
    };

    rl.on('line', (line) => {
      rl.pause();
      handleChatLine(line, state, ctx)
        .then((keepGoing) => {
          if (keepGoing) {
            rl.resume();
            rl.prompt();
          } else {
            rl.close();
          }
        })
        .catch((error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          ctx.error(message);
          rl.resume();
          rl.prompt();
        });
    });

    // First Ctrl+C cancels a pending answer; otherwise it leaves the chat
    rl.on('SIGINT', () => {
      if (state.inFlight) {
        state.inFlight.abort();
        return;
      }
      ctx.log('');
      ctx.log(chalk.dim('Goodbye!'));
      rl.close();
    });

    rl.on('close', finish);

    displayWelcome(ctx, state.chatbot.strategy);
    rl.prompt();
  });
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the chat command.
 *
 * @param getContext - Factory to get command context with global options
 */
export function createChatCommand(getContext: () => CommandContext): Command {
  return new Command('chat')
    .description('Interactive multi-turn chat with the support assistant')
    .option('-k, --top-k <number>', 'Number of articles given to the model')
    .option('--fusion', 'Expand each question into several queries and fuse the results')
    .option('--hyde', 'Search with a hypothetical answer instead of the question')
    .option('--rerank', 'Rerank retrieved articles with the LLM')
    .action(async (cmdOptions: ChatCommandOptions) => {
      const ctx = getContext();
      const flags = parseInput(AskOptionsSchema, cmdOptions);

      const config = applyStrategyFlags(loadConfig(), flags);
      const { chatbot } = await startChatbot(config, ctx);

      const memory = new ConversationMemory(config.memory.window, config.memory.max_turns);
      await runChatREPL({ chatbot, memory }, ctx);
    });
}

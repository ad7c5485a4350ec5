/**
 * Serve Command
 *
 * Starts the HTTP API.
 *
 *   helpdesk serve
 *   helpdesk serve --host 127.0.0.1 --port 9000
 *
 * The process keeps running until SIGTERM or Ctrl+C, then closes the
 * server and the index.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import { loadConfig } from '../../config/loader.js';
import { runServer } from '../../server/run.js';
import { setLogLevel } from '../../utils/logger.js';
import type { CommandContext } from '../types.js';
import { ServeOptionsSchema, parseInput } from '../validation.js';

interface ServeCommandOptions {
  host?: string;
  port?: string;
}

/**
 * Create the serve command.
 *
 * @param getContext - Factory to get command context with global options
 */
export function createServeCommand(getContext: () => CommandContext): Command {
  return new Command('serve')
    .description('Start the HTTP API server')
    .option('--host <host>', 'Interface to bind (default: server.host)')
    .option('-p, --port <port>', 'Port to listen on (default: server.port)')
    .action(async (cmdOptions: ServeCommandOptions) => {
      const ctx = getContext();
      const { host, port } = parseInput(ServeOptionsSchema, cmdOptions);

      const config = loadConfig();
      setLogLevel(ctx.options.verbose ? 'debug' : config.logging.level);

      const { address, init } = await runServer(config, { host, port });

      if (ctx.options.json) {
        console.log(JSON.stringify({ address, status: init.ok ? 'ok' : 'degraded' }));
        return;
      }
      ctx.log(`${chalk.green('✓')} Listening on ${chalk.cyan(address)}`);
      if (!init.ok) {
        ctx.warn(`Chatbot unavailable, queries will get 503: ${init.error.message}`);
      }
    });
}

/**
 * A command context that records output instead of printing it.
 */

import type { CommandContext, GlobalOptions } from '../cli/types.js';

export interface RecordingContext {
  ctx: CommandContext;
  logs: string[];
  debugs: string[];
  warnings: string[];
  errors: string[];
}

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

/** Strip terminal colors so assertions hold whether or not chalk colors */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

export function createRecordingContext(options: Partial<GlobalOptions> = {}): RecordingContext {
  const recorded: Omit<RecordingContext, 'ctx'> = { logs: [], debugs: [], warnings: [], errors: [] };
  const ctx: CommandContext = {
    options: { verbose: false, json: false, ...options },
    log: (message) => recorded.logs.push(stripAnsi(message)),
    debug: (message) => recorded.debugs.push(stripAnsi(message)),
    warn: (message) => recorded.warnings.push(stripAnsi(message)),
    error: (message) => recorded.errors.push(stripAnsi(message)),
  };
  return { ctx, ...recorded };
}

/**
 * Centralized Path Definitions
 *
 * Directory structure:
 * ~/.helpdesk/
 * ├── config.toml     (User configuration)
 * └── index/          (SQLite vector index, when vector_store.backend = "sqlite")
 */

import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { getEnv } from './env.js';

export const HELPDESK_DIR = join(homedir(), '.helpdesk');
export const DEFAULT_CONFIG_PATH = join(HELPDESK_DIR, 'config.toml');

/** File name of the SQLite index inside vector_store.persist_dir */
export const INDEX_DB_NAME = 'index.db';

export function getHelpdeskDir(): string {
  return HELPDESK_DIR;
}

/**
 * Get the config file path: $HELPDESK_CONFIG, or ~/.helpdesk/config.toml
 */
export function getConfigPath(): string {
  const override = getEnv('HELPDESK_CONFIG');
  return override ? resolve(expandHome(override)) : DEFAULT_CONFIG_PATH;
}

/**
 * Expand a leading `~` to the user's home directory.
 */
export function expandHome(p: string): string {
  if (p === '~') return homedir();
  if (p.startsWith('~/')) return join(homedir(), p.slice(2));
  return p;
}

/**
 * Path of the SQLite index for a given persist directory.
 */
export function getIndexDbPath(persistDir: string): string {
  return join(resolve(expandHome(persistDir)), INDEX_DB_NAME);
}

/**
 * XDG Base Directory paths.
 *
 * - Config: $XDG_CONFIG_HOME/roundloop/ (default ~/.config/roundloop/)
 * - State:  $XDG_STATE_HOME/roundloop/ (default ~/.local/state/roundloop/), logs and the event database
 * - Project: .roundloop/ in the working directory
 */

import { homedir } from 'node:os';
import { isAbsolute, join, relative, resolve, sep } from 'node:path';

const APP_DIR = 'roundloop';

export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const xdg = env.XDG_CONFIG_HOME;
  return xdg ? join(xdg, APP_DIR) : join(homedir(), '.config', APP_DIR);
}

export function getStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const xdg = env.XDG_STATE_HOME;
  return xdg ? join(xdg, APP_DIR) : join(homedir(), '.local', 'state', APP_DIR);
}

/** User-level config file */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getConfigDir(env), 'config.json');
}

export function getProjectDir(cwd: string = process.cwd()): string {
  return join(cwd, '.roundloop');
}

/** SQLite event store, shared by every task run from this account */
export function getEventDbPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getStateDir(env), 'events.db');
}

/**
 * Resolve `relPath` under `root`, refusing anything that escapes it.
 * Returns undefined for absolute paths and `..` traversal.
 */
export function resolveWithin(root: string, relPath: string): string | undefined {
  if (isAbsolute(relPath)) return undefined;
  const base = resolve(root);
  const target = resolve(base, relPath);
  const rel = relative(base, target);
  if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) return undefined;
  return target;
}

/**
 * XDG Base Directory compliant paths.
 *
 * - Config: ~/.config/insightflow/ (or $XDG_CONFIG_HOME/insightflow/)
 * - Data: ~/.local/share/insightflow/ (or $XDG_DATA_HOME/insightflow/)
 *   SQLite ledger and uploaded datasets
 * - Project: .insightflow/ in the working directory
 *
 * @see https://specifications.freedesktop.org/basedir-spec/basedir-spec-latest.html
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

export const APP_DIR_NAME = 'insightflow';

type Env = Record<string, string | undefined>;

export function getConfigDir(env: Env = process.env): string {
  const xdg = env.XDG_CONFIG_HOME;
  return xdg ? join(xdg, APP_DIR_NAME) : join(homedir(), '.config', APP_DIR_NAME);
}

export function getDataDir(env: Env = process.env): string {
  const xdg = env.XDG_DATA_HOME;
  return xdg ? join(xdg, APP_DIR_NAME) : join(homedir(), '.local', 'share', APP_DIR_NAME);
}

/**
 * Project-specific directory, always `.insightflow/` under `cwd`.
 */
export function getProjectDir(cwd: string = process.cwd()): string {
  return join(cwd, `.${APP_DIR_NAME}`);
}

// ============================================================================
// Specific file paths
// ============================================================================

export function getConfigPath(env: Env = process.env): string {
  return join(getConfigDir(env), 'config.json');
}

export function getProjectConfigPath(cwd: string = process.cwd()): string {
  return join(getProjectDir(cwd), 'config.json');
}

/** Default SQLite database holding runs, executions, performance and cache. */
export function getDefaultDbPath(env: Env = process.env): string {
  return join(getDataDir(env), 'insightflow.db');
}

export function getDefaultDatasetDir(env: Env = process.env): string {
  return join(getDataDir(env), 'datasets');
}

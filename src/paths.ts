/**
 * XDG Base Directory compliant paths for agent-timeline.
 *
 * - Config: ~/.config/agent-timeline/ (or $XDG_CONFIG_HOME/agent-timeline/)
 * - State: ~/.local/state/agent-timeline/ (or $XDG_STATE_HOME/agent-timeline/)
 *   Debug logs land here.
 * - Project: .agent-timeline/ in the working directory
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

const APP_DIR = 'agent-timeline';

export function getConfigDir(): string {
  const xdg = process.env.XDG_CONFIG_HOME;
  return xdg ? join(xdg, APP_DIR) : join(homedir(), '.config', APP_DIR);
}

export function getStateDir(): string {
  const xdg = process.env.XDG_STATE_HOME;
  return xdg ? join(xdg, APP_DIR) : join(homedir(), '.local', 'state', APP_DIR);
}

/**
 * Path of the user-level config file.
 */
export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

/**
 * Default location of the debug log written when debug logging is on.
 */
export function getDebugLogPath(): string {
  return join(getStateDir(), 'logs', 'timeline-debug.log');
}

/**
 * Project-level directory, relative to `cwd` (defaults to process.cwd()).
 */
export function getProjectDir(cwd?: string): string {
  return join(cwd ?? process.cwd(), `.${APP_DIR}`);
}

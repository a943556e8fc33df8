/**
 * Config path builders and discovery.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

const CONFIG_DIR = '.tocmark';
const CONFIG_FILENAME = 'config.json';

/**
 * Get the global config directory (XDG/AppData)
 */
export function getGlobalConfigDir(): string {
  if (os.platform() === 'win32') {
    return path.join(process.env.APPDATA ?? '', 'tocmark');
  }
  const xdgConfigHome = process.env.XDG_CONFIG_HOME;
  if (xdgConfigHome != null && xdgConfigHome !== '') {
    return path.join(xdgConfigHome, 'tocmark');
  }
  return path.join(os.homedir(), '.config', 'tocmark');
}

/**
 * Get the global config file path
 */
export function getGlobalConfigPath(): string {
  return path.join(getGlobalConfigDir(), CONFIG_FILENAME);
}

/**
 * Get the repo-local config file path (for override)
 */
export function getRepoLocalConfigPath(): string {
  return path.join(process.cwd(), CONFIG_DIR, CONFIG_FILENAME);
}

/**
 * Find which config file to use (precedence: repo-local > global)
 */
export function findConfigPath(): string | null {
  const repoLocalPath = getRepoLocalConfigPath();
  if (fs.existsSync(repoLocalPath)) {
    return repoLocalPath;
  }

  const globalPath = getGlobalConfigPath();
  if (fs.existsSync(globalPath)) {
    return globalPath;
  }

  return null;
}

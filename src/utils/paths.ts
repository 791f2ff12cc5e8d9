import * as os from 'node:os';
import * as path from 'node:path';

/**
 * Get the wtui storage directory: ~/.wtui/
 * WTUI_HOME overrides the location.
 */
export function getWtuiDir(): string {
  return process.env['WTUI_HOME'] || path.join(os.homedir(), '.wtui');
}

/**
 * Get the wtui config file path: ~/.wtui/config.json
 */
export function getWtuiConfigPath(): string {
  return path.join(getWtuiDir(), 'config.json');
}

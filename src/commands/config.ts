import { Command } from 'commander';
import { readConfig, setConfigValue, unsetConfigValue, isConfigKey } from '../core/config-store.js';
import { getWtuiConfigPath } from '../utils/paths.js';
import { ConfigError, handleError } from '../utils/errors.js';
import { success, dim } from '../utils/display.js';
import { CONFIG_KEYS } from '../types/index.js';
import type { ConfigCliOptions } from '../types/index.js';

export function registerConfigCommand(program: Command): void {
  program
    .command('config [key] [value]')
    .description(`Show or change settings (${CONFIG_KEYS.join(', ')})`)
    .option('--unset', 'Remove the key')
    .action(async (key: string | undefined, value: string | undefined, opts: ConfigCliOptions) => {
      try {
        if (key === undefined) {
          const config = await readConfig();
          console.log(dim(getWtuiConfigPath()));
          for (const name of CONFIG_KEYS) {
            console.log(`  ${name} = ${config[name] ?? dim('(unset)')}`);
          }
          return;
        }

        if (opts.unset) {
          await unsetConfigValue(key);
          success(`Removed ${key}.`);
          return;
        }

        if (value === undefined) {
          if (!isConfigKey(key)) throw new ConfigError(`unknown key "${key}"`);
          const config = await readConfig();
          console.log(config[key] ?? '');
          return;
        }

        await setConfigValue(key, value);
        success(`Set ${key} = ${value}`);
      } catch (err) {
        handleError(err);
      }
    });
}

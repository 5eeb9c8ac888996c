/**
 * Config Command
 * 設定檔管理指令
 */

import { Command } from 'commander';
import { ArgumentError } from '../lib/errors.js';
import { isConfigKey, CONFIG_KEYS } from '../services/config.js';
import { formatJSON, maskSecret } from '../utils/output.js';
import type { CliRuntime } from '../lib/runtime.js';
import type { ConfigKey } from '../types/config.js';

function parseKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new ArgumentError(`Unknown config key: ${key} (expected one of ${CONFIG_KEYS.join(', ')})`);
  }
  return key;
}

export function createConfigCommand(runtime: CliRuntime): Command {
  const configCommand = new Command('config').description('Manage the configuration file');

  configCommand
    .command('path')
    .description('Print the configuration file path')
    .allowExcessArguments(false)
    .action(() => {
      runtime.print(runtime.getConfigService().getConfigPath());
    });

  /**
   * 列出生效中的設定（含環境變數），client secret 遮蔽
   */
  configCommand
    .command('list')
    .description('Print the effective configuration')
    .allowExcessArguments(false)
    .action(() => {
      const effective = runtime.getConfigService().getEffective();
      const secret = effective.clientSecret;
      if (secret !== undefined) {
        effective.clientSecret = maskSecret(String(secret));
      }
      runtime.print(formatJSON(effective));
    });

  configCommand
    .command('get')
    .description('Print one value stored in the configuration file')
    .argument('<key>', 'config key')
    .allowExcessArguments(false)
    .action((key: string) => {
      const value = runtime.getConfigService().get(parseKey(key));
      runtime.print(value === undefined ? '' : String(value));
    });

  configCommand
    .command('set')
    .description('Store one value in the configuration file')
    .argument('<key>', 'config key')
    .argument('<value>', 'new value')
    .allowExcessArguments(false)
    .action((key: string, value: string) => {
      runtime.getConfigService().set(parseKey(key), value);
    });

  configCommand
    .command('unset')
    .description('Remove one value from the configuration file')
    .argument('<key>', 'config key')
    .allowExcessArguments(false)
    .action((key: string) => {
      runtime.getConfigService().unset(parseKey(key));
    });

  return configCommand;
}

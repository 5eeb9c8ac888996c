/**
 * Exchange Code Command
 * 以授權碼交換 token 並寫入 token 檔
 */

import { Command } from 'commander';
import { ArgumentError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { formatJSON } from '../utils/output.js';
import type { CliRuntime } from '../lib/runtime.js';

export function createExchangeCodeCommand(runtime: CliRuntime): Command {
  return new Command('exchange-code')
    .description('Exchange an authorization code for tokens and save them')
    .argument('<code>', 'authorization code from the redirect')
    .allowExcessArguments(false)
    .action(async (code: string) => {
      if (code.trim().length === 0) {
        throw new ArgumentError('Authorization code must not be empty');
      }

      const config = runtime.loadConfig();
      const token = await runtime.createClient(config).exchangeCode(code);

      // 交換失敗時不會執行到這裡，舊 token 檔保持不變
      const store = runtime.tokenStore(config);
      store.save(token);
      loggers.cli.info('Token saved', { file: store.getPath() });

      runtime.print(formatJSON(token));
    });
}

/**
 * Refresh Token Command
 * 以 refresh token 更新 access token
 */

import { Command } from 'commander';
import { loggers } from '../lib/logger.js';
import { formatJSON } from '../utils/output.js';
import type { CliRuntime } from '../lib/runtime.js';

export function createRefreshTokenCommand(runtime: CliRuntime): Command {
  return new Command('refresh-token')
    .description('Use the saved refresh token to obtain a new access token')
    .allowExcessArguments(false)
    .action(async () => {
      const config = runtime.loadConfig();
      const store = runtime.tokenStore(config);
      const current = store.load();

      const token = await runtime.createClient(config).refreshToken(current);
      store.save(token);
      loggers.cli.info('Token refreshed', { file: store.getPath() });

      runtime.print(formatJSON(token));
    });
}

/**
 * Revoke Grant Command
 * 撤銷授權；成功時刪除 token 檔
 */

import { Command } from 'commander';
import { loggers } from '../lib/logger.js';
import type { CliRuntime } from '../lib/runtime.js';

export function createRevokeGrantCommand(runtime: CliRuntime): Command {
  return new Command('revoke-grant')
    .description('Revoke the saved grant and delete the token file')
    .allowExcessArguments(false)
    .action(async () => {
      const config = runtime.loadConfig();
      const store = runtime.tokenStore(config);
      const token = store.load();

      const result = await runtime.createClient(config).revokeGrant(token.refresh_token);
      store.clear();
      loggers.cli.info('Grant revoked', { file: store.getPath(), statusCode: result.status });

      runtime.print(result.body.length > 0 ? result.body : `HTTP ${result.status}`);
    });
}

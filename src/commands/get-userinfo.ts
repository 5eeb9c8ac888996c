/**
 * Get Userinfo Command
 * 取得使用者資訊並寫入資訊檔
 */

import { Command } from 'commander';
import { loggers } from '../lib/logger.js';
import { formatJSON } from '../utils/output.js';
import type { CliRuntime } from '../lib/runtime.js';

export function createGetUserinfoCommand(runtime: CliRuntime): Command {
  return new Command('get-userinfo')
    .description('Fetch the OpenID profile with the saved access token')
    .allowExcessArguments(false)
    .action(async () => {
      const config = runtime.loadConfig();
      const token = runtime.tokenStore(config).load();

      const profile = await runtime.createClient(config).getUserInfo(token.access_token);

      const store = runtime.profileStore(config);
      store.write(profile);
      loggers.cli.info('Profile saved', { file: store.getPath() });

      runtime.print(formatJSON(profile));
    });
}

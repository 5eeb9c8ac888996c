/**
 * Authorization URL Command
 * 印出授權網址，使用者以瀏覽器開啟後取得 code
 */

import { Command } from 'commander';
import type { CliRuntime } from '../lib/runtime.js';

export function createAuthorizationUrlCommand(runtime: CliRuntime): Command {
  return new Command('authorization-url')
    .description('Print the URL that starts the authorization flow')
    .option('--state <state>', 'state value echoed back to the redirect URI (random by default)')
    .allowExcessArguments(false)
    .action((options: { state?: string }) => {
      const config = runtime.loadConfig();
      const client = runtime.createClient(config);
      runtime.print(client.getAuthorizationUrl(options.state || undefined));
    });
}

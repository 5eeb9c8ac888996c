import { Command, CommanderError } from 'commander';
import { createAuthorizationUrlCommand } from './commands/authorization-url.js';
import { createExchangeCodeCommand } from './commands/exchange-code.js';
import { createGetUserinfoCommand } from './commands/get-userinfo.js';
import { createRevokeGrantCommand } from './commands/revoke-grant.js';
import { createRefreshTokenCommand } from './commands/refresh-token.js';
import { createConfigCommand } from './commands/config.js';
import { ArgumentError, CliError } from './lib/errors.js';
import { isLogLevel, loggers, setLogLevel, type LogLevel } from './lib/logger.js';
import { CliRuntime, type RuntimeOptions } from './lib/runtime.js';

// 參數個數錯誤視同 ArgumentError
const ARITY_ERROR_CODES = new Set(['commander.missingArgument', 'commander.excessArguments']);

type GlobalOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
};

function resolveLogLevel(options: GlobalOptions, env: NodeJS.ProcessEnv): LogLevel {
  if (options.verbose) return 'debug';
  if (options.quiet) return 'error';
  const fromEnv = env.LOG_LEVEL?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'warn';
}

/**
 * 子指令以 addCommand 加入時不繼承設定，逐一套用
 */
function applyRecursively(command: Command, apply: (command: Command) => void): void {
  apply(command);
  for (const sub of command.commands) {
    applyRecursively(sub, apply);
  }
}

export function createCli(runtime: CliRuntime): Command {
  const cli = new Command();

  cli
    .name('ymail-oauth')
    .description('Yahoo Mail OAuth 2.0 client')
    .version('0.1.0');

  // 全域選項
  cli
    .option('-v, --verbose', 'debug logging on stderr')
    .option('-q, --quiet', 'log errors only')
    .option('--config <path>', 'configuration file path');

  // 註冊指令
  cli.addCommand(createAuthorizationUrlCommand(runtime));
  cli.addCommand(createExchangeCodeCommand(runtime));
  cli.addCommand(createGetUserinfoCommand(runtime));
  cli.addCommand(createRevokeGrantCommand(runtime));
  cli.addCommand(createRefreshTokenCommand(runtime));
  cli.addCommand(createConfigCommand(runtime));

  cli.hook('preAction', (_thisCommand, actionCommand) => {
    const options = actionCommand.optsWithGlobals<GlobalOptions>();
    setLogLevel(resolveLogLevel(options, runtime.env));
    runtime.useConfigPath(options.config);
    loggers.cli.debug('Command started', { command: actionCommand.name() });
  });

  applyRecursively(cli, (command) => {
    command.exitOverride().configureOutput({
      writeOut: runtime.io.out,
      writeErr: runtime.io.err,
      // 錯誤訊息統一由 reportError 輸出
      outputError: () => {},
    });
  });

  return cli;
}

function reportError(error: unknown, runtime: CliRuntime): number {
  if (error instanceof CommanderError && ARITY_ERROR_CODES.has(error.code)) {
    return reportError(new ArgumentError(error.message.replace(/^error: /, '')), runtime);
  }

  if (error instanceof CommanderError) {
    // help 與 version 已由 commander 輸出
    if (error.message.startsWith('error:')) {
      runtime.io.err(`${error.message}\n`);
    }
    return error.exitCode;
  }

  if (error instanceof CliError) {
    loggers.cli.debug('Command failed', { code: error.code, exitCode: error.exitCode });
    runtime.io.err(`Error [${error.code}]: ${error.message}\n`);
    return error.exitCode;
  }

  const unexpected = error instanceof Error ? error : new Error(String(error));
  loggers.cli.error('Unexpected failure', unexpected);
  runtime.io.err(`Error: ${unexpected.message}\n`);
  return 1;
}

/**
 * 執行一次 CLI，回傳退出碼
 */
export async function runCli(argv: string[], options: RuntimeOptions = {}): Promise<number> {
  const runtime = new CliRuntime(options);
  const cli = createCli(runtime);

  try {
    await cli.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (error) {
    return reportError(error, runtime);
  }
}

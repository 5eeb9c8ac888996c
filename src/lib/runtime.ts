/**
 * CLI Runtime
 * 指令共用的依賴：設定、OAuth 用戶端、檔案存取與輸出
 */

import { ConfigService } from '../services/config.js';
import { YahooOAuthClient } from '../services/auth.js';
import { TokenStore } from '../services/token-store.js';
import { JsonFileStore } from '../services/file-store.js';
import type { OAuthConfig } from '../types/config.js';

export interface CliIO {
  /** 指令結果（stdout） */
  out: (text: string) => void;
  /** 錯誤訊息（stderr） */
  err: (text: string) => void;
}

export interface RuntimeOptions {
  env?: NodeJS.ProcessEnv;
  io?: CliIO;
  configPath?: string;
}

export const processIO: CliIO = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

export class CliRuntime {
  readonly env: NodeJS.ProcessEnv;
  readonly io: CliIO;
  private configPath: string | undefined;
  private configService: ConfigService | null = null;

  constructor(options: RuntimeOptions = {}) {
    this.env = options.env ?? process.env;
    this.io = options.io ?? processIO;
    this.configPath = options.configPath;
  }

  /**
   * 由全域選項 --config 指定設定檔
   */
  useConfigPath(configPath: string | undefined): void {
    if (configPath && configPath !== this.configPath) {
      this.configPath = configPath;
      this.configService = null;
    }
  }

  getConfigService(): ConfigService {
    if (!this.configService) {
      this.configService = new ConfigService(this.configPath, this.env);
    }
    return this.configService;
  }

  /**
   * @throws ConfigError 缺少必要設定
   */
  loadConfig(): OAuthConfig {
    return this.getConfigService().resolve();
  }

  createClient(config: OAuthConfig): YahooOAuthClient {
    return new YahooOAuthClient(config);
  }

  tokenStore(config: OAuthConfig): TokenStore {
    return new TokenStore(config.tokenFile);
  }

  profileStore(config: OAuthConfig): JsonFileStore {
    return new JsonFileStore(config.infoFile);
  }

  print(text: string): void {
    this.io.out(text.endsWith('\n') ? text : `${text}\n`);
  }
}

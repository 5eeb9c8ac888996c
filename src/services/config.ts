/**
 * Config Service
 * 設定管理服務 - 處理設定檔讀寫與環境變數
 * 優先順序：環境變數 > 設定檔 > 預設值
 */

import path from 'node:path';
import os from 'node:os';
import { z } from 'zod';
import { JsonFileStore } from './file-store.js';
import { ArgumentError, ConfigError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import type { ConfigKey, OAuthConfig, StoredConfig } from '../types/config.js';

const log = loggers.config;

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'ymail-oauth');
const DEFAULT_CONFIG_FILE = 'config.json';

export const DEFAULT_API_BASE_URL = 'https://api.login.yahoo.com';

export const CONFIG_KEYS = [
  'clientId',
  'clientSecret',
  'redirectUri',
  'apiBaseUrl',
  'tokenFile',
  'infoFile',
  'scope',
  'language',
  'tokenAuthMethod',
  'timeoutMs',
] as const satisfies readonly ConfigKey[];

/**
 * 各設定值對應的環境變數
 */
export const ENV_VARIABLES: Record<ConfigKey, string> = {
  clientId: 'CLIENT_ID',
  clientSecret: 'CLIENT_SECRET',
  redirectUri: 'REDIRECT_URI',
  apiBaseUrl: 'API_BASE_URL',
  tokenFile: 'TOKEN_FILE',
  infoFile: 'INFO_FILE',
  scope: 'OAUTH_SCOPE',
  language: 'OAUTH_LANGUAGE',
  tokenAuthMethod: 'TOKEN_AUTH_METHOD',
  timeoutMs: 'HTTP_TIMEOUT_MS',
};

const DEFAULTS: StoredConfig = {
  apiBaseUrl: DEFAULT_API_BASE_URL,
  tokenFile: 'token.json',
  infoFile: 'userinfo.json',
  scope: 'openid email profile',
  tokenAuthMethod: 'client_secret_post',
  timeoutMs: 15000,
};

const OAuthConfigSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  redirectUri: z.string().min(1),
  apiBaseUrl: z.string().url(),
  tokenFile: z.string().min(1),
  infoFile: z.string().min(1),
  scope: z.string().min(1),
  language: z.string().min(1).optional(),
  tokenAuthMethod: z.enum(['client_secret_post', 'client_secret_basic']),
  timeoutMs: z.coerce.number().int().positive(),
}) satisfies z.ZodType<OAuthConfig>;

const StoredConfigSchema = OAuthConfigSchema.partial();

export function isConfigKey(value: string): value is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(value);
}

function issueFields(error: z.ZodError): string[] {
  const fields = error.issues.map((issue) => String(issue.path[0] ?? ''));
  return [...new Set(fields)].filter((field) => field.length > 0);
}

export class ConfigService {
  private store: JsonFileStore;
  private env: NodeJS.ProcessEnv;
  private config: StoredConfig;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
    this.store = new JsonFileStore(
      configPath || env.YMAIL_OAUTH_CONFIG || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE)
    );
    this.config = this.load();
  }

  /**
   * 載入設定檔
   */
  private load(): StoredConfig {
    let raw: unknown;
    try {
      raw = this.store.read();
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new ConfigError(`Config file ${this.getConfigPath()} is not valid JSON`, [], error);
      }
      throw error;
    }

    if (raw === undefined) {
      return {};
    }

    const parsed = StoredConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const fields = issueFields(parsed.error);
      throw new ConfigError(
        `Config file ${this.getConfigPath()} has invalid values: ${fields.join(', ')}`,
        fields,
        parsed.error
      );
    }
    return parsed.data;
  }

  /**
   * 儲存設定檔
   */
  private save(): void {
    this.store.write(this.config);
    log.info('Config saved', { file: this.getConfigPath() });
  }

  /**
   * 取得設定檔中的值
   */
  get<K extends ConfigKey>(key: K): StoredConfig[K] {
    return this.config[key];
  }

  /**
   * 設定值（先驗證再寫入）
   */
  set(key: ConfigKey, value: string): void {
    const parsed = StoredConfigSchema.safeParse({ ...this.config, [key]: value });
    if (!parsed.success) {
      const message = parsed.error.issues[0]?.message ?? 'invalid value';
      throw new ArgumentError(`Invalid value for ${key}: ${message}`);
    }
    this.config = parsed.data;
    this.save();
  }

  /**
   * 刪除設定值
   */
  unset(key: ConfigKey): void {
    delete this.config[key];
    this.save();
  }

  /**
   * 取得設定檔中的所有值
   */
  getAll(): StoredConfig {
    return { ...this.config };
  }

  getConfigPath(): string {
    return this.store.getPath();
  }

  /**
   * 取得環境變數值（空字串視為未設定）
   */
  getEnvValue(key: ConfigKey): string | undefined {
    const value = this.env[ENV_VARIABLES[key]];
    if (value && value.length > 0) {
      return value;
    }
    return undefined;
  }

  /**
   * 合併預設值、設定檔與環境變數，不做驗證
   */
  getEffective(): Partial<Record<ConfigKey, string | number>> {
    const merged: Partial<Record<ConfigKey, string | number>> = { ...DEFAULTS, ...this.config };
    for (const key of CONFIG_KEYS) {
      const envValue = this.getEnvValue(key);
      if (envValue !== undefined) {
        merged[key] = envValue;
      }
    }
    return merged;
  }

  /**
   * 取得完整且驗證過的設定
   * @throws ConfigError 缺少必要值或格式錯誤
   */
  resolve(): OAuthConfig {
    const parsed = OAuthConfigSchema.safeParse(this.getEffective());
    if (!parsed.success) {
      const variables = issueFields(parsed.error).map((field) =>
        isConfigKey(field) ? ENV_VARIABLES[field] : field
      );
      throw new ConfigError(
        `Missing or invalid configuration: ${variables.join(', ')}`,
        variables,
        parsed.error
      );
    }

    log.debug('Config resolved', { file: this.getConfigPath() });
    return parsed.data;
  }
}

/**
 * Token 端點的用戶端認證方式
 */
export type TokenAuthMethod = 'client_secret_post' | 'client_secret_basic';

/**
 * 執行時設定（載入後唯讀）
 */
export interface OAuthConfig {
  /** Yahoo App Client ID */
  clientId: string;
  /** Yahoo App Client Secret */
  clientSecret: string;
  /** 授權後導回的 URI */
  redirectUri: string;
  /** Yahoo 登入 API 位址 */
  apiBaseUrl: string;
  /** Token 檔案路徑 */
  tokenFile: string;
  /** 使用者資訊檔案路徑 */
  infoFile: string;
  /** 申請的 scope（以空白分隔） */
  scope: string;
  /** 授權頁面語系，如 en-us */
  language?: string;
  tokenAuthMethod: TokenAuthMethod;
  /** 單一請求逾時（毫秒） */
  timeoutMs: number;
}

/**
 * 設定檔結構（所有欄位皆可省略）
 */
export type StoredConfig = Partial<OAuthConfig>;

/**
 * 設定鍵值
 */
export type ConfigKey = keyof OAuthConfig;

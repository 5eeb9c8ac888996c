/**
 * Auth Service
 * Yahoo OAuth2 用戶端 - 授權網址、code 交換、token 更新、userinfo 與撤銷
 * 每個操作只發出一次請求，不重試
 */

import { randomBytes } from 'node:crypto';
import { ofetch, FetchError } from 'ofetch';
import {
  ProfileFetchError,
  RevokeError,
  TokenExchangeError,
  type ProviderErrorClass,
} from '../lib/errors.js';
import { createRequestId, loggers } from '../lib/logger.js';
import {
  ProfileRecordSchema,
  RefreshTokenResponseSchema,
  TokenRecordSchema,
  type ProfileRecord,
  type RevokeResult,
  type TokenRecord,
} from '../types/auth.js';
import type { OAuthConfig } from '../types/config.js';

const log = loggers.auth;

export const ENDPOINTS = {
  AUTHORIZATION: '/oauth2/request_auth',
  TOKEN: '/oauth2/get_token',
  USERINFO: '/openid/v1/userinfo',
  REVOKE: '/oauth2/revoke',
} as const;

const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

interface ProviderRequest {
  method: 'GET' | 'POST';
  path: string;
  headers: Record<string, string>;
  form?: Record<string, string>;
  responseType: 'json' | 'text';
}

interface ProviderResponse {
  status: number;
  body: unknown;
}

export function generateState(): string {
  return randomBytes(16).toString('hex');
}

export class YahooOAuthClient {
  private config: OAuthConfig;

  constructor(config: OAuthConfig) {
    this.config = config;
  }

  /**
   * 組出授權網址（不發出請求）
   */
  getAuthorizationUrl(state: string = generateState()): string {
    const url = new URL(this.endpoint(ENDPOINTS.AUTHORIZATION));
    const params = new URLSearchParams({
      client_id: this.config.clientId,
      redirect_uri: this.config.redirectUri,
      response_type: 'code',
      scope: this.config.scope,
      state,
    });
    if (this.config.language) {
      params.set('language', this.config.language);
    }
    url.search = params.toString();
    return url.toString();
  }

  /**
   * 以授權碼交換 token
   */
  async exchangeCode(code: string): Promise<TokenRecord> {
    const response = await this.requestToken({
      grant_type: 'authorization_code',
      code,
      redirect_uri: this.config.redirectUri,
    });

    const parsed = TokenRecordSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new TokenExchangeError({
        status: response.status,
        body: response.body,
        reason: 'response is not a token record',
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  /**
   * 以 refresh token 取得新 token
   * 回應沒有 refresh_token 時沿用舊的
   */
  async refreshToken(current: TokenRecord): Promise<TokenRecord> {
    const response = await this.requestToken({
      grant_type: 'refresh_token',
      refresh_token: current.refresh_token,
      redirect_uri: this.config.redirectUri,
    });

    const parsed = RefreshTokenResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new TokenExchangeError({
        status: response.status,
        body: response.body,
        reason: 'response is not a token record',
        cause: parsed.error,
      });
    }
    return {
      ...parsed.data,
      refresh_token: parsed.data.refresh_token ?? current.refresh_token,
    };
  }

  /**
   * 取得 OpenID 使用者資訊
   * token 過期時直接回報上游的 401，不自動更新
   */
  async getUserInfo(accessToken: string): Promise<ProfileRecord> {
    const response = await this.send(ProfileFetchError, {
      method: 'GET',
      path: ENDPOINTS.USERINFO,
      headers: {
        Accept: 'application/json',
        Authorization: `Bearer ${accessToken}`,
      },
      responseType: 'json',
    });

    const parsed = ProfileRecordSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new ProfileFetchError({
        status: response.status,
        body: response.body,
        reason: 'response is not a JSON object',
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  /**
   * 撤銷授權
   * 注意：撰寫時 Yahoo 尚未實作此端點，錯誤回應原樣回報
   */
  async revokeGrant(refreshToken: string): Promise<RevokeResult> {
    const response = await this.send(RevokeError, {
      method: 'POST',
      path: ENDPOINTS.REVOKE,
      headers: {
        Authorization: this.basicAuthorization(),
        'Content-Type': FORM_CONTENT_TYPE,
      },
      form: {
        token: refreshToken,
        token_type_hint: 'refresh_token',
      },
      responseType: 'text',
    });

    return {
      status: response.status,
      body: typeof response.body === 'string' ? response.body : '',
    };
  }

  /**
   * 呼叫 token 端點，依設定放入用戶端憑證
   */
  private async requestToken(grant: Record<string, string>): Promise<ProviderResponse> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'Content-Type': FORM_CONTENT_TYPE,
    };
    const form = { ...grant };

    if (this.config.tokenAuthMethod === 'client_secret_basic') {
      headers.Authorization = this.basicAuthorization();
    } else {
      form.client_id = this.config.clientId;
      form.client_secret = this.config.clientSecret;
    }

    return this.send(TokenExchangeError, {
      method: 'POST',
      path: ENDPOINTS.TOKEN,
      headers,
      form,
      responseType: 'json',
    });
  }

  /**
   * 發出單次請求
   * 非 200 回應或連線失敗轉為對應的 ProviderError
   */
  private async send(ErrorClass: ProviderErrorClass, request: ProviderRequest): Promise<ProviderResponse> {
    const url = this.endpoint(request.path);
    const context = { requestId: createRequestId(), method: request.method, url };
    const startTime = Date.now();

    log.debug('Request started', context);

    let result: ProviderResponse;
    try {
      const response = await ofetch.raw(url, {
        method: request.method,
        headers: request.headers,
        body: request.form ? new URLSearchParams(request.form).toString() : undefined,
        responseType: request.responseType,
        timeout: this.config.timeoutMs,
        retry: 0,
        ignoreResponseError: true,
      });
      result = { status: response.status, body: response._data };
    } catch (error) {
      if (error instanceof FetchError) {
        log.warn('Request failed without response', { ...context, duration: Date.now() - startTime });
        throw new ErrorClass({
          status: error.status ?? null,
          body: error.data ?? null,
          reason: error.message,
          cause: error,
        });
      }
      throw error;
    }

    log.info('Request completed', {
      ...context,
      statusCode: result.status,
      duration: Date.now() - startTime,
    });

    // 只接受 200，其餘 2xx 亦視為失敗
    if (result.status !== 200) {
      throw new ErrorClass({
        status: result.status,
        body: result.body,
        reason: 'provider returned an error',
      });
    }
    return result;
  }

  private basicAuthorization(): string {
    const credentials = `${this.config.clientId}:${this.config.clientSecret}`;
    return `Basic ${Buffer.from(credentials).toString('base64')}`;
  }

  private endpoint(endpointPath: string): string {
    return new URL(endpointPath, this.config.apiBaseUrl).toString();
  }
}

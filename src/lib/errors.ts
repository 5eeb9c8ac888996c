/**
 * CLI Errors
 * 錯誤類別階層 - 每種錯誤帶有錯誤碼與程序退出碼
 */

import { formatBody } from '../utils/output.js';

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'CONFIG_ERROR'
  | 'MISSING_TOKEN'
  | 'TOKEN_EXCHANGE_FAILED'
  | 'PROFILE_FETCH_FAILED'
  | 'REVOKE_FAILED';

/** 退出碼：1 參數錯誤、2 API 錯誤、3 設定錯誤、4 缺少 token */
export const EXIT_CODES = {
  ARGUMENT: 1,
  API: 2,
  CONFIG: 3,
  MISSING_TOKEN: 4,
} as const;

export abstract class CliError extends Error {
  public readonly code: CliErrorCode;
  public readonly exitCode: number;

  constructor(code: CliErrorCode, exitCode: number, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.exitCode = exitCode;
  }
}

export class ArgumentError extends CliError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', EXIT_CODES.ARGUMENT, message);
  }
}

export class ConfigError extends CliError {
  /** 缺少或無效的設定欄位 */
  public readonly fields: string[];

  constructor(message: string, fields: string[] = [], cause?: unknown) {
    super('CONFIG_ERROR', EXIT_CODES.CONFIG, message, cause);
    this.fields = fields;
  }
}

export class MissingTokenError extends CliError {
  public readonly tokenFile: string;

  constructor(tokenFile: string, detail = 'does not exist', cause?: unknown) {
    super(
      'MISSING_TOKEN',
      EXIT_CODES.MISSING_TOKEN,
      `Token file ${tokenFile} ${detail}; run exchange-code first`,
      cause
    );
    this.tokenFile = tokenFile;
  }
}

export interface ProviderErrorDetails {
  /** HTTP 狀態碼；連線失敗或逾時為 null */
  status: number | null;
  /** 原始回應內容 */
  body: unknown;
  /** 失敗原因 */
  reason: string;
  cause?: unknown;
}

/**
 * Yahoo 端點回應失敗
 */
export abstract class ProviderError extends CliError {
  public readonly status: number | null;
  public readonly body: unknown;

  constructor(code: CliErrorCode, operation: string, details: ProviderErrorDetails) {
    super(code, EXIT_CODES.API, describeFailure(operation, details), details.cause);
    this.status = details.status;
    this.body = details.body;
  }
}

export class TokenExchangeError extends ProviderError {
  constructor(details: ProviderErrorDetails) {
    super('TOKEN_EXCHANGE_FAILED', 'Token request', details);
  }
}

export class ProfileFetchError extends ProviderError {
  constructor(details: ProviderErrorDetails) {
    super('PROFILE_FETCH_FAILED', 'Userinfo request', details);
  }
}

export class RevokeError extends ProviderError {
  constructor(details: ProviderErrorDetails) {
    super('REVOKE_FAILED', 'Revoke request', details);
  }
}

export type ProviderErrorClass = new (details: ProviderErrorDetails) => ProviderError;

function describeFailure(operation: string, { status, body, reason }: ProviderErrorDetails): string {
  const statusText = status === null ? 'no response' : `HTTP ${status}`;
  const bodyText = formatBody(body, false);
  return bodyText
    ? `${operation} failed (${statusText}): ${reason}: ${bodyText}`
    : `${operation} failed (${statusText}): ${reason}`;
}

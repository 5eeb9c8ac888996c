/**
 * Structured Logger - 結構化日誌系統
 * JSON 格式日誌，一行一筆，輸出到 stderr（stdout 保留給指令結果）
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** 請求唯一識別碼 */
  requestId?: string;
  /** HTTP 方法 */
  method?: string;
  /** 請求 URL 或端點 */
  url?: string;
  /** 執行時間（毫秒） */
  duration?: number;
  /** 返回狀態碼 */
  statusCode?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** 最小日誌級別 (default: 'warn') */
  minLevel?: LogLevel;
  /** 自定義輸出（測試用） */
  sink?: (line: string) => void;
  /** 是否包含堆棧追蹤 (default: false) */
  includeStack?: boolean;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LOG_LEVELS: readonly string[] = ['debug', 'info', 'warn', 'error'] satisfies LogLevel[];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.includes(value);
}

export class StructuredLogger {
  private component: string;
  private minLevel: LogLevel;
  private sink: (line: string) => void;
  private includeStack: boolean;

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.minLevel = config.minLevel ?? 'warn';
    this.sink = config.sink ?? ((line) => console.error(line));
    this.includeStack = config.includeStack ?? false;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error | null, context?: LogContext): void {
    if (!this.shouldLog('error')) return;

    const entry = this.createEntry('error', message, context);
    if (error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      entry.error = {
        name: error.name,
        message: error.message,
        code,
        stack: this.includeStack ? error.stack : undefined,
      };
    }
    this.sink(JSON.stringify(entry));
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;
    this.sink(JSON.stringify(this.createEntry(level, message, context)));
  }

  private createEntry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context,
    };
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }
}

/**
 * 預設的日誌記錄器實例
 * 按組件分類，便於按服務過濾日誌
 */
export const loggers = {
  auth: new StructuredLogger('Auth'),
  store: new StructuredLogger('Store'),
  config: new StructuredLogger('Config'),
  cli: new StructuredLogger('CLI'),
};

/**
 * 一次調整所有組件的日誌級別
 */
export function setLogLevel(level: LogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
  }
}

export function createRequestId(): string {
  return randomUUID();
}

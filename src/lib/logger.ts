/**
 * Structured Logger - 結構化日誌系統
 * 特性：
 *   - JSON 格式輸出（一行一筆，易於機器解析）
 *   - 日誌級別控制
 *   - requestId 追蹤
 *   - 性能監控 (duration)
 *   - 錯誤堆棧記錄
 */

import { randomUUID } from 'node:crypto';
import { toError } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** 請求唯一識別碼，用於追蹤一個請求的完整生命週期 */
  requestId?: string;
  /** 操作類型 (GET, POST, 等) */
  method?: string;
  /** 請求 URL 或端點 */
  url?: string;
  /** 執行時間（毫秒） */
  duration?: number;
  /** 返回狀態碼 */
  statusCode?: number;
  /** 自定義數據 */
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
  metadata?: Record<string, unknown>;
}

export interface LoggerConfig {
  /** 最小日誌級別 (default: 'info') */
  minLevel?: LogLevel;
  /** 是否輸出到控制台 (default: true) */
  console?: boolean;
  /** 自定義格式化函數 */
  formatter?: (entry: LogEntry) => string;
  /** 是否包含堆棧追蹤 (default: true) */
  includeStack?: boolean;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * 結構化日誌記錄器
 * 所有日誌都以 JSON 格式輸出，便於中央日誌系統解析
 */
export class StructuredLogger {
  private component: string;
  private config: Required<LoggerConfig>;
  private requestIdStack: string[] = [];

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.config = {
      minLevel: config.minLevel || 'info',
      console: config.console !== false,
      formatter: config.formatter || this.defaultFormatter,
      includeStack: config.includeStack !== false,
    };
  }

  private defaultFormatter = (entry: LogEntry): string => {
    return JSON.stringify(entry);
  };

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private output(entry: LogEntry): void {
    if (!this.config.console) return;

    const formatted = this.config.formatter(entry);
    switch (entry.level) {
      case 'error':
        console.error(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'debug':
        console.debug(formatted);
        break;
      case 'info':
      default:
        console.log(formatted);
    }
  }

  debug(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    this.log('debug', message, context, metadata);
  }

  info(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    this.log('info', message, context, metadata);
  }

  warn(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    this.log('warn', message, context, metadata);
  }

  error(
    message: string,
    error?: Error | null,
    context?: LogContext,
    metadata?: Record<string, unknown>
  ): void {
    if (!this.shouldLog('error')) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: 'error',
      message,
      component: this.component,
      context: this.enrichContext(context),
      metadata,
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: errorCode(error),
        stack: this.config.includeStack ? error.stack : undefined,
      };
    }

    this.output(entry);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    metadata?: Record<string, unknown>
  ): void {
    this.output({
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context: this.enrichContext(context),
      metadata,
    });
  }

  /**
   * 自動補上目前的 requestId（如果存在）
   */
  private enrichContext(context?: LogContext): LogContext | undefined {
    const current = this.getCurrentRequestId();
    if (!context) {
      return current ? { requestId: current } : undefined;
    }
    if (!context.requestId && current) {
      return { ...context, requestId: current };
    }
    return context;
  }

  /**
   * 推入新的 requestId（支持嵌套請求）
   */
  pushRequestId(requestId?: string): string {
    const id = requestId || randomUUID();
    this.requestIdStack.push(id);
    return id;
  }

  /**
   * 指定 id 時移除該筆；並行的請求不一定依推入順序結束
   */
  popRequestId(requestId?: string): string | undefined {
    if (requestId === undefined) {
      return this.requestIdStack.pop();
    }
    const index = this.requestIdStack.lastIndexOf(requestId);
    return index === -1 ? undefined : this.requestIdStack.splice(index, 1)[0];
  }

  getCurrentRequestId(): string | undefined {
    return this.requestIdStack[this.requestIdStack.length - 1];
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.config.minLevel;
  }

  /**
   * 執行帶日誌的非同步操作
   */
  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Omit<LogContext, 'duration'>
  ): Promise<T> {
    const startTime = Date.now();
    const requestId = this.getCurrentRequestId();

    try {
      const result = await fn();
      this.info(`${operation} completed`, {
        ...context,
        requestId,
        duration: Date.now() - startTime,
      });
      return result;
    } catch (error) {
      this.error(`${operation} failed`, toError(error), {
        ...context,
        requestId,
        duration: Date.now() - startTime,
      });
      throw error;
    }
  }

  /**
   * 執行帶日誌的同步操作
   */
  trackSync<T>(operation: string, fn: () => T, context?: Omit<LogContext, 'duration'>): T {
    const startTime = Date.now();
    const requestId = this.getCurrentRequestId();

    try {
      const result = fn();
      this.info(`${operation} completed`, {
        ...context,
        requestId,
        duration: Date.now() - startTime,
      });
      return result;
    } catch (error) {
      this.error(`${operation} failed`, toError(error), {
        ...context,
        requestId,
        duration: Date.now() - startTime,
      });
      throw error;
    }
  }
}

/**
 * 預設的日誌記錄器實例
 * 按組件分類，便於按服務過濾日誌
 */
export const loggers = {
  config: new StructuredLogger('Config', { minLevel: 'info' }),
  auth: new StructuredLogger('Auth', { minLevel: 'info' }),
  http: new StructuredLogger('Http', { minLevel: 'info' }),
  retry: new StructuredLogger('Retry', { minLevel: 'debug' }),
  cli: new StructuredLogger('Cli', { minLevel: 'info' }),
  biz: new StructuredLogger('Biz', { minLevel: 'info' }),
};

/**
 * 一次調整所有組件的日誌級別（CLI 的 --verbose 使用）
 */
export function setLogLevel(level: LogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
  }
}

/**
 * 遮蔽敏感字串，只保留前後各 4 個字元
 */
export function maskSecret(value: string): string {
  if (value.length <= 8) {
    return '*'.repeat(value.length);
  }
  return `${value.slice(0, 4)}${'*'.repeat(value.length - 8)}${value.slice(-4)}`;
}

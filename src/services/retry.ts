/**
 * Retry Policy
 * 統一的重試策略 - 所有呼叫外部服務的元件共用同一套 backoff 設定
 */

import { HarnessError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';

export type ErrorClass = abstract new (...args: never[]) => Error;

export interface RetryConfig {
  /** 最大嘗試次數，含第一次 (default: 3) */
  maxAttempts: number;
  /** 第一次重試前的延遲（毫秒，default: 1000） */
  baseDelayMs: number;
  /** 退避倍數 (default: 2) */
  backoffFactor: number;
  /** 最大延遲（毫秒，default: 30000） */
  maxDelayMs: number;
  /** 是否加上 0-10% 的隨機抖動 (default: false) */
  jitter: boolean;
  /** 允許重試的錯誤類別，不在清單內的錯誤立即拋出 (default: [Error]) */
  retryOn: readonly ErrorClass[];
  /** 額外的重試判斷 */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** 每次重試前的回調 */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const DEFAULT_RETRY_CONFIG: Omit<RetryConfig, 'shouldRetry' | 'onRetry'> = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  backoffFactor: 2,
  maxDelayMs: 30000,
  jitter: false,
  retryOn: [Error],
};

/** HTTP status codes that should be retried */
export const RETRYABLE_STATUSES = [
  408, // Request Timeout
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
];

/**
 * Error thrown when all retry attempts are exhausted
 */
export class RetryError extends HarnessError {
  public override readonly code = 'RETRY_EXHAUSTED';
  public readonly originalError: unknown;
  public readonly attempts: number;

  constructor(message: string, originalError: unknown, attempts: number) {
    super(message, { attempts });
    this.name = 'RetryError';
    this.originalError = originalError;
    this.attempts = attempts;
  }
}

/**
 * Calculate the delay before the next attempt
 * @param attempt The attempt that just failed (1-based)
 */
export function calculateBackoff(
  attempt: number,
  config: Pick<RetryConfig, 'baseDelayMs' | 'backoffFactor' | 'maxDelayMs' | 'jitter'>
): number {
  if (config.baseDelayMs === 0) {
    return 0;
  }

  const normalizedAttempt = Math.max(1, attempt);
  const exponentialDelay = config.baseDelayMs * Math.pow(config.backoffFactor, normalizedAttempt - 1);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  if (!config.jitter) {
    return cappedDelay;
  }
  return cappedDelay + Math.random() * cappedDelay * 0.1;
}

export function isRetryableStatus(
  status: number,
  retryableStatuses: readonly number[] = RETRYABLE_STATUSES
): boolean {
  return retryableStatuses.includes(status);
}

export interface ExecuteOptions<T> {
  /** 回傳 true 表示結果不符預期，需要重試；最後一次的結果會原樣回傳 */
  shouldRetryResult?: (result: T) => boolean;
  /** 日誌用的操作名稱 */
  operation?: string;
}

type RetryableFunction<T> = (context: { attempt: number }) => Promise<T>;

type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

async function settle<T>(fn: RetryableFunction<T>, attempt: number): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await fn({ attempt }) };
  } catch (error) {
    return { ok: false, error };
  }
}

export class RetryPolicy {
  readonly config: RetryConfig;

  constructor(config: Partial<RetryConfig> = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    if (this.config.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be at least 1, got ${this.config.maxAttempts}`);
    }
  }

  /**
   * 單次嘗試、不重試的策略
   */
  static none(): RetryPolicy {
    return new RetryPolicy({ maxAttempts: 1, baseDelayMs: 0 });
  }

  /**
   * 固定間隔的策略（backoffFactor = 1）
   */
  static fixed(maxAttempts: number, intervalMs: number): RetryPolicy {
    return new RetryPolicy({ maxAttempts, baseDelayMs: intervalMs, backoffFactor: 1 });
  }

  isRetryable(error: unknown, attempt: number): boolean {
    const allowed = this.config.retryOn.some((errorClass) => error instanceof errorClass);
    if (!allowed) {
      return false;
    }
    return this.config.shouldRetry ? this.config.shouldRetry(error, attempt) : true;
  }

  delayFor(attempt: number): number {
    return calculateBackoff(attempt, this.config);
  }

  async execute<T>(fn: RetryableFunction<T>, options: ExecuteOptions<T> = {}): Promise<T> {
    const { maxAttempts } = this.config;
    const operation = options.operation ?? 'operation';

    for (let attempt = 1; ; attempt++) {
      const outcome = await settle(fn, attempt);

      if (!outcome.ok) {
        const { error } = outcome;
        if (!this.isRetryable(error, attempt)) {
          throw error;
        }
        if (attempt >= maxAttempts) {
          loggers.retry.error(
            `${operation} failed after ${attempt} attempts`,
            error instanceof Error ? error : null,
            { attempts: attempt }
          );
          throw new RetryError(`${operation} failed after ${attempt} attempts`, error, attempt);
        }
        await this.wait(error, attempt, operation);
        continue;
      }

      if (options.shouldRetryResult && attempt < maxAttempts && options.shouldRetryResult(outcome.value)) {
        await this.wait(undefined, attempt, operation);
        continue;
      }

      if (attempt > 1) {
        loggers.retry.info(`${operation} succeeded on attempt ${attempt}`, { attempt });
      }
      return outcome.value;
    }
  }

  private async wait(error: unknown, attempt: number, operation: string): Promise<void> {
    const delayMs = this.delayFor(attempt);
    this.config.onRetry?.(error, attempt, delayMs);
    loggers.retry.warn(`${operation} attempt ${attempt} did not succeed, retrying`, {
      attempt,
      delayMs,
      reason: error instanceof Error ? error.message : 'response check failed',
    });
    await sleep(delayMs);
  }
}

/**
 * 使用預設（或指定）策略執行函數
 */
export function retry<T>(fn: RetryableFunction<T>, config: Partial<RetryConfig> = {}): Promise<T> {
  return new RetryPolicy(config).execute(fn);
}

function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}

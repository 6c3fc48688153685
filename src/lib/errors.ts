/**
 * Harness Errors
 * 共用錯誤型別 - 每個錯誤都帶有穩定的 code 與 details，方便測試依種類斷言
 */

export type ErrorDetails = Record<string, unknown>;

export class HarnessError extends Error {
  public readonly code: string = 'HARNESS_ERROR';
  public readonly details: ErrorDetails;

  constructor(message: string, details: ErrorDetails = {}) {
    super(message);
    this.name = 'HarnessError';
    this.details = details;
  }

  override toString(): string {
    if (Object.keys(this.details).length > 0) {
      return `${this.name}: ${this.message}. Details: ${JSON.stringify(this.details)}`;
    }
    return `${this.name}: ${this.message}`;
  }
}

/**
 * 設定錯誤：base 三元組缺漏、必要鍵缺漏或數值不合法
 */
export class ConfigError extends HarnessError {
  public override readonly code = 'CONFIG_ERROR';

  constructor(message: string, details: ErrorDetails = {}) {
    super(message, details);
    this.name = 'ConfigError';
  }
}

/**
 * 認證錯誤：identity provider 回傳非 2xx、網路失敗或回應缺少 token 欄位
 */
export class AuthError extends HarnessError {
  public override readonly code = 'AUTH_ERROR';

  constructor(message: string, details: ErrorDetails = {}) {
    super(message, details);
    this.name = 'AuthError';
  }
}

export class HttpClientError extends HarnessError {
  public override readonly code = 'HTTP_CLIENT_ERROR';

  constructor(message: string, details: ErrorDetails = {}) {
    super(message, details);
    this.name = 'HttpClientError';
  }
}

/**
 * 將任意 throw 的值正規化為 Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

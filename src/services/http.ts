/**
 * HTTP Handler
 * 受測服務的請求包裝 - 回傳 { code, body }，非 2xx 不拋錯，交給測試斷言
 *
 * 特性：
 * - boe zone 自動附加路由標頭（x-use-boe / X-TT-ENV）
 * - 可依結果檢查重送（RetryPolicy）
 * - AuthenticatedHttpHandler 從 TokenCache 取得 Bearer token
 */

import { ofetch } from 'ofetch';
import { buildAuthHeaders } from '../lib/auth-headers.js';
import { loggers } from '../lib/logger.js';
import { RetryPolicy } from './retry.js';
import type { TokenCache } from './auth.js';
import type { AuthConfig } from '../types/auth.js';
import type { ApiEndpoint, HttpMethod, HttpResult, JsonBody, QueryValue } from '../types/api.js';

export const DEFAULT_TIMEOUT_MS = 30 * 1000;
export const DEFAULT_ENV = 'prod';
export const BOE_HEADER = 'x-use-boe';
export const ENV_HEADER = 'X-TT-ENV';

/** 網路錯誤或逾時時回傳的狀態碼 */
export const NETWORK_ERROR_CODE = -1;

export interface HttpHandlerOptions {
  host: string;
  /** 包含 boe（不分大小寫）時附加路由標頭 */
  zone?: string;
  /** X-TT-ENV 的值（default: prod） */
  env?: string;
  headers?: Record<string, string>;
  auth?: AuthConfig;
  timeoutMs?: number;
  /** 是否記錄每個請求（default: true） */
  logRequests?: boolean;
}

export type ResponseChecker = (result: HttpResult) => boolean;

export interface RequestRetryOptions {
  /** default: 5 次，間隔 1 秒 */
  policy?: RetryPolicy;
  /** 回傳 true 表示結果符合預期（default: code === 200） */
  checker?: ResponseChecker;
}

export interface RequestOptions {
  query?: Record<string, QueryValue>;
  data?: JsonBody;
  headers?: Record<string, string>;
  /** data 以 JSON 送出；false 時以表單編碼送出（default: true） */
  isJson?: boolean;
  timeoutMs?: number;
  retry?: RequestRetryOptions;
}

export type BodylessRequestOptions = Omit<RequestOptions, 'data' | 'isJson'>;

const defaultChecker: ResponseChecker = (result) => result.code === 200;

function toFormBody(data: JsonBody): URLSearchParams {
  const form = new URLSearchParams();
  for (const [key, value] of Object.entries(data)) {
    form.append(key, typeof value === 'string' ? value : JSON.stringify(value));
  }
  return form;
}

export class HttpHandler {
  readonly host: string;
  readonly env: string;
  protected headers: Record<string, string>;
  private authConfig?: AuthConfig;
  private timeoutMs: number;
  private logRequests: boolean;
  private useBoe: boolean;

  constructor(options: HttpHandlerOptions) {
    this.host = options.host.replace(/\/+$/, '');
    this.env = options.env || DEFAULT_ENV;
    this.authConfig = options.auth;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logRequests = options.logRequests ?? true;
    this.useBoe = (options.zone ?? '').toLowerCase().includes('boe');

    this.headers = { ...options.headers };
    if (this.useBoe) {
      this.headers[BOE_HEADER] = '1';
      this.headers[ENV_HEADER] = this.env;
    }
  }

  isBoe(): boolean {
    return this.useBoe;
  }

  /**
   * 移除 boe 路由標頭
   */
  disableBoe(): void {
    delete this.headers[BOE_HEADER];
    delete this.headers[ENV_HEADER];
    this.useBoe = false;
  }

  getDefaultHeaders(): Record<string, string> {
    return { ...this.headers };
  }

  buildUrl(api: string | ApiEndpoint): string {
    const path = typeof api === 'string' ? api : api.path;
    return `${this.host}/${path.replace(/^\/+/, '')}`;
  }

  async request<T = unknown>(
    method: HttpMethod,
    api: string | ApiEndpoint,
    options: RequestOptions = {}
  ): Promise<HttpResult<T | ''>> {
    const url = this.buildUrl(api);
    const headers = {
      ...this.headers,
      ...(await this.resolveAuthHeaders()),
      ...options.headers,
    };
    const description = typeof api === 'string' ? '' : api.description;
    const requestId = loggers.http.pushRequestId();

    const send = (): Promise<HttpResult<T | ''>> =>
      this.send<T>(method, url, headers, options, { description, requestId });

    try {
      if (!options.retry) {
        return await send();
      }

      const policy = options.retry.policy ?? RetryPolicy.fixed(5, 1000);
      const checker = options.retry.checker ?? defaultChecker;
      return await policy.execute(send, {
        operation: `${method} ${url}`,
        shouldRetryResult: (result) => !checker(result),
      });
    } finally {
      loggers.http.popRequestId(requestId);
    }
  }

  get<T = unknown>(api: string | ApiEndpoint, options: BodylessRequestOptions = {}): Promise<HttpResult<T | ''>> {
    return this.request<T>('GET', api, options);
  }

  post<T = unknown>(api: string | ApiEndpoint, options: RequestOptions = {}): Promise<HttpResult<T | ''>> {
    return this.request<T>('POST', api, options);
  }

  put<T = unknown>(api: string | ApiEndpoint, options: RequestOptions = {}): Promise<HttpResult<T | ''>> {
    return this.request<T>('PUT', api, options);
  }

  patch<T = unknown>(api: string | ApiEndpoint, options: RequestOptions = {}): Promise<HttpResult<T | ''>> {
    return this.request<T>('PATCH', api, options);
  }

  delete<T = unknown>(api: string | ApiEndpoint, options: BodylessRequestOptions = {}): Promise<HttpResult<T | ''>> {
    return this.request<T>('DELETE', api, options);
  }

  /**
   * 每個請求附加的認證標頭；子類別可覆寫
   */
  protected async resolveAuthHeaders(): Promise<Record<string, string>> {
    return this.authConfig ? buildAuthHeaders(this.authConfig) : {};
  }

  private async send<T>(
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    options: RequestOptions,
    tags: { description: string; requestId: string }
  ): Promise<HttpResult<T | ''>> {
    const isJson = options.isJson ?? true;
    const startTime = Date.now();

    let result: HttpResult<T | ''>;
    try {
      const response = await ofetch.raw<T>(url, {
        method,
        headers,
        query: options.query,
        body: options.data === undefined ? undefined : isJson ? options.data : toFormBody(options.data),
        timeout: options.timeoutMs ?? this.timeoutMs,
        retry: 0,
        ignoreResponseError: true,
      });
      result = {
        code: response.status,
        body: response._data ?? '',
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      const durationMs = Date.now() - startTime;
      loggers.http.error('Request failed before a response was received', error instanceof Error ? error : null, {
        requestId: tags.requestId,
        method,
        url,
        description: tags.description,
        duration: durationMs,
      });
      return { code: NETWORK_ERROR_CODE, body: '', durationMs };
    }

    if (this.logRequests) {
      loggers.http.info(`${method} ${url}`, {
        requestId: tags.requestId,
        description: tags.description,
        statusCode: result.code,
        duration: result.durationMs,
        query: options.query,
      });
    }
    return result;
  }
}

/**
 * 使用 TokenCache 的 Bearer token；呼叫端傳入的標頭優先
 */
export class AuthenticatedHttpHandler extends HttpHandler {
  private tokenCache: TokenCache;

  constructor(options: HttpHandlerOptions & { tokenCache: TokenCache }) {
    super(options);
    this.tokenCache = options.tokenCache;
  }

  protected override async resolveAuthHeaders(): Promise<Record<string, string>> {
    return {
      ...(await super.resolveAuthHeaders()),
      ...(await this.tokenCache.getAuthHeaders()),
    };
  }
}

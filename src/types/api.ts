export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];

/**
 * 邏輯操作名稱對應的端點定義
 */
export interface ApiEndpoint {
  name: string;
  /** 路徑樣板，例如 /api/users/{id}/ */
  path: string;
  method: HttpMethod;
  description: string;
}

export interface EndpointDefinition {
  path: string;
  method: HttpMethod;
  description?: string;
}

export type PathParams = Record<string, string | number> | ReadonlyArray<string | number>;

export type QueryValue = string | number | boolean | undefined;

export type JsonBody = Record<string, unknown> | unknown[];

/**
 * HTTP 呼叫結果；code 為 -1 表示請求未送達（網路錯誤或逾時）
 */
export interface HttpResult<T = unknown> {
  code: number;
  body: T;
  durationMs: number;
}

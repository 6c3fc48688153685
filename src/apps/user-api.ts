/**
 * User API Client
 * 使用者服務的呼叫封裝 - 只在預期狀態碼時回傳 body
 */

import { ApiRegistry, parseEndpointDescription } from '../lib/api-registry.js';
import { loggers } from '../lib/logger.js';
import type { HttpHandler } from '../services/http.js';
import type { JsonBody } from '../types/api.js';

export const USER_ENDPOINTS = {
  'user.list': { path: '/api/users/', description: 'GET: READY List existing users' },
  'user.create': { path: '/api/users/', description: 'POST: CREATE New user' },
} as const;

export type UserEndpointName = keyof typeof USER_ENDPOINTS;

export interface ApiCallResult<T = unknown> {
  code: number;
  /** 狀態碼不符預期時為 null */
  data: T | null;
}

/**
 * 將使用者端點註冊到 registry（已存在的名稱略過）
 */
export function registerUserEndpoints(registry: ApiRegistry): ApiRegistry {
  for (const [name, endpoint] of Object.entries(USER_ENDPOINTS)) {
    if (registry.has(name)) {
      continue;
    }
    const parsed = parseEndpointDescription(endpoint.description);
    registry.register(name, {
      path: endpoint.path,
      method: parsed ? parsed.method : 'GET',
      description: endpoint.description,
    });
  }
  return registry;
}

export class UserApiClient {
  private http: HttpHandler;
  private registry: ApiRegistry;

  constructor(http: HttpHandler, registry: ApiRegistry = new ApiRegistry()) {
    this.http = http;
    this.registry = registerUserEndpoints(registry);
  }

  async listUsers(headers?: Record<string, string>): Promise<ApiCallResult> {
    loggers.http.debug('Calling list users');
    const endpoint = this.registry.get('user.list');
    const { code, body } = await this.http.request(endpoint.method, endpoint, { headers });
    return { code, data: code === 200 ? body : null };
  }

  async createUser(payload: JsonBody = {}, headers?: Record<string, string>): Promise<ApiCallResult> {
    loggers.http.debug('Calling create user');
    const endpoint = this.registry.get('user.create');
    const { code, body } = await this.http.request(endpoint.method, endpoint, {
      data: payload,
      headers,
    });
    return { code, data: code === 201 ? body : null };
  }
}

/**
 * API Registry
 * 邏輯操作名稱 → 端點（路徑樣板 + 方法）的對照表
 */

import { HarnessError } from './errors.js';
import { HTTP_METHODS } from '../types/api.js';
import type { ApiEndpoint, EndpointDefinition, HttpMethod, PathParams } from '../types/api.js';

const PLACEHOLDER_PATTERN = /\{([^{}]*)\}/g;

function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}

/**
 * 填入路徑樣板
 * - {name}：從 record 取值
 * - {} / {0}：依位置從陣列取值
 * 值一律經過 encodeURIComponent
 */
export function formatPath(template: string, params: PathParams = {}): string {
  let position = 0;

  return template.replace(PLACEHOLDER_PATTERN, (_match, rawKey: string) => {
    const key = rawKey.trim();
    let label = key;
    let value: string | number | undefined;

    if (isPositional(params)) {
      const index = key === '' ? position++ : Number(key);
      label = `#${index}`;
      value = Number.isInteger(index) ? params[index] : undefined;
    } else if (key !== '') {
      value = params[key];
    }

    if (value === undefined) {
      throw new HarnessError(`Missing path parameter: ${label}`, { template, parameter: label });
    }
    return encodeURIComponent(String(value));
  });
}

function isPositional(params: PathParams): params is ReadonlyArray<string | number> {
  return Array.isArray(params);
}

/**
 * 從 "GET: READY List existing users" 形式的描述取出 HTTP 方法
 */
export function parseEndpointDescription(description: string): { method: HttpMethod; summary: string } | null {
  const separator = description.indexOf(':');
  if (separator === -1) {
    return null;
  }
  const method = description.slice(0, separator).trim().toUpperCase();
  if (!isHttpMethod(method)) {
    return null;
  }
  return { method, summary: description.slice(separator + 1).trim() };
}

export class ApiRegistry {
  private endpoints = new Map<string, ApiEndpoint>();

  register(name: string, definition: EndpointDefinition): ApiEndpoint {
    if (this.endpoints.has(name)) {
      throw new HarnessError(`Endpoint already registered: ${name}`, { name });
    }
    const endpoint: ApiEndpoint = {
      name,
      path: definition.path,
      method: definition.method,
      description: definition.description ?? '',
    };
    this.endpoints.set(name, endpoint);
    return endpoint;
  }

  get(name: string): ApiEndpoint {
    const endpoint = this.endpoints.get(name);
    if (!endpoint) {
      throw new HarnessError(`Unknown endpoint: ${name}`, { name, known: [...this.endpoints.keys()] });
    }
    return endpoint;
  }

  has(name: string): boolean {
    return this.endpoints.has(name);
  }

  list(): ApiEndpoint[] {
    return [...this.endpoints.values()];
  }

  /**
   * 取得端點並填入路徑參數
   */
  resolve(name: string, params?: PathParams): ApiEndpoint {
    const endpoint = this.get(name);
    return { ...endpoint, path: formatPath(endpoint.path, params) };
  }
}

/**
 * Auth Headers
 * 靜態認證標頭（basic / bearer / apikey / custom）與 HMAC 請求簽章
 */

import { createHmac } from 'node:crypto';
import { AuthError } from './errors.js';
import type { AuthConfig } from '../types/auth.js';

export const DEFAULT_API_KEY_HEADER = 'X-API-Key';

export function buildAuthHeaders(config: AuthConfig): Record<string, string> {
  const type: string = config.type;
  switch (config.type) {
    case 'basic': {
      if (!config.username || !config.password) {
        throw new AuthError('Username and password required for basic auth', { type: config.type });
      }
      const encoded = Buffer.from(`${config.username}:${config.password}`, 'utf-8').toString('base64');
      return { Authorization: `Basic ${encoded}` };
    }
    case 'bearer':
      if (!config.token) {
        throw new AuthError('Token required for bearer auth', { type: config.type });
      }
      return { Authorization: `Bearer ${config.token}` };
    case 'apikey':
      if (!config.apiKey) {
        throw new AuthError('API key required for apikey auth', { type: config.type });
      }
      return { [config.apiKeyHeader || DEFAULT_API_KEY_HEADER]: config.apiKey };
    case 'custom':
      if (!config.customHeaders || Object.keys(config.customHeaders).length === 0) {
        throw new AuthError('Custom headers required for custom auth', { type: config.type });
      }
      return { ...config.customHeaders };
    default:
      throw new AuthError(`Unsupported authentication type: ${type}`, { type });
  }
}

export interface SignatureInput {
  method: string;
  url: string;
  params?: Record<string, string | number>;
  body?: string;
  secret: string;
}

/**
 * HMAC-SHA256(METHOD + url + 依鍵排序的 query + body)，hex 輸出
 */
export function generateSignature(input: SignatureInput): string {
  if (!input.secret) {
    throw new AuthError('Secret required for signature generation');
  }

  const parts = [input.method.toUpperCase(), input.url];
  if (input.params && Object.keys(input.params).length > 0) {
    const sorted = Object.entries(input.params)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, value]): [string, string] => [key, String(value)]);
    parts.push(new URLSearchParams(sorted).toString());
  }
  if (input.body) {
    parts.push(input.body);
  }

  return createHmac('sha256', input.secret).update(parts.join('')).digest('hex');
}

/**
 * HTTP Identity Provider
 * 登入 / 刷新 token 的 HTTP 協作者
 * - login:   POST <host><loginUrl>，Authorization: Basic base64(user:password)
 * - refresh: POST <host><refreshUrl>，Authorization: Bearer <refreshToken>
 * 本身不重試，失敗一律轉成 AuthError
 */

import { ofetch, FetchError } from 'ofetch';
import { z } from 'zod';
import { AuthError } from '../lib/errors.js';
import { buildAuthHeaders } from '../lib/auth-headers.js';
import { loggers } from '../lib/logger.js';
import type { Credentials, IdentityProvider, TokenPair } from '../types/auth.js';

export const DEFAULT_LOGIN_TIMEOUT_MS = 30 * 1000;

export interface HttpIdentityProviderOptions {
  host: string;
  loginUrl: string;
  refreshUrl: string;
  /** 單次呼叫逾時（毫秒，default: 30000） */
  timeoutMs?: number;
}

type AuthOperation = 'login' | 'refresh';

const nestedTokenSchema = z.object({
  data: z.object({
    token: z.object({
      access_token: z.string().min(1),
      refresh_token: z.string().min(1).optional(),
    }),
  }),
});

const signedTokenSchema = z.object({
  data: z.object({
    signedToken: z.string().min(1),
    refreshToken: z.string().min(1).optional(),
  }),
});

/**
 * 解析登入/刷新回應
 * 帶 account name 時使用扁平格式 data.signedToken / data.refreshToken
 */
export function parseTokenResponse(
  body: unknown,
  options: { accountName?: string; operation: AuthOperation }
): TokenPair {
  if (options.accountName) {
    const result = signedTokenSchema.safeParse(body);
    if (!result.success) {
      throw malformedResponse(options.operation, result.error);
    }
    return { accessToken: result.data.data.signedToken, refreshToken: result.data.data.refreshToken };
  }

  const result = nestedTokenSchema.safeParse(body);
  if (!result.success) {
    throw malformedResponse(options.operation, result.error);
  }
  const { token } = result.data.data;
  return { accessToken: token.access_token, refreshToken: token.refresh_token };
}

function malformedResponse(operation: AuthOperation, error: z.ZodError): AuthError {
  return new AuthError(`${operation} response is missing expected token fields`, {
    operation,
    issues: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
  });
}

export class HttpIdentityProvider implements IdentityProvider {
  private host: string;
  private loginUrl: string;
  private refreshUrl: string;
  private timeoutMs: number;

  constructor(options: HttpIdentityProviderOptions) {
    this.host = options.host.replace(/\/+$/, '');
    this.loginUrl = options.loginUrl;
    this.refreshUrl = options.refreshUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_LOGIN_TIMEOUT_MS;
  }

  async login(credentials: Credentials): Promise<TokenPair> {
    const { Authorization } = buildAuthHeaders({
      type: 'basic',
      username: credentials.user,
      password: credentials.password,
    });
    return this.call('login', this.loginUrl, Authorization, credentials);
  }

  async refresh(refreshToken: string, credentials: Credentials): Promise<TokenPair> {
    return this.call('refresh', this.refreshUrl, `Bearer ${refreshToken}`, credentials);
  }

  private async call(
    operation: AuthOperation,
    endpoint: string,
    authorization: string,
    credentials: Credentials
  ): Promise<TokenPair> {
    const url = `${this.host}/${endpoint.replace(/^\/+/, '')}`;
    const headers: Record<string, string> = { Authorization: authorization };
    if (credentials.accountName) {
      headers['X-Account-Name'] = credentials.accountName;
    }

    const startTime = Date.now();
    let body: unknown;
    try {
      body = await ofetch<unknown>(url, {
        method: 'POST',
        headers,
        timeout: this.timeoutMs,
        retry: 0,
      });
    } catch (error) {
      throw this.toAuthError(operation, url, credentials.user, error);
    }

    loggers.auth.debug(`${operation} succeeded`, {
      url,
      user: credentials.user,
      duration: Date.now() - startTime,
    });

    return parseTokenResponse(body, { accountName: credentials.accountName, operation });
  }

  private toAuthError(operation: AuthOperation, url: string, user: string, error: unknown): AuthError {
    if (error instanceof FetchError && error.statusCode !== undefined) {
      loggers.auth.warn(`${operation} failed`, { url, user, statusCode: error.statusCode });
      return new AuthError(`${operation} failed with status ${error.statusCode}`, {
        operation,
        url,
        user,
        status: error.statusCode,
      });
    }

    const reason = error instanceof Error ? error.message : String(error);
    loggers.auth.error(`${operation} request error`, error instanceof Error ? error : null, { url, user });
    return new AuthError(`${operation} request error: ${reason}`, { operation, url, user, reason });
  }
}

/**
 * Token Cache
 * 登入 token 快取 - 延遲登入、依經過時間刷新
 *
 * 狀態：
 *   UNAUTHENTICATED（無紀錄）→ login
 *   VALID（age < threshold）→ 直接回傳
 *   STALE（age ≥ threshold）→ refresh；沒有 refresh token 時重新 login
 *
 * 單一飛行請求（SFR）：同一時間最多一個 login/refresh 在進行，
 * 其他呼叫者等待同一個 Promise，而不是各自發出請求。
 */

import { z } from 'zod';
import { AuthError, ConfigError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { HttpIdentityProvider, DEFAULT_LOGIN_TIMEOUT_MS } from './identity-provider.js';
import type { ConfigResolver } from './config.js';
import type {
  CredentialKey,
  Credentials,
  IdentityProvider,
  TokenPair,
  TokenRecord,
  TokenState,
} from '../types/auth.js';

/** 未設定 refresh_time 時的刷新門檻（秒） */
export const DEFAULT_REFRESH_THRESHOLD_SECONDS = 900;

const CREDENTIAL_KEYS: readonly CredentialKey[] = ['user', 'password', 'number', 'accountName'];

export interface TokenCacheOptions {
  provider: IdentityProvider;
  credentials: Credentials;
  /** token 建立後多久視為過期（毫秒，default: 900 秒） */
  refreshThresholdMs?: number;
  /** 時間來源，測試時可注入 */
  clock?: () => number;
}

export class TokenCache {
  private provider: IdentityProvider;
  private credentials: Credentials;
  private refreshThresholdMs: number;
  private clock: () => number;
  private record: TokenRecord | null = null;
  private inFlightTokenPromise: Promise<string> | null = null;

  constructor(options: TokenCacheOptions) {
    this.provider = options.provider;
    this.credentials = { ...options.credentials };
    this.refreshThresholdMs = options.refreshThresholdMs ?? DEFAULT_REFRESH_THRESHOLD_SECONDS * 1000;
    this.clock = options.clock ?? Date.now;

    if (!(this.refreshThresholdMs > 0)) {
      throw new ConfigError('refreshThresholdMs must be a positive number', {
        refreshThresholdMs: this.refreshThresholdMs,
      });
    }
  }

  /**
   * 取得有效的 Access Token
   * - VALID：直接返回快取
   * - 有請求進行中：等待進行中的請求
   * - 否則：發起 login 或 refresh 並保存 Promise
   */
  async getAccessToken(): Promise<string> {
    if (this.record && this.getState() === 'VALID') {
      return this.record.accessToken;
    }

    if (this.inFlightTokenPromise) {
      return this.inFlightTokenPromise;
    }

    this.inFlightTokenPromise = this.acquire();
    try {
      return await this.inFlightTokenPromise;
    } finally {
      this.inFlightTokenPromise = null;
    }
  }

  /**
   * 取得帶 Bearer token 的認證標頭
   */
  async getAuthHeaders(): Promise<Record<string, string>> {
    return { Authorization: `Bearer ${await this.getAccessToken()}` };
  }

  getState(): TokenState {
    if (!this.record) {
      return 'UNAUTHENTICATED';
    }
    const age = this.clock() - this.record.createdAt;
    return age < this.refreshThresholdMs ? 'VALID' : 'STALE';
  }

  getRecord(): TokenRecord | null {
    return this.record ? Object.freeze({ ...this.record }) : null;
  }

  getRefreshThresholdMs(): number {
    return this.refreshThresholdMs;
  }

  hasInflightRequest(): boolean {
    return this.inFlightTokenPromise !== null;
  }

  /**
   * 丟棄目前的紀錄，下次呼叫會重新 login
   * 不中斷進行中的請求
   */
  invalidate(): void {
    this.record = null;
  }

  getCredentials(): Credentials {
    return { ...this.credentials };
  }

  updateCredentials(update: Partial<Credentials>): void {
    this.credentials = { ...this.credentials, ...update };
  }

  /**
   * 更新單一憑證欄位；不認得的鍵仍會寫入，但留下警告
   */
  updateCredential(key: string, value: string): void {
    if (!isCredentialKey(key)) {
      loggers.auth.warn('Unrecognized credential key', { key });
    }
    this.credentials = { ...this.credentials, [key]: value };
  }

  private async acquire(): Promise<string> {
    // 再檢查一次：等待期間其他呼叫可能已經更新了紀錄
    const state = this.getState();
    if (this.record && state === 'VALID') {
      return this.record.accessToken;
    }

    const refreshToken = this.record?.refreshToken;
    if (refreshToken) {
      loggers.auth.info('Access token is stale, refreshing', {
        user: this.credentials.user,
        thresholdMs: this.refreshThresholdMs,
      });
      const refreshed = await this.exchange('refresh', () =>
        this.provider.refresh(refreshToken, this.getCredentials())
      );
      return this.store({
        accessToken: refreshed.accessToken,
        refreshToken: refreshed.refreshToken ?? refreshToken,
      });
    }

    loggers.auth.info(state === 'STALE' ? 'Stale token without refresh token, logging in' : 'Logging in', {
      user: this.credentials.user,
    });
    const pair = await this.exchange('login', () => this.provider.login(this.getCredentials()));
    return this.store(pair);
  }

  private async exchange(operation: 'login' | 'refresh', call: () => Promise<TokenPair>): Promise<TokenPair> {
    let pair: TokenPair;
    try {
      pair = await call();
    } catch (error) {
      if (error instanceof AuthError) {
        throw error;
      }
      throw new AuthError(`${operation} failed: ${error instanceof Error ? error.message : String(error)}`, {
        operation,
        user: this.credentials.user,
      });
    }

    if (!pair || typeof pair.accessToken !== 'string' || pair.accessToken.length === 0) {
      throw new AuthError(`${operation} returned no access token`, { operation, user: this.credentials.user });
    }
    return pair;
  }

  private store(pair: TokenPair): string {
    this.record = Object.freeze({
      accessToken: pair.accessToken,
      refreshToken: pair.refreshToken,
      createdAt: this.clock(),
    });
    return this.record.accessToken;
  }
}

function isCredentialKey(key: string): key is CredentialKey {
  return CREDENTIAL_KEYS.some((known) => known === key);
}

const positiveNumber = z.coerce.number().positive();

const tokenCacheSettingsSchema = z.object({
  host: z.string().min(1),
  login_url: z.string().min(1),
  refresh_login_url: z.string().min(1),
  user: z.string().min(1),
  password: z.string().min(1),
  number: z.string().optional(),
  account_name: z.string().optional(),
  refresh_time: positiveNumber.default(DEFAULT_REFRESH_THRESHOLD_SECONDS),
  login_timeout: positiveNumber.default(DEFAULT_LOGIN_TIMEOUT_MS / 1000),
});

const SETTING_KEYS = Object.keys(tokenCacheSettingsSchema.shape);

export interface CreateTokenCacheOptions {
  /** 預設使用 HttpIdentityProvider */
  provider?: IdentityProvider;
  section?: string;
  clock?: () => number;
}

/**
 * 從設定建立 TokenCache
 * 必要鍵：host、login_url、refresh_login_url、user、password
 * 選用鍵：number、account_name、refresh_time（秒）、login_timeout（秒）
 */
export function createTokenCache(config: ConfigResolver, options: CreateTokenCacheOptions = {}): TokenCache {
  const section = options.section ?? 'default';

  const raw: Record<string, string> = {};
  for (const key of SETTING_KEYS) {
    const value = config.get(section, key);
    // 空字串視為未設定
    if (value) {
      raw[key] = value;
    }
  }

  const parsed = tokenCacheSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const invalid = parsed.error.issues.map((issue) => issue.path.join('.'));
    const missing = invalid.filter((key) => raw[key] === undefined);
    throw new ConfigError(
      missing.length > 0
        ? `Missing required auth config keys: ${missing.join(', ')}`
        : `Invalid auth config keys: ${invalid.join(', ')}`,
      { section, missing, invalid }
    );
  }

  const settings = parsed.data;
  const provider =
    options.provider ??
    new HttpIdentityProvider({
      host: settings.host,
      loginUrl: settings.login_url,
      refreshUrl: settings.refresh_login_url,
      timeoutMs: settings.login_timeout * 1000,
    });

  return new TokenCache({
    provider,
    credentials: {
      user: settings.user,
      password: settings.password,
      number: settings.number,
      accountName: settings.account_name,
    },
    refreshThresholdMs: settings.refresh_time * 1000,
    clock: options.clock,
  });
}

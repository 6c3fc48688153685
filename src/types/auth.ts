/**
 * 登入憑證
 */
export interface Credentials {
  user: string;
  password: string;
  number?: string;
  /** 設定時登入請求會帶上 X-Account-Name，並使用扁平回應格式 */
  accountName?: string;
}

export type CredentialKey = keyof Credentials;

/**
 * identity provider 登入/刷新結果
 */
export interface TokenPair {
  accessToken: string;
  refreshToken?: string;
}

/**
 * 快取中的 token 紀錄，整筆替換、不做部分更新
 */
export interface TokenRecord {
  readonly accessToken: string;
  readonly refreshToken?: string;
  /** Unix timestamp (ms) */
  readonly createdAt: number;
}

export type TokenState = 'UNAUTHENTICATED' | 'VALID' | 'STALE';

/**
 * 實際執行登入/刷新 HTTP 呼叫的外部協作者
 */
export interface IdentityProvider {
  login(credentials: Credentials): Promise<TokenPair>;
  refresh(refreshToken: string, credentials: Credentials): Promise<TokenPair>;
}

export type AuthType = 'basic' | 'bearer' | 'apikey' | 'custom';

/**
 * 靜態認證標頭設定
 */
export interface AuthConfig {
  type: AuthType;
  username?: string;
  password?: string;
  token?: string;
  apiKey?: string;
  /** (default: 'X-API-Key') */
  apiKeyHeader?: string;
  customHeaders?: Record<string, string>;
}

/**
 * 設定命名空間：section → key → value
 * key 一律小寫儲存，value 一律為字串
 */
export type ConfigSection = Record<string, string>;

export type ConfigNamespace = Record<string, ConfigSection>;

/**
 * base 段落中決定分層載入的三個必要鍵
 */
export const BASE_KEYS = ['zone', 'product', 'env'] as const;

export type BaseKey = (typeof BASE_KEYS)[number];

export interface ConfigResolverOptions {
  /** 設定檔根目錄 (default: <cwd>/config/env) */
  rootDir?: string;
  /** 環境變數來源，測試時可注入 (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface LoadOptions {
  /** 合併後必須具備 base.zone / base.product / base.env */
  requireBase?: boolean;
}

/**
 * customized_config 解析結果
 */
export interface ParsedOverrides {
  overrides: Record<string, string>;
  /** 保留鍵 zone_env 指定的 section 名稱 */
  zoneEnv?: string;
}

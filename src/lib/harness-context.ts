/**
 * Harness Context
 * CLI 共用的延遲建立物件 - 同一個行程內只解析一次設定、只建立一個 TokenCache
 */

import path from 'node:path';
import { ConfigResolver } from '../services/config.js';
import { createTokenCache, type TokenCache } from '../services/auth.js';
import { AuthenticatedHttpHandler } from '../services/http.js';
import { ApiRegistry } from './api-registry.js';
import { loggers } from './logger.js';
import { registerUserEndpoints } from '../apps/user-api.js';

export interface HarnessContextOptions {
  configDir?: string;
  env?: NodeJS.ProcessEnv;
}

export class HarnessContext {
  private options: HarnessContextOptions;
  private config: ConfigResolver | null = null;
  private tokenCache: TokenCache | null = null;
  private http: AuthenticatedHttpHandler | null = null;
  private registry: ApiRegistry | null = null;

  constructor(options: HarnessContextOptions = {}) {
    this.options = options;
  }

  /**
   * 取得已載入的設定（第一次呼叫時 reload）
   * @throws ConfigError 如果 base 段落不完整
   */
  getConfig(): ConfigResolver {
    if (!this.config) {
      const resolver = this.createResolver();
      this.config = loggers.config.trackSync('Config reload', () => resolver.reload(), {
        rootDir: resolver.getRootDir(),
      });
    }
    return this.config;
  }

  /**
   * 尚未載入任何檔案的 resolver（base 不完整時也能使用）
   */
  createResolver(): ConfigResolver {
    const rootDir = this.options.configDir ? path.resolve(this.options.configDir) : undefined;
    return new ConfigResolver({ rootDir, env: this.options.env });
  }

  getTokenCache(): TokenCache {
    if (!this.tokenCache) {
      this.tokenCache = createTokenCache(this.getConfig());
    }
    return this.tokenCache;
  }

  getRegistry(): ApiRegistry {
    if (!this.registry) {
      this.registry = registerUserEndpoints(new ApiRegistry());
    }
    return this.registry;
  }

  getHttpHandler(): AuthenticatedHttpHandler {
    if (!this.http) {
      const config = this.getConfig();
      this.http = new AuthenticatedHttpHandler({
        host: config.get('default', 'host', ''),
        zone: config.getZone(),
        env: config.getEnv(),
        tokenCache: this.getTokenCache(),
      });
    }
    return this.http;
  }
}

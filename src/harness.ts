export { ConfigResolver, readSources, DEFAULT_SECTION, BASE_SECTION } from './services/config.js';
export { TokenCache, createTokenCache, DEFAULT_REFRESH_THRESHOLD_SECONDS } from './services/auth.js';
export { HttpIdentityProvider, parseTokenResponse } from './services/identity-provider.js';
export { RetryPolicy, RetryError, retry, calculateBackoff, isRetryableStatus } from './services/retry.js';
export { HttpHandler, AuthenticatedHttpHandler, NETWORK_ERROR_CODE } from './services/http.js';
export { ApiRegistry, formatPath, parseEndpointDescription } from './lib/api-registry.js';
export { buildAuthHeaders, generateSignature } from './lib/auth-headers.js';
export { parseOverrides, OVERRIDES_ENV_VAR } from './lib/env-overrides.js';
export { HarnessError, ConfigError, AuthError, HttpClientError } from './lib/errors.js';
export { StructuredLogger, loggers, setLogLevel } from './lib/logger.js';
export { UserApiClient, registerUserEndpoints } from './apps/user-api.js';
export { UserBizOps, buildUserPayload } from './biz/user-ops.js';

export type { ConfigNamespace, ConfigSection, ConfigResolverOptions } from './types/config.js';
export type {
  AuthConfig,
  Credentials,
  IdentityProvider,
  TokenPair,
  TokenRecord,
  TokenState,
} from './types/auth.js';
export type { ApiEndpoint, EndpointDefinition, HttpMethod, HttpResult, PathParams } from './types/api.js';
export type { HttpHandlerOptions, RequestOptions } from './services/http.js';
export type { RetryConfig } from './services/retry.js';
export type { UserPayload } from './biz/user-ops.js';

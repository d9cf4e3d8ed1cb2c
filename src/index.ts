/**
 * express-mvc-scope
 *
 * Locale resolution and redirect-scope correlation for Express MVC
 * applications.
 */

export { createApp } from './app';
export type { CreateAppOptions, MvcApplication } from './app';
export { startServer, installShutdownHandlers } from './server';
export type { RunningServer, StartServerOptions } from './server';

export { loadConfig, getConfig, resetConfig, validateConfigSchema, assertValidConfig } from './config';
export type {
  AppConfig,
  I18nConfig,
  LoggingConfig,
  MvcConfig,
  RedirectScopeConfig,
  RedirectStatus,
  RedisConfig,
  ServerConfig,
  TokenCarrierKind,
} from './config';

export * from './errors';
export * from './registry';
export * from './i18n';
export * from './mvc';
export * from './redirectScope';

export { mvcRequest } from './middleware/mvcRequest';
export type { MvcRequestOptions } from './middleware/mvcRequest';
export { requestLogger } from './middleware/requestLogger';
export { createRedirectScopeStore, connectRedis } from './infrastructure/redis';
export { createLogger, setLogLevel } from './utils/logger';
export type { Logger, LogContext } from './utils/logger';
export { requestContext } from './utils/requestContext';

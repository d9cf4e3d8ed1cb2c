/**
 * Configuration Type Definitions
 *
 * Centralized types for all application configuration.
 */

export type NodeEnv = 'development' | 'production' | 'test';
export type LogLevelName = 'error' | 'warn' | 'info' | 'debug';
export type RedirectStatus = 302 | 303;
export type TokenCarrierKind = 'query' | 'cookie';

export interface ServerConfig {
  nodeEnv: NodeEnv;
  port: number;
  /** Application base path ('' or '/segment...', no trailing slash) */
  basePath: string;
}

export interface I18nConfig {
  /** System default locale, used when no resolver finds a better match */
  defaultLocale: string;
}

export interface MvcConfig {
  /** Folder prepended to relative view paths before they reach a view engine */
  viewFolder: string;
  /** 303 by default, 302 for legacy clients */
  redirectStatus: RedirectStatus;
}

export interface RedirectScopeConfig {
  /** How long a pending scope waits for its follow-up request */
  ttlMs: number;
  /** Interval of the orphan sweep */
  sweepIntervalMs: number;
  carrier: TokenCarrierKind;
  paramName: string;
  cookieName: string;
}

export interface RedisConfig {
  url: string;
  enabled: boolean;
}

export interface LoggingConfig {
  level: LogLevelName;
}

export interface AppConfig {
  server: ServerConfig;
  i18n: I18nConfig;
  mvc: MvcConfig;
  redirectScope: RedirectScopeConfig;
  redis: RedisConfig;
  logging: LoggingConfig;
}

/**
 * HTTP server bootstrap
 *
 * ```typescript
 * import { startServer } from 'express-mvc-scope';
 *
 * await startServer({ controllers, registry });
 * ```
 */

import type { Server } from 'http';
import { createApp, type MvcApplication } from './app';
import { getConfig } from './config';
import type { AppConfig } from './config/types';
import { createI18nService } from './i18n/i18nService';
import { createRedirectScopeStore } from './infrastructure/redis';
import type { ControllerDefinition } from './mvc/router';
import { RedirectScopeManager } from './redirectScope/redirectScopeManager';
import { createComponentRegistry } from './registry/componentRegistry';
import type { ComponentRegistry } from './registry/types';
import { createLogger, extractError, setLogLevel } from './utils/logger';

const log = createLogger('SERVER');

// Time allowed for open connections to drain
const SHUTDOWN_TIMEOUT_MS = 30000;

export interface StartServerOptions {
  controllers: ControllerDefinition[];
  registry?: ComponentRegistry;
  config?: AppConfig;
  /** Install SIGTERM/SIGINT handlers (default true) */
  handleSignals?: boolean;
}

export interface RunningServer extends MvcApplication {
  server: Server;
  config: AppConfig;
  scopes: RedirectScopeManager;
  /** Stop the sweep, close the store and the HTTP server */
  close(): Promise<void>;
}

function listen(mvc: MvcApplication, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = mvc.app.listen(port);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

export async function startServer(options: StartServerOptions): Promise<RunningServer> {
  const config = options.config ?? getConfig();
  setLogLevel(config.logging.level);

  const i18n = createI18nService(config.i18n.defaultLocale);
  await i18n.initialize();

  const store = await createRedirectScopeStore(config.redis);
  const scopes = new RedirectScopeManager(store, {
    ttlMs: config.redirectScope.ttlMs,
    sweepIntervalMs: config.redirectScope.sweepIntervalMs,
  });

  let mvc: MvcApplication;
  try {
    mvc = createApp({
      config,
      registry: options.registry ?? createComponentRegistry(),
      scopes,
      controllers: options.controllers,
      i18n,
    });
  } catch (error) {
    await scopes.close();
    throw error;
  }

  const server = await listen(mvc, config.server.port);
  scopes.start();

  log.info(`Server listening on port ${config.server.port}`, {
    env: config.server.nodeEnv,
    store: store.kind,
  });

  let closing: Promise<void> | null = null;
  const close = (): Promise<void> => {
    if (!closing) {
      closing = (async () => {
        scopes.stop();
        await closeServer(server);
        await scopes.close();
        log.info('Server closed gracefully');
      })();
    }
    return closing;
  };

  if (options.handleSignals ?? true) {
    installShutdownHandlers(close);
  }

  return { ...mvc, server, config, scopes, close };
}

/**
 * Graceful shutdown on SIGTERM and SIGINT
 */
export function installShutdownHandlers(close: () => Promise<void>): void {
  let isShuttingDown = false;

  const handleShutdown = (signal: string): void => {
    // Prevent multiple shutdown attempts
    if (isShuttingDown) {
      log.warn(`${signal} received again, already shutting down...`);
      return;
    }
    isShuttingDown = true;

    log.info(`${signal} received, starting graceful shutdown (${SHUTDOWN_TIMEOUT_MS / 1000}s timeout)...`);

    // Force exit if graceful shutdown takes too long
    const forceExitTimeout = setTimeout(() => {
      log.error('Graceful shutdown timed out, forcing exit');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExitTimeout.unref();

    close()
      .then(() => {
        clearTimeout(forceExitTimeout);
        process.exit(0);
      })
      .catch((error) => {
        log.error('Error during shutdown', extractError(error));
        process.exit(1);
      });
  };

  process.once('SIGTERM', () => handleShutdown('SIGTERM'));
  process.once('SIGINT', () => handleShutdown('SIGINT'));
}

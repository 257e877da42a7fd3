/**
 * Capsule Ledger Server
 * Express API in front of the time-locked capsule ledger
 */

import 'dotenv/config';
import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import { metricsMiddleware, getMetricsHandler } from './middleware/metrics';
import { securityHeadersMiddleware } from './middleware/security';
import { apiLimiter } from './middleware/rateLimit';
import { apiKeyAuth, PRINCIPAL_HEADER } from './middleware/auth';
import { errorHandlerMiddleware, notFoundHandler } from './middleware/errorHandler';
import { createAdminRouter, createCapsuleRouter, createLedgerRouter } from './api/capsule';
import { CapsuleLedger } from './services/capsuleLedger';
import { BlockHeightClock } from './services/clock';
import { InMemoryBank } from './services/bank';
import { UnlockWatcher } from './services/unlockWatcher';
import { closeDatabase, getDatabase, initializeDatabase } from './db/database';
import { LedgerRepository, MysqlLedgerRepository, SqlPool } from './db/ledgerRepository';
import { loadConfig, LedgerConfig } from './utils/config';
import { getErrorMessage } from './types/common';
import { logger } from './utils/logger';

export interface AppDependencies {
  ledger: CapsuleLedger;
  config: LedgerConfig;
  /** Checked by /health when persistence is enabled */
  database?: SqlPool;
}

interface HealthReport {
  status: 'ok' | 'degraded' | 'down';
  timestamp: string;
  service: string;
  checks: {
    database: 'ok' | 'error' | 'not_configured';
    ledger: 'ok' | 'unbalanced';
  };
}

export function createApp({ ledger, config, database }: AppDependencies): Express {
  const app = express();

  app.use(cors({
    origin: config.frontendUrl,
    allowedHeaders: ['Content-Type', 'X-API-Key', PRINCIPAL_HEADER],
  }));
  app.use(express.json({ limit: '16kb' }));
  app.use(securityHeadersMiddleware);
  app.use(metricsMiddleware());

  app.get('/health', async (_req: Request, res: Response) => {
    const health: HealthReport = {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'capsule-ledger',
      checks: {
        database: database ? 'ok' : 'not_configured',
        ledger: 'ok',
      },
    };

    if (database) {
      try {
        await database.execute('SELECT 1');
      } catch (error) {
        logger.error('Database health check failed', { error: getErrorMessage(error) });
        health.checks.database = 'error';
        health.status = 'degraded';
      }
    }

    const reconciliation = ledger.reconcile();
    if (!reconciliation.balanced) {
      logger.error('Ledger total does not match unconsumed capsule value', { ...reconciliation });
      health.checks.ledger = 'unbalanced';
      health.status = 'down';
    }

    res.status(health.status === 'down' ? 503 : 200).json(health);
  });

  app.get('/metrics', getMetricsHandler());

  app.use('/api', apiLimiter, apiKeyAuth(config.apiKey));
  app.use('/api/capsules', createCapsuleRouter(ledger));
  app.use('/api/admin', createAdminRouter(ledger));
  app.use('/api', createLedgerRouter(ledger));

  app.use(notFoundHandler);
  // Error handling middleware (must be last)
  app.use(errorHandlerMiddleware);

  return app;
}

async function openRepository(config: LedgerConfig): Promise<{ repository?: LedgerRepository; database?: SqlPool }> {
  if (!config.persistence.enabled) {
    logger.warn('Persistence disabled; ledger state lives in memory only');
    return {};
  }

  const { host, port, user, password, database } = config.persistence;
  const pool = getDatabase({ host, port, user, password, database });
  await initializeDatabase(pool);
  return { repository: new MysqlLedgerRepository(pool), database: pool };
}

export async function startServer(config: LedgerConfig = loadConfig()): Promise<void> {
  const { repository, database } = await openRepository(config);
  const ledger = await CapsuleLedger.open({
    owner: config.owner,
    escrowAccount: config.escrowAccount,
    clock: new BlockHeightClock(config.clock),
    bank: new InMemoryBank(),
    repository,
    emergencyWithdrawRule: config.emergencyWithdrawRule,
    enforceGroupCapsuleLimit: config.enforceGroupCapsuleLimit,
  });

  const watcher = new UnlockWatcher(
    ledger,
    (notification) => {
      logger.info('Capsule unlocked', { ...notification });
    },
    config.unlockWatchSchedule,
    await ledger.now()
  );
  watcher.start();

  const app = createApp({ ledger, config, database });
  const server = app.listen(config.port, () => {
    logger.info('Capsule ledger server started', {
      port: config.port,
      environment: config.env,
      healthCheck: `http://localhost:${config.port}/health`,
    });
  });

  const gracefulShutdown = (signal: string): void => {
    logger.info(`Received ${signal}, starting graceful shutdown...`);
    watcher.stop();

    server.close(() => {
      logger.info('HTTP server closed');
      ledger
        .idle()
        .then(() => closeDatabase())
        .then(() => {
          logger.info('Graceful shutdown complete');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Error during shutdown', { error: getErrorMessage(error) });
          process.exit(1);
        });
    });

    // Force close after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection', { reason: getErrorMessage(reason) });
  });
}

// Start server only if not in test mode
if (process.env.NODE_ENV !== 'test' && !process.env.JEST_WORKER_ID) {
  startServer().catch((error: unknown) => {
    logger.error('Failed to start capsule ledger server', { error: getErrorMessage(error) });
    process.exit(1);
  });
}

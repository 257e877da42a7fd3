/**
 * Database Service
 * MySQL connection pool and ledger schema
 */

import mysql from 'mysql2/promise';
import { logger } from '../utils/logger';

export interface DatabaseOptions {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

let pool: mysql.Pool | null = null;

/**
 * Get (or lazily create) the MySQL connection pool
 */
export function getDatabase(options: DatabaseOptions): mysql.Pool {
  if (!pool) {
    pool = mysql.createPool({
      ...options,
      waitForConnections: true,
      connectionLimit: 10,
      queueLimit: 0,
      enableKeepAlive: true,
      keepAliveInitialDelay: 0,
    });
    logger.info('MySQL connection pool created', {
      host: options.host,
      port: options.port,
      database: options.database,
    });
  }
  return pool;
}

const SCHEMA: string[] = [
  `CREATE TABLE IF NOT EXISTS capsules (
    id BIGINT PRIMARY KEY,
    creator VARCHAR(128) NOT NULL,
    recipient VARCHAR(128) NOT NULL,
    payload TEXT NOT NULL,
    value BIGINT NOT NULL,
    unlock_time BIGINT NOT NULL,
    created_at BIGINT NOT NULL,
    opened_at BIGINT NULL,
    is_consumed TINYINT(1) NOT NULL DEFAULT 0,
    kind VARCHAR(20) NOT NULL,
    metadata TEXT NULL,
    is_public TINYINT(1) NOT NULL DEFAULT 0,
    INDEX idx_unlock_time (unlock_time),
    INDEX idx_is_consumed (is_consumed)
  ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4 COLLATE=utf8mb4_unicode_ci`,

  `CREATE TABLE IF NOT EXISTS capsule_index (
    principal VARCHAR(128) NOT NULL,
    position INT NOT NULL,
    capsule_id BIGINT NOT NULL,
    PRIMARY KEY (principal, position),
    INDEX idx_capsule_id (capsule_id)
  ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4 COLLATE=utf8mb4_unicode_ci`,

  `CREATE TABLE IF NOT EXISTS capsule_audit (
    capsule_id BIGINT PRIMARY KEY,
    actor VARCHAR(128) NOT NULL,
    time BIGINT NOT NULL,
    action VARCHAR(32) NOT NULL
  ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4 COLLATE=utf8mb4_unicode_ci`,

  `CREATE TABLE IF NOT EXISTS public_capsules (
    capsule_id BIGINT PRIMARY KEY
  ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4 COLLATE=utf8mb4_unicode_ci`,

  `CREATE TABLE IF NOT EXISTS ledger_counters (
    id TINYINT PRIMARY KEY,
    nonce BIGINT NOT NULL,
    total_capsules BIGINT NOT NULL,
    total_value_locked BIGINT NOT NULL,
    total_opened BIGINT NOT NULL,
    paused TINYINT(1) NOT NULL DEFAULT 0
  ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4 COLLATE=utf8mb4_unicode_ci`,
];

/**
 * Initialize database schema
 */
export async function initializeDatabase(db: mysql.Pool): Promise<void> {
  try {
    for (const statement of SCHEMA) {
      await db.execute(statement);
    }
    logger.info('Database schema initialized', { tables: SCHEMA.length });
  } catch (error) {
    logger.error('Failed to initialize database schema', { error });
    throw error;
  }
}

/**
 * Close database connection pool
 */
export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('Database connection pool closed');
  }
}

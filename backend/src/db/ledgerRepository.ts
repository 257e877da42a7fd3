/**
 * Ledger Repository
 * Write-through persistence for committed ledger transactions
 */

import { z } from 'zod';
import { logger } from '../utils/logger';
import { handleDatabaseError } from '../utils/errorHandler';
import { AUDIT_ACTIONS } from '../types/capsule';
import type { LedgerChangeSet, LedgerSnapshot } from '../types/capsule';

/**
 * One unit of work: the change set is written inside a database transaction
 * that stays open until the ledger has moved the funds.
 */
export interface LedgerUnitOfWork {
  write(changes: LedgerChangeSet): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface LedgerRepository {
  load(): Promise<LedgerSnapshot | null>;
  begin(): Promise<LedgerUnitOfWork>;
}

export interface InMemoryLedgerRepositoryOptions {
  /** Keep every committed change set in `committed`; off by default */
  record?: boolean;
}

/**
 * Repository for ledgers that live only in process memory.
 * Committed change sets are dropped unless `record` is set.
 */
export class InMemoryLedgerRepository implements LedgerRepository {
  readonly committed: LedgerChangeSet[] = [];
  private readonly record: boolean;

  constructor(
    private readonly snapshot: LedgerSnapshot | null = null,
    options: InMemoryLedgerRepositoryOptions = {}
  ) {
    this.record = options.record ?? false;
  }

  async load(): Promise<LedgerSnapshot | null> {
    return this.snapshot;
  }

  async begin(): Promise<LedgerUnitOfWork> {
    let pending: LedgerChangeSet | null = null;
    return {
      write: async (changes) => {
        pending = changes;
      },
      commit: async () => {
        if (pending && this.record) {
          this.committed.push(pending);
        }
        pending = null;
      },
      rollback: async () => {
        pending = null;
      },
    };
  }
}

export type SqlValue = string | number | null;

export interface SqlConnection {
  beginTransaction(): Promise<void>;
  execute(sql: string, values?: SqlValue[]): Promise<unknown>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  release(): void;
}

export interface SqlPool {
  getConnection(): Promise<SqlConnection>;
  execute(sql: string, values?: SqlValue[]): Promise<unknown>;
}

const flag = z.coerce.number().transform((value) => value === 1);

const capsuleRowSchema = z.object({
  id: z.coerce.number(),
  creator: z.string(),
  recipient: z.string(),
  payload: z.string(),
  value: z.coerce.number(),
  unlock_time: z.coerce.number(),
  created_at: z.coerce.number(),
  opened_at: z.coerce.number().nullable(),
  is_consumed: flag,
  kind: z.string(),
  metadata: z.string().nullable(),
  is_public: flag,
});

const indexRowSchema = z.object({
  principal: z.string(),
  position: z.coerce.number(),
  capsule_id: z.coerce.number(),
});

const auditRowSchema = z.object({
  capsule_id: z.coerce.number(),
  actor: z.string(),
  time: z.coerce.number(),
  action: z.enum(AUDIT_ACTIONS),
});

const publicRowSchema = z.object({ capsule_id: z.coerce.number() });

const countersRowSchema = z.object({
  nonce: z.coerce.number(),
  total_capsules: z.coerce.number(),
  total_value_locked: z.coerce.number(),
  total_opened: z.coerce.number(),
  paused: flag,
});

/**
 * mysql2 resolves `[rows, fields]`; validate the rows against the table's schema
 */
function rowsOf<S extends z.ZodTypeAny>(result: unknown, schema: S): z.infer<S>[] {
  if (!Array.isArray(result)) {
    throw new Error('Unexpected query result shape');
  }
  return z.array(schema).parse(result[0]);
}

const UPSERT_CAPSULE = `
  INSERT INTO capsules
    (id, creator, recipient, payload, value, unlock_time, created_at, opened_at, is_consumed, kind, metadata, is_public)
  VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  ON DUPLICATE KEY UPDATE
    payload = VALUES(payload),
    value = VALUES(value),
    unlock_time = VALUES(unlock_time),
    opened_at = VALUES(opened_at),
    is_consumed = VALUES(is_consumed)`;

const UPSERT_AUDIT = `
  INSERT INTO capsule_audit (capsule_id, actor, time, action)
  VALUES (?, ?, ?, ?)
  ON DUPLICATE KEY UPDATE actor = VALUES(actor), time = VALUES(time), action = VALUES(action)`;

const UPSERT_COUNTERS = `
  INSERT INTO ledger_counters (id, nonce, total_capsules, total_value_locked, total_opened, paused)
  VALUES (1, ?, ?, ?, ?, ?)
  ON DUPLICATE KEY UPDATE
    nonce = VALUES(nonce),
    total_capsules = VALUES(total_capsules),
    total_value_locked = VALUES(total_value_locked),
    total_opened = VALUES(total_opened),
    paused = VALUES(paused)`;

export class MysqlLedgerRepository implements LedgerRepository {
  constructor(private readonly db: SqlPool) {}

  async load(): Promise<LedgerSnapshot | null> {
    try {
      const counters = rowsOf(await this.db.execute('SELECT * FROM ledger_counters WHERE id = 1'), countersRowSchema);
      if (counters.length === 0) {
        logger.info('No persisted ledger found, starting empty');
        return null;
      }

      const capsules = rowsOf(await this.db.execute('SELECT * FROM capsules ORDER BY id'), capsuleRowSchema);
      const index = rowsOf(
        await this.db.execute('SELECT principal, position, capsule_id FROM capsule_index ORDER BY position'),
        indexRowSchema
      );
      const audit = rowsOf(await this.db.execute('SELECT * FROM capsule_audit'), auditRowSchema);
      const publicIds = rowsOf(await this.db.execute('SELECT capsule_id FROM public_capsules'), publicRowSchema);
      const [row] = counters;

      logger.info('Loaded persisted ledger', { capsules: capsules.length, nonce: row.nonce });

      return {
        capsules: capsules.map((capsule) => ({
          id: capsule.id,
          creator: capsule.creator,
          recipient: capsule.recipient,
          payload: capsule.payload,
          value: capsule.value,
          unlockTime: capsule.unlock_time,
          createdAt: capsule.created_at,
          openedAt: capsule.opened_at,
          isConsumed: capsule.is_consumed,
          kind: capsule.kind,
          metadata: capsule.metadata,
          isPublic: capsule.is_public,
        })),
        index: index.map((entry) => ({
          principal: entry.principal,
          position: entry.position,
          capsuleId: entry.capsule_id,
        })),
        auditEntries: audit.map((entry) => ({
          capsuleId: entry.capsule_id,
          actor: entry.actor,
          time: entry.time,
          action: entry.action,
        })),
        publicIds: publicIds.map((entry) => entry.capsule_id),
        counters: {
          nonce: row.nonce,
          totalCapsules: row.total_capsules,
          totalValueLocked: row.total_value_locked,
          totalOpened: row.total_opened,
          paused: row.paused,
        },
      };
    } catch (error) {
      logger.error('Failed to load ledger', { error });
      throw handleDatabaseError(error, 'load ledger');
    }
  }

  async begin(): Promise<LedgerUnitOfWork> {
    const conn = await this.db.getConnection().catch((error: unknown) => {
      throw handleDatabaseError(error, 'acquire connection');
    });

    try {
      await conn.execute('SET TRANSACTION ISOLATION LEVEL SERIALIZABLE');
      await conn.beginTransaction();
    } catch (error) {
      conn.release();
      throw handleDatabaseError(error, 'begin transaction');
    }

    let released = false;
    const release = () => {
      if (!released) {
        released = true;
        conn.release();
      }
    };

    return {
      write: async (changes) => {
        try {
          await writeChanges(conn, changes);
        } catch (error) {
          throw handleDatabaseError(error, 'write changes');
        }
      },
      commit: async () => {
        try {
          await conn.commit();
        } catch (error) {
          throw handleDatabaseError(error, 'commit');
        } finally {
          release();
        }
      },
      rollback: async () => {
        try {
          await conn.rollback();
        } catch (error) {
          logger.error('Rollback failed', { error });
          throw handleDatabaseError(error, 'rollback');
        } finally {
          release();
        }
      },
    };
  }
}

async function writeChanges(conn: SqlConnection, changes: LedgerChangeSet): Promise<void> {
  for (const capsule of changes.capsules) {
    await conn.execute(UPSERT_CAPSULE, [
      capsule.id,
      capsule.creator,
      capsule.recipient,
      capsule.payload,
      capsule.value,
      capsule.unlockTime,
      capsule.createdAt,
      capsule.openedAt,
      capsule.isConsumed ? 1 : 0,
      capsule.kind,
      capsule.metadata,
      capsule.isPublic ? 1 : 0,
    ]);
  }

  for (const entry of changes.indexAppends) {
    await conn.execute(
      'INSERT INTO capsule_index (principal, position, capsule_id) VALUES (?, ?, ?)',
      [entry.principal, entry.position, entry.capsuleId]
    );
  }

  for (const entry of changes.auditEntries) {
    await conn.execute(UPSERT_AUDIT, [entry.capsuleId, entry.actor, entry.time, entry.action]);
  }

  for (const id of changes.publicIds) {
    await conn.execute('INSERT INTO public_capsules (capsule_id) VALUES (?)', [id]);
  }

  const { counters } = changes;
  await conn.execute(UPSERT_COUNTERS, [
    counters.nonce,
    counters.totalCapsules,
    counters.totalValueLocked,
    counters.totalOpened,
    counters.paused ? 1 : 0,
  ]);
}

import type pg from "pg";
import type pino from "pino";
import { PgRepository, type Queryable } from "./pg-repository";
import { buildRepositories, type DataStore } from "./types";

export interface TransactionClient extends Queryable {
  /** A truthy argument tells the pool to discard the connection. */
  release(err?: Error | boolean): void;
}

const bindRepositories = (db: Queryable) =>
  buildRepositories((definition) => new PgRepository(definition, db));

// Transaction-scoped: PostgreSQL drops the lock at COMMIT or ROLLBACK.
const acquireLock = async (db: Queryable, name: string) => {
  await db.query("SELECT pg_advisory_xact_lock(hashtext($1))", [name]);
};

export const poolExecutor = (pool: pg.Pool): Queryable => ({
  query: (text, values) => pool.query(text, values),
});

export function createPgStore(pool: pg.Pool, logger: pino.Logger): DataStore {
  return createSqlStore(
    poolExecutor(pool),
    async () => {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: (err) => client.release(err),
      };
    },
    logger
  );
}

/**
 * Store over any executor; `connect` hands out a dedicated client for each
 * transaction.
 */
export function createSqlStore(
  db: Queryable,
  connect: () => Promise<TransactionClient>,
  logger: pino.Logger
): DataStore {
  const log = logger.child({ component: "DataStore" });

  return {
    ...bindRepositories(db),
    lock: (name) => acquireLock(db, name),
    transaction: async (work) => {
      const client = await connect();
      const scoped: DataStore = {
        ...bindRepositories(client),
        lock: (name) => acquireLock(client, name),
        transaction: (inner) => inner(scoped),
      };

      let broken: Error | undefined;
      try {
        await client.query("BEGIN");
        const result = await work(scoped);
        await client.query("COMMIT");
        return result;
      } catch (error) {
        try {
          await client.query("ROLLBACK");
        } catch (rollbackError) {
          broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
          log.error({ err: broken, cause: error }, "Rollback failed, discarding connection");
        }
        throw error;
      } finally {
        client.release(broken);
      }
    },
  };
}

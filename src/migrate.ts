import fs from "fs/promises";
import path from "path";
import type pino from "pino";
import type { Queryable } from "./repositories/pg-repository";

export const SCHEMA_PATH = path.join(__dirname, "..", "sql", "schema.sql");

/** Applies the idempotent DDL in sql/schema.sql. */
export async function migrate(db: Queryable, logger: pino.Logger, schemaPath = SCHEMA_PATH): Promise<void> {
  const sql = await fs.readFile(schemaPath, "utf8");
  logger.info({ schemaPath }, "Applying database schema");
  await db.query(sql);
  logger.info("Database schema up to date");
}

if (require.main === module) {
  void (async () => {
    const { pool } = await import("./db");
    const { logger } = await import("./logger");
    const { poolExecutor } = await import("./repositories/pg-store");
    try {
      await migrate(poolExecutor(pool), logger);
    } catch (error) {
      logger.error(error, "Migration failed");
      process.exitCode = 1;
    } finally {
      await pool.end();
    }
  })();
}

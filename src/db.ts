import pg from "pg";
import { config } from "./config";
import { logger } from "./logger";
import { createPgStore } from "./repositories/pg-store";

export const pool = new pg.Pool({
  connectionString: config.database.url,
  max: config.database.poolMax,
});

export const store = createPgStore(pool, logger);

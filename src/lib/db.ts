import { Pool } from "pg";
import { logger } from "../utils/logger";

let pool: Pool | null = null;

export const getPool = (connectionString: string): Pool => {
  if (!connectionString.startsWith("postgres")) {
    throw new Error("DATABASE_URL must be a PostgreSQL connection string");
  }
  if (!pool) {
    pool = new Pool({
      connectionString,
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    });
    pool.on("error", (err) => {
      logger.error({ err }, "[DB] Idle client error");
    });
  }
  return pool;
};

export const closePool = async (): Promise<void> => {
  if (pool) {
    const current = pool;
    pool = null;
    await current.end();
  }
};

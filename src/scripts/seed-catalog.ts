import "dotenv/config";
import fs from "fs";
import path from "path";
import { PgCatalogRepository } from "../catalog/catalog.repository";
import { loadSeedProducts } from "../catalog/catalog.seed";
import { closePool, getPool } from "../lib/db";
import { logger } from "../utils/logger";

const SCHEMA_PATH = path.resolve(__dirname, "../../db/schema.sql");

async function main() {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) throw new Error("DATABASE_URL is required for seeding");

  logger.info("Start seeding ...");
  const pool = getPool(databaseUrl);
  await pool.query(fs.readFileSync(SCHEMA_PATH, "utf8"));

  const products = loadSeedProducts();
  const count = await new PgCatalogRepository(pool).upsertProducts(products);
  logger.info(`Upserted ${count} products`);
}

main()
  .catch((e: unknown) => {
    logger.error({ err: e }, "Seeding failed");
    process.exitCode = 1;
  })
  .finally(async () => {
    await closePool();
  });

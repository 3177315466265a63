import pg from "pg";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("db-migrate");

const SCHEMA_FILE = fileURLToPath(new URL("./schema.sql", import.meta.url));

/**
 * Apply `schema.sql` (idempotent DDL mirroring `schema.ts`) in one
 * transaction.
 *
 * Can be invoked directly:
 *   tsx packages/shared/src/db/migrate.ts
 */
export async function runMigrations(connectionString: string): Promise<void> {
  const ddl = await readFile(SCHEMA_FILE, "utf8");
  const client = new pg.Client({ connectionString });
  await client.connect();

  try {
    logger.info({ file: SCHEMA_FILE }, "Applying schema");
    await client.query("BEGIN");
    await client.query(ddl);
    await client.query("COMMIT");
    logger.info("Schema applied");
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  } finally {
    await client.end();
  }
}

// Allow running directly via `tsx migrate.ts`
const entry = process.argv[1];
const isMain =
  entry !== undefined &&
  (entry.endsWith("migrate.ts") || entry.endsWith("migrate.js"));

if (isMain) {
  const connectionString = process.env["DATABASE_URL"];
  if (connectionString === undefined || connectionString === "") {
    logger.error("DATABASE_URL is not set");
    process.exit(1);
  }

  runMigrations(connectionString)
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.error({ err }, "Migration failed");
      process.exit(1);
    });
}

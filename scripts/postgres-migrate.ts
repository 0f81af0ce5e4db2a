import { readdir, readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { Pool, type PoolClient } from "pg";
import { makeLogger } from "../src/infra/logger.js";

const logger = makeLogger({ component: "db-migrate" });

// Serializes concurrent migrators (e.g. several replicas booting at once).
const MIGRATION_LOCK_ID = 7_321_004;

async function appliedMigrations(client: PoolClient): Promise<Set<string>> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS pie_schema_migrations (
      name TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `);
  const { rows } = await client.query<{ name: string }>("SELECT name FROM pie_schema_migrations");
  return new Set(rows.map((row) => row.name));
}

async function applyMigration(client: PoolClient, directory: string, name: string): Promise<void> {
  const sql = await readFile(join(directory, name), "utf8");
  await client.query("BEGIN");
  try {
    await client.query(sql);
    await client.query("INSERT INTO pie_schema_migrations (name) VALUES ($1)", [name]);
    await client.query("COMMIT");
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  }
}

async function main(): Promise<void> {
  const connectionString = process.env.PIE_POSTGRES_URL?.trim();
  if (!connectionString) {
    throw new Error("PIE_POSTGRES_URL is required.");
  }
  const directory = resolve(process.env.PIE_MIGRATIONS_DIR ?? join(process.cwd(), "sql"));
  // Files apply in lexical order, hence the zero-padded prefixes.
  const files = (await readdir(directory)).filter((name) => name.endsWith(".sql")).sort();

  const pool = new Pool({ connectionString });
  const client = await pool.connect();
  try {
    await client.query("SELECT pg_advisory_lock($1)", [MIGRATION_LOCK_ID]);
    const applied = await appliedMigrations(client);
    const pending = files.filter((name) => !applied.has(name));
    for (const name of pending) {
      await applyMigration(client, directory, name);
      logger.info({ migration: name }, "migration applied");
    }
    logger.info({ directory, applied: pending.length, skipped: files.length - pending.length }, "db:migrate done");
  } finally {
    await client.query("SELECT pg_advisory_unlock($1)", [MIGRATION_LOCK_ID]);
    client.release();
    await pool.end();
  }
}

await main();

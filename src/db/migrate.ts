import fs from "node:fs";
import path from "node:path";
import { Pool } from "pg";
import { loadEnv } from "../config/env";
import { createPool, withTransaction } from "./connection";

const MIGRATIONS_TABLE = "schema_migrations";

function getMigrationsDir(): string {
  const candidates = [
    path.resolve(__dirname, "migrations"),
    path.resolve(process.cwd(), "src/db/migrations")
  ];

  for (const dir of candidates) {
    if (fs.existsSync(dir)) {
      return dir;
    }
  }

  throw new Error("Migration directory not found.");
}

export async function runMigrations(pool: Pool): Promise<string[]> {
  await withTransaction(pool, async (client) => {
    await client.query(`
      CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
        id BIGSERIAL PRIMARY KEY,
        name TEXT NOT NULL UNIQUE,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `);
  });

  const migrationsDir = getMigrationsDir();
  const files = fs
    .readdirSync(migrationsDir)
    .filter((name) => name.endsWith(".sql"))
    .sort((a, b) => a.localeCompare(b));

  const applied: string[] = [];
  for (const file of files) {
    const wasApplied = await withTransaction(pool, async (client) => {
      const existing = await client.query<{ id: number }>(
        `SELECT id FROM ${MIGRATIONS_TABLE} WHERE name = $1 LIMIT 1`,
        [file]
      );
      if (existing.rowCount && existing.rowCount > 0) {
        return false;
      }

      const sql = fs.readFileSync(path.join(migrationsDir, file), "utf8");
      await client.query(sql);
      await client.query(
        `INSERT INTO ${MIGRATIONS_TABLE} (name) VALUES ($1)`,
        [file]
      );
      return true;
    });
    if (wasApplied) {
      applied.push(file);
    }
  }

  return applied;
}

if (require.main === module) {
  const pool = createPool(loadEnv());
  runMigrations(pool)
    .then((applied) => {
      // eslint-disable-next-line no-console
      console.log(applied.length > 0 ? `Applied: ${applied.join(", ")}` : "No pending migrations.");
    })
    .catch((error: unknown) => {
      // eslint-disable-next-line no-console
      console.error(error);
      process.exitCode = 1;
    })
    .finally(() => {
      pool.end().catch(() => undefined);
    });
}

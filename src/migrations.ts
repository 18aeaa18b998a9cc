import fs from "fs";
import path from "path";
import { withTransaction, type Database } from "./db";
import { logInfo } from "./observability/logger";

const migrationsDir = path.join(process.cwd(), "migrations");

function listMigrationFiles(): string[] {
  if (!fs.existsSync(migrationsDir)) {
    return [];
  }
  return fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith(".sql"))
    .sort();
}

async function ensureMigrationsTable(db: Database): Promise<void> {
  await db.query(
    `create table if not exists schema_migrations (
      id text primary key,
      applied_at timestamptz not null
    )`
  );
}

async function fetchAppliedMigrations(db: Database): Promise<Set<string>> {
  const res = await db.query<{ id: string }>("select id from schema_migrations");
  return new Set(res.rows.map((row) => row.id));
}

/** Applies every pending `migrations/*.sql` file in name order, one transaction each. */
export async function runMigrations(db: Database): Promise<string[]> {
  await ensureMigrationsTable(db);
  const applied = await fetchAppliedMigrations(db);
  const executed: string[] = [];

  for (const file of listMigrationFiles()) {
    if (applied.has(file)) {
      continue;
    }
    const sql = fs.readFileSync(path.join(migrationsDir, file), "utf8");
    await withTransaction(db, async (client) => {
      await client.query(sql);
      await client.query("insert into schema_migrations (id, applied_at) values ($1, now())", [
        file,
      ]);
    });
    executed.push(file);
    logInfo("migration_applied", { migration: file });
  }

  return executed;
}

import { drizzle } from "drizzle-orm/libsql";
import { createClient } from "@libsql/client";
import { pushSQLiteSchema } from "drizzle-kit/api";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import * as schema from "./schema";
import { config } from "../config";

// Ensure database directory exists
if (config.databaseUrl.startsWith("file:")) {
  const dbPath = config.databaseUrl.replace("file:", "");
  const dbDir = dirname(dbPath);
  mkdirSync(dbDir, { recursive: true });
}

export const client = createClient({
  url: config.databaseUrl,
});

export const db = drizzle(client, { schema });

export { schema };

/**
 * Brings the database up to the tables declared in `./schema`, diffing the live
 * database against the schema and applying only what is missing.
 */
export async function runMigrations() {
  console.log("Running database migrations...");
  const { hasDataLoss, warnings, statementsToExecute, apply } = await pushSQLiteSchema({ ...schema }, db);

  if (hasDataLoss) {
    throw new Error(`Schema change would lose data: ${warnings.join("; ")}`);
  }
  await apply();

  await client.execute("PRAGMA foreign_keys = ON");
  console.log(`Migrations completed (${statementsToExecute.length} statements)`);
  return statementsToExecute.length;
}

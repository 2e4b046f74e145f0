import Database from "better-sqlite3";
import path from "path";
import { env } from "@/lib/env";
import { QueryError } from "@/lib/errors";
import { toRow } from "@/lib/rows";
import type { Row } from "@/lib/types";

export type ExecuteOptions = {
  databasePath?: string;
};

export type QueryExecutor = (sql: string) => Row[];

export function resolveDatabasePath(databasePath = env.DATABASE_PATH) {
  return path.resolve(process.cwd(), databasePath);
}

/**
 * Runs one read-only statement and returns its rows. Every call opens and
 * closes its own connection, so concurrent requests never share one.
 */
export function executeQuery(sql: string, options: ExecuteOptions = {}): Row[] {
  let db: Database.Database | null = null;
  try {
    db = new Database(resolveDatabasePath(options.databasePath), { readonly: true, fileMustExist: true });
    const stmt = db.prepare(sql);
    if (!stmt.reader) {
      throw new Error("Only statements that return rows are allowed");
    }
    return stmt.all().map(toRow);
  } catch (e) {
    throw new QueryError(e);
  } finally {
    db?.close();
  }
}

export function pingDatabase(options: ExecuteOptions = {}) {
  const rows = executeQuery("SELECT 1 AS ok", options);
  return rows[0]?.ok === 1;
}

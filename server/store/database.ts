import fs from "node:fs";
import path from "node:path";
import { drizzle, type SQLJsDatabase } from "drizzle-orm/sql-js";
import sqlJs, { type Database, type SqlJsStatic } from "sql.js";
import { HttpError, PersistenceError } from "../errors.js";
import * as schema from "./schema.js";

export type ChatDatabase = SQLJsDatabase<typeof schema>;

export type DatabaseHandle = {
  db: ChatDatabase;
  path: string;
  /** Writes the database image to `path`. Does nothing for `:memory:`. */
  persist: () => void;
  close: () => void;
};

const SCHEMA_SQL = new URL("../../sql/schema.sql", import.meta.url);

let engine: Promise<SqlJsStatic> | null = null;

function loadEngine(): Promise<SqlJsStatic> {
  // sql.js is CommonJS; its init function is also published as `default`.
  engine ??= sqlJs.default();
  return engine;
}

function enableForeignKeys(client: Database): void {
  // Session deletes rely on ON DELETE CASCADE.
  client.exec("PRAGMA foreign_keys = ON");
}

export async function openDatabase(filePath: string): Promise<DatabaseHandle> {
  const inMemory = filePath === ":memory:";
  const target = inMemory ? filePath : path.resolve(filePath);
  let image: Buffer | null = null;
  if (!inMemory) {
    fs.mkdirSync(path.dirname(target), { recursive: true });
    image = fs.existsSync(target) ? fs.readFileSync(target) : null;
  }

  const SQL = await loadEngine();
  const client = new SQL.Database(image);
  enableForeignKeys(client);
  client.exec(fs.readFileSync(SCHEMA_SQL, "utf8"));

  let closed = false;
  const persist = () => {
    if (inMemory || closed) {
      return;
    }
    const bytes = client.export();
    // export() reopens the connection, which resets pragmas.
    enableForeignKeys(client);
    const temp = `${target}.tmp`;
    fs.writeFileSync(temp, bytes);
    fs.renameSync(temp, target);
  };
  persist();

  return {
    db: drizzle(client, { schema }),
    path: filePath,
    persist,
    close: () => {
      if (closed) {
        return;
      }
      persist();
      closed = true;
      client.close();
    },
  };
}

/**
 * Runs a store operation, letting HttpErrors through and wrapping driver
 * failures so callers only ever see PersistenceError.
 */
export function guard<T>(operation: string, run: () => T): T {
  try {
    return run();
  } catch (err) {
    if (err instanceof HttpError) {
      throw err;
    }
    throw new PersistenceError(`Failed to ${operation}`, { cause: err });
  }
}

import Database from "better-sqlite3";

import { createRepositories, type Repositories } from "./pokemonInternal";
import { SCHEMA_STATEMENTS } from "./schema";

export type Db = Database.Database;

export function openDatabase(path: string): Db {
  const db = new Database(path);
  db.pragma("foreign_keys = ON");
  if (path !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  // Idempotent: every statement is CREATE ... IF NOT EXISTS
  db.transaction(() => {
    for (const statement of SCHEMA_STATEMENTS) db.exec(statement);
  })();
  return db;
}

export function checkDatabase(db: Db): boolean {
  try {
    const row = db.prepare("SELECT 1 AS ok").get() as { ok: number } | undefined;
    return row?.ok === 1;
  } catch {
    return false;
  }
}

/**
 * Request-scoped view of the store. Reads go straight to the repositories;
 * all writes of one operation go through a single `commit` call, which runs
 * them in one immediate transaction and rolls everything back on failure.
 */
export interface Session {
  readonly repos: Repositories;
  commit<T>(write: (repos: Repositories) => T): T;
}

const repositoryCache = new WeakMap<Db, Repositories>();

// Statements are prepared once per connection.
export function repositoriesFor(db: Db): Repositories {
  let repos = repositoryCache.get(db);
  if (!repos) {
    repos = createRepositories(db);
    repositoryCache.set(db, repos);
  }
  return repos;
}

export async function withSession<T>(db: Db, run: (session: Session) => Promise<T>): Promise<T> {
  const repos = repositoriesFor(db);
  let released = false;
  const session: Session = {
    repos,
    commit(write) {
      if (released) throw new Error("Session already released");
      return db.transaction(() => write(repos)).immediate();
    },
  };
  try {
    return await run(session);
  } finally {
    released = true;
  }
}

// src/db/databaseName.ts
/**
 * Process-wide target database name. Set exactly once at bootstrap, before
 * the first `createPool`. Each cluster worker is its own process and sets
 * its own copy.
 */

import { OnceCell } from "../util/OnceCell";

const databaseName = new OnceCell<string>("DATABASE_NAME");

export function setDatabaseName(name: string): void {
  if (!name.trim()) {
    throw new Error("DATABASE_NAME_INVALID: name must not be empty");
  }
  databaseName.set(name);
}

export function getDatabaseName(): string {
  return databaseName.get();
}

export function isDatabaseNameSet(): boolean {
  return databaseName.isSet();
}

// test/databaseName.spec.ts
import { describe, it, expect, vi } from "vitest";

// Fresh module graph per test: the name is process-wide state.
async function load() {
  vi.resetModules();
  return import("../src/db/databaseName");
}

describe("database name", () => {
  it("fails to read before it is set", async () => {
    const db = await load();
    expect(db.isDatabaseNameSet()).toBe(false);
    expect(() => db.getDatabaseName()).toThrow(/^DATABASE_NAME_NOT_SET:/);
  });

  it("returns the exact value after one set", async () => {
    const db = await load();
    db.setDatabaseName("pricing");
    expect(db.getDatabaseName()).toBe("pricing");
    expect(db.isDatabaseNameSet()).toBe(true);
  });

  it("fails on the second set and keeps the first value", async () => {
    const db = await load();
    db.setDatabaseName("pricing");
    expect(() => db.setDatabaseName("inventory")).toThrow(
      /^DATABASE_NAME_ALREADY_SET:/
    );
    expect(db.getDatabaseName()).toBe("pricing");
  });

  it("is shared by every importer", async () => {
    const db = await load();
    db.setDatabaseName("pricing");
    const again = await import("../src/db/databaseName");
    const barrel = await import("../src");
    expect(again.getDatabaseName()).toBe("pricing");
    expect(barrel.getDatabaseName()).toBe("pricing");
  });

  it("rejects an empty name without consuming the cell", async () => {
    const db = await load();
    expect(() => db.setDatabaseName("  ")).toThrow(
      "DATABASE_NAME_INVALID: name must not be empty"
    );
    db.setDatabaseName("pricing");
    expect(db.getDatabaseName()).toBe("pricing");
  });
});

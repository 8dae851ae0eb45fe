import path from "node:path";
import { pathToFileURL } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTestDatabase, type TestDatabase } from "../../tests/helpers/test-db.js";
import { ensureSchema, getDatabaseAuthToken, getDatabaseUrl, STORE_TABLES } from "../index.js";

describe("getDatabaseUrl", () => {
  it("defaults to the app home database", () => {
    const home = path.resolve("/tmp/conductor-home");
    expect(getDatabaseUrl({ CONDUCTOR_HOME: home })).toBe(
      pathToFileURL(path.join(home, "db", "conductor.db")).href
    );
  });

  it("passes memory and remote urls through", () => {
    expect(getDatabaseUrl({ DATABASE_URL: ":memory:" })).toBe(":memory:");
    expect(getDatabaseUrl({ DATABASE_URL: "libsql://db.example.test" })).toBe(
      "libsql://db.example.test"
    );
    expect(getDatabaseUrl({ DATABASE_URL: "https://db.example.test" })).toBe(
      "https://db.example.test"
    );
  });

  it("resolves relative file urls and plain paths against cwd", () => {
    const expected = pathToFileURL(path.resolve(process.cwd(), "data/state.db")).href;
    expect(getDatabaseUrl({ DATABASE_URL: "file:data/state.db" })).toBe(expected);
    expect(getDatabaseUrl({ DATABASE_URL: "data/state.db" })).toBe(expected);
  });

  it("keeps absolute file urls", () => {
    const absolute = path.resolve("/var/lib/conductor/state.db");
    expect(getDatabaseUrl({ DATABASE_URL: pathToFileURL(absolute).href })).toBe(
      pathToFileURL(absolute).href
    );
  });
});

describe("getDatabaseAuthToken", () => {
  it("treats an empty token as absent", () => {
    expect(getDatabaseAuthToken({ DATABASE_AUTH_TOKEN: "" })).toBeUndefined();
    expect(getDatabaseAuthToken({ DATABASE_AUTH_TOKEN: "test-secret" })).toBe("test-secret");
  });
});

describe("openDatabase", () => {
  let database: TestDatabase;

  beforeEach(async () => {
    database = await createTestDatabase();
  });

  afterEach(() => {
    database.cleanup();
  });

  async function tableNames(): Promise<string[]> {
    const result = await database.client.execute(
      "SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name"
    );
    return result.rows.map(row => String(row.name));
  }

  it("creates every store table", async () => {
    const names = await tableNames();
    for (const table of STORE_TABLES) {
      expect(names).toContain(table);
    }
  });

  it("applies the schema idempotently", async () => {
    await ensureSchema(database.client);
    await ensureSchema(database.client);

    const names = await tableNames();
    expect(names.filter(name => name === "tasks")).toHaveLength(1);
  });

  it("enables foreign keys", async () => {
    const result = await database.client.execute("PRAGMA foreign_keys");
    expect(Number(result.rows[0]?.foreign_keys)).toBe(1);
  });
});

import { describe, it, expect } from "vitest";
import {
  checkSchema,
  isSchemaComplete,
  missingColumnStatements,
  missingFunctionMigrations,
} from "../schema.ts";
import { DEFAULT_COLUMNS, FakeSupabase } from "./fake-supabase.ts";

const REVIEW_COLUMNS = ["is_favorite", "times_shown", "last_shown"];
const REVIEW_MIGRATION = "supabase/migrations/20261018093000_quote_review_stats.sql";

describe("checkSchema", () => {
  it("reports a complete schema", async () => {
    const fake = new FakeSupabase();
    const status = await checkSchema(fake.asClient());

    expect(status).toEqual({
      tables: [
        { table: "quote_users", exists: true, missingColumns: [] },
        { table: "quotes", exists: true, missingColumns: [] },
      ],
      functions: [{ name: "mark_quotes_shown", exists: true, migration: REVIEW_MIGRATION }],
    });
    expect(isSchemaComplete(status)).toBe(true);
    expect(missingColumnStatements(status)).toEqual([]);
    expect(missingFunctionMigrations(status)).toEqual([]);
  });

  it("calls mark_quotes_shown without touching any quote", async () => {
    const fake = new FakeSupabase();
    fake.rows("quotes").push({ id: 1, user_id: "7", text: "a", times_shown: 0, last_shown: null });

    await checkSchema(fake.asClient());

    expect(fake.rpcCalls).toEqual([
      {
        name: "mark_quotes_shown",
        params: { p_user_id: "", p_ids: [], p_times_shown: [], p_shown_at: "1970-01-01T00:00:00.000Z" },
      },
    ]);
    expect(fake.rows("quotes")[0]).toMatchObject({ times_shown: 0, last_shown: null });
  });

  it("lists columns added by later migrations", async () => {
    const fake = new FakeSupabase({
      columns: {
        quote_users: DEFAULT_COLUMNS.quote_users,
        quotes: DEFAULT_COLUMNS.quotes.filter((c) => !REVIEW_COLUMNS.includes(c)),
      },
    });

    const status = await checkSchema(fake.asClient());

    expect(status.tables[1]).toEqual({ table: "quotes", exists: true, missingColumns: REVIEW_COLUMNS });
    expect(isSchemaComplete(status)).toBe(false);
    expect(missingColumnStatements(status)).toEqual([
      "ALTER TABLE quotes ADD COLUMN IF NOT EXISTS is_favorite BOOLEAN NOT NULL DEFAULT FALSE;",
      "ALTER TABLE quotes ADD COLUMN IF NOT EXISTS times_shown INTEGER NOT NULL DEFAULT 0;",
      "ALTER TABLE quotes ADD COLUMN IF NOT EXISTS last_shown TIMESTAMPTZ;",
    ]);
  });

  it("reports a missing mark_quotes_shown function with its migration", async () => {
    const fake = new FakeSupabase({ functions: [] });

    const status = await checkSchema(fake.asClient());

    expect(status.tables.every((t) => t.exists && t.missingColumns.length === 0)).toBe(true);
    expect(status.functions).toEqual([{ name: "mark_quotes_shown", exists: false, migration: REVIEW_MIGRATION }]);
    expect(isSchemaComplete(status)).toBe(false);
    expect(missingColumnStatements(status)).toEqual([]);
    expect(missingFunctionMigrations(status)).toEqual([REVIEW_MIGRATION]);
  });

  it("treats undefined_function as a missing function", async () => {
    const fake = new FakeSupabase();
    fake.failNext("rpc:mark_quotes_shown", {
      code: "42883",
      message: "function mark_quotes_shown(text, bigint[], integer[], timestamptz) does not exist",
    });

    const status = await checkSchema(fake.asClient());

    expect(status.functions[0].exists).toBe(false);
  });

  it("marks a missing table and skips it in ALTER statements", async () => {
    const fake = new FakeSupabase({ columns: { quote_users: DEFAULT_COLUMNS.quote_users } });

    const status = await checkSchema(fake.asClient());

    expect(status.tables[1]).toEqual({ table: "quotes", exists: false, missingColumns: DEFAULT_COLUMNS.quotes });
    expect(missingColumnStatements(status)).toEqual([]);
  });

  it("treats a table missing from the PostgREST schema cache as missing", async () => {
    const fake = new FakeSupabase();
    fake.failNext("quote_users", {
      code: "PGRST205",
      message: "Could not find the table 'public.quote_users' in the schema cache",
    });

    const status = await checkSchema(fake.asClient());

    expect(status.tables[0]).toEqual({
      table: "quote_users",
      exists: false,
      missingColumns: DEFAULT_COLUMNS.quote_users,
    });
    expect(status.tables[1]).toEqual({ table: "quotes", exists: true, missingColumns: [] });
    expect(isSchemaComplete(status)).toBe(false);
  });

  it("propagates unrelated errors", async () => {
    const fake = new FakeSupabase();
    fake.failNext("quote_users", { code: "XX000", message: "boom" });

    await expect(checkSchema(fake.asClient())).rejects.toThrow("Schema check of quote_users.id failed: boom");
  });

  it("propagates unrelated function errors", async () => {
    const fake = new FakeSupabase();
    fake.failNext("rpc:mark_quotes_shown", { code: "XX000", message: "boom" });

    await expect(checkSchema(fake.asClient())).rejects.toThrow(
      "Schema check of function mark_quotes_shown failed: boom"
    );
  });
});

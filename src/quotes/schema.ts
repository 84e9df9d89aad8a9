/**
 * Schema check for the quote tables.
 *
 * Selects every expected column with a one-row query and calls every
 * expected function with arguments that touch no rows. Migrations are
 * additive, so a database created before the review-stats migration will
 * be missing the newer quote columns and mark_quotes_shown until it is
 * applied.
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { QUOTES_TABLE, USERS_TABLE } from "./store.ts";

// Postgres undefined_column / undefined_table / undefined_function
const UNDEFINED_COLUMN = "42703";
const UNDEFINED_TABLE = "42P01";
const UNDEFINED_FUNCTION = "42883";
// PostgREST schema cache misses
const TABLE_NOT_IN_CACHE = "PGRST205";
const FUNCTION_NOT_IN_CACHE = "PGRST202";

export interface ColumnSpec {
  name: string;
  /** Column definition for ALTER TABLE ... ADD COLUMN IF NOT EXISTS */
  definition: string;
}

export interface SchemaReport {
  table: string;
  exists: boolean;
  missingColumns: string[];
}

export interface FunctionReport {
  name: string;
  exists: boolean;
  /** Migration file that creates the function */
  migration: string;
}

export interface SchemaStatus {
  tables: SchemaReport[];
  functions: FunctionReport[];
}

interface FunctionSpec {
  name: string;
  migration: string;
  /** Arguments for a call that changes nothing */
  noopArgs: Record<string, unknown>;
}

export const EXPECTED_FUNCTIONS: FunctionSpec[] = [
  {
    name: "mark_quotes_shown",
    migration: "supabase/migrations/20261018093000_quote_review_stats.sql",
    noopArgs: { p_user_id: "", p_ids: [], p_times_shown: [], p_shown_at: new Date(0).toISOString() },
  },
];

export const EXPECTED_COLUMNS: Record<string, ColumnSpec[]> = {
  [USERS_TABLE]: [
    { name: "id", definition: "TEXT PRIMARY KEY" },
    { name: "username", definition: "TEXT" },
    { name: "display_name", definition: "TEXT" },
    { name: "digest_enabled", definition: "BOOLEAN NOT NULL DEFAULT TRUE" },
    { name: "daily_quote_enabled", definition: "BOOLEAN NOT NULL DEFAULT TRUE" },
    { name: "created_at", definition: "TIMESTAMPTZ NOT NULL DEFAULT NOW()" },
  ],
  [QUOTES_TABLE]: [
    { name: "id", definition: "BIGINT GENERATED ALWAYS AS IDENTITY PRIMARY KEY" },
    { name: "user_id", definition: `TEXT NOT NULL REFERENCES ${USERS_TABLE}(id) ON DELETE CASCADE` },
    { name: "text", definition: "TEXT NOT NULL" },
    { name: "url", definition: "TEXT" },
    { name: "source_title", definition: "TEXT" },
    { name: "source_author", definition: "TEXT" },
    { name: "source_domain", definition: "TEXT" },
    { name: "tags", definition: "TEXT" },
    { name: "is_favorite", definition: "BOOLEAN NOT NULL DEFAULT FALSE" },
    { name: "times_shown", definition: "INTEGER NOT NULL DEFAULT 0" },
    { name: "last_shown", definition: "TIMESTAMPTZ" },
    { name: "created_at", definition: "TIMESTAMPTZ NOT NULL DEFAULT NOW()" },
  ],
};

async function checkColumn(
  supabase: SupabaseClient,
  table: string,
  column: string
): Promise<"ok" | "missing_column" | "missing_table"> {
  const { error } = await supabase.from(table).select(column).limit(1);
  if (!error) return "ok";
  if (error.code === UNDEFINED_TABLE || error.code === TABLE_NOT_IN_CACHE) return "missing_table";
  if (error.code === UNDEFINED_COLUMN) return "missing_column";
  throw new Error(`Schema check of ${table}.${column} failed: ${error.message}`, { cause: error });
}

async function checkFunction(supabase: SupabaseClient, fn: FunctionSpec): Promise<FunctionReport> {
  const { error } = await supabase.rpc(fn.name, fn.noopArgs);
  if (error && error.code !== FUNCTION_NOT_IN_CACHE && error.code !== UNDEFINED_FUNCTION) {
    throw new Error(`Schema check of function ${fn.name} failed: ${error.message}`, { cause: error });
  }
  return { name: fn.name, exists: !error, migration: fn.migration };
}

export async function checkSchema(supabase: SupabaseClient): Promise<SchemaStatus> {
  const tables: SchemaReport[] = [];

  for (const [table, columns] of Object.entries(EXPECTED_COLUMNS)) {
    const missingColumns: string[] = [];
    let exists = true;

    for (const column of columns) {
      const status = await checkColumn(supabase, table, column.name);
      if (status === "missing_table") {
        exists = false;
        break;
      }
      if (status === "missing_column") missingColumns.push(column.name);
    }

    tables.push({
      table,
      exists,
      missingColumns: exists ? missingColumns : columns.map((c) => c.name),
    });
  }

  const functions: FunctionReport[] = [];
  for (const fn of EXPECTED_FUNCTIONS) {
    functions.push(await checkFunction(supabase, fn));
  }

  return { tables, functions };
}

export function isSchemaComplete(status: SchemaStatus): boolean {
  return (
    status.tables.every((r) => r.exists && r.missingColumns.length === 0) &&
    status.functions.every((f) => f.exists)
  );
}

/** Migration files that create functions the database lacks */
export function missingFunctionMigrations(status: SchemaStatus): string[] {
  return [...new Set(status.functions.filter((f) => !f.exists).map((f) => f.migration))];
}

/**
 * Additive statements that bring an existing table up to date.
 * Tables that do not exist need the full migration instead.
 */
export function missingColumnStatements(status: SchemaStatus): string[] {
  return status.tables
    .filter((r) => r.exists)
    .flatMap((r) =>
      r.missingColumns.map((name) => {
        const spec = EXPECTED_COLUMNS[r.table]?.find((c) => c.name === name);
        return `ALTER TABLE ${r.table} ADD COLUMN IF NOT EXISTS ${name} ${spec?.definition ?? "TEXT"};`;
      })
    );
}

/**
 * In-process stand-in for the Supabase client.
 *
 * Implements the PostgREST query-builder subset QuoteStore uses (select,
 * insert, update, delete, eq, gte, ilike, is-null, not-is-null, order, limit,
 * single, maybeSingle) over plain arrays, plus the mark_quotes_shown RPC.
 */

import type { SupabaseClient } from "@supabase/supabase-js";

export type Row = Record<string, unknown>;

export interface FakeError {
  message: string;
  code: string;
}

export interface FakeResult {
  data: unknown;
  error: FakeError | null;
  count: number | null;
  status: number;
}

type Filter = (row: Row) => boolean;

export const DEFAULT_COLUMNS: Record<string, string[]> = {
  quote_users: ["id", "username", "display_name", "digest_enabled", "daily_quote_enabled", "created_at"],
  quotes: [
    "id",
    "user_id",
    "text",
    "url",
    "source_title",
    "source_author",
    "source_domain",
    "tags",
    "is_favorite",
    "times_shown",
    "last_shown",
    "created_at",
  ],
};

function ok(data: unknown, count: number | null = null): FakeResult {
  return { data, error: null, count, status: 200 };
}

function fail(code: string, message: string): FakeResult {
  return { data: null, error: { code, message }, count: null, status: 400 };
}

function compare(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === null || a === undefined) return 1;
  if (b === null || b === undefined) return -1;
  if (typeof a === "number" && typeof b === "number") return a - b;
  return String(a) < String(b) ? -1 : 1;
}

/**
 * Translate a LIKE pattern (with backslash escapes) into a RegExp.
 * PostgREST reads an unescaped `*` as `%`.
 */
function likeToRegExp(pattern: string): RegExp {
  let source = "";
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char === "\\" && i + 1 < pattern.length) {
      source += pattern[i + 1].replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
      i++;
    } else if (char === "%" || char === "*") {
      source += "[\\s\\S]*";
    } else if (char === "_") {
      source += "[\\s\\S]";
    } else {
      source += char.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    }
  }
  return new RegExp(`^${source}$`, "i");
}

class FakeQueryBuilder implements PromiseLike<FakeResult> {
  private mode: "select" | "insert" | "update" | "delete" = "select";
  private payload: Row[] = [];
  private patch: Row = {};
  private projection: string | null = null;
  private returnRows = false;
  private countRequested = false;
  private head = false;
  private filters: Filter[] = [];
  private orders: Array<{ column: string; ascending: boolean }> = [];
  private limitCount: number | null = null;
  private singleMode: "single" | "maybeSingle" | null = null;
  private referencedColumns: string[] = [];

  constructor(
    private readonly db: FakeSupabase,
    private readonly table: string
  ) {}

  select(columns = "*", options?: { count?: "exact"; head?: boolean }): this {
    this.projection = columns;
    this.returnRows = true;
    if (options?.count) this.countRequested = true;
    if (options?.head) this.head = true;
    return this;
  }

  insert(rows: Row | Row[]): this {
    this.mode = "insert";
    this.payload = Array.isArray(rows) ? rows : [rows];
    return this;
  }

  update(patch: Row): this {
    this.mode = "update";
    this.patch = patch;
    this.referencedColumns.push(...Object.keys(patch));
    return this;
  }

  delete(options?: { count?: "exact" }): this {
    this.mode = "delete";
    if (options?.count) this.countRequested = true;
    return this;
  }

  eq(column: string, value: unknown): this {
    this.referencedColumns.push(column);
    this.filters.push((row) => row[column] === value);
    return this;
  }

  gte(column: string, value: unknown): this {
    this.referencedColumns.push(column);
    this.filters.push((row) => row[column] !== null && row[column] !== undefined && compare(row[column], value) >= 0);
    return this;
  }

  ilike(column: string, pattern: string): this {
    this.referencedColumns.push(column);
    const re = likeToRegExp(pattern);
    this.filters.push((row) => typeof row[column] === "string" && re.test(String(row[column])));
    return this;
  }

  is(column: string, value: null): this {
    this.referencedColumns.push(column);
    this.filters.push((row) => (row[column] ?? null) === value);
    return this;
  }

  not(column: string, operator: "is", value: null): this {
    this.referencedColumns.push(column);
    this.filters.push((row) => row[column] !== value && row[column] !== undefined);
    return this;
  }

  order(column: string, options?: { ascending?: boolean }): this {
    this.orders.push({ column, ascending: options?.ascending ?? true });
    return this;
  }

  limit(count: number): this {
    this.limitCount = count;
    return this;
  }

  single(): this {
    this.singleMode = "single";
    return this;
  }

  maybeSingle(): this {
    this.singleMode = "maybeSingle";
    return this;
  }

  then<TResult1 = FakeResult, TResult2 = never>(
    onfulfilled?: ((value: FakeResult) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): PromiseLike<TResult1 | TResult2> {
    return Promise.resolve()
      .then(() => this.execute())
      .then(onfulfilled, onrejected);
  }

  private execute(): FakeResult {
    this.db.calls.push({ table: this.table, mode: this.mode });
    this.db.beforeExecute?.(this.table, this.mode);

    const injected = this.db.takeFailure(this.table);
    if (injected) return fail(injected.code, injected.message);

    const columns = this.db.columnsOf(this.table);
    if (!columns) return fail("42P01", `relation "${this.table}" does not exist`);

    const projected = this.projectionColumns();
    for (const column of [...projected, ...this.referencedColumns]) {
      if (!columns.includes(column)) {
        return fail("42703", `column ${this.table}.${column} does not exist`);
      }
    }

    const table = this.db.rows(this.table);
    let rows: Row[];
    let count: number | null = null;

    switch (this.mode) {
      case "insert": {
        rows = [];
        for (const input of this.payload) {
          const row: Row = { ...input };
          if (row.id === undefined) row.id = this.db.nextId(this.table);
          if (table.some((existing) => existing.id === row.id)) {
            return fail("23505", `duplicate key value violates unique constraint "${this.table}_pkey"`);
          }
          table.push(row);
          rows.push(row);
        }
        break;
      }
      case "update": {
        rows = table.filter((row) => this.filters.every((f) => f(row)));
        for (const row of rows) Object.assign(row, this.patch);
        break;
      }
      case "delete": {
        const removed = table.filter((row) => this.filters.every((f) => f(row)));
        this.db.setRows(this.table, table.filter((row) => !removed.includes(row)));
        if (this.countRequested) count = removed.length;
        rows = removed;
        break;
      }
      default: {
        rows = table.filter((row) => this.filters.every((f) => f(row)));
        if (this.countRequested) count = rows.length;
        for (const { column, ascending } of [...this.orders].reverse()) {
          rows = [...rows].sort((a, b) => (ascending ? 1 : -1) * compare(a[column], b[column]));
        }
        if (this.limitCount !== null) rows = rows.slice(0, this.limitCount);
      }
    }

    if (!this.returnRows || this.head) return ok(null, count);

    const data = rows.map((row) => this.project(row));
    if (this.singleMode === "single") {
      return data.length === 1
        ? ok(data[0], count)
        : fail("PGRST116", `JSON object requested, multiple (or no) rows returned (${data.length})`);
    }
    if (this.singleMode === "maybeSingle") {
      if (data.length > 1) return fail("PGRST116", "multiple rows returned");
      return ok(data[0] ?? null, count);
    }
    return ok(data, count);
  }

  private projectionColumns(): string[] {
    if (!this.projection || this.projection.trim() === "*") return [];
    return this.projection.split(",").map((c) => c.trim()).filter(Boolean);
  }

  private project(row: Row): Row {
    const columns = this.projectionColumns();
    const source = structuredClone(row);
    if (columns.length === 0) return source;
    return Object.fromEntries(columns.map((c) => [c, source[c] ?? null]));
  }
}

export class FakeSupabase {
  readonly calls: Array<{ table: string; mode: string }> = [];
  readonly rpcCalls: Array<{ name: string; params: Row }> = [];
  /** Runs before each RPC; tests use it to simulate a concurrent writer */
  beforeRpc: ((name: string, params: Row) => void) | null = null;
  /** Runs before each table query */
  beforeExecute: ((table: string, mode: string) => void) | null = null;

  private readonly tables = new Map<string, Row[]>();
  private readonly sequences = new Map<string, number>();
  private readonly failures = new Map<string, FakeError[]>();
  private readonly columns: Record<string, string[]>;
  private readonly functions: string[];

  constructor(options: { columns?: Record<string, string[]>; functions?: string[] } = {}) {
    this.columns = options.columns ?? DEFAULT_COLUMNS;
    this.functions = options.functions ?? ["mark_quotes_shown"];
  }

  columnsOf(table: string): string[] | undefined {
    return this.columns[table];
  }

  from(table: string): FakeQueryBuilder {
    return new FakeQueryBuilder(this, table);
  }

  async rpc(name: string, params: Row): Promise<FakeResult> {
    this.rpcCalls.push({ name, params });
    this.beforeRpc?.(name, params);

    const injected = this.takeFailure(`rpc:${name}`);
    if (injected) return fail(injected.code, injected.message);

    if (!this.functions.includes(name)) {
      return fail("PGRST202", `Could not find the function public.${name}`);
    }
    if (name === "mark_quotes_shown") return this.markQuotesShown(params);
    return fail("PGRST202", `Could not find the function public.${name}`);
  }

  /** Typed view for code under test */
  asClient(): SupabaseClient {
    return this as unknown as SupabaseClient;
  }

  /** Make the next query against `target` (table name or `rpc:<name>`) fail */
  failNext(target: string, error: FakeError): void {
    const queue = this.failures.get(target) ?? [];
    queue.push(error);
    this.failures.set(target, queue);
  }

  takeFailure(target: string): FakeError | undefined {
    return this.failures.get(target)?.shift();
  }

  rows(table: string): Row[] {
    let rows = this.tables.get(table);
    if (!rows) {
      rows = [];
      this.tables.set(table, rows);
    }
    return rows;
  }

  setRows(table: string, rows: Row[]): void {
    this.tables.set(table, rows);
  }

  nextId(table: string): number {
    const next = (this.sequences.get(table) ?? 0) + 1;
    this.sequences.set(table, next);
    return next;
  }

  /** Same contract as the SQL function: all rows or none */
  private markQuotesShown(params: Row): FakeResult {
    const ids = Array.isArray(params.p_ids) ? params.p_ids : [];
    const expected = Array.isArray(params.p_times_shown) ? params.p_times_shown : [];
    const quotes = this.rows("quotes");

    const targets = ids.map((id, i) =>
      quotes.find(
        (row) => row.id === id && row.user_id === params.p_user_id && row.times_shown === expected[i]
      )
    );

    if (targets.some((row) => row === undefined)) {
      return fail("40001", "quote stats changed concurrently");
    }

    const updated: Row[] = [];
    for (const row of targets) {
      if (!row) continue;
      row.times_shown = Number(row.times_shown) + 1;
      row.last_shown = params.p_shown_at;
      updated.push(structuredClone(row));
    }
    return ok(updated);
  }
}

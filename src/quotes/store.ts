/**
 * Quote Store
 *
 * Durable per-user quote collection backed by Supabase. Every query is
 * scoped by the owning user id; a quote saved by one user is invisible to
 * every other user.
 *
 * Rows are validated and mapped into Quote/QuoteUser records here, once.
 * Anything the database reports as an error is rethrown as StoreError.
 *
 * Usage:
 *   const store = new QuoteStore(createClient(url, key));
 *   const id = await store.saveQuote(userId, { text: "Be the change", tags: ["wisdom"] });
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { StoreError, queryFailed } from "./errors.ts";
import { rankForReview, shuffle, type RandomSource } from "./review.ts";
import type {
  ExportedQuote,
  NewQuote,
  Quote,
  QuoteUser,
  TagCount,
  UserPreference,
} from "./types.ts";

export const QUOTES_TABLE = "quotes";
export const USERS_TABLE = "quote_users";

const SEARCH_LIMIT = 10;
const TAG_SEPARATOR = ",";
const MAX_CLAIM_ATTEMPTS = 3;
// PostgreSQL serialization_failure, raised by mark_quotes_shown on a lost race
const SERIALIZATION_FAILURE = "40001";
const UNIQUE_VIOLATION = "23505";

const PREFERENCE_COLUMNS: Record<UserPreference, "digest_enabled" | "daily_quote_enabled"> = {
  digest: "digest_enabled",
  daily_quote: "daily_quote_enabled",
};

// ============================================================
// ROW SCHEMAS
// ============================================================

const quoteRowSchema = z.object({
  id: z.number().int(),
  user_id: z.string(),
  text: z.string(),
  url: z.string().nullable(),
  source_title: z.string().nullable(),
  source_author: z.string().nullable(),
  source_domain: z.string().nullable(),
  tags: z.string().nullable(),
  is_favorite: z.boolean().nullable(),
  times_shown: z.number().int().nullable(),
  last_shown: z.string().nullable(),
  created_at: z.string(),
});

const userRowSchema = z.object({
  id: z.string(),
  username: z.string().nullable(),
  display_name: z.string().nullable(),
  digest_enabled: z.boolean(),
  daily_quote_enabled: z.boolean(),
  created_at: z.string(),
});

const candidateRowSchema = z.object({
  id: z.number().int(),
  times_shown: z.number().int().nullable(),
  last_shown: z.string().nullable(),
});

const tagsRowSchema = z.object({ tags: z.string().nullable() });
const favoriteRowSchema = z.object({ is_favorite: z.boolean().nullable() });
const idRowSchema = z.object({ id: z.union([z.number(), z.string()]) });

type QuoteRow = z.infer<typeof quoteRowSchema>;
type UserRow = z.infer<typeof userRowSchema>;

export function serializeTags(tags: readonly string[] | undefined): string | null {
  const unique = [...new Set((tags ?? []).map((t) => t.trim()).filter(Boolean))];
  return unique.length > 0 ? unique.join(TAG_SEPARATOR) : null;
}

export function deserializeTags(tags: string | null): string[] {
  if (!tags) return [];
  return tags
    .split(TAG_SEPARATOR)
    .map((t) => t.trim())
    .filter(Boolean);
}

/**
 * Escape LIKE metacharacters so user input matches literally.
 *
 * PostgREST turns every `*` in a like value into `%`, escaped or not, so
 * `*` becomes the single-character wildcard `_` instead. The pattern then
 * matches a superset and callers must filter the rows again.
 */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_*]/g, (c) => (c === "*" ? "_" : `\\${c}`));
}

function toQuote(row: QuoteRow): Quote {
  return {
    id: row.id,
    userId: row.user_id,
    text: row.text,
    url: row.url,
    title: row.source_title,
    author: row.source_author,
    domain: row.source_domain,
    tags: deserializeTags(row.tags),
    isFavorite: row.is_favorite ?? false,
    timesShown: row.times_shown ?? 0,
    lastShown: row.last_shown ? new Date(row.last_shown) : null,
    createdAt: new Date(row.created_at),
  };
}

function toUser(row: UserRow): QuoteUser {
  return {
    id: row.id,
    username: row.username,
    displayName: row.display_name,
    digestEnabled: row.digest_enabled,
    dailyQuoteEnabled: row.daily_quote_enabled,
    createdAt: new Date(row.created_at),
  };
}

function toExported(quote: Quote): ExportedQuote {
  return {
    id: quote.id,
    text: quote.text,
    url: quote.url,
    title: quote.title,
    author: quote.author,
    domain: quote.domain,
    tags: quote.tags,
    isFavorite: quote.isFavorite,
    timesShown: quote.timesShown,
    lastShown: quote.lastShown ? quote.lastShown.toISOString() : null,
    createdAt: quote.createdAt.toISOString(),
  };
}

function parseRows<T>(operation: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T[] {
  const result = z.array(schema).safeParse(data ?? []);
  if (!result.success) {
    throw new StoreError(operation, "query_failed", "unexpected row shape", result.error);
  }
  return result.data;
}

function parseRow<T>(operation: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T | null {
  if (data === null || data === undefined) return null;
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new StoreError(operation, "query_failed", "unexpected row shape", result.error);
  }
  return result.data;
}

// ============================================================
// QUOTE STORE
// ============================================================

export interface QuoteStoreOptions {
  /** Clock used for created_at, last_shown and time windows */
  now?: () => Date;
  /** Random source for tie-breaking in sampleQuotes */
  random?: RandomSource;
}

export class QuoteStore {
  private readonly now: () => Date;
  private readonly random: RandomSource;

  constructor(
    private readonly supabase: SupabaseClient,
    options: QuoteStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.random = options.random ?? Math.random;
  }

  // ----------------------------------------------------------
  // Quotes
  // ----------------------------------------------------------

  async saveQuote(userId: string, quote: NewQuote): Promise<number> {
    const text = quote.text.trim();
    if (!text) {
      throw new StoreError("saveQuote", "invalid_input", "quote text is empty");
    }

    const { data, error } = await this.supabase
      .from(QUOTES_TABLE)
      .insert({
        user_id: userId,
        text,
        url: quote.url ?? null,
        source_title: quote.title ?? null,
        source_author: quote.author ?? null,
        source_domain: quote.domain ?? null,
        tags: serializeTags(quote.tags),
        is_favorite: false,
        times_shown: 0,
        last_shown: null,
        created_at: this.now().toISOString(),
      })
      .select("id")
      .single();

    if (error) throw queryFailed("saveQuote", error);

    const row = parseRow("saveQuote", idRowSchema, data);
    if (!row) {
      throw new StoreError("saveQuote", "query_failed", "insert returned no row");
    }
    return Number(row.id);
  }

  async deleteQuote(userId: string, quoteId: number): Promise<boolean> {
    const { error, count } = await this.supabase
      .from(QUOTES_TABLE)
      .delete({ count: "exact" })
      .eq("id", quoteId)
      .eq("user_id", userId);

    if (error) throw queryFailed("deleteQuote", error);
    return (count ?? 0) > 0;
  }

  async getQuote(userId: string, quoteId: number): Promise<Quote | null> {
    const { data, error } = await this.supabase
      .from(QUOTES_TABLE)
      .select("*")
      .eq("id", quoteId)
      .eq("user_id", userId)
      .maybeSingle();

    if (error) throw queryFailed("getQuote", error);
    const row = parseRow("getQuote", quoteRowSchema, data);
    return row ? toQuote(row) : null;
  }

  /**
   * Pick up to `n` quotes and mark them shown.
   *
   * With weighting the spaced-repetition ranking decides; without it the
   * pick is uniform. Ranking and marking form one compare-and-set step in
   * mark_quotes_shown, so two concurrent samples for the same user cannot
   * both count the same view.
   */
  async sampleQuotes(userId: string, n: number, useWeighting = true): Promise<Quote[]> {
    if (n <= 0) return [];

    for (let attempt = 1; attempt <= MAX_CLAIM_ATTEMPTS; attempt++) {
      const { data, error } = await this.supabase
        .from(QUOTES_TABLE)
        .select("id, times_shown, last_shown")
        .eq("user_id", userId);

      if (error) throw queryFailed("sampleQuotes", error);

      const now = this.now();
      const candidates = parseRows("sampleQuotes", candidateRowSchema, data).map((row) => ({
        id: row.id,
        timesShown: row.times_shown ?? 0,
        lastShown: row.last_shown ? new Date(row.last_shown) : null,
      }));

      const ordered = useWeighting
        ? rankForReview(candidates, now, this.random)
        : shuffle(candidates, this.random);
      const picked = ordered.slice(0, n);
      if (picked.length === 0) return [];

      const claim = await this.supabase.rpc("mark_quotes_shown", {
        p_user_id: userId,
        p_ids: picked.map((c) => c.id),
        p_times_shown: picked.map((c) => c.timesShown),
        p_shown_at: now.toISOString(),
      });

      if (claim.error) {
        if (claim.error.code === SERIALIZATION_FAILURE) {
          console.warn(`[QuoteStore] sampleQuotes lost a race for user ${userId} (attempt ${attempt}/${MAX_CLAIM_ATTEMPTS})`);
          continue;
        }
        throw queryFailed("sampleQuotes", claim.error);
      }

      const byId = new Map(
        parseRows("sampleQuotes", quoteRowSchema, claim.data).map((row) => [row.id, toQuote(row)])
      );
      return picked.flatMap((c) => {
        const quote = byId.get(c.id);
        return quote ? [quote] : [];
      });
    }

    throw new StoreError(
      "sampleQuotes",
      "contention",
      `could not claim quotes after ${MAX_CLAIM_ATTEMPTS} attempts`
    );
  }

  async recentQuotes(userId: string, n: number): Promise<Quote[]> {
    if (n <= 0) return [];

    const { data, error } = await this.supabase
      .from(QUOTES_TABLE)
      .select("*")
      .eq("user_id", userId)
      .order("created_at", { ascending: false })
      .order("id", { ascending: false })
      .limit(n);

    if (error) throw queryFailed("recentQuotes", error);
    return parseRows("recentQuotes", quoteRowSchema, data).map(toQuote);
  }

  async countQuotes(userId: string): Promise<number> {
    const { error, count } = await this.supabase
      .from(QUOTES_TABLE)
      .select("id", { count: "exact", head: true })
      .eq("user_id", userId);

    if (error) throw queryFailed("countQuotes", error);
    return count ?? 0;
  }

  async countQuotesThisWeek(userId: string): Promise<number> {
    const weekAgo = new Date(this.now().getTime() - 7 * 24 * 60 * 60 * 1000);

    const { error, count } = await this.supabase
      .from(QUOTES_TABLE)
      .select("id", { count: "exact", head: true })
      .eq("user_id", userId)
      .gte("created_at", weekAgo.toISOString());

    if (error) throw queryFailed("countQuotesThisWeek", error);
    return count ?? 0;
  }

  searchQuotes(userId: string, keyword: string): Promise<Quote[]> {
    return this.substringSearch("searchQuotes", userId, "text", keyword);
  }

  quotesByTag(userId: string, tag: string): Promise<Quote[]> {
    return this.substringSearch("quotesByTag", userId, "tags", tag);
  }

  quotesBySource(userId: string, domain: string): Promise<Quote[]> {
    return this.substringSearch("quotesBySource", userId, "source_domain", domain);
  }

  /**
   * Flip the favorite flag. The update only applies while the flag still
   * holds the value just read, so two concurrent toggles flip it twice
   * instead of both writing the same value.
   */
  async toggleFavorite(userId: string, quoteId: number): Promise<boolean | null> {
    for (let attempt = 1; attempt <= MAX_CLAIM_ATTEMPTS; attempt++) {
      const current = await this.supabase
        .from(QUOTES_TABLE)
        .select("is_favorite")
        .eq("id", quoteId)
        .eq("user_id", userId)
        .maybeSingle();

      if (current.error) throw queryFailed("toggleFavorite", current.error);
      const row = parseRow("toggleFavorite", favoriteRowSchema, current.data);
      if (!row) return null;

      const update = this.supabase
        .from(QUOTES_TABLE)
        .update({ is_favorite: !row.is_favorite })
        .eq("id", quoteId)
        .eq("user_id", userId);
      const guarded =
        row.is_favorite === null ? update.is("is_favorite", null) : update.eq("is_favorite", row.is_favorite);

      const { data, error } = await guarded.select("is_favorite").maybeSingle();
      if (error) throw queryFailed("toggleFavorite", error);

      const updated = parseRow("toggleFavorite", favoriteRowSchema, data);
      if (updated) return updated.is_favorite ?? false;

      console.warn(`[QuoteStore] toggleFavorite lost a race on quote ${quoteId} (attempt ${attempt}/${MAX_CLAIM_ATTEMPTS})`);
    }

    throw new StoreError(
      "toggleFavorite",
      "contention",
      `could not toggle favorite after ${MAX_CLAIM_ATTEMPTS} attempts`
    );
  }

  async favoriteQuotes(userId: string): Promise<Quote[]> {
    const { data, error } = await this.supabase
      .from(QUOTES_TABLE)
      .select("*")
      .eq("user_id", userId)
      .eq("is_favorite", true)
      .order("created_at", { ascending: false })
      .order("id", { ascending: false });

    if (error) throw queryFailed("favoriteQuotes", error);
    return parseRows("favoriteQuotes", quoteRowSchema, data).map(toQuote);
  }

  /**
   * Most used tags, by number of quotes carrying them.
   * Equal counts keep first-seen order (oldest quote first).
   */
  async topTags(userId: string, limit = 5): Promise<TagCount[]> {
    if (limit <= 0) return [];

    const { data, error } = await this.supabase
      .from(QUOTES_TABLE)
      .select("tags")
      .eq("user_id", userId)
      .not("tags", "is", null)
      .order("created_at", { ascending: true })
      .order("id", { ascending: true });

    if (error) throw queryFailed("topTags", error);

    const counts = new Map<string, number>();
    for (const row of parseRows("topTags", tagsRowSchema, data)) {
      for (const tag of new Set(deserializeTags(row.tags))) {
        counts.set(tag, (counts.get(tag) ?? 0) + 1);
      }
    }

    // Array#sort is stable, so ties stay in Map insertion order
    return [...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, limit);
  }

  async isDuplicate(userId: string, text: string, windowMinutes = 1): Promise<boolean> {
    const trimmed = text.trim();
    if (!trimmed) return false;

    const cutoff = new Date(this.now().getTime() - windowMinutes * 60 * 1000);
    const { error, count } = await this.supabase
      .from(QUOTES_TABLE)
      .select("id", { count: "exact", head: true })
      .eq("user_id", userId)
      .eq("text", trimmed)
      .gte("created_at", cutoff.toISOString());

    if (error) throw queryFailed("isDuplicate", error);
    return (count ?? 0) > 0;
  }

  /**
   * All of the user's quotes as a JSON array, newest first.
   */
  async exportQuotes(userId: string): Promise<string> {
    const { data, error } = await this.supabase
      .from(QUOTES_TABLE)
      .select("*")
      .eq("user_id", userId)
      .order("created_at", { ascending: false })
      .order("id", { ascending: false });

    if (error) throw queryFailed("exportQuotes", error);

    const quotes = parseRows("exportQuotes", quoteRowSchema, data).map(toQuote);
    return JSON.stringify(quotes.map(toExported), null, 2);
  }

  // ----------------------------------------------------------
  // Users
  // ----------------------------------------------------------

  /**
   * Create the user, or refresh their names. Returns true only on creation.
   */
  async registerUser(
    userId: string,
    username?: string | null,
    displayName?: string | null
  ): Promise<boolean> {
    const existing = await this.supabase
      .from(USERS_TABLE)
      .select("id")
      .eq("id", userId)
      .maybeSingle();

    if (existing.error) throw queryFailed("registerUser", existing.error);

    if (!existing.data) {
      const { error } = await this.supabase.from(USERS_TABLE).insert({
        id: userId,
        username: username ?? null,
        display_name: displayName ?? null,
        digest_enabled: true,
        daily_quote_enabled: true,
        created_at: this.now().toISOString(),
      });

      if (!error) return true;
      // Created concurrently between the lookup and the insert
      if (error.code !== UNIQUE_VIOLATION) throw queryFailed("registerUser", error);
    }

    const { error } = await this.supabase
      .from(USERS_TABLE)
      .update({ username: username ?? null, display_name: displayName ?? null })
      .eq("id", userId);

    if (error) throw queryFailed("registerUser", error);
    return false;
  }

  async getUser(userId: string): Promise<QuoteUser | null> {
    const { data, error } = await this.supabase
      .from(USERS_TABLE)
      .select("*")
      .eq("id", userId)
      .maybeSingle();

    if (error) throw queryFailed("getUser", error);
    const row = parseRow("getUser", userRowSchema, data);
    return row ? toUser(row) : null;
  }

  async allUsers(): Promise<QuoteUser[]> {
    const { data, error } = await this.supabase
      .from(USERS_TABLE)
      .select("*")
      .order("created_at", { ascending: true });

    if (error) throw queryFailed("allUsers", error);
    return parseRows("allUsers", userRowSchema, data).map(toUser);
  }

  async usersWith(preference: UserPreference): Promise<QuoteUser[]> {
    const { data, error } = await this.supabase
      .from(USERS_TABLE)
      .select("*")
      .eq(PREFERENCE_COLUMNS[preference], true)
      .order("created_at", { ascending: true });

    if (error) throw queryFailed("usersWith", error);
    return parseRows("usersWith", userRowSchema, data).map(toUser);
  }

  async setPreference(
    userId: string,
    preference: UserPreference,
    enabled: boolean
  ): Promise<QuoteUser | null> {
    const { data, error } = await this.supabase
      .from(USERS_TABLE)
      .update({ [PREFERENCE_COLUMNS[preference]]: enabled })
      .eq("id", userId)
      .select("*")
      .maybeSingle();

    if (error) throw queryFailed("setPreference", error);
    const row = parseRow("setPreference", userRowSchema, data);
    return row ? toUser(row) : null;
  }

  // ----------------------------------------------------------
  // Helpers
  // ----------------------------------------------------------

  private async substringSearch(
    operation: string,
    userId: string,
    column: "text" | "tags" | "source_domain",
    term: string
  ): Promise<Quote[]> {
    const needle = term.trim();
    if (!needle) return [];

    let query = this.supabase
      .from(QUOTES_TABLE)
      .select("*")
      .eq("user_id", userId)
      .ilike(column, `%${escapeLike(needle)}%`)
      .order("created_at", { ascending: false })
      .order("id", { ascending: false });

    // A `*` in the term widens the pattern (see escapeLike), so the limit
    // has to wait until the literal check below
    const widened = needle.includes("*");
    if (!widened) query = query.limit(SEARCH_LIMIT);

    const { data, error } = await query;
    if (error) throw queryFailed(operation, error);

    const rows = parseRows(operation, quoteRowSchema, data);
    if (!widened) return rows.map(toQuote);

    const lowered = needle.toLowerCase();
    return rows
      .filter((row) => row[column]?.toLowerCase().includes(lowered))
      .slice(0, SEARCH_LIMIT)
      .map(toQuote);
  }
}

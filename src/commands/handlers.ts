/**
 * Quote Commands
 *
 * Reply logic for every slash command and for plain-text saving, kept apart
 * from grammy so it can be tested without a bot. Each method takes the
 * sender's user id plus the raw argument text and returns what to send back.
 *
 * Storage failures become a generic reply here; anything else propagates
 * to the bot's error handler.
 */

import type { Config } from "../config.ts";
import { composeDigest } from "../digest/jobs.ts";
import { isStoreError } from "../quotes/errors.ts";
import { formatQuote, formatQuoteList, formatTags, truncate } from "../quotes/format.ts";
import { parseMessage } from "../quotes/parser.ts";
import type { QuoteStore } from "../quotes/store.ts";
import type { ArticleMetadata } from "../metadata/types.ts";
import {
  DELETE_USAGE,
  FAV_USAGE,
  SEARCH_USAGE,
  SOURCE_USAGE,
  SUBSCRIBE_USAGE,
  UNSUBSCRIBE_USAGE,
  formatParseError,
  parseCount,
  parseQuoteId,
  parsePreference,
  parseTagName,
  parseTerm,
} from "../utils/command-parser.ts";
import type { UserPreference } from "../quotes/types.ts";

// ============================================================
// TYPES
// ============================================================

export interface DocumentReply {
  filename: string;
  content: string;
  caption: string;
}

export type CommandReply = string | DocumentReply;

export interface QuoteCommandsDeps {
  store: QuoteStore;
  fetchMetadata: (url: string) => Promise<ArticleMetadata>;
  schedule: Pick<Config, "digest" | "dailyQuote">;
}

// ============================================================
// REPLY TEXT
// ============================================================

export const HELP_TEXT = `Welcome to Quote Keeper!

Send me quotes to save them. You can include:
- Just the quote text
- Quote + URL (I'll fetch the article title)
- #tags to categorize

Example:
"The best time to plant a tree was 20 years ago" https://example.com #wisdom

Commands:
/random - Get a random quote
/last [n] - Show recently saved quotes
/digest - Get your digest now
/stats - View your statistics

Search:
/search <word> - Search in quotes
/tag <name> - Find by tag
/source <domain> - Find by source

Manage:
/fav <id> - Toggle favorite
/favorites - Show all favorites
/delete <id> - Delete a quote
/export - Export all quotes as JSON

Delivery:
/settings - Show digest and daily quote settings
/subscribe <digest|daily> - Turn a delivery on
/unsubscribe <digest|daily> - Turn a delivery off`;

export const GENERIC_FAILURE = "Something went wrong while talking to the database. Please try again later.";
export const NO_QUOTES = "No quotes saved yet. Send me some!";
export const NO_QUOTE_FOUND = "I couldn't find a quote in your message. Send me some text to save!";
export const ALREADY_SAVED = "This quote was already saved recently.";

const SEARCH_PREVIEW = 5;
const FAVORITES_PREVIEW = 10;
const LAST_DEFAULT = 5;
const LAST_MAX = 10;

const PREFERENCE_LABELS: Record<UserPreference, string> = {
  digest: "the weekly digest",
  daily_quote: "the daily quote",
};

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

// ============================================================
// COMMANDS
// ============================================================

export class QuoteCommands {
  constructor(private readonly deps: QuoteCommandsDeps) {}

  help(): string {
    return HELP_TEXT;
  }

  stats(userId: string): Promise<CommandReply> {
    return this.guard("stats", async () => {
      const { store } = this.deps;
      const total = await store.countQuotes(userId);
      const thisWeek = await store.countQuotesThisWeek(userId);
      const favorites = (await store.favoriteQuotes(userId)).length;
      const topTags = await store.topTags(userId, 5);

      let text = `Your Quote Keeper Stats\n\nTotal quotes: ${total}\nAdded this week: ${thisWeek}\nFavorites: ${favorites}`;
      if (topTags.length > 0) {
        text += `\n\nTop tags:\n${topTags.map(([tag, count]) => `  #${tag}: ${count}`).join("\n")}`;
      }
      return text;
    });
  }

  random(userId: string): Promise<CommandReply> {
    return this.guard("random", async () => {
      const [quote] = await this.deps.store.sampleQuotes(userId, 1, true);
      return quote ? formatQuote(quote, { showId: true }) : NO_QUOTES;
    });
  }

  last(userId: string, args: string): Promise<CommandReply> {
    return this.guard("last", async () => {
      const n = parseCount(args, { defaultValue: LAST_DEFAULT, max: LAST_MAX }).data;
      const quotes = await this.deps.store.recentQuotes(userId, n);
      if (quotes.length === 0) return "No quotes saved yet.";
      return formatQuoteList(`Last ${quotes.length} quote(s):`, quotes);
    });
  }

  search(userId: string, args: string): Promise<CommandReply> {
    return this.guard("search", async () => {
      const parsed = parseTerm(args, SEARCH_USAGE);
      if (!parsed.success) return formatParseError(parsed);

      const keyword = parsed.data;
      const quotes = await this.deps.store.searchQuotes(userId, keyword);
      if (quotes.length === 0) return `No quotes found containing "${keyword}"`;
      return formatQuoteList(`Found ${quotes.length} quote(s) for "${keyword}":`, quotes.slice(0, SEARCH_PREVIEW));
    });
  }

  tag(userId: string, args: string): Promise<CommandReply> {
    return this.guard("tag", async () => {
      const parsed = parseTagName(args);
      if (!parsed.success) return formatParseError(parsed);

      const tag = parsed.data;
      const quotes = await this.deps.store.quotesByTag(userId, tag);
      if (quotes.length === 0) return `No quotes found with tag #${tag}`;
      return formatQuoteList(`Found ${quotes.length} quote(s) with #${tag}:`, quotes.slice(0, SEARCH_PREVIEW));
    });
  }

  source(userId: string, args: string): Promise<CommandReply> {
    return this.guard("source", async () => {
      const parsed = parseTerm(args, SOURCE_USAGE);
      if (!parsed.success) return formatParseError(parsed);

      const domain = parsed.data;
      const quotes = await this.deps.store.quotesBySource(userId, domain);
      if (quotes.length === 0) return `No quotes found from ${domain}`;
      return formatQuoteList(`Found ${quotes.length} quote(s) from ${domain}:`, quotes.slice(0, SEARCH_PREVIEW));
    });
  }

  fav(userId: string, args: string): Promise<CommandReply> {
    return this.guard("fav", async () => {
      const parsed = parseQuoteId(args, FAV_USAGE);
      if (!parsed.success) return formatParseError(parsed);

      const id = parsed.data;
      const result = await this.deps.store.toggleFavorite(userId, id);
      if (result === null) return `Quote #${id} not found.`;
      return `Quote #${id} ${result ? "added to" : "removed from"} favorites.`;
    });
  }

  favorites(userId: string): Promise<CommandReply> {
    return this.guard("favorites", async () => {
      const quotes = await this.deps.store.favoriteQuotes(userId);
      if (quotes.length === 0) return "No favorite quotes yet. Use /fav <id> to add some!";

      const list = formatQuoteList(`Your ${quotes.length} favorite quote(s):`, quotes.slice(0, FAVORITES_PREVIEW));
      const hidden = quotes.length - FAVORITES_PREVIEW;
      return hidden > 0 ? `${list}\n\n... and ${hidden} more` : list;
    });
  }

  delete(userId: string, args: string): Promise<CommandReply> {
    return this.guard("delete", async () => {
      const parsed = parseQuoteId(args, DELETE_USAGE);
      if (!parsed.success) return formatParseError(parsed);

      const id = parsed.data;
      const quote = await this.deps.store.getQuote(userId, id);
      if (!quote) return `Quote #${id} not found.`;

      if (!(await this.deps.store.deleteQuote(userId, id))) {
        return "Failed to delete quote.";
      }
      return `Deleted quote #${id}:\n"${truncate(quote.text, 50)}"`;
    });
  }

  export(userId: string): Promise<CommandReply> {
    return this.guard("export", async () => {
      const count = await this.deps.store.countQuotes(userId);
      if (count === 0) return "No quotes to export.";

      return {
        filename: "quotes.json",
        content: await this.deps.store.exportQuotes(userId),
        caption: `Exported ${count} quotes`,
      };
    });
  }

  digest(userId: string): Promise<CommandReply> {
    return this.guard("digest", async () => {
      const digest = await composeDigest(this.deps.store, userId, this.deps.schedule.digest.count);
      return digest.text;
    });
  }

  settings(userId: string): Promise<CommandReply> {
    return this.guard("settings", async () => {
      const user = await this.deps.store.getUser(userId);
      if (!user) return "You are not registered yet. Send /start first.";

      const { digest, dailyQuote } = this.deps.schedule;
      const describe = (subscribed: boolean, enabled: boolean, when: string) => {
        if (!enabled) return "disabled on this bot";
        return subscribed ? `on (${when})` : "off";
      };

      const digestWhen = `${digest.day} at ${pad(digest.time.hour)}:${pad(digest.time.minute)}, ${digest.count} quotes`;
      const dailyWhen = `every day at ${pad(dailyQuote.time.hour)}:${pad(dailyQuote.time.minute)}`;

      return [
        "Your settings",
        "",
        `Weekly digest: ${describe(user.digestEnabled, digest.enabled, digestWhen)}`,
        `Daily quote: ${describe(user.dailyQuoteEnabled, dailyQuote.enabled, dailyWhen)}`,
        "",
        "Use /subscribe or /unsubscribe with digest or daily to change.",
      ].join("\n");
    });
  }

  subscribe(userId: string, args: string): Promise<CommandReply> {
    return this.setSubscription("subscribe", userId, args, true);
  }

  unsubscribe(userId: string, args: string): Promise<CommandReply> {
    return this.setSubscription("unsubscribe", userId, args, false);
  }

  /**
   * Plain-text message: parse, skip recent duplicates, enrich from the URL,
   * then save and confirm.
   */
  save(userId: string, text: string): Promise<CommandReply> {
    return this.guard("save", async () => {
      const parsed = parseMessage(text);
      if (!parsed.quote) return NO_QUOTE_FOUND;

      const { store } = this.deps;
      if (await store.isDuplicate(userId, parsed.quote)) return ALREADY_SAVED;

      const metadata = parsed.url ? await this.deps.fetchMetadata(parsed.url) : null;
      const id = await store.saveQuote(userId, {
        text: parsed.quote,
        url: parsed.url,
        title: metadata?.title ?? null,
        author: metadata?.author ?? null,
        domain: metadata?.domain ?? null,
        tags: parsed.tags,
      });

      let reply = `Saved (#${id}): "${truncate(parsed.quote, 100)}"`;

      const title = metadata?.title ?? null;
      const domain = metadata?.domain ?? null;
      if (title || domain) {
        let source = title ?? domain ?? "";
        if (metadata?.author) {
          source += ` by ${metadata.author}`;
        } else if (title && domain) {
          source += ` (${domain})`;
        }
        reply += `\nFrom: ${source}`;
      }

      if (parsed.tags.length > 0) reply += `\nTags: ${formatTags(parsed.tags)}`;
      return reply;
    });
  }

  // ----------------------------------------------------------
  // Helpers
  // ----------------------------------------------------------

  private setSubscription(
    command: "subscribe" | "unsubscribe",
    userId: string,
    args: string,
    enabled: boolean
  ): Promise<CommandReply> {
    return this.guard(command, async () => {
      const parsed = parsePreference(args, enabled ? SUBSCRIBE_USAGE : UNSUBSCRIBE_USAGE);
      if (!parsed.success) return formatParseError(parsed);

      const user = await this.deps.store.setPreference(userId, parsed.data, enabled);
      if (!user) return "You are not registered yet. Send /start first.";

      const label = PREFERENCE_LABELS[parsed.data];
      return enabled ? `Subscribed to ${label}.` : `Unsubscribed from ${label}.`;
    });
  }

  private async guard(command: string, run: () => Promise<CommandReply>): Promise<CommandReply> {
    try {
      return await run();
    } catch (error) {
      if (!isStoreError(error)) throw error;
      console.error(`[Bot] ${command} failed:`, error);
      return GENERIC_FAILURE;
    }
  }
}

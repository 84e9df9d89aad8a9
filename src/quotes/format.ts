/**
 * Plain-text rendering of quotes for Telegram replies and digests.
 */

import type { Quote } from "./types.ts";

/** Telegram rejects messages over 4096 characters; keep a margin */
export const MAX_MESSAGE_LENGTH = 4000;

const ELLIPSIS = "...";

export function truncate(text: string, length: number): string {
  if (text.length <= length) return text;
  return text.slice(0, Math.max(0, length - ELLIPSIS.length)) + ELLIPSIS;
}

export function fitMessage(text: string, max = MAX_MESSAGE_LENGTH): string {
  return truncate(text, max);
}

export interface FormatOptions {
  showId?: boolean;
}

export function formatTags(tags: readonly string[]): string {
  return tags.map((t) => `#${t}`).join(" ");
}

/**
 * [#12] "text" *
 *   -- Title by Author
 *   https://example.com/post
 *   #tag #other
 */
export function formatQuote(quote: Quote, options: FormatOptions = {}): string {
  const prefix = options.showId ? `[#${quote.id}] ` : "";
  const star = quote.isFavorite ? " *" : "";
  let text = `${prefix}"${quote.text}"${star}`;

  const source: string[] = [];
  if (quote.title) source.push(quote.title);
  if (quote.author) {
    source.push(`by ${quote.author}`);
  } else if (quote.domain) {
    source.push(`(${quote.domain})`);
  }
  if (source.length > 0) text += `\n  -- ${source.join(" ")}`;

  if (quote.url) text += `\n  ${quote.url}`;
  if (quote.tags.length > 0) text += `\n  ${formatTags(quote.tags)}`;

  return text;
}

export function formatQuoteList(heading: string, quotes: readonly Quote[]): string {
  let text = `${heading}\n\n`;
  for (const quote of quotes) {
    text += `${formatQuote(quote, { showId: true })}\n\n`;
  }
  return fitMessage(text.trimEnd());
}

export const DIGEST_HEADING = "Your Weekly Quote Digest";
export const EMPTY_DIGEST = `${DIGEST_HEADING}\n\nNo quotes saved yet. Start sending me quotes to build your collection!`;

export function formatDigest(quotes: readonly Quote[], total: number): string {
  if (quotes.length === 0) return EMPTY_DIGEST;

  let text = `${DIGEST_HEADING}\n\n`;
  quotes.forEach((quote, i) => {
    text += `${i + 1}. ${formatQuote(quote)}\n\n`;
  });
  text += `Total saved: ${total} quotes`;

  return fitMessage(text);
}

export function formatDailyQuote(quote: Quote): string {
  return fitMessage(`Quote of the Day\n\n${formatQuote(quote)}`);
}

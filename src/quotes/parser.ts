/**
 * Message Parser
 *
 * Splits an incoming chat message into the quote text, an optional source
 * URL and optional #tags. Pure: no network or storage access, never throws.
 *
 * Examples:
 *   Be the change you wish to see
 *     → quote="Be the change you wish to see", url=null, tags=[]
 *
 *   "Be the change" https://example.com #wisdom
 *     → quote="Be the change", url="https://example.com", tags=["wisdom"]
 */

import type { ParsedMessage } from "./types.ts";
import {
  MAX_INPUT_LENGTH,
  MAX_QUOTE_LENGTH,
  MAX_TAGS,
  TAG_PATTERN,
  URL_CANDIDATE_PATTERN,
  validateTag,
  validateUrl,
} from "./validation.ts";

export function parseMessage(text: string | null | undefined): ParsedMessage {
  if (!text) {
    return { quote: "", url: null, tags: [] };
  }

  let input = text;
  if (input.length > MAX_INPUT_LENGTH) {
    console.warn(`[Parser] Input too long (${input.length} chars), truncating`);
    input = input.substring(0, MAX_INPUT_LENGTH);
  }

  // URL: the raw match is always removed from the text, even when rejected
  let url: string | null = null;
  const urlMatch = input.match(URL_CANDIDATE_PATTERN);
  if (urlMatch) {
    url = validateUrl(urlMatch[0]);
    if (url === null) {
      console.debug(`[Parser] Dropping invalid URL: ${urlMatch[0].substring(0, 50)}`);
    }
    input = input.replace(urlMatch[0], " ");
  }

  const rawTags = Array.from(input.matchAll(TAG_PATTERN), (m) => m[1]);
  if (rawTags.length > MAX_TAGS) {
    console.warn(`[Parser] Too many tags (${rawTags.length}), using first ${MAX_TAGS}`);
  }

  const tags: string[] = [];
  for (const raw of rawTags.slice(0, MAX_TAGS)) {
    const tag = validateTag(raw);
    if (tag && !tags.includes(tag)) {
      tags.push(tag);
    }
  }

  return { quote: cleanQuote(input.replace(TAG_PATTERN, " ")), url, tags };
}

function cleanQuote(text: string): string {
  let quote = text.trim();

  if (
    (quote.startsWith('"') && quote.endsWith('"')) ||
    (quote.startsWith("'") && quote.endsWith("'"))
  ) {
    quote = quote.slice(1, -1).trim();
  }

  quote = quote.replace(/\s+/g, " ");

  if (quote.length > MAX_QUOTE_LENGTH) {
    console.warn(`[Parser] Quote too long (${quote.length} chars), truncating`);
    quote = quote.substring(0, MAX_QUOTE_LENGTH);
  }

  return quote;
}

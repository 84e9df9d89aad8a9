/**
 * Input validation for quote messages.
 *
 * Shared by the message parser and the metadata fetcher so a URL that the
 * parser would not store is never requested either.
 */

// Telegram caps messages at 4096 chars, leave room for formatting
export const MAX_QUOTE_LENGTH = 4000;
export const MAX_INPUT_LENGTH = MAX_QUOTE_LENGTH * 2;
export const MAX_URL_LENGTH = 2048;
export const MAX_TAG_LENGTH = 50;
export const MAX_TAGS = 20;

/**
 * Loose pattern used to find a URL-looking token inside free text.
 */
export const URL_CANDIDATE_PATTERN = /https?:\/\/\S+/i;

/**
 * Strict pattern a URL must match to be stored or fetched:
 * domain labels with a TLD, localhost, or a dotted-quad IPv4 host,
 * optional port, optional path/query/fragment.
 */
export const STRICT_URL_PATTERN =
  /^https?:\/\/(?:(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,63}\.?|localhost|\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3})(?::\d{1,5})?(?:\/?|[/?#]\S+)$/i;

// Unicode letters, marks, digits and underscore
export const TAG_PATTERN = /#([\p{L}\p{M}\p{N}_]+)/gu;
const TAG_TOKEN_PATTERN = /^[\p{L}\p{M}\p{N}_]+$/u;

/**
 * Validate a URL for storage. Returns the trimmed URL, or null if invalid.
 */
export function validateUrl(url: string | null | undefined): string | null {
  if (!url) {
    return null;
  }

  const trimmed = url.trim();
  if (!trimmed) {
    return null;
  }

  if (trimmed.length > MAX_URL_LENGTH) {
    console.warn(`[Validation] URL too long (${trimmed.length} chars), dropping`);
    return null;
  }

  if (!STRICT_URL_PATTERN.test(trimmed)) {
    return null;
  }

  return trimmed;
}

/**
 * Validate a single tag (without the leading #). Returns null if invalid.
 */
export function validateTag(tag: string | null | undefined): string | null {
  if (!tag) {
    return null;
  }

  const trimmed = tag.trim();
  if (trimmed.length > MAX_TAG_LENGTH) {
    console.warn(`[Validation] Tag '${trimmed.substring(0, 20)}...' too long, skipping`);
    return null;
  }

  if (!TAG_TOKEN_PATTERN.test(trimmed)) {
    return null;
  }

  return trimmed;
}

/**
 * Command Argument Parser Utilities
 *
 * Typed argument parsing for the bot's slash commands. Each parser takes
 * the raw text after the command name and returns either the parsed value
 * or an error with the command's usage line.
 */

import type { UserPreference } from '../quotes/types.ts';

/**
 * Base result type for all parser operations
 */
export interface ParseResult<T> {
  success: true;
  data: T;
  remaining: string;
}

export interface ParseError {
  success: false;
  error: string;
  usage?: string;
}

export type ParserResult<T> = ParseResult<T> | ParseError;

// ============================================================================
// Usage strings
// ============================================================================

export const SEARCH_USAGE = 'Usage: /search <keyword>';
export const TAG_USAGE = 'Usage: /tag <tagname>';
export const SOURCE_USAGE = 'Usage: /source <domain>';
export const FAV_USAGE = 'Usage: /fav <quote_id>';
export const DELETE_USAGE = 'Usage: /delete <quote_id>';
export const SUBSCRIBE_USAGE = 'Usage: /subscribe <digest|daily>';
export const UNSUBSCRIBE_USAGE = 'Usage: /unsubscribe <digest|daily>';

// ============================================================================
// Tokenizing
// ============================================================================

/**
 * Split an argument string on whitespace.
 * "double" or 'single' quoted runs stay one token; \" and \\ escape inside quotes.
 */
export function tokenize(input: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let quote: '"' | "'" | null = null;

  const flush = () => {
    if (current) tokens.push(current);
    current = '';
  };

  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (quote) {
      const next = input[i + 1];
      if (char === '\\' && (next === quote || next === '\\')) {
        current += next;
        i++;
      } else if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"' || char === "'") {
      flush();
      quote = char;
    } else if (/\s/.test(char)) {
      flush();
    } else {
      current += char;
    }
  }

  flush();
  return tokens;
}

/**
 * Take the positional token at `index`.
 */
export function parsePositional(
  tokens: string[],
  index: number
): { value: string; remaining: string[] } | null {
  if (index < 0 || index >= tokens.length) {
    return null;
  }
  return {
    value: tokens[index],
    remaining: [...tokens.slice(0, index), ...tokens.slice(index + 1)],
  };
}

// ============================================================================
// Command arguments
// ============================================================================

/**
 * Quote id as shown in listings: "12" or "#12".
 */
export function parseQuoteId(input: string, usage: string): ParserResult<number> {
  const first = parsePositional(tokenize(input), 0);
  if (!first) {
    return { success: false, error: 'Missing quote ID', usage };
  }

  const match = first.value.match(/^#?(\d{1,15})$/);
  const id = match ? Number(match[1]) : NaN;
  if (!Number.isSafeInteger(id) || id <= 0) {
    return { success: false, error: 'Invalid quote ID. Use a number.', usage };
  }

  return { success: true, data: id, remaining: first.remaining.join(' ') };
}

/**
 * Optional count argument, clamped to 1..max.
 * Missing or non-numeric input yields the default.
 */
export function parseCount(
  input: string,
  options: { defaultValue: number; max: number }
): ParseResult<number> {
  const first = parsePositional(tokenize(input), 0);
  const remaining = first ? first.remaining.join(' ') : '';

  if (!first || !/^-?\d+$/.test(first.value)) {
    return { success: true, data: options.defaultValue, remaining };
  }

  const value = Math.min(Math.max(Number(first.value), 1), options.max);
  return { success: true, data: value, remaining };
}

/**
 * Free-text argument (keyword, tag or domain). Quotes are kept as typed.
 */
export function parseTerm(input: string, usage: string): ParserResult<string> {
  const term = input.trim().replace(/\s+/g, ' ');
  if (!term) {
    return { success: false, error: 'Missing argument', usage };
  }
  return { success: true, data: term, remaining: '' };
}

/**
 * Tag name with an optional leading '#'.
 */
export function parseTagName(input: string): ParserResult<string> {
  const first = parsePositional(tokenize(input), 0);
  const tag = first?.value.replace(/^#+/, '') ?? '';
  if (!first || !tag) {
    return { success: false, error: 'Missing tag', usage: TAG_USAGE };
  }
  return { success: true, data: tag, remaining: first.remaining.join(' ') };
}

const PREFERENCE_ALIASES = new Map<string, UserPreference>([
  ['digest', 'digest'],
  ['weekly', 'digest'],
  ['daily', 'daily_quote'],
  ['daily_quote', 'daily_quote'],
]);

export function parsePreference(input: string, usage: string): ParserResult<UserPreference> {
  const first = parsePositional(tokenize(input), 0);
  if (!first) {
    return { success: false, error: 'Missing subscription name', usage };
  }

  const preference = PREFERENCE_ALIASES.get(first.value.toLowerCase());
  if (!preference) {
    return { success: false, error: `Unknown subscription "${first.value}"`, usage };
  }

  return { success: true, data: preference, remaining: first.remaining.join(' ') };
}

/**
 * Render a parse error as a reply.
 */
export function formatParseError(result: ParseError): string {
  return result.usage ? `${result.error}\n${result.usage}` : result.error;
}

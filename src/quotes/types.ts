/**
 * Quote Store Types
 */

// ============================================================
// PARSER
// ============================================================

export interface ParsedMessage {
  quote: string;
  url: string | null;
  tags: string[];
}

// ============================================================
// RECORDS
// ============================================================

export interface Quote {
  id: number;
  userId: string;
  text: string;
  url: string | null;
  title: string | null;
  author: string | null;
  domain: string | null;
  /** Deduplicated, in extraction order */
  tags: string[];
  isFavorite: boolean;
  timesShown: number;
  /** Null until the quote has been shown at least once */
  lastShown: Date | null;
  createdAt: Date;
}

export interface QuoteUser {
  id: string;
  username: string | null;
  displayName: string | null;
  digestEnabled: boolean;
  dailyQuoteEnabled: boolean;
  createdAt: Date;
}

export type UserPreference = "digest" | "daily_quote";

export interface NewQuote {
  text: string;
  url?: string | null;
  title?: string | null;
  author?: string | null;
  domain?: string | null;
  tags?: string[];
}

/**
 * Shape of one entry in the JSON export.
 */
export interface ExportedQuote {
  id: number;
  text: string;
  url: string | null;
  title: string | null;
  author: string | null;
  domain: string | null;
  tags: string[];
  isFavorite: boolean;
  timesShown: number;
  lastShown: string | null;
  createdAt: string;
}

export type TagCount = [tag: string, count: number];

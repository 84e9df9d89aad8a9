/**
 * Quotes Module
 *
 * Parsing, storage, review ranking and rendering of saved quotes.
 */

export { parseMessage } from "./parser.ts";
export {
  MAX_QUOTE_LENGTH,
  MAX_URL_LENGTH,
  MAX_TAG_LENGTH,
  MAX_TAGS,
  validateUrl,
  validateTag,
} from "./validation.ts";
export { QuoteStore, QUOTES_TABLE, USERS_TABLE, type QuoteStoreOptions } from "./store.ts";
export { StoreError, isStoreError, type StoreErrorCode } from "./errors.ts";
export { rankForReview, reviewBucket, shuffle, type RandomSource } from "./review.ts";
export {
  checkSchema,
  isSchemaComplete,
  missingColumnStatements,
  missingFunctionMigrations,
  type FunctionReport,
  type SchemaReport,
  type SchemaStatus,
} from "./schema.ts";
export {
  MAX_MESSAGE_LENGTH,
  fitMessage,
  formatDailyQuote,
  formatDigest,
  formatQuote,
  formatQuoteList,
  formatTags,
  truncate,
} from "./format.ts";
export type {
  ExportedQuote,
  NewQuote,
  ParsedMessage,
  Quote,
  QuoteUser,
  TagCount,
  UserPreference,
} from "./types.ts";

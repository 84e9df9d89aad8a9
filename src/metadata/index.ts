/**
 * Metadata Module
 *
 * Title/author lookup for URLs attached to saved quotes.
 */

export {
  fetchMetadata,
  extractDomain,
  classifyError,
  FetchFailure,
  USER_AGENT,
} from "./fetcher.ts";
export { extractTitle, extractAuthor, decodeEntities } from "./extract.ts";
export type { ArticleMetadata, FetchMetadataOptions, FetchFailureKind } from "./types.ts";

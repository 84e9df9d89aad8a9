export interface ArticleMetadata {
  title: string | null;
  author: string | null;
  /** Host without a leading "www.", or "unknown" */
  domain: string;
}

export type Sleep = (ms: number) => Promise<void>;

export interface FetchMetadataOptions {
  /** Overall budget for one attempt, headers and body included */
  timeoutMs?: number;
  /** Budget for receiving response headers */
  connectTimeoutMs?: number;
  /** Retries after the first attempt, transient failures only */
  maxRetries?: number;
  /** Base delay; attempt n waits backoffMs * 2^n */
  backoffMs?: number;
  fetchImpl?: typeof fetch;
  sleep?: Sleep;
}

/**
 * timeout, server and transport are retried; the rest fail fast.
 */
export type FetchFailureKind =
  | "timeout"
  | "server"
  | "transport"
  | "refused"
  | "client"
  | "unexpected";

/**
 * Article Metadata Fetcher
 *
 * Downloads a single page and pulls its title and author. Never rejects:
 * any failure degrades to domain-only metadata so saving a quote is never
 * blocked by a slow or broken site.
 *
 * Transient failures (timeouts, 5xx, transport errors) are retried with
 * exponential backoff. Refused connections and 4xx responses fail fast.
 */

import { validateUrl } from "../quotes/validation.ts";
import { extractAuthor, extractTitle } from "./extract.ts";
import type { ArticleMetadata, FetchFailureKind, FetchMetadataOptions, Sleep } from "./types.ts";

export const USER_AGENT = "Mozilla/5.0 (compatible; QuoteKeeper/1.0)";

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 5_000;
export const DEFAULT_MAX_RETRIES = 2;
export const DEFAULT_BACKOFF_MS = 500;

const RETRYABLE: ReadonlySet<FetchFailureKind> = new Set(["timeout", "server", "transport"]);

// Codes surfaced by undici on error.cause
const REFUSED_CODES = new Set(["ECONNREFUSED", "ENOTFOUND"]);
const TIMEOUT_CODES = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

export class FetchFailure extends Error {
  constructor(
    public readonly kind: FetchFailureKind,
    message: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "FetchFailure";
  }

  get retryable(): boolean {
    return RETRYABLE.has(this.kind);
  }
}

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function extractDomain(url: string): string {
  try {
    const host = new URL(url).host.replace(/^www\./i, "");
    return host || "unknown";
  } catch {
    return "unknown";
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function errorName(error: unknown): string | undefined {
  return error instanceof Error ? error.name : undefined;
}

/**
 * Map a thrown fetch error onto a failure kind.
 */
export function classifyError(error: unknown, timedOut = false): FetchFailure {
  if (error instanceof FetchFailure) return error;

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error.cause : undefined;
  const code = errorCode(cause) ?? errorCode(error);
  const name = errorName(error);

  if (timedOut || name === "TimeoutError" || (code !== undefined && TIMEOUT_CODES.has(code))) {
    return new FetchFailure("timeout", message, error);
  }
  if (name === "AbortError") {
    return new FetchFailure("timeout", message, error);
  }
  if (code !== undefined && REFUSED_CODES.has(code)) {
    return new FetchFailure("refused", `${code}: ${message}`, error);
  }
  // fetch() reports network failures as TypeError("fetch failed")
  if (error instanceof TypeError || code !== undefined) {
    return new FetchFailure("transport", message, error);
  }
  return new FetchFailure("unexpected", message, error);
}

interface AttemptOptions {
  timeoutMs: number;
  connectTimeoutMs: number;
  fetchImpl: typeof fetch;
}

async function fetchPage(url: string, options: AttemptOptions): Promise<string> {
  const controller = new AbortController();
  let timedOut = false;
  const abort = () => {
    timedOut = true;
    controller.abort();
  };

  const overallTimer = setTimeout(abort, options.timeoutMs);
  const connectTimer = setTimeout(abort, Math.min(options.connectTimeoutMs, options.timeoutMs));

  try {
    let response: Response;
    try {
      response = await options.fetchImpl(url, {
        method: "GET",
        headers: {
          "User-Agent": USER_AGENT,
          Accept: "text/html,application/xhtml+xml",
        },
        redirect: "follow",
        signal: controller.signal,
      });
    } finally {
      clearTimeout(connectTimer);
    }

    if (response.status >= 500) {
      throw new FetchFailure("server", `HTTP ${response.status}`);
    }
    if (response.status >= 400) {
      throw new FetchFailure("client", `HTTP ${response.status}`);
    }

    return await response.text();
  } catch (error) {
    throw classifyError(error, timedOut);
  } finally {
    clearTimeout(overallTimer);
  }
}

export async function fetchMetadata(
  url: string,
  options: FetchMetadataOptions = {}
): Promise<ArticleMetadata> {
  const domain = extractDomain(url);
  const partial: ArticleMetadata = { title: null, author: null, domain };

  if (!validateUrl(url)) {
    console.warn(`[Metadata] Skipping fetch for invalid URL (${domain})`);
    return partial;
  }

  const maxRetries = Math.max(0, options.maxRetries ?? DEFAULT_MAX_RETRIES);
  const backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;
  const sleep = options.sleep ?? defaultSleep;
  const attempt: AttemptOptions = {
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    connectTimeoutMs: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
    fetchImpl: options.fetchImpl ?? fetch,
  };

  for (let retry = 0; ; retry++) {
    try {
      const html = await fetchPage(url, attempt);
      return { title: extractTitle(html), author: extractAuthor(html), domain };
    } catch (error) {
      const failure = classifyError(error);

      if (!failure.retryable) {
        console.warn(`[Metadata] ${failure.kind} failure for ${domain}, not retrying: ${failure.message}`);
        return partial;
      }
      if (retry >= maxRetries) {
        console.warn(`[Metadata] Giving up on ${domain} after ${retry + 1} attempt(s): ${failure.message}`);
        return partial;
      }

      const delay = backoffMs * Math.pow(2, retry);
      console.warn(`[Metadata] ${failure.kind} failure for ${domain}, retrying in ${delay}ms (${retry + 1}/${maxRetries})`);
      await sleep(delay);
    }
  }
}

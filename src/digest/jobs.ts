/**
 * Digest Jobs
 *
 * The two scheduled deliveries: the weekly digest and the daily quote.
 * Both sample with spaced-repetition weighting, so every delivery also
 * counts as a view of the quotes it contains.
 *
 * Users talk to the bot in a private chat, so a user's id doubles as the
 * chat id messages are sent to.
 */

import type { Config } from "../config.ts";
import { dailyQuoteCronPattern, digestCronPattern } from "../config.ts";
import { formatDailyQuote, formatDigest } from "../quotes/format.ts";
import type { QuoteStore } from "../quotes/store.ts";
import type { UserPreference } from "../quotes/types.ts";

export const WEEKLY_DIGEST_JOB = "weekly_digest";
export const DAILY_QUOTE_JOB = "daily_quote";

export interface MessageSender {
  sendMessage(chatId: string, text: string): Promise<void>;
}

export type DigestStore = Pick<QuoteStore, "sampleQuotes" | "countQuotes" | "usersWith">;

export interface DigestDeps {
  store: DigestStore;
  sender: MessageSender;
  digestCount: number;
}

export interface DeliveryReport {
  delivered: number;
  skipped: number;
  failed: number;
}

export interface DigestJob {
  id: string;
  pattern: string;
  run: () => Promise<void>;
}

export interface ComposedDigest {
  text: string;
  quoteCount: number;
}

/**
 * Sample and render a digest without sending it. Used by the scheduled
 * delivery and by /digest.
 */
export async function composeDigest(
  store: Pick<DigestStore, "sampleQuotes" | "countQuotes">,
  userId: string,
  count: number
): Promise<ComposedDigest> {
  const quotes = await store.sampleQuotes(userId, count, true);
  const total = quotes.length > 0 ? await store.countQuotes(userId) : 0;
  return { text: formatDigest(quotes, total), quoteCount: quotes.length };
}

/**
 * Send the weekly digest to one user. Returns the number of quotes included.
 */
export async function sendDigest(deps: DigestDeps, chatId: string): Promise<number> {
  const digest = await composeDigest(deps.store, chatId, deps.digestCount);
  await deps.sender.sendMessage(chatId, digest.text);
  return digest.quoteCount;
}

/**
 * Send one quote of the day. Sends nothing when the user has no quotes.
 */
export async function sendDailyQuote(deps: DigestDeps, chatId: string): Promise<boolean> {
  const [quote] = await deps.store.sampleQuotes(chatId, 1, true);
  if (!quote) return false;

  await deps.sender.sendMessage(chatId, formatDailyQuote(quote));
  return true;
}

async function deliverToSubscribers(
  deps: DigestDeps,
  preference: UserPreference,
  label: string,
  deliver: (chatId: string) => Promise<boolean>
): Promise<DeliveryReport> {
  const report: DeliveryReport = { delivered: 0, skipped: 0, failed: 0 };
  const users = await deps.store.usersWith(preference);

  for (const user of users) {
    try {
      if (await deliver(user.id)) {
        report.delivered++;
      } else {
        report.skipped++;
      }
    } catch (err) {
      report.failed++;
      console.error(`[Digest] ${label} failed for user ${user.id}:`, err);
    }
  }

  console.log(
    `[Digest] ${label}: ${report.delivered} delivered, ${report.skipped} skipped, ${report.failed} failed`
  );
  return report;
}

export function sendDigestToSubscribers(deps: DigestDeps): Promise<DeliveryReport> {
  return deliverToSubscribers(deps, "digest", "Weekly digest", async (chatId) => {
    await sendDigest(deps, chatId);
    return true;
  });
}

export function sendDailyQuoteToSubscribers(deps: DigestDeps): Promise<DeliveryReport> {
  return deliverToSubscribers(deps, "daily_quote", "Daily quote", (chatId) => sendDailyQuote(deps, chatId));
}

/**
 * Job definitions for the scheduler, one per enabled delivery.
 */
export function buildDigestJobs(
  config: Pick<Config, "digest" | "dailyQuote">,
  deps: DigestDeps
): DigestJob[] {
  const jobs: DigestJob[] = [];

  if (config.digest.enabled) {
    jobs.push({
      id: WEEKLY_DIGEST_JOB,
      pattern: digestCronPattern(config),
      run: async () => {
        await sendDigestToSubscribers(deps);
      },
    });
  }

  if (config.dailyQuote.enabled) {
    jobs.push({
      id: DAILY_QUOTE_JOB,
      pattern: dailyQuoteCronPattern(config),
      run: async () => {
        await sendDailyQuoteToSubscribers(deps);
      },
    });
  }

  return jobs;
}

/**
 * Digest Module
 */

export {
  DAILY_QUOTE_JOB,
  WEEKLY_DIGEST_JOB,
  buildDigestJobs,
  composeDigest,
  sendDailyQuote,
  sendDailyQuoteToSubscribers,
  sendDigest,
  sendDigestToSubscribers,
  type ComposedDigest,
  type DeliveryReport,
  type DigestDeps,
  type DigestJob,
  type DigestStore,
  type MessageSender,
} from "./jobs.ts";
export { DigestScheduler, type JobInfo, type SchedulerOptions } from "./scheduler.ts";

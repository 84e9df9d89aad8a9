/**
 * Spaced Repetition Ranking
 *
 * Decides which quotes come back in digests and /random. Quotes that were
 * never shown come first, then the ones not seen for a month, then a week,
 * then everything shown recently. Inside a bucket the least-shown quote wins
 * and remaining ties are broken at random.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

export const STALE_AFTER_DAYS = 30;
export const RESTING_AFTER_DAYS = 7;

/** 0 = never shown, 1 = ≥30 days ago, 2 = ≥7 days ago, 3 = recent */
export type ReviewBucket = 0 | 1 | 2 | 3;

export interface ReviewCandidate {
  timesShown: number;
  lastShown: Date | null;
}

export type RandomSource = () => number;

export function reviewBucket(lastShown: Date | null, now: Date): ReviewBucket {
  if (lastShown === null) return 0;

  const ageMs = now.getTime() - lastShown.getTime();
  if (ageMs >= STALE_AFTER_DAYS * DAY_MS) return 1;
  if (ageMs >= RESTING_AFTER_DAYS * DAY_MS) return 2;
  return 3;
}

/**
 * Order candidates by review priority. Does not mutate the input.
 */
export function rankForReview<T extends ReviewCandidate>(
  candidates: readonly T[],
  now: Date,
  random: RandomSource = Math.random
): T[] {
  return candidates
    .map((candidate) => ({
      candidate,
      bucket: reviewBucket(candidate.lastShown, now),
      key: random(),
    }))
    .sort(
      (a, b) =>
        a.bucket - b.bucket ||
        a.candidate.timesShown - b.candidate.timesShown ||
        a.key - b.key
    )
    .map(({ candidate }) => candidate);
}

/**
 * Uniform Fisher-Yates shuffle. Does not mutate the input.
 */
export function shuffle<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

import { describe, test, expect } from "vitest";
import { rankForReview, reviewBucket, shuffle } from "../review.ts";

const NOW = new Date("2026-10-18T12:00:00.000Z");
const daysAgo = (days: number) => new Date(NOW.getTime() - days * 24 * 60 * 60 * 1000);

// Deterministic sequence of random values
function sequence(...values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}

describe("reviewBucket", () => {
  test("never shown is bucket 0", () => {
    expect(reviewBucket(null, NOW)).toBe(0);
  });

  test("boundaries at 30 and 7 days", () => {
    expect(reviewBucket(daysAgo(45), NOW)).toBe(1);
    expect(reviewBucket(daysAgo(30), NOW)).toBe(1);
    expect(reviewBucket(daysAgo(29), NOW)).toBe(2);
    expect(reviewBucket(daysAgo(7), NOW)).toBe(2);
    expect(reviewBucket(daysAgo(6), NOW)).toBe(3);
    expect(reviewBucket(NOW, NOW)).toBe(3);
  });
});

describe("rankForReview", () => {
  test("orders by bucket before times shown", () => {
    const ranked = rankForReview(
      [
        { id: "recent", timesShown: 1, lastShown: daysAgo(1) },
        { id: "week", timesShown: 9, lastShown: daysAgo(10) },
        { id: "new", timesShown: 0, lastShown: null },
        { id: "month", timesShown: 5, lastShown: daysAgo(40) },
      ],
      NOW,
      sequence(0.5)
    );

    expect(ranked.map((c) => c.id)).toEqual(["new", "month", "week", "recent"]);
  });

  test("least shown wins inside a bucket", () => {
    const ranked = rankForReview(
      [
        { id: "a", timesShown: 4, lastShown: daysAgo(60) },
        { id: "b", timesShown: 2, lastShown: daysAgo(50) },
      ],
      NOW,
      sequence(0.1, 0.9)
    );

    expect(ranked.map((c) => c.id)).toEqual(["b", "a"]);
  });

  test("random key breaks full ties", () => {
    const candidates = [
      { id: "a", timesShown: 0, lastShown: null },
      { id: "b", timesShown: 0, lastShown: null },
    ];

    expect(rankForReview(candidates, NOW, sequence(0.9, 0.1)).map((c) => c.id)).toEqual(["b", "a"]);
    expect(rankForReview(candidates, NOW, sequence(0.1, 0.9)).map((c) => c.id)).toEqual(["a", "b"]);
  });

  test("does not mutate its input", () => {
    const candidates = [
      { id: "x", timesShown: 3, lastShown: daysAgo(1) },
      { id: "y", timesShown: 0, lastShown: null },
    ];
    rankForReview(candidates, NOW);
    expect(candidates.map((c) => c.id)).toEqual(["x", "y"]);
  });
});

describe("shuffle", () => {
  test("returns a permutation", () => {
    const items = [1, 2, 3, 4, 5];
    const out = shuffle(items);
    expect([...out].sort()).toEqual(items);
    expect(items).toEqual([1, 2, 3, 4, 5]);
  });

  test("uses the random source", () => {
    // random() = 0 always swaps position i with 0
    expect(shuffle([1, 2, 3], () => 0)).toEqual([2, 3, 1]);
  });
});

import { describe, expect, test } from "vitest";

import type { ChapterCandidate } from "./types";
import { defaultChapter, inferRanges, planDefinitions } from "./ranges";

const candidates = (...starts: number[]): ChapterCandidate[] =>
  starts.map((startPage, i) => ({ title: `C${i + 1}`, startPage }));

describe("inferRanges", () => {
  test("each chapter ends before the next one starts", () => {
    const ranges = inferRanges(
      [
        { title: "Intro", startPage: 1 },
        { title: "Body", startPage: 5 },
        { title: "End", startPage: 9 },
      ],
      12,
    );
    expect(ranges).toEqual([
      { name: "Intro", startPage: 1, endPage: 4 },
      { name: "Body", startPage: 5, endPage: 8 },
      { name: "End", startPage: 9, endPage: 12 },
    ]);
  });

  test("bookmarks sharing a page collapse to a single-page chapter", () => {
    const ranges = inferRanges(candidates(1, 7, 7, 9), 12);
    expect(ranges.map((r) => [r.startPage, r.endPage])).toEqual([
      [1, 6],
      [7, 7],
      [7, 8],
      [9, 12],
    ]);
  });

  test("a chapter starting on the last page is a single page", () => {
    expect(inferRanges(candidates(1, 10), 10)).toEqual([
      { name: "C1", startPage: 1, endPage: 9 },
      { name: "C2", startPage: 10, endPage: 10 },
    ]);
  });

  test("a first chapter after page 1 leaves the front matter out", () => {
    expect(inferRanges(candidates(3), 8)).toEqual([
      { name: "C1", startPage: 3, endPage: 8 },
    ]);
  });

  test("ranges are never inverted and the last reaches the end", () => {
    const starts = [1, 2, 2, 2, 5, 9, 9, 14, 20];
    const total = 20;
    const ranges = inferRanges(candidates(...starts), total);
    ranges.forEach((r, i) => {
      expect(r.endPage).toBeGreaterThanOrEqual(r.startPage);
      const next = ranges[i + 1];
      if (next && next.startPage > r.startPage)
        expect(r.endPage).toBeLessThanOrEqual(next.startPage - 1);
    });
    expect(ranges[ranges.length - 1].endPage).toBe(total);
  });

  test("no candidates yield no ranges", () => {
    expect(inferRanges([], 5)).toEqual([]);
  });
});

describe("planDefinitions", () => {
  test("falls back to one chapter over the whole document", () => {
    expect(planDefinitions([], 10)).toEqual([
      { name: "Chapter 1", startPage: 1, endPage: 10 },
    ]);
  });

  test("uses inferred ranges when there are candidates", () => {
    expect(planDefinitions(candidates(1, 3), 4)).toEqual([
      { name: "C1", startPage: 1, endPage: 2 },
      { name: "C2", startPage: 3, endPage: 4 },
    ]);
  });
});

test("defaultChapter spans the document", () => {
  expect(defaultChapter(3)).toEqual({
    name: "Chapter 1",
    startPage: 1,
    endPage: 3,
  });
});

import createDebug from "debug";
import type { ChapterCandidate, ChapterDefinition } from "./types";

const debug = createDebug("chaptersplit:ranges");

export function defaultChapter(totalPages: number): ChapterDefinition {
  return { name: "Chapter 1", startPage: 1, endPage: totalPages };
}

/**
 * Each chapter ends the page before the next one starts; the last runs to the
 * end of the document. Bookmarks sharing a page yield single-page chapters.
 */
export function inferRanges(
  candidates: readonly ChapterCandidate[],
  totalPages: number,
): ChapterDefinition[] {
  return candidates.map((cur, i) => {
    const next = candidates[i + 1];
    let endPage = next ? next.startPage - 1 : totalPages;
    if (endPage < cur.startPage) {
      debug("clamp %s: end %d < start %d", cur.title, endPage, cur.startPage);
      endPage = cur.startPage;
    }
    return { name: cur.title, startPage: cur.startPage, endPage };
  });
}

export function planDefinitions(
  candidates: readonly ChapterCandidate[],
  totalPages: number,
): ChapterDefinition[] {
  if (candidates.length === 0) return [defaultChapter(totalPages)];
  return inferRanges(candidates, totalPages);
}

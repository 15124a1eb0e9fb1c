import { z } from "zod";
import type {
  ChapterDefinition,
  ChapterInput,
  ChapterRow,
  DiagnosticReason,
} from "./types";

/** Column headers of the editable chapter table. */
export const COLUMNS = {
  name: "Chapter Name",
  startPage: "Start Page",
  endPage: "End Page",
} as const;

const PageNumberSchema = z.number().int();

export type ChapterValidation =
  | { ok: true; chapter: ChapterDefinition }
  | { ok: false; name: string; reason: DiagnosticReason; message: string };

export function chapterName(input: ChapterInput, index: number): string {
  return typeof input.name === "string" ? input.name : `Chapter_${index + 1}`;
}

function reject(
  name: string,
  reason: DiagnosticReason,
  detail: string,
): ChapterValidation {
  return {
    ok: false,
    name,
    reason,
    message: `Skipping chapter '${name}': ${detail}`,
  };
}

/** Checks one row against the page bounds; rows are judged independently. */
export function validateChapter(
  input: ChapterInput,
  index: number,
  totalPages: number,
): ChapterValidation {
  const name = chapterName(input, index);
  const start = PageNumberSchema.safeParse(input.startPage);
  const end = PageNumberSchema.safeParse(input.endPage);
  if (!start.success || !end.success)
    return reject(
      name,
      "invalid-page-number",
      "invalid page numbers (must be integers)",
    );

  const startPage = start.data;
  const endPage = end.data;
  const inBounds = (p: number): boolean => p >= 1 && p <= totalPages;
  if (!inBounds(startPage) || !inBounds(endPage))
    return reject(
      name,
      "out-of-range",
      `page numbers (${startPage}-${endPage}) out of range (1-${totalPages})`,
    );
  if (startPage > endPage)
    return reject(
      name,
      "start-after-end",
      `start after end (${startPage} > ${endPage})`,
    );
  return { ok: true, chapter: { name, startPage, endPage } };
}

export function rowToChapter(row: ChapterRow): ChapterInput {
  const input: ChapterInput = {
    startPage: row[COLUMNS.startPage],
    endPage: row[COLUMNS.endPage],
  };
  // A missing name column falls back to the positional default.
  if (COLUMNS.name in row) input.name = row[COLUMNS.name];
  return input;
}

export function chapterToRow(chapter: ChapterDefinition): ChapterRow {
  return {
    [COLUMNS.name]: chapter.name,
    [COLUMNS.startPage]: chapter.startPage,
    [COLUMNS.endPage]: chapter.endPage,
  };
}

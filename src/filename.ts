import createDebug from "debug";
import type { FilenameOptions } from "./types";

const debug = createDebug("chaptersplit:filename");

export const DEFAULT_FILENAME_OPTIONS: FilenameOptions = {
  indexPadding: 2,
  maxNameLength: 100,
};

export function sanitizeFilename(name: string, maxLength = 100): string {
  const cleaned = name.replace(/[\\/*?:"<>|]/g, "").replace(/ /g, "_");
  // Count code points so a surrogate pair is never split.
  const chars = Array.from(cleaned);
  if (chars.length > maxLength)
    debug(
      "truncate name %d -> %d: %s",
      chars.length,
      maxLength,
      `${chars.slice(0, 40).join("")}...`,
    );
  return chars.slice(0, maxLength).join("");
}

/** Output filename for the chapter at 0-based `index`. */
export function chapterFilename(
  index: number,
  name: string,
  opts: Partial<FilenameOptions> = {},
): string {
  const indexPadding =
    opts.indexPadding ?? DEFAULT_FILENAME_OPTIONS.indexPadding;
  const maxNameLength =
    opts.maxNameLength ?? DEFAULT_FILENAME_OPTIONS.maxNameLength;
  const prefix = String(index + 1).padStart(indexPadding, "0");
  return `${prefix}_${sanitizeFilename(name, maxNameLength)}.pdf`;
}

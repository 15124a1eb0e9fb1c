import createDebug from "debug";
import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { SessionFileError } from "./errors";
import { writeFileAtomic } from "./output";

const debug = createDebug("chaptersplit:session");

const SessionSchema = z.object({
  source: z.string(),
  pageCount: z.number().int().nonnegative(),
  chapters: z.array(z.record(z.string(), z.unknown())),
});

/** Editable chapter table, bound to the document it was made for. */
export type ChapterSession = z.infer<typeof SessionSchema>;

export interface DocumentIdentity {
  source: string;
  pageCount: number;
}

export function loadSession(filePath: string): ChapterSession | undefined {
  if (!fs.existsSync(filePath)) return undefined;
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new SessionFileError(`${filePath} is not valid JSON`, {
      cause: err,
    });
  }
  const parsed = SessionSchema.safeParse(raw);
  if (!parsed.success)
    throw new SessionFileError(
      `${filePath}: ${parsed.error.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ")}`,
      { cause: parsed.error },
    );
  return parsed.data;
}

export function saveSession(filePath: string, session: ChapterSession): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  writeFileAtomic(
    filePath,
    Buffer.from(`${JSON.stringify(session, null, 2)}\n`, "utf-8"),
  );
  debug("saved %d rows to %s", session.chapters.length, filePath);
}

export function sameDocument(
  session: ChapterSession,
  identity: DocumentIdentity,
): boolean {
  return (
    session.source === identity.source &&
    session.pageCount === identity.pageCount
  );
}

/**
 * Keeps an existing table while it belongs to the same document; a different
 * document replaces it with freshly inferred rows.
 */
export function resolveSession(
  existing: ChapterSession | undefined,
  identity: DocumentIdentity,
  initialRows: () => ChapterSession["chapters"],
): { session: ChapterSession; reused: boolean } {
  if (existing && sameDocument(existing, identity)) {
    debug("reusing table for %s", identity.source);
    return { session: existing, reused: true };
  }
  if (existing)
    debug(
      "table was for %s, replacing for %s",
      existing.source,
      identity.source,
    );
  return {
    session: { ...identity, chapters: initialRows() },
    reused: false,
  };
}

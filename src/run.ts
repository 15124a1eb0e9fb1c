import createDebug from "debug";
import * as fs from "node:fs";
import * as path from "node:path";
import type {
  ChapterDefinition,
  Diagnostic,
  NestedPolicy,
  OutputDocument,
} from "./types";
import type { SourceDocument } from "./document";
import { loadSourceDocument } from "./document";
import { extractChapters } from "./walker";
import { planDefinitions } from "./ranges";
import { chapterToRow, rowToChapter } from "./validate";
import { splitChapters } from "./split";
import { archiveFilename, buildArchive } from "./archive";
import { assertWritable, writeDocuments, writeFileAtomic } from "./output";
import { loadSession, resolveSession, saveSession } from "./session";
import type { ChapterSession } from "./session";

const debug = createDebug("chaptersplit:run");

export interface ChapterPlan {
  definitions: ChapterDefinition[];
  fromBookmarks: boolean;
  diagnostics: Diagnostic[];
}

/** Bookmark walk plus range inference, falling back to one whole-document chapter. */
export function planChapters(
  doc: SourceDocument,
  policy: NestedPolicy = "first-child",
): ChapterPlan {
  const { chapters, diagnostics } = extractChapters(doc, policy);
  return {
    definitions: planDefinitions(chapters, doc.pageCount),
    fromBookmarks: chapters.length > 0,
    diagnostics,
  };
}

export interface RunOptions {
  outDir: string;
  /** Session file holding the editable chapter table. */
  chaptersPath?: string;
  /** Only write the chapter table, do not split. */
  planOnly: boolean;
  nested: NestedPolicy;
  zip: boolean;
  indexPadding: number;
  maxNameLength: number;
  signal?: AbortSignal;
  report: (diagnostic: Diagnostic) => void;
}

export interface RunSummary {
  source: string;
  pageCount: number;
  session: ChapterSession;
  reusedTable: boolean;
  documents: OutputDocument[];
  skipped: number;
  aborted: boolean;
  written: string[];
}

export async function processFile(
  filePath: string,
  opts: RunOptions,
): Promise<RunSummary> {
  const source = path.basename(filePath);
  const doc = await loadSourceDocument(fs.readFileSync(filePath));
  debug("%s: %d pages", source, doc.pageCount);

  const existing = opts.chaptersPath
    ? loadSession(opts.chaptersPath)
    : undefined;
  const { session, reused } = resolveSession(
    existing,
    { source, pageCount: doc.pageCount },
    () => {
      const plan = planChapters(doc, opts.nested);
      plan.diagnostics.forEach(opts.report);
      if (!plan.fromBookmarks)
        debug("%s: no usable bookmarks, using the whole file", source);
      return plan.definitions.map(chapterToRow);
    },
  );

  const summary: RunSummary = {
    source,
    pageCount: doc.pageCount,
    session,
    reusedTable: reused,
    documents: [],
    skipped: 0,
    aborted: false,
    written: [],
  };

  if (opts.planOnly) {
    if (opts.chaptersPath) {
      saveSession(opts.chaptersPath, session);
      summary.written.push(opts.chaptersPath);
    }
    return summary;
  }

  const result = await splitChapters(
    doc,
    session.chapters.map(rowToChapter),
    {
      indexPadding: opts.indexPadding,
      maxNameLength: opts.maxNameLength,
      signal: opts.signal,
    },
  );
  result.diagnostics.forEach(opts.report);
  summary.documents = result.documents;
  summary.skipped = result.diagnostics.length;
  summary.aborted = result.aborted;

  // An interrupted run keeps nothing, so no partial set of chapters is left behind.
  if (result.aborted || result.documents.length === 0) return summary;

  if (opts.zip) {
    const zipPath = path.join(opts.outDir, archiveFilename(source));
    assertWritable([zipPath]);
    const zip = await buildArchive(result.documents);
    fs.mkdirSync(opts.outDir, { recursive: true });
    writeFileAtomic(zipPath, zip);
    summary.written.push(zipPath);
  } else {
    summary.written.push(...writeDocuments(result.documents, opts.outDir));
  }
  debug("%s: wrote %d file(s)", source, summary.written.length);
  return summary;
}

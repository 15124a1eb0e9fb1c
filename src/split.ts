import { PDFDocument } from "pdf-lib";
import createDebug from "debug";
import type {
  ChapterInput,
  Diagnostic,
  OutputDocument,
  SplitOptions,
  SplitResult,
} from "./types";
import type { SourceDocument } from "./document";
import { chapterFilename } from "./filename";
import { validateChapter } from "./validate";

const debug = createDebug("chaptersplit:split");

/** Copies the inclusive 1-based page range into a new PDF. */
export async function getSegmentPdfBytes(
  source: PDFDocument,
  startPage: number,
  endPage: number,
): Promise<Uint8Array> {
  const out = await PDFDocument.create();
  const indices: number[] = [];
  for (let p = startPage - 1; p <= endPage - 1; p++) indices.push(p);
  const pages = await out.copyPages(source, indices);
  for (const page of pages) out.addPage(page);
  return out.save();
}

/**
 * Splits the document into one PDF per valid chapter, in input order.
 * Invalid rows and failed copies are reported and skipped.
 */
export async function splitChapters(
  doc: SourceDocument,
  chapters: readonly ChapterInput[],
  opts: Partial<SplitOptions> = {},
): Promise<SplitResult> {
  const { signal, ...filenameOpts } = opts;
  const documents: OutputDocument[] = [];
  const diagnostics: Diagnostic[] = [];

  for (let i = 0; i < chapters.length; i++) {
    if (signal?.aborted) {
      debug("aborted before chapter %d of %d", i + 1, chapters.length);
      return { documents, diagnostics, aborted: true };
    }

    const checked = validateChapter(chapters[i], i, doc.pageCount);
    if (!checked.ok) {
      debug("%s", checked.message);
      diagnostics.push({
        scope: "chapter",
        index: i,
        name: checked.name,
        reason: checked.reason,
        message: checked.message,
      });
      continue;
    }

    const { name, startPage, endPage } = checked.chapter;
    const filename = chapterFilename(i, name, filenameOpts);
    try {
      const bytes = await getSegmentPdfBytes(doc.pdf, startPage, endPage);
      documents.push({ index: i, name, filename, startPage, endPage, bytes });
      debug("chapter %d: %s (pages %d-%d)", i, filename, startPage, endPage);
    } catch (err) {
      const message = `Failed to create PDF for chapter '${name}': ${
        err instanceof Error ? err.message : String(err)
      }`;
      debug("%s", message);
      diagnostics.push({
        scope: "chapter",
        index: i,
        name,
        reason: "copy-failed",
        message,
      });
    }
  }
  return { documents, diagnostics, aborted: false };
}

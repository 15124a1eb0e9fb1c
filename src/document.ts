import { EncryptedPDFError, PDFDocument } from "pdf-lib";
import createDebug from "debug";
import type { OutlineNode } from "./types";
import { readOutline } from "./outline";
import { DocumentLoadError } from "./errors";

const debug = createDebug("chaptersplit:document");

/** Read-only handle over a parsed PDF, owned by one split run. */
export interface SourceDocument {
  readonly pdf: PDFDocument;
  readonly pageCount: number;
  outline(): OutlineNode[];
}

export async function loadSourceDocument(
  bytes: Uint8Array,
): Promise<SourceDocument> {
  let pdf: PDFDocument;
  try {
    pdf = await PDFDocument.load(bytes, { updateMetadata: false });
  } catch (err) {
    if (err instanceof EncryptedPDFError)
      throw new DocumentLoadError("PDF is encrypted", { cause: err });
    throw new DocumentLoadError(
      `could not parse PDF: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
  const pageCount = pdf.getPageCount();
  debug("loaded %d pages", pageCount);
  return {
    pdf,
    pageCount,
    outline: () => readOutline(pdf),
  };
}

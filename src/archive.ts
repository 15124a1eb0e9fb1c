import archiver from "archiver";
import createDebug from "debug";
import * as path from "node:path";
import type { OutputDocument } from "./types";

const debug = createDebug("chaptersplit:archive");

/** "reports/book.pdf" -> "book_chapters.zip" */
export function archiveFilename(sourceName: string): string {
  const { name } = path.parse(path.basename(sourceName));
  return `${name}_chapters.zip`;
}

/** Zips the documents in order, one entry per document under its basename. */
export async function buildArchive(
  documents: readonly OutputDocument[],
): Promise<Buffer> {
  const archive = archiver("zip", {
    zlib: { level: 6 },
  });

  const chunks: Buffer[] = [];
  const done = new Promise<Buffer>((resolve, reject) => {
    archive.on("data", (chunk: Buffer) => chunks.push(chunk));
    archive.on("end", () => resolve(Buffer.concat(chunks)));
    archive.on("warning", (err) => debug("archive warning: %s", err.message));
    archive.on("error", reject);
  });

  for (const doc of documents) {
    archive.append(Buffer.from(doc.bytes), {
      name: path.basename(doc.filename),
    });
  }
  const [, zip] = await Promise.all([archive.finalize(), done]);
  debug("archive: %d entries, %d bytes", documents.length, zip.length);
  return zip;
}

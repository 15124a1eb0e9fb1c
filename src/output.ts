import createDebug from "debug";
import * as fs from "node:fs";
import * as path from "node:path";
import type { OutputDocument } from "./types";
import { OutputExistsError } from "./errors";

const debug = createDebug("chaptersplit:output");

/** Writes beside the target and renames, so readers never see a partial file. */
export function writeFileAtomic(filePath: string, data: Uint8Array): void {
  const partPath = `${filePath}.part`;
  try {
    fs.writeFileSync(partPath, data);
    fs.renameSync(partPath, filePath);
  } catch (err) {
    fs.rmSync(partPath, { force: true });
    throw err;
  }
}

export function assertWritable(paths: readonly string[]): void {
  const existing = paths.find((p) => fs.existsSync(p));
  if (existing !== undefined) throw new OutputExistsError(existing);
}

/** Writes each document under `outDir`; nothing is written if any target exists. */
export function writeDocuments(
  documents: readonly OutputDocument[],
  outDir: string,
): string[] {
  const targets = documents.map((d) =>
    path.join(outDir, path.basename(d.filename)),
  );
  assertWritable(targets);
  fs.mkdirSync(outDir, { recursive: true });
  documents.forEach((d, i) => {
    writeFileAtomic(targets[i], d.bytes);
    debug("wrote %s", targets[i]);
  });
  return targets;
}

import { afterEach, describe, expect, test, vi } from "vitest";
import * as yauzl from "yauzl";

import type { OutputDocument } from "./types";
import { archiveFilename, buildArchive } from "./archive";

const finalizeFailure = vi.hoisted((): { error?: Error } => ({}));

vi.mock("archiver", async (importOriginal) => {
  const actual = await importOriginal<{ default: typeof import("archiver") }>();
  const create = (...args: Parameters<typeof actual.default>) => {
    const archive = actual.default(...args);
    const { error } = finalizeFailure;
    if (error)
      archive.finalize = () => {
        archive.emit("error", error);
        return Promise.reject(error);
      };
    return archive;
  };
  return { ...actual, default: create };
});

interface ZipEntry {
  name: string;
  data: Buffer;
}

function readZip(zip: Buffer): Promise<ZipEntry[]> {
  return new Promise((resolve, reject) => {
    yauzl.fromBuffer(zip, { lazyEntries: true }, (err, zipfile) => {
      if (err || !zipfile) {
        reject(err ?? new Error("no zip file"));
        return;
      }
      const entries: ZipEntry[] = [];
      zipfile.on("entry", (entry: yauzl.Entry) => {
        zipfile.openReadStream(entry, (streamErr, stream) => {
          if (streamErr || !stream) {
            reject(streamErr ?? new Error("no stream"));
            return;
          }
          const chunks: Buffer[] = [];
          stream.on("data", (chunk: Buffer) => chunks.push(chunk));
          stream.on("error", reject);
          stream.on("end", () => {
            entries.push({ name: entry.fileName, data: Buffer.concat(chunks) });
            zipfile.readEntry();
          });
        });
      });
      zipfile.on("end", () => resolve(entries));
      zipfile.on("error", reject);
      zipfile.readEntry();
    });
  });
}

const doc = (index: number, filename: string, text: string): OutputDocument => ({
  index,
  name: filename,
  filename,
  startPage: 1,
  endPage: 1,
  bytes: new TextEncoder().encode(text),
});

describe("archiveFilename", () => {
  test("derives the archive name from the source basename", () => {
    expect(archiveFilename("book.pdf")).toBe("book_chapters.zip");
    expect(archiveFilename("/tmp/uploads/Annual Report.pdf")).toBe(
      "Annual Report_chapters.zip",
    );
    expect(archiveFilename("v1.2.pdf")).toBe("v1.2_chapters.zip");
  });
});

describe("buildArchive", () => {
  test("stores one entry per document in order", async () => {
    const zip = await buildArchive([
      doc(0, "01_Intro.pdf", "first chapter"),
      doc(1, "02_Body.pdf", "second chapter"),
    ]);
    const entries = await readZip(zip);
    expect(entries.map((e) => e.name)).toEqual(["01_Intro.pdf", "02_Body.pdf"]);
    expect(entries.map((e) => e.data.toString("utf-8"))).toEqual([
      "first chapter",
      "second chapter",
    ]);
  });

  test("entry names drop any directory part", async () => {
    const zip = await buildArchive([doc(2, "out/chapters/03_End.pdf", "end")]);
    expect((await readZip(zip)).map((e) => e.name)).toEqual(["03_End.pdf"]);
  });

  test("an empty list gives an empty archive", async () => {
    expect(await readZip(await buildArchive([]))).toEqual([]);
  });

  describe("when finalizing fails", () => {
    afterEach(() => {
      finalizeFailure.error = undefined;
    });

    test("rejects with the archiver error", async () => {
      finalizeFailure.error = new Error("disk full");
      await expect(
        buildArchive([doc(0, "01_Intro.pdf", "first chapter")]),
      ).rejects.toThrow("disk full");
    });
  });
});

#!/usr/bin/env node
import { Command } from "commander";
import createDebug from "debug";
import * as fs from "node:fs";
import * as path from "node:path";
import { NESTED_POLICIES } from "./src/types";
import type { Diagnostic } from "./src/types";
import { parseCliOptions } from "./src/options";
import type { CliOptions } from "./src/options";
import { processFile } from "./src/run";

const debug = createDebug("chaptersplit:cli");
const program = new Command();

program
  .name("chapter-split")
  .description("Split PDFs into one file per chapter using their bookmarks")
  .argument("<files...>", "PDF file(s) to split")
  .option("-o, --output <dir>", "output directory", ".")
  .option(
    "-c, --chapters <path>",
    "JSON chapter table to reuse or edit; replaced when it belongs to another file",
  )
  .option("--plan", "write the inferred chapter table and stop", false)
  .option(
    "--nested <policy>",
    `how nested bookmarks are read (${NESTED_POLICIES.join(", ")})`,
    "first-child",
  )
  .option("--no-zip", "write chapter PDFs instead of one zip archive")
  .option(
    "--max-name-length <n>",
    "max length of the sanitized chapter name in filenames",
    "100",
  )
  .option(
    "--index-padding <n>",
    "number of digits for the zero-padded chapter index in filenames",
    "2",
  );

program.action(run);

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});

function reportDiagnostic(diagnostic: Diagnostic): void {
  console.warn(diagnostic.message);
}

async function run(
  files: string[],
  rawOpts: Record<string, unknown>,
): Promise<void> {
  const opts = parseCliOptions(rawOpts);
  if (opts.chapters && files.length > 1) {
    console.error("--chapters can only be used with a single PDF");
    process.exitCode = 1;
    return;
  }
  const outDir = path.resolve(opts.output);

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.warn("Interrupted, stopping after the current chapter.");
    controller.abort();
  });

  debug("run files=%d outDir=%s", files.length, outDir);
  for (const file of files) {
    if (controller.signal.aborted) break;
    await processOneFile(path.resolve(file), outDir, opts, controller.signal);
  }
}

async function processOneFile(
  resolvedPath: string,
  outDir: string,
  opts: CliOptions,
  signal: AbortSignal,
): Promise<void> {
  if (!fs.existsSync(resolvedPath)) {
    console.error(`File not found: ${resolvedPath}`);
    process.exitCode = 1;
    return;
  }
  try {
    const summary = await processFile(resolvedPath, {
      outDir,
      chaptersPath: opts.chapters ? path.resolve(opts.chapters) : undefined,
      planOnly: opts.plan,
      nested: opts.nested,
      zip: opts.zip,
      indexPadding: opts.indexPadding,
      maxNameLength: opts.maxNameLength,
      signal,
      report: reportDiagnostic,
    });
    const { source, pageCount, session } = summary;
    if (opts.plan && summary.written.length === 0) {
      console.log(JSON.stringify(session, null, 2));
      return;
    }
    console.info(
      `${source}: ${pageCount} pages, ${session.chapters.length} chapter(s)` +
        (summary.reusedTable ? " from the saved chapter table" : ""),
    );
    if (opts.plan) {
      console.info(`Chapter table written to ${summary.written[0]}`);
      return;
    }
    if (summary.aborted) {
      console.error(`${source}: split interrupted, nothing was written.`);
      process.exitCode = 130;
      return;
    }
    if (summary.documents.length === 0) {
      console.error(
        `${source}: no chapter PDFs were generated. Check chapter definitions and page ranges.`,
      );
      process.exitCode = 1;
      return;
    }
    console.info(
      `${source}: split into ${summary.documents.length} chapter file(s)` +
        (summary.skipped > 0 ? `, ${summary.skipped} skipped` : ""),
    );
    for (const written of summary.written) console.info(`  ${written}`);
  } catch (err) {
    console.error(`Error processing ${resolvedPath}:`, err);
    process.exitCode = 1;
  }
}

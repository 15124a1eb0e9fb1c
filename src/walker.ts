import createDebug from "debug";
import type {
  ChapterCandidate,
  Diagnostic,
  NestedPolicy,
  OutlineLeaf,
  OutlineNode,
} from "./types";
import type { SourceDocument } from "./document";
import { OutlineResolveError } from "./errors";

const debug = createDebug("chaptersplit:walker");

const NESTED_SUFFIX = " (Nested)";

export interface WalkResult {
  chapters: ChapterCandidate[];
  diagnostics: Diagnostic[];
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Flattens the outline into page-ordered chapter starts. Unresolvable titles
 * get a placeholder; unresolvable targets are dropped with a diagnostic.
 */
export function walkOutline(
  nodes: readonly OutlineNode[],
  policy: NestedPolicy = "first-child",
): WalkResult {
  const chapters: ChapterCandidate[] = [];
  const diagnostics: Diagnostic[] = [];
  let position = 0;

  const visit = (leaf: OutlineLeaf, nested: boolean): void => {
    const index = position++;
    let title: string;
    try {
      title = leaf.title();
    } catch (err) {
      const reference =
        err instanceof OutlineResolveError ? err.reference : leaf.reference;
      debug("title of %s unresolved: %s", leaf.reference, errorMessage(err));
      title = nested
        ? `Unknown Nested Title (${reference})`
        : `Unknown Title (${reference})`;
    }
    if (nested) title += NESTED_SUFFIX;

    let pageIndex: number;
    try {
      pageIndex = leaf.page();
    } catch (err) {
      const message = `Could not process bookmark '${title}': ${errorMessage(err)}`;
      debug("%s", message);
      diagnostics.push({
        scope: "bookmark",
        index,
        name: title,
        reason: "unresolved-bookmark",
        message,
      });
      return;
    }
    chapters.push({ title, startPage: pageIndex + 1 });
  };

  const visitAll = (list: readonly OutlineNode[]): void => {
    for (const node of list) {
      if (node.kind === "leaf") visit(node, false);
      else visitAll(node.children);
    }
  };

  for (const node of nodes) {
    if (node.kind === "leaf") {
      visit(node, false);
      continue;
    }
    if (policy === "full") {
      visitAll(node.children);
    } else if (policy === "first-child") {
      const first = node.children[0];
      if (first?.kind === "leaf") visit(first, true);
    }
  }

  // Array#sort is stable, so bookmarks on the same page keep outline order.
  chapters.sort((a, b) => a.startPage - b.startPage);
  debug(
    "walk(%s): %d chapters, %d skipped",
    policy,
    chapters.length,
    diagnostics.length,
  );
  return { chapters, diagnostics };
}

export function extractChapters(
  doc: SourceDocument,
  policy: NestedPolicy = "first-child",
): WalkResult {
  return walkOutline(doc.outline(), policy);
}

import type { PDFDocument, PDFObject } from "pdf-lib";
import { PDFName, PDFDict, PDFRef, PDFString, PDFHexString } from "pdf-lib";
import createDebug from "debug";
import type { OutlineLeaf, OutlineNode } from "./types";
import { buildPageIndex, refKey, resolveDest } from "./dest";
import { OutlineResolveError } from "./errors";

const debug = createDebug("chaptersplit:outline");

function describeRef(refOrDict: PDFRef | PDFDict): string {
  return refOrDict instanceof PDFRef ? refOrDict.toString() : "(direct)";
}

function typeName(obj: PDFObject | undefined): string {
  return obj === undefined ? "missing" : obj.constructor.name;
}

export function resolveTitle(item: PDFDict, pdfDoc: PDFDocument): string {
  const raw = item.get(PDFName.of("Title"));
  if (raw instanceof PDFRef) {
    const resolved = pdfDoc.context.lookup(raw);
    if (resolved instanceof PDFString || resolved instanceof PDFHexString)
      return resolved.decodeText().trim();
    throw new OutlineResolveError(
      `indirect title resolved to ${typeName(resolved)}`,
      `Obj ${raw.objectNumber}`,
    );
  }
  if (raw instanceof PDFString || raw instanceof PDFHexString)
    return raw.decodeText().trim();
  throw new OutlineResolveError(
    "title is not a text string",
    `Type ${typeName(raw)}`,
  );
}

function brokenLeaf(reference: string, cause: unknown): OutlineLeaf {
  const fail = (): never => {
    throw new OutlineResolveError(
      `outline item is unreadable: ${String(cause)}`,
      reference,
    );
  };
  return { kind: "leaf", reference, title: fail, page: fail };
}

function nextLink(
  item: PDFDict,
  key: "First" | "Next",
): PDFRef | PDFDict | undefined {
  const val = item.get(PDFName.of(key));
  return val instanceof PDFRef || val instanceof PDFDict ? val : undefined;
}

function readSiblings(
  first: PDFRef | PDFDict | undefined,
  pdfDoc: PDFDocument,
  pageRefToIndex: Map<string, number>,
  seen: Set<string | PDFDict>,
): OutlineNode[] {
  const nodes: OutlineNode[] = [];
  let cur = first;
  while (cur) {
    const key = cur instanceof PDFRef ? refKey(cur) : cur;
    if (seen.has(key)) {
      debug("outline cycle at %s, stopping chain", describeRef(cur));
      break;
    }
    seen.add(key);

    const reference = describeRef(cur);
    const looked = pdfDoc.context.lookup(cur);
    if (!(looked instanceof PDFDict)) {
      nodes.push(
        brokenLeaf(reference, `expected dictionary, got ${typeName(looked)}`),
      );
      break;
    }
    const item = looked;
    nodes.push({
      kind: "leaf",
      reference,
      title: () => resolveTitle(item, pdfDoc),
      page: () => resolveDest(item, pdfDoc, pageRefToIndex, reference),
    });

    const children = readSiblings(
      nextLink(item, "First"),
      pdfDoc,
      pageRefToIndex,
      seen,
    );
    if (children.length > 0) nodes.push({ kind: "group", children });
    cur = nextLink(item, "Next");
  }
  return nodes;
}

/**
 * Reads the document outline as siblings in document order. An item with
 * children is followed directly by a group holding them.
 */
export function readOutline(pdfDoc: PDFDocument): OutlineNode[] {
  const outlinesVal = pdfDoc.catalog.get(PDFName.of("Outlines"));
  if (!outlinesVal) return [];
  const root = pdfDoc.context.lookup(outlinesVal);
  if (!(root instanceof PDFDict)) {
    debug("/Outlines is %s, ignoring", typeName(root));
    return [];
  }
  const nodes = readSiblings(
    nextLink(root, "First"),
    pdfDoc,
    buildPageIndex(pdfDoc),
    new Set(),
  );
  debug("outline: %d top-level nodes", nodes.length);
  return nodes;
}

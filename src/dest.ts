import type { PDFDocument, PDFObject } from "pdf-lib";
import {
  PDFName,
  PDFDict,
  PDFRef,
  PDFArray,
  PDFString,
  PDFHexString,
  PDFNumber,
} from "pdf-lib";
import { OutlineResolveError } from "./errors";

export function refKey(ref: PDFRef): string {
  return `${ref.objectNumber},${ref.generationNumber}`;
}

/** Maps each page object's reference to its 0-based index. */
export function buildPageIndex(pdfDoc: PDFDocument): Map<string, number> {
  const pages = pdfDoc.getPages();
  const pageRefToIndex = new Map<string, number>();
  for (let i = 0; i < pages.length; i++)
    pageRefToIndex.set(refKey(pages[i].ref), i);
  return pageRefToIndex;
}

function decodeKey(obj: PDFObject | undefined): string | null {
  if (obj instanceof PDFString || obj instanceof PDFHexString)
    return obj.decodeText();
  if (obj instanceof PDFName) return obj.decodeText();
  return null;
}

function asDestArray(
  val: PDFObject | undefined,
  pdfDoc: PDFDocument,
): PDFArray | undefined {
  if (val instanceof PDFArray) return val;
  if (val instanceof PDFDict) {
    const d = val.get(PDFName.of("D"));
    if (d) {
      const resolved = pdfDoc.context.lookup(d);
      if (resolved instanceof PDFArray) return resolved;
    }
  }
  return undefined;
}

export function findInNameTree(
  name: string,
  nodeRefOrDict: PDFObject,
  pdfDoc: PDFDocument,
  seen: Set<PDFObject> = new Set(),
): PDFArray | undefined {
  const node = pdfDoc.context.lookup(nodeRefOrDict);
  if (!(node instanceof PDFDict) || seen.has(node)) return undefined;
  seen.add(node);
  const namesVal = node.get(PDFName.of("Names"));
  if (namesVal) {
    const arr = pdfDoc.context.lookup(namesVal);
    if (arr instanceof PDFArray) {
      for (let i = 0; i < arr.size() - 1; i += 2) {
        if (decodeKey(pdfDoc.context.lookup(arr.get(i))) === name)
          return asDestArray(pdfDoc.context.lookup(arr.get(i + 1)), pdfDoc);
      }
    }
  }
  const kidsVal = node.get(PDFName.of("Kids"));
  if (kidsVal) {
    const kids = pdfDoc.context.lookup(kidsVal);
    if (kids instanceof PDFArray) {
      for (let j = 0; j < kids.size(); j++) {
        const found = findInNameTree(name, kids.get(j), pdfDoc, seen);
        if (found) return found;
      }
    }
  }
  return undefined;
}

export function resolveNamedDest(
  name: string,
  pdfDoc: PDFDocument,
): PDFArray | undefined {
  const destsVal = pdfDoc.catalog.get(PDFName.of("Dests"));
  if (destsVal) {
    const destsDict = pdfDoc.context.lookup(destsVal);
    if (destsDict instanceof PDFDict) {
      const entry = destsDict.get(PDFName.of(name));
      if (entry) {
        const found = asDestArray(pdfDoc.context.lookup(entry), pdfDoc);
        if (found) return found;
      }
    }
  }
  const namesVal = pdfDoc.catalog.get(PDFName.of("Names"));
  if (!namesVal) return undefined;
  const namesDict = pdfDoc.context.lookup(namesVal);
  if (!(namesDict instanceof PDFDict)) return undefined;
  const destsTreeVal = namesDict.get(PDFName.of("Dests"));
  if (!destsTreeVal) return undefined;
  return findInNameTree(name, destsTreeVal, pdfDoc);
}

function lookupDest(
  val: PDFObject,
  pdfDoc: PDFDocument,
): PDFArray | undefined {
  const resolved = pdfDoc.context.lookup(val);
  if (resolved instanceof PDFArray) return resolved;
  const name = decodeKey(resolved);
  return name === null ? undefined : resolveNamedDest(name, pdfDoc);
}

/**
 * Resolves an outline item's /Dest or /A GoTo action to a 0-based page index.
 * Throws OutlineResolveError when there is no usable destination.
 */
export function resolveDest(
  item: PDFDict,
  pdfDoc: PDFDocument,
  pageRefToIndex: Map<string, number>,
  reference: string,
): number {
  let dest: PDFArray | undefined;
  const destVal = item.get(PDFName.of("Dest"));
  if (destVal) dest = lookupDest(destVal, pdfDoc);
  if (!dest) {
    const a = item.lookupMaybe(PDFName.of("A"), PDFDict);
    if (a) {
      const s = a.lookupMaybe(PDFName.of("S"), PDFName);
      const d = a.get(PDFName.of("D"));
      if (s && s.decodeText() === "GoTo" && d) dest = lookupDest(d, pdfDoc);
    }
  }
  if (!dest || dest.size() < 1)
    throw new OutlineResolveError("bookmark has no destination", reference);

  const firstElem = dest.get(0);
  const pageCount = pdfDoc.getPageCount();
  let pageIndex: number | undefined;
  if (firstElem instanceof PDFRef) {
    pageIndex = pageRefToIndex.get(refKey(firstElem));
  } else if (firstElem instanceof PDFNumber) {
    pageIndex = firstElem.asNumber();
  } else {
    const resolved = pdfDoc.context.lookup(firstElem);
    const idx = pdfDoc.getPages().findIndex((p) => p.node === resolved);
    if (idx >= 0) pageIndex = idx;
  }
  if (
    pageIndex === undefined ||
    !Number.isInteger(pageIndex) ||
    pageIndex < 0 ||
    pageIndex >= pageCount
  )
    throw new OutlineResolveError(
      "bookmark target is not a page of this document",
      reference,
    );
  return pageIndex;
}

import {
  PDFDocument,
  PDFHexString,
  PDFName,
  PDFNumber,
  PDFRef,
} from "pdf-lib";
import type { PDFObject } from "pdf-lib";

export interface BookmarkSpec {
  title: string;
  /** 0-based target page; past the last page gives a dangling target. */
  page?: number;
  /** "indirect" stores the title as its own object; "bad*" stores a number. */
  titleMode?: "direct" | "indirect" | "bad" | "bad-indirect";
  /** How the target is expressed. */
  target?: "dest" | "named" | "goto";
  children?: BookmarkSpec[];
}

/** Width of page `i` in generated documents, used to tell pages apart. */
export const pageWidth = (i: number): number => 200 + i;

function titleObject(spec: BookmarkSpec, pdf: PDFDocument): PDFObject {
  const ctx = pdf.context;
  switch (spec.titleMode ?? "direct") {
    case "indirect":
      return ctx.register(PDFHexString.fromText(spec.title));
    case "bad":
      return PDFNumber.of(42);
    case "bad-indirect":
      return ctx.register(PDFNumber.of(42));
    default:
      return PDFHexString.fromText(spec.title);
  }
}

function addOutline(pdf: PDFDocument, bookmarks: BookmarkSpec[]): void {
  const ctx = pdf.context;
  const pages = pdf.getPages();
  const namedDests = ctx.obj({});
  let destCount = 0;

  const destArray = (page: number) =>
    ctx.obj([
      page < pages.length ? pages[page].ref : PDFRef.of(9999),
      "XYZ",
      null,
      null,
      null,
    ]);

  const build = (
    items: BookmarkSpec[],
    parentRef: PDFRef,
  ): { first: PDFRef; last: PDFRef; count: number } => {
    const refs = items.map(() => ctx.nextRef());
    let count = items.length;
    items.forEach((item, i) => {
      const dict = ctx.obj({});
      dict.set(PDFName.of("Title"), titleObject(item, pdf));
      dict.set(PDFName.of("Parent"), parentRef);
      if (i > 0) dict.set(PDFName.of("Prev"), refs[i - 1]);
      if (i < refs.length - 1) dict.set(PDFName.of("Next"), refs[i + 1]);
      if (item.page !== undefined) {
        const arr = destArray(item.page);
        if (item.target === "named") {
          const name = `dest${destCount++}`;
          namedDests.set(PDFName.of(name), arr);
          dict.set(PDFName.of("Dest"), PDFName.of(name));
        } else if (item.target === "goto") {
          dict.set(PDFName.of("A"), ctx.obj({ S: "GoTo", D: arr }));
        } else {
          dict.set(PDFName.of("Dest"), arr);
        }
      }
      if (item.children && item.children.length > 0) {
        const kids = build(item.children, refs[i]);
        dict.set(PDFName.of("First"), kids.first);
        dict.set(PDFName.of("Last"), kids.last);
        dict.set(PDFName.of("Count"), PDFNumber.of(kids.count));
        count += kids.count;
      }
      ctx.assign(refs[i], dict);
    });
    return { first: refs[0], last: refs[refs.length - 1], count };
  };

  const rootRef = ctx.nextRef();
  const top = build(bookmarks, rootRef);
  ctx.assign(
    rootRef,
    ctx.obj({
      Type: "Outlines",
      First: top.first,
      Last: top.last,
      Count: top.count,
    }),
  );
  pdf.catalog.set(PDFName.of("Outlines"), rootRef);
  if (destCount > 0)
    pdf.catalog.set(PDFName.of("Dests"), ctx.register(namedDests));
}

/** Builds a PDF whose page `i` is `pageWidth(i)` points wide. */
export async function makePdf(
  pageCount: number,
  bookmarks: BookmarkSpec[] = [],
): Promise<Uint8Array> {
  const pdf = await PDFDocument.create();
  for (let i = 0; i < pageCount; i++) pdf.addPage([pageWidth(i), 300]);
  if (bookmarks.length > 0) addOutline(pdf, bookmarks);
  return pdf.save();
}

export async function pageWidths(bytes: Uint8Array): Promise<number[]> {
  const pdf = await PDFDocument.load(bytes);
  return pdf.getPages().map((p) => Math.round(p.getWidth()));
}

/** Marks a document as encrypted without encrypting anything. */
export async function makeEncryptedPdf(): Promise<Uint8Array> {
  const pdf = await PDFDocument.create();
  pdf.addPage([pageWidth(0), 300]);
  const encrypt = pdf.context.obj({ Filter: "Standard", V: 1, R: 2 });
  pdf.context.trailerInfo.Encrypt = pdf.context.register(encrypt);
  return pdf.save({ useObjectStreams: false });
}

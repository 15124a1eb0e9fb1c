/** The source bytes could not be opened as a PDF; nothing can be split. */
export class DocumentLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DocumentLoadError";
  }
}

/** A single outline field (title or target page) could not be resolved. */
export class OutlineResolveError extends Error {
  /** Identifies the offending object, e.g. "Obj 12" or "Type PDFNumber". */
  readonly reference: string;

  constructor(message: string, reference: string) {
    super(message);
    this.name = "OutlineResolveError";
    this.reference = reference;
  }
}

export class OutputExistsError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`output file already exists: ${path}`);
    this.name = "OutputExistsError";
    this.path = path;
  }
}

export class SessionFileError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SessionFileError";
  }
}

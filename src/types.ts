/** A bookmark-derived chapter start, 1-based. */
export interface ChapterCandidate {
  readonly title: string;
  readonly startPage: number;
}

/** A named, inclusive 1-based page range. */
export interface ChapterDefinition {
  name: string;
  startPage: number;
  endPage: number;
}

/**
 * A chapter as handed to the splitter. Fields come from an editable table and
 * are validated per row, so nothing about them is assumed.
 */
export interface ChapterInput {
  name?: unknown;
  startPage?: unknown;
  endPage?: unknown;
}

/** Row of the editable chapter table, keyed by its column headers. */
export type ChapterRow = Record<string, unknown>;

/** Lazily resolved outline field; throws OutlineResolveError on failure. */
export type Lazy<T> = () => T;

export interface OutlineLeaf {
  kind: "leaf";
  /** Object reference of the outline item, e.g. "12 0 R". */
  reference: string;
  title: Lazy<string>;
  /** 0-based page index of the bookmark target. */
  page: Lazy<number>;
}

/** Children of the leaf immediately preceding the group. */
export interface OutlineGroup {
  kind: "group";
  children: OutlineNode[];
}

export type OutlineNode = OutlineLeaf | OutlineGroup;

/**
 * Ways to walk bookmark groups:
 * "first-child" keeps only a group's first leaf, suffixed " (Nested)";
 * "full" keeps every leaf at every depth; "ignore" skips groups.
 */
export const NESTED_POLICIES = ["first-child", "full", "ignore"] as const;

export type NestedPolicy = (typeof NESTED_POLICIES)[number];

export type DiagnosticReason =
  | "unresolved-bookmark"
  | "invalid-page-number"
  | "out-of-range"
  | "start-after-end"
  | "copy-failed";

/** A skipped bookmark or chapter, with enough context to find it again. */
export interface Diagnostic {
  scope: "bookmark" | "chapter";
  /** Position in the outline walk or in the chapter list, 0-based. */
  index: number;
  name: string;
  reason: DiagnosticReason;
  message: string;
}

export interface OutputDocument {
  /** Position of the source definition, 0-based. */
  index: number;
  name: string;
  filename: string;
  startPage: number;
  endPage: number;
  bytes: Uint8Array;
}

export interface FilenameOptions {
  indexPadding: number;
  maxNameLength: number;
}

export interface SplitOptions extends FilenameOptions {
  signal?: AbortSignal;
}

export interface SplitResult {
  documents: OutputDocument[];
  diagnostics: Diagnostic[];
  aborted: boolean;
}

import { z } from "zod";
import { NESTED_POLICIES } from "./types";

export const CliOptionsSchema = z.object({
  output: z.string().min(1).default("."),
  chapters: z.string().min(1).optional(),
  plan: z.boolean().default(false),
  nested: z.enum(NESTED_POLICIES).default("first-child"),
  zip: z.boolean().default(true),
  indexPadding: z.coerce.number().int().min(1).max(9).default(2),
  maxNameLength: z.coerce.number().int().positive().default(100),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export class CliOptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliOptionsError";
  }
}

/** Validates commander's raw option bag. */
export function parseCliOptions(raw: unknown): CliOptions {
  const parsed = CliOptionsSchema.safeParse(raw);
  if (parsed.success) return parsed.data;
  const details = parsed.error.issues
    .map((i) => `--${i.path.join(".")}: ${i.message}`)
    .join("; ");
  throw new CliOptionsError(`invalid options: ${details}`);
}

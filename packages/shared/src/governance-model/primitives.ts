/**
 * Lenient Zod building blocks for governance API documents.
 *
 * Upstream documents are loosely shaped: keys go missing, nested objects arrive
 * as null, scalars change type between API versions. Every schema here resolves
 * to a defaulted value instead of failing, so one odd field never costs a whole
 * bundle or event.
 */
import { z } from "zod";

// ---------------------------------------------------------------------------
// Scalars
// ---------------------------------------------------------------------------

/** Text field. Numbers are kept as their decimal form; anything else becomes "". */
export const LenientString = z.preprocess((value) => {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
}, z.string());

/**
 * Timestamp exactly as the API sent it. Interpretation is left to the
 * temporal normalizer; only the carrier type is checked here.
 */
export const RawTimestampSchema = z
  .union([z.string(), z.number(), z.date()])
  .nullable()
  .catch(null);

export type RawTimestamp = z.infer<typeof RawTimestampSchema>;

// ---------------------------------------------------------------------------
// References
// ---------------------------------------------------------------------------

export const NamedRefSchema = z
  .object({ name: LenientString })
  .catch(() => ({ name: "" }));

export type NamedRef = z.infer<typeof NamedRefSchema>;

export const EntityRefSchema = z
  .object({
    entityType: LenientString,
    name: LenientString,
  })
  .catch(() => ({ entityType: "", name: "" }));

export type EntityRef = z.infer<typeof EntityRefSchema>;

// ---------------------------------------------------------------------------
// Collections
// ---------------------------------------------------------------------------

/** Array whose absence (or non-array value) reads as empty. */
export function lenientArray<T extends z.ZodTypeAny>(item: T) {
  return z.array(item).catch(() => []);
}

export interface DocumentParseResult<T> {
  items: T[];
  /** Count of documents that were not JSON objects and had to be dropped. */
  rejected: number;
  issues: z.ZodIssue[];
}

export function parseDocuments<S extends z.ZodTypeAny>(
  schema: S,
  raw: readonly unknown[]
): DocumentParseResult<z.output<S>> {
  const items: z.output<S>[] = [];
  const issues: z.ZodIssue[] = [];
  let rejected = 0;
  for (const entry of raw) {
    const result = schema.safeParse(entry);
    if (result.success) {
      items.push(result.data);
    } else {
      rejected++;
      issues.push(...result.error.issues);
    }
  }
  return { items, rejected, issues };
}

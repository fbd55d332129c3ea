// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal runtime validation of correspondence lists.
 *
 * @module
 */

import { z } from "zod";
import type { TransliterationEntry } from "./types.ts";

const ASCII_RE = /^[\x00-\x7F]*$/;

const SourceSchema = z.string().min(1, "source text must not be empty");
const SpellingSchema = z.string().regex(
  ASCII_RE,
  "spelling must contain ASCII characters only",
);

const EntrySchema = z.object({
  from: SourceSchema,
  to: SpellingSchema,
});

const EntryListSchema = z.array(EntrySchema);
const EntryRecordSchema = z.record(SourceSchema, SpellingSchema);

export type ValidationResult =
  | { ok: true; entries: TransliterationEntry[] }
  | { ok: false; issues: string[] };

/**
 * Checks a correspondence list and flattens it into ordered entries.
 *
 * Record keys are taken in insertion order, so a record and the equivalent
 * entry list build the same table.
 *
 * @param payload The candidate correspondence list.
 * @returns The entries, or one message per problem found.
 */
export function validateEntries(payload: unknown): ValidationResult {
  if (Array.isArray(payload)) {
    const parsed = EntryListSchema.safeParse(payload);
    return parsed.success
      ? { ok: true, entries: parsed.data }
      : { ok: false, issues: formatIssues(parsed.error) };
  }
  const parsed = EntryRecordSchema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, issues: formatIssues(parsed.error) };
  }
  return {
    ok: true,
    entries: Object.entries(parsed.data).map(([from, to]) => ({ from, to })),
  };
}

/**
 * Renders zod issues as `[0]["from"]: message` so that both list indices and
 * record keys stay readable.
 */
function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path
      .map((part) =>
        typeof part === "number" ? `[${part}]` : `[${JSON.stringify(part)}]`
      )
      .join("");
    return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
  });
}

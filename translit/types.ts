// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Public types shared by the transliteration modules.
 *
 * @module
 */

/**
 * Handle of a node inside a {@linkcode TransliterationTable}.
 *
 * Handles are only meaningful for the table that produced them.
 */
export type TrieNode = number;

/**
 * Read-only byte trie consumed by the {@linkcode Transliterator}.
 *
 * Every path from {@linkcode TransliterationTable.root} to a node spells a
 * contiguous run of input bytes. A node with a non-empty spelling is a
 * complete match; a node that also has children may be extended by a longer
 * match (for example a base letter followed by a combining mark).
 *
 * Implementations never change after construction, so one table can be shared
 * by any number of independent streams.
 *
 * @example Usage
 * ```ts
 * import { buildTrie } from "translit-stream";
 * import assert from "node:assert/strict";
 *
 * const table = buildTrie({ "я": "ya" });
 * const lead = table.childFor(table.root(), 0xd1);
 * assert.ok(lead !== undefined);
 * assert.equal(table.spelling(lead), "");
 * ```
 */
export interface TransliterationTable {
  /** The root node. Its spelling is always empty. */
  root(): TrieNode;
  /** The child of `node` reached by `byte`, or `undefined` if there is none. */
  childFor(node: TrieNode, byte: number): TrieNode | undefined;
  /** The ASCII spelling stored on `node`, empty for intermediate nodes. */
  spelling(node: TrieNode): string;
  /** Whether `node` has no children, so no longer match can start from it. */
  isLeaf(node: TrieNode): boolean;
}

/**
 * A single source-to-ASCII correspondence.
 *
 * @example Usage
 * ```ts
 * import type { TransliterationEntry } from "translit-stream/types";
 *
 * const entry: TransliterationEntry = { from: "щ", to: "sch" };
 * ```
 */
export interface TransliterationEntry {
  /** Source text. Matched as its UTF-8 byte sequence. */
  readonly from: string;
  /** ASCII replacement. May be empty to drop the source text. */
  readonly to: string;
}

/**
 * Correspondence list accepted by {@linkcode buildTrie}: either a record keyed
 * by source text or an ordered list of entries.
 */
export type TransliterationEntries =
  | Readonly<Record<string, string>>
  | readonly TransliterationEntry[];

/** Options shared by every transliteration entry point. */
export interface TransliterateOptions {
  /**
   * Table to match against.
   *
   * @default {DEFAULT_TABLE}
   */
  table?: TransliterationTable;
  /**
   * Re-case runs of capitalized multi-letter spellings so that ALL-CAPS words
   * stay ALL-CAPS ("ЩИ" becomes "SCHI" rather than "SchI"). When disabled,
   * spellings are emitted exactly as stored in the table.
   *
   * @default {true}
   */
  normalizeCapitalization?: boolean;
}

/**
 * Error thrown when a correspondence list cannot be turned into a table.
 *
 * @example Usage
 * ```ts
 * import { TransliterationTableError } from "translit-stream/types";
 * import assert from "node:assert/strict";
 *
 * const error = new TransliterationTableError(["0.from: empty source"]);
 * assert.ok(error instanceof TypeError);
 * assert.equal(error.issues.length, 1);
 * ```
 */
export class TransliterationTableError extends TypeError {
  /** One message per rejected entry, each prefixed with its path. */
  readonly issues: readonly string[];

  /**
   * Constructs a new TransliterationTableError.
   *
   * @param issues Messages describing each rejected entry.
   */
  constructor(issues: readonly string[]) {
    super(
      `Invalid transliteration table: ${issues.join("; ")}`,
    );
    this.name = "TransliterationTableError";
    this.issues = issues;
  }
}

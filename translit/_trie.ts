// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal arena-backed transliteration trie.
 *
 * Nodes are indices into parallel arrays rather than individual objects, and
 * the arrays are never written after {@linkcode buildTrie} returns.
 *
 * @module
 */

import {
  type TransliterationEntries,
  type TransliterationTable,
  TransliterationTableError,
  type TrieNode,
} from "./types.ts";
import { validateEntries } from "./_schema.ts";

const ROOT: TrieNode = 0;

const encoder = new TextEncoder();

/** Immutable byte trie produced by {@linkcode buildTrie}. */
class ArenaTrie implements TransliterationTable {
  readonly #spellings: readonly string[];
  readonly #children: readonly (ReadonlyMap<number, TrieNode> | undefined)[];

  constructor(
    spellings: readonly string[],
    children: readonly (ReadonlyMap<number, TrieNode> | undefined)[],
  ) {
    this.#spellings = spellings;
    this.#children = children;
  }

  root(): TrieNode {
    return ROOT;
  }

  childFor(node: TrieNode, byte: number): TrieNode | undefined {
    return this.#children[node]?.get(byte);
  }

  spelling(node: TrieNode): string {
    return this.#spellings[node] ?? "";
  }

  isLeaf(node: TrieNode): boolean {
    return this.#children[node] === undefined;
  }
}

/**
 * Builds a transliteration table from a correspondence list.
 *
 * Each source string is matched as its UTF-8 bytes. Intermediate bytes create
 * nodes with an empty spelling; the final byte's node receives the spelling.
 * When the same source appears twice, the later spelling wins.
 *
 * @example Usage
 * ```ts
 * import { buildTrie, transliterateText } from "translit-stream";
 * import assert from "node:assert/strict";
 *
 * const table = buildTrie([
 *   { from: "е", to: "e" },
 *   { from: "\u0435\u0308", to: "yo" },
 * ]);
 * // A base letter followed by U+0308 is matched as one unit.
 * assert.equal(transliterateText("\u0435\u0308ж", { table }), "yoж");
 * ```
 *
 * @param entries A record keyed by source text, or a list of entries.
 * @returns The read-only table.
 * @throws {TransliterationTableError} If an entry has an empty source or a
 * spelling with non-ASCII characters.
 */
export function buildTrie(
  entries: TransliterationEntries,
): TransliterationTable {
  const result = validateEntries(entries);
  if (!result.ok) {
    throw new TransliterationTableError(result.issues);
  }

  const spellings: string[] = [""];
  const children: (Map<number, TrieNode> | undefined)[] = [undefined];

  for (const { from, to } of result.entries) {
    let node = ROOT;
    for (const byte of encoder.encode(from)) {
      let edges = children[node];
      if (edges === undefined) {
        edges = new Map();
        children[node] = edges;
      }
      let next = edges.get(byte);
      if (next === undefined) {
        next = spellings.length;
        spellings.push("");
        children.push(undefined);
        edges.set(byte, next);
      }
      node = next;
    }
    spellings[node] = to;
  }

  return new ArenaTrie(spellings, children);
}

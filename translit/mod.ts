// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Streaming transliteration of UTF-8 text into ASCII.
 *
 * Each recognized character or character sequence is replaced by a fixed
 * Latin spelling ("я" becomes "ya", "χ" becomes "kh"); every other byte passes
 * through unchanged. Matching works on bytes against a read-only trie and
 * always prefers the longest entry, so a base letter followed by a combining
 * mark is translated as one unit.
 *
 * ## Capitalization
 *
 * A capital letter with a multi-letter spelling is held back until the next
 * letter shows whether the word is Title-Case or ALL-CAPS:
 *
 * - "Я говорю" becomes "Ya govoryu".
 * - "ЯЩЕРИЦА" becomes "YASCHERITSA".
 *
 * Pass `{ normalizeCapitalization: false }` to emit spellings exactly as
 * stored.
 *
 * ## Custom tables
 *
 * {@linkcode buildTrie} turns a correspondence list into a table that can be
 * passed as the `table` option to every entry point.
 *
 * ```ts
 * import {
 *   buildTrie,
 *   Transliterator,
 *   transliterateText,
 * } from "translit-stream";
 * import assert from "node:assert/strict";
 *
 * // One-shot
 * assert.equal(transliterateText("Я ЩЕКОЧУ"), "YA SCHEKOCHU");
 *
 * // Incremental
 * const bytes = new TextEncoder().encode("ё");
 * const transliterator = new Transliterator();
 * const first = transliterator.pushChunk(bytes.subarray(0, 1));
 * const rest = transliterator.pushChunk(bytes.subarray(1));
 * assert.equal(first.length, 0);
 * assert.equal(new TextDecoder().decode(rest), "yo");
 *
 * // Custom table
 * const table = buildTrie({ "ä": "ae", "ö": "oe", "ü": "ue", "ß": "ss" });
 * assert.equal(transliterateText("Größe", { table }), "Groesse");
 * ```
 *
 * @module
 */

export * from "./types.ts";
export * from "./transliterator.ts";
export * from "./transliterate.ts";
export * from "./transliterate_stream.ts";

// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * One-shot transliteration of a complete input.
 *
 * @module
 */

import type { TransliterateOptions } from "./types.ts";
import { Transliterator } from "./transliterator.ts";

export type { TransliterateOptions } from "./types.ts";
export { isTitleShaped } from "./_capitalization.ts";
export { buildTrie } from "./_trie.ts";
export { DEFAULT_TABLE } from "./_default_table.ts";

const encoder = new TextEncoder();

/**
 * Transliterates a complete byte sequence.
 *
 * Equivalent to one {@linkcode Transliterator.pushChunk} call with the whole
 * input followed by {@linkcode Transliterator.finalize} on a fresh instance.
 *
 * @example Usage
 * ```ts
 * import { transliterate } from "translit-stream/transliterate";
 * import assert from "node:assert/strict";
 *
 * const output = transliterate(new TextEncoder().encode("ЯЩЕРИЦА"));
 * assert.equal(new TextDecoder().decode(output), "YASCHERITSA");
 * ```
 *
 * @param input The bytes to transliterate, assumed to be UTF-8.
 * @param options Table and casing options.
 * @returns The transliterated bytes. Unrecognized bytes are copied verbatim.
 */
export function transliterate(
  input: Uint8Array,
  options?: TransliterateOptions,
): Uint8Array {
  const transliterator = new Transliterator(options);
  const head = transliterator.pushChunk(input);
  const tail = transliterator.finalize();
  if (tail.length === 0) {
    return head;
  }
  const output = new Uint8Array(head.length + tail.length);
  output.set(head);
  output.set(tail, head.length);
  return output;
}

/**
 * Transliterates a string through its UTF-8 encoding.
 *
 * @example Usage
 * ```ts
 * import { transliterateText } from "translit-stream/transliterate";
 * import assert from "node:assert/strict";
 *
 * assert.equal(transliterateText("Cześć!"), "Czeshch!");
 * assert.equal(transliterateText("¿Adónde?"), "¿Adonde?");
 * ```
 *
 * @param text The text to transliterate.
 * @param options Table and casing options.
 * @returns The transliterated text. Characters without a table entry are
 * kept as they are.
 */
export function transliterateText(
  text: string,
  options?: TransliterateOptions,
): string {
  return new TextDecoder().decode(transliterate(encoder.encode(text), options));
}

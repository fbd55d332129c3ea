// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Stateful streaming transliterator.
 *
 * @module
 */

import type {
  TransliterateOptions,
  TransliterationTable,
  TrieNode,
} from "./types.ts";
import { ByteSink } from "./_common.ts";
import { CapitalizationNormalizer } from "./_capitalization.ts";
import { DEFAULT_TABLE } from "./_default_table.ts";

export type { TransliterateOptions } from "./types.ts";

/**
 * Longest-match transliterator for one logical byte stream.
 *
 * Input bytes walk the table one at a time. The deepest node with a spelling
 * seen on the current path is remembered, so when a longer match fails the
 * transliterator falls back to it and replays the bytes read past it. Bytes
 * that start no match are passed through verbatim, so input need not be valid
 * UTF-8 and nothing is ever dropped.
 *
 * A match may span any number of {@linkcode Transliterator.pushChunk} calls.
 * An instance must be used by one caller at a time; the table it reads from
 * may be shared.
 *
 * @example Basic usage
 * ```ts
 * import { Transliterator } from "translit-stream";
 * import assert from "node:assert/strict";
 *
 * const encoder = new TextEncoder();
 * const decoder = new TextDecoder();
 * const bytes = encoder.encode("Я говорю");
 *
 * const transliterator = new Transliterator();
 * let output = decoder.decode(transliterator.pushChunk(bytes.subarray(0, 1)));
 * output += decoder.decode(transliterator.pushChunk(bytes.subarray(1)));
 * output += decoder.decode(transliterator.finalize());
 *
 * assert.equal(output, "Ya govoryu");
 * ```
 */
export class Transliterator {
  readonly #table: TransliterationTable;
  readonly #root: TrieNode;
  readonly #capitalization: CapitalizationNormalizer | undefined;
  readonly #out = new ByteSink();

  #state: TrieNode;
  // Deepest node with a spelling on the current path.
  #lastMatch: TrieNode | undefined = undefined;
  // Bytes read since #lastMatch (or since the root when there is none).
  #pending: number[] = [];

  /**
   * Constructs a new Transliterator.
   *
   * @param options Table and casing options.
   */
  constructor(options: TransliterateOptions = {}) {
    this.#table = options.table ?? DEFAULT_TABLE;
    this.#root = this.#table.root();
    this.#state = this.#root;
    this.#capitalization = options.normalizeCapitalization === false
      ? undefined
      : new CapitalizationNormalizer();
  }

  /**
   * Feeds the next fragment of the stream.
   *
   * @param chunk Input bytes; may be empty.
   * @returns The output bytes that can no longer change.
   */
  pushChunk(chunk: Uint8Array): Uint8Array {
    for (const byte of chunk) {
      this.#feed(byte);
    }
    return this.#out.take();
  }

  /**
   * Ends the stream as if no further byte could extend the current match,
   * then resets the instance so it can start a new stream.
   *
   * @returns All remaining output bytes.
   */
  finalize(): Uint8Array {
    while (this.#pending.length > 0 || this.#lastMatch !== undefined) {
      for (const byte of this.#backOff()) {
        this.#feed(byte);
      }
    }
    this.#capitalization?.finalize(this.#out);
    this.#state = this.#root;
    return this.#out.take();
  }

  #feed(byte: number): void {
    const queue = [byte];
    for (
      let next = queue.shift();
      next !== undefined;
      next = queue.shift()
    ) {
      const child = this.#table.childFor(this.#state, next);

      if (child === undefined) {
        if (this.#state === this.#root) {
          this.#emitLiteral(next);
        } else {
          // A longer match failed: settle what was read so far, then retry
          // the replayed bytes and this one from the root.
          queue.unshift(...this.#backOff(), next);
        }
        continue;
      }

      if (this.#table.isLeaf(child)) {
        this.#state = this.#root;
        this.#lastMatch = undefined;
        this.#pending = [];
        this.#emitSpelling(this.#table.spelling(child));
        continue;
      }

      this.#state = child;
      if (this.#table.spelling(child).length > 0) {
        this.#lastMatch = child;
        this.#pending = [];
      } else {
        this.#pending.push(next);
      }
    }
  }

  /**
   * Abandons the current path. Emits the remembered match, or the first
   * pending byte verbatim when there is none, and returns the bytes that must
   * be read again from the root.
   */
  #backOff(): number[] {
    const pending = this.#pending;
    this.#state = this.#root;
    this.#pending = [];

    if (this.#lastMatch !== undefined) {
      const match = this.#lastMatch;
      this.#lastMatch = undefined;
      this.#emitSpelling(this.#table.spelling(match));
      return pending;
    }

    const [first, ...rest] = pending;
    if (first !== undefined) {
      this.#emitLiteral(first);
    }
    return rest;
  }

  #emitSpelling(spelling: string): void {
    if (this.#capitalization === undefined) {
      this.#out.pushAscii(spelling);
    } else {
      this.#capitalization.spelling(spelling, this.#out);
    }
  }

  #emitLiteral(byte: number): void {
    if (this.#capitalization === undefined) {
      this.#out.pushByte(byte);
    } else {
      this.#capitalization.literal(byte, this.#out);
    }
  }
}

// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal capitalization normalizer.
 *
 * A capital source letter often maps to a multi-letter spelling ("Щ" to
 * "Sch"). Copied as-is, an ALL-CAPS word would come out as "SchI" instead of
 * "SCHI". The normalizer holds back a capitalized spelling until the next item
 * shows whether the word is Title-Case or ALL-CAPS, then re-cases and flushes.
 *
 * @module
 */

import {
  asciiUpperCase,
  type ByteSink,
  CC_A_LOWER,
  CC_A_UPPER,
  CC_SPACE,
  CC_Z_LOWER,
  CC_Z_UPPER,
} from "./_common.ts";

/**
 * Checks whether a spelling is an uppercase ASCII letter followed only by
 * lowercase ASCII letters.
 *
 * Spellings with more than one capital ("OU") are not title-shaped and never
 * start or continue a held run.
 *
 * @example Usage
 * ```ts
 * import { isTitleShaped } from "translit-stream";
 * import assert from "node:assert/strict";
 *
 * assert.equal(isTitleShaped("Sch"), true);
 * assert.equal(isTitleShaped("OU"), false);
 * assert.equal(isTitleShaped("sch"), false);
 * ```
 *
 * @param spelling The spelling to classify.
 * @returns `true` for "Ya", "Sch" or "G"; `false` for "", "ya", "OU" or "'".
 */
export function isTitleShaped(spelling: string): boolean {
  if (spelling.length === 0) {
    return false;
  }
  const first = spelling.charCodeAt(0);
  if (first < CC_A_UPPER || first > CC_Z_UPPER) {
    return false;
  }
  for (let i = 1; i < spelling.length; i++) {
    const code = spelling.charCodeAt(i);
    if (code < CC_A_LOWER || code > CC_Z_LOWER) {
      return false;
    }
  }
  return true;
}

/**
 * Two-state casing decision over the item stream of one transliterator.
 *
 * While undecided, the first capitalized spelling and any spaces after it are
 * held. A second capitalized spelling settles the run as ALL-CAPS; anything
 * else settles it as Title-Case. Once ALL-CAPS, capitalized spellings are
 * upper-cased on arrival until a non-space, non-capitalized item ends the run.
 */
export class CapitalizationNormalizer {
  #mode = false;
  // Invariant: non-empty only while #mode is set.
  #held = "";

  /**
   * Routes a table spelling.
   *
   * @param spelling The spelling of a completed match.
   * @param out Destination of whatever becomes final.
   */
  spelling(spelling: string, out: ByteSink): void {
    const titleShaped = isTitleShaped(spelling);
    if (!this.#mode) {
      if (titleShaped) {
        this.#mode = true;
        this.#held = spelling;
        return;
      }
      out.pushAscii(spelling);
      return;
    }

    if (titleShaped) {
      out.pushAscii(asciiUpperCase(this.#held + spelling));
      this.#held = "";
      return;
    }

    out.pushAscii(this.#held + spelling);
    this.#held = "";
    this.#mode = false;
  }

  /**
   * Routes a byte that had no match in the table.
   *
   * @param byte The raw input byte, emitted verbatim.
   * @param out Destination of whatever becomes final.
   */
  literal(byte: number, out: ByteSink): void {
    if (this.#mode) {
      if (this.#held.length > 0) {
        if (byte === CC_SPACE) {
          this.#held += " ";
          return;
        }
        out.pushAscii(this.#held);
        this.#held = "";
        this.#mode = false;
      } else if (byte !== CC_SPACE) {
        this.#mode = false;
      }
    }
    out.pushByte(byte);
  }

  /**
   * Ends the stream. A run that was never confirmed as ALL-CAPS is flushed in
   * its original Title-Case form.
   *
   * @param out Destination of the held spelling, if any.
   */
  finalize(out: ByteSink): void {
    if (this.#held.length > 0) {
      out.pushAscii(this.#held);
    }
    this.#held = "";
    this.#mode = false;
  }
}

// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal shared utilities for the transliteration modules.
 *
 * @module
 */

// Character codes for hot path checks
export const CC_SPACE = 32; // space
export const CC_A_UPPER = 65; // A
export const CC_Z_UPPER = 90; // Z
export const CC_A_LOWER = 97; // a
export const CC_Z_LOWER = 122; // z

/** Offset between an ASCII lowercase letter and its uppercase form. */
const CASE_OFFSET = CC_A_LOWER - CC_A_UPPER;

const INITIAL_CAPACITY = 64;

/**
 * Upper-cases the ASCII letters of a string, leaving every other character
 * untouched.
 *
 * `String.prototype.toUpperCase` is not used because it applies full Unicode
 * case mapping.
 *
 * @example Usage
 * ```ts
 * import { asciiUpperCase } from "./_common.ts";
 *
 * asciiUpperCase("Ya sh"); // "YA SH"
 * ```
 *
 * @param text The text to re-case.
 * @returns The text with a-z replaced by A-Z.
 */
export function asciiUpperCase(text: string): string {
  let result = "";
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    result += code >= CC_A_LOWER && code <= CC_Z_LOWER
      ? String.fromCharCode(code - CASE_OFFSET)
      : text.charAt(i);
  }
  return result;
}

/**
 * Growable byte buffer collecting output between two reads.
 *
 * @example Usage
 * ```ts
 * import { ByteSink } from "./_common.ts";
 *
 * const sink = new ByteSink();
 * sink.pushAscii("ya");
 * sink.pushByte(0x21);
 * sink.take(); // Uint8Array [0x79, 0x61, 0x21]
 * ```
 */
export class ByteSink {
  #bytes = new Uint8Array(INITIAL_CAPACITY);
  #length = 0;

  #reserve(extra: number): void {
    const needed = this.#length + extra;
    if (needed <= this.#bytes.length) {
      return;
    }
    let capacity = this.#bytes.length * 2;
    while (capacity < needed) {
      capacity *= 2;
    }
    const grown = new Uint8Array(capacity);
    grown.set(this.#bytes.subarray(0, this.#length));
    this.#bytes = grown;
  }

  pushByte(byte: number): void {
    this.#reserve(1);
    this.#bytes[this.#length++] = byte;
  }

  /** Appends a string whose characters are all below U+0080. */
  pushAscii(text: string): void {
    this.#reserve(text.length);
    for (let i = 0; i < text.length; i++) {
      this.#bytes[this.#length++] = text.charCodeAt(i);
    }
  }

  /**
   * Returns the collected bytes and empties the buffer.
   * The returned array is never written to again.
   */
  take(): Uint8Array {
    const result = this.#bytes.slice(0, this.#length);
    this.#length = 0;
    return result;
  }
}

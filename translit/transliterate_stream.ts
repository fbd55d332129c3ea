// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Web Streams adapters around {@linkcode Transliterator}.
 *
 * @module
 */

import type { TransliterateOptions } from "./types.ts";
import { Transliterator } from "./transliterator.ts";

export type { TransliterateOptions } from "./types.ts";

const HIGH_SURROGATE_MIN = 0xd800;
const HIGH_SURROGATE_MAX = 0xdbff;

/**
 * Transforms a stream of UTF-8 bytes into its transliteration.
 *
 * Chunk boundaries may fall anywhere, including inside a multi-byte character
 * or between a letter and its combining mark. Output chunks are emitted as soon
 * as they are final; empty results are not enqueued.
 *
 * @example Usage
 * ```ts ignore
 * import { TransliterateStream } from "translit-stream/transliterate-stream";
 * import { Readable, Writable } from "node:stream";
 *
 * await Readable.toWeb(process.stdin)
 *   .pipeThrough(new TransliterateStream())
 *   .pipeTo(Writable.toWeb(process.stdout));
 * ```
 */
export class TransliterateStream extends TransformStream<Uint8Array, Uint8Array> {
  /**
   * Constructs a new TransliterateStream.
   *
   * @param options Table and casing options.
   */
  constructor(options: TransliterateOptions = {}) {
    const transliterator = new Transliterator(options);

    super({
      transform(chunk, controller) {
        const output = transliterator.pushChunk(chunk);
        if (output.length > 0) {
          controller.enqueue(output);
        }
      },
      flush(controller) {
        const output = transliterator.finalize();
        if (output.length > 0) {
          controller.enqueue(output);
        }
      },
    });
  }
}

/**
 * Transforms a stream of strings into their transliteration.
 *
 * Strings are encoded as UTF-8 before matching, and the output is decoded
 * incrementally, so a pass-through character whose bytes leave in two
 * different output chunks is still decoded intact. A chunk ending in a high
 * surrogate keeps it back until the next chunk supplies the low half.
 *
 * @example Usage
 * ```ts
 * import { TransliterateTextStream } from "translit-stream/transliterate-stream";
 *
 * const stream = new ReadableStream<string>({
 *   start(controller) {
 *     controller.enqueue("Μιλάω ");
 *     controller.enqueue("ελληνικά");
 *     controller.close();
 *   },
 * }).pipeThrough(new TransliterateTextStream());
 *
 * for await (const text of stream) {
 *   console.log(text); // "Milao ", "ellinika"
 * }
 * ```
 */
export class TransliterateTextStream extends TransformStream<string, string> {
  /**
   * Constructs a new TransliterateTextStream.
   *
   * @param options Table and casing options.
   */
  constructor(options: TransliterateOptions = {}) {
    const transliterator = new Transliterator(options);
    const encoder = new TextEncoder();
    const decoder = new TextDecoder();
    // High surrogate left at the end of the previous chunk.
    let carry = "";

    super({
      transform(chunk, controller) {
        let input = carry + chunk;
        carry = "";
        const last = input.charCodeAt(input.length - 1);
        if (last >= HIGH_SURROGATE_MIN && last <= HIGH_SURROGATE_MAX) {
          carry = input.slice(-1);
          input = input.slice(0, -1);
        }
        const text = decoder.decode(
          transliterator.pushChunk(encoder.encode(input)),
          { stream: true },
        );
        if (text.length > 0) {
          controller.enqueue(text);
        }
      },
      flush(controller) {
        let text = decoder.decode(
          transliterator.pushChunk(encoder.encode(carry)),
          { stream: true },
        );
        carry = "";
        text += decoder.decode(transliterator.finalize());
        if (text.length > 0) {
          controller.enqueue(text);
        }
      },
    });
  }
}

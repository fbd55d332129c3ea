// Copyright 2018-2026 the Deno authors. MIT license.

import { expect, test } from "vitest";
import {
  TransliterateStream,
  TransliterateTextStream,
} from "./transliterate_stream.ts";
import { buildTrie } from "./_trie.ts";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** Helper to build a stream from a fixed list of chunks. */
function streamOf<T>(chunks: readonly T[]): ReadableStream<T> {
  return new ReadableStream<T>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(chunk);
      }
      controller.close();
    },
  });
}

/** Helper to collect every chunk a stream yields. */
async function collect<T>(stream: ReadableStream<T>): Promise<T[]> {
  const reader = stream.getReader();
  const chunks: T[] = [];
  for (;;) {
    const { done, value } = await reader.read();
    if (done) {
      return chunks;
    }
    chunks.push(value);
  }
}

// =============================================================================
// TransliterateStream
// =============================================================================

test("TransliterateStream handles a character split across chunks", async () => {
  const bytes = encoder.encode("Μιλάω ελληνικά");
  const split = encoder.encode("Μιλάω ").length + 1;

  const chunks = await collect(
    streamOf([bytes.subarray(0, split), bytes.subarray(split)])
      .pipeThrough(new TransliterateStream()),
  );

  expect(chunks.map((chunk) => decoder.decode(chunk))).toEqual([
    "Milao ",
    "ellinika",
  ]);
});

test("TransliterateStream emits held output on flush", async () => {
  const chunks = await collect(
    streamOf([encoder.encode("Я")]).pipeThrough(new TransliterateStream()),
  );

  expect(chunks.map((chunk) => decoder.decode(chunk))).toEqual(["Ya"]);
});

test("TransliterateStream skips empty results", async () => {
  const chunks = await collect(
    streamOf([
      new Uint8Array(),
      encoder.encode("ab"),
      new Uint8Array(),
      encoder.encode("cd"),
    ]).pipeThrough(
      new TransliterateStream({ table: buildTrie({ "abcd": "y" }) }),
    ),
  );

  expect(chunks.map((chunk) => decoder.decode(chunk))).toEqual(["y"]);
});

test("TransliterateStream passes options through", async () => {
  const chunks = await collect(
    streamOf([encoder.encode("ЩИ")]).pipeThrough(
      new TransliterateStream({ normalizeCapitalization: false }),
    ),
  );

  expect(chunks.map((chunk) => decoder.decode(chunk))).toEqual(["Sch", "I"]);
});

// =============================================================================
// TransliterateTextStream
// =============================================================================

test("TransliterateTextStream transliterates string chunks", async () => {
  const chunks = await collect(
    streamOf(["¿Ad", "ónde?"]).pipeThrough(new TransliterateTextStream()),
  );

  expect(chunks).toEqual(["¿Ad", "onde?"]);
});

test("TransliterateTextStream settles ALL-CAPS across chunks", async () => {
  const chunks = await collect(
    streamOf(["Я ", "ЩЕКОЧУ"]).pipeThrough(new TransliterateTextStream()),
  );

  expect(chunks.join("")).toBe("YA SCHEKOCHU");
  expect(chunks[0]).toBe("YA SCHEKOCHU");
});

test("TransliterateTextStream yields nothing for empty input", async () => {
  const chunks = await collect(
    streamOf<string>([]).pipeThrough(new TransliterateTextStream()),
  );

  expect(chunks).toEqual([]);
});

test("TransliterateTextStream handles a surrogate pair split across chunks", async () => {
  const chunks = await collect(
    streamOf(["Я \uD83D", "\uDE00"]).pipeThrough(new TransliterateTextStream()),
  );

  expect(chunks).toEqual(["Ya \u{1F600}"]);
});

test("TransliterateTextStream flushes a lone trailing high surrogate", async () => {
  const chunks = await collect(
    streamOf(["a\uD83D"]).pipeThrough(new TransliterateTextStream()),
  );

  expect(chunks).toEqual(["a\uFFFD"]);
});

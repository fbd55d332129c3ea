// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal module holding the built-in transliteration table.
 *
 * @module
 */

import type { TransliterationTable } from "./types.ts";
import { buildTrie } from "./_trie.ts";
import entries from "./_xlat_entries.json";

/**
 * Table used when no `table` option is given. Built once per process from the
 * bundled correspondence list and shared by every transliterator.
 *
 * Covers Russian, Ukrainian and Belarusian Cyrillic; modern Greek, including
 * accented vowels and the common vowel digraphs; Polish, Czech, Romanian,
 * German, Scandinavian and Romance accented letters, both precomposed and as a
 * base letter followed by a combining mark; typographic quotes.
 */
export const DEFAULT_TABLE: TransliterationTable = buildTrie(entries);

/**
 * Identifier extraction from Semantic Scholar citation URLs.
 */

import type { PaperId } from "./types.js";

/** Regex to extract a numeric corpus ID, e.g. "CorpusID:215416146" */
const CORPUS_ID_PATTERN = /CorpusID:(\d+)/;

/** Regex to extract a 40-char hex paper ID from a URL path segment */
const SHA_PATH_PATTERN = /\/([a-f0-9]{40})(?:\?|$)/;

/** Citation URLs recognised when scanning a whole file */
const CORPUS_URL_PATTERN = /https:\/\/api\.semanticscholar\.org\/CorpusID:\d+/g;

/**
 * Extract only the corpus ID form from a URL.
 * E.g., "https://api.semanticscholar.org/CorpusID:12345" → { kind: "corpus", value: "12345" }
 */
export function extractCorpusId(url: string): PaperId | null {
  const match = CORPUS_ID_PATTERN.exec(url);
  const digits = match?.[1 as number];
  return digits ? { kind: "corpus", value: digits } : null;
}

/**
 * Extract a paper identifier from a URL.
 * The corpus ID form takes priority over a hex path segment.
 */
export function extractPaperId(url: string): PaperId | null {
  const corpusId = extractCorpusId(url);
  if (corpusId) return corpusId;

  const match = SHA_PATH_PATTERN.exec(url);
  const sha = match?.[1 as number];
  return sha ? { kind: "sha", value: sha } : null;
}

/**
 * Find every Semantic Scholar corpus URL in a block of text,
 * in order of appearance. Duplicates are kept.
 */
export function findCorpusUrls(content: string): string[] {
  return Array.from(content.matchAll(CORPUS_URL_PATTERN), (m) => m[0]);
}


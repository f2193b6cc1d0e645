/**
 * Shared type definitions for DOI resolution.
 */

/**
 * A paper identifier extracted from a citation URL.
 * - corpus: Semantic Scholar numeric corpus ID
 * - sha: 40-character lowercase hex paper ID
 */
export type PaperId = { kind: "corpus"; value: string } | { kind: "sha"; value: string };

/**
 * Result of resolving one paper to its DOI.
 * Only "resolved" carries a DOI; every other kind is a skipped item.
 */
export type ResolutionOutcome =
  | { kind: "resolved"; paperId: PaperId; doi: string }
  | { kind: "rate-limited"; paperId: PaperId }
  | { kind: "not-found"; paperId: PaperId }
  | { kind: "http-error"; paperId: PaperId; status: number; statusText: string }
  | { kind: "transport-error"; paperId: PaperId; error: string }
  | { kind: "no-doi"; paperId: PaperId }
  | { kind: "unextractable"; url: string };

export type OutcomeKind = ResolutionOutcome["kind"];

/** Where progress lines and diagnostics are written. Defaults to `console`. */
export type Logger = Pick<Console, "log" | "error">;

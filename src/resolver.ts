/**
 * Semantic Scholar DOI resolver.
 * Looks up a paper's external identifiers via the Graph API.
 *
 * API: https://api.semanticscholar.org/graph/v1/paper/CorpusId:{id}?fields=externalIds
 * Auth: optional x-api-key header
 * Rate limit: shared pool without a key, per-key allowance with one
 */

import { z } from "zod";
import { extractPaperId } from "./extract.js";
import type { Logger, PaperId, ResolutionOutcome } from "./types.js";

export const DEFAULT_API_URL = "https://api.semanticscholar.org/graph/v1";

export interface ResolveOptions {
  /** Semantic Scholar API key, sent as x-api-key when present */
  apiKey?: string | undefined;
  /** Graph API base URL (default: DEFAULT_API_URL) */
  baseUrl?: string | undefined;
  logger?: Logger | undefined;
}

/** Paper response shape; only externalIds is requested */
const paperResponseSchema = z.object({
  externalIds: z
    .object({
      DOI: z.string().nullish(),
    })
    .passthrough()
    .nullish(),
});

/**
 * Build the Graph API URL for a paper.
 * Corpus IDs use the "CorpusId:" prefix; hex IDs are addressed directly.
 * Trailing slashes on the base URL are dropped.
 */
export function buildPaperUrl(paperId: PaperId, baseUrl: string = DEFAULT_API_URL): string {
  const key = paperId.kind === "corpus" ? `CorpusId:${paperId.value}` : paperId.value;
  const params = new URLSearchParams({ fields: "externalIds" });
  return `${baseUrl.replace(/\/+$/, "")}/paper/${key}?${params.toString()}`;
}

/** Human-readable line for an outcome, as printed during a run. */
export function describeOutcome(outcome: ResolutionOutcome): string {
  switch (outcome.kind) {
    case "resolved":
      return `DOI: ${outcome.doi}`;
    case "rate-limited":
      return `Rate limit reached for paper ID ${outcome.paperId.value}. Consider adding API key or increasing delay.`;
    case "not-found":
      return `Paper not found for ID ${outcome.paperId.value}`;
    case "http-error":
      return `HTTP error for paper ID ${outcome.paperId.value}: HTTP ${outcome.status} ${outcome.statusText}`;
    case "transport-error":
      return `Error fetching data for paper ID ${outcome.paperId.value}: ${outcome.error}`;
    case "no-doi":
      return `No DOI found for paper ID: ${outcome.paperId.value}`;
    case "unextractable":
      return `Could not extract paper ID from URL: ${outcome.url}`;
  }
}

/** The DOI carried by an outcome, or null for any failure kind. */
export function doiOf(outcome: ResolutionOutcome): string | null {
  return outcome.kind === "resolved" ? outcome.doi : null;
}

async function fetchPaperOutcome(
  paperId: PaperId,
  options: ResolveOptions
): Promise<ResolutionOutcome> {
  const headers: Record<string, string> = {};
  if (options.apiKey) headers["x-api-key"] = options.apiKey;

  const response = await fetch(buildPaperUrl(paperId, options.baseUrl), { headers });

  if (response.status === 429) return { kind: "rate-limited", paperId };

  if (!response.ok) {
    if (response.status === 404) return { kind: "not-found", paperId };
    return {
      kind: "http-error",
      paperId,
      status: response.status,
      statusText: response.statusText,
    };
  }

  const parsed = paperResponseSchema.safeParse(await response.json());
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
      .join("; ");
    return { kind: "transport-error", paperId, error: `Malformed response: ${issues}` };
  }

  const doi = parsed.data.externalIds?.DOI;
  return doi ? { kind: "resolved", paperId, doi } : { kind: "no-doi", paperId };
}

/**
 * Resolve a paper to its DOI.
 * Never rejects: every failure becomes a tagged outcome and is logged once.
 */
export async function resolvePaperDoi(
  paperId: PaperId,
  options: ResolveOptions = {}
): Promise<ResolutionOutcome> {
  let outcome: ResolutionOutcome;
  try {
    outcome = await fetchPaperOutcome(paperId, options);
  } catch (err) {
    outcome = {
      kind: "transport-error",
      paperId,
      error: err instanceof Error ? err.message : String(err),
    };
  }

  if (outcome.kind !== "resolved") {
    (options.logger ?? console).log(describeOutcome(outcome));
  }
  return outcome;
}

/**
 * Resolve a citation URL in one step: extract the paper ID, then look it up.
 * URLs without a recognisable ID are reported as "unextractable" and never fetched.
 */
export async function resolveUrl(
  url: string,
  options: ResolveOptions = {}
): Promise<ResolutionOutcome> {
  const paperId = extractPaperId(url);
  if (!paperId) {
    const outcome: ResolutionOutcome = { kind: "unextractable", url };
    (options.logger ?? console).log(describeOutcome(outcome));
    return outcome;
  }
  return resolvePaperDoi(paperId, options);
}

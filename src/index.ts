/**
 * # corpus-doi-resolver
 *
 * Resolve Semantic Scholar corpus IDs found in citation files to DOIs.
 *
 * ## Workflow
 *
 * 1. **Extract** — Find `https://api.semanticscholar.org/CorpusID:<n>` URLs in a text file.
 * 2. **Resolve** — Look up each paper's `externalIds.DOI` via the Graph API, one request at a time.
 * 3. **Write** — Print the DOIs and save them, comma-separated, to `dois_output.txt`.
 *
 * ## Quick Example
 *
 * ```typescript
 * import { processFile, writeDoiList, loadConfig } from "corpus-doi-resolver";
 *
 * const config = loadConfig();
 * const dois = await processFile("citations.txt", {
 *   apiKey: config.apiKey,
 *   baseUrl: config.apiUrl,
 * });
 * if (dois.length > 0) await writeDoiList("dois_output.txt", dois);
 * ```
 *
 * ## Configuration
 *
 * - **API_KEY** (optional): Semantic Scholar API key. Without it requests are spaced 3 s apart instead of 1.5 s.
 * - **S2_API_URL** (optional): Graph API base URL. Default: `https://api.semanticscholar.org/graph/v1`.
 *
 * @module corpus-doi-resolver
 */

// === Extraction ===
export { extractCorpusId, extractPaperId, findCorpusUrls } from "./extract.js";

// === Resolution ===
export {
  buildPaperUrl,
  DEFAULT_API_URL,
  describeOutcome,
  doiOf,
  resolvePaperDoi,
  resolveUrl,
} from "./resolver.js";
export type { ResolveOptions } from "./resolver.js";

// === Pacing ===
export {
  ANONYMOUS_DELAY_MS,
  defaultPacer,
  fixedIntervalPacer,
  immediatePacer,
  KEYED_DELAY_MS,
} from "./pacing.js";
export type { Pacer, Sleep } from "./pacing.js";

// === Processing & Output ===
export { processFile } from "./processor.js";
export type { ProcessOptions, ProcessProgress } from "./processor.js";
export { DEFAULT_OUTPUT_FILE, formatDoiList, writeDoiList } from "./output.js";

// === Configuration & CLI ===
export { ConfigError, loadConfig, loadDotenv } from "./config.js";
export type { ResolverConfig } from "./config.js";
export { main } from "./cli.js";
export type { MainOptions } from "./cli.js";

// === Types ===
export type { Logger, OutcomeKind, PaperId, ResolutionOutcome } from "./types.js";

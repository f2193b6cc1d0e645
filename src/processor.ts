/**
 * Citation file processor.
 * Finds corpus URLs in a file and resolves them one by one, pausing between requests.
 */

import { readFile } from "node:fs/promises";
import { extractCorpusId, findCorpusUrls } from "./extract.js";
import { defaultPacer, type Pacer } from "./pacing.js";
import { describeOutcome, resolvePaperDoi } from "./resolver.js";
import type { Logger, ResolutionOutcome } from "./types.js";

export interface ProcessProgress {
  completed: number;
  total: number;
  url: string;
  outcome: ResolutionOutcome;
}

export interface ProcessOptions {
  /** Semantic Scholar API key; also selects the default pacing interval */
  apiKey?: string | undefined;
  /** Graph API base URL */
  baseUrl?: string | undefined;
  /** Delay policy between requests (default: defaultPacer(apiKey)) */
  pacer?: Pacer | undefined;
  logger?: Logger | undefined;
  onProgress?: ((progress: ProcessProgress) => void) | undefined;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Resolve a single discovered URL, without pausing. */
async function processUrl(
  url: string,
  options: ProcessOptions,
  logger: Logger
): Promise<ResolutionOutcome> {
  const paperId = extractCorpusId(url);
  if (!paperId) {
    const outcome: ResolutionOutcome = { kind: "unextractable", url };
    logger.log(describeOutcome(outcome));
    return outcome;
  }

  return resolvePaperDoi(paperId, {
    apiKey: options.apiKey,
    baseUrl: options.baseUrl,
    logger,
  });
}

/**
 * Resolve every Semantic Scholar corpus URL in a citations file to a DOI.
 * URLs are processed sequentially in file order; failed items are skipped.
 *
 * @returns DOIs in the order their URLs appear; empty if the file cannot be read
 */
export async function processFile(path: string, options: ProcessOptions = {}): Promise<string[]> {
  const logger = options.logger ?? console;
  const pacer = options.pacer ?? defaultPacer(options.apiKey);
  const dois: string[] = [];

  try {
    const content = await readFile(path, "utf-8");
    const urls = findCorpusUrls(content);

    logger.log(`Found ${urls.length} Semantic Scholar URLs to process`);

    for (const [index, url] of urls.entries()) {
      const position = index + 1;
      logger.log(`Processing URL ${position}/${urls.length}: ${url}`);

      const outcome = await processUrl(url, options, logger);
      if (outcome.kind === "resolved") {
        dois.push(outcome.doi);
        logger.log(`  -> DOI: ${outcome.doi}`);
      }

      options.onProgress?.({ completed: position, total: urls.length, url, outcome });

      if (position < urls.length) {
        await pacer.pause(outcome);
      }
    }
  } catch (err) {
    if (isMissingFile(err)) {
      logger.error(`Error: File '${path}' not found`);
    } else {
      logger.error(`Error processing file: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return dois;
}

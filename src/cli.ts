/**
 * Command-line workflow: citations file in, DOI list out.
 */

import { loadConfig, loadDotenv } from "./config.js";
import { DEFAULT_OUTPUT_FILE, formatDoiList, writeDoiList } from "./output.js";
import type { Pacer } from "./pacing.js";
import { processFile } from "./processor.js";
import type { Logger } from "./types.js";

export interface MainOptions {
  /** Environment to read configuration from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Load .env into process.env before reading configuration (default: true) */
  loadDotenv?: boolean;
  logger?: Logger;
  pacer?: Pacer;
  /** Where the DOI list is written (default: dois_output.txt in the working directory) */
  outputPath?: string;
}

function warnMissingApiKey(logger: Logger): void {
  logger.log("Warning: API_KEY not found in environment variables");
  logger.log("The program will run without an API key, but may face severe rate limiting.");
  logger.log("To get better performance, create a .env file with API_KEY=your_key_here");
  logger.log("Get your free API key at: https://www.semanticscholar.org/product/api");
  logger.log("\nContinuing without API key...\n");
}

/**
 * Resolve the citations file named by the first argument and report the DOIs found.
 *
 * @throws When no citations file argument is given
 */
export async function main(argv: string[], options: MainOptions = {}): Promise<string[]> {
  const logger = options.logger ?? console;

  if (options.loadDotenv ?? true) loadDotenv();
  const config = loadConfig(options.env ?? process.env);

  if (!config.apiKey) warnMissingApiKey(logger);

  const citationsFile = argv[0 as number];
  if (citationsFile === undefined) {
    throw new Error("Missing required argument: path to citations file");
  }

  const dois = await processFile(citationsFile, {
    apiKey: config.apiKey,
    baseUrl: config.apiUrl,
    pacer: options.pacer,
    logger,
  });

  logger.log(`\nFound ${dois.length} DOIs:`);
  if (dois.length > 0) {
    logger.log(formatDoiList(dois));

    const outputPath = options.outputPath ?? DEFAULT_OUTPUT_FILE;
    await writeDoiList(outputPath, dois);
    logger.log(`\nDOIs also saved to ${outputPath}`);
  } else {
    logger.log("No DOIs were found.");
  }

  return dois;
}

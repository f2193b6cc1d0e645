/**
 * DOI list formatting and persistence.
 */

import { writeFile } from "node:fs/promises";

export const DEFAULT_OUTPUT_FILE = "dois_output.txt";

/** Join DOIs with ", " */
export function formatDoiList(dois: string[]): string {
  return dois.join(", ");
}

/** Write the joined DOI list, replacing any existing file. No trailing newline. */
export async function writeDoiList(path: string, dois: string[]): Promise<void> {
  await writeFile(path, formatDoiList(dois), "utf-8");
}

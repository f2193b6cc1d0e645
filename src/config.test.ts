import { randomUUID } from "node:crypto";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, loadConfig, loadDotenv } from "./config.js";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      apiUrl: "https://api.semanticscholar.org/graph/v1",
    });
  });

  it("reads the API key", () => {
    expect(loadConfig({ API_KEY: "test-key" }).apiKey).toBe("test-key");
  });

  it("treats a blank API key as absent", () => {
    const config = loadConfig({ API_KEY: "   " });
    expect(config.apiKey).toBeUndefined();
    expect("apiKey" in config).toBe(false);
  });

  it("reads a custom API URL", () => {
    expect(loadConfig({ S2_API_URL: "http://localhost:9000/graph/v1" }).apiUrl).toBe(
      "http://localhost:9000/graph/v1"
    );
  });

  it("falls back to the default API URL when it is blank", () => {
    expect(loadConfig({ S2_API_URL: "" }).apiUrl).toBe("https://api.semanticscholar.org/graph/v1");
    expect(loadConfig({ S2_API_URL: "  " }).apiUrl).toBe(
      "https://api.semanticscholar.org/graph/v1"
    );
  });

  it("rejects an invalid API URL", () => {
    expect(() => loadConfig({ S2_API_URL: "not a url" })).toThrow(ConfigError);
  });

  it("lists each issue by variable name", () => {
    try {
      loadConfig({ S2_API_URL: "not a url" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0]).toMatch(/^S2_API_URL: /);
      }
    }
  });
});

describe("loadDotenv", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `doi-config-test-${Date.now()}-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    delete process.env["DOI_RESOLVER_TEST_FROM_FILE"];
    delete process.env["DOI_RESOLVER_TEST_PRESET"];
    await rm(testDir, { recursive: true, force: true });
  });

  it("loads variables from a .env file", async () => {
    const path = join(testDir, ".env");
    await writeFile(path, "DOI_RESOLVER_TEST_FROM_FILE=from-file\n", "utf-8");

    loadDotenv(path);

    expect(process.env["DOI_RESOLVER_TEST_FROM_FILE"]).toBe("from-file");
  });

  it("keeps variables already set in the environment", async () => {
    const path = join(testDir, ".env");
    await writeFile(path, "DOI_RESOLVER_TEST_PRESET=from-file\n", "utf-8");
    process.env["DOI_RESOLVER_TEST_PRESET"] = "from-env";

    loadDotenv(path);

    expect(process.env["DOI_RESOLVER_TEST_PRESET"]).toBe("from-env");
  });
});

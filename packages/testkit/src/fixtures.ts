import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

/**
 * Read a fixture file relative to the calling module.
 *
 * @example
 * ```ts
 * const text = readFixture(import.meta.url, "fixtures/scenarios.json");
 * ```
 */
export function readFixture(baseUrl: string | URL, relativePath: string): string {
  const url = new URL(relativePath, baseUrl);
  return readFileSync(fileURLToPath(url), "utf8");
}

/** Parse a JSON fixture. The result is `unknown`; narrow it in the test. */
export function readJsonFixture(baseUrl: string | URL, relativePath: string): unknown {
  const text = readFixture(baseUrl, relativePath);
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new Error(`readJsonFixture: ${relativePath} is not valid JSON`, { cause: err });
  }
}

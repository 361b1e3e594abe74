/**
 * Golden Test Helpers
 *
 * Utilities for loading and running golden test fixtures. A fixture is a JSON
 * file holding a comprehension and either the expected desugared text or the
 * expected error code.
 */

import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { deserializeComprehension, isRecord } from "../../src/ast-json";
import { unparse } from "../../src/codegen";
import { desugar } from "../../src/desugar";

// =============================================================================
// Types
// =============================================================================

export interface GoldenFixture {
  name: string;
  description: string;
  comprehension: unknown;
  layout: "inline" | "chain";
  /** Expected desugared text */
  expected?: string | undefined;
  /** Expected error code */
  expectedError?: string | undefined;
}

export type GoldenOutcome = { ok: true; text: string } | { ok: false; code: string; message: string };

// =============================================================================
// Fixture Loading
// =============================================================================

const FIXTURES_DIR = fileURLToPath(new URL("./fixtures", import.meta.url));

function optionalString(data: Record<string, unknown>, key: string): string | undefined {
  const value = data[key];
  return typeof value === "string" ? value : undefined;
}

export function loadFixture(fileName: string): GoldenFixture {
  const data: unknown = JSON.parse(readFileSync(join(FIXTURES_DIR, fileName), "utf8"));
  if (!isRecord(data) || !("comprehension" in data)) {
    throw new Error(`fixture ${fileName} has no comprehension`);
  }

  const expected = optionalString(data, "expected");
  const expectedError = optionalString(data, "expectedError");
  if ((expected === undefined) === (expectedError === undefined)) {
    throw new Error(`fixture ${fileName} needs exactly one of "expected" and "expectedError"`);
  }

  return {
    name: fileName.replace(/\.json$/, ""),
    description: optionalString(data, "description") ?? "",
    comprehension: data.comprehension,
    layout: data.layout === "chain" ? "chain" : "inline",
    expected,
    expectedError,
  };
}

export function loadFixtures(): GoldenFixture[] {
  return readdirSync(FIXTURES_DIR)
    .filter((file) => file.endsWith(".json"))
    .sort()
    .map(loadFixture);
}

// =============================================================================
// Running
// =============================================================================

export function runFixture(fixture: GoldenFixture): GoldenOutcome {
  const parsed = deserializeComprehension(fixture.comprehension, { file: `${fixture.name}.json` });
  if (!parsed.value) {
    const [first] = parsed.errors;
    return { ok: false, code: first?.code ?? "", message: first?.message ?? "" };
  }

  const result = desugar(parsed.value);
  if (!result.ok) {
    return { ok: false, code: result.error.code, message: result.error.message };
  }

  return { ok: true, text: unparse(result.value, { layout: fixture.layout }) };
}

#!/usr/bin/env -S npx tsx
/**
 * fordesugar CLI
 *
 * Command-line interface for the comprehension desugarer. Input files hold
 * comprehensions in the AST-as-JSON format.
 */

import { parseArgs } from "node:util";
import { serializeExpr } from "./ast-json";
import type { RewriteTraceEvent } from "./desugar";
import { formatJson, formatPretty, formatSummary, type DesugarReport } from "./diagnostics";
import { desugarSource, type DriverOptions } from "./driver";
import { readSourceFile, type SourceFile } from "./utils/source";

// =============================================================================
// Version
// =============================================================================

const VERSION = "0.1.0";

// =============================================================================
// CLI Types
// =============================================================================

type Command = "desugar" | "check" | "help" | "version";
type EmitFormat = "text" | "json" | "ast";
type Layout = "inline" | "chain";

const EMIT_FORMATS: readonly EmitFormat[] = ["text", "json", "ast"];
const LAYOUTS: readonly Layout[] = ["inline", "chain"];

interface CliArgs {
  command: Command;
  files: string[];
  emit: EmitFormat;
  layout: Layout;
  keepMaps: boolean;
  maxClauses: number | undefined;
  trace: boolean;
  quiet: boolean;
  strict: boolean;
}

class UsageError extends Error {}

// =============================================================================
// Argument Parsing
// =============================================================================

function isEmitFormat(value: string): value is EmitFormat {
  return EMIT_FORMATS.some((f) => f === value);
}

function isLayout(value: string): value is Layout {
  return LAYOUTS.some((l) => l === value);
}

function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      emit: { type: "string", default: "text" },
      layout: { type: "string", default: "inline" },
      "keep-maps": { type: "boolean", default: false },
      "max-clauses": { type: "string" },
      trace: { type: "boolean", default: false },
      quiet: { type: "boolean", short: "q", default: false },
      strict: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
      version: { type: "boolean", short: "v", default: false },
    },
    allowPositionals: true,
  });

  const emit = values.emit ?? "text";
  if (!isEmitFormat(emit)) {
    throw new UsageError(`unknown emit format '${emit}' (expected ${EMIT_FORMATS.join(", ")})`);
  }

  const layout = values.layout ?? "inline";
  if (!isLayout(layout)) {
    throw new UsageError(`unknown layout '${layout}' (expected ${LAYOUTS.join(", ")})`);
  }

  let maxClauses: number | undefined;
  if (values["max-clauses"] !== undefined) {
    maxClauses = Number(values["max-clauses"]);
    if (!Number.isInteger(maxClauses) || maxClauses < 1) {
      throw new UsageError(`--max-clauses expects a positive integer, got '${values["max-clauses"]}'`);
    }
  }

  const [first, ...files] = positionals;
  let command: Command = "help";
  if (values.help) {
    command = "help";
  } else if (values.version) {
    command = "version";
  } else if (first === "desugar" || first === "check") {
    command = first;
  } else if (first !== undefined) {
    throw new UsageError(`unknown command '${first}'`);
  }

  return {
    command,
    files,
    emit,
    layout,
    keepMaps: values["keep-maps"] ?? false,
    maxClauses,
    trace: values.trace ?? false,
    quiet: values.quiet ?? false,
    strict: values.strict ?? false,
  };
}

function readArgs(): CliArgs | null {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    console.error(`error: ${reason}`);
    console.error("run 'fordesugar --help' for usage");
    return null;
  }
}

// =============================================================================
// Desugaring
// =============================================================================

function driverOptions(args: CliArgs, file: string): DriverOptions {
  return {
    strict: args.strict,
    unparse: { layout: args.layout },
    desugar: {
      elideRedundantMap: !args.keepMaps,
      ...(args.maxClauses !== undefined ? { maxClauses: args.maxClauses } : {}),
      ...(args.trace
        ? { trace: (event: RewriteTraceEvent) => console.error(`trace: ${file}: ${event.rule} @ clause ${event.index}`) }
        : {}),
    },
  };
}

async function loadFile(file: string): Promise<SourceFile | null> {
  try {
    return await readSourceFile(file);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    console.error(`error: could not read file '${file}': ${reason}`);
    return null;
  }
}

function printDiagnostics(report: DesugarReport, source: SourceFile, args: CliArgs): void {
  if (!args.quiet && report.diagnostics.length > 0) {
    console.log(formatPretty(report.diagnostics, source));
  }
}

// =============================================================================
// Commands
// =============================================================================

async function runDesugar(args: CliArgs): Promise<number> {
  if (args.files.length === 0) {
    console.error("error: no input files");
    return 1;
  }

  let exitCode = 0;
  const reports: DesugarReport[] = [];

  for (const file of args.files) {
    const source = await loadFile(file);
    if (!source) {
      exitCode = 1;
      continue;
    }

    const { report, tree } = desugarSource(source, driverOptions(args, file));
    reports.push(report);

    if (args.emit === "ast") {
      if (tree) {
        console.log(serializeExpr(tree));
      } else {
        printDiagnostics(report, source, args);
      }
    } else if (args.emit === "text") {
      printDiagnostics(report, source, args);
      if (report.output !== undefined) {
        console.log(report.output);
      }
    }

    if (report.status === "error") {
      exitCode = 1;
    }
  }

  if (args.emit === "json") {
    console.log(formatJson(reports.length === 1 && reports[0] ? reports[0] : reports));
  }

  return exitCode;
}

async function runCheck(args: CliArgs): Promise<number> {
  if (args.files.length === 0) {
    console.error("error: no input files");
    return 1;
  }

  let exitCode = 0;
  const reports: DesugarReport[] = [];

  for (const file of args.files) {
    const source = await loadFile(file);
    if (!source) {
      exitCode = 1;
      continue;
    }

    const { report } = desugarSource(source, driverOptions(args, file));
    reports.push(report);

    if (args.emit !== "json") {
      printDiagnostics(report, source, args);
      if (!args.quiet) {
        console.log(formatSummary(report));
      }
    }

    if (report.status === "error") {
      exitCode = 1;
    }
  }

  if (args.emit === "json") {
    console.log(formatJson(reports));
  }

  return exitCode;
}

function printHelp(): void {
  console.log(`
fordesugar - desugar for-comprehensions into map/flatMap/withFilter chains

USAGE:
  fordesugar <command> [options] <files>

COMMANDS:
  desugar <file>    Desugar comprehensions and print the result
  check <file>      Validate comprehensions without printing the result

OPTIONS:
  --emit <format>       Output format: text, json, ast (default: text)
  --layout <layout>     Text layout: inline, chain (default: inline)
  --keep-maps           Keep a final map that only rebuilds its binding
  --max-clauses <n>     Reject comprehensions with more than n clauses (default: 1000)
  --trace               Print every rewrite rule application to stderr
  -q, --quiet           Suppress non-error output
  --strict              Treat warnings as errors
  -h, --help            Print help
  -v, --version         Print version

EMIT FORMATS:
  text    Desugared tree as source text (default)
  json    Structured report with diagnostics and stats
  ast     Desugared tree as JSON

INPUT:
  Each file holds one comprehension as JSON:
    { "kind": "comprehension",
      "clauses": [{ "kind": "generator", "pattern": "a", "source": "xs" }],
      "yield": { "kind": "ident", "name": "a" } }

EXAMPLES:
  fordesugar desugar query.json
  fordesugar desugar query.json --layout=chain
  fordesugar desugar query.json --emit=ast > tree.json
  fordesugar check comprehensions/*.json --emit=json > report.json
`);
}

function printVersion(): void {
  console.log(`fordesugar ${VERSION}`);
}

// =============================================================================
// Main
// =============================================================================

async function main(): Promise<void> {
  const args = readArgs();
  if (!args) {
    process.exitCode = 2;
    return;
  }

  let exitCode = 0;

  switch (args.command) {
    case "help":
      printHelp();
      break;

    case "version":
      printVersion();
      break;

    case "desugar":
      exitCode = await runDesugar(args);
      break;

    case "check":
      exitCode = await runCheck(args);
      break;
  }

  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});

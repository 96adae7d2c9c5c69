// bin/idris-ide-cli-lib.ts
// Argument parsing and configuration for the idris-ide command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import type { IdeClientConfigOverrides } from "../src/core/config";
import type { RefineVariant } from "../src/core/interactive";
import type { Position } from "../src/ports";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export const CLI_COMMANDS = [
  "load",
  "type-of",
  "docs",
  "interpret",
  "case-split",
  "add-clause",
  "add-proof-clause",
  "add-missing",
  "make-with",
  "proof-search",
  "refine",
  "complete",
] as const;

export type CliCommand = (typeof CLI_COMMANDS)[number];

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  command?: string;
  file?: string;
  line?: string;
  column?: string;
  name?: string;
  expr?: string;
  hints?: string;
  variant?: string;
  config?: string;
  templates?: boolean;
  trace?: boolean;
};

export type CliConfig = {
  command: CliCommand;
  file?: string;
  cursor: Position;
  name?: string;
  expr?: string;
  hints?: string;
  variant: RefineVariant;
  configFile?: string;
  overrides: IdeClientConfigOverrides;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

const VALUE_FLAGS: Record<string, "line" | "column" | "name" | "expr" | "hints" | "variant" | "config"> = {
  "--line": "line",
  "-l": "line",
  "--column": "column",
  "-c": "column",
  "--name": "name",
  "-n": "name",
  "--expr": "expr",
  "-e": "expr",
  "--hints": "hints",
  "--variant": "variant",
  "--config": "config",
};

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    const valueKey = VALUE_FLAGS[arg];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--templates") {
      result.templates = true;
    } else if (arg === "--trace") {
      result.trace = true;
    } else if (valueKey) {
      result[valueKey] = args[++i] ?? "";
    } else if (!arg.startsWith("-")) {
      // Positionals: command, then file
      if (result.command === undefined) result.command = arg;
      else if (result.file === undefined) result.file = arg;
    }
    // Ignore unknown flags
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
idris-ide - Run one interactive editing command against a source file

USAGE:
  idris-ide <command> <file> [options]

COMMANDS:
  load                               Load the file and report errors
  type-of                            Show the type of the name at the cursor (or --name)
  docs --name <name>                 Show documentation for a name
  interpret --expr <expr> [file]     Evaluate an expression
  case-split                         Split the pattern variable at the cursor
  add-clause                         Add an initial clause for the declaration at the cursor
  add-proof-clause                   Add an initial proof clause
  add-missing                        Add the missing cases of the function at the cursor
  make-with                          Turn the clause at the cursor into a with block
  proof-search [--hints "a b"]       Fill the hole at the cursor
  refine [--variant <v>]             Refine the hole at the cursor by choosing identifiers
  complete                           List completions for the name ending at the cursor

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -l, --line <n>                     Cursor line, 1-based (default: 1)
  -c, --column <n>                   Cursor column, 0-based (default: 0)
  -n, --name <name>                  Explicit name for type-of and docs
  -e, --expr <expr>                  Expression for interpret
  --hints <names>                    Hints for proof-search, separated by spaces, commas or semicolons
  --variant plain|complete|recursive Refinement variant (default: plain)
  --templates                        Expand remaining holes as numbered template fields
  --trace                            Log protocol traffic to stderr
  --config <file>                    Read configuration from a JSON or YAML file

ENVIRONMENT:
  IDRIS_IDE_COMMAND, IDRIS_IDE_ARGS, IDRIS_IDE_TIMEOUT_MS,
  IDRIS_IDE_TEMPLATES, IDRIS_IDE_TRACE

EXAMPLES:
  idris-ide type-of Main.idr --line 12 --column 4
  idris-ide case-split Vect.idr -l 8 -c 10
  idris-ide refine Proofs.idr -l 20 -c 14 --variant recursive
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const pkgPath = path.join(path.dirname(fileURLToPath(import.meta.url)), "..", "package.json");
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    const version = typeof pkg === "object" && pkg !== null && "version" in pkg ? pkg.version : undefined;
    return `idris-ide v${typeof version === "string" ? version : "0.1.0"}`;
  } catch {
    return "idris-ide v0.1.0";
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

function isCliCommand(x: string): x is CliCommand {
  return CLI_COMMANDS.some((c) => c === x);
}

function isVariant(x: string): x is RefineVariant {
  return x === "plain" || x === "complete" || x === "recursive";
}

function parsePosition(value: string | undefined, flag: string, fallback: number, min: number): number {
  if (value === undefined) return fallback;
  if (!/^\d+$/.test(value) || parseInt(value, 10) < min) {
    throw new Error(`${flag} expects a whole number of at least ${min}, got "${value}"`);
  }
  return parseInt(value, 10);
}

/**
 * Validate parsed arguments into a runnable configuration.
 * Throws on usage errors.
 */
export function buildConfig(args: CliArgs): CliConfig {
  if (args.command === undefined) throw new Error("missing command");
  if (!isCliCommand(args.command)) throw new Error(`unknown command "${args.command}"`);
  const command = args.command;

  const needsFile = command !== "docs" && command !== "interpret";
  if (needsFile && args.file === undefined) throw new Error(`${command} needs a file`);
  if (command === "docs" && !args.name) throw new Error("docs needs --name");
  if (command === "interpret" && !args.expr) throw new Error("interpret needs --expr");

  const variant = args.variant ?? "plain";
  if (!isVariant(variant)) throw new Error(`unknown refine variant "${variant}"`);

  const overrides: IdeClientConfigOverrides = {};
  if (args.templates) overrides.editing = { templates: true };
  if (args.trace) overrides.trace = { enabled: true };

  return {
    command,
    file: args.file,
    cursor: {
      line: parsePosition(args.line, "--line", 1, 1),
      column: parsePosition(args.column, "--column", 0, 0),
    },
    name: args.name,
    expr: args.expr,
    hints: args.hints,
    variant,
    configFile: args.config,
    overrides,
  };
}

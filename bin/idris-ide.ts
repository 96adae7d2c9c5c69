#!/usr/bin/env npx tsx
// bin/idris-ide.ts
// Terminal host: run one interactive command against a file and write back any edit
//
// Run:  npx tsx bin/idris-ide.ts <command> <file> [options]

import * as path from "path";
import { parseCliArgs, getHelpText, getVersion, buildConfig, type CliConfig } from "./idris-ide-cli-lib";
import { IdeClient } from "../src/client";
import { loadConfig, validateConfig } from "../src/core/config";
import {
  ConsolePresentation,
  DiagnosticsStore,
  ProcessTransport,
  SnippetExpander,
  TextBuffer,
  consoleTraceSink,
  loggingConnection,
} from "../src/adapters";
import type { CompilerConnection } from "../src/ports";
import { silentTrace } from "../src/ports";
import type { Outcome } from "../src/outcome";
import { isDone } from "../src/outcome";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<number> {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(getHelpText());
    return 0;
  }
  if (cliArgs.version) {
    console.log(getVersion());
    return 0;
  }

  let cli: CliConfig;
  try {
    cli = buildConfig(cliArgs);
  } catch (error) {
    console.error(`idris-ide: ${error instanceof Error ? error.message : String(error)}`);
    console.error("Run idris-ide --help for usage.");
    return 2;
  }

  const config = loadConfig({ configFile: cli.configFile, overrides: cli.overrides });
  const validation = validateConfig(config);
  for (const warning of validation.warnings) console.error(`warning: ${warning}`);
  if (!validation.valid) {
    for (const error of validation.errors) console.error(`error: ${error}`);
    return 2;
  }

  const trace = config.trace.enabled ? consoleTraceSink() : silentTrace;
  const process_ = new ProcessTransport({
    ...config.compiler,
    onStderr: (text) => process.stderr.write(text),
  });
  const connection: CompilerConnection = config.trace.enabled ? loggingConnection(process_, trace) : process_;

  const diagnostics = new DiagnosticsStore();
  diagnostics.onAvailable((file, found) => {
    for (const d of found) {
      const where = d.range ? `${path.relative(process.cwd(), file)}:${d.range.start.line}:${d.range.start.column + 1}: ` : "";
      console.error(`${where}${d.severity}: ${d.message}`);
    }
  });

  const client = new IdeClient(
    {
      connection,
      presentation: new ConsolePresentation(),
      diagnostics,
      templates: new SnippetExpander(),
      trace,
    },
    config,
  );

  try {
    return await run(client, cli);
  } finally {
    client.dispose();
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════════

function exitCode(outcome: Outcome<unknown>): number {
  return isDone(outcome) ? 0 : 1;
}

async function run(client: IdeClient, cli: CliConfig): Promise<number> {
  if (cli.command === "docs") return exitCode(await client.docsFor(cli.name ?? ""));
  if (cli.command === "interpret" && cli.file === undefined) {
    return exitCode(await client.interpret(cli.expr ?? ""));
  }

  if (cli.file === undefined) return 2;
  // Edits are saved by the session before each load, and once more at the end.
  const buffer = await TextBuffer.fromFile(cli.file, { cursor: cli.cursor });
  const before = buffer.text;

  let outcome: Outcome<unknown>;
  switch (cli.command) {
    case "load":
      outcome = await client.load(buffer);
      break;
    case "interpret": {
      const loaded = await client.load(buffer);
      outcome = isDone(loaded) ? await client.interpret(cli.expr ?? "") : loaded;
      break;
    }
    case "type-of":
      outcome = await client.typeOf(buffer, cli.name);
      break;
    case "case-split":
      outcome = await client.caseSplit(buffer);
      break;
    case "add-clause":
      outcome = await client.addClause(buffer);
      break;
    case "add-proof-clause":
      outcome = await client.addProofClause(buffer);
      break;
    case "add-missing":
      outcome = await client.addMissing(buffer);
      break;
    case "make-with":
      outcome = await client.makeWith(buffer);
      break;
    case "proof-search":
      outcome = await client.proofSearch(buffer, cli.hints);
      break;
    case "refine":
      outcome = await client.refine(buffer, cli.variant);
      break;
    case "complete": {
      // Completion never starts the process itself.
      const loaded = await client.load(buffer);
      if (!isDone(loaded)) {
        outcome = loaded;
        break;
      }
      const completions = await client.completeAt(buffer, cli.cursor);
      if (isDone(completions) && completions.value) {
        for (const candidate of completions.value.candidates) console.log(candidate);
      }
      outcome = completions;
      break;
    }
  }

  if (buffer.text !== before) await buffer.save();
  return exitCode(outcome);
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error instanceof Error ? error.stack ?? error.message : String(error));
    process.exitCode = 1;
  },
);

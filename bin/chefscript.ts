#!/usr/bin/env npx tsx
// bin/chefscript.ts
// chefscript CLI - parse, build and run recipe programs
//
// Run:  npx tsx bin/chefscript.ts [options] <file>

import * as fs from "fs";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  buildConfig,
  summarizeProgram,
  type CliConfig,
} from "./chefscript-cli-lib";
import {
  ChefRuntime,
  allFailureLines,
  build,
  errorDiag,
  fail,
  failure,
  formatDiagnostic,
  warnDiag,
  loadConfig,
  parse,
  printProgram,
  validateConfig,
  type Fail,
} from "../src";
import { streamOutput, streamTrace } from "../src/adapters/console";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

function main(): number {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(getHelpText());
    return 0;
  }

  if (cliArgs.version) {
    console.log(getVersion());
    return 0;
  }

  if (cliArgs.errors.length > 0) {
    for (const e of cliArgs.errors) console.error(`Error: ${e}`);
    return 1;
  }

  const config = buildConfig(cliArgs);
  const source = readSource(config);
  if (source === undefined) {
    console.error(getHelpText());
    return 1;
  }

  return execute(config, source);
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTION
// ═══════════════════════════════════════════════════════════════════════════════

function readSource(config: CliConfig): string | undefined {
  if (config.code !== undefined) return config.code;
  if (config.file !== undefined) return fs.readFileSync(config.file, "utf8");
  return undefined;
}

function readInput(config: CliConfig): string {
  if (config.input !== undefined) return config.input;
  return process.stdin.isTTY ? "" : fs.readFileSync(0, "utf8");
}

function reportFailure(outcome: Fail): number {
  for (const line of allFailureLines(outcome.failure)) {
    console.error(line);
  }
  return 1;
}

function execute(config: CliConfig, source: string): number {
  const chefConfig = loadConfig({ configFile: config.configFile, overrides: config.overrides });
  const validation = validateConfig(chefConfig);
  if (!validation.valid) {
    const diagnostics = validation.errors.map((e) => errorDiag("CONFIG", e));
    return reportFailure(fail(failure("invalid-config", "Invalid configuration", { diagnostics })));
  }
  if (config.verbose) {
    for (const w of validation.warnings) console.error(formatDiagnostic(warnDiag("CONFIG", w)));
  }

  const parsed = parse(source, config.file);
  if (parsed.tag === "Fail") return reportFailure(parsed);

  if (config.mode === "print") {
    process.stdout.write(printProgram(parsed.value));
    return 0;
  }

  const program = build(parsed.value);
  if (program.tag === "Fail") return reportFailure(program);

  if (config.mode === "check") {
    for (const line of summarizeProgram(parsed.value, program.value)) console.log(line);
    return 0;
  }

  const runtime = new ChefRuntime(chefConfig);
  const result = runtime.run(program.value, {
    input: readInput(config),
    output: streamOutput(process.stdout),
    trace: config.trace ? streamTrace(process.stderr) : undefined,
  });

  if (process.stdout.isTTY) process.stdout.write("\n");
  if (config.verbose) {
    console.error(`${result.meta.steps ?? 0} steps in ${result.meta.durationMs ?? 0}ms`);
  }
  if (result.tag === "Fail") return reportFailure(result);
  return 0;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

try {
  process.exitCode = main();
} catch (error) {
  console.error("Fatal error:", error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}

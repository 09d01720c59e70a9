// bin/chefscript-cli-lib.ts
// Shared CLI utilities for the chefscript command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import type { ConfigOverrides } from "../src/core/config/config";
import type { ParsedRecipe, Program } from "../src/core/ast";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliMode = "run" | "check" | "print";

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  eval?: string;
  file?: string;
  input?: string;
  seed?: number;
  maxSteps?: number;
  config?: string;
  check?: boolean;
  print?: boolean;
  trace?: boolean;
  verbose?: boolean;
  /** Flags that were given a value they cannot take. */
  errors: string[];
};

export type CliConfig = {
  mode: CliMode;
  verbose: boolean;
  trace: boolean;
  code?: string;
  file?: string;
  input?: string;
  configFile?: string;
  overrides: ConfigOverrides;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

function intArg(flag: string, raw: string | undefined, errors: string[]): number | undefined {
  if (raw === undefined || !/^-?\d+$/.test(raw)) {
    errors.push(`${flag} expects an integer, got ${raw === undefined ? "nothing" : `"${raw}"`}`);
    return undefined;
  }
  return parseInt(raw, 10);
}

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { errors: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--eval" || arg === "-e") {
      result.eval = args[++i] ?? "";
    } else if (arg === "--input" || arg === "-i") {
      result.input = args[++i] ?? "";
    } else if (arg === "--seed") {
      result.seed = intArg(arg, args[++i], result.errors);
    } else if (arg === "--max-steps") {
      result.maxSteps = intArg(arg, args[++i], result.errors);
    } else if (arg === "--config" || arg === "-c") {
      result.config = args[++i];
    } else if (arg === "--check") {
      result.check = true;
    } else if (arg === "--print") {
      result.print = true;
    } else if (arg === "--trace") {
      result.trace = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (!arg.startsWith("-")) {
      // First non-flag argument is the file
      if (!result.file) {
        result.file = arg;
      }
    } else {
      result.errors.push(`Unknown option: ${arg}`);
    }
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
chefscript - run programs written as recipes

USAGE:
  chefscript [options] <file>         Parse, build and run a recipe file
  chefscript --eval <text>            Run recipe text given inline

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -e, --eval <text>                  Program text instead of a file
  -i, --input <tokens>               Numbers for "Take ... from refrigerator"
                                     (default: read from stdin when piped)
  --seed <n>                         Seed for "Mix ... well"
  --max-steps <n>                    Abort after n instructions (0 = no limit)
  -c, --config <file>                Config file (.json, .yaml, .yml)
  --check                            Parse and build only, print a summary
  --print                            Print the program in canonical form
  --trace                            Log run events to stderr
  --verbose                          Show config warnings and step counts

ENVIRONMENT:
  CHEF_MAX_STEPS, CHEF_MAX_CALL_DEPTH, CHEF_SEED, CHEF_TRACE_STEPS

EXAMPLES:
  chefscript hello.chef
  chefscript --input "5 3" sum.chef
  echo 10 | chefscript countdown.chef
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

const FALLBACK_VERSION = "chefscript v0.1.0";

export function getVersion(): string {
  try {
    const pkgPath = path.join(path.dirname(fileURLToPath(import.meta.url)), "..", "package.json");
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `chefscript v${pkg.version}`;
    }
    return FALLBACK_VERSION;
  } catch {
    return FALLBACK_VERSION;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// MODE DETECTION
// ═══════════════════════════════════════════════════════════════════════════════

export function detectMode(args: Pick<CliArgs, "check" | "print">): CliMode {
  if (args.check) return "check";
  if (args.print) return "print";
  return "run";
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

export function buildConfig(args: CliArgs): CliConfig {
  const runtime: NonNullable<ConfigOverrides["runtime"]> = {};
  if (args.seed !== undefined) runtime.seed = args.seed;
  if (args.maxSteps !== undefined) runtime.maxSteps = args.maxSteps;

  const config: CliConfig = {
    mode: detectMode(args),
    verbose: args.verbose ?? false,
    trace: args.trace ?? false,
    overrides: { runtime },
  };

  if (args.eval !== undefined) config.code = args.eval;
  if (args.file !== undefined) config.file = args.file;
  if (args.input !== undefined) config.input = args.input;
  if (args.config !== undefined) config.configFile = args.config;

  return config;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SUMMARIES
// ═══════════════════════════════════════════════════════════════════════════════

/** One line per recipe for --check. */
export function summarizeProgram(parsed: readonly ParsedRecipe[], program: Program): string[] {
  return parsed.map((p, i) => {
    const role = i === 0 ? "main" : "auxiliary";
    const recipe = [...program.recipes.values()][i];
    const loops = recipe.instructions.filter((ins) => ins.tag === "LoopStart").length;
    const serves = p.serves === undefined ? "" : `, serves ${p.serves}`;
    return `${p.title} (${role}): ${p.ingredients.length} ingredients, ${recipe.instructions.length} instructions, ${loops} loops${serves}`;
  });
}

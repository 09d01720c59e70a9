// src/runtime.ts
// ChefRuntime - parse, build and run recipe programs
//
// Usage:
//   import { ChefRuntime } from "chefscript";
//
//   const chef = new ChefRuntime();
//   const result = chef.cook(text, { input: [3] });
//   if (result.tag === "Done") console.log(result.value.output);

import type { ParsedRecipe, Program } from "./core/ast";
import type { ChefConfig } from "./core/config/config";
import type { Outcome } from "./outcome/outcome";
import type { RngPort } from "./ports/rng";
import type { OutputPort } from "./ports/sink";
import type { InputPort } from "./ports/source";
import type { ExecContext, TraceSink } from "./ports/types";

import { DEFAULT_CONFIG } from "./core/config/config";
import { parseRecipes } from "./core/reader/parse";
import { buildProgram } from "./core/program/build";
import { Runner } from "./core/eval/run";
import { attempt } from "./outcome/constructors";
import { flatMapOutcome } from "./outcome/matchers";
import { arrayInput, bufferOutput, mathRng, seededRng, tokenInput } from "./adapters/memory";
import { loggingInput, loggingOutput, loggingRng } from "./adapters/logging";
import { nullTrace } from "./ports/types";

/**
 * Input for "Take ... from refrigerator": a port, a list of numbers, or
 * whitespace-separated integer text.
 */
export type InputSource = InputPort | readonly (number | bigint)[] | string;

export type RunRequest = {
  input?: InputSource;
  /** Receives output as it is served, in addition to `RunOutput.output`. */
  output?: OutputPort;
  rng?: RngPort;
  trace?: TraceSink;
};

export type RunOutput = {
  /** Everything served during the run. */
  output: string;
  /** Instructions executed. */
  steps: number;
};

function toInputPort(source: InputSource | undefined): InputPort {
  if (source === undefined) return arrayInput([]);
  if (typeof source === "string") return tokenInput(source);
  if ("read" in source) return source;
  return arrayInput(source);
}

/** Parse program text. Fails with the first malformed line. */
export function parse(src: string, file?: string): Outcome<ParsedRecipe[]> {
  return attempt(() => parseRecipes(src, file));
}

/** Resolve loops and calls. Fails with the first structural error. */
export function build(parsed: readonly ParsedRecipe[]): Outcome<Program> {
  return attempt(() => buildProgram(parsed));
}

/**
 * Run the main recipe. Output already written when a run error occurs stays
 * written; it is not part of the Fail.
 */
export function run(program: Program, request: RunRequest = {}, config: ChefConfig = DEFAULT_CONFIG): Outcome<RunOutput> {
  const trace = request.trace ?? nullTrace;
  const ctx: ExecContext = { trace };

  const buffer = bufferOutput();
  const tee: OutputPort = {
    write(text, c) {
      buffer.write(text, c);
      request.output?.write(text, c);
    },
  };
  const rng = request.rng ?? (config.runtime.seed === undefined ? mathRng() : seededRng(config.runtime.seed));
  const ports = {
    input: loggingInput(toInputPort(request.input)),
    output: loggingOutput(tee),
    rng: loggingRng(rng),
  };

  const runner = new Runner(program, ports, ctx, {
    maxSteps: config.runtime.maxSteps,
    maxCallDepth: config.runtime.maxCallDepth,
    traceSteps: config.trace.steps,
  });

  const started = Date.now();
  return attempt(
    () => {
      const { steps } = runner.run();
      return { output: buffer.text(), steps };
    },
    () => ({ durationMs: Date.now() - started, steps: runner.stepCount })
  );
}

/**
 * Holds a configuration and chains the three stages.
 */
export class ChefRuntime {
  constructor(private readonly config: ChefConfig = DEFAULT_CONFIG) {}

  load(src: string, file?: string): Outcome<Program> {
    return flatMapOutcome(parse(src, file), build);
  }

  run(program: Program, request: RunRequest = {}): Outcome<RunOutput> {
    return run(program, request, this.config);
  }

  cook(src: string, request: RunRequest = {}, file?: string): Outcome<RunOutput> {
    return flatMapOutcome(this.load(src, file), (program) => this.run(program, request));
  }
}

/**
 * Parse, build and run in one go with the default configuration.
 */
export function cook(src: string, request: RunRequest = {}): Outcome<RunOutput> {
  return new ChefRuntime().cook(src, request);
}

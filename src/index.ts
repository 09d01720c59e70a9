// src/index.ts
// chefscript - Public API
//
// Clean interface for the CLI, editors and other embedders.

// ═══════════════════════════════════════════════════════════════════════════════
// CORE RUNTIME
// ═══════════════════════════════════════════════════════════════════════════════

export {
  ChefRuntime,
  parse,
  build,
  run,
  cook,
  type InputSource,
  type RunRequest,
  type RunOutput,
} from "./runtime";

// ═══════════════════════════════════════════════════════════════════════════════
// LANGUAGE
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  ArithmeticTag,
  CookingTime,
  Ingredient,
  IngredientKind,
  Instruction,
  InstructionTag,
  MethodStep,
  OvenTemperature,
  ParsedRecipe,
  PlainStatement,
  Program,
  Recipe,
  Statement,
} from "./core/ast";
export { recipeKey } from "./core/ast";
export type { Span } from "./core/meta";

export { parseRecipes } from "./core/reader/parse";
export { parseStatement } from "./core/reader/statement";
export { parseIngredient, measureKind } from "./core/reader/ingredient";
export { printStatement, printIngredient, printRecipe, printProgram } from "./core/reader/print";
export { buildProgram } from "./core/program/build";
export { loopKeyword, resolveLoops } from "./core/program/loops";

// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTION
// ═══════════════════════════════════════════════════════════════════════════════

export type { Value } from "./core/eval/values";
export { value, copyValue, liquefy, combine, renderValue } from "./core/eval/values";
export { Frame } from "./core/eval/frame";
export { Runner, runProgram, type RunOptions, type RunResult } from "./core/eval/run";

// ═══════════════════════════════════════════════════════════════════════════════
// PORTS & ADAPTERS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./ports";
export {
  arrayInput,
  tokenInput,
  bufferOutput,
  mathRng,
  seededRng,
  collectingTrace,
  type BufferedOutput,
  type CollectingTrace,
} from "./adapters/memory";
export { loggingInput, loggingOutput, loggingRng } from "./adapters/logging";
export { replayInput, replayRng } from "./adapters/replay";
export { streamOutput, streamTrace, formatTraceEvent } from "./adapters/console";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & CONFIG
// ═══════════════════════════════════════════════════════════════════════════════

export type { Outcome, Done, Fail, OutcomeMeta } from "./outcome/outcome";
export { isDone, isFail } from "./outcome/outcome";
export type { Failure, FailureReason } from "./outcome/failure";
export { failure, allDiagnostics, allFailureLines } from "./outcome/failure";
export type { Diagnostic, DiagnosticSeverity } from "./outcome/diagnostic";
export { errorDiag, warnDiag, formatDiagnostic } from "./outcome/diagnostic";
export { done, fail, attempt } from "./outcome/constructors";
export { DIAGNOSTIC_CODES, type DiagnosticCode } from "./outcome/codes";
export { ChefError } from "./outcome/error";
export { match, mapOutcome, flatMapOutcome, unwrap, unwrapOr } from "./outcome/matchers";

export * from "./core/config";

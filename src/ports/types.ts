import type { InstructionTag } from "../core/ast";

/**
 * Trace event types for run logging and replay.
 */
export type TraceEvent =
  | { tag: "E_InputRead"; id: string; value: bigint | null }
  | { tag: "E_OutputWrite"; id: string; text: string }
  | { tag: "E_RngRead"; id: string; value: number }
  | { tag: "E_RecipeEnter"; recipe: string; depth: number }
  | { tag: "E_RecipeExit"; recipe: string; depth: number; steps: number }
  | { tag: "E_Step"; recipe: string; depth: number; index: number; instruction: InstructionTag };

/**
 * Trace sink for logging events.
 */
export interface TraceSink {
  emit(event: TraceEvent): void;
}

/**
 * Execution context passed to all port operations.
 */
export interface ExecContext {
  /** Trace event sink */
  trace: TraceSink;
}

export const nullTrace: TraceSink = {
  emit: () => undefined,
};

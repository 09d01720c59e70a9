import type { OutputPort } from "../ports/sink";
import type { TraceEvent, TraceSink } from "../ports/types";

/** The part of a writable stream these adapters use. */
export type TextStream = { write(text: string): unknown };

/** Writes served output straight to a stream (stdout by default). */
export function streamOutput(stream: TextStream = process.stdout): OutputPort {
  return {
    write(text) {
      stream.write(text);
    },
  };
}

export function formatTraceEvent(event: TraceEvent): string {
  const { tag, ...fields } = event;
  const parts = Object.entries(fields).map(([k, v]) => `${k}=${typeof v === "bigint" ? v.toString() : JSON.stringify(v)}`);
  return [tag, ...parts].join(" ");
}

/** One line per trace event, stderr by default so it never mixes with served output. */
export function streamTrace(stream: TextStream = process.stderr): TraceSink {
  return {
    emit(event) {
      stream.write(`[trace] ${formatTraceEvent(event)}\n`);
    },
  };
}

import type { RngPort } from "../ports/rng";
import type { OutputPort } from "../ports/sink";
import type { InputPort } from "../ports/source";
import type { ExecContext } from "../ports/types";

let counter = 0;

function makeId(kind: string): string {
  return `${kind}:${++counter}`;
}

/**
 * Wrap input port with logging.
 */
export function loggingInput(inner: InputPort): InputPort {
  return {
    read(ctx: ExecContext): bigint | undefined {
      const value = inner.read(ctx);
      ctx.trace.emit({ tag: "E_InputRead", id: makeId("input"), value: value ?? null });
      return value;
    },
  };
}

/**
 * Wrap output port with logging.
 */
export function loggingOutput(inner: OutputPort): OutputPort {
  return {
    write(text: string, ctx: ExecContext): void {
      inner.write(text, ctx);
      ctx.trace.emit({ tag: "E_OutputWrite", id: makeId("output"), text });
    },
  };
}

/**
 * Wrap RNG port with logging.
 */
export function loggingRng(inner: RngPort): RngPort {
  return {
    nextInt(min: number, max: number, ctx: ExecContext): number {
      const value = inner.nextInt(min, max, ctx);
      ctx.trace.emit({ tag: "E_RngRead", id: makeId("rng"), value });
      return value;
    },
  };
}

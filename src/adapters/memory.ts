import { chefError } from "../outcome/error";
import type { RngPort } from "../ports/rng";
import type { OutputPort } from "../ports/sink";
import type { InputPort } from "../ports/source";
import type { TraceEvent, TraceSink } from "../ports/types";

/**
 * Input port over a fixed list of integers. A non-integer number is rejected
 * when it is read.
 */
export function arrayInput(values: readonly (number | bigint)[]): InputPort {
  let next = 0;
  return {
    read() {
      if (next >= values.length) return undefined;
      const v = values[next++];
      if (typeof v === "bigint") return v;
      if (!Number.isSafeInteger(v)) {
        throw chefError("E0307", { token: String(v) });
      }
      return BigInt(v);
    },
  };
}

/**
 * Input port over whitespace-separated integer tokens. A token is checked
 * when it is read, not before.
 */
export function tokenInput(text: string): InputPort {
  const tokens = text.split(/\s+/).filter((t) => t !== "");
  let next = 0;
  return {
    read() {
      if (next >= tokens.length) return undefined;
      const token = tokens[next++];
      if (!/^[-+]?\d+$/.test(token)) {
        throw chefError("E0307", { token });
      }
      return BigInt(token);
    },
  };
}

export type BufferedOutput = OutputPort & {
  /** Everything written so far. */
  text(): string;
};

export function bufferOutput(): BufferedOutput {
  const chunks: string[] = [];
  return {
    write(text) {
      chunks.push(text);
    },
    text: () => chunks.join(""),
  };
}

/** RNG backed by Math.random. */
export function mathRng(): RngPort {
  return {
    nextInt(min, max) {
      if (max <= min) {
        throw new Error("max must be greater than min");
      }
      return min + Math.floor(Math.random() * (max - min));
    },
  };
}

/** Reproducible RNG (mulberry32). */
export function seededRng(seed: number): RngPort {
  let a = seed >>> 0;
  const nextFloat = (): number => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
  return {
    nextInt(min, max) {
      if (max <= min) {
        throw new Error("max must be greater than min");
      }
      return min + Math.floor(nextFloat() * (max - min));
    },
  };
}

export type CollectingTrace = TraceSink & { events: TraceEvent[] };

export function collectingTrace(events: TraceEvent[] = []): CollectingTrace {
  return {
    events,
    emit: (event) => {
      events.push(event);
    },
  };
}

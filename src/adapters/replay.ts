import type { RngPort } from "../ports/rng";
import type { InputPort } from "../ports/source";
import type { TraceEvent } from "../ports/types";

type Recorded<T extends TraceEvent["tag"]> = Extract<TraceEvent, { tag: T }>;

function takeEntry<E>(entries: E[], index: { value: number }, kind: string): E {
  const entry = entries[index.value++];
  if (entry === undefined) {
    throw new Error(`Replay log exhausted for ${kind}`);
  }
  return entry;
}

const ofTag = <T extends TraceEvent["tag"]>(log: readonly TraceEvent[], tag: T): Recorded<T>[] =>
  log.filter((e): e is Recorded<T> => e.tag === tag);

/**
 * Create replay RNG that returns the draws recorded by `loggingRng`.
 */
export function replayRng(log: readonly TraceEvent[]): RngPort {
  const entries = ofTag(log, "E_RngRead");
  const index = { value: 0 };

  return {
    nextInt(min: number, max: number): number {
      const { value } = takeEntry(entries, index, "RNG reads");
      if (value < min || value >= max) {
        throw new Error(`Replayed RNG value ${value} outside [${min}, ${max})`);
      }
      return value;
    },
  };
}

/**
 * Create replay input that returns the values recorded by `loggingInput`,
 * including the final exhausted read.
 */
export function replayInput(log: readonly TraceEvent[]): InputPort {
  const entries = ofTag(log, "E_InputRead");
  const index = { value: 0 };

  return {
    read(): bigint | undefined {
      return takeEntry(entries, index, "input reads").value ?? undefined;
    },
  };
}

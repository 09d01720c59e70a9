import type { Instruction, Statement } from "../ast";
import type { Span } from "../meta";
import { chefError } from "../../outcome/error";

/** "Sift" closes with "sifted", "Bake" with "baked". */
export function loopKeyword(verb: string): string {
  const v = verb.toLowerCase();
  return v.endsWith("e") ? `${v}d` : `${v}ed`;
}

type PendingLoop = { index: number; verb: string; keyword: string };

/**
 * Pair every loop start with its loop end and give every "Set aside" the end
 * of the loop it sits in.
 *
 * An end closes the nearest open start with the same keyword. Starts above
 * that one on the pending stack stay open, so loops of different verbs may
 * interleave while same-verb loops must close innermost first.
 */
export function resolveLoops(
  recipe: string,
  statements: readonly Statement[],
  spans: readonly (Span | undefined)[] = []
): Instruction[] {
  const pending: PendingLoop[] = [];
  const partner = new Map<number, number>();
  const breakLoop = new Map<number, number>();

  statements.forEach((s, index) => {
    switch (s.tag) {
      case "LoopStart":
        pending.push({ index, verb: s.verb, keyword: loopKeyword(s.verb) });
        break;
      case "LoopEnd": {
        const keyword = s.until.toLowerCase();
        let j = pending.length - 1;
        while (j >= 0 && pending[j].keyword !== keyword) j--;
        if (j < 0) {
          throw chefError("E0202", { keyword, recipe }, spans[index]);
        }
        const [start] = pending.splice(j, 1);
        partner.set(start.index, index);
        partner.set(index, start.index);
        break;
      }
      case "Break": {
        const innermost = pending[pending.length - 1];
        if (!innermost) {
          throw chefError("E0204", { recipe }, spans[index]);
        }
        breakLoop.set(index, innermost.index);
        break;
      }
      default:
        break;
    }
  });

  if (pending.length > 0) {
    const open = pending[0];
    throw chefError("E0201", { verb: open.verb, recipe }, spans[open.index]);
  }

  const linked = (index: number): number => {
    const other = partner.get(index);
    if (other === undefined) throw new Error(`resolveLoops: statement ${index} left unpaired`);
    return other;
  };

  return statements.map((s, index): Instruction => {
    switch (s.tag) {
      case "LoopStart":
        return { ...s, keyword: loopKeyword(s.verb), end: linked(index) };
      case "LoopEnd":
        return { ...s, keyword: s.until.toLowerCase(), start: linked(index) };
      case "Break": {
        const start = breakLoop.get(index);
        if (start === undefined) throw new Error(`resolveLoops: break ${index} has no loop`);
        return { tag: "Break", end: linked(start) };
      }
      default:
        return s;
    }
  });
}

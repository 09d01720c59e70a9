import type { Done, Fail, Outcome, OutcomeMeta } from "./outcome";
import { ChefError } from "./error";
import type { Failure } from "./failure";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

/**
 * Run `body`, turning a thrown ChefError into a Fail. Anything else thrown is
 * a defect in the interpreter and propagates.
 */
export function attempt<A>(body: () => A, meta: () => OutcomeMeta = () => ({})): Outcome<A> {
  try {
    return done(body(), meta());
  } catch (e) {
    if (e instanceof ChefError) {
      return fail(e.failure, meta());
    }
    throw e;
  }
}

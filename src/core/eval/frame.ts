import type { IngredientKind, Recipe } from "../ast";
import type { Span } from "../meta";
import { chefError } from "../../outcome/error";
import { copyValue, ingredientValue, type Value } from "./values";

/** Mixing bowls and baking dishes hold their top at the end of the array. */
export type Stack = Value[];

export type Binding = {
  kind: IngredientKind;
  value: Value;
};

const vesselLabel = (kind: "bowl" | "dish", n: number) =>
  kind === "bowl" ? `Mixing bowl ${n}` : `Baking dish ${n}`;

/**
 * Runtime state of one recipe invocation. Bowls and dishes are created on
 * first reference and never shared with another frame: a call copies bowls
 * in and back out explicitly.
 */
export class Frame {
  readonly bowls = new Map<number, Stack>();
  readonly dishes = new Map<number, Stack>();
  readonly bindings = new Map<string, Binding>();
  ip = 0;

  constructor(
    readonly recipe: Recipe,
    readonly depth: number
  ) {
    // A later declaration of the same name replaces the earlier one.
    for (const ing of recipe.ingredients) {
      this.bindings.set(ing.name, { kind: ing.kind, value: ingredientValue(ing) });
    }
  }

  /** Fresh frame for `recipe` holding copies of every bowl the caller has. */
  static enter(recipe: Recipe, caller?: Frame): Frame {
    const frame = new Frame(recipe, caller ? caller.depth + 1 : 0);
    if (caller) {
      for (const [n, stack] of caller.bowls) {
        frame.bowls.set(n, stack.map(copyValue));
      }
    }
    return frame;
  }

  /** Overwrite the caller's bowls with this frame's bowls of the same number. */
  copyBowlsTo(caller: Frame): void {
    for (const [n, stack] of this.bowls) {
      caller.bowls.set(n, stack.map(copyValue));
    }
  }

  bowl(n: number): Stack {
    let s = this.bowls.get(n);
    if (!s) {
      s = [];
      this.bowls.set(n, s);
    }
    return s;
  }

  dish(n: number): Stack {
    let s = this.dishes.get(n);
    if (!s) {
      s = [];
      this.dishes.set(n, s);
    }
    return s;
  }

  binding(name: string, span?: Span): Binding {
    const b = this.bindings.get(name);
    if (!b) {
      throw chefError("E0303", { ingredient: name, recipe: this.recipe.name }, span);
    }
    return b;
  }

  get(name: string, span?: Span): Value {
    return this.binding(name, span).value;
  }

  set(name: string, value: Value, span?: Span): void {
    this.binding(name, span).value = value;
  }

  /** Sum of the values of every ingredient declared dry. */
  dryTotal(): bigint {
    let total = 0n;
    for (const b of this.bindings.values()) {
      if (b.kind === "dry") total += b.value.number;
    }
    return total;
  }

  popBowl(n: number, span?: Span): Value {
    return popFrom(this.bowl(n), vesselLabel("bowl", n), span);
  }

  peekBowl(n: number, span?: Span): Value {
    const s = this.bowl(n);
    if (s.length === 0) {
      throw chefError("E0301", { vessel: vesselLabel("bowl", n) }, span);
    }
    return s[s.length - 1];
  }

  popDish(n: number, span?: Span): Value {
    return popFrom(this.dish(n), vesselLabel("dish", n), span);
  }
}

function popFrom(stack: Stack, label: string, span?: Span): Value {
  const v = stack.pop();
  if (v === undefined) {
    throw chefError("E0301", { vessel: label }, span);
  }
  return v;
}

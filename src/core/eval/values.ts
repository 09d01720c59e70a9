import type { ArithmeticTag, Ingredient } from "../ast";
import type { Span } from "../meta";
import { chefError } from "../../outcome/error";

const MAX_CODE_POINT = 0x10ffffn;

/**
 * A number in a bowl, dish or ingredient. `liquid` decides how it is served:
 * as a character when true, as a decimal otherwise. Numbers are unbounded.
 *
 * Pushing an ingredient puts its current Value object in the bowl, and
 * popping hands the object back, so liquefying the ingredient shows on the
 * pushed entry too. Liquefying a bowl's contents replaces its entries instead
 * and leaves ingredients alone. Arithmetic, reads and loop decrements make
 * new Values.
 */
export type Value = {
  readonly number: bigint;
  liquid: boolean;
};

export const value = (number: bigint, liquid = false): Value => ({ number, liquid });

/** Detached copy, for bowls copied into a dish or across a call. */
export const copyValue = (v: Value): Value => ({ number: v.number, liquid: v.liquid });

export function liquefy(v: Value): void {
  v.liquid = true;
}

/** Value an ingredient starts a frame with; an ingredient without quantity starts at 0. */
export function ingredientValue(ing: Ingredient): Value {
  return value(ing.initialValue ?? 0n, ing.kind === "liquid");
}

/**
 * `top <op> operand`. The result takes the ingredient operand's liquid flag.
 * Division truncates toward zero; callers rule out a zero divisor first.
 */
export function combine(op: ArithmeticTag, top: Value, operand: Value): Value {
  const a = top.number;
  const b = operand.number;
  switch (op) {
    case "Add": return value(a + b, operand.liquid);
    case "Subtract": return value(a - b, operand.liquid);
    case "Multiply": return value(a * b, operand.liquid);
    case "Divide": return value(a / b, operand.liquid);
  }
}

/** Decimal for a dry value, the character with that code point for a liquid one. */
export function renderValue(v: Value, span?: Span): string {
  if (!v.liquid) return v.number.toString();
  if (v.number < 0n || v.number > MAX_CODE_POINT) {
    throw chefError("E0306", { value: v.number.toString() }, span);
  }
  return String.fromCodePoint(Number(v.number));
}

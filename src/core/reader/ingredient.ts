import type { Ingredient, IngredientKind } from "../ast";
import type { Span } from "../meta";
import { chefError } from "../../outcome/error";

export const DRY_MEASURES = ["g", "kg", "pinch", "pinches"] as const;
export const LIQUID_MEASURES = ["ml", "l", "dash", "dashes"] as const;
export const EITHER_MEASURES = ["cup", "cups", "teaspoon", "teaspoons", "tablespoon", "tablespoons"] as const;
export const MEASURE_TYPES = ["heaped", "level"] as const;

const KIND_BY_MEASURE = new Map<string, IngredientKind>([
  ...DRY_MEASURES.map((m) => [m, "dry"] as const),
  ...LIQUID_MEASURES.map((m) => [m, "liquid"] as const),
  ...EITHER_MEASURES.map((m) => [m, "either"] as const),
]);

const isMeasureType = (word: string): boolean =>
  (MEASURE_TYPES as readonly string[]).includes(word);

/** heaped/level always make an ingredient dry, whatever the measure. */
export function measureKind(measure: string | undefined, measureType?: string): IngredientKind {
  if (measureType !== undefined) return "dry";
  if (measure === undefined) return "either";
  return KIND_BY_MEASURE.get(measure) ?? "either";
}

/**
 * `[quantity] [heaped|level] [measure] name`
 *
 * A word is only taken as the measure when a name follows it, so "1 cup" is
 * one ingredient called "cup".
 */
export function parseIngredient(text: string, span?: Span): Ingredient {
  const words = text.trim().split(/\s+/);
  let i = 0;

  let initialValue: bigint | undefined;
  if (/^\d+$/.test(words[0]) && words.length > 1) {
    initialValue = BigInt(words[0]);
    i++;
  }

  let measureType: string | undefined;
  let measure: string | undefined;
  if (isMeasureType(words[i])) {
    measureType = words[i];
    const next = words[i + 1];
    if (next === undefined || !KIND_BY_MEASURE.has(next) || i + 2 >= words.length) {
      throw chefError("E0102", { measure: [measureType, next ?? ""].join(" ").trim() }, span);
    }
    measure = next;
    i += 2;
  } else if (KIND_BY_MEASURE.has(words[i]) && i + 1 < words.length) {
    measure = words[i];
    i++;
  }

  const name = words.slice(i).join(" ");
  if (name === "") {
    throw chefError("E0105", { text }, span);
  }

  const ingredient: Ingredient = { name, kind: measureKind(measure, measureType) };
  if (initialValue !== undefined) ingredient.initialValue = initialValue;
  if (measure !== undefined) {
    ingredient.measure = measureType ? `${measureType} ${measure}` : measure;
  }
  return ingredient;
}

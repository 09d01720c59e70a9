import type { Span } from "./meta";

// ─────────────────────────────────────────────────────────────────
// Ingredients
// ─────────────────────────────────────────────────────────────────

export type IngredientKind = "dry" | "liquid" | "either";

export type Ingredient = {
  name: string;
  /** Absent when the declaration gives no quantity. */
  initialValue?: bigint;
  kind: IngredientKind;
  /** Measure as written, e.g. "heaped cups". */
  measure?: string;
};

// ─────────────────────────────────────────────────────────────────
// Statements (parser output) and instructions (builder output)
// ─────────────────────────────────────────────────────────────────

export type ArithmeticTag = "Add" | "Subtract" | "Multiply" | "Divide";

/** Statements whose parsed and built shapes are the same. */
export type PlainStatement =
  | { tag: "Read"; ingredient: string }
  | { tag: "Push"; ingredient: string; bowl: number }
  | { tag: "Pop"; ingredient: string; bowl: number }
  | { tag: ArithmeticTag; ingredient: string; bowl: number }
  | { tag: "AddDry"; bowl: number }
  | { tag: "Liquefy"; ingredient: string }
  | { tag: "LiquefyContents"; bowl: number }
  | { tag: "Stir"; minutes: number; bowl: number }
  | { tag: "StirIngredient"; ingredient: string; bowl: number }
  | { tag: "Mix"; bowl: number }
  | { tag: "ClearStack"; bowl: number }
  | { tag: "CopyStack"; bowl: number; dish: number }
  | { tag: "Call"; recipe: string }
  | { tag: "Return"; hours?: number };

export type Statement =
  | PlainStatement
  | { tag: "LoopStart"; verb: string; ingredient: string }
  | { tag: "LoopEnd"; verb: string; ingredient?: string; until: string }
  | { tag: "Break" };

export type Instruction =
  | PlainStatement
  | { tag: "LoopStart"; verb: string; ingredient: string; keyword: string; end: number }
  | { tag: "LoopEnd"; verb: string; ingredient?: string; keyword: string; start: number }
  /** `end` is the index of the LoopEnd closing the innermost enclosing loop. */
  | { tag: "Break"; end: number }
  | { tag: "PrintStacks"; dishes: number };

export type InstructionTag = Instruction["tag"];

// ─────────────────────────────────────────────────────────────────
// Recipes
// ─────────────────────────────────────────────────────────────────

export type MethodStep = {
  statement: Statement;
  span: Span;
};

export type CookingTime = { amount: number; unit: "minute" | "minutes" | "hour" | "hours" };

export type OvenTemperature = { degrees: number; gasMark?: number };

export type ParsedRecipe = {
  title: string;
  comment?: string;
  ingredients: Ingredient[];
  cookingTime?: CookingTime;
  oven?: OvenTemperature;
  method: MethodStep[];
  serves?: number;
  span: Span;
};

export type Recipe = {
  readonly name: string;
  readonly ingredients: readonly Ingredient[];
  readonly instructions: readonly Instruction[];
  /** Source position of each instruction, same indexing as `instructions`. */
  readonly spans: readonly (Span | undefined)[];
};

export type Program = {
  /** Keyed by `recipeKey(name)`; iteration order is declaration order. */
  readonly recipes: ReadonlyMap<string, Recipe>;
  readonly main: Recipe;
};

/** Recipe lookups ignore case and runs of whitespace. */
export function recipeKey(name: string): string {
  return name.trim().replace(/\s+/g, " ").toLowerCase();
}

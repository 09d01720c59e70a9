import { recipeKey, type Instruction, type ParsedRecipe, type Program, type Recipe } from "../ast";
import type { Span } from "../meta";
import { chefError } from "../../outcome/error";
import { resolveLoops } from "./loops";

function buildRecipe(parsed: ParsedRecipe): Recipe {
  const statements = parsed.method.map((m) => m.statement);
  const spans: (Span | undefined)[] = parsed.method.map((m) => m.span);
  const instructions: Instruction[] = resolveLoops(parsed.title, statements, spans);

  if (parsed.serves !== undefined) {
    instructions.push({ tag: "PrintStacks", dishes: parsed.serves });
    spans.push(undefined);
  }

  return {
    name: parsed.title,
    ingredients: parsed.ingredients,
    instructions,
    spans,
  };
}

/**
 * Turn parse results into a Program. The first recipe is the main one. Every
 * "Serve with" must name a recipe of the program.
 */
export function buildProgram(parsed: readonly ParsedRecipe[]): Program {
  const recipes = new Map<string, Recipe>();
  for (const p of parsed) {
    const key = recipeKey(p.title);
    if (recipes.has(key)) {
      throw chefError("E0205", { recipe: p.title }, p.span);
    }
    recipes.set(key, buildRecipe(p));
  }

  const [main] = recipes.values();
  if (!main) {
    throw chefError("E0109");
  }

  for (const recipe of recipes.values()) {
    recipe.instructions.forEach((ins, i) => {
      if (ins.tag === "Call" && !recipes.has(recipeKey(ins.recipe))) {
        throw chefError("E0203", { recipe: recipe.name, name: ins.recipe }, recipe.spans[i]);
      }
    });
  }

  return { recipes, main };
}

import type { Ingredient, ParsedRecipe, Statement } from "../ast";

const bowl = (n: number) => `mixing bowl ${n}`;
const dish = (n: number) => `baking dish ${n}`;

/** Canonical surface form of a statement, final period included. */
export function printStatement(s: Statement): string {
  switch (s.tag) {
    case "Read": return `Take ${s.ingredient} from refrigerator.`;
    case "Push": return `Put ${s.ingredient} into ${bowl(s.bowl)}.`;
    case "Pop": return `Fold ${s.ingredient} into ${bowl(s.bowl)}.`;
    case "Add": return `Add ${s.ingredient} to ${bowl(s.bowl)}.`;
    case "Subtract": return `Remove ${s.ingredient} from ${bowl(s.bowl)}.`;
    case "Multiply": return `Combine ${s.ingredient} into ${bowl(s.bowl)}.`;
    case "Divide": return `Divide ${s.ingredient} into ${bowl(s.bowl)}.`;
    case "AddDry": return `Add dry ingredients to ${bowl(s.bowl)}.`;
    case "Liquefy": return `Liquefy ${s.ingredient}.`;
    case "LiquefyContents": return `Liquefy contents of ${bowl(s.bowl)}.`;
    case "Stir": return `Stir ${bowl(s.bowl)} for ${s.minutes} ${s.minutes === 1 ? "minute" : "minutes"}.`;
    case "StirIngredient": return `Stir ${s.ingredient} into ${bowl(s.bowl)}.`;
    case "Mix": return `Mix ${bowl(s.bowl)} well.`;
    case "ClearStack": return `Clean ${bowl(s.bowl)}.`;
    case "CopyStack": return `Pour contents of ${bowl(s.bowl)} into ${dish(s.dish)}.`;
    case "Break": return "Set aside.";
    case "Call": return `Serve with ${s.recipe}.`;
    case "Return":
      return s.hours === undefined
        ? "Refrigerate."
        : `Refrigerate for ${s.hours} ${s.hours === 1 ? "hour" : "hours"}.`;
    case "LoopStart": return `${s.verb} the ${s.ingredient}.`;
    case "LoopEnd":
      return s.ingredient === undefined
        ? `${s.verb} until ${s.until}.`
        : `${s.verb} the ${s.ingredient} until ${s.until}.`;
  }
}

export function printIngredient(i: Ingredient): string {
  return [i.initialValue, i.measure, i.name].filter((p) => p !== undefined).join(" ");
}

export function printRecipe(r: ParsedRecipe): string {
  const sections: string[] = [`${r.title}.`];
  if (r.comment !== undefined) sections.push(r.comment);
  if (r.ingredients.length > 0) {
    sections.push(["Ingredients.", ...r.ingredients.map(printIngredient)].join("\n"));
  }
  const timing: string[] = [];
  if (r.cookingTime) timing.push(`Cooking time: ${r.cookingTime.amount} ${r.cookingTime.unit}.`);
  if (r.oven) {
    const mark = r.oven.gasMark === undefined ? "" : ` (gas mark ${r.oven.gasMark})`;
    timing.push(`Pre-heat oven to ${r.oven.degrees} degrees Celsius${mark}.`);
  }
  if (timing.length > 0) sections.push(timing.join("\n"));
  sections.push(["Method.", ...r.method.map((m) => printStatement(m.statement))].join("\n"));
  if (r.serves !== undefined) sections.push(`Serves ${r.serves}.`);
  return sections.join("\n\n");
}

export function printProgram(recipes: ParsedRecipe[]): string {
  return recipes.map(printRecipe).join("\n\n") + "\n";
}

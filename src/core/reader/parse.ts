import type { Ingredient, MethodStep, OvenTemperature, ParsedRecipe } from "../ast";
import type { Span } from "../meta";
import { chefError } from "../../outcome/error";
import { splitBlocks, splitSentences, type Block } from "./blocks";
import { parseIngredient } from "./ingredient";
import { parseStatement } from "./statement";

const INGREDIENTS_HEADER = "Ingredients.";
const METHOD_HEADER = "Method";
const COOKING_TIME = /^Cooking time: (\d+) (minutes?|hours?)\.$/;
const OVEN = /^Pre-heat oven to (\d+) degrees Celsius(?: \(gas mark (\d+)\))?\.$/;
const SERVES = /^Serves (\d+)\.$/;
const COOKING_UNITS = ["minute", "minutes", "hour", "hours"] as const;

const isHeader = (text: string): boolean =>
  text === INGREDIENTS_HEADER ||
  text.startsWith(`${METHOD_HEADER}.`) ||
  text.startsWith("Cooking time") ||
  text.startsWith("Pre-heat oven");

/**
 * Parse program text into one result per recipe, in source order. The first
 * malformed line aborts the whole parse.
 */
export function parseRecipes(src: string, file?: string): ParsedRecipe[] {
  const blocks = splitBlocks(src);
  if (blocks.length === 0) {
    throw chefError("E0109", undefined, { file });
  }

  const at = (line: number): Span => ({ file, startLine: line, startCol: 1 });
  const recipes: ParsedRecipe[] = [];
  let i = 0;

  const peek = (): Block | undefined => blocks[i];

  while (i < blocks.length) {
    const [titleLine, ...commentLines] = blocks[i++];
    if (!titleLine.text.endsWith(".") || titleLine.text.length < 2 || isHeader(titleLine.text)) {
      throw chefError("E0103", { text: titleLine.text }, at(titleLine.line));
    }
    const title = titleLine.text.slice(0, -1).trim();
    const recipe: ParsedRecipe = { title, ingredients: [], method: [], span: at(titleLine.line) };

    const comment = commentLines.map((l) => l.text);
    const next = peek();
    if (next && !isHeader(next[0].text)) {
      comment.push(...next.map((l) => l.text));
      i++;
    }
    if (comment.length > 0) recipe.comment = comment.join("\n");

    // Ingredients.
    const ingBlock = peek();
    if (ingBlock && ingBlock[0].text === INGREDIENTS_HEADER) {
      i++;
      const lines = ingBlock.slice(1);
      if (lines.length === 0) {
        throw chefError("E0105", { text: INGREDIENTS_HEADER }, at(ingBlock[0].line));
      }
      recipe.ingredients = lines.map((l): Ingredient => parseIngredient(l.text, at(l.line)));
    }

    // Cooking time / oven temperature: accepted, no effect at run time.
    for (let b = peek(); b && !b[0].text.startsWith(`${METHOD_HEADER}.`) && isHeader(b[0].text); b = peek()) {
      i++;
      for (const l of b) {
        const cook = COOKING_TIME.exec(l.text);
        const oven = OVEN.exec(l.text);
        const unit = COOKING_UNITS.find((u) => u === cook?.[2]);
        if (cook && unit) {
          recipe.cookingTime = { amount: parseInt(cook[1], 10), unit };
        } else if (oven) {
          const temp: OvenTemperature = { degrees: parseInt(oven[1], 10) };
          if (oven[2] !== undefined) temp.gasMark = parseInt(oven[2], 10);
          recipe.oven = temp;
        } else {
          throw chefError("E0110", { recipe: title, text: l.text }, at(l.line));
        }
      }
    }

    // Method.
    const methodBlock = peek();
    const sentences = methodBlock ? splitSentences(methodBlock) : [];
    if (!methodBlock || sentences[0]?.text !== METHOD_HEADER || !sentences[0].terminated) {
      const line = methodBlock?.[0].line ?? blocks[blocks.length - 1].slice(-1)[0].line;
      throw chefError("E0104", { recipe: title }, at(line));
    }
    i++;
    recipe.method = sentences.slice(1).map((s): MethodStep => {
      if (!s.terminated) {
        throw chefError("E0108", { text: s.text }, at(s.line));
      }
      return { statement: parseStatement(s.text, at(s.line)), span: at(s.line) };
    });
    if (recipe.method.length === 0) {
      throw chefError("E0104", { recipe: title }, at(methodBlock[0].line));
    }

    // Serves N.
    const servesBlock = peek();
    const serves = servesBlock ? SERVES.exec(servesBlock[0].text) : null;
    if (servesBlock && serves) {
      if (servesBlock.length > 1) {
        throw chefError("E0110", { recipe: title, text: servesBlock[1].text }, at(servesBlock[1].line));
      }
      recipe.serves = parseInt(serves[1], 10);
      i++;
    }

    recipes.push(recipe);
  }

  return recipes;
}

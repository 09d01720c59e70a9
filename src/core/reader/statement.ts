import type { Statement } from "../ast";
import type { Span } from "../meta";
import { chefError } from "../../outcome/error";

// ─────────────────────────────────────────────────────────────────
// Pattern language
//
//   {ing}   ingredient name         {name}  recipe name
//   {bowl}  [the] [Nth] mixing bowl [N]
//   {dish}  [the] [Nth] baking dish [N]
//   {n}     decimal count           {verb}/{until}  a single word
//   {the}   optional "the "
// ─────────────────────────────────────────────────────────────────

type Groups = Record<string, string | undefined>;

type Rule = {
  re: RegExp;
  build: (g: Groups, text: string, span?: Span) => Statement;
};

const vessel = (prefix: string, noun: string) =>
  `(?:the )?(?:(?<${prefix}Ord>\\d+)(?:st|nd|rd|th) )?${noun}(?: (?<${prefix}Num>\\d+))?`;

function compile(pattern: string): RegExp {
  const src = pattern
    .replace("{ing}", "(?<ing>.+?)")
    .replace("{name}", "(?<name>.+)")
    .replace("{bowl}", vessel("bowl", "mixing bowl"))
    .replace("{dish}", vessel("dish", "baking dish"))
    .replace("{n}", "(?<n>\\d+)")
    .replace("{verb}", "(?<verb>[A-Za-z]+)")
    .replace("{until}", "(?<until>[A-Za-z]+)")
    .replace(/\{the\}/g, "(?:the )?");
  return new RegExp(`^${src}$`);
}

/**
 * Resolve the number of a bowl or dish. Absent means 1. Both the ordinal and
 * the trailing form at once, or a zero, is rejected.
 */
function vesselNumber(g: Groups, prefix: "bowl" | "dish", text: string, span?: Span): number {
  const ord = g[`${prefix}Ord`];
  const num = g[`${prefix}Num`];
  const vesselName = prefix === "bowl" ? "mixing bowl" : "baking dish";
  if (ord !== undefined && num !== undefined) {
    throw chefError("E0107", { vessel: vesselName, text }, span);
  }
  const raw = ord ?? num;
  if (raw === undefined) return 1;
  const n = parseInt(raw, 10);
  if (n < 1) {
    throw chefError("E0107", { vessel: vesselName, text }, span);
  }
  return n;
}

function req(g: Groups, key: string): string {
  const v = g[key];
  if (v === undefined) throw new Error(`statement grammar: missing group ${key}`);
  return v;
}

const rule = (pattern: string, build: Rule["build"]): Rule => ({ re: compile(pattern), build });

const bowlOf = (g: Groups, text: string, span?: Span) => vesselNumber(g, "bowl", text, span);

// Order matters: the first rule that matches wins, so every specific form
// sits above the generic one it would otherwise be swallowed by.
const RULES: Rule[] = [
  rule("Take {ing} from {the}refrigerator", (g) => ({ tag: "Read", ingredient: req(g, "ing") })),
  rule("Put {ing} into {bowl}", (g, t, s) => ({ tag: "Push", ingredient: req(g, "ing"), bowl: bowlOf(g, t, s) })),
  rule("Fold {ing} into {bowl}", (g, t, s) => ({ tag: "Pop", ingredient: req(g, "ing"), bowl: bowlOf(g, t, s) })),

  rule("Add dry ingredients to {bowl}", (g, t, s) => ({ tag: "AddDry", bowl: bowlOf(g, t, s) })),
  rule("Add dry ingredients", () => ({ tag: "AddDry", bowl: 1 })),
  rule("Add {ing} to {bowl}", (g, t, s) => ({ tag: "Add", ingredient: req(g, "ing"), bowl: bowlOf(g, t, s) })),
  rule("Add {ing}", (g) => ({ tag: "Add", ingredient: req(g, "ing"), bowl: 1 })),
  rule("Remove {ing} from {bowl}", (g, t, s) => ({ tag: "Subtract", ingredient: req(g, "ing"), bowl: bowlOf(g, t, s) })),
  rule("Remove {ing}", (g) => ({ tag: "Subtract", ingredient: req(g, "ing"), bowl: 1 })),
  rule("Combine {ing} into {bowl}", (g, t, s) => ({ tag: "Multiply", ingredient: req(g, "ing"), bowl: bowlOf(g, t, s) })),
  rule("Combine {ing}", (g) => ({ tag: "Multiply", ingredient: req(g, "ing"), bowl: 1 })),
  rule("Divide {ing} into {bowl}", (g, t, s) => ({ tag: "Divide", ingredient: req(g, "ing"), bowl: bowlOf(g, t, s) })),
  rule("Divide {ing}", (g) => ({ tag: "Divide", ingredient: req(g, "ing"), bowl: 1 })),

  rule("(?:Liquefy|Liquify) contents of {bowl}", (g, t, s) => ({ tag: "LiquefyContents", bowl: bowlOf(g, t, s) })),
  rule("(?:Liquefy|Liquify) {ing}", (g) => ({ tag: "Liquefy", ingredient: req(g, "ing") })),

  rule("Stir {bowl} for {n} minutes?", (g, t, s) => ({
    tag: "Stir",
    minutes: parseInt(req(g, "n"), 10),
    bowl: bowlOf(g, t, s),
  })),
  rule("Stir for {n} minutes?", (g) => ({ tag: "Stir", minutes: parseInt(req(g, "n"), 10), bowl: 1 })),
  rule("Stir {ing} into {bowl}", (g, t, s) => ({ tag: "StirIngredient", ingredient: req(g, "ing"), bowl: bowlOf(g, t, s) })),
  rule("Mix {bowl} well", (g, t, s) => ({ tag: "Mix", bowl: bowlOf(g, t, s) })),
  rule("Mix well", () => ({ tag: "Mix", bowl: 1 })),
  rule("Clean {bowl}", (g, t, s) => ({ tag: "ClearStack", bowl: bowlOf(g, t, s) })),
  rule("Pour contents of {bowl} into {dish}", (g, t, s) => ({
    tag: "CopyStack",
    bowl: bowlOf(g, t, s),
    dish: vesselNumber(g, "dish", t, s),
  })),

  rule("Set aside", () => ({ tag: "Break" })),
  rule("Serve with {name}", (g) => ({ tag: "Call", recipe: req(g, "name") })),
  rule("Refrigerate for {n} (?<unit>hours?)", (g, _t, s) => {
    const hours = parseInt(req(g, "n"), 10);
    const unit = req(g, "unit");
    if (hours < 1 || (hours === 1) !== (unit === "hour")) {
      throw chefError("E0106", { unit, hours }, s);
    }
    return { tag: "Return", hours };
  }),
  rule("Refrigerate", () => ({ tag: "Return" })),

  rule("{verb}(?: the {ing})? until {until}", (g) => {
    const ingredient = g.ing;
    return ingredient === undefined
      ? { tag: "LoopEnd", verb: req(g, "verb"), until: req(g, "until") }
      : { tag: "LoopEnd", verb: req(g, "verb"), ingredient, until: req(g, "until") };
  }),
  rule("{verb} the {ing}", (g) => ({ tag: "LoopStart", verb: req(g, "verb"), ingredient: req(g, "ing") })),
];

/** Parse one method sentence; a final period is optional. */
export function parseStatement(text: string, span?: Span): Statement {
  const normalized = text.trim().replace(/\.$/, "").replace(/\s+/g, " ");
  for (const r of RULES) {
    const m = r.re.exec(normalized);
    if (m) {
      return r.build(m.groups ?? {}, normalized, span);
    }
  }
  throw chefError("E0101", { text: normalized }, span);
}

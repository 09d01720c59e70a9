import { describe, it, expect } from "vitest";
import { replayRng } from "../../src/adapters/replay";
import { seededRng } from "../../src/adapters/memory";
import type { TraceEvent } from "../../src/ports/types";
import { bowlNumbers, cookText, kitchen, runError } from "../helpers/run";

const POUR = "Pour contents of the mixing bowl into the baking dish.";

describe("Runner: bowls and ingredients", () => {
  it("serves a liquefied ingredient pushed before liquefying as a character", () => {
    const out = cookText([
      {
        title: "Letter",
        ingredients: ["72 g sugar"],
        method: ["Put sugar into mixing bowl 1.", "Liquefy sugar.", POUR],
        serves: 1,
      },
    ]);
    expect(out).toBe("H");
  });

  it("serves the bowl top first", () => {
    const out = cookText([
      {
        title: "Greeting",
        ingredients: ["72 g h", "105 g i"],
        method: ["Put i into the mixing bowl.", "Put h into the mixing bowl.", "Liquefy contents of the mixing bowl.", POUR],
        serves: 1,
      },
    ]);
    expect(out).toBe("Hi");
  });

  it("liquefies the bowl contents without touching the ingredient", () => {
    const k = kitchen([
      {
        title: "Separate",
        ingredients: ["72 g sugar"],
        method: [
          "Put sugar into the mixing bowl.",
          "Liquefy contents of the mixing bowl.",
          "Put sugar into mixing bowl 2.",
          "Pour contents of mixing bowl 2 into the baking dish.",
        ],
        serves: 1,
      },
    ]);
    k.runner.run();
    const frame = k.runner.mainFrame;
    expect(k.output.text()).toBe("72");
    expect(frame.get("sugar")).toEqual({ number: 72n, liquid: false });
    expect(frame.bowl(1)).toEqual([{ number: 72n, liquid: true }]);
  });

  it("applies arithmetic to the top of the bowl", () => {
    const k = kitchen([
      {
        title: "Sums",
        ingredients: ["10 g a", "3 g b"],
        method: [
          "Put a into the mixing bowl.",
          "Remove b from the mixing bowl.",
          "Put a into the mixing bowl.",
          "Combine b into the mixing bowl.",
          "Put a into the mixing bowl.",
          "Divide b into the mixing bowl.",
          "Put a into the mixing bowl.",
          "Add b to the mixing bowl.",
        ],
      },
    ]);
    k.runner.run();
    expect(bowlNumbers(k)).toEqual([7n, 30n, 3n, 13n]);
  });

  it("truncates division toward zero", () => {
    const k = kitchen([
      {
        title: "Negative",
        ingredients: ["0 g zero", "7 g seven", "2 g two"],
        method: ["Put zero into the mixing bowl.", "Remove seven.", "Divide two."],
      },
    ]);
    k.runner.run();
    expect(bowlNumbers(k)).toEqual([-3n]);
  });

  it("leaves the bowl untouched on division by zero", () => {
    const k = kitchen([
      {
        title: "Zero",
        ingredients: ["10 g ten", "0 g zero"],
        method: ["Put ten into the mixing bowl.", "Divide zero into the mixing bowl."],
      },
    ]);
    const err = runError(k);
    expect(err.code).toBe("E0302");
    expect(err.message).toBe('Division by zero: "zero" is 0');
    expect(bowlNumbers(k)).toEqual([10n]);
  });

  it("gives an arithmetic result the liquidity of the ingredient", () => {
    const recipe = (a: string, b: string) => ({
      title: "Flags",
      ingredients: [a, b],
      method: ["Put a into the mixing bowl.", "Add b.", POUR],
      serves: 1,
    });
    expect(cookText([recipe("65 ml a", "1 g b")])).toBe("66");
    expect(cookText([recipe("65 g a", "1 ml b")])).toBe("B");
  });

  it("adds up the dry ingredients only", () => {
    const k = kitchen([
      {
        title: "Dry",
        ingredients: ["2 g x", "3 kg y", "4 ml z", "5 w"],
        method: ["Add dry ingredients to the mixing bowl."],
      },
    ]);
    k.runner.run();
    expect(k.runner.mainFrame.bowl(1)).toEqual([{ number: 5n, liquid: false }]);
  });

  it("folds the top of the bowl into an ingredient", () => {
    const k = kitchen([
      {
        title: "Fold",
        ingredients: ["4 g a", "0 g b"],
        method: ["Put a into the mixing bowl.", "Fold b into the mixing bowl."],
      },
    ]);
    k.runner.run();
    expect(k.runner.mainFrame.get("b").number).toBe(4n);
    expect(bowlNumbers(k)).toEqual([]);
  });

  it("hands back the pushed value on an immediate pop", () => {
    const k = kitchen([
      {
        title: "Round Trip",
        ingredients: ["5 ml a", "0 g b"],
        method: ["Put a into mixing bowl 3.", "Fold b into mixing bowl 3."],
      },
    ]);
    k.runner.run();
    const frame = k.runner.mainFrame;
    expect(frame.get("b")).toEqual({ number: 5n, liquid: true });
    expect(frame.get("b")).toBe(frame.get("a"));
  });

  it("fails on an empty bowl", () => {
    const k = kitchen([{ title: "Empty", ingredients: ["1 g x"], method: ["Fold x into mixing bowl 2."] }]);
    const err = runError(k);
    expect(err.code).toBe("E0301");
    expect(err.message).toBe("Mixing bowl 2 is empty");
  });

  it("fails on an undeclared ingredient when the statement runs", () => {
    const k = kitchen([{ title: "Ghost", method: ["Put ghost into the mixing bowl."] }]);
    const err = runError(k);
    expect(err.code).toBe("E0303");
    expect(err.diagnostic?.span?.startLine).toBe(4);
  });

  it("cleans a bowl", () => {
    const k = kitchen([
      {
        title: "Clean",
        ingredients: ["1 g a"],
        method: ["Put a into the mixing bowl.", "Put a into the mixing bowl.", "Clean the mixing bowl."],
      },
    ]);
    k.runner.run();
    expect(bowlNumbers(k)).toEqual([]);
  });
});

describe("Runner: large numbers", () => {
  it("serves products past the double range in full", () => {
    const out = cookText([
      {
        title: "Million Cubed",
        ingredients: ["1 g one", "1000000 g million"],
        method: [
          "Put one into the mixing bowl.",
          "Combine million into the mixing bowl.",
          "Combine million into the mixing bowl.",
          "Combine million into the mixing bowl.",
          "Combine million into the mixing bowl.",
          POUR,
        ],
        serves: 1,
      },
    ]);
    expect(out).toBe("1000000000000000000000000");
  });

  it("keeps large ingredient quantities exact", () => {
    const out = cookText([
      {
        title: "Factorial Plus One",
        ingredients: ["2432902008176640000 g f", "1 g one"],
        method: ["Put f into the mixing bowl.", "Add one to the mixing bowl.", POUR],
        serves: 1,
      },
    ]);
    expect(out).toBe("2432902008176640001");
  });

  it("reads input beyond the double range", () => {
    const out = cookText(
      [
        {
          title: "Echo",
          ingredients: ["g n"],
          method: ["Take n from refrigerator.", "Put n into the mixing bowl.", POUR],
          serves: 1,
        },
      ],
      { input: [99999999999999999999n] }
    );
    expect(out).toBe("99999999999999999999");
  });

  it("pours a very deep bowl into a dish", () => {
    const k = kitchen([
      {
        title: "Deep",
        ingredients: ["200000 g n"],
        method: ["Heat the n.", "Put n into the mixing bowl.", "Heat the n until heated.", POUR],
      },
    ]);
    k.runner.run();
    const dish = k.runner.mainFrame.dish(1);
    expect(dish.length).toBe(200000);
    expect(dish[0].number).toBe(200000n);
    expect(dish[dish.length - 1].number).toBe(1n);
  });
});

describe("Runner: stirring and mixing", () => {
  const filled = (...extra: string[]) => [
    {
      title: "Stack",
      ingredients: ["1 g a", "2 g b", "3 g c", "4 g d"],
      method: [
        "Put a into the mixing bowl.",
        "Put b into the mixing bowl.",
        "Put c into the mixing bowl.",
        "Put d into the mixing bowl.",
        ...extra,
      ],
    },
  ];

  const stirs: Array<[string, bigint[]]> = [
    ["Stir for 2 minutes.", [1n, 4n, 2n, 3n]],
    ["Stir the mixing bowl for 10 minutes.", [4n, 1n, 2n, 3n]],
    ["Stir for 0 minutes.", [1n, 2n, 3n, 4n]],
    ["Stir a into the mixing bowl.", [1n, 2n, 4n, 3n]],
  ];

  it.each(stirs)("%s", (statement, expected) => {
    const k = kitchen(filled(statement));
    k.runner.run();
    expect(bowlNumbers(k)).toEqual(expected);
  });

  it("shuffles with the random source", () => {
    const log: TraceEvent[] = [
      { tag: "E_RngRead", id: "rng:1", value: 0 },
      { tag: "E_RngRead", id: "rng:2", value: 0 },
      { tag: "E_RngRead", id: "rng:3", value: 0 },
    ];
    const k = kitchen(filled("Mix well."), { rng: replayRng(log) });
    k.runner.run();
    expect(bowlNumbers(k)).toEqual([2n, 3n, 4n, 1n]);
  });

  it("keeps the same values when shuffling", () => {
    const k = kitchen(filled("Mix the mixing bowl well."), { rng: seededRng(42) });
    k.runner.run();
    expect([...bowlNumbers(k)].sort((x, y) => Number(x - y))).toEqual([1n, 2n, 3n, 4n]);
  });
});

describe("Runner: baking dishes", () => {
  it("copies the bowl into the dish and keeps the bowl", () => {
    const k = kitchen([
      {
        title: "Copy",
        ingredients: ["1 g a", "2 g b"],
        method: ["Put a into the mixing bowl.", "Put b into the mixing bowl.", POUR, POUR, "Liquefy contents of the mixing bowl."],
      },
    ]);
    k.runner.run();
    const frame = k.runner.mainFrame;
    expect(bowlNumbers(k)).toEqual([1n, 2n]);
    expect(frame.dish(1).map((v) => v.number)).toEqual([1n, 2n, 1n, 2n]);
    expect(frame.dish(1).some((v) => v.liquid)).toBe(false);
  });

  it("separates dishes with a line break, empty ones included", () => {
    const out = cookText([{ title: "Three", ingredients: ["1 g a"], method: ["Put a into the mixing bowl.", POUR], serves: 3 }]);
    expect(out).toBe("1\n\n");
  });

  it("stops with an error on a value that is no character, keeping earlier output", () => {
    const k = kitchen([
      {
        title: "Bad Char",
        ingredients: ["0 ml a", "1 ml b", "65 ml c"],
        method: ["Put a into the mixing bowl.", "Remove b.", "Put c into the mixing bowl.", POUR],
        serves: 1,
      },
    ]);
    const err = runError(k);
    expect(err.code).toBe("E0306");
    expect(err.message).toBe("Cannot serve -1 as a character");
    expect(k.output.text()).toBe("A");
  });
});

describe("Runner: input", () => {
  const reader = (declaration: string) => [
    {
      title: "Reader",
      ingredients: [declaration],
      method: ["Take letter from refrigerator.", "Put letter into the mixing bowl.", POUR],
      serves: 1,
    },
  ];

  it("reads numbers and keeps the declared liquidity", () => {
    expect(cookText(reader("ml letter"), { input: [65] })).toBe("A");
    expect(cookText(reader("g letter"), { input: [65] })).toBe("65");
    expect(cookText(reader("letter"), { input: [65] })).toBe("65");
  });

  it("fails when input runs out", () => {
    const err = runError(kitchen(reader("g letter")));
    expect(err.code).toBe("E0304");
    expect(err.message).toBe('Input exhausted while reading "letter"');
  });
});

describe("Runner: loops", () => {
  it("repeats the body and counts the ingredient down", () => {
    const out = cookText([
      {
        title: "Countdown",
        ingredients: ["3 g limit"],
        method: ["Count the limit.", "Put limit into the mixing bowl.", "Count the limit until counted.", POUR],
        serves: 1,
      },
    ]);
    expect(out).toBe("123");
  });

  it("runs the body once per unit of the loop ingredient", () => {
    const k = kitchen([
      {
        title: "Counter",
        ingredients: ["0 g counter", "3 g limit"],
        method: ["Count the limit.", "Put counter into the mixing bowl.", "Count the limit until counted."],
      },
    ]);
    k.runner.run();
    expect(bowlNumbers(k)).toEqual([0n, 0n, 0n]);
    expect(k.runner.mainFrame.get("limit").number).toBe(0n);
  });

  it("skips the body when the ingredient starts at zero", () => {
    const k = kitchen([
      {
        title: "Skip",
        ingredients: ["0 g n", "5 g x"],
        method: ["Heat the n.", "Put x into the mixing bowl.", "Heat the n until heated."],
      },
    ]);
    k.runner.run();
    expect(bowlNumbers(k)).toEqual([]);
  });

  it("loops without decrementing when the end names no ingredient", () => {
    const k = kitchen([
      {
        title: "Manual",
        ingredients: ["0 g zero", "1 g n"],
        method: ["Put zero into the mixing bowl.", "Heat the n.", "Fold n into the mixing bowl.", "Heat until heated."],
      },
    ]);
    k.runner.run();
    expect(bowlNumbers(k)).toEqual([]);
    expect(k.runner.mainFrame.get("n").number).toBe(0n);
  });

  it("leaves the innermost loop on Set aside", () => {
    const k = kitchen([
      {
        title: "Aside",
        ingredients: ["3 g n", "9 g x"],
        method: ["Heat the n.", "Put x into the mixing bowl.", "Set aside.", "Heat the n until heated."],
      },
    ]);
    k.runner.run();
    expect(bowlNumbers(k)).toEqual([9n]);
    expect(k.runner.mainFrame.get("n").number).toBe(3n);
  });

  it("stops at the step limit", () => {
    const k = kitchen([{ title: "Forever", ingredients: ["1 g n"], method: ["Heat the n.", "Heat until heated."] }], {
      maxSteps: 50,
    });
    const err = runError(k);
    expect(err.code).toBe("E0310");
    expect(err.message).toBe("Step limit exceeded: 50");
    expect(k.runner.stepCount).toBe(51);
  });
});

describe("Runner: recipes", () => {
  it("shares bowls with a called recipe and keeps dishes apart", () => {
    const k = kitchen([
      {
        title: "Main",
        ingredients: ["7 g seven"],
        method: [
          "Put seven into mixing bowl 2.",
          "Serve with helper.",
          POUR,
          "Pour contents of mixing bowl 2 into baking dish 2.",
        ],
        serves: 2,
      },
      { title: "Helper", ingredients: ["5 g five"], method: ["Put five into the mixing bowl."] },
    ]);
    k.runner.run();
    expect(bowlNumbers(k, 1)).toEqual([5n]);
    expect(bowlNumbers(k, 2)).toEqual([7n]);
    expect(k.output.text()).toBe("5\n7");
  });

  it("overwrites the caller's bowls with the callee's", () => {
    const k = kitchen([
      { title: "Main", ingredients: ["7 g seven"], method: ["Put seven into mixing bowl 2.", "Serve with helper."] },
      {
        title: "Helper",
        ingredients: ["0 g five"],
        method: ["Fold five into mixing bowl 2.", "Put five into the mixing bowl."],
      },
    ]);
    k.runner.run();
    expect(bowlNumbers(k, 1)).toEqual([7n]);
    expect(bowlNumbers(k, 2)).toEqual([]);
  });

  it("gives each recipe its own ingredients", () => {
    const k = kitchen([
      { title: "Main", ingredients: ["1 g x"], method: ["Serve with helper.", "Put x into the mixing bowl."] },
      { title: "Helper", ingredients: ["2 g x"], method: ["Put x into the mixing bowl."] },
    ]);
    k.runner.run();
    expect(bowlNumbers(k)).toEqual([2n, 1n]);
  });

  it("ends a called recipe early on Refrigerate", () => {
    const out = cookText([
      { title: "Main", method: ["Serve with helper.", POUR], serves: 1 },
      {
        title: "Helper",
        ingredients: ["5 g five"],
        method: ["Put five into the mixing bowl.", "Refrigerate.", "Put five into the mixing bowl."],
      },
    ]);
    expect(out).toBe("5");
  });

  it("serves nothing from a called recipe", () => {
    const out = cookText([
      { title: "Main", method: ["Serve with helper."], serves: 1 },
      {
        title: "Helper",
        ingredients: ["5 g five"],
        method: ["Put five into the mixing bowl.", POUR, "Refrigerate for 1 hour."],
        serves: 1,
      },
    ]);
    expect(out).toBe("");
  });

  it("serves the given number of dishes when the main recipe is refrigerated", () => {
    const out = cookText([
      {
        title: "Early",
        ingredients: ["72 ml h"],
        method: ["Put h into the mixing bowl.", POUR, "Refrigerate for 1 hour.", "Put h into the mixing bowl.", POUR],
        serves: 2,
      },
    ]);
    expect(out).toBe("H");
  });

  it("serves nothing when the main recipe is refrigerated without hours", () => {
    const out = cookText([
      { title: "Early", ingredients: ["72 ml h"], method: ["Put h into the mixing bowl.", POUR, "Refrigerate."], serves: 1 },
    ]);
    expect(out).toBe("");
  });

  it("stops runaway recursion at the call depth limit", () => {
    const k = kitchen([{ title: "Forever", method: ["Serve with forever."] }], { maxCallDepth: 5 });
    const err = runError(k);
    expect(err.code).toBe("E0311");
    const depths = k.trace.events.flatMap((e) => (e.tag === "E_RecipeEnter" ? [e.depth] : []));
    expect(depths).toEqual([0, 1, 2, 3, 4, 5]);
  });
});

describe("Runner: tracing", () => {
  it("emits recipe and step events", () => {
    const k = kitchen([{ title: "Trace", ingredients: ["1 g a"], method: ["Put a into the mixing bowl."] }], {
      traceSteps: true,
    });
    expect(k.runner.run()).toEqual({ steps: 1 });
    expect(k.trace.events).toEqual([
      { tag: "E_RecipeEnter", recipe: "Trace", depth: 0 },
      { tag: "E_Step", recipe: "Trace", depth: 0, index: 0, instruction: "Push" },
      { tag: "E_RecipeExit", recipe: "Trace", depth: 0, steps: 1 },
    ]);
  });

  it("leaves step events out by default", () => {
    const k = kitchen([{ title: "Quiet", ingredients: ["1 g a"], method: ["Put a into the mixing bowl."] }]);
    k.runner.run();
    expect(k.trace.events.map((e) => e.tag)).toEqual(["E_RecipeEnter", "E_RecipeExit"]);
  });
});

import { recipeKey, type Instruction, type Program, type Recipe } from "../ast";
import type { Span } from "../meta";
import { chefError } from "../../outcome/error";
import type { DiagnosticCode } from "../../outcome/codes";
import type { PortSet } from "../../ports/composite";
import type { ExecContext } from "../../ports/types";
import { Frame } from "./frame";
import { serve } from "./serve";
import { combine, copyValue, liquefy, value } from "./values";

export type RunOptions = {
  /** 0 means no limit. */
  maxSteps?: number;
  maxCallDepth?: number;
  /** Emit one E_Step trace event per executed instruction. */
  traceSteps?: boolean;
};

export type RunResult = {
  steps: number;
};

export const DEFAULT_MAX_CALL_DEPTH = 1000;

/**
 * Tree-walking interpreter. One instance per run; recipe calls recurse on
 * the native stack, each with its own Frame.
 */
export class Runner {
  /** Frame of the main recipe; kept after the run for inspection. */
  readonly mainFrame: Frame;
  private steps = 0;
  private readonly maxSteps: number;
  private readonly maxCallDepth: number;
  private readonly traceSteps: boolean;

  constructor(
    private readonly program: Program,
    private readonly ports: PortSet,
    private readonly ctx: ExecContext,
    options: RunOptions = {}
  ) {
    this.maxSteps = options.maxSteps ?? 0;
    this.maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
    this.traceSteps = options.traceSteps ?? false;
    this.mainFrame = Frame.enter(program.main);
  }

  get stepCount(): number {
    return this.steps;
  }

  run(): RunResult {
    this.execute(this.mainFrame);
    return { steps: this.steps };
  }

  private execute(frame: Frame): void {
    const { recipe } = frame;
    this.ctx.trace.emit({ tag: "E_RecipeEnter", recipe: recipe.name, depth: frame.depth });

    while (frame.ip < recipe.instructions.length) {
      const index = frame.ip;
      const ins = recipe.instructions[index];
      this.tick(recipe, frame, index, ins);

      const next = this.step(frame, ins, recipe.spans[index]);
      if (next === "return") break;
      frame.ip = next ?? index + 1;
    }

    this.ctx.trace.emit({ tag: "E_RecipeExit", recipe: recipe.name, depth: frame.depth, steps: this.steps });
  }

  private tick(recipe: Recipe, frame: Frame, index: number, ins: Instruction): void {
    this.steps++;
    if (this.maxSteps > 0 && this.steps > this.maxSteps) {
      throw chefError("E0310", { limit: this.maxSteps }, recipe.spans[index]);
    }
    if (this.traceSteps) {
      this.ctx.trace.emit({ tag: "E_Step", recipe: recipe.name, depth: frame.depth, index, instruction: ins.tag });
    }
  }

  /**
   * Execute one instruction. Returns the next instruction index when control
   * does not simply fall through, or "return" when the frame ends.
   */
  private step(frame: Frame, ins: Instruction, span: Span | undefined): number | "return" | undefined {
    const fail = (code: DiagnosticCode, params: Record<string, string | number>) => chefError(code, params, span);

    switch (ins.tag) {
      case "Read": {
        const binding = frame.binding(ins.ingredient, span);
        const n = this.ports.input.read(this.ctx);
        if (n === undefined) {
          throw fail("E0304", { ingredient: ins.ingredient });
        }
        binding.value = value(n, binding.kind === "liquid");
        return undefined;
      }

      case "Push":
        frame.bowl(ins.bowl).push(frame.get(ins.ingredient, span));
        return undefined;

      case "Pop":
        frame.binding(ins.ingredient, span);
        frame.set(ins.ingredient, frame.popBowl(ins.bowl, span), span);
        return undefined;

      case "Add":
      case "Subtract":
      case "Multiply":
      case "Divide": {
        const operand = frame.get(ins.ingredient, span);
        const top = frame.peekBowl(ins.bowl, span);
        if (ins.tag === "Divide" && operand.number === 0n) {
          throw fail("E0302", { ingredient: ins.ingredient });
        }
        const stack = frame.bowl(ins.bowl);
        stack[stack.length - 1] = combine(ins.tag, top, operand);
        return undefined;
      }

      case "AddDry":
        frame.bowl(ins.bowl).push(value(frame.dryTotal(), false));
        return undefined;

      case "Liquefy":
        liquefy(frame.get(ins.ingredient, span));
        return undefined;

      case "LiquefyContents": {
        const stack = frame.bowl(ins.bowl);
        for (let i = 0; i < stack.length; i++) {
          stack[i] = value(stack[i].number, true);
        }
        return undefined;
      }

      case "Stir":
        stir(frame, ins.bowl, BigInt(ins.minutes), span);
        return undefined;

      case "StirIngredient":
        stir(frame, ins.bowl, frame.get(ins.ingredient, span).number, span);
        return undefined;

      case "Mix": {
        const stack = frame.bowl(ins.bowl);
        for (let i = stack.length - 1; i > 0; i--) {
          const j = this.ports.rng.nextInt(0, i + 1, this.ctx);
          [stack[i], stack[j]] = [stack[j], stack[i]];
        }
        return undefined;
      }

      case "ClearStack":
        frame.bowl(ins.bowl).length = 0;
        return undefined;

      case "CopyStack": {
        const dish = frame.dish(ins.dish);
        for (const v of frame.bowl(ins.bowl)) {
          dish.push(copyValue(v));
        }
        return undefined;
      }

      case "LoopStart":
        return frame.get(ins.ingredient, span).number === 0n ? ins.end + 1 : undefined;

      case "LoopEnd":
        if (ins.ingredient !== undefined) {
          const current = frame.get(ins.ingredient, span);
          frame.set(ins.ingredient, value(current.number - 1n, current.liquid), span);
        }
        return ins.start;

      case "Break":
        return ins.end + 1;

      case "Call":
        this.call(frame, ins.recipe, span);
        return undefined;

      case "Return":
        if (frame.depth === 0 && ins.hours !== undefined) {
          serve(frame, ins.hours, this.ports.output, this.ctx, span);
        }
        return "return";

      case "PrintStacks":
        if (frame.depth === 0) {
          serve(frame, ins.dishes, this.ports.output, this.ctx, span);
        }
        return undefined;
    }
  }

  /** Copy bowls in, run the callee to completion, copy its bowls back. */
  private call(caller: Frame, name: string, span: Span | undefined): void {
    const recipe = this.program.recipes.get(recipeKey(name));
    if (!recipe) {
      throw chefError("E0305", { name }, span);
    }
    if (caller.depth + 1 > this.maxCallDepth) {
      throw chefError("E0311", { limit: this.maxCallDepth }, span);
    }

    const callee = Frame.enter(recipe, caller);
    this.execute(callee);
    callee.copyBowlsTo(caller);
  }
}

/**
 * Move the top of a bowl `depth` places down. A bowl shallower than that gets
 * it at the bottom.
 */
function stir(frame: Frame, bowl: number, depth: bigint, span: Span | undefined): void {
  const top = frame.popBowl(bowl, span);
  const stack = frame.bowl(bowl);
  const places = depth <= 0n ? 0 : depth >= BigInt(stack.length) ? stack.length : Number(depth);
  stack.splice(stack.length - places, 0, top);
}

export function runProgram(
  program: Program,
  ports: PortSet,
  ctx: ExecContext,
  options?: RunOptions
): RunResult {
  return new Runner(program, ports, ctx, options).run();
}

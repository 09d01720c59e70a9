import type { Span } from "../meta";
import type { OutputPort } from "../../ports/sink";
import type { ExecContext } from "../../ports/types";
import type { Frame } from "./frame";
import { renderValue } from "./values";

/**
 * Drain baking dishes 1..dishes, top first, writing each value as it is
 * popped. A single line break separates consecutive dishes.
 */
export function serve(frame: Frame, dishes: number, output: OutputPort, ctx: ExecContext, span?: Span): void {
  for (let n = 1; n <= dishes; n++) {
    if (n > 1) output.write("\n", ctx);
    const dish = frame.dish(n);
    while (dish.length > 0) {
      output.write(renderValue(frame.popDish(n, span), span), ctx);
    }
  }
}

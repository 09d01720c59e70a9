import type { ExecContext } from "./types";

/**
 * Input port: where "Take ... from refrigerator" gets its numbers.
 */
export interface InputPort {
  /**
   * Next value in program order, or undefined once the input is exhausted.
   */
  read(ctx: ExecContext): bigint | undefined;
}

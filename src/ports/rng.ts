import type { ExecContext } from "./types";

/**
 * RNG port interface.
 * MUST be used for all randomness ("Mix ... well") to enable deterministic replay.
 */
export interface RngPort {
  /**
   * Get random integer in [min, max).
   */
  nextInt(min: number, max: number, ctx: ExecContext): number;
}

import type { ExecContext } from "./types";

/**
 * Output port. Receives served text in the order it is produced, unbuffered.
 */
export interface OutputPort {
  write(text: string, ctx: ExecContext): void;
}

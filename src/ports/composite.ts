import type { RngPort } from "./rng";
import type { OutputPort } from "./sink";
import type { InputPort } from "./source";

/**
 * Complete set of ports for a run.
 */
export interface PortSet {
  input: InputPort;
  output: OutputPort;
  rng: RngPort;
}


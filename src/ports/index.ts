export type { ExecContext, TraceEvent, TraceSink } from "./types";
export { nullTrace } from "./types";
export type { InputPort } from "./source";
export type { OutputPort } from "./sink";
export type { RngPort } from "./rng";
export type { PortSet } from "./composite";

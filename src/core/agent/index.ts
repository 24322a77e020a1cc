export { ReactAgent, DEFAULT_MAX_ITERATIONS, DEFAULT_STEP_TIMEOUT_MS } from "./reactAgent";
export type { ReactAgentOptions, LoopState } from "./reactAgent";
export { BaselineAgent } from "./baselineAgent";
export type { BaselineAgentOptions } from "./baselineAgent";
export { TraceRecorder, renderCall, renderStep, renderTrace } from "./traceRecorder";
export type { RenderOptions } from "./traceRecorder";
export { parseModelReply, splitArguments } from "./reactParser";
export type { ParsedReply, ParseOptions } from "./reactParser";
export { withTimeout } from "./withTimeout";
export { callModel } from "./modelStep";

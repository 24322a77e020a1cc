/**
 * Core type definitions shared by the data layer, the tools and both agents.
 */

/**
 * One published figure: average household spending on a category in a period.
 */
export interface SpendingRecord {
  readonly category: string; // SSB category code, e.g. "04"
  readonly categoryLabel: string;
  readonly period: string;
  readonly amount: number;
  readonly unit: string;
  readonly sourceTableId: string;
}

export interface CategoryInfo {
  readonly code: string;
  readonly label: string;
}

/**
 * Frozen snapshot of one statistics table. Replaced as a whole on refresh.
 */
export interface Dataset {
  readonly tableId: string;
  readonly label: string;
  readonly fetchedAt: number;
  readonly schemaVersion: number;
  readonly records: readonly SpendingRecord[];
  readonly categories: readonly CategoryInfo[];
  readonly periods: readonly string[];
}

/**
 * Anything that can hand out a Dataset by table id (DataStore, or a fake in tests).
 */
export interface DatasetProvider {
  getDataset(tableId: string): Promise<Dataset>;
}

export interface ToolCall {
  readonly toolName: string;
  readonly arguments: Readonly<Record<string, unknown>>;
}

export interface Provenance {
  readonly tableId: string;
  readonly period: string;
}

export type ObservationErrorType = "ToolArgumentError" | "ToolLookupError";

export interface Observation {
  readonly toolName: string;
  readonly ok: boolean;
  readonly result?: unknown;
  /** Text fed back to the model. */
  readonly summary: string;
  readonly provenance?: Provenance;
  readonly error?: {
    readonly type: ObservationErrorType;
    readonly message: string;
  };
}

export type StepErrorKind = "parse" | "timeout";

export type ReasoningStep =
  | { readonly type: "thought"; readonly text: string }
  | { readonly type: "action"; readonly call: ToolCall }
  | { readonly type: "observation"; readonly observation: Observation }
  | { readonly type: "final_answer"; readonly text: string }
  | { readonly type: "error"; readonly kind: StepErrorKind; readonly message: string; readonly raw?: string };

export type Trace = readonly ReasoningStep[];

export type AgentKind = "react" | "baseline";

export type AgentStatus = "concluded" | "failed";

export type FailureReason =
  | "parse_failure"
  | "timeout"
  | "iteration_limit"
  | "data_unavailable"
  | "model_error"
  | "unexpected_error";

export interface AgentFailure {
  readonly reason: FailureReason;
  readonly message: string;
}

/**
 * Uniform result of `answer(question)` for both agent kinds.
 */
export interface AgentResult {
  readonly runId: string;
  readonly agent: AgentKind;
  readonly question: string;
  readonly finalText: string;
  readonly trace: Trace;
  readonly iterationCount: number;
  readonly toolCallCount: number;
  readonly status: AgentStatus;
  readonly failure?: AgentFailure;
  readonly durationMs: number;
}

export interface Agent {
  readonly kind: AgentKind;
  answer(question: string): Promise<AgentResult>;
}

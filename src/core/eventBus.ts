/**
 * Minimal typed Event Bus with append-only history
 * - emits events in-process (sync)
 * - keeps a bounded in-memory history for inspection
 */

import { ulid } from "ulid";
import type { LogLevel } from "./logger/config";
import type {
  AgentFailure,
  AgentKind,
  AgentStatus,
  Provenance,
  ReasoningStep,
} from "./types";

export interface EventPayloads {
  DatasetCacheHitEvent: { tableId: string; layer: "memory" | "disk"; fetchedAt: number };
  DatasetFetchedEvent: { tableId: string; records: number; fetchedAt: number };
  DatasetStaleServedEvent: { tableId: string; fetchedAt: number; ageMs: number; error: string };
  ToolInvocationEvent: { toolName: string; args: Readonly<Record<string, unknown>> };
  ToolResultEvent: { toolName: string; provenance?: Provenance };
  ToolErrorEvent: { toolName: string; errorType: string; message: string };
  AgentStartEvent: { runId: string; agent: AgentKind; question: string };
  AgentStepEvent: { runId: string; agent: AgentKind; iteration: number; step: ReasoningStep };
  AgentFinishEvent: {
    runId: string;
    agent: AgentKind;
    status: AgentStatus;
    iterationCount: number;
    durationMs: number;
    failure?: AgentFailure;
  };
  ModelResponseEvent: { modelId: string; attempt: number; chars: number };
  ModelErrorEvent: { modelId: string; attempt: number; code: string; message: string };
  LogEvent: { level: LogLevel; source?: string; message: string; data?: Record<string, unknown> };
}

export type EventType = keyof EventPayloads;

export interface EventEnvelope<K extends EventType = EventType> {
  id: string;
  type: K;
  timestamp: number;
  payload: EventPayloads[K];
  meta?: Record<string, unknown>;
}

export type Listener<K extends EventType> = (evt: EventEnvelope<K>) => void;
type AnyListener = (evt: EventEnvelope) => void;

export interface EventBusConfig {
  maxHistorySize?: number; // Maximum number of events in memory
  historyRetentionPolicy?: "truncate" | "circular";
}

export class EventBus {
  // keyed by the caller's listener so `off` can find the narrowing wrapper
  private listeners: Map<EventType, Map<unknown, AnyListener>> = new Map();
  private anyListeners: Set<AnyListener> = new Set();
  public history: EventEnvelope[] = [];
  private config: Required<EventBusConfig>;

  constructor(config: EventBusConfig = {}) {
    this.config = {
      maxHistorySize: config.maxHistorySize ?? 10000,
      historyRetentionPolicy: config.historyRetentionPolicy ?? "truncate",
    };
  }

  on<K extends EventType>(type: K, listener: Listener<K>): void {
    let typed = this.listeners.get(type);
    if (!typed) {
      typed = new Map();
      this.listeners.set(type, typed);
    }
    typed.set(listener, (evt) => {
      if (isEnvelopeOf(evt, type)) listener(evt);
    });
  }

  off<K extends EventType>(type: K, listener: Listener<K>): void {
    this.listeners.get(type)?.delete(listener);
  }

  onAny(listener: AnyListener): void {
    this.anyListeners.add(listener);
  }

  offAny(listener: AnyListener): void {
    this.anyListeners.delete(listener);
  }

  emit<K extends EventType>(
    type: K,
    payload: EventPayloads[K],
    meta?: Record<string, unknown>
  ): EventEnvelope<K> {
    const envelope: EventEnvelope<K> = {
      id: ulid(),
      type,
      timestamp: Date.now(),
      payload,
      meta,
    };

    this.history.push(envelope);

    if (this.history.length > this.config.maxHistorySize) {
      if (this.config.historyRetentionPolicy === "truncate") {
        const excess = this.history.length - this.config.maxHistorySize;
        this.history.splice(0, excess);
      } else {
        this.history.shift();
      }
    }

    const typed = this.listeners.get(type);
    if (typed) {
      for (const l of typed.values()) {
        try {
          l(envelope);
        } catch (e) {
          console.error(`[EventBus] Listener error for ${type}:`, e);
        }
      }
    }

    for (const l of this.anyListeners) {
      try {
        l(envelope);
      } catch (e) {
        console.error(`[EventBus] Listener error (any):`, e);
      }
    }

    return envelope;
  }

  /**
   * Get history with optional filtering
   */
  getHistory(options?: { since?: number; limit?: number; type?: EventType }): EventEnvelope[] {
    let filtered = this.history;

    const since = options?.since;
    if (since !== undefined) {
      filtered = filtered.filter((e) => e.timestamp >= since);
    }

    const type = options?.type;
    if (type) {
      filtered = filtered.filter((e) => e.type === type);
    }

    if (options?.limit) {
      filtered = filtered.slice(-options.limit);
    }

    return filtered;
  }
}

function isEnvelopeOf<K extends EventType>(evt: EventEnvelope, type: K): evt is EventEnvelope<K> {
  return evt.type === type;
}

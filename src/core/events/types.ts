// src/core/events/types.ts
// Events emitted by the engine to external observers

import type { TypeKind } from "../../registry/types";
import type { FailureKind } from "../../outcome/failure";

export type AdtEvent =
  | { tag: "TypeDefined"; name: string; kind: TypeKind; memberCount: number; revision: number; timestamp: number }
  | { tag: "DefinitionRejected"; name: string; errorKind: FailureKind; timestamp: number }
  | { tag: "InstanceConstructed"; type: string; variant?: string; durationMs: number; timestamp: number }
  | { tag: "ValidationFailed"; type: string; variant?: string; errorKind: FailureKind; timestamp: number }
  | { tag: "PatternCompiled"; type: string; signature: string; durationMs: number; exhaustive: boolean; cached: boolean; timestamp: number }
  | { tag: "CompileFailed"; type: string; signature: string; errorKind: FailureKind; timestamp: number }
  | { tag: "PatternDispatched"; type: string; variant: string; clauseIndex: number; durationMs: number; timestamp: number }
  | { tag: "DispatchFailed"; type: string; variant?: string; errorKind: FailureKind; timestamp: number }
  | { tag: "LazyForced"; cellId: string; durationMs: number; timestamp: number }
  | { tag: "LazyForceFailed"; cellId: string; errorKind: FailureKind; timestamp: number }
  | { tag: "InstanceSynthesized"; type: string; variant: string; ruleIndex: number; durationMs: number; timestamp: number }
  | { tag: "SynthesisFailed"; type: string; errorKind: FailureKind; timestamp: number };

export type AdtEventKind = AdtEvent["tag"];

export type EventOf<K extends AdtEventKind> = Extract<AdtEvent, { tag: K }>;

/**
 * Event payload without its timestamp; the bus stamps events on emit.
 */
export type EventPayload = DistributiveOmit<AdtEvent, "timestamp">;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * Kinds a subscriber wants: an explicit list or a predicate.
 */
export type EventFilter = readonly AdtEventKind[] | ((kind: AdtEventKind) => boolean);

export type EventListener = (event: AdtEvent) => void;

export interface SubscriptionHandle {
  readonly id: number;
  unsubscribe(): boolean;
}

/**
 * What the engine's components need from a sink.
 */
export interface EventEmitter {
  /** False when nobody would receive an event, letting callers skip building it. */
  readonly active: boolean;
  emit(event: EventPayload): void;
}

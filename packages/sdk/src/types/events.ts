/**
 * Event system types and constants.
 */

import type { PlanCacheDiff } from "./plancache.js";

/** Poller event type constants. */
export const PollerEventType = {
  PLANCACHE_CHANGED: "plancache_changed",
  CPU_UTIL_CHANGED: "cpu_util_changed",
  MEM_USAGE_CHANGED: "mem_usage_changed",
  POLL_ERROR: "poll_error",
} as const;

export type PollerEventTypeValue = (typeof PollerEventType)[keyof typeof PollerEventType];

/** Which step of a poll cycle failed. */
export type PollStage = "plancache" | "memory";

export interface PollErrorPayload {
  stage: PollStage;
  error: Error;
}

interface BaseEvent {
  timestamp: number;
}

export interface PlanCacheChangedEvent extends BaseEvent {
  type: typeof PollerEventType.PLANCACHE_CHANGED;
  payload: PlanCacheDiff;
}

export interface CpuUtilChangedEvent extends BaseEvent {
  type: typeof PollerEventType.CPU_UTIL_CHANGED;
  payload: number;
}

export interface MemUsageChangedEvent extends BaseEvent {
  type: typeof PollerEventType.MEM_USAGE_CHANGED;
  payload: number;
}

export interface PollErrorEvent extends BaseEvent {
  type: typeof PollerEventType.POLL_ERROR;
  payload: PollErrorPayload;
}

/** An event emitted by the poller. */
export type PollerEvent =
  | PlanCacheChangedEvent
  | CpuUtilChangedEvent
  | MemUsageChangedEvent
  | PollErrorEvent;

/** Handler function for events. */
export type EventHandler = (event: PollerEvent) => void | Promise<void>;

/** EventBus interface for pub/sub communication. */
export interface EventBus {
  on(type: PollerEventTypeValue, handler: EventHandler): () => void;
  onAny(handler: EventHandler): () => void;
  emit(event: PollerEvent): void;
}

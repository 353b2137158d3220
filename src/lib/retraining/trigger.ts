import type { RetrainingBatch, RetrainingBatchReason, RetrainingState } from "@/lib/types";
import { msBetween, randomId } from "@/lib/utils";

export interface TriggerResult {
  state: RetrainingState;
  batch: RetrainingBatch | null;
}

export function emptyRetrainingState(at: string): RetrainingState {
  return { pendingConsensusIds: [], updatedAt: at };
}

function emit(state: RetrainingState, at: string, reason: RetrainingBatchReason): TriggerResult {
  const batch: RetrainingBatch = {
    id: randomId("batch"),
    consensusIds: [...state.pendingConsensusIds],
    reason,
    status: "pending",
    triggeredAt: at,
    offerCount: 0
  };
  return { state: emptyRetrainingState(at), batch };
}

export function recordConsensus(state: RetrainingState, consensusId: string, at: string, batchSize: number): TriggerResult {
  if (state.pendingConsensusIds.includes(consensusId)) {
    return { state, batch: null };
  }
  const next: RetrainingState = {
    pendingConsensusIds: [...state.pendingConsensusIds, consensusId],
    windowStartedAt: state.windowStartedAt ?? at,
    updatedAt: at
  };
  if (next.pendingConsensusIds.length >= batchSize) {
    return emit(next, at, "size");
  }
  return { state: next, batch: null };
}

/** Emits a partial batch once the oldest accumulated result has waited `maxAgeMs`. */
export function flushIfAged(state: RetrainingState, at: string, maxAgeMs: number): TriggerResult {
  if (!state.pendingConsensusIds.length || !state.windowStartedAt) {
    return { state, batch: null };
  }
  if (msBetween(state.windowStartedAt, at) < maxAgeMs) {
    return { state, batch: null };
  }
  return emit(state, at, "age");
}

export function isDueForOffer(batch: RetrainingBatch, at: string, ackTimeoutMs: number): boolean {
  if (batch.status === "pending") return true;
  if (batch.status !== "sent" || !batch.lastOfferedAt) return false;
  return msBetween(batch.lastOfferedAt, at) >= ackTimeoutMs;
}

export function markOffered(batch: RetrainingBatch, at: string): RetrainingBatch {
  return { ...batch, status: "sent", offerCount: batch.offerCount + 1, lastOfferedAt: at };
}

export function acknowledge(batch: RetrainingBatch, at: string, modelVersion?: string): RetrainingBatch {
  if (batch.status === "acknowledged") return batch;
  return { ...batch, status: "acknowledged", acknowledgedAt: at, trainedModelVersion: modelVersion ?? batch.trainedModelVersion };
}

import { describe, expect, it } from "vitest";
import {
  acknowledge,
  emptyRetrainingState,
  flushIfAged,
  isDueForOffer,
  markOffered,
  recordConsensus
} from "../../src/lib/retraining/trigger";
import type { RetrainingBatch, RetrainingState } from "../../src/lib/types";

const T0 = "2026-01-01T00:00:00.000Z";
const HOUR = 60 * 60 * 1000;

function at(ms: number) {
  return new Date(Date.parse(T0) + ms).toISOString();
}

describe("retraining trigger", () => {
  it("emits exactly one batch for ten results at batch size ten and does not re-trigger on the eleventh", () => {
    let state: RetrainingState = emptyRetrainingState(T0);
    const batches: RetrainingBatch[] = [];
    for (let i = 1; i <= 11; i += 1) {
      const result = recordConsensus(state, `cons_${i}`, at(i * 1000), 10);
      state = result.state;
      if (result.batch) batches.push(result.batch);
    }
    expect(batches).toHaveLength(1);
    expect(batches[0].consensusIds).toEqual(Array.from({ length: 10 }, (_, i) => `cons_${i + 1}`));
    expect(batches[0]).toMatchObject({ reason: "size", status: "pending", offerCount: 0 });
    expect(state.pendingConsensusIds).toEqual(["cons_11"]);
    expect(state.windowStartedAt).toBe(at(11_000));
  });

  it("ignores a consensus id it already holds", () => {
    const first = recordConsensus(emptyRetrainingState(T0), "cons_1", T0, 10);
    const again = recordConsensus(first.state, "cons_1", at(1000), 10);
    expect(again.state.pendingConsensusIds).toEqual(["cons_1"]);
    expect(again.batch).toBeNull();
  });

  it("flushes a partial batch once the window is old enough", () => {
    const { state } = recordConsensus(emptyRetrainingState(T0), "cons_1", T0, 10);
    expect(flushIfAged(state, at(HOUR), 6 * HOUR).batch).toBeNull();
    const flushed = flushIfAged(state, at(6 * HOUR), 6 * HOUR);
    expect(flushed.batch).toMatchObject({ reason: "age", consensusIds: ["cons_1"] });
    expect(flushed.state.pendingConsensusIds).toEqual([]);
    expect(flushed.state.windowStartedAt).toBeUndefined();
  });

  it("never flushes an empty accumulator", () => {
    expect(flushIfAged(emptyRetrainingState(T0), at(100 * HOUR), HOUR).batch).toBeNull();
  });

  it("re-offers a sent batch only after the acknowledgement timeout", () => {
    const pending: RetrainingBatch = {
      id: "batch_1",
      consensusIds: ["cons_1"],
      reason: "size",
      status: "pending",
      triggeredAt: T0,
      offerCount: 0
    };
    expect(isDueForOffer(pending, T0, HOUR)).toBe(true);
    const sent = markOffered(pending, T0);
    expect(sent).toMatchObject({ status: "sent", offerCount: 1, lastOfferedAt: T0 });
    expect(isDueForOffer(sent, at(HOUR - 1), HOUR)).toBe(false);
    expect(isDueForOffer(sent, at(HOUR), HOUR)).toBe(true);

    const acked = acknowledge(sent, at(2 * HOUR), "model-v2");
    expect(acked).toMatchObject({ status: "acknowledged", acknowledgedAt: at(2 * HOUR), trainedModelVersion: "model-v2" });
    expect(isDueForOffer(acked, at(10 * HOUR), HOUR)).toBe(false);
    expect(acknowledge(acked, at(3 * HOUR))).toBe(acked);
  });
});

import { describe, expect, it } from "vitest";
import { assignmentScore, isEligibleFor, rankCandidates, selectAnnotator } from "../../src/lib/assignment/select";
import type { Annotator } from "../../src/lib/types";

function mkAnnotator(id: string, overrides: Partial<Annotator> = {}): Annotator {
  return {
    id,
    prior: 0.5,
    reliability: 0.5,
    openTaskCount: 0,
    maxConcurrentTasks: 4,
    agreementCount: 0,
    disagreementCount: 0,
    completedCount: 0,
    totalAnnotationMs: 0,
    votesCast: 0,
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
    ...overrides
  };
}

describe("assignment selection", () => {
  it("scores reliability weighted by free capacity", () => {
    expect(assignmentScore(mkAnnotator("a", { reliability: 0.8, openTaskCount: 1 }))).toBeCloseTo(0.6, 10);
    expect(assignmentScore(mkAnnotator("b", { reliability: 0.8, openTaskCount: 4 }))).toBe(0);
  });

  it("prefers the more reliable annotator at equal load", () => {
    const picked = selectAnnotator([mkAnnotator("low", { reliability: 0.4 }), mkAnnotator("high", { reliability: 0.8 })], []);
    expect(picked?.id).toBe("high");
  });

  it("prefers a lightly loaded annotator over a busy, more reliable one", () => {
    const busy = mkAnnotator("busy", { reliability: 0.9, openTaskCount: 3 });
    const idle = mkAnnotator("idle", { reliability: 0.5 });
    expect(selectAnnotator([busy, idle], [])?.id).toBe("idle");
  });

  it("breaks score ties by open task count, then id", () => {
    const ranked = rankCandidates(
      [
        mkAnnotator("c", { reliability: 0.5, openTaskCount: 0 }),
        mkAnnotator("b", { reliability: 0.5, openTaskCount: 0 }),
        mkAnnotator("a", { reliability: 1, openTaskCount: 2 })
      ],
      []
    );
    expect(ranked.map((c) => c.annotator.id)).toEqual(["b", "c", "a"]);
  });

  it("excludes participants and annotators at capacity", () => {
    const full = mkAnnotator("full", { openTaskCount: 4 });
    const participant = mkAnnotator("participant");
    expect(isEligibleFor(full, [])).toBe(false);
    expect(isEligibleFor(participant, ["participant"])).toBe(false);
    expect(selectAnnotator([full, participant], ["participant"])).toBeNull();
  });
});

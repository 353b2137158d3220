import { describe, expect, it } from "vitest";
import { loadEngineConfig } from "../../src/lib/config";
import { LabelingEngine, type EngineHooks } from "../../src/lib/engine";
import {
  AnnotatorNotAssignedError,
  ConsensusPendingError,
  InvalidStateTransitionError,
  NoEligibleAnnotatorError,
  NotFoundError,
  SelfVoteError,
  ValidationError
} from "../../src/lib/errors";
import type { EngineConfigInput } from "../../src/lib/schemas";
import { MemoryStore } from "../../src/lib/store/memory";
import type { Annotation, ManualReviewRequired, RetrainingBatch } from "../../src/lib/types";

const MINUTE = 60 * 1000;

function mkClock(start = "2026-03-01T09:00:00.000Z") {
  let current = Date.parse(start);
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    }
  };
}

function setup(overrides: EngineConfigInput = {}, hooks: EngineHooks = {}, store = new MemoryStore()) {
  const clock = mkClock();
  const engine = new LabelingEngine({
    store,
    config: loadEngineConfig({ env: {}, overrides }),
    clock: clock.now,
    hooks
  });
  return { engine, store, clock };
}

/** A long-running service and a job runner over one store, reading the same clock. */
function setupShared(overrides: EngineConfigInput = {}) {
  const store = new MemoryStore();
  const clock = mkClock();
  const config = loadEngineConfig({ env: {}, overrides });
  const service = new LabelingEngine({ store, config, clock: clock.now });
  const job = new LabelingEngine({ store, config, clock: clock.now });
  return { service, job, store, clock };
}

function predictionInput(id: string, uncertainty = 0.8) {
  return { id, videoId: `video_${id}`, uncertainty, modelVersion: "captioner-v1", caption: "a dog" };
}

async function driveToVoting(engine: LabelingEngine, predictionId: string) {
  const { taskId } = await engine.ingestPrediction(predictionInput(predictionId));
  const pool = [`${predictionId}_w1`, `${predictionId}_w2`];
  const first = await engine.assignNext(pool);
  const second = await engine.assignNext(pool);
  expect([first.taskId, second.taskId]).toEqual([taskId, taskId]);
  const annotations: Annotation[] = [
    await engine.submitAnnotation(taskId, first.annotatorId, "a dog on a beach"),
    await engine.submitAnnotation(taskId, second.annotatorId, "a dog running on sand")
  ];
  return { taskId, annotations };
}

async function reachConsensus(engine: LabelingEngine, predictionId: string) {
  const { taskId, annotations } = await driveToVoting(engine, predictionId);
  for (const voter of ["v1", "v2", "v3"]) {
    await engine.submitVote(annotations[0].id, `${predictionId}_${voter}`, true);
  }
  return engine.finalizeConsensus(taskId);
}

describe("LabelingEngine end to end", () => {
  it("routes, annotates, votes and accepts the red car caption", async () => {
    const { engine, clock } = setup();
    await engine.registerAnnotator({ id: "ann_a", initialReliability: 0.8 });
    await engine.registerAnnotator({ id: "ann_b", initialReliability: 0.4 });
    const { taskId, created } = await engine.ingestPrediction(predictionInput("pred_1", 0.9));
    expect(created).toBe(true);

    expect(await engine.assignNext(["ann_a", "ann_b"])).toEqual({ taskId, annotatorId: "ann_a" });
    expect(await engine.assignNext(["ann_a", "ann_b"])).toEqual({ taskId, annotatorId: "ann_b" });
    expect(await engine.listQueue()).toEqual([]);

    clock.advance(MINUTE);
    const red = await engine.submitAnnotation(taskId, "ann_a", "a red car");
    expect((await engine.getTask(taskId)).status).toBe("annotated");
    clock.advance(MINUTE);
    const blue = await engine.submitAnnotation(taskId, "ann_b", "a blue car");
    expect((await engine.getTask(taskId)).status).toBe("voting");

    await engine.submitVote(red.id, "ann_b", true);
    await engine.submitVote(red.id, "ann_c", true);
    await engine.submitVote(blue.id, "ann_d", true);
    expect(await engine.getAgreementRatio(taskId)).toBeCloseTo(2 / 3, 10);

    const result = await engine.finalizeConsensus(taskId);
    expect(result.caption).toBe("a red car");
    expect(result.annotationId).toBe(red.id);
    expect(result.lowConfidence).toBe(false);
    expect(result.confidence).toBe(0.58);
    expect(result.contributingAnnotationIds).toEqual([red.id, blue.id]);

    const task = await engine.getTask(taskId);
    expect(task.status).toBe("consensus_reached");
    expect(task.consensusId).toBe(result.id);
    expect(task.followUp).toEqual({ reliabilityApplied: true, retrainingRecorded: true });

    expect(await engine.getAnnotatorMetrics("ann_a")).toEqual({
      annotatorId: "ann_a",
      reliability: 0.9,
      throughput: 1,
      disagreementRate: 0,
      averageTaskSeconds: 60,
      openTaskCount: 0
    });
    expect(await engine.getAnnotatorMetrics("ann_b")).toEqual({
      annotatorId: "ann_b",
      reliability: 0.2,
      throughput: 1,
      disagreementRate: 1,
      averageTaskSeconds: 120,
      openTaskCount: 0
    });
    expect((await engine.getAnnotatorMetrics("ann_c")).reliability).toBe(0.75);
    expect((await engine.getAnnotatorMetrics("ann_d")).reliability).toBe(0.25);
  });

  it("creates one task per prediction under repeated and concurrent ingestion", async () => {
    const { engine } = setup();
    const outcomes = await Promise.all(Array.from({ length: 5 }, () => engine.ingestPrediction(predictionInput("pred_dup"))));
    expect(new Set(outcomes.map((o) => o.taskId)).size).toBe(1);
    expect(outcomes.filter((o) => o.created)).toHaveLength(1);

    const again = await engine.ingestPrediction(predictionInput("pred_dup"));
    expect(again).toEqual({ taskId: outcomes[0].taskId, created: false });
    expect(await engine.listQueue()).toHaveLength(1);
  });

  it("rejects invalid predictions with field errors", async () => {
    const { engine } = setup();
    await expect(engine.ingestPrediction({ ...predictionInput("pred_bad"), uncertainty: 2 })).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it("serves higher-priority work first", async () => {
    const { engine } = setup();
    await engine.ingestPrediction(predictionInput("pred_calm", 0.2));
    const { taskId } = await engine.ingestPrediction(predictionInput("pred_unsure", 0.95));
    expect((await engine.listQueue()).map((e) => e.taskId)[0]).toBe(taskId);
    expect((await engine.assignNext(["ann_a"])).taskId).toBe(taskId);
  });

  it("never hands the same annotator two slots on one task, even concurrently", async () => {
    const { engine } = setup();
    const { taskId } = await engine.ingestPrediction(predictionInput("pred_1"));
    const [first, second] = await Promise.all([engine.assignNext(["ann_a", "ann_b"]), engine.assignNext(["ann_a", "ann_b"])]);
    expect(first.taskId).toBe(taskId);
    expect(second.taskId).toBe(taskId);
    expect(new Set([first.annotatorId, second.annotatorId]).size).toBe(2);
    await expect(engine.assignNext(["ann_a", "ann_b"])).rejects.toBeInstanceOf(NoEligibleAnnotatorError);
  });

  it("reports no eligible annotator for an empty pool or exhausted capacity", async () => {
    const { engine } = setup({ maxConcurrentTasks: 1 });
    await engine.ingestPrediction(predictionInput("pred_1"));
    await engine.ingestPrediction(predictionInput("pred_2"));
    await expect(engine.assignNext([])).rejects.toBeInstanceOf(NoEligibleAnnotatorError);
    await engine.assignNext(["ann_a"]);
    await expect(engine.assignNext(["ann_a"])).rejects.toBeInstanceOf(NoEligibleAnnotatorError);
  });

  it("enforces annotation and voting rules", async () => {
    const { engine } = setup();
    const { taskId } = await engine.ingestPrediction(predictionInput("pred_1"));
    await expect(engine.submitAnnotation(taskId, "ann_a", "a cat")).rejects.toBeInstanceOf(InvalidStateTransitionError);

    const { annotatorId } = await engine.assignNext(["ann_a"]);
    await expect(engine.submitAnnotation(taskId, "ann_z", "a cat")).rejects.toBeInstanceOf(AnnotatorNotAssignedError);
    await expect(engine.submitAnnotation(taskId, annotatorId, "   ")).rejects.toBeInstanceOf(ValidationError);

    const annotation = await engine.submitAnnotation(taskId, annotatorId, "a cat");
    await expect(engine.submitVote(annotation.id, "ann_b", true)).rejects.toBeInstanceOf(InvalidStateTransitionError);
    await expect(engine.finalizeConsensus(taskId)).rejects.toBeInstanceOf(InvalidStateTransitionError);
  });

  it("rejects self votes and returns the existing vote on repeats", async () => {
    const { engine } = setup();
    const { annotations } = await driveToVoting(engine, "pred_1");
    const [mine] = annotations;
    await expect(engine.submitVote(mine.id, mine.annotatorId, true)).rejects.toBeInstanceOf(SelfVoteError);

    const vote = await engine.submitVote(mine.id, "ann_v", true);
    const repeat = await engine.submitVote(mine.id, "ann_v", false);
    expect(repeat).toEqual(vote);
    expect((await engine.getAnnotatorMetrics("ann_v")).throughput).toBe(0);
  });

  it("keeps consensus pending until enough votes agree", async () => {
    const { engine } = setup();
    const { taskId, annotations } = await driveToVoting(engine, "pred_1");
    await engine.submitVote(annotations[0].id, "v1", true);
    await expect(engine.finalizeConsensus(taskId)).rejects.toBeInstanceOf(ConsensusPendingError);
    await expect(engine.finalizeConsensus(taskId)).rejects.toThrow("Awaiting 2 more votes");
  });

  it("produces exactly one result under repeated and concurrent finalize", async () => {
    const { engine, store } = setup();
    const { taskId, annotations } = await driveToVoting(engine, "pred_1");
    for (const voter of ["v1", "v2", "v3"]) {
      await engine.submitVote(annotations[0].id, voter, true);
    }
    const results = await Promise.all(Array.from({ length: 5 }, () => engine.finalizeConsensus(taskId)));
    expect(new Set(results.map((r) => r.id)).size).toBe(1);
    expect((await engine.finalizeConsensus(taskId)).id).toBe(results[0].id);
    expect(await store.listConsensusResults()).toHaveLength(1);
    expect(await engine.listAuditEvents({ action: "consensus.finalized" })).toHaveLength(1);
    expect((await engine.getAnnotatorMetrics("v1")).reliability).toBe(0.75);
  });

  it("keeps reliability above zero after three consecutive disagreements", async () => {
    const { engine } = setup();
    for (const id of ["pred_1", "pred_2", "pred_3"]) {
      const { taskId, annotations } = await driveToVoting(engine, id);
      await engine.submitVote(annotations[0].id, `${id}_v1`, true);
      await engine.submitVote(annotations[0].id, `${id}_v2`, true);
      await engine.submitVote(annotations[0].id, "contrarian", false);
      await engine.finalizeConsensus(taskId);
    }
    const metrics = await engine.getAnnotatorMetrics("contrarian");
    expect(metrics.reliability).toBe(0.125);
    expect(metrics.disagreementRate).toBe(1);
  });
});

describe("LabelingEngine sweep", () => {
  it("requeues a stalled task, then parks it for manual review", async () => {
    const signals: ManualReviewRequired[] = [];
    const { engine, clock } = setup(
      { assignmentTimeoutMs: MINUTE, maxRetries: 1 },
      { onManualReviewRequired: (signal) => void signals.push(signal) }
    );
    const { taskId } = await engine.ingestPrediction(predictionInput("pred_1"));
    await engine.assignNext(["ann_a"]);

    clock.advance(MINUTE + 1);
    const first = await engine.sweep();
    expect(first.stalled).toEqual([taskId]);
    expect(first.requeued).toEqual([taskId]);
    let task = await engine.getTask(taskId);
    expect(task.status).toBe("pending");
    expect(task.retryCount).toBe(1);
    expect(task.openAssignees).toEqual([]);
    expect(task.assignments.map((e) => e.kind)).toEqual(["assigned", "expired"]);
    expect((await engine.getAnnotatorMetrics("ann_a")).openTaskCount).toBe(0);

    await engine.assignNext(["ann_a"]);
    clock.advance(MINUTE + 1);
    const second = await engine.sweep();
    expect(second.manualReview).toEqual([taskId]);
    task = await engine.getTask(taskId);
    expect(task.status).toBe("stalled");
    expect(task.manualReviewRequestedAt).toBe(clock.now().toISOString());
    expect(signals).toEqual([
      {
        kind: "manual_review_required",
        taskId,
        predictionId: "pred_1",
        retryCount: 2,
        requestedAt: clock.now().toISOString()
      }
    ]);
    await expect(engine.assignNext(["ann_a"])).rejects.toBeInstanceOf(NoEligibleAnnotatorError);

    const resolved = await engine.resolveManualReview(taskId, "reviewer_1");
    expect(resolved.status).toBe("pending");
    expect(resolved.retryCount).toBe(0);
    expect((await engine.assignNext(["ann_a"])).taskId).toBe(taskId);
  });

  it("keeps wait time across a requeue", async () => {
    const { engine, clock } = setup({ assignmentTimeoutMs: MINUTE });
    const { taskId } = await engine.ingestPrediction(predictionInput("pred_1"));
    const createdAt = (await engine.getTask(taskId)).createdAt;
    await engine.assignNext(["ann_a"]);
    clock.advance(MINUTE + 1);
    await engine.sweep();
    const [entry] = await engine.listQueue();
    expect(entry.waitOriginMs).toBe(Date.parse(createdAt));
  });

  it("accepts a low-confidence caption when the voting window closes", async () => {
    const { engine, clock } = setup({ maxVotingWindowMs: MINUTE, votingTimeoutMs: 2 * MINUTE });
    const { taskId, annotations } = await driveToVoting(engine, "pred_1");
    await engine.submitVote(annotations[1].id, "v1", true);

    expect((await engine.sweep()).finalized).toEqual([]);
    clock.advance(MINUTE);
    const report = await engine.sweep();
    expect(report.finalized).toEqual([taskId]);
    const result = await engine.finalizeConsensus(taskId);
    expect(result.lowConfidence).toBe(true);
    expect(result.caption).toBe("a dog running on sand");
    expect(result.confidence).toBe(0.4);
  });

  it("stalls a voting task that collects no votes and asks for one more caption", async () => {
    const { engine, clock } = setup({ maxVotingWindowMs: MINUTE, votingTimeoutMs: 2 * MINUTE });
    const { taskId } = await driveToVoting(engine, "pred_1");
    clock.advance(2 * MINUTE);
    const report = await engine.sweep();
    expect(report.stalled).toEqual([taskId]);
    expect(report.requeued).toEqual([taskId]);
    const task = await engine.getTask(taskId);
    expect(task.status).toBe("pending");
    expect(task.requiredAnnotations).toBe(3);
    expect(task.votingStartedAt).toBeUndefined();
    expect((await engine.assignNext(["pred_1_w1", "pred_1_w2", "fresh"])).annotatorId).toBe("fresh");
  });

  it("completes a follow-up step that was interrupted after commit", async () => {
    const { engine, store } = setup();
    const result = await reachConsensus(engine, "pred_1");
    const before = await engine.getAnnotatorMetrics("pred_1_v1");

    const stored = store.state.tasks.find((t) => t.id === result.taskId);
    if (!stored) throw new Error("task missing");
    stored.followUp = { reliabilityApplied: true, retrainingRecorded: false };
    store.state.retrainingState = null;

    const report = await engine.sweep();
    expect(report.recovered).toEqual([result.taskId]);
    expect((await store.getRetrainingState())?.pendingConsensusIds).toEqual([result.id]);
    expect(await engine.getAnnotatorMetrics("pred_1_v1")).toEqual(before);
    expect((await engine.sweep()).recovered).toEqual([]);
  });
});

describe("LabelingEngine hooks", () => {
  it("finishes the sweep and manual review while a hook never settles", async () => {
    const seen: string[] = [];
    const { engine, clock } = setup(
      { assignmentTimeoutMs: MINUTE, maxRetries: 0 },
      {
        onManualReviewRequired: (signal) => {
          seen.push(signal.taskId);
          return new Promise<void>(() => {});
        }
      }
    );
    const { taskId: first } = await engine.ingestPrediction(predictionInput("pred_1"));
    expect((await engine.assignNext(["ann_a"])).taskId).toBe(first);
    const { taskId: second } = await engine.ingestPrediction(predictionInput("pred_2"));
    expect((await engine.assignNext(["ann_a"])).taskId).toBe(second);

    clock.advance(MINUTE + 1);
    const report = await engine.sweep();
    expect(report.manualReview).toEqual([first, second]);
    expect(seen).toEqual([first, second]);

    const resolved = await engine.resolveManualReview(first, "reviewer_1");
    expect(resolved.status).toBe("pending");
  });
});

describe("LabelingEngine retraining hand-off", () => {
  it("emits a batch at the size threshold and redelivers until acknowledged", async () => {
    const ready: RetrainingBatch[] = [];
    const { engine, clock } = setup(
      { retrainingBatchSize: 2, retrainingAckTimeoutMs: MINUTE },
      { onBatchReady: (batch) => void ready.push(batch) }
    );
    const first = await reachConsensus(engine, "pred_1");
    expect(await engine.pollRetrainingBatches()).toEqual([]);
    const second = await reachConsensus(engine, "pred_2");

    expect(ready).toHaveLength(1);
    expect(ready[0].consensusIds).toEqual([first.id, second.id]);

    const offered = await engine.pollRetrainingBatches();
    expect(offered.map((b) => [b.id, b.status, b.offerCount])).toEqual([[ready[0].id, "sent", 1]]);
    expect(await engine.pollRetrainingBatches()).toEqual([]);

    clock.advance(MINUTE);
    expect((await engine.pollRetrainingBatches()).map((b) => b.offerCount)).toEqual([2]);

    const acked = await engine.ackBatch(ready[0].id, { modelVersion: "captioner-v2" });
    expect(acked.status).toBe("acknowledged");
    expect(acked.trainedModelVersion).toBe("captioner-v2");
    expect(await engine.ackBatch(ready[0].id)).toEqual(acked);

    clock.advance(10 * MINUTE);
    expect(await engine.pollRetrainingBatches()).toEqual([]);
    await expect(engine.ackBatch("batch_missing")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("flushes an aged partial batch during the sweep", async () => {
    const { engine, clock } = setup({ retrainingBatchSize: 10, retrainingMaxBatchAgeMs: 30 * MINUTE });
    const result = await reachConsensus(engine, "pred_1");
    expect((await engine.sweep()).batchesEmitted).toEqual([]);
    clock.advance(30 * MINUTE);
    const report = await engine.sweep();
    expect(report.batchesEmitted).toHaveLength(1);
    const [batch] = await engine.pollRetrainingBatches();
    expect(batch).toMatchObject({ id: report.batchesEmitted[0], reason: "age", consensusIds: [result.id] });
  });

  it("records a failing batch hook in the audit trail", async () => {
    const { engine } = setup(
      { retrainingBatchSize: 1 },
      {
        onBatchReady: () => {
          throw new Error("collaborator offline");
        }
      }
    );
    await reachConsensus(engine, "pred_1");
    await engine.settleHooks();
    const [failure] = await engine.listAuditEvents({ action: "engine.hook_failed" });
    expect(failure).toMatchObject({ targetType: "retraining_batch", reasonText: "collaborator offline" });
    expect(await engine.pollRetrainingBatches()).toHaveLength(1);
  });
});

describe("LabelingEngine reporting and lifecycle", () => {
  it("summarizes annotators, queue depth and task counts", async () => {
    const { engine } = setup();
    await reachConsensus(engine, "pred_2");
    await engine.ingestPrediction(predictionInput("pred_1"));
    const snapshot = await engine.getDashboardSnapshot();
    expect(snapshot.queueDepth).toBe(1);
    expect(snapshot.tasksByStatus).toMatchObject({ pending: 1, consensus_reached: 1, voting: 0 });
    expect(snapshot.annotators.map((a) => a.annotatorId)).toContain("pred_2_w1");
    await expect(engine.getAnnotatorMetrics("nobody")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("rebuilds the queue from the store on start", async () => {
    const store = new MemoryStore();
    const { engine } = setup({}, {}, store);
    await engine.ingestPrediction(predictionInput("pred_1"));
    await engine.ingestPrediction(predictionInput("pred_2"));

    const { engine: restarted } = setup({}, {}, store);
    expect((await restarted.listQueue()).map((e) => e.predictionId).sort()).toEqual(["pred_1", "pred_2"]);
  });

  it("repairs reliability that drifted from the stored counts", async () => {
    const { engine, store } = setup();
    await engine.registerAnnotator({ id: "ann_a" });
    const stored = store.state.annotators.find((a) => a.id === "ann_a");
    if (!stored) throw new Error("annotator missing");
    stored.reliability = 0.9;
    expect(await engine.reconcileReliability()).toEqual({ checked: 1, corrected: ["ann_a"] });
    expect((await engine.getAnnotatorMetrics("ann_a")).reliability).toBe(0.5);
  });
});

describe("LabelingEngine instances sharing a store", () => {
  it("assigns a task that another instance requeued", async () => {
    const { service, job, clock } = setupShared({ assignmentTimeoutMs: MINUTE });
    const { taskId } = await service.ingestPrediction(predictionInput("pred_1"));
    await service.assignNext(["ann_a"]);

    clock.advance(MINUTE + 1);
    expect((await job.sweep()).requeued).toEqual([taskId]);
    expect(await service.assignNext(["ann_c"])).toEqual({ taskId, annotatorId: "ann_c" });
  });

  it("lists a prediction another instance ingested", async () => {
    const { service, job } = setupShared();
    await service.start();
    await job.ingestPrediction(predictionInput("pred_2"));
    expect((await service.listQueue()).map((e) => e.predictionId)).toEqual(["pred_2"]);
    expect((await service.getDashboardSnapshot()).queueDepth).toBe(1);
  });

  it("keeps annotator load exact when both instances assign at once", async () => {
    const { service, job } = setupShared();
    const { taskId: first } = await service.ingestPrediction(predictionInput("pred_1"));
    const { taskId: second } = await service.ingestPrediction(predictionInput("pred_2"));
    await service.registerAnnotator({ id: "ann_a" });

    const assigned = await Promise.all([service.assignNext(["ann_a"]), job.assignNext(["ann_a"])]);
    expect(assigned.map((a) => a.taskId).sort()).toEqual([first, second].sort());
    expect((await service.getAnnotatorMetrics("ann_a")).openTaskCount).toBe(2);
    expect((await job.getTask(first)).openAssignees).toEqual(["ann_a"]);
    expect((await job.getTask(second)).openAssignees).toEqual(["ann_a"]);
  });

  it("registers an annotator once when both instances race", async () => {
    const { service, job } = setupShared();
    const [a, b] = await Promise.all([
      service.registerAnnotator({ id: "ann_a", initialReliability: 0.7 }),
      job.registerAnnotator({ id: "ann_a", initialReliability: 0.7 })
    ]);
    expect(a).toEqual(b);
    expect(await service.listAuditEvents({ action: "annotator.registered" })).toHaveLength(1);
  });
});

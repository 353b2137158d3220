import { getRuntimeEngine } from "@/lib/store/runtime";
import { nowIso } from "@/lib/utils";

export async function runSweepJob() {
  const engine = await getRuntimeEngine();
  const report = await engine.sweep();
  return { job: "sweep", ...report };
}

export async function runReconcileReliabilityJob() {
  const engine = await getRuntimeEngine();
  const result = await engine.reconcileReliability();
  return { job: "reconcile-reliability", executedAt: nowIso(), ...result };
}

export async function runOfferBatchesJob() {
  const engine = await getRuntimeEngine();
  const offered = await engine.pollRetrainingBatches();
  return {
    job: "offer-retraining-batches",
    executedAt: nowIso(),
    offered: offered.map((batch) => ({ id: batch.id, size: batch.consensusIds.length, offerCount: batch.offerCount }))
  };
}

export async function runMaintenanceJob() {
  const executedAt = nowIso();
  const sweep = await runSweepJob();
  const reconcile = await runReconcileReliabilityJob();
  const offer = await runOfferBatchesJob();
  return {
    job: "maintenance",
    executedAt,
    steps: {
      sweep,
      reconcileReliability: reconcile,
      offerBatches: offer
    }
  };
}

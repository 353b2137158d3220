import { isEligibleFor, selectAnnotator } from "@/lib/assignment/select";
import { KeyedLock } from "@/lib/concurrency/keyed-lock";
import { loadEngineConfig } from "@/lib/config";
import { evaluateConsensus } from "@/lib/consensus/evaluate";
import { ASSIGNMENT_ATTEMPTS, AUDIT_ACTIONS, LOCK_SCOPES } from "@/lib/constants";
import {
  AnnotatorNotAssignedError,
  ConcurrentModificationError,
  ConsensusPendingError,
  DuplicateTaskError,
  InvalidStateTransitionError,
  NoEligibleAnnotatorError,
  NotFoundError,
  SelfVoteError
} from "@/lib/errors";
import { summarizeLedger } from "@/lib/ledger/ledger";
import { PriorityQueue, type RankedEntry } from "@/lib/queue/priority-queue";
import { applyOutcome, computeReliability, contributionOutcomes, disagreementRate } from "@/lib/reliability/score";
import {
  acknowledge,
  emptyRetrainingState,
  flushIfAged,
  isDueForOffer,
  markOffered,
  recordConsensus
} from "@/lib/retraining/trigger";
import {
  annotationInputSchema,
  annotatorPoolSchema,
  annotatorRegistrationSchema,
  batchAckSchema,
  parseWith,
  predictionInputSchema,
  voteInputSchema,
  type AnnotatorRegistrationInput,
  type EngineConfig,
  type PredictionInput
} from "@/lib/schemas";
import type { EngineStore } from "@/lib/store/interface";
import { ASSIGNABLE_STATUSES, STALLABLE_STATUSES, transitionTask } from "@/lib/task-state";
import type {
  Annotation,
  Annotator,
  AnnotatorMetrics,
  AssignmentEvent,
  AuditEvent,
  ConsensusResult,
  ManualReviewRequired,
  Prediction,
  RetrainingBatch,
  Task,
  TaskStatus,
  Vote
} from "@/lib/types";
import { addMs, isExpired, msBetween, nowIso, randomId, roundTo } from "@/lib/utils";

export interface EngineHooks {
  onBatchReady?: (batch: RetrainingBatch) => void | Promise<void>;
  onManualReviewRequired?: (signal: ManualReviewRequired) => void | Promise<void>;
}

export interface LabelingEngineOptions {
  store: EngineStore;
  config?: EngineConfig;
  clock?: () => Date;
  hooks?: EngineHooks;
}

export interface SweepReport {
  executedAt: string;
  finalized: string[];
  stalled: string[];
  requeued: string[];
  manualReview: string[];
  recovered: string[];
  batchesEmitted: string[];
}

export interface DashboardSnapshot {
  generatedAt: string;
  queueDepth: number;
  tasksByStatus: Record<TaskStatus, number>;
  annotators: AnnotatorMetrics[];
}

type StallOutcome =
  | { outcome: "requeued"; task: Task }
  | { outcome: "manual_review"; task: Task; signal: ManualReviewRequired };

type FollowUpOutcome = { task: Task; batch: RetrainingBatch | null };

function participantsOf(task: Task, annotations: Annotation[]): string[] {
  return Array.from(new Set([...task.openAssignees, ...annotations.map((a) => a.annotatorId)]));
}

function annotatorLockKeys(annotatorIds: Iterable<string>): string[] {
  return Array.from(new Set(annotatorIds)).sort().map((id) => LOCK_SCOPES.annotator(id));
}

export function toAnnotatorMetrics(annotator: Annotator): AnnotatorMetrics {
  return {
    annotatorId: annotator.id,
    reliability: roundTo(annotator.reliability),
    throughput: annotator.completedCount,
    disagreementRate: roundTo(disagreementRate(annotator)),
    averageTaskSeconds: roundTo(annotator.totalAnnotationMs / 1000 / Math.max(annotator.completedCount, 1), 2),
    openTaskCount: annotator.openTaskCount
  };
}

/**
 * Orchestrates prediction intake, assignment, annotation, voting, consensus and retraining hand-off.
 *
 * Locks are taken in one order everywhere: prediction, assignment, task, annotators (by id), retraining.
 */
export class LabelingEngine {
  readonly config: EngineConfig;
  private readonly store: EngineStore;
  private readonly clock: () => Date;
  private readonly hooks: EngineHooks;
  private readonly locks = new KeyedLock();
  private readonly queue: PriorityQueue;
  private readonly pendingHooks = new Set<Promise<void>>();
  private startPromise: Promise<void> | null = null;

  constructor(options: LabelingEngineOptions) {
    this.store = options.store;
    this.config = options.config ?? loadEngineConfig();
    this.clock = options.clock ?? (() => new Date());
    this.hooks = options.hooks ?? {};
    this.queue = new PriorityQueue({
      maxBoost: this.config.freshnessMaxBoost,
      timeConstantMs: this.config.freshnessTimeConstantMs
    });
  }

  private now() {
    return nowIso(this.clock());
  }

  /** Builds the in-process queue from stored tasks. Other operations wait for it. */
  start(): Promise<void> {
    if (!this.startPromise) {
      this.startPromise = this.locks
        .withLock(LOCK_SCOPES.assignment, () => this.refreshQueue())
        .catch((error: unknown) => {
          this.startPromise = null;
          throw error;
        });
    }
    return this.startPromise;
  }

  async close(): Promise<void> {
    this.queue.clear();
    this.startPromise = null;
    await this.store.close();
  }

  /**
   * Reloads the queue from the store. The store is shared with other engine processes (the job
   * runner, other service instances), so the queue is refreshed under the assignment lock before
   * every read instead of being patched from this instance's own writes.
   */
  private async refreshQueue() {
    const tasks = await this.store.listTasks({ statuses: [...ASSIGNABLE_STATUSES] });
    const open: Array<{ task: Task; annotations: Annotation[] }> = [];
    for (const task of tasks) {
      const annotations = await this.store.listAnnotationsForTask(task.id);
      if (task.openAssignees.length + annotations.length < task.requiredAnnotations) {
        open.push({ task, annotations });
      }
    }
    this.queue.clear();
    for (const { task, annotations } of open) {
      this.queue.enqueue({
        taskId: task.id,
        predictionId: task.predictionId,
        uncertainty: task.uncertainty,
        difficulty: task.difficulty,
        waitOriginMs: new Date(task.createdAt).getTime(),
        participants: participantsOf(task, annotations)
      });
    }
  }

  private async requireTask(taskId: string) {
    const task = await this.store.getTask(taskId);
    if (!task) throw new NotFoundError("Task", taskId);
    return task;
  }

  private async runHook(target: Pick<AuditEvent, "targetType" | "targetId">, hook: string, fn: () => unknown) {
    try {
      await fn();
    } catch (error) {
      const reasonText = error instanceof Error ? error.message : String(error);
      try {
        await this.store.appendAudit({
          actorType: "system",
          action: AUDIT_ACTIONS.hookFailed,
          ...target,
          reasonText,
          metadata: { hook },
          createdAt: this.now()
        });
      } catch (auditError) {
        console.error(JSON.stringify({ event: AUDIT_ACTIONS.hookFailed, hook, ...target, reasonText, auditError: String(auditError) }));
      }
    }
  }

  /** Hooks run detached: a slow or hung collaborator never holds a lock or stalls a sweep. */
  private dispatchHook(target: Pick<AuditEvent, "targetType" | "targetId">, hook: string, fn: () => unknown) {
    const pending: Promise<void> = this.runHook(target, hook, fn).finally(() => {
      this.pendingHooks.delete(pending);
    });
    this.pendingHooks.add(pending);
  }

  /** Resolves once every hook dispatched so far has settled. */
  async settleHooks(): Promise<void> {
    await Promise.all(Array.from(this.pendingHooks));
  }

  private notifyBatchReady(batch: RetrainingBatch) {
    this.dispatchHook({ targetType: "retraining_batch", targetId: batch.id }, "onBatchReady", () =>
      this.hooks.onBatchReady?.(batch)
    );
  }

  async ingestPrediction(input: PredictionInput): Promise<{ taskId: string; created: boolean }> {
    const data = parseWith(predictionInputSchema, input, "Invalid prediction");
    await this.start();
    return this.locks.withLock(LOCK_SCOPES.prediction(data.id), async () => {
      const existing = await this.store.findTaskByPrediction(data.id);
      if (existing) return { taskId: existing.id, created: false };

      const at = this.now();
      const prediction: Prediction = {
        id: data.id,
        videoId: data.videoId,
        caption: data.caption,
        uncertainty: data.uncertainty,
        modelVersion: data.modelVersion,
        createdAt: at
      };
      const task: Task = {
        id: randomId("task"),
        predictionId: data.id,
        videoId: data.videoId,
        uncertainty: data.uncertainty,
        difficulty: data.difficulty ?? this.config.defaultDifficulty,
        status: "pending",
        requiredAnnotations: this.config.requiredAnnotations,
        openAssignees: [],
        assignments: [],
        retryCount: 0,
        revision: 0,
        createdAt: at,
        updatedAt: at
      };

      let created: Task;
      try {
        created = await this.store.transaction(async (tx) => {
          const row = await tx.createTaskForPrediction(prediction, task);
          await tx.appendAudit({
            actorType: "system",
            action: AUDIT_ACTIONS.predictionIngested,
            targetType: "prediction",
            targetId: prediction.id,
            metadata: { taskId: row.id, modelVersion: prediction.modelVersion, uncertainty: prediction.uncertainty },
            createdAt: at
          });
          return row;
        });
      } catch (error) {
        if (error instanceof DuplicateTaskError) {
          return { taskId: error.existingTaskId, created: false };
        }
        throw error;
      }

      return { taskId: created.id, created: true };
    });
  }

  async registerAnnotator(input: AnnotatorRegistrationInput): Promise<Annotator> {
    const data = parseWith(annotatorRegistrationSchema, input, "Invalid annotator");
    return this.locks.withLock(LOCK_SCOPES.annotator(data.id), () => {
      const at = this.now();
      const prior = data.initialReliability ?? this.config.reliabilityPrior;
      const annotator: Annotator = {
        id: data.id,
        prior,
        reliability: prior,
        openTaskCount: 0,
        maxConcurrentTasks: data.maxConcurrentTasks ?? this.config.maxConcurrentTasks,
        agreementCount: 0,
        disagreementCount: 0,
        completedCount: 0,
        totalAnnotationMs: 0,
        votesCast: 0,
        createdAt: at,
        updatedAt: at
      };
      return this.store.transaction(async (tx) => {
        const existing = await tx.getAnnotator(data.id, { forUpdate: true });
        if (existing) {
          if (data.maxConcurrentTasks === undefined || data.maxConcurrentTasks === existing.maxConcurrentTasks) {
            return existing;
          }
          return tx.saveAnnotator({ ...existing, maxConcurrentTasks: data.maxConcurrentTasks, updatedAt: at });
        }
        const { annotator: saved, created } = await tx.createAnnotator(annotator);
        if (!created) return saved;
        await tx.appendAudit({
          actorType: "system",
          action: AUDIT_ACTIONS.annotatorRegistered,
          targetType: "annotator",
          targetId: annotator.id,
          metadata: { prior, maxConcurrentTasks: annotator.maxConcurrentTasks },
          createdAt: at
        });
        return saved;
      });
    });
  }

  private async ensureAnnotator(annotatorId: string) {
    const existing = await this.store.getAnnotator(annotatorId);
    return existing ?? this.registerAnnotator({ id: annotatorId });
  }

  async assignNext(pool: string[]): Promise<{ taskId: string; annotatorId: string }> {
    const annotatorIds = Array.from(new Set(parseWith(annotatorPoolSchema, pool, "Invalid annotator pool")));
    if (!annotatorIds.length) {
      throw new NoEligibleAnnotatorError("Annotator pool is empty");
    }
    await this.start();
    for (const annotatorId of annotatorIds) {
      await this.ensureAnnotator(annotatorId);
    }

    return this.locks.withLock(LOCK_SCOPES.assignment, async () => {
      for (let attempt = 1; ; attempt += 1) {
        await this.refreshQueue();
        const annotators = await this.store.listAnnotators(annotatorIds);
        const entry = this.queue.peekNext(
          (candidate) => annotators.some((annotator) => isEligibleFor(annotator, candidate.participants)),
          this.clock().getTime()
        );
        if (!entry) throw new NoEligibleAnnotatorError();
        const annotator = selectAnnotator(annotators, entry.participants);
        if (!annotator || !this.queue.claim(entry.taskId)) throw new NoEligibleAnnotatorError();

        try {
          return await this.locks.withLocks(
            [LOCK_SCOPES.task(entry.taskId), LOCK_SCOPES.annotator(annotator.id)],
            () => this.assignLocked(entry.taskId, annotator.id)
          );
        } catch (error) {
          if (!(error instanceof ConcurrentModificationError) || attempt >= ASSIGNMENT_ATTEMPTS) throw error;
        } finally {
          this.queue.release(entry.taskId);
        }
      }
    });
  }

  private async assignLocked(taskId: string, annotatorId: string) {
    const task = await this.requireTask(taskId);
    const annotations = await this.store.listAnnotationsForTask(taskId);
    const participants = participantsOf(task, annotations);
    if (
      !ASSIGNABLE_STATUSES.includes(task.status) ||
      task.openAssignees.length + annotations.length >= task.requiredAnnotations
    ) {
      throw new ConcurrentModificationError("Task", taskId);
    }

    const at = this.now();
    const expiresAt = addMs(at, this.config.assignmentTimeoutMs);
    const event: AssignmentEvent = { annotatorId, kind: "assigned", at, expiresAt };
    const patch: Partial<Task> = {
      openAssignees: [...task.openAssignees, annotatorId],
      assignments: [...task.assignments, event],
      stageDeadlineAt: expiresAt
    };
    const next = task.status === "pending" ? transitionTask(task, "assigned", at, patch) : { ...task, ...patch, updatedAt: at };

    await this.store.transaction(async (tx) => {
      const annotator = await tx.getAnnotator(annotatorId, { forUpdate: true });
      if (!annotator) throw new NotFoundError("Annotator", annotatorId);
      if (!isEligibleFor(annotator, participants)) {
        throw new ConcurrentModificationError("Annotator", annotatorId);
      }
      await tx.updateTask(next, task.revision);
      await tx.saveAnnotator({ ...annotator, openTaskCount: annotator.openTaskCount + 1, updatedAt: at });
      await tx.appendAudit({
        actorType: "system",
        action: AUDIT_ACTIONS.taskAssigned,
        targetType: "task",
        targetId: taskId,
        metadata: { annotatorId, expiresAt },
        createdAt: at
      });
    });
    return { taskId, annotatorId };
  }

  async submitAnnotation(taskId: string, annotatorId: string, caption: string): Promise<Annotation> {
    const data = parseWith(annotationInputSchema, { taskId, annotatorId, caption }, "Invalid annotation");
    await this.start();
    return this.locks.withLocks([LOCK_SCOPES.task(data.taskId), LOCK_SCOPES.annotator(data.annotatorId)], async () => {
      const task = await this.requireTask(data.taskId);
      if (task.status !== "assigned" && task.status !== "annotated") {
        throw new InvalidStateTransitionError(task.id, task.status, "annotate");
      }
      if (!task.openAssignees.includes(data.annotatorId)) {
        throw new AnnotatorNotAssignedError(task.id, data.annotatorId);
      }
      const at = this.now();
      const annotation: Annotation = {
        id: randomId("ann"),
        taskId: task.id,
        annotatorId: data.annotatorId,
        caption: data.caption,
        createdAt: at
      };
      const previous = await this.store.listAnnotationsForTask(task.id);
      const annotations = [...previous, annotation];
      const assignedAt =
        [...task.assignments].reverse().find((e) => e.annotatorId === data.annotatorId && e.kind === "assigned")?.at ??
        task.createdAt;
      const completed: AssignmentEvent = { annotatorId: data.annotatorId, kind: "completed", at };
      const patch: Partial<Task> = {
        openAssignees: task.openAssignees.filter((id) => id !== data.annotatorId),
        assignments: [...task.assignments, completed],
        stageDeadlineAt: addMs(at, this.config.assignmentTimeoutMs)
      };

      let next = task.status === "assigned" ? transitionTask(task, "annotated", at, patch) : { ...task, ...patch, updatedAt: at };
      if (annotations.length >= next.requiredAnnotations) {
        next = transitionTask(next, "voting", at, {
          votingStartedAt: at,
          stageDeadlineAt: addMs(at, this.config.votingTimeoutMs)
        });
      }

      await this.store.transaction(async (tx) => {
        const annotator = await tx.getAnnotator(data.annotatorId, { forUpdate: true });
        if (!annotator) throw new NotFoundError("Annotator", data.annotatorId);
        await tx.insertAnnotation(annotation);
        const saved = await tx.updateTask(next, task.revision);
        await tx.saveAnnotator({
          ...annotator,
          openTaskCount: Math.max(0, annotator.openTaskCount - 1),
          completedCount: annotator.completedCount + 1,
          totalAnnotationMs: annotator.totalAnnotationMs + Math.max(0, msBetween(assignedAt, at)),
          updatedAt: at
        });
        await tx.appendAudit({
          actorType: "annotator",
          actorId: data.annotatorId,
          action: AUDIT_ACTIONS.annotationSubmitted,
          targetType: "annotation",
          targetId: annotation.id,
          metadata: { taskId: task.id, status: saved.status },
          createdAt: at
        });
      });
      return annotation;
    });
  }

  async submitVote(annotationId: string, voterId: string, agree: boolean): Promise<Vote> {
    const data = parseWith(voteInputSchema, { annotationId, voterId, agree }, "Invalid vote");
    const annotation = await this.store.getAnnotation(data.annotationId);
    if (!annotation) throw new NotFoundError("Annotation", data.annotationId);
    if (annotation.annotatorId === data.voterId) {
      throw new SelfVoteError(annotation.id, data.voterId);
    }
    await this.ensureAnnotator(data.voterId);

    return this.locks.withLocks([LOCK_SCOPES.task(annotation.taskId), LOCK_SCOPES.annotator(data.voterId)], async () => {
      const task = await this.requireTask(annotation.taskId);
      if (task.status !== "voting") {
        throw new InvalidStateTransitionError(task.id, task.status, "vote");
      }
      const existing = await this.store.findVote(annotation.id, data.voterId);
      if (existing) return existing;

      const at = this.now();
      const vote: Vote = {
        id: randomId("vote"),
        taskId: task.id,
        annotationId: annotation.id,
        voterId: data.voterId,
        agree: data.agree,
        createdAt: at
      };
      return this.store.transaction(async (tx) => {
        const voter = await tx.getAnnotator(data.voterId, { forUpdate: true });
        if (!voter) throw new NotFoundError("Annotator", data.voterId);
        const saved = await tx.insertVote(vote);
        await tx.saveAnnotator({ ...voter, votesCast: voter.votesCast + 1, updatedAt: at });
        await tx.appendAudit({
          actorType: "annotator",
          actorId: data.voterId,
          action: AUDIT_ACTIONS.voteSubmitted,
          targetType: "vote",
          targetId: vote.id,
          metadata: { taskId: task.id, annotationId: annotation.id, agree: data.agree },
          createdAt: at
        });
        return saved;
      });
    });
  }

  async getAgreementRatio(taskId: string): Promise<number> {
    const task = await this.requireTask(taskId);
    const [annotations, votes] = await Promise.all([
      this.store.listAnnotationsForTask(task.id),
      this.store.listVotesForTask(task.id)
    ]);
    return summarizeLedger(annotations, votes).agreementRatio;
  }

  /**
   * Commits the accepted caption for a voting task. A task that already has a result returns it, after
   * finishing any reliability or retraining step left undone.
   */
  async finalizeConsensus(taskId: string): Promise<ConsensusResult> {
    await this.start();
    const { result } = await this.locks.withLock(LOCK_SCOPES.task(taskId), () => this.finalizeLocked(taskId));
    return result;
  }

  private async finalizeLocked(
    taskId: string
  ): Promise<{ result: ConsensusResult; created: boolean; batch: RetrainingBatch | null }> {
    const task = await this.requireTask(taskId);
    const existing = await this.store.getConsensusForTask(task.id);
    if (existing) {
      const followUp = await this.completeFollowUp(task, existing);
      return { result: existing, created: false, batch: followUp.batch };
    }
    if (task.status !== "voting") {
      throw new InvalidStateTransitionError(task.id, task.status, "finalize");
    }

    const [annotations, votes] = await Promise.all([
      this.store.listAnnotationsForTask(task.id),
      this.store.listVotesForTask(task.id)
    ]);
    const voters = await this.store.listAnnotators(Array.from(new Set(votes.map((v) => v.voterId))));
    const reliability = new Map(voters.map((v) => [v.id, v.reliability]));
    const at = this.now();
    const evaluation = evaluateConsensus({
      annotations,
      votes,
      reliabilityOf: (id) => reliability.get(id) ?? this.config.reliabilityPrior,
      votingStartedAt: task.votingStartedAt,
      now: at,
      rules: this.config
    });
    if (!evaluation.ready) {
      throw new ConsensusPendingError(task.id, evaluation.reason);
    }

    const result: ConsensusResult = {
      id: randomId("cons"),
      taskId: task.id,
      annotationId: evaluation.selected.annotation.id,
      caption: evaluation.selected.annotation.caption,
      confidence: evaluation.confidence,
      agreementRatio: evaluation.agreementRatio,
      averageVoterReliability: evaluation.averageVoterReliability,
      lowConfidence: evaluation.lowConfidence,
      contributingAnnotationIds: annotations.map((a) => a.id),
      finalizedAt: at
    };
    const next = transitionTask(task, "consensus_reached", at, {
      consensusId: result.id,
      stageDeadlineAt: undefined,
      followUp: { reliabilityApplied: false, retrainingRecorded: false }
    });

    const committed = await this.store.transaction(async (tx) => {
      const outcome = await tx.commitConsensus(result, next, task.revision);
      if (outcome.created) {
        await tx.appendAudit({
          actorType: "system",
          action: AUDIT_ACTIONS.consensusFinalized,
          targetType: "consensus",
          targetId: outcome.result.id,
          reasonText: evaluation.reason,
          metadata: {
            taskId: task.id,
            annotationId: outcome.result.annotationId,
            confidence: outcome.result.confidence,
            lowConfidence: outcome.result.lowConfidence
          },
          createdAt: at
        });
      }
      return outcome;
    });
    const followUp = await this.completeFollowUp(committed.task, committed.result);
    return { result: committed.result, created: committed.created, batch: followUp.batch };
  }

  private async completeFollowUp(task: Task, result: ConsensusResult): Promise<FollowUpOutcome> {
    let current = task;
    if (!current.followUp?.reliabilityApplied) {
      current = await this.applyReliability(current, result);
    }
    if (current.followUp?.retrainingRecorded) {
      return { task: current, batch: null };
    }
    return this.recordRetraining(current, result);
  }

  private async applyReliability(task: Task, result: ConsensusResult): Promise<Task> {
    const [annotations, votes] = await Promise.all([
      this.store.listAnnotationsForTask(task.id),
      this.store.listVotesForTask(task.id)
    ]);
    const outcomes = contributionOutcomes({ result, annotations, votes });
    const annotatorIds = Array.from(outcomes.keys()).sort();

    return this.locks.withLocks(annotatorLockKeys(annotatorIds), () => {
      const at = this.now();
      return this.store.transaction(async (tx) => {
        for (const annotatorId of annotatorIds) {
          const annotator = await tx.getAnnotator(annotatorId, { forUpdate: true });
          if (!annotator) continue;
          const aligned = outcomes.get(annotatorId) ?? false;
          const updated = applyOutcome(annotator, aligned, { smoothing: this.config.reliabilitySmoothing }, at);
          await tx.saveAnnotator(updated);
          await tx.appendAudit({
            actorType: "system",
            action: AUDIT_ACTIONS.reliabilityUpdated,
            targetType: "annotator",
            targetId: annotatorId,
            metadata: { taskId: task.id, aligned, reliability: roundTo(updated.reliability) },
            createdAt: at
          });
        }
        return tx.updateTask(
          {
            ...task,
            followUp: { reliabilityApplied: true, retrainingRecorded: task.followUp?.retrainingRecorded ?? false },
            updatedAt: at
          },
          task.revision
        );
      });
    });
  }

  private async recordRetraining(task: Task, result: ConsensusResult): Promise<FollowUpOutcome> {
    const outcome = await this.locks.withLock(LOCK_SCOPES.retraining, () => {
      const at = this.now();
      return this.store.transaction(async (tx) => {
        const state = (await tx.getRetrainingState({ forUpdate: true })) ?? emptyRetrainingState(at);
        const next = recordConsensus(state, result.id, at, this.config.retrainingBatchSize);
        await tx.saveRetrainingState(next.state);
        if (next.batch) {
          await this.persistEmittedBatch(tx, next.batch, at);
        }
        const updated = await tx.updateTask(
          {
            ...task,
            followUp: { reliabilityApplied: task.followUp?.reliabilityApplied ?? true, retrainingRecorded: true },
            updatedAt: at
          },
          task.revision
        );
        return { task: updated, batch: next.batch };
      });
    });
    if (outcome.batch) {
      this.notifyBatchReady(outcome.batch);
    }
    return outcome;
  }

  private async persistEmittedBatch(store: EngineStore, batch: RetrainingBatch, at: string) {
    await store.saveBatch(batch);
    await store.appendAudit({
      actorType: "system",
      action: AUDIT_ACTIONS.batchEmitted,
      targetType: "retraining_batch",
      targetId: batch.id,
      metadata: { reason: batch.reason, size: batch.consensusIds.length },
      createdAt: at
    });
  }

  private async stallLocked(task: Task, at: string): Promise<StallOutcome> {
    const annotations = await this.store.listAnnotationsForTask(task.id);
    const released = [...task.openAssignees].sort();
    const expired: AssignmentEvent[] = released.map((annotatorId) => ({ annotatorId, kind: "expired", at }));
    const retryCount = task.retryCount + 1;
    // A task pulled out of voting needs one more caption before it can vote again.
    const requiredAnnotations =
      task.status === "voting" ? Math.max(task.requiredAnnotations, annotations.length + 1) : task.requiredAnnotations;
    const stalled = transitionTask(task, "stalled", at, {
      openAssignees: [],
      assignments: [...task.assignments, ...expired],
      retryCount,
      requiredAnnotations,
      stageDeadlineAt: undefined
    });
    const requeue = retryCount <= this.config.maxRetries;
    const next = requeue
      ? transitionTask(stalled, "pending", at, { votingStartedAt: undefined })
      : { ...stalled, manualReviewRequestedAt: at };

    const committed = await this.locks.withLocks(annotatorLockKeys(released), () =>
      this.store.transaction(async (tx) => {
        for (const annotatorId of released) {
          const annotator = await tx.getAnnotator(annotatorId, { forUpdate: true });
          if (!annotator) continue;
          await tx.saveAnnotator({ ...annotator, openTaskCount: Math.max(0, annotator.openTaskCount - 1), updatedAt: at });
        }
        const saved = await tx.updateTask(next, task.revision);
        await tx.appendAudit({
          actorType: "system",
          action: AUDIT_ACTIONS.taskStalled,
          targetType: "task",
          targetId: task.id,
          metadata: { from: task.status, retryCount, released },
          createdAt: at
        });
        await tx.appendAudit({
          actorType: "system",
          action: requeue ? AUDIT_ACTIONS.taskRequeued : AUDIT_ACTIONS.taskManualReview,
          targetType: "task",
          targetId: task.id,
          metadata: { retryCount, maxRetries: this.config.maxRetries },
          createdAt: at
        });
        return saved;
      })
    );
    if (requeue) return { outcome: "requeued", task: committed };
    const signal: ManualReviewRequired = {
      kind: "manual_review_required",
      taskId: committed.id,
      predictionId: committed.predictionId,
      retryCount,
      requestedAt: at
    };
    this.dispatchHook({ targetType: "task", targetId: committed.id }, "onManualReviewRequired", () =>
      this.hooks.onManualReviewRequired?.(signal)
    );
    return { outcome: "manual_review", task: committed, signal };
  }

  /**
   * One maintenance pass: finalizes voting tasks that are ready, stalls tasks past their stage deadline,
   * completes interrupted consensus follow-up and emits an aged retraining batch.
   */
  async sweep(): Promise<SweepReport> {
    await this.start();
    const report: SweepReport = {
      executedAt: this.now(),
      finalized: [],
      stalled: [],
      requeued: [],
      manualReview: [],
      recovered: [],
      batchesEmitted: []
    };

    const tasks = await this.store.listTasks({ statuses: [...STALLABLE_STATUSES, "consensus_reached"] });
    for (const listed of tasks) {
      if (listed.status === "consensus_reached" && listed.followUp?.reliabilityApplied && listed.followUp.retrainingRecorded) {
        continue;
      }
      await this.locks.withLock(LOCK_SCOPES.task(listed.id), async () => {
        const task = await this.store.getTask(listed.id);
        if (!task) return;

        if (task.status === "consensus_reached") {
          const result = await this.store.getConsensusForTask(task.id);
          if (!result) return;
          const followUp = await this.completeFollowUp(task, result);
          report.recovered.push(task.id);
          if (followUp.batch) report.batchesEmitted.push(followUp.batch.id);
          return;
        }

        if (task.status === "voting") {
          try {
            const outcome = await this.finalizeLocked(task.id);
            if (outcome.created) report.finalized.push(task.id);
            if (outcome.batch) report.batchesEmitted.push(outcome.batch.id);
            return;
          } catch (error) {
            if (!(error instanceof ConsensusPendingError)) throw error;
          }
        }

        if (!STALLABLE_STATUSES.includes(task.status) || !task.stageDeadlineAt) return;
        if (!isExpired(task.stageDeadlineAt, this.clock().getTime())) return;
        const stalled = await this.stallLocked(task, this.now());
        report.stalled.push(task.id);
        if (stalled.outcome === "requeued") report.requeued.push(task.id);
        else report.manualReview.push(task.id);
      });
    }

    const aged = await this.locks.withLock(LOCK_SCOPES.retraining, () => {
      const at = this.now();
      return this.store.transaction(async (tx) => {
        const state = await tx.getRetrainingState({ forUpdate: true });
        if (!state) return null;
        const next = flushIfAged(state, at, this.config.retrainingMaxBatchAgeMs);
        const batch = next.batch;
        if (!batch) return null;
        await tx.saveRetrainingState(next.state);
        await this.persistEmittedBatch(tx, batch, at);
        return batch;
      });
    });
    if (aged) {
      report.batchesEmitted.push(aged.id);
      this.notifyBatchReady(aged);
    }
    return report;
  }

  /** Returns a task parked for manual review to the queue with a fresh retry budget. */
  async resolveManualReview(taskId: string, reviewerId?: string): Promise<Task> {
    await this.start();
    return this.locks.withLock(LOCK_SCOPES.task(taskId), async () => {
      const task = await this.requireTask(taskId);
      if (task.status !== "stalled" || !task.manualReviewRequestedAt) {
        throw new InvalidStateTransitionError(task.id, task.status, "pending");
      }
      const at = this.now();
      const next = transitionTask(task, "pending", at, {
        retryCount: 0,
        manualReviewRequestedAt: undefined,
        votingStartedAt: undefined
      });
      return this.store.transaction(async (tx) => {
        const saved = await tx.updateTask(next, task.revision);
        await tx.appendAudit({
          actorType: reviewerId ? "collaborator" : "system",
          actorId: reviewerId,
          action: AUDIT_ACTIONS.taskManualReviewResolved,
          targetType: "task",
          targetId: task.id,
          createdAt: at
        });
        return saved;
      });
    });
  }

  /** Offers pending batches and re-offers sent batches whose acknowledgement timed out. */
  async pollRetrainingBatches(): Promise<RetrainingBatch[]> {
    return this.locks.withLock(LOCK_SCOPES.retraining, async () => {
      const at = this.now();
      const candidates = await this.store.listBatches(["pending", "sent"]);
      const due = candidates.filter((batch) => isDueForOffer(batch, at, this.config.retrainingAckTimeoutMs));
      if (!due.length) return [];
      return this.store.transaction(async (tx) => {
        const offered: RetrainingBatch[] = [];
        for (const candidate of due) {
          // Another process may have offered or acknowledged it since the listing.
          const batch = await tx.getBatch(candidate.id, { forUpdate: true });
          if (!batch || !isDueForOffer(batch, at, this.config.retrainingAckTimeoutMs)) continue;
          const next = await tx.saveBatch(markOffered(batch, at));
          await tx.appendAudit({
            actorType: "system",
            action: AUDIT_ACTIONS.batchOffered,
            targetType: "retraining_batch",
            targetId: batch.id,
            metadata: { offerCount: next.offerCount },
            createdAt: at
          });
          offered.push(next);
        }
        return offered;
      });
    });
  }

  async ackBatch(batchId: string, options: { modelVersion?: string } = {}): Promise<RetrainingBatch> {
    const data = parseWith(batchAckSchema, { batchId, ...options }, "Invalid batch acknowledgement");
    return this.locks.withLock(LOCK_SCOPES.retraining, () => {
      const at = this.now();
      return this.store.transaction(async (tx) => {
        const batch = await tx.getBatch(data.batchId, { forUpdate: true });
        if (!batch) throw new NotFoundError("Retraining batch", data.batchId);
        if (batch.status === "acknowledged") return batch;
        const saved = await tx.saveBatch(acknowledge(batch, at, data.modelVersion));
        await tx.appendAudit({
          actorType: "collaborator",
          action: AUDIT_ACTIONS.batchAcknowledged,
          targetType: "retraining_batch",
          targetId: batch.id,
          metadata: { modelVersion: data.modelVersion ?? null, offerCount: batch.offerCount },
          createdAt: at
        });
        return saved;
      });
    });
  }

  /** Recomputes every annotator's reliability from stored counts and repairs any that drifted. */
  async reconcileReliability(): Promise<{ checked: number; corrected: string[] }> {
    const annotators = await this.store.listAnnotators();
    const corrected: string[] = [];
    for (const { id } of annotators) {
      await this.locks.withLock(LOCK_SCOPES.annotator(id), () => {
        const at = this.now();
        return this.store.transaction(async (tx) => {
          const annotator = await tx.getAnnotator(id, { forUpdate: true });
          if (!annotator) return;
          const expected = computeReliability(annotator, {
            smoothing: this.config.reliabilitySmoothing,
            prior: annotator.prior
          });
          if (Math.abs(expected - annotator.reliability) < 1e-9) return;
          await tx.saveAnnotator({ ...annotator, reliability: expected, updatedAt: at });
          await tx.appendAudit({
            actorType: "system",
            action: AUDIT_ACTIONS.reliabilityUpdated,
            targetType: "annotator",
            targetId: id,
            reasonText: "reconciled from stored counts",
            metadata: { previous: annotator.reliability, reliability: roundTo(expected) },
            createdAt: at
          });
          corrected.push(id);
        });
      });
    }
    return { checked: annotators.length, corrected };
  }

  async getAnnotatorMetrics(annotatorId: string): Promise<AnnotatorMetrics> {
    const annotator = await this.store.getAnnotator(annotatorId);
    if (!annotator) throw new NotFoundError("Annotator", annotatorId);
    return toAnnotatorMetrics(annotator);
  }

  async getDashboardSnapshot(): Promise<DashboardSnapshot> {
    const queueDepth = (await this.listQueue()).length;
    const [annotators, tasks] = await Promise.all([this.store.listAnnotators(), this.store.listTasks()]);
    const tasksByStatus: Record<TaskStatus, number> = {
      pending: 0,
      assigned: 0,
      annotated: 0,
      voting: 0,
      consensus_reached: 0,
      stalled: 0
    };
    for (const task of tasks) tasksByStatus[task.status] += 1;
    return {
      generatedAt: this.now(),
      queueDepth,
      tasksByStatus,
      annotators: annotators.map(toAnnotatorMetrics)
    };
  }

  async listQueue(): Promise<RankedEntry[]> {
    await this.start();
    return this.locks.withLock(LOCK_SCOPES.assignment, async () => {
      await this.refreshQueue();
      return this.queue.list(this.clock().getTime());
    });
  }

  async getTask(taskId: string): Promise<Task> {
    return this.requireTask(taskId);
  }

  async getConsensus(taskId: string): Promise<ConsensusResult | null> {
    await this.requireTask(taskId);
    return this.store.getConsensusForTask(taskId);
  }

  async listAuditEvents(filter: { targetId?: string; action?: string; limit?: number } = {}): Promise<AuditEvent[]> {
    return this.store.listAuditEvents(filter);
  }
}

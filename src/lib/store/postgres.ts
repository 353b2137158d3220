import { and, asc, desc, eq, inArray, type SQL } from "drizzle-orm";
import type { NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import type { PgDatabase } from "drizzle-orm/pg-core";
import * as schema from "@/db/schema";
import {
  ConcurrentModificationError,
  DuplicateTaskError,
  EngineError,
  NotFoundError,
  StorageUnavailableError
} from "@/lib/errors";
import type { EngineStore, NewAuditEvent, ReadOptions } from "@/lib/store/interface";
import type {
  Annotation,
  Annotator,
  AuditEvent,
  ConsensusResult,
  Prediction,
  RetrainingBatch,
  RetrainingBatchStatus,
  RetrainingState,
  Task,
  TaskStatus,
  Vote
} from "@/lib/types";
import { nowIso, randomId } from "@/lib/utils";

const {
  annotations,
  annotators,
  auditEvents,
  consensusResults,
  predictions,
  retrainingBatches,
  retrainingState,
  tasks,
  votes
} = schema;

const RETRAINING_STATE_ROW_ID = "singleton";

const TASK_STATUSES = ["pending", "assigned", "annotated", "voting", "consensus_reached", "stalled"] as const;
const BATCH_STATUSES = ["pending", "sent", "acknowledged"] as const;
const BATCH_REASONS = ["size", "age"] as const;
const ACTOR_TYPES = ["system", "annotator", "collaborator"] as const;
const TARGET_TYPES = ["prediction", "task", "annotator", "annotation", "vote", "consensus", "retraining_batch"] as const;

type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

type TaskRow = typeof tasks.$inferSelect;
type AnnotatorRow = typeof annotators.$inferSelect;
type BatchRow = typeof retrainingBatches.$inferSelect;
type ConsensusRow = typeof consensusResults.$inferSelect;
type AuditRow = typeof auditEvents.$inferSelect;

function oneOf<T extends string>(values: readonly T[], value: string, column: string): T {
  const match = values.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new StorageUnavailableError("decode", new Error(`Unexpected ${column} value "${value}"`));
  }
  return match;
}

function toIso(value: Date | null): string | undefined {
  return value ? value.toISOString() : undefined;
}

function toDate(value: string | undefined): Date | null {
  return value ? new Date(value) : null;
}

export function predictionFromRow(row: typeof predictions.$inferSelect): Prediction {
  return {
    id: row.id,
    videoId: row.videoId,
    caption: row.caption,
    uncertainty: row.uncertainty,
    modelVersion: row.modelVersion,
    createdAt: row.createdAt.toISOString()
  };
}

export function taskFromRow(row: TaskRow): Task {
  return {
    id: row.id,
    predictionId: row.predictionId,
    videoId: row.videoId,
    uncertainty: row.uncertainty,
    difficulty: row.difficulty,
    status: oneOf(TASK_STATUSES, row.status, "tasks.status"),
    requiredAnnotations: row.requiredAnnotations,
    openAssignees: row.openAssignees,
    assignments: row.assignments,
    retryCount: row.retryCount,
    stageDeadlineAt: toIso(row.stageDeadlineAt),
    votingStartedAt: toIso(row.votingStartedAt),
    manualReviewRequestedAt: toIso(row.manualReviewRequestedAt),
    consensusId: row.consensusId ?? undefined,
    followUp: row.followUp ?? undefined,
    revision: row.revision,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString()
  };
}

export function taskToRow(task: Task): TaskRow {
  return {
    id: task.id,
    predictionId: task.predictionId,
    videoId: task.videoId,
    uncertainty: task.uncertainty,
    difficulty: task.difficulty,
    status: task.status,
    requiredAnnotations: task.requiredAnnotations,
    openAssignees: task.openAssignees,
    assignments: task.assignments,
    retryCount: task.retryCount,
    stageDeadlineAt: toDate(task.stageDeadlineAt),
    votingStartedAt: toDate(task.votingStartedAt),
    manualReviewRequestedAt: toDate(task.manualReviewRequestedAt),
    consensusId: task.consensusId ?? null,
    followUp: task.followUp ?? null,
    revision: task.revision,
    createdAt: new Date(task.createdAt),
    updatedAt: new Date(task.updatedAt)
  };
}

export function annotatorFromRow(row: AnnotatorRow): Annotator {
  return {
    ...row,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString()
  };
}

export function annotatorToRow(annotator: Annotator): AnnotatorRow {
  return {
    ...annotator,
    createdAt: new Date(annotator.createdAt),
    updatedAt: new Date(annotator.updatedAt)
  };
}

function annotationFromRow(row: typeof annotations.$inferSelect): Annotation {
  return { ...row, createdAt: row.createdAt.toISOString() };
}

function voteFromRow(row: typeof votes.$inferSelect): Vote {
  return { ...row, createdAt: row.createdAt.toISOString() };
}

function consensusFromRow(row: ConsensusRow): ConsensusResult {
  return { ...row, finalizedAt: row.finalizedAt.toISOString() };
}

export function batchFromRow(row: BatchRow): RetrainingBatch {
  return {
    id: row.id,
    consensusIds: row.consensusIds,
    reason: oneOf(BATCH_REASONS, row.reason, "retraining_batches.reason"),
    status: oneOf(BATCH_STATUSES, row.status, "retraining_batches.status"),
    triggeredAt: row.triggeredAt.toISOString(),
    offerCount: row.offerCount,
    lastOfferedAt: toIso(row.lastOfferedAt),
    acknowledgedAt: toIso(row.acknowledgedAt),
    trainedModelVersion: row.trainedModelVersion ?? undefined
  };
}

export function batchToRow(batch: RetrainingBatch): BatchRow {
  return {
    id: batch.id,
    consensusIds: batch.consensusIds,
    reason: batch.reason,
    status: batch.status,
    triggeredAt: new Date(batch.triggeredAt),
    offerCount: batch.offerCount,
    lastOfferedAt: toDate(batch.lastOfferedAt),
    acknowledgedAt: toDate(batch.acknowledgedAt),
    trainedModelVersion: batch.trainedModelVersion ?? null
  };
}

export function auditFromRow(row: AuditRow): AuditEvent {
  return {
    id: row.id,
    actorType: oneOf(ACTOR_TYPES, row.actorType, "audit_events.actor_type"),
    actorId: row.actorId ?? undefined,
    action: row.action,
    targetType: oneOf(TARGET_TYPES, row.targetType, "audit_events.target_type"),
    targetId: row.targetId,
    reasonText: row.reasonText ?? undefined,
    metadata: row.metadata ?? undefined,
    createdAt: row.createdAt.toISOString()
  };
}

/** Engine store over Postgres. Instances created by `transaction` share the enclosing transaction. */
export class PostgresStore implements EngineStore {
  readonly backend = "postgres" as const;

  constructor(
    private readonly db: Executor,
    private readonly onClose?: () => Promise<void>
  ) {}

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof EngineError) throw error;
      throw new StorageUnavailableError(operation, error);
    }
  }

  async createTaskForPrediction(prediction: Prediction, task: Task) {
    return this.run("createTaskForPrediction", () =>
      this.db.transaction(async (tx) => {
        const inserted = await tx
          .insert(predictions)
          .values({ ...prediction, createdAt: new Date(prediction.createdAt) })
          .onConflictDoNothing({ target: predictions.id })
          .returning({ id: predictions.id });
        if (!inserted.length) {
          const existing = await tx.select({ id: tasks.id }).from(tasks).where(eq(tasks.predictionId, prediction.id)).limit(1);
          throw new DuplicateTaskError(prediction.id, existing[0]?.id ?? "unknown");
        }
        const rows = await tx.insert(tasks).values(taskToRow(task)).returning();
        return taskFromRow(rows[0]);
      })
    );
  }

  async getPrediction(predictionId: string) {
    return this.run("getPrediction", async () => {
      const rows = await this.db.select().from(predictions).where(eq(predictions.id, predictionId)).limit(1);
      return rows[0] ? predictionFromRow(rows[0]) : null;
    });
  }

  async getTask(taskId: string) {
    return this.run("getTask", async () => {
      const rows = await this.db.select().from(tasks).where(eq(tasks.id, taskId)).limit(1);
      return rows[0] ? taskFromRow(rows[0]) : null;
    });
  }

  async findTaskByPrediction(predictionId: string) {
    return this.run("findTaskByPrediction", async () => {
      const rows = await this.db.select().from(tasks).where(eq(tasks.predictionId, predictionId)).limit(1);
      return rows[0] ? taskFromRow(rows[0]) : null;
    });
  }

  async listTasks(filter: { statuses?: TaskStatus[] } = {}) {
    return this.run("listTasks", async () => {
      if (filter.statuses && !filter.statuses.length) return [];
      const where: SQL | undefined = filter.statuses ? inArray(tasks.status, filter.statuses) : undefined;
      const rows = await this.db.select().from(tasks).where(where).orderBy(asc(tasks.createdAt), asc(tasks.id));
      return rows.map(taskFromRow);
    });
  }

  async updateTask(task: Task, expectedRevision: number) {
    return this.run("updateTask", async () => {
      const next: Task = { ...task, revision: expectedRevision + 1 };
      const rows = await this.db
        .update(tasks)
        .set(taskToRow(next))
        .where(and(eq(tasks.id, task.id), eq(tasks.revision, expectedRevision)))
        .returning();
      if (rows[0]) return taskFromRow(rows[0]);
      const exists = await this.db.select({ id: tasks.id }).from(tasks).where(eq(tasks.id, task.id)).limit(1);
      if (!exists.length) throw new NotFoundError("Task", task.id);
      throw new ConcurrentModificationError("Task", task.id);
    });
  }

  async getAnnotator(annotatorId: string, options: ReadOptions = {}) {
    return this.run("getAnnotator", async () => {
      const query = this.db.select().from(annotators).where(eq(annotators.id, annotatorId)).limit(1);
      const rows = options.forUpdate ? await query.for("update") : await query;
      return rows[0] ? annotatorFromRow(rows[0]) : null;
    });
  }

  async listAnnotators(annotatorIds?: string[]) {
    return this.run("listAnnotators", async () => {
      if (annotatorIds && !annotatorIds.length) return [];
      const where = annotatorIds ? inArray(annotators.id, annotatorIds) : undefined;
      const rows = await this.db.select().from(annotators).where(where).orderBy(asc(annotators.id));
      return rows.map(annotatorFromRow);
    });
  }

  async createAnnotator(annotator: Annotator) {
    return this.run("createAnnotator", async () => {
      const inserted = await this.db
        .insert(annotators)
        .values(annotatorToRow(annotator))
        .onConflictDoNothing({ target: annotators.id })
        .returning();
      if (inserted[0]) return { annotator: annotatorFromRow(inserted[0]), created: true };
      const existing = await this.db.select().from(annotators).where(eq(annotators.id, annotator.id)).limit(1);
      if (!existing[0]) throw new NotFoundError("Annotator", annotator.id);
      return { annotator: annotatorFromRow(existing[0]), created: false };
    });
  }

  async saveAnnotator(annotator: Annotator) {
    return this.run("saveAnnotator", async () => {
      const row = annotatorToRow(annotator);
      const { id: _id, createdAt: _createdAt, ...updates } = row;
      const rows = await this.db
        .insert(annotators)
        .values(row)
        .onConflictDoUpdate({ target: annotators.id, set: updates })
        .returning();
      return annotatorFromRow(rows[0]);
    });
  }

  async insertAnnotation(annotation: Annotation) {
    return this.run("insertAnnotation", async () => {
      const rows = await this.db
        .insert(annotations)
        .values({ ...annotation, createdAt: new Date(annotation.createdAt) })
        .returning();
      return annotationFromRow(rows[0]);
    });
  }

  async getAnnotation(annotationId: string) {
    return this.run("getAnnotation", async () => {
      const rows = await this.db.select().from(annotations).where(eq(annotations.id, annotationId)).limit(1);
      return rows[0] ? annotationFromRow(rows[0]) : null;
    });
  }

  async listAnnotationsForTask(taskId: string) {
    return this.run("listAnnotationsForTask", async () => {
      const rows = await this.db
        .select()
        .from(annotations)
        .where(eq(annotations.taskId, taskId))
        .orderBy(asc(annotations.createdAt), asc(annotations.id));
      return rows.map(annotationFromRow);
    });
  }

  async insertVote(vote: Vote) {
    return this.run("insertVote", async () => {
      const rows = await this.db
        .insert(votes)
        .values({ ...vote, createdAt: new Date(vote.createdAt) })
        .returning();
      return voteFromRow(rows[0]);
    });
  }

  async findVote(annotationId: string, voterId: string) {
    return this.run("findVote", async () => {
      const rows = await this.db
        .select()
        .from(votes)
        .where(and(eq(votes.annotationId, annotationId), eq(votes.voterId, voterId)))
        .limit(1);
      return rows[0] ? voteFromRow(rows[0]) : null;
    });
  }

  async listVotesForTask(taskId: string) {
    return this.run("listVotesForTask", async () => {
      const rows = await this.db
        .select()
        .from(votes)
        .where(eq(votes.taskId, taskId))
        .orderBy(asc(votes.createdAt), asc(votes.id));
      return rows.map(voteFromRow);
    });
  }

  async getConsensusForTask(taskId: string) {
    return this.run("getConsensusForTask", async () => {
      const rows = await this.db.select().from(consensusResults).where(eq(consensusResults.taskId, taskId)).limit(1);
      return rows[0] ? consensusFromRow(rows[0]) : null;
    });
  }

  async commitConsensus(result: ConsensusResult, task: Task, expectedRevision: number) {
    return this.run("commitConsensus", () =>
      this.db.transaction(async (tx) => {
        const inserted = await tx
          .insert(consensusResults)
          .values({ ...result, finalizedAt: new Date(result.finalizedAt) })
          .onConflictDoNothing({ target: consensusResults.taskId })
          .returning();
        if (!inserted.length) {
          const existing = await tx.select().from(consensusResults).where(eq(consensusResults.taskId, task.id)).limit(1);
          const current = await tx.select().from(tasks).where(eq(tasks.id, task.id)).limit(1);
          if (!existing[0] || !current[0]) throw new NotFoundError("Task", task.id);
          return { result: consensusFromRow(existing[0]), task: taskFromRow(current[0]), created: false };
        }
        const committed = await new PostgresStore(tx).updateTask(task, expectedRevision);
        return { result: consensusFromRow(inserted[0]), task: committed, created: true };
      })
    );
  }

  async listConsensusResults() {
    return this.run("listConsensusResults", async () => {
      const rows = await this.db.select().from(consensusResults).orderBy(asc(consensusResults.finalizedAt));
      return rows.map(consensusFromRow);
    });
  }

  async getRetrainingState(options: ReadOptions = {}) {
    return this.run("getRetrainingState", async () => {
      if (options.forUpdate) {
        // A missing singleton row cannot be locked, so create it empty first.
        await this.db
          .insert(retrainingState)
          .values({ id: RETRAINING_STATE_ROW_ID, pendingConsensusIds: [], windowStartedAt: null, updatedAt: new Date() })
          .onConflictDoNothing({ target: retrainingState.id });
      }
      const query = this.db
        .select()
        .from(retrainingState)
        .where(eq(retrainingState.id, RETRAINING_STATE_ROW_ID))
        .limit(1);
      const rows = options.forUpdate ? await query.for("update") : await query;
      const row = rows[0];
      if (!row) return null;
      return {
        pendingConsensusIds: row.pendingConsensusIds,
        windowStartedAt: toIso(row.windowStartedAt),
        updatedAt: row.updatedAt.toISOString()
      };
    });
  }

  async saveRetrainingState(state: RetrainingState) {
    await this.run("saveRetrainingState", async () => {
      const values = {
        pendingConsensusIds: state.pendingConsensusIds,
        windowStartedAt: toDate(state.windowStartedAt),
        updatedAt: new Date(state.updatedAt)
      };
      await this.db
        .insert(retrainingState)
        .values({ id: RETRAINING_STATE_ROW_ID, ...values })
        .onConflictDoUpdate({ target: retrainingState.id, set: values });
    });
  }

  async saveBatch(batch: RetrainingBatch) {
    return this.run("saveBatch", async () => {
      const row = batchToRow(batch);
      const { id: _id, ...updates } = row;
      const rows = await this.db
        .insert(retrainingBatches)
        .values(row)
        .onConflictDoUpdate({ target: retrainingBatches.id, set: updates })
        .returning();
      return batchFromRow(rows[0]);
    });
  }

  async getBatch(batchId: string, options: ReadOptions = {}) {
    return this.run("getBatch", async () => {
      const query = this.db.select().from(retrainingBatches).where(eq(retrainingBatches.id, batchId)).limit(1);
      const rows = options.forUpdate ? await query.for("update") : await query;
      return rows[0] ? batchFromRow(rows[0]) : null;
    });
  }

  async listBatches(statuses?: RetrainingBatchStatus[]) {
    return this.run("listBatches", async () => {
      if (statuses && !statuses.length) return [];
      const where = statuses ? inArray(retrainingBatches.status, statuses) : undefined;
      const rows = await this.db
        .select()
        .from(retrainingBatches)
        .where(where)
        .orderBy(asc(retrainingBatches.triggeredAt), asc(retrainingBatches.id));
      return rows.map(batchFromRow);
    });
  }

  async appendAudit(event: NewAuditEvent) {
    return this.run("appendAudit", async () => {
      const rows = await this.db
        .insert(auditEvents)
        .values({
          id: randomId("audit"),
          actorType: event.actorType,
          actorId: event.actorId ?? null,
          action: event.action,
          targetType: event.targetType,
          targetId: event.targetId,
          reasonText: event.reasonText ?? null,
          metadata: event.metadata ?? null,
          createdAt: new Date(event.createdAt ?? nowIso())
        })
        .returning();
      return auditFromRow(rows[0]);
    });
  }

  async listAuditEvents(filter: { targetId?: string; action?: string; limit?: number } = {}) {
    return this.run("listAuditEvents", async () => {
      const conditions: SQL[] = [];
      if (filter.targetId) conditions.push(eq(auditEvents.targetId, filter.targetId));
      if (filter.action) conditions.push(eq(auditEvents.action, filter.action));
      const query = this.db
        .select()
        .from(auditEvents)
        .where(conditions.length ? and(...conditions) : undefined)
        .orderBy(desc(auditEvents.createdAt), desc(auditEvents.id));
      const rows = filter.limit ? await query.limit(filter.limit) : await query;
      return rows.map(auditFromRow);
    });
  }

  async transaction<T>(fn: (store: EngineStore) => Promise<T>): Promise<T> {
    return this.run("transaction", () => this.db.transaction((tx) => fn(new PostgresStore(tx))));
  }

  async close() {
    await this.onClose?.();
  }
}

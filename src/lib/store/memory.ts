import { ConcurrentModificationError, DuplicateTaskError, NotFoundError } from "@/lib/errors";
import type { EngineStore, NewAuditEvent, ReadOptions } from "@/lib/store/interface";
import type {
  Annotation,
  Annotator,
  AppState,
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
import { nowIso, randomId, sortByCreatedAtAsc } from "@/lib/utils";

type Undo = () => void;

function emptyState(): AppState {
  return {
    predictions: [],
    tasks: [],
    annotators: [],
    annotations: [],
    votes: [],
    consensusResults: [],
    retrainingBatches: [],
    retrainingState: null,
    auditEvents: []
  };
}

function clone<T>(value: T): T {
  return structuredClone(value);
}

export class MemoryStore implements EngineStore {
  readonly backend = "memory" as const;
  state: AppState;
  private journal: Undo[] | null = null;
  private txQueue: Promise<void> = Promise.resolve();

  constructor(initialState?: Partial<AppState>) {
    const baseState = initialState ? clone(initialState) : {};
    this.state = { ...emptyState(), ...baseState };
  }

  snapshotState(): AppState {
    return clone(this.state);
  }

  private record(undo: Undo) {
    this.journal?.push(undo);
  }

  private insertRow<T extends { id: string }>(rows: T[], row: T, atStart = false) {
    const stored = clone(row);
    if (atStart) rows.unshift(stored);
    else rows.push(stored);
    this.record(() => {
      const index = rows.findIndex((r) => r.id === row.id);
      if (index >= 0) rows.splice(index, 1);
    });
  }

  private replaceRow<T extends { id: string }>(rows: T[], index: number, row: T) {
    const previous = rows[index];
    rows[index] = clone(row);
    this.record(() => {
      const current = rows.findIndex((r) => r.id === previous.id);
      if (current >= 0) rows[current] = previous;
    });
  }

  private upsertRow<T extends { id: string }>(rows: T[], row: T) {
    const index = rows.findIndex((r) => r.id === row.id);
    if (index >= 0) this.replaceRow(rows, index, row);
    else this.insertRow(rows, row);
  }

  async createTaskForPrediction(prediction: Prediction, task: Task) {
    if (this.state.predictions.some((p) => p.id === prediction.id)) {
      const existing = this.state.tasks.find((t) => t.predictionId === prediction.id);
      throw new DuplicateTaskError(prediction.id, existing?.id ?? "unknown");
    }
    this.insertRow(this.state.predictions, prediction);
    this.insertRow(this.state.tasks, task);
    return clone(task);
  }

  async getPrediction(predictionId: string) {
    const prediction = this.state.predictions.find((p) => p.id === predictionId);
    return prediction ? clone(prediction) : null;
  }

  async getTask(taskId: string) {
    const task = this.state.tasks.find((t) => t.id === taskId);
    return task ? clone(task) : null;
  }

  async findTaskByPrediction(predictionId: string) {
    const task = this.state.tasks.find((t) => t.predictionId === predictionId);
    return task ? clone(task) : null;
  }

  async listTasks(filter: { statuses?: TaskStatus[] } = {}) {
    const tasks = filter.statuses
      ? this.state.tasks.filter((t) => filter.statuses?.includes(t.status))
      : this.state.tasks;
    return sortByCreatedAtAsc(tasks).map(clone);
  }

  async updateTask(task: Task, expectedRevision: number) {
    const index = this.state.tasks.findIndex((t) => t.id === task.id);
    if (index < 0) throw new NotFoundError("Task", task.id);
    if (this.state.tasks[index].revision !== expectedRevision) {
      throw new ConcurrentModificationError("Task", task.id);
    }
    const next: Task = { ...task, revision: expectedRevision + 1 };
    this.replaceRow(this.state.tasks, index, next);
    return clone(next);
  }

  async getAnnotator(annotatorId: string, _options?: ReadOptions) {
    const annotator = this.state.annotators.find((a) => a.id === annotatorId);
    return annotator ? clone(annotator) : null;
  }

  async listAnnotators(annotatorIds?: string[]) {
    const rows = annotatorIds
      ? this.state.annotators.filter((a) => annotatorIds.includes(a.id))
      : this.state.annotators;
    return [...rows].sort((a, b) => a.id.localeCompare(b.id)).map(clone);
  }

  async createAnnotator(annotator: Annotator) {
    const existing = this.state.annotators.find((a) => a.id === annotator.id);
    if (existing) return { annotator: clone(existing), created: false };
    this.insertRow(this.state.annotators, annotator);
    return { annotator: clone(annotator), created: true };
  }

  async saveAnnotator(annotator: Annotator) {
    this.upsertRow(this.state.annotators, annotator);
    return clone(annotator);
  }

  async insertAnnotation(annotation: Annotation) {
    this.insertRow(this.state.annotations, annotation);
    return clone(annotation);
  }

  async getAnnotation(annotationId: string) {
    const annotation = this.state.annotations.find((a) => a.id === annotationId);
    return annotation ? clone(annotation) : null;
  }

  async listAnnotationsForTask(taskId: string) {
    return sortByCreatedAtAsc(this.state.annotations.filter((a) => a.taskId === taskId)).map(clone);
  }

  async insertVote(vote: Vote) {
    this.insertRow(this.state.votes, vote);
    return clone(vote);
  }

  async findVote(annotationId: string, voterId: string) {
    const vote = this.state.votes.find((v) => v.annotationId === annotationId && v.voterId === voterId);
    return vote ? clone(vote) : null;
  }

  async listVotesForTask(taskId: string) {
    return sortByCreatedAtAsc(this.state.votes.filter((v) => v.taskId === taskId)).map(clone);
  }

  async getConsensusForTask(taskId: string) {
    const result = this.state.consensusResults.find((r) => r.taskId === taskId);
    return result ? clone(result) : null;
  }

  async commitConsensus(result: ConsensusResult, task: Task, expectedRevision: number) {
    const existing = this.state.consensusResults.find((r) => r.taskId === task.id);
    if (existing) {
      const current = this.state.tasks.find((t) => t.id === task.id);
      if (!current) throw new NotFoundError("Task", task.id);
      return { result: clone(existing), task: clone(current), created: false };
    }
    const committed = await this.updateTask(task, expectedRevision);
    this.insertRow(this.state.consensusResults, result);
    return { result: clone(result), task: committed, created: true };
  }

  async listConsensusResults() {
    return [...this.state.consensusResults]
      .sort((a, b) => new Date(a.finalizedAt).getTime() - new Date(b.finalizedAt).getTime())
      .map(clone);
  }

  async getRetrainingState() {
    return this.state.retrainingState ? clone(this.state.retrainingState) : null;
  }

  async saveRetrainingState(state: RetrainingState) {
    const previous = this.state.retrainingState;
    this.state.retrainingState = clone(state);
    this.record(() => {
      this.state.retrainingState = previous;
    });
  }

  async saveBatch(batch: RetrainingBatch) {
    this.upsertRow(this.state.retrainingBatches, batch);
    return clone(batch);
  }

  async getBatch(batchId: string) {
    const batch = this.state.retrainingBatches.find((b) => b.id === batchId);
    return batch ? clone(batch) : null;
  }

  async listBatches(statuses?: RetrainingBatchStatus[]) {
    const rows = statuses
      ? this.state.retrainingBatches.filter((b) => statuses.includes(b.status))
      : this.state.retrainingBatches;
    return [...rows]
      .sort((a, b) => new Date(a.triggeredAt).getTime() - new Date(b.triggeredAt).getTime())
      .map(clone);
  }

  async appendAudit(event: NewAuditEvent) {
    const record: AuditEvent = {
      id: randomId("audit"),
      ...event,
      createdAt: event.createdAt ?? nowIso()
    };
    this.insertRow(this.state.auditEvents, record, true);
    return clone(record);
  }

  async listAuditEvents(filter: { targetId?: string; action?: string; limit?: number } = {}) {
    const rows = this.state.auditEvents.filter(
      (e) => (!filter.targetId || e.targetId === filter.targetId) && (!filter.action || e.action === filter.action)
    );
    return rows.slice(0, filter.limit ?? rows.length).map(clone);
  }

  /**
   * Transactions run one at a time, so reads inside one are already exclusive and `forUpdate` is
   * ignored. Writes made through the scoped store are journaled and undone in reverse order when `fn`
   * rejects.
   */
  async transaction<T>(fn: (store: EngineStore) => Promise<T>): Promise<T> {
    if (this.journal) return fn(this);

    const run = this.txQueue.then(async () => {
      const journal: Undo[] = [];
      const scoped = new MemoryStore();
      scoped.state = this.state;
      scoped.journal = journal;
      try {
        return await fn(scoped);
      } catch (error) {
        for (const undo of journal.reverse()) undo();
        throw error;
      } finally {
        scoped.journal = null;
      }
    });
    this.txQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async close() {}
}

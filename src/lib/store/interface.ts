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

export type StoreBackend = "memory" | "postgres";

export type NewAuditEvent = Omit<AuditEvent, "id" | "createdAt"> & { createdAt?: string };

/**
 * `forUpdate` locks the row until the enclosing `transaction` ends, so a read-modify-write on it is
 * exclusive across processes. Outside a transaction it has no lasting effect.
 */
export interface ReadOptions {
  forUpdate?: boolean;
}

/**
 * Durable state behind the engine. Every method may reject with `StorageUnavailableError`; callers
 * propagate it. Task writes are compare-and-swap on `revision`.
 */
export interface EngineStore {
  readonly backend: StoreBackend;

  /** Inserts the prediction and its task together; rejects with `DuplicateTaskError` if the prediction exists. */
  createTaskForPrediction(prediction: Prediction, task: Task): Promise<Task>;
  getPrediction(predictionId: string): Promise<Prediction | null>;
  getTask(taskId: string): Promise<Task | null>;
  findTaskByPrediction(predictionId: string): Promise<Task | null>;
  listTasks(filter?: { statuses?: TaskStatus[] }): Promise<Task[]>;
  /** Writes `task` if the stored revision equals `expectedRevision`; returns it with the next revision. */
  updateTask(task: Task, expectedRevision: number): Promise<Task>;

  getAnnotator(annotatorId: string, options?: ReadOptions): Promise<Annotator | null>;
  listAnnotators(annotatorIds?: string[]): Promise<Annotator[]>;
  /** Inserts a new annotator; when the id is taken the stored annotator is returned unchanged. */
  createAnnotator(annotator: Annotator): Promise<{ annotator: Annotator; created: boolean }>;
  saveAnnotator(annotator: Annotator): Promise<Annotator>;

  insertAnnotation(annotation: Annotation): Promise<Annotation>;
  getAnnotation(annotationId: string): Promise<Annotation | null>;
  listAnnotationsForTask(taskId: string): Promise<Annotation[]>;
  insertVote(vote: Vote): Promise<Vote>;
  findVote(annotationId: string, voterId: string): Promise<Vote | null>;
  listVotesForTask(taskId: string): Promise<Vote[]>;

  getConsensusForTask(taskId: string): Promise<ConsensusResult | null>;
  /**
   * Stores the result and the terminal task write atomically. When a result already exists for the
   * task nothing is written and the stored pair is returned.
   */
  commitConsensus(
    result: ConsensusResult,
    task: Task,
    expectedRevision: number
  ): Promise<{ result: ConsensusResult; task: Task; created: boolean }>;
  listConsensusResults(): Promise<ConsensusResult[]>;

  getRetrainingState(options?: ReadOptions): Promise<RetrainingState | null>;
  saveRetrainingState(state: RetrainingState): Promise<void>;
  saveBatch(batch: RetrainingBatch): Promise<RetrainingBatch>;
  getBatch(batchId: string, options?: ReadOptions): Promise<RetrainingBatch | null>;
  listBatches(statuses?: RetrainingBatchStatus[]): Promise<RetrainingBatch[]>;

  appendAudit(event: NewAuditEvent): Promise<AuditEvent>;
  listAuditEvents(filter?: { targetId?: string; action?: string; limit?: number }): Promise<AuditEvent[]>;

  /** Runs `fn` against a store whose writes commit together or not at all. */
  transaction<T>(fn: (store: EngineStore) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

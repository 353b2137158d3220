export type TaskStatus = "pending" | "assigned" | "annotated" | "voting" | "consensus_reached" | "stalled";
export type AssignmentEventKind = "assigned" | "completed" | "expired";
export type RetrainingBatchStatus = "pending" | "sent" | "acknowledged";
export type RetrainingBatchReason = "size" | "age";

export interface Prediction {
  id: string;
  videoId: string;
  caption: string;
  uncertainty: number;
  modelVersion: string;
  createdAt: string;
}

export interface AssignmentEvent {
  annotatorId: string;
  kind: AssignmentEventKind;
  at: string;
  expiresAt?: string;
}

export interface TaskFollowUp {
  reliabilityApplied: boolean;
  retrainingRecorded: boolean;
}

export interface Task {
  id: string;
  predictionId: string;
  videoId: string;
  uncertainty: number;
  difficulty: number;
  status: TaskStatus;
  requiredAnnotations: number;
  openAssignees: string[];
  assignments: AssignmentEvent[];
  retryCount: number;
  stageDeadlineAt?: string;
  votingStartedAt?: string;
  manualReviewRequestedAt?: string;
  consensusId?: string;
  followUp?: TaskFollowUp;
  revision: number;
  createdAt: string;
  updatedAt: string;
}

export interface Annotator {
  id: string;
  prior: number;
  reliability: number;
  openTaskCount: number;
  maxConcurrentTasks: number;
  agreementCount: number;
  disagreementCount: number;
  completedCount: number;
  totalAnnotationMs: number;
  votesCast: number;
  createdAt: string;
  updatedAt: string;
}

export interface Annotation {
  id: string;
  taskId: string;
  annotatorId: string;
  caption: string;
  createdAt: string;
}

export interface Vote {
  id: string;
  taskId: string;
  annotationId: string;
  voterId: string;
  agree: boolean;
  createdAt: string;
}

export interface ConsensusResult {
  id: string;
  taskId: string;
  annotationId: string;
  caption: string;
  confidence: number;
  agreementRatio: number;
  averageVoterReliability: number;
  lowConfidence: boolean;
  contributingAnnotationIds: string[];
  finalizedAt: string;
}

export interface RetrainingBatch {
  id: string;
  consensusIds: string[];
  reason: RetrainingBatchReason;
  status: RetrainingBatchStatus;
  triggeredAt: string;
  offerCount: number;
  lastOfferedAt?: string;
  acknowledgedAt?: string;
  trainedModelVersion?: string;
}

export interface RetrainingState {
  pendingConsensusIds: string[];
  windowStartedAt?: string;
  updatedAt: string;
}

export interface AuditEvent {
  id: string;
  actorType: "system" | "annotator" | "collaborator";
  actorId?: string;
  action: string;
  targetType: "prediction" | "task" | "annotator" | "annotation" | "vote" | "consensus" | "retraining_batch";
  targetId: string;
  reasonText?: string;
  metadata?: Record<string, unknown>;
  createdAt: string;
}

export interface AnnotatorMetrics {
  annotatorId: string;
  reliability: number;
  throughput: number;
  disagreementRate: number;
  averageTaskSeconds: number;
  openTaskCount: number;
}

export interface ManualReviewRequired {
  kind: "manual_review_required";
  taskId: string;
  predictionId: string;
  retryCount: number;
  requestedAt: string;
}

export interface AppState {
  predictions: Prediction[];
  tasks: Task[];
  annotators: Annotator[];
  annotations: Annotation[];
  votes: Vote[];
  consensusResults: ConsensusResult[];
  retrainingBatches: RetrainingBatch[];
  retrainingState: RetrainingState | null;
  auditEvents: AuditEvent[];
}


export const DEFAULT_REQUIRED_ANNOTATIONS = 2;
export const DEFAULT_DIFFICULTY = 0.5;
export const DIFFICULTY_TIERS = {
  low: 0.1,
  medium: 0.5,
  high: 1
} as const;

export const FRESHNESS_MAX_BOOST = 2;
export const FRESHNESS_TIME_CONSTANT_MS = 30 * 60 * 1000;

export const DEFAULT_MAX_CONCURRENT_TASKS = 5;
export const RELIABILITY_PRIOR = 0.5;
export const RELIABILITY_SMOOTHING = 1;

export const CONSENSUS_AGREEMENT_THRESHOLD = 0.66;
export const CONSENSUS_MIN_VOTES = 3;
export const CONSENSUS_AGREEMENT_WEIGHT = 0.6;
export const LOW_CONFIDENCE_PENALTY = 0.5;

export const ASSIGNMENT_TIMEOUT_MS = 30 * 60 * 1000;
export const MAX_VOTING_WINDOW_MS = 24 * 60 * 60 * 1000;
export const VOTING_TIMEOUT_MS = 48 * 60 * 60 * 1000;
export const MAX_STALL_RETRIES = 3;

export const RETRAINING_BATCH_SIZE = 50;
export const RETRAINING_MAX_BATCH_AGE_MS = 6 * 60 * 60 * 1000;
export const RETRAINING_ACK_TIMEOUT_MS = 15 * 60 * 1000;

export const MAX_CAPTION_CHARS = 2000;

/** Attempts `assignNext` makes when another writer changes the chosen task or annotator first. */
export const ASSIGNMENT_ATTEMPTS = 3;

export const LOCK_SCOPES = {
  assignment: "assignment",
  retraining: "retraining",
  task: (taskId: string) => `task:${taskId}`,
  annotator: (annotatorId: string) => `annotator:${annotatorId}`,
  prediction: (predictionId: string) => `prediction:${predictionId}`
} as const;

export const AUDIT_ACTIONS = {
  predictionIngested: "prediction.ingested",
  annotatorRegistered: "annotator.registered",
  taskAssigned: "task.assigned",
  taskStalled: "task.stalled",
  taskRequeued: "task.requeued",
  taskManualReview: "task.manual_review_requested",
  taskManualReviewResolved: "task.manual_review_resolved",
  annotationSubmitted: "annotation.submitted",
  voteSubmitted: "vote.submitted",
  consensusFinalized: "consensus.finalized",
  reliabilityUpdated: "annotator.reliability_updated",
  batchEmitted: "retraining.batch_emitted",
  batchOffered: "retraining.batch_offered",
  batchAcknowledged: "retraining.batch_acknowledged",
  hookFailed: "engine.hook_failed"
} as const;

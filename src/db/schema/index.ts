import {
  boolean,
  doublePrecision,
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  varchar
} from "drizzle-orm/pg-core";
import type { AssignmentEvent, TaskFollowUp } from "@/lib/types";

export const predictions = pgTable("predictions", {
  id: varchar("id", { length: 128 }).primaryKey(),
  videoId: varchar("video_id", { length: 128 }).notNull(),
  caption: text("caption").notNull(),
  uncertainty: doublePrecision("uncertainty").notNull(),
  modelVersion: varchar("model_version", { length: 64 }).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull()
});

export const tasks = pgTable("tasks", {
  id: varchar("id", { length: 64 }).primaryKey(),
  predictionId: varchar("prediction_id", { length: 128 }).notNull(),
  videoId: varchar("video_id", { length: 128 }).notNull(),
  uncertainty: doublePrecision("uncertainty").notNull(),
  difficulty: doublePrecision("difficulty").notNull(),
  status: varchar("status", { length: 32 }).notNull(),
  requiredAnnotations: integer("required_annotations").notNull(),
  openAssignees: jsonb("open_assignees").$type<string[]>().notNull(),
  assignments: jsonb("assignments").$type<AssignmentEvent[]>().notNull(),
  retryCount: integer("retry_count").notNull(),
  stageDeadlineAt: timestamp("stage_deadline_at", { withTimezone: true }),
  votingStartedAt: timestamp("voting_started_at", { withTimezone: true }),
  manualReviewRequestedAt: timestamp("manual_review_requested_at", { withTimezone: true }),
  consensusId: varchar("consensus_id", { length: 64 }),
  followUp: jsonb("follow_up").$type<TaskFollowUp>(),
  revision: integer("revision").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull()
}, (t) => ({
  predictionUnique: uniqueIndex("tasks_prediction_unique").on(t.predictionId),
  statusIdx: index("tasks_status_idx").on(t.status)
}));

export const annotators = pgTable("annotators", {
  id: varchar("id", { length: 128 }).primaryKey(),
  prior: doublePrecision("prior").notNull(),
  reliability: doublePrecision("reliability").notNull(),
  openTaskCount: integer("open_task_count").notNull(),
  maxConcurrentTasks: integer("max_concurrent_tasks").notNull(),
  agreementCount: integer("agreement_count").notNull(),
  disagreementCount: integer("disagreement_count").notNull(),
  completedCount: integer("completed_count").notNull(),
  totalAnnotationMs: doublePrecision("total_annotation_ms").notNull(),
  votesCast: integer("votes_cast").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull()
});

export const annotations = pgTable("annotations", {
  id: varchar("id", { length: 64 }).primaryKey(),
  taskId: varchar("task_id", { length: 64 }).notNull(),
  annotatorId: varchar("annotator_id", { length: 128 }).notNull(),
  caption: text("caption").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull()
}, (t) => ({
  taskIdx: index("annotations_task_idx").on(t.taskId)
}));

export const votes = pgTable("votes", {
  id: varchar("id", { length: 64 }).primaryKey(),
  taskId: varchar("task_id", { length: 64 }).notNull(),
  annotationId: varchar("annotation_id", { length: 64 }).notNull(),
  voterId: varchar("voter_id", { length: 128 }).notNull(),
  agree: boolean("agree").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull()
}, (t) => ({
  voterUnique: uniqueIndex("votes_annotation_voter_unique").on(t.annotationId, t.voterId),
  taskIdx: index("votes_task_idx").on(t.taskId)
}));

export const consensusResults = pgTable("consensus_results", {
  id: varchar("id", { length: 64 }).primaryKey(),
  taskId: varchar("task_id", { length: 64 }).notNull(),
  annotationId: varchar("annotation_id", { length: 64 }).notNull(),
  caption: text("caption").notNull(),
  confidence: doublePrecision("confidence").notNull(),
  agreementRatio: doublePrecision("agreement_ratio").notNull(),
  averageVoterReliability: doublePrecision("average_voter_reliability").notNull(),
  lowConfidence: boolean("low_confidence").notNull(),
  contributingAnnotationIds: jsonb("contributing_annotation_ids").$type<string[]>().notNull(),
  finalizedAt: timestamp("finalized_at", { withTimezone: true }).notNull()
}, (t) => ({
  taskUnique: uniqueIndex("consensus_results_task_unique").on(t.taskId)
}));

export const retrainingBatches = pgTable("retraining_batches", {
  id: varchar("id", { length: 64 }).primaryKey(),
  consensusIds: jsonb("consensus_ids").$type<string[]>().notNull(),
  reason: varchar("reason", { length: 16 }).notNull(),
  status: varchar("status", { length: 16 }).notNull(),
  triggeredAt: timestamp("triggered_at", { withTimezone: true }).notNull(),
  offerCount: integer("offer_count").notNull(),
  lastOfferedAt: timestamp("last_offered_at", { withTimezone: true }),
  acknowledgedAt: timestamp("acknowledged_at", { withTimezone: true }),
  trainedModelVersion: varchar("trained_model_version", { length: 64 })
});

export const retrainingState = pgTable("retraining_state", {
  id: varchar("id", { length: 64 }).primaryKey(),
  pendingConsensusIds: jsonb("pending_consensus_ids").$type<string[]>().notNull(),
  windowStartedAt: timestamp("window_started_at", { withTimezone: true }),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull()
});

export const auditEvents = pgTable("audit_events", {
  id: varchar("id", { length: 64 }).primaryKey(),
  actorType: varchar("actor_type", { length: 16 }).notNull(),
  actorId: varchar("actor_id", { length: 128 }),
  action: varchar("action", { length: 64 }).notNull(),
  targetType: varchar("target_type", { length: 32 }).notNull(),
  targetId: varchar("target_id", { length: 128 }).notNull(),
  reasonText: text("reason_text"),
  metadata: jsonb("metadata").$type<Record<string, unknown>>(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull()
}, (t) => ({
  targetIdx: index("audit_events_target_idx").on(t.targetId)
}));

import { z } from "zod";
import {
  ASSIGNMENT_TIMEOUT_MS,
  CONSENSUS_AGREEMENT_THRESHOLD,
  CONSENSUS_AGREEMENT_WEIGHT,
  CONSENSUS_MIN_VOTES,
  DEFAULT_DIFFICULTY,
  DEFAULT_MAX_CONCURRENT_TASKS,
  DEFAULT_REQUIRED_ANNOTATIONS,
  DIFFICULTY_TIERS,
  FRESHNESS_MAX_BOOST,
  FRESHNESS_TIME_CONSTANT_MS,
  LOW_CONFIDENCE_PENALTY,
  MAX_CAPTION_CHARS,
  MAX_STALL_RETRIES,
  MAX_VOTING_WINDOW_MS,
  RELIABILITY_PRIOR,
  RELIABILITY_SMOOTHING,
  RETRAINING_ACK_TIMEOUT_MS,
  RETRAINING_BATCH_SIZE,
  RETRAINING_MAX_BATCH_AGE_MS,
  VOTING_TIMEOUT_MS
} from "@/lib/constants";
import { ValidationError } from "@/lib/errors";

const identifierSchema = z.string().trim().min(1).max(128);
const unitIntervalSchema = z.number().min(0).max(1);
const positiveMsSchema = z.number().int().positive();

export const difficultyTierSchema = z.enum(["low", "medium", "high"]);

export const predictionInputSchema = z.object({
  id: identifierSchema,
  videoId: identifierSchema,
  caption: z.string().max(MAX_CAPTION_CHARS).default(""),
  uncertainty: unitIntervalSchema,
  modelVersion: z.string().trim().min(1).max(64),
  difficulty: z
    .union([z.number().gt(0).max(1), difficultyTierSchema])
    .optional()
    .transform((value) => (typeof value === "string" ? DIFFICULTY_TIERS[value] : value))
});

export const annotatorRegistrationSchema = z.object({
  id: identifierSchema,
  maxConcurrentTasks: z.number().int().positive().max(1000).optional(),
  initialReliability: unitIntervalSchema.optional()
});

export const annotationInputSchema = z.object({
  taskId: identifierSchema,
  annotatorId: identifierSchema,
  caption: z.string().trim().min(1, "caption must not be empty").max(MAX_CAPTION_CHARS)
});

export const voteInputSchema = z.object({
  annotationId: identifierSchema,
  voterId: identifierSchema,
  agree: z.boolean()
});

export const annotatorPoolSchema = z.array(identifierSchema).max(10_000);

export const batchAckSchema = z.object({
  batchId: identifierSchema,
  modelVersion: z.string().trim().min(1).max(64).optional()
});

export const engineConfigSchema = z
  .object({
    requiredAnnotations: z.number().int().min(1).default(DEFAULT_REQUIRED_ANNOTATIONS),
    defaultDifficulty: z.number().gt(0).max(1).default(DEFAULT_DIFFICULTY),
    freshnessMaxBoost: z.number().gt(1).default(FRESHNESS_MAX_BOOST),
    freshnessTimeConstantMs: positiveMsSchema.default(FRESHNESS_TIME_CONSTANT_MS),
    maxConcurrentTasks: z.number().int().positive().default(DEFAULT_MAX_CONCURRENT_TASKS),
    reliabilityPrior: unitIntervalSchema.default(RELIABILITY_PRIOR),
    reliabilitySmoothing: z.number().positive().default(RELIABILITY_SMOOTHING),
    agreementThreshold: unitIntervalSchema.default(CONSENSUS_AGREEMENT_THRESHOLD),
    minVotes: z.number().int().min(1).default(CONSENSUS_MIN_VOTES),
    agreementWeight: unitIntervalSchema.default(CONSENSUS_AGREEMENT_WEIGHT),
    lowConfidencePenalty: unitIntervalSchema.default(LOW_CONFIDENCE_PENALTY),
    assignmentTimeoutMs: positiveMsSchema.default(ASSIGNMENT_TIMEOUT_MS),
    maxVotingWindowMs: positiveMsSchema.default(MAX_VOTING_WINDOW_MS),
    votingTimeoutMs: positiveMsSchema.default(VOTING_TIMEOUT_MS),
    maxRetries: z.number().int().min(0).default(MAX_STALL_RETRIES),
    retrainingBatchSize: z.number().int().positive().default(RETRAINING_BATCH_SIZE),
    retrainingMaxBatchAgeMs: positiveMsSchema.default(RETRAINING_MAX_BATCH_AGE_MS),
    retrainingAckTimeoutMs: positiveMsSchema.default(RETRAINING_ACK_TIMEOUT_MS)
  })
  .superRefine((value, ctx) => {
    if (value.votingTimeoutMs <= value.maxVotingWindowMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["votingTimeoutMs"],
        message: "votingTimeoutMs must be longer than maxVotingWindowMs"
      });
    }
  });

export type PredictionInput = z.input<typeof predictionInputSchema>;
export type AnnotatorRegistrationInput = z.input<typeof annotatorRegistrationSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;
export type EngineConfig = z.output<typeof engineConfigSchema>;

export function parseWith<Output, Input>(
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  input: unknown,
  message: string
): Output {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromZod(message, parsed.error);
  }
  return parsed.data;
}

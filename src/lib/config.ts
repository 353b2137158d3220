import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { ValidationError } from "@/lib/errors";
import { engineConfigSchema, type EngineConfig, type EngineConfigInput } from "@/lib/schemas";

const ENV_OVERRIDES: Record<string, keyof EngineConfigInput> = {
  LABELING_REQUIRED_ANNOTATIONS: "requiredAnnotations",
  LABELING_DEFAULT_DIFFICULTY: "defaultDifficulty",
  LABELING_FRESHNESS_MAX_BOOST: "freshnessMaxBoost",
  LABELING_FRESHNESS_TIME_CONSTANT_MS: "freshnessTimeConstantMs",
  LABELING_MAX_CONCURRENT_TASKS: "maxConcurrentTasks",
  LABELING_RELIABILITY_PRIOR: "reliabilityPrior",
  LABELING_RELIABILITY_SMOOTHING: "reliabilitySmoothing",
  LABELING_AGREEMENT_THRESHOLD: "agreementThreshold",
  LABELING_MIN_VOTES: "minVotes",
  LABELING_AGREEMENT_WEIGHT: "agreementWeight",
  LABELING_LOW_CONFIDENCE_PENALTY: "lowConfidencePenalty",
  LABELING_ASSIGNMENT_TIMEOUT_MS: "assignmentTimeoutMs",
  LABELING_MAX_VOTING_WINDOW_MS: "maxVotingWindowMs",
  LABELING_VOTING_TIMEOUT_MS: "votingTimeoutMs",
  LABELING_MAX_RETRIES: "maxRetries",
  LABELING_RETRAINING_BATCH_SIZE: "retrainingBatchSize",
  LABELING_RETRAINING_MAX_BATCH_AGE_MS: "retrainingMaxBatchAgeMs",
  LABELING_RETRAINING_ACK_TIMEOUT_MS: "retrainingAckTimeoutMs"
};

export class ConfigFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigFileError";
  }
}

function readConfigFile(path: string): Record<string, unknown> {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigFileError(`Cannot read engine config ${path}: ${detail}`);
  }
  const parsed: unknown = parseYaml(text);
  if (parsed == null) return {};
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigFileError(`Engine config ${path} must be a YAML mapping`);
  }
  return { ...parsed };
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [name, key] of Object.entries(ENV_OVERRIDES)) {
    const raw = env[name]?.trim();
    if (!raw) continue;
    const value = Number(raw);
    out[key] = Number.isNaN(value) ? raw : value;
  }
  return out;
}

/**
 * Resolves the engine configuration. Later sources win: built-in defaults, the YAML file named by
 * `LABELING_CONFIG_PATH`, `LABELING_*` environment variables, then explicit overrides.
 */
export function loadEngineConfig(options: { env?: NodeJS.ProcessEnv; overrides?: EngineConfigInput } = {}): EngineConfig {
  const env = options.env ?? process.env;
  const filePath = env.LABELING_CONFIG_PATH?.trim();
  const merged = {
    ...(filePath ? readConfigFile(filePath) : {}),
    ...envOverrides(env),
    ...(options.overrides ?? {})
  };
  const parsed = engineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw ValidationError.fromZod("Invalid engine configuration", parsed.error);
  }
  return parsed.data;
}

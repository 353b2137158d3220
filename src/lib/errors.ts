import type { ZodError } from "zod";
import { ERROR_CODES, type ErrorCode } from "@/lib/error-codes";
import type { TaskStatus } from "@/lib/types";

export type FieldError = {
  field: string;
  rule: string;
  expected?: string | number | boolean;
  actual?: unknown;
};

type EngineErrorOptions = {
  retryable?: boolean;
  fieldErrors?: FieldError[];
  cause?: unknown;
};

export class EngineError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;
  readonly fieldErrors: FieldError[];

  constructor(code: ErrorCode, message: string, options: EngineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "EngineError";
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.fieldErrors = options.fieldErrors ?? [];
  }
}

export class DuplicateTaskError extends EngineError {
  readonly predictionId: string;
  readonly existingTaskId: string;

  constructor(predictionId: string, existingTaskId: string) {
    super(ERROR_CODES.taskDuplicate, `Prediction ${predictionId} already has task ${existingTaskId}`);
    this.name = "DuplicateTaskError";
    this.predictionId = predictionId;
    this.existingTaskId = existingTaskId;
  }
}

export class NoEligibleAnnotatorError extends EngineError {
  constructor(message = "No eligible annotator for any pending task") {
    super(ERROR_CODES.assignmentNoEligibleAnnotator, message, { retryable: true });
    this.name = "NoEligibleAnnotatorError";
  }
}

export class SelfVoteError extends EngineError {
  constructor(annotationId: string, voterId: string) {
    super(ERROR_CODES.voteSelfNotAllowed, `Annotator ${voterId} cannot vote on own annotation ${annotationId}`);
    this.name = "SelfVoteError";
  }
}

export class InvalidStateTransitionError extends EngineError {
  readonly from: TaskStatus;
  readonly to: TaskStatus | "vote" | "annotate" | "finalize";

  constructor(taskId: string, from: TaskStatus, to: InvalidStateTransitionError["to"]) {
    super(ERROR_CODES.taskInvalidTransition, `Task ${taskId} cannot move from ${from} to ${to}`);
    this.name = "InvalidStateTransitionError";
    this.from = from;
    this.to = to;
  }
}

export class AnnotatorNotAssignedError extends EngineError {
  constructor(taskId: string, annotatorId: string) {
    super(ERROR_CODES.annotationNotAssigned, `Annotator ${annotatorId} holds no open assignment on task ${taskId}`);
    this.name = "AnnotatorNotAssignedError";
  }
}

export class ConsensusPendingError extends EngineError {
  constructor(taskId: string, reason: string) {
    super(ERROR_CODES.consensusPending, `Consensus not reached for task ${taskId}: ${reason}`, { retryable: true });
    this.name = "ConsensusPendingError";
  }
}

export class ConcurrentModificationError extends EngineError {
  constructor(entity: string, id: string) {
    super(ERROR_CODES.taskConcurrentModification, `${entity} ${id} was modified concurrently`, { retryable: true });
    this.name = "ConcurrentModificationError";
  }
}

export class NotFoundError extends EngineError {
  constructor(entity: string, id: string) {
    super(ERROR_CODES.notFound, `${entity} ${id} not found`);
    this.name = "NotFoundError";
  }
}

export class ValidationError extends EngineError {
  constructor(message: string, fieldErrors: FieldError[]) {
    super(ERROR_CODES.unprocessableEntity, message, { fieldErrors });
    this.name = "ValidationError";
  }

  static fromZod(message: string, error: ZodError): ValidationError {
    const fieldErrors = error.issues.map((issue) => ({
      field: issue.path.join(".") || "(root)",
      rule: issue.code,
      expected: issue.message
    }));
    return new ValidationError(message, fieldErrors);
  }
}

export class StorageUnavailableError extends EngineError {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(ERROR_CODES.storageUnavailable, `Storage operation ${operation} failed: ${detail}`, { retryable: true, cause });
    this.name = "StorageUnavailableError";
  }
}

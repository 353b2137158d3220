import { randomUUID } from "node:crypto";
import { ERROR_CODES } from "@/lib/error-codes";
import {
  AnnotatorNotAssignedError,
  ConcurrentModificationError,
  ConsensusPendingError,
  DuplicateTaskError,
  EngineError,
  InvalidStateTransitionError,
  NoEligibleAnnotatorError,
  NotFoundError,
  SelfVoteError,
  StorageUnavailableError,
  ValidationError,
  type FieldError
} from "@/lib/errors";

export type ErrorEnvelope = {
  status: number;
  body: {
    error_code: string;
    message: string;
    field_errors: FieldError[];
    retryable: boolean;
    request_id: string;
  };
};

function statusFor(error: EngineError): number {
  if (error instanceof ValidationError) return 422;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof DuplicateTaskError || error instanceof ConcurrentModificationError) return 409;
  if (error instanceof InvalidStateTransitionError || error instanceof ConsensusPendingError) return 409;
  if (error instanceof SelfVoteError || error instanceof AnnotatorNotAssignedError) return 403;
  if (error instanceof NoEligibleAnnotatorError) return 503;
  if (error instanceof StorageUnavailableError) return 503;
  return 400;
}

// Translates engine failures for the service layer; unknown errors never leak their message.
export function toErrorEnvelope(error: unknown, requestId?: string): ErrorEnvelope {
  const request_id = requestId ?? `req_${randomUUID()}`;
  if (error instanceof EngineError) {
    return {
      status: statusFor(error),
      body: {
        error_code: error.code,
        message: error.message,
        field_errors: error.fieldErrors,
        retryable: error.retryable,
        request_id
      }
    };
  }
  return {
    status: 500,
    body: {
      error_code: ERROR_CODES.internal,
      message: "Internal server error",
      field_errors: [],
      retryable: true,
      request_id
    }
  };
}

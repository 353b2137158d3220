import { describe, expect, it } from "vitest";
import { toErrorEnvelope } from "../../src/lib/error-envelope";
import {
  ConsensusPendingError,
  DuplicateTaskError,
  NoEligibleAnnotatorError,
  NotFoundError,
  SelfVoteError,
  StorageUnavailableError,
  ValidationError
} from "../../src/lib/errors";

describe("error envelope contract", () => {
  it("includes deterministic error envelope fields", () => {
    const envelope = toErrorEnvelope(new NotFoundError("Task", "task_1"));
    expect(envelope.status).toBe(404);
    expect(envelope.body).toHaveProperty("error_code", "NOT_FOUND");
    expect(envelope.body).toHaveProperty("message", "Task task_1 not found");
    expect(envelope.body).toHaveProperty("field_errors", []);
    expect(envelope.body).toHaveProperty("retryable", false);
    expect(envelope.body.request_id.startsWith("req_")).toBe(true);
  });

  it("keeps a caller supplied request id", () => {
    expect(toErrorEnvelope(new SelfVoteError("ann_1", "a"), "req_fixed").body.request_id).toBe("req_fixed");
  });

  it("maps engine errors to statuses and retryability", () => {
    const cases: Array<[Error, number, string, boolean]> = [
      [new DuplicateTaskError("pred_1", "task_1"), 409, "TASK_DUPLICATE", false],
      [new SelfVoteError("ann_1", "a"), 403, "VOTE_SELF_NOT_ALLOWED", false],
      [new ConsensusPendingError("task_1", "Awaiting 1 more votes"), 409, "CONSENSUS_PENDING", true],
      [new NoEligibleAnnotatorError(), 503, "ASSIGNMENT_NO_ELIGIBLE_ANNOTATOR", true],
      [new StorageUnavailableError("getTask", new Error("connection reset")), 503, "STORAGE_UNAVAILABLE", true]
    ];
    for (const [error, status, code, retryable] of cases) {
      const envelope = toErrorEnvelope(error);
      expect(envelope.status).toBe(status);
      expect(envelope.body.error_code).toBe(code);
      expect(envelope.body.retryable).toBe(retryable);
    }
  });

  it("supports structured field errors for 422", () => {
    const envelope = toErrorEnvelope(
      new ValidationError("Invalid annotation", [{ field: "caption", rule: "too_small", expected: "caption must not be empty" }])
    );
    expect(envelope.status).toBe(422);
    expect(envelope.body.error_code).toBe("UNPROCESSABLE_ENTITY");
    expect(envelope.body.field_errors[0].field).toBe("caption");
  });

  it("hides the message of unknown errors", () => {
    const envelope = toErrorEnvelope(new Error("secret detail"));
    expect(envelope.status).toBe(500);
    expect(envelope.body.message).toBe("Internal server error");
    expect(envelope.body.error_code).toBe("INTERNAL_ERROR");
  });

  it("chains the storage cause", () => {
    const cause = new Error("connection reset");
    const error = new StorageUnavailableError("getTask", cause);
    expect(error.cause).toBe(cause);
    expect(error.message).toBe("Storage operation getTask failed: connection reset");
  });
});

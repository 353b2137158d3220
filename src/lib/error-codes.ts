export const ERROR_CODES = {
  badRequest: "BAD_REQUEST",
  notFound: "NOT_FOUND",
  conflict: "CONFLICT",
  internal: "INTERNAL_ERROR",
  unprocessableEntity: "UNPROCESSABLE_ENTITY",

  taskDuplicate: "TASK_DUPLICATE",
  taskInvalidTransition: "TASK_INVALID_STATE_TRANSITION",
  taskConcurrentModification: "TASK_CONCURRENT_MODIFICATION",

  assignmentNoEligibleAnnotator: "ASSIGNMENT_NO_ELIGIBLE_ANNOTATOR",
  annotationNotAssigned: "ANNOTATION_ANNOTATOR_NOT_ASSIGNED",
  voteSelfNotAllowed: "VOTE_SELF_NOT_ALLOWED",

  consensusPending: "CONSENSUS_PENDING",

  storageUnavailable: "STORAGE_UNAVAILABLE"
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

import { InvalidStateTransitionError } from "@/lib/errors";
import type { Task, TaskStatus } from "@/lib/types";

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["assigned", "stalled"],
  assigned: ["annotated", "stalled"],
  annotated: ["voting", "stalled"],
  voting: ["consensus_reached", "stalled"],
  consensus_reached: [],
  stalled: ["pending"]
};

export const STALLABLE_STATUSES: readonly TaskStatus[] = ["assigned", "annotated", "voting"];

// Statuses in which a task can still take on annotators.
export const ASSIGNABLE_STATUSES: readonly TaskStatus[] = ["pending", "assigned", "annotated"];

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: TaskStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

/** Returns a copy of the task in the next status; the caller commits it with a revision check. */
export function transitionTask(task: Task, to: TaskStatus, at: string, patch: Partial<Task> = {}): Task {
  if (!canTransition(task.status, to)) {
    throw new InvalidStateTransitionError(task.id, task.status, to);
  }
  return { ...task, ...patch, status: to, updatedAt: at };
}

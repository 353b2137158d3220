import type { Annotator } from "@/lib/types";

export interface AnnotatorCandidate {
  annotator: Annotator;
  score: number;
  loadFraction: number;
}

export function loadFraction(annotator: Pick<Annotator, "openTaskCount" | "maxConcurrentTasks">): number {
  if (annotator.maxConcurrentTasks <= 0) return 1;
  return Math.min(1, annotator.openTaskCount / annotator.maxConcurrentTasks);
}

export function hasCapacity(annotator: Pick<Annotator, "openTaskCount" | "maxConcurrentTasks">): boolean {
  return annotator.openTaskCount < annotator.maxConcurrentTasks;
}

export function assignmentScore(annotator: Annotator): number {
  return annotator.reliability * (1 - loadFraction(annotator));
}

export function isEligibleFor(annotator: Annotator, participants: readonly string[]): boolean {
  return hasCapacity(annotator) && !participants.includes(annotator.id);
}

export function rankCandidates(annotators: Annotator[], participants: readonly string[]): AnnotatorCandidate[] {
  return annotators
    .filter((annotator) => isEligibleFor(annotator, participants))
    .map((annotator) => ({ annotator, score: assignmentScore(annotator), loadFraction: loadFraction(annotator) }))
    .sort((a, b) => {
      if (a.score !== b.score) return b.score - a.score;
      if (a.annotator.openTaskCount !== b.annotator.openTaskCount) {
        return a.annotator.openTaskCount - b.annotator.openTaskCount;
      }
      return a.annotator.id.localeCompare(b.annotator.id);
    });
}

/** Best annotator for a task, or null when every annotator is at capacity or already participating. */
export function selectAnnotator(annotators: Annotator[], participants: readonly string[]): Annotator | null {
  return rankCandidates(annotators, participants)[0]?.annotator ?? null;
}

import type { Annotation, Annotator, ConsensusResult, Vote } from "@/lib/types";
import { normalizeCaption } from "@/lib/utils";

export interface ReliabilityParams {
  smoothing: number;
  prior: number;
}

/**
 * Smoothed agreement rate. Equals `prior` with no history and stays strictly positive while both
 * `smoothing` and `prior` are.
 */
export function computeReliability(
  counts: Pick<Annotator, "agreementCount" | "disagreementCount">,
  params: ReliabilityParams
): number {
  const agreements = Math.max(0, counts.agreementCount);
  const disagreements = Math.max(0, counts.disagreementCount);
  const denominator = agreements + disagreements + params.smoothing;
  if (denominator <= 0) return params.prior;
  return (agreements + params.smoothing * params.prior) / denominator;
}

export function disagreementRate(counts: Pick<Annotator, "agreementCount" | "disagreementCount">): number {
  const total = counts.agreementCount + counts.disagreementCount;
  return total ? counts.disagreementCount / total : 0;
}

/**
 * Whether each participant of a task sided with the outcome. An annotator counts as aligned only if
 * every annotation they wrote and every vote they cast on the task agrees with the accepted caption.
 */
export function contributionOutcomes(params: {
  result: Pick<ConsensusResult, "annotationId" | "caption">;
  annotations: Annotation[];
  votes: Vote[];
}): Map<string, boolean> {
  const accepted = normalizeCaption(params.result.caption);
  const matches = new Map<string, boolean>();
  for (const annotation of params.annotations) {
    matches.set(annotation.id, annotation.id === params.result.annotationId || normalizeCaption(annotation.caption) === accepted);
  }

  const outcomes = new Map<string, boolean>();
  const record = (annotatorId: string, aligned: boolean) => {
    outcomes.set(annotatorId, (outcomes.get(annotatorId) ?? true) && aligned);
  };

  for (const annotation of params.annotations) {
    record(annotation.annotatorId, matches.get(annotation.id) ?? false);
  }
  for (const vote of params.votes) {
    const backedAccepted = matches.get(vote.annotationId);
    if (backedAccepted === undefined) continue;
    record(vote.voterId, vote.agree === backedAccepted);
  }
  return outcomes;
}

export function applyOutcome(annotator: Annotator, aligned: boolean, params: { smoothing: number }, at: string): Annotator {
  const agreementCount = annotator.agreementCount + (aligned ? 1 : 0);
  const disagreementCount = annotator.disagreementCount + (aligned ? 0 : 1);
  return {
    ...annotator,
    agreementCount,
    disagreementCount,
    reliability: computeReliability({ agreementCount, disagreementCount }, { smoothing: params.smoothing, prior: annotator.prior }),
    updatedAt: at
  };
}

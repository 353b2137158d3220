import { summarizeLedger, type AnnotationTally, type LedgerSummary } from "@/lib/ledger/ledger";
import type { EngineConfig } from "@/lib/schemas";
import type { Annotation, Vote } from "@/lib/types";
import { roundTo } from "@/lib/utils";

export type ConsensusRules = Pick<
  EngineConfig,
  "agreementThreshold" | "minVotes" | "agreementWeight" | "lowConfidencePenalty" | "maxVotingWindowMs"
>;

export type ConsensusEvaluation =
  | {
      ready: false;
      reason: string;
      summary: LedgerSummary;
    }
  | {
      ready: true;
      reason: string;
      lowConfidence: boolean;
      selected: AnnotationTally;
      agreementRatio: number;
      averageVoterReliability: number;
      confidence: number;
      summary: LedgerSummary;
    };

function byRatioThenEarliest(a: AnnotationTally, b: AnnotationTally): number {
  if (a.ratio !== b.ratio) return b.ratio - a.ratio;
  return new Date(a.annotation.createdAt).getTime() - new Date(b.annotation.createdAt).getTime();
}

function byFewestDisagreementsThenEarliest(a: AnnotationTally, b: AnnotationTally): number {
  if (a.disagree !== b.disagree) return a.disagree - b.disagree;
  return new Date(a.annotation.createdAt).getTime() - new Date(b.annotation.createdAt).getTime();
}

export function selectAnnotation(tallies: AnnotationTally[]): AnnotationTally | null {
  const supported = tallies.filter((t) => t.agree > 0).sort(byRatioThenEarliest);
  if (supported.length) return supported[0];
  return [...tallies].sort(byFewestDisagreementsThenEarliest)[0] ?? null;
}

export function blendConfidence(params: {
  agreementRatio: number;
  averageVoterReliability: number;
  agreementWeight: number;
  lowConfidence: boolean;
  lowConfidencePenalty: number;
}): number {
  const blended = params.agreementWeight * params.agreementRatio + (1 - params.agreementWeight) * params.averageVoterReliability;
  return roundTo(params.lowConfidence ? blended * params.lowConfidencePenalty : blended);
}

export function evaluateConsensus(params: {
  annotations: Annotation[];
  votes: Vote[];
  reliabilityOf: (annotatorId: string) => number;
  votingStartedAt?: string;
  now: string;
  rules: ConsensusRules;
}): ConsensusEvaluation {
  const { rules } = params;
  const summary = summarizeLedger(params.annotations, params.votes);

  if (!summary.tallies.length) {
    return { ready: false, reason: "No annotations submitted", summary };
  }

  const meetsThreshold = summary.totalVotes >= rules.minVotes && summary.agreementRatio >= rules.agreementThreshold;
  const windowElapsed = params.votingStartedAt
    ? new Date(params.now).getTime() - new Date(params.votingStartedAt).getTime() >= rules.maxVotingWindowMs
    : false;

  if (!meetsThreshold && !(windowElapsed && summary.totalVotes > 0)) {
    if (summary.totalVotes < rules.minVotes) {
      return { ready: false, reason: `Awaiting ${rules.minVotes - summary.totalVotes} more votes`, summary };
    }
    return {
      ready: false,
      reason: `Agreement ${roundTo(summary.agreementRatio)} below threshold ${rules.agreementThreshold}`,
      summary
    };
  }

  const selected = selectAnnotation(summary.tallies);
  if (!selected) {
    return { ready: false, reason: "No annotation can be selected", summary };
  }

  const reliabilities = selected.agreeingVoterIds.map((id) => params.reliabilityOf(id));
  const averageVoterReliability = reliabilities.length
    ? reliabilities.reduce((sum, value) => sum + value, 0) / reliabilities.length
    : 0;
  const lowConfidence = !meetsThreshold;
  const confidence = blendConfidence({
    agreementRatio: summary.agreementRatio,
    averageVoterReliability,
    agreementWeight: rules.agreementWeight,
    lowConfidence,
    lowConfidencePenalty: rules.lowConfidencePenalty
  });

  return {
    ready: true,
    reason: lowConfidence
      ? `Voting window elapsed with ${summary.totalVotes} votes; accepted best-available caption`
      : `Agreement ${roundTo(summary.agreementRatio)} met threshold ${rules.agreementThreshold} with ${summary.totalVotes} votes`,
    lowConfidence,
    selected,
    agreementRatio: summary.agreementRatio,
    averageVoterReliability,
    confidence,
    summary
  };
}

import type { Annotation, Vote } from "@/lib/types";
import { sortByCreatedAtAsc } from "@/lib/utils";

export interface AnnotationTally {
  annotation: Annotation;
  agree: number;
  disagree: number;
  total: number;
  /** Agreeing share of the votes this annotation received; 0 when it has none. */
  ratio: number;
  agreeingVoterIds: string[];
}

export interface LedgerSummary {
  tallies: AnnotationTally[];
  totalVotes: number;
  agreeingVotes: number;
  leadingAgreeCount: number;
  agreementRatio: number;
}

export function tallyAnnotations(annotations: Annotation[], votes: Vote[]): AnnotationTally[] {
  const votesByAnnotation = new Map<string, Vote[]>();
  for (const vote of votes) {
    const list = votesByAnnotation.get(vote.annotationId) ?? [];
    list.push(vote);
    votesByAnnotation.set(vote.annotationId, list);
  }
  return sortByCreatedAtAsc(annotations).map((annotation) => {
    const received = votesByAnnotation.get(annotation.id) ?? [];
    const agreeing = received.filter((v) => v.agree);
    return {
      annotation,
      agree: agreeing.length,
      disagree: received.length - agreeing.length,
      total: received.length,
      ratio: received.length ? agreeing.length / received.length : 0,
      agreeingVoterIds: agreeing.map((v) => v.voterId)
    };
  });
}

/**
 * Agreement ratio of a task: agreeing votes behind the best-supported caption over every vote cast
 * on the task. Agreeing votes split across competing captions do not count as agreement.
 */
export function summarizeLedger(annotations: Annotation[], votes: Vote[]): LedgerSummary {
  const annotationIds = new Set(annotations.map((a) => a.id));
  const relevant = votes.filter((v) => annotationIds.has(v.annotationId));
  const tallies = tallyAnnotations(annotations, relevant);
  const leadingAgreeCount = tallies.reduce((max, t) => Math.max(max, t.agree), 0);
  const totalVotes = relevant.length;
  return {
    tallies,
    totalVotes,
    agreeingVotes: relevant.filter((v) => v.agree).length,
    leadingAgreeCount,
    agreementRatio: totalVotes ? leadingAgreeCount / totalVotes : 0
  };
}

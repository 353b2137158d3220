import { DuplicateTaskError } from "@/lib/errors";
import { computePriority, type FreshnessOptions } from "@/lib/queue/priority";

export interface QueueEntry {
  taskId: string;
  predictionId: string;
  uncertainty: number;
  difficulty: number;
  /** Epoch ms the wait clock started; kept across re-queues. */
  waitOriginMs: number;
  /** Annotators already working on or having annotated the task. */
  participants: readonly string[];
}

export interface RankedEntry extends QueueEntry {
  priority: number;
  claimed: boolean;
}

/**
 * Pending work ordered by priority. Priority is computed on every read from the wait clock, so
 * nothing needs to re-score entries in the background.
 */
export class PriorityQueue {
  private readonly entries = new Map<string, QueueEntry>();
  private readonly byPrediction = new Map<string, string>();
  private readonly claimed = new Set<string>();

  constructor(private readonly freshness: FreshnessOptions = {}) {}

  get size(): number {
    return this.entries.size;
  }

  has(taskId: string): boolean {
    return this.entries.has(taskId);
  }

  enqueue(entry: QueueEntry): void {
    const existing = this.byPrediction.get(entry.predictionId);
    if (existing !== undefined) {
      throw new DuplicateTaskError(entry.predictionId, existing);
    }
    this.entries.set(entry.taskId, { ...entry, participants: [...entry.participants] });
    this.byPrediction.set(entry.predictionId, entry.taskId);
  }

  update(taskId: string, patch: Partial<Pick<QueueEntry, "participants">>): void {
    const entry = this.entries.get(taskId);
    if (!entry) return;
    this.entries.set(taskId, { ...entry, ...patch });
  }

  remove(taskId: string): boolean {
    const entry = this.entries.get(taskId);
    if (!entry) return false;
    this.entries.delete(taskId);
    this.byPrediction.delete(entry.predictionId);
    this.claimed.delete(taskId);
    return true;
  }

  /** Compare-and-swap claim: false when the entry is missing or already claimed. */
  claim(taskId: string): boolean {
    if (!this.entries.has(taskId) || this.claimed.has(taskId)) return false;
    this.claimed.add(taskId);
    return true;
  }

  release(taskId: string): void {
    this.claimed.delete(taskId);
  }

  priorityOf(entry: QueueEntry, nowMs: number): number {
    return computePriority({
      uncertainty: entry.uncertainty,
      difficulty: entry.difficulty,
      waitMs: nowMs - entry.waitOriginMs,
      freshness: this.freshness
    });
  }

  peekNext(eligible: (entry: QueueEntry) => boolean, nowMs: number = Date.now()): QueueEntry | null {
    let best: { entry: QueueEntry; priority: number } | null = null;
    for (const entry of this.entries.values()) {
      if (this.claimed.has(entry.taskId)) continue;
      if (!eligible(entry)) continue;
      const priority = this.priorityOf(entry, nowMs);
      if (!best || compareRanked({ entry, priority }, best) < 0) {
        best = { entry, priority };
      }
    }
    return best?.entry ?? null;
  }

  list(nowMs: number = Date.now()): RankedEntry[] {
    return Array.from(this.entries.values())
      .map((entry) => ({ entry, priority: this.priorityOf(entry, nowMs) }))
      .sort(compareRanked)
      .map(({ entry, priority }) => ({ ...entry, priority, claimed: this.claimed.has(entry.taskId) }));
  }

  clear(): void {
    this.entries.clear();
    this.byPrediction.clear();
    this.claimed.clear();
  }
}

function compareRanked(a: { entry: QueueEntry; priority: number }, b: { entry: QueueEntry; priority: number }): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  if (a.entry.waitOriginMs !== b.entry.waitOriginMs) return a.entry.waitOriginMs - b.entry.waitOriginMs;
  return a.entry.taskId.localeCompare(b.entry.taskId);
}

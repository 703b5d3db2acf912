import { clamp } from "../core/resolution.js";
import type { AgentId } from "./types.js";

export interface TrustEntry {
  observerId: AgentId;
  subjectId: AgentId;
  score: number;
}

const MIN_TRUST = 0;
const MAX_TRUST = 100;

/** Sparse, asymmetric trust scores. Entries appear on first adjustment and are never removed. */
export class TrustMatrix {
  private entries = new Map<string, TrustEntry>();

  constructor(private readonly initial: number) {}

  get(observerId: AgentId, subjectId: AgentId): number {
    return this.entries.get(pairKey(observerId, subjectId))?.score ?? this.initial;
  }

  has(observerId: AgentId, subjectId: AgentId): boolean {
    return this.entries.has(pairKey(observerId, subjectId));
  }

  /** Adds `delta` to the stored score, clamped to 0..100. Returns the new score. */
  adjust(observerId: AgentId, subjectId: AgentId, delta: number): number {
    const key = pairKey(observerId, subjectId);
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { observerId, subjectId, score: this.initial };
      this.entries.set(key, entry);
    }
    entry.score = clamp(entry.score + delta, MIN_TRUST, MAX_TRUST);
    return entry.score;
  }

  /** Lowers every ordered pair among `ids`, creating entries for pairs still at the default. */
  erode(ids: readonly AgentId[], amount: number): void {
    for (const observerId of ids) {
      for (const subjectId of ids) {
        if (observerId !== subjectId) this.adjust(observerId, subjectId, -amount);
      }
    }
  }

  /** Mean score the given observers hold for `subjectId`; unset pairs count at the default. */
  meanTrustIn(subjectId: AgentId, observerIds: readonly AgentId[]): number {
    const others = observerIds.filter((id) => id !== subjectId);
    if (others.length === 0) return this.initial;
    const total = others.reduce((sum, id) => sum + this.get(id, subjectId), 0);
    return total / others.length;
  }

  list(): TrustEntry[] {
    return [...this.entries.values()].map((e) => ({ ...e }));
  }

  /** Restores stored entries verbatim, in order. */
  load(entries: readonly TrustEntry[]): void {
    this.entries.clear();
    for (const e of entries) {
      this.entries.set(pairKey(e.observerId, e.subjectId), { ...e, score: clamp(e.score, MIN_TRUST, MAX_TRUST) });
    }
  }
}

export function pairKey(observerId: AgentId, subjectId: AgentId): string {
  return `${observerId}->${subjectId}`;
}

import { v4 as uuid } from "uuid";
import { MealEstimate, PendingMeal } from "../domain/types";

interface Entry {
  meal: PendingMeal;
  expiresAt: number;
}

/**
 * One unconfirmed AI estimate per login session. An entry lives until it is
 * confirmed, cleared (cancel / logout), replaced by a newer analysis, or
 * its TTL runs out.
 */
export class PendingMealStore {
  private entries = new Map<string, Entry>();

  constructor(
    private readonly ttlMs: number,
    private readonly clock: () => number = Date.now
  ) {}

  put(sessionId: string, sourceText: string, estimate: MealEstimate): PendingMeal {
    const now = this.clock();
    this.prune(now);
    const meal: PendingMeal = {
      id: uuid(),
      sourceText,
      estimate,
      createdAt: new Date(now).toISOString(),
    };
    this.entries.set(sessionId, { meal, expiresAt: now + this.ttlMs });
    return meal;
  }

  get(sessionId: string): PendingMeal | null {
    const entry = this.entries.get(sessionId);
    if (!entry) return null;
    if (entry.expiresAt <= this.clock()) {
      this.entries.delete(sessionId);
      return null;
    }
    return entry.meal;
  }

  get size(): number {
    return this.entries.size;
  }

  private prune(now: number): void {
    for (const [sessionId, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(sessionId);
    }
  }

  clear(sessionId: string): boolean {
    const had = this.get(sessionId) !== null;
    this.entries.delete(sessionId);
    return had;
  }
}

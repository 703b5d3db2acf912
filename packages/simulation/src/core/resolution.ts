import type { BalanceConfig } from "../balance-config.js";
import type { RandomnessEngine } from "./random.js";

export interface ContestResult {
  winner: "A" | "B" | "Tie";
  successesA: number;
  successesB: number;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function clamp01(value: number): number {
  return clamp(value, 0, 1);
}

/**
 * Dice-pool primitives shared by combat, stealth, interrogation, panic and
 * infection. Holds no state of its own; every die comes from the shared stream.
 */
export class ResolutionEngine {
  constructor(
    private readonly rng: RandomnessEngine,
    private readonly dice: BalanceConfig["resolution"],
  ) {}

  /** Successes rolled on `poolSize` dice, less `difficulty`, never below zero. */
  rollPool(poolSize: number, difficulty = 0): number {
    const dice = Math.max(0, Math.floor(poolSize));
    let successes = 0;
    for (let i = 0; i < dice; i++) {
      if (this.rng.rollDie(this.dice.dieSides) >= this.dice.successOn) successes++;
    }
    return Math.max(0, successes - Math.max(0, Math.floor(difficulty)));
  }

  /** Always consumes exactly one draw, whatever `p` is. */
  chance(p: number): boolean {
    return this.rng.nextFloat() < p;
  }

  contest(poolA: number, poolB: number): ContestResult {
    const successesA = this.rollPool(poolA, 0);
    const successesB = this.rollPool(poolB, 0);
    let winner: ContestResult["winner"] = "Tie";
    if (successesA > successesB) winner = "A";
    else if (successesB > successesA) winner = "B";
    return { winner, successesA, successesB };
  }

  adjustPool(base: number, modifier: number): number {
    return Math.max(0, base + modifier);
  }
}

import type { BalanceConfig } from "../../balance-config.js";
import { clamp01, type ResolutionEngine } from "../../core/resolution.js";
import type { Agent } from "../../world/types.js";

export interface ObserverConditions {
  /** Darkness where the observer stands. */
  dark: boolean;
  /** Noise produced by the subject's last action. */
  noise: number;
  alert: boolean;
}

export interface SubjectConditions {
  dark: boolean;
  noise: number;
}

export interface DetectionRoll {
  observerPool: number;
  subjectPool: number;
  probability: number;
  detected: boolean;
}

type StealthConfig = BalanceConfig["stealth"];

export function observerPool(
  observer: Agent,
  conditions: ObserverConditions,
  stealth: StealthConfig,
  alertBonus: number,
): number {
  let pool = observer.attributes.Logic + (observer.skills.Observation ?? 0);
  if (conditions.dark) pool -= stealth.darknessObserverPenalty;
  pool += Math.floor(conditions.noise / stealth.noisePerDie);
  if (conditions.alert) pool += alertBonus;
  return Math.max(1, pool);
}

export function subjectPool(subject: Agent, conditions: SubjectConditions, stealth: StealthConfig): number {
  let pool = subject.attributes.Prowess + (subject.skills.Stealth ?? 0);
  pool += stealth.postureBonus[subject.posture];
  if (conditions.dark) pool += stealth.darknessSubjectBonus;
  pool -= Math.floor(conditions.noise / stealth.noisePerDie);
  return Math.max(1, pool);
}

/**
 * Chance that the observer spots the subject. Scaled so that equal pools
 * detect at exactly the base rate; a lopsided contest approaches 0 or
 * twice the base rate, capped at 1.
 */
export function detectionProbability(observer: number, subject: number, baseRate: number): number {
  if (observer + subject <= 0) return 0;
  return clamp01(baseRate * 2 * (observer / (observer + subject)));
}

/** One binary detection contest. Consumes exactly one draw. */
export function rollDetection(
  resolution: ResolutionEngine,
  observer: number,
  subject: number,
  baseRate: number,
): DetectionRoll {
  const probability = detectionProbability(observer, subject, baseRate);
  return { observerPool: observer, subjectPool: subject, probability, detected: resolution.chance(probability) };
}

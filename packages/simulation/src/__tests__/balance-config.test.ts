import { describe, it, expect } from "vitest";
import {
  BALANCE_EASY,
  BALANCE_NORMAL,
  BALANCE_HARD,
  getBalanceConfig,
  isDifficulty,
  type BalanceConfig,
} from "../balance-config.js";

describe("BalanceConfig", () => {
  const configs: [string, BalanceConfig][] = [
    ["easy", BALANCE_EASY],
    ["normal", BALANCE_NORMAL],
    ["hard", BALANCE_HARD],
  ];

  it("getBalanceConfig returns the correct preset", () => {
    expect(getBalanceConfig("easy")).toBe(BALANCE_EASY);
    expect(getBalanceConfig("normal")).toBe(BALANCE_NORMAL);
    expect(getBalanceConfig("hard")).toBe(BALANCE_HARD);
    expect(getBalanceConfig()).toBe(BALANCE_NORMAL);
  });

  it("each config has the correct difficulty label", () => {
    expect(BALANCE_EASY.difficulty).toBe("easy");
    expect(BALANCE_NORMAL.difficulty).toBe("normal");
    expect(BALANCE_HARD.difficulty).toBe("hard");
  });

  it("recognises difficulty names", () => {
    expect(isDifficulty("hard")).toBe(true);
    expect(isDifficulty("nightmare")).toBe(false);
  });

  describe("the infection gets more aggressive with difficulty", () => {
    it("initial carriers: easy <= normal <= hard", () => {
      expect(BALANCE_EASY.infection.initialInfected).toBeLessThanOrEqual(BALANCE_NORMAL.infection.initialInfected);
      expect(BALANCE_NORMAL.infection.initialInfected).toBeLessThanOrEqual(BALANCE_HARD.infection.initialInfected);
    });

    it("communion in the dark: easy <= normal <= hard", () => {
      expect(BALANCE_EASY.infection.darkBaseChance).toBeLessThanOrEqual(BALANCE_NORMAL.infection.darkBaseChance);
      expect(BALANCE_NORMAL.infection.darkBaseChance).toBeLessThanOrEqual(BALANCE_HARD.infection.darkBaseChance);
    });

    it("mask decay: easy >= normal >= hard", () => {
      expect(BALANCE_EASY.infection.baseDecay).toBeGreaterThanOrEqual(BALANCE_NORMAL.infection.baseDecay);
      expect(BALANCE_NORMAL.infection.baseDecay).toBeGreaterThanOrEqual(BALANCE_HARD.infection.baseDecay);
    });

    it("NPC assimilation: easy <= normal <= hard", () => {
      expect(BALANCE_EASY.infection.npcAssimilationChance).toBeLessThanOrEqual(
        BALANCE_NORMAL.infection.npcAssimilationChance,
      );
      expect(BALANCE_NORMAL.infection.npcAssimilationChance).toBeLessThanOrEqual(
        BALANCE_HARD.infection.npcAssimilationChance,
      );
    });
  });

  describe("the station is harsher with difficulty", () => {
    it("sabotage chance: easy <= normal <= hard", () => {
      expect(BALANCE_EASY.environment.sabotageChance).toBeLessThanOrEqual(BALANCE_NORMAL.environment.sabotageChance);
      expect(BALANCE_NORMAL.environment.sabotageChance).toBeLessThanOrEqual(BALANCE_HARD.environment.sabotageChance);
    });

    it("rescue takes longer: easy <= normal <= hard", () => {
      expect(BALANCE_EASY.jobs.rescueTurns).toBeLessThanOrEqual(BALANCE_NORMAL.jobs.rescueTurns);
      expect(BALANCE_NORMAL.jobs.rescueTurns).toBeLessThanOrEqual(BALANCE_HARD.jobs.rescueTurns);
    });

    it("detection: easy <= normal <= hard", () => {
      expect(BALANCE_EASY.stealth.baseDetectionRate).toBeLessThanOrEqual(BALANCE_NORMAL.stealth.baseDetectionRate);
      expect(BALANCE_NORMAL.stealth.baseDetectionRate).toBeLessThanOrEqual(BALANCE_HARD.stealth.baseDetectionRate);
    });

    it("random station events: easy <= normal <= hard", () => {
      expect(BALANCE_EASY.events.baseChance).toBeLessThanOrEqual(BALANCE_NORMAL.events.baseChance);
      expect(BALANCE_NORMAL.events.baseChance).toBeLessThanOrEqual(BALANCE_HARD.events.baseChance);
    });

    it("sabotaged devices come back sooner: easy >= normal >= hard", () => {
      expect(BALANCE_EASY.security.sabotageTurns).toBeGreaterThanOrEqual(BALANCE_NORMAL.security.sabotageTurns);
      expect(BALANCE_NORMAL.security.sabotageTurns).toBeGreaterThanOrEqual(BALANCE_HARD.security.sabotageTurns);
    });

    it("panic margin: easy >= normal >= hard", () => {
      expect(BALANCE_EASY.psychology.panicMargin).toBeGreaterThanOrEqual(BALANCE_NORMAL.psychology.panicMargin);
      expect(BALANCE_NORMAL.psychology.panicMargin).toBeGreaterThanOrEqual(BALANCE_HARD.psychology.panicMargin);
    });
  });

  describe("all values are sensible", () => {
    for (const [name, config] of configs) {
      it(`${name}: chances are in [0, 1]`, () => {
        const chances = [
          config.infection.darkBaseChance,
          config.infection.lightBaseChance,
          config.infection.npcAssimilationChance,
          config.stealth.baseDetectionRate,
          config.ai.wanderChance,
          config.ai.broadcastChance,
          config.environment.northeasterlyChance,
          config.environment.sabotageChance,
          config.events.baseChance + 100 * config.events.paranoiaWeight,
        ];
        for (const chance of chances) {
          expect(chance).toBeGreaterThanOrEqual(0);
          expect(chance).toBeLessThanOrEqual(1);
        }
      });

      it(`${name}: the light is safer than the dark`, () => {
        expect(config.infection.lightBaseChance).toBeLessThan(config.infection.darkBaseChance);
      });

      it(`${name}: a d6 with success on 4+`, () => {
        expect(config.resolution).toEqual({ dieSides: 6, successOn: 4 });
      });

      it(`${name}: paranoia thresholds ascend within 0..100`, () => {
        const thresholds = config.psychology.paranoiaThresholds;
        expect([...thresholds].sort((a, b) => a - b)).toEqual(thresholds);
        for (const t of thresholds) {
          expect(t).toBeGreaterThan(0);
          expect(t).toBeLessThanOrEqual(100);
        }
      });

      it(`${name}: the lynch threshold sits below the initial trust`, () => {
        expect(config.trust.lynchThreshold).toBeLessThan(config.trust.initial);
        expect(config.trust.hostileBelow).toBeLessThan(config.trust.initial);
      });

      it(`${name}: temperatures are ordered`, () => {
        const env = config.environment;
        expect(env.minTemperature).toBeLessThan(env.freezeThreshold);
        expect(env.startTemperature).toBeGreaterThanOrEqual(env.minTemperature);
        expect(env.startTemperature).toBeLessThanOrEqual(env.maxTemperature);
      });
    }
  });
});

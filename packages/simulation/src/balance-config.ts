// Game balance configuration: every tunable number, per difficulty

import type { Posture } from "./world/types.js";

export type Difficulty = "easy" | "normal" | "hard";

export interface BalanceConfig {
  difficulty: Difficulty;

  resolution: {
    dieSides: number;
    successOn: number; // minimum face that counts as a success
  };

  infection: {
    initialInfected: number;
    darkBaseChance: number;
    lightBaseChance: number;
    baseDecay: number;
    coldDecayThreshold: number; // effective °C below which decay is multiplied
    coldDecayMultiplier: number;
    paranoiaDecayThreshold: number;
    paranoiaDecayMultiplier: number;
    habitatPenalty: number; // flat loss while standing in a room outside the habitat
    slipTemperature: number;
    slipChanceScale: number;
    revealedHealth: number;
    alienProwessBonus: number;
    npcAssimilationChance: number;
  };

  stealth: {
    baseDetectionRate: number;
    cooldownTurns: number;
    darknessObserverPenalty: number;
    darknessSubjectBonus: number;
    noisePerDie: number;
    postureBonus: Record<Posture, number>;
    observationRange: number; // manhattan reach when either party is in a corridor
  };

  ai: {
    diagonals: boolean;
    wanderChance: number;
    broadcastChance: number;
    broadcastRadius: number;
    alertDuration: number;
    alertObservationBonus: number;
    pursuitTurns: number;
    searchTurns: number;
    fleeTurns: number;
    screamRadius: number;
  };

  psychology: {
    maxStress: number;
    panicMargin: number;
    paranoiaPerTurn: number;
    bloodyRoomParanoia: number;
    paranoiaThresholds: number[];
    coldStressDivisor: number;
    isolationStress: number;
    recoveryPerTurn: number;
    panicCascadeStress: number;
    psychicTremorStress: number;
  };

  trust: {
    initial: number;
    evidenceDelta: number;
    failedAccusationAccusedDelta: number;
    failedAccusationVoterDelta: number;
    honestDelta: number;
    evasiveDelta: number;
    hostileDelta: number;
    hostileBelow: number;
    lashOutDelta: number;
    slipWitnessDelta: number;
    lynchThreshold: number;
    paranoiaDecayDivisor: number;
  };

  environment: {
    startHour: number;
    startTemperature: number;
    heatingRate: number;
    coolingRate: number;
    maxTemperature: number;
    minTemperature: number;
    freezeThreshold: number;
    northeasterlyChance: number;
    northeasterlyTurns: number;
    northeasterlyChill: number;
    sabotageChance: number;
    powerOutageTurns: number;
  };

  jobs: {
    rescueTurns: number;
  };

  combat: {
    unarmedDamage: number;
    clawDamage: number;
    darknessAttackPenalty: number;
    coverBonus: { None: number; Light: number; Heavy: number };
    baseHealth: number;
  };

  barricade: {
    maxStrength: number;
  };

  distraction: {
    throwDistance: number; // cells a thrown item travels before it drops
    hearingBonus: number; // added to an item's noise to get the hearing range
    searchTurns: number;
  };

  security: {
    sabotageTurns: number; // turns a sabotaged device stays dark
    sabotageNoise: number;
    logSize: number;
  };

  events: {
    baseChance: number;
    paranoiaWeight: number; // added chance per point of paranoia
    generatorOutageTurns: number;
  };
}

export const BALANCE_EASY: BalanceConfig = {
  difficulty: "easy",
  resolution: { dieSides: 6, successOn: 4 },
  infection: {
    initialInfected: 1,
    darkBaseChance: 0.4,
    lightBaseChance: 0.05,
    baseDecay: 2.5,
    coldDecayThreshold: -50,
    coldDecayMultiplier: 1.5,
    paranoiaDecayThreshold: 70,
    paranoiaDecayMultiplier: 1.5,
    habitatPenalty: 6,
    slipTemperature: 0,
    slipChanceScale: 0.6,
    revealedHealth: 8,
    alienProwessBonus: 2,
    npcAssimilationChance: 0.25,
  },
  stealth: {
    baseDetectionRate: 0.4,
    cooldownTurns: 3,
    darknessObserverPenalty: 2,
    darknessSubjectBonus: 2,
    noisePerDie: 2,
    postureBonus: { Standing: 0, Crouching: 1, Crawling: 2, Hiding: 4 },
    observationRange: 2,
  },
  ai: {
    diagonals: false,
    wanderChance: 0.3,
    broadcastChance: 0.6,
    broadcastRadius: 6,
    alertDuration: 10,
    alertObservationBonus: 2,
    pursuitTurns: 4,
    searchTurns: 4,
    fleeTurns: 3,
    screamRadius: 6,
  },
  psychology: {
    maxStress: 10,
    panicMargin: 3,
    paranoiaPerTurn: 1,
    bloodyRoomParanoia: 1,
    paranoiaThresholds: [33, 66],
    coldStressDivisor: 20,
    isolationStress: 1,
    recoveryPerTurn: 1,
    panicCascadeStress: 1,
    psychicTremorStress: 2,
  },
  trust: {
    initial: 50,
    evidenceDelta: -10,
    failedAccusationAccusedDelta: -15,
    failedAccusationVoterDelta: -5,
    honestDelta: 3,
    evasiveDelta: -3,
    hostileDelta: -5,
    hostileBelow: 25,
    lashOutDelta: -5,
    slipWitnessDelta: -8,
    lynchThreshold: 20,
    paranoiaDecayDivisor: 25,
  },
  environment: {
    startHour: 19,
    startTemperature: -40,
    heatingRate: 3,
    coolingRate: 4,
    maxTemperature: 20,
    minTemperature: -60,
    freezeThreshold: -50,
    northeasterlyChance: 0.01,
    northeasterlyTurns: 5,
    northeasterlyChill: -5,
    sabotageChance: 0.02,
    powerOutageTurns: 4,
  },
  jobs: { rescueTurns: 15 },
  combat: {
    unarmedDamage: 0,
    clawDamage: 2,
    darknessAttackPenalty: 1,
    coverBonus: { None: 0, Light: 1, Heavy: 2 },
    baseHealth: 12,
  },
  barricade: { maxStrength: 3 },
  distraction: { throwDistance: 4, hearingBonus: 3, searchTurns: 4 },
  security: { sabotageTurns: 20, sabotageNoise: 3, logSize: 50 },
  events: { baseChance: 0.1, paranoiaWeight: 0.005, generatorOutageTurns: 1 },
};

export const BALANCE_NORMAL: BalanceConfig = {
  difficulty: "normal",
  resolution: { dieSides: 6, successOn: 4 },
  infection: {
    initialInfected: 2,
    darkBaseChance: 0.5,
    lightBaseChance: 0.1,
    baseDecay: 2,
    coldDecayThreshold: -50,
    coldDecayMultiplier: 1.5,
    paranoiaDecayThreshold: 70,
    paranoiaDecayMultiplier: 1.5,
    habitatPenalty: 5,
    slipTemperature: 0,
    slipChanceScale: 0.5,
    revealedHealth: 10,
    alienProwessBonus: 2,
    npcAssimilationChance: 0.35,
  },
  stealth: {
    baseDetectionRate: 0.5,
    cooldownTurns: 3,
    darknessObserverPenalty: 2,
    darknessSubjectBonus: 2,
    noisePerDie: 2,
    postureBonus: { Standing: 0, Crouching: 1, Crawling: 2, Hiding: 4 },
    observationRange: 2,
  },
  ai: {
    diagonals: false,
    wanderChance: 0.3,
    broadcastChance: 0.75,
    broadcastRadius: 8,
    alertDuration: 10,
    alertObservationBonus: 2,
    pursuitTurns: 5,
    searchTurns: 5,
    fleeTurns: 3,
    screamRadius: 6,
  },
  psychology: {
    maxStress: 10,
    panicMargin: 2,
    paranoiaPerTurn: 1,
    bloodyRoomParanoia: 1,
    paranoiaThresholds: [33, 66],
    coldStressDivisor: 20,
    isolationStress: 1,
    recoveryPerTurn: 1,
    panicCascadeStress: 2,
    psychicTremorStress: 2,
  },
  trust: {
    initial: 50,
    evidenceDelta: -10,
    failedAccusationAccusedDelta: -20,
    failedAccusationVoterDelta: -5,
    honestDelta: 2,
    evasiveDelta: -3,
    hostileDelta: -5,
    hostileBelow: 30,
    lashOutDelta: -5,
    slipWitnessDelta: -5,
    lynchThreshold: 20,
    paranoiaDecayDivisor: 20,
  },
  environment: {
    startHour: 19,
    startTemperature: -40,
    heatingRate: 2,
    coolingRate: 5,
    maxTemperature: 20,
    minTemperature: -60,
    freezeThreshold: -50,
    northeasterlyChance: 0.02,
    northeasterlyTurns: 5,
    northeasterlyChill: -5,
    sabotageChance: 0.03,
    powerOutageTurns: 5,
  },
  jobs: { rescueTurns: 20 },
  combat: {
    unarmedDamage: 0,
    clawDamage: 2,
    darknessAttackPenalty: 1,
    coverBonus: { None: 0, Light: 1, Heavy: 2 },
    baseHealth: 10,
  },
  barricade: { maxStrength: 3 },
  distraction: { throwDistance: 4, hearingBonus: 2, searchTurns: 3 },
  security: { sabotageTurns: 15, sabotageNoise: 4, logSize: 50 },
  events: { baseChance: 0.15, paranoiaWeight: 0.005, generatorOutageTurns: 2 },
};

export const BALANCE_HARD: BalanceConfig = {
  difficulty: "hard",
  resolution: { dieSides: 6, successOn: 4 },
  infection: {
    initialInfected: 3,
    darkBaseChance: 0.6,
    lightBaseChance: 0.15,
    baseDecay: 1.5,
    coldDecayThreshold: -50,
    coldDecayMultiplier: 1.5,
    paranoiaDecayThreshold: 70,
    paranoiaDecayMultiplier: 1.5,
    habitatPenalty: 4,
    slipTemperature: 0,
    slipChanceScale: 0.4,
    revealedHealth: 12,
    alienProwessBonus: 2,
    npcAssimilationChance: 0.45,
  },
  stealth: {
    baseDetectionRate: 0.6,
    cooldownTurns: 2,
    darknessObserverPenalty: 2,
    darknessSubjectBonus: 2,
    noisePerDie: 2,
    postureBonus: { Standing: 0, Crouching: 1, Crawling: 2, Hiding: 4 },
    observationRange: 3,
  },
  ai: {
    diagonals: false,
    wanderChance: 0.3,
    broadcastChance: 0.9,
    broadcastRadius: 10,
    alertDuration: 12,
    alertObservationBonus: 2,
    pursuitTurns: 6,
    searchTurns: 6,
    fleeTurns: 3,
    screamRadius: 8,
  },
  psychology: {
    maxStress: 10,
    panicMargin: 1,
    paranoiaPerTurn: 2,
    bloodyRoomParanoia: 2,
    paranoiaThresholds: [33, 66],
    coldStressDivisor: 15,
    isolationStress: 1,
    recoveryPerTurn: 1,
    panicCascadeStress: 2,
    psychicTremorStress: 3,
  },
  trust: {
    initial: 50,
    evidenceDelta: -10,
    failedAccusationAccusedDelta: -25,
    failedAccusationVoterDelta: -8,
    honestDelta: 1,
    evasiveDelta: -3,
    hostileDelta: -6,
    hostileBelow: 35,
    lashOutDelta: -8,
    slipWitnessDelta: -3,
    lynchThreshold: 25,
    paranoiaDecayDivisor: 15,
  },
  environment: {
    startHour: 19,
    startTemperature: -45,
    heatingRate: 1,
    coolingRate: 6,
    maxTemperature: 20,
    minTemperature: -60,
    freezeThreshold: -50,
    northeasterlyChance: 0.04,
    northeasterlyTurns: 6,
    northeasterlyChill: -5,
    sabotageChance: 0.05,
    powerOutageTurns: 7,
  },
  jobs: { rescueTurns: 25 },
  combat: {
    unarmedDamage: 0,
    clawDamage: 3,
    darknessAttackPenalty: 1,
    coverBonus: { None: 0, Light: 1, Heavy: 2 },
    baseHealth: 10,
  },
  barricade: { maxStrength: 3 },
  distraction: { throwDistance: 4, hearingBonus: 1, searchTurns: 2 },
  security: { sabotageTurns: 10, sabotageNoise: 5, logSize: 50 },
  events: { baseChance: 0.2, paranoiaWeight: 0.005, generatorOutageTurns: 3 },
};

export const BALANCE_CONFIGS: Record<Difficulty, BalanceConfig> = {
  easy: BALANCE_EASY,
  normal: BALANCE_NORMAL,
  hard: BALANCE_HARD,
};

export function getBalanceConfig(difficulty: Difficulty = "normal"): BalanceConfig {
  return BALANCE_CONFIGS[difficulty];
}

export function isDifficulty(value: string): value is Difficulty {
  return value === "easy" || value === "normal" || value === "hard";
}

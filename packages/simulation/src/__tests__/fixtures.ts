import { BALANCE_NORMAL, type BalanceConfig } from "../balance-config.js";
import type { CrewMemberDefinition, Recipe, StationDefinition } from "../config/station-config.js";
import { Engine } from "../engine.js";
import type { Agent } from "../world/types.js";

/**
 * Two rooms joined by a corridor loop around one wall cell.
 *
 *   AAA...BBB
 *   AAA.#.BBB
 *   AAA...BBB
 */
export const TEST_STATION: StationDefinition = {
  width: 9,
  height: 3,
  layout: ["AAA...BBB", "AAA.#.BBB", "AAA...BBB"],
  rooms: [
    { id: "alpha", name: "Alpha", glyph: "A", flags: [] },
    { id: "bravo", name: "Bravo", glyph: "B", flags: ["radio", "generator"] },
  ],
  vents: [],
  items: [
    { name: "Scalpel", room: "alpha", damage: 1, skill: "Melee" },
    { name: "Copper Wire", room: "alpha", damage: 0 },
    { name: "Rope", room: "bravo", damage: 0 },
    { name: "Whiskey", room: "bravo", damage: 0, throwNoise: 4 },
  ],
};

export const TEST_RECIPES: Recipe[] = [{ id: "noose", name: "Noose", ingredients: ["Rope"], craftTime: 2, damage: 0 }];

/** A crew member who stays in `room` around the clock. */
export function crewMember(id: string, room: string, overrides: Partial<CrewMemberDefinition> = {}): CrewMemberDefinition {
  return {
    id,
    name: `Crew ${id}`,
    role: "Technician",
    attributes: { Prowess: 2, Logic: 2, Influence: 2, Resolve: 2 },
    skills: {},
    startRoom: room,
    habitat: [room],
    schedule: [{ start: 0, end: 0, room }],
    ...overrides,
  };
}

/** Normal balance with every background die that could disturb a scenario switched off. */
export function quietConfig(tweak: (config: BalanceConfig) => void = () => undefined): BalanceConfig {
  const config = structuredClone(BALANCE_NORMAL);
  config.infection.initialInfected = 0;
  config.infection.npcAssimilationChance = 0;
  config.environment.sabotageChance = 0;
  config.environment.northeasterlyChance = 0;
  config.environment.startTemperature = 10;
  config.environment.heatingRate = 0;
  config.environment.coolingRate = 0;
  config.ai.wanderChance = 0;
  config.events.baseChance = 0;
  config.events.paranoiaWeight = 0;
  tweak(config);
  return config;
}

export function testEngine(crew: CrewMemberDefinition[], config: BalanceConfig = quietConfig(), seed = "test-seed"): Engine {
  return new Engine({ seed, config, station: TEST_STATION, crew, recipes: TEST_RECIPES });
}

export function agent(engine: Engine, id: string): Agent {
  return engine.world.requireAgent(id);
}

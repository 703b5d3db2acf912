import { applyAction } from "./actions.js";
import { getBalanceConfig, type BalanceConfig, type Difficulty } from "./balance-config.js";
import {
  loadCrewRoster,
  loadRecipes,
  loadStationDefinition,
  parseCrew,
  type CrewMember,
  type CrewMemberDefinition,
  type Recipe,
  type StationDefinition,
} from "./config/station-config.js";
import type { SimulationContext } from "./context.js";
import { ConfigError } from "./core/errors.js";
import { EventBus, Priority, type EventHandler } from "./core/event-bus.js";
import { RandomnessEngine } from "./core/random.js";
import { ResolutionEngine } from "./core/resolution.js";
import { applySnapshot, captureSnapshot, parseSnapshot, type Snapshot } from "./snapshot.js";
import { registerAiSystem } from "./systems/ai/npc-ai.js";
import { registerEndgameSystem } from "./systems/endgame-system.js";
import { registerEnvironmentSystem } from "./systems/environment-system.js";
import { registerInfectionSystem } from "./systems/infection-system.js";
import { registerJobSystem } from "./systems/job-system.js";
import { registerPsychologySystem } from "./systems/psychology-system.js";
import { registerStationEventSystem } from "./systems/station-event-system.js";
import { registerSecuritySystem } from "./systems/security-system.js";
import { registerTrustSystem } from "./systems/trust-system.js";
import type { Action, ActionResult, EventType, SimulationEvent } from "./types.js";
import { StationMap } from "./world/station-map.js";
import type { Agent, AgentId, DeviceDefinition, GameOutcome, ItemDefinition } from "./world/types.js";
import { World } from "./world/world.js";

export interface EngineOptions {
  seed: string;
  difficulty?: Difficulty;
  /** Overrides the difficulty preset entirely. */
  config?: BalanceConfig;
  station?: StationDefinition;
  crew?: CrewMemberDefinition[];
  recipes?: Recipe[];
}

export type RestoreOptions = Omit<EngineOptions, "seed" | "crew">;

/**
 * Owns one simulation: the world, the random stream and the event bus, with
 * every system subscribed in dispatch order. All state changes happen inside
 * `applyAction` and `advanceTurn`.
 */
export class Engine {
  private readonly ctx: SimulationContext;

  /** `snapshot` must already be validated; use `Engine.restore` for untrusted input. */
  constructor(options: EngineOptions, snapshot?: Snapshot) {
    const config = options.config ?? getBalanceConfig(options.difficulty);
    const station = options.station ?? loadStationDefinition();
    const recipes = options.recipes ?? loadRecipes();
    const map = StationMap.fromDefinition(station);
    const world = new World(map, config);
    const rng = snapshot ? RandomnessEngine.restore(snapshot.rng) : new RandomnessEngine(options.seed);

    this.ctx = {
      world,
      rng,
      resolution: new ResolutionEngine(rng, config.resolution),
      bus: new EventBus(() => world.turn, snapshot?.eventSeq ?? 0),
      config,
      items: itemCatalog(station, recipes),
      recipes: new Map(recipes.map((r) => [r.id, r])),
      devices: deviceCatalog(station, map),
      supplies: (station.supplies ?? []).map((item) => item.name),
    };

    if (snapshot) {
      applySnapshot(world, snapshot);
    } else {
      const crew = options.crew ? parseCrew(options.crew) : loadCrewRoster();
      populate(this.ctx, crew);
    }

    registerEnvironmentSystem(this.ctx);
    registerStationEventSystem(this.ctx);
    registerJobSystem(this.ctx);
    registerSecuritySystem(this.ctx);
    registerInfectionSystem(this.ctx);
    registerPsychologySystem(this.ctx);
    registerTrustSystem(this.ctx);
    registerAiSystem(this.ctx);
    registerEndgameSystem(this.ctx);
  }

  /** Rebuilds an engine from persisted state. Throws SnapshotError on any inconsistency. */
  static restore(raw: unknown, options: RestoreOptions = {}): Engine {
    const config = options.config ?? getBalanceConfig(options.difficulty);
    const station = options.station ?? loadStationDefinition();
    const map = StationMap.fromDefinition(station);
    const deviceIds = (station.devices ?? []).map((d) => d.id);
    const snapshot = parseSnapshot(raw, map, config, deviceIds);
    return new Engine({ ...options, config, seed: snapshot.rng.seed, station }, snapshot);
  }

  get context(): SimulationContext {
    return this.ctx;
  }

  get world(): World {
    return this.ctx.world;
  }

  get turn(): number {
    return this.ctx.world.turn;
  }

  get outcome(): GameOutcome | null {
    return this.ctx.world.outcome;
  }

  get eventLog(): readonly SimulationEvent[] {
    return this.ctx.bus.events;
  }

  getAgent(id: AgentId): Agent | undefined {
    return this.ctx.world.getAgent(id);
  }

  applyAction(agentId: AgentId, action: Action): ActionResult {
    return applyAction(this.ctx, agentId, action);
  }

  /** Runs one full turn. Returns nothing once the game has ended. */
  advanceTurn(): SimulationEvent[] {
    const { world, bus } = this.ctx;
    if (world.outcome) return [];
    const mark = bus.size;
    const turn = world.advanceTurn();
    bus.publish({ type: "TurnAdvance", payload: { turn, hour: world.hour } });
    return bus.since(mark);
  }

  snapshotState(): Snapshot {
    return captureSnapshot(this.ctx);
  }

  /** Observers run after every system has handled the event. */
  subscribe(types: readonly EventType[], handler: EventHandler): () => void {
    return this.ctx.bus.subscribe(types, handler, Priority.Observer);
  }
}

function itemCatalog(station: StationDefinition, recipes: readonly Recipe[]): Map<string, ItemDefinition> {
  const items = new Map<string, ItemDefinition>();
  for (const item of [...station.items, ...(station.supplies ?? [])]) {
    items.set(item.name, { name: item.name, damage: item.damage, skill: item.skill, throwNoise: item.throwNoise });
  }
  for (const recipe of recipes) {
    items.set(recipe.name, { name: recipe.name, damage: recipe.damage, skill: recipe.skill });
  }
  return items;
}

/** Every device must sit on a cell of the room it names. */
function deviceCatalog(station: StationDefinition, map: StationMap): Map<string, DeviceDefinition> {
  const devices = new Map<string, DeviceDefinition>();
  for (const entry of station.devices ?? []) {
    if (devices.has(entry.id)) throw new ConfigError("station", `duplicate device '${entry.id}'`);
    const [x, y] = entry.position;
    if (map.roomAt({ x, y }) !== entry.room) {
      throw new ConfigError("station", `device ${entry.id}: (${x},${y}) is not inside '${entry.room}'`);
    }
    const base = { id: entry.id, room: entry.room, position: { x, y } };
    devices.set(
      entry.id,
      entry.kind === "camera" ? { ...base, kind: "camera", facing: entry.facing, range: entry.range } : { ...base, kind: "motionSensor" },
    );
  }
  return devices;
}

function populate(ctx: SimulationContext, crew: readonly CrewMember[]): void {
  const { world, rng, config } = ctx;
  const map = world.map;

  if (crew.filter((m) => m.isPlayer).length > 1) throw new ConfigError("crew", "more than one player");
  const seen = new Set<string>();

  for (const member of crew) {
    if (seen.has(member.id)) throw new ConfigError("crew", `duplicate id '${member.id}'`);
    seen.add(member.id);
    const start = map.room(member.startRoom);
    if (!start) throw new ConfigError("crew", `${member.id}: unknown start room '${member.startRoom}'`);

    world.addAgent({
      id: member.id,
      name: member.name,
      role: member.role,
      isPlayer: member.isPlayer,
      position: { ...start.anchor },
      health: config.combat.baseHealth,
      maxHealth: config.combat.baseHealth,
      alive: true,
      trueNature: member.infected ? "Infected" : "Human",
      disguiseIntegrity: 100,
      revealed: false,
      attributes: { ...member.attributes },
      skills: { ...member.skills },
      stress: 0,
      posture: "Standing",
      cover: "None",
      noise: 0,
      restrained: false,
      schedule: member.schedule.map((entry) => ({ ...entry })),
      habitat: [...member.habitat],
      inventory: [],
      knowledgeTags: [],
      behavior: { mode: "Scheduled", targetId: null, waypoint: null, turnsRemaining: 0 },
    });
  }

  // Explicit flags in the roster win; otherwise the stream picks the first carriers.
  if (crew.some((m) => m.infected !== undefined)) return;
  const candidates = world.allAgents().filter((a) => !a.isPlayer);
  for (let i = 0; i < config.infection.initialInfected && candidates.length > 0; i++) {
    const carrier = rng.choose(candidates);
    carrier.trueNature = "Infected";
    candidates.splice(candidates.indexOf(carrier), 1);
  }
}

import { z } from "zod";
import type { BalanceConfig } from "./balance-config.js";
import type { SimulationContext } from "./context.js";
import { SnapshotError } from "./core/errors.js";
import { generatorStateSchema } from "./core/random.js";
import type { StationMap } from "./world/station-map.js";
import type { World } from "./world/world.js";

export const SNAPSHOT_VERSION = 1;

const MASK_MAX = 100;
const TRUST_MAX = 100;

const int = z.number().int();
const nonNegative = int.min(0);
const pointSchema = z.object({ x: int, y: int });

const agentSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  role: z.string(),
  isPlayer: z.boolean(),
  position: pointSchema,
  health: nonNegative,
  maxHealth: int.positive(),
  alive: z.boolean(),
  trueNature: z.enum(["Human", "Infected"]),
  disguiseIntegrity: z.number(),
  revealed: z.boolean(),
  attributes: z.object({ Prowess: nonNegative, Logic: nonNegative, Influence: nonNegative, Resolve: nonNegative }),
  skills: z.record(
    z.enum([
      "Melee",
      "Firearms",
      "Pilot",
      "Repair",
      "Medicine",
      "Persuasion",
      "Empathy",
      "Observation",
      "Comms",
      "Deception",
      "Stealth",
    ]),
    nonNegative,
  ),
  stress: int,
  posture: z.enum(["Standing", "Crouching", "Crawling", "Hiding"]),
  cover: z.enum(["None", "Light", "Heavy", "Full"]),
  noise: nonNegative,
  restrained: z.boolean(),
  schedule: z.array(z.object({ start: int.min(0).max(23), end: int.min(0).max(23), room: z.string() })),
  habitat: z.array(z.string()),
  inventory: z.array(z.string()),
  knowledgeTags: z.array(z.string()),
  behavior: z.object({
    mode: z.enum([
      "Scheduled",
      "Wandering",
      "Fleeing",
      "Frozen",
      "Searching",
      "Pursuing",
      "Flanking",
      "Hunting",
      "Lynching",
    ]),
    targetId: z.string().nullable(),
    waypoint: pointSchema.nullable(),
    turnsRemaining: int,
  }),
});

export const snapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  turn: nonNegative,
  eventSeq: nonNegative,
  rng: z.object({ seed: z.string(), draws: nonNegative, generator: generatorStateSchema }),
  paranoia: z.number().min(0).max(100),
  environment: z.object({
    temperature: z.number(),
    powerOn: z.boolean(),
    powerRestoreCountdown: nonNegative,
    stormIntensity: z.number().min(0).max(100),
    windChill: z.number(),
    northeasterlyTurns: nonNegative,
    radioOperational: z.boolean(),
    bloodBankIntact: z.boolean(),
  }),
  agents: z.array(agentSchema),
  rooms: z.array(
    z.object({
      id: z.string(),
      dark: z.boolean(),
      frozen: z.boolean(),
      barricade: nonNegative,
      bloody: z.boolean(),
      destroyed: z.boolean(),
      items: z.array(z.string()),
    }),
  ),
  trust: z.array(z.object({ observerId: z.string(), subjectId: z.string(), score: z.number() })),
  ai: z.object({
    alertTurns: nonNegative,
    detectionCooldowns: z.array(z.tuple([z.string(), int])),
  }),
  security: z.object({
    disabled: z.array(z.tuple([z.string(), int.positive()])),
    log: z.array(
      z.object({ turn: nonNegative, deviceId: z.string(), agentId: z.string(), position: pointSchema, read: z.boolean() }),
    ),
  }),
  stationEvents: z.object({ cooldowns: z.array(z.tuple([z.string(), int.positive()])) }),
  jobs: z.object({
    crafting: z.array(z.object({ agentId: z.string(), recipeId: z.string(), turnsRemaining: int.positive() })),
    rescueCountdown: nonNegative.nullable(),
    rescueArrived: z.boolean(),
  }),
  outcome: z
    .object({
      ending: z.enum(["PlayerKilled", "PlayerAssimilated", "StationCleansed", "Rescued"]),
      victory: z.boolean(),
      turn: nonNegative,
    })
    .nullable(),
});

/** Primitive-only save tree. Nothing in it is a class instance. */
export type Snapshot = z.infer<typeof snapshotSchema>;

export function captureSnapshot(ctx: SimulationContext): Snapshot {
  const { world, rng, bus } = ctx;
  const map = world.map;
  return {
    version: SNAPSHOT_VERSION,
    turn: world.turn,
    eventSeq: bus.sequence,
    rng: rng.state(),
    paranoia: world.paranoia,
    environment: { ...world.environment },
    agents: world.allAgents().map((a) => structuredClone(a)),
    rooms: map.rooms().map((room) => {
      const state = map.roomState(room.id);
      return {
        id: room.id,
        dark: state?.dark ?? false,
        frozen: state?.frozen ?? false,
        barricade: state?.barricade ?? 0,
        bloody: state?.bloody ?? false,
        destroyed: state?.destroyed ?? false,
        items: [...(state?.items ?? [])],
      };
    }),
    trust: world.trust.list(),
    ai: { alertTurns: world.ai.alertTurns, detectionCooldowns: [...world.ai.detectionCooldowns.entries()] },
    security: {
      disabled: [...world.security.disabled.entries()],
      log: world.security.log.map((e) => ({ ...e, position: { ...e.position } })),
    },
    stationEvents: { cooldowns: [...world.stationEvents.cooldowns.entries()] },
    jobs: {
      crafting: world.jobs.crafting.map((j) => ({ ...j })),
      rescueCountdown: world.jobs.rescueCountdown,
      rescueArrived: world.jobs.rescueArrived,
    },
    outcome: world.outcome ? { ...world.outcome } : null,
  };
}

/**
 * Parses untrusted input into a snapshot that is consistent with `map`,
 * `config` and the station's devices. Any problem throws SnapshotError;
 * nothing is partially loaded.
 */
export function parseSnapshot(
  raw: unknown,
  map: StationMap,
  config: BalanceConfig,
  deviceIds: readonly string[] = [],
): Snapshot {
  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SnapshotError(
      "snapshot failed schema validation",
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }
  const snapshot = parsed.data;
  const issues = semanticIssues(snapshot, map, config, deviceIds);
  if (issues.length > 0) throw new SnapshotError("snapshot is inconsistent", issues);
  return snapshot;
}

function semanticIssues(
  snapshot: Snapshot,
  map: StationMap,
  config: BalanceConfig,
  deviceIds: readonly string[],
): string[] {
  const issues: string[] = [];

  const roomIds = map.rooms().map((r) => r.id);
  const savedRooms = snapshot.rooms.map((r) => r.id);
  if (savedRooms.length !== roomIds.length || roomIds.some((id) => !savedRooms.includes(id))) {
    issues.push("room list does not match the station");
  }
  for (const room of snapshot.rooms) {
    if (room.barricade > config.barricade.maxStrength) issues.push(`room ${room.id}: barricade out of range`);
  }

  const ids = new Set<string>();
  let players = 0;
  for (const agent of snapshot.agents) {
    const label = `agent ${agent.id}`;
    if (ids.has(agent.id)) issues.push(`${label}: duplicate id`);
    ids.add(agent.id);
    if (agent.isPlayer) players++;
    if (!map.isWalkable(agent.position)) issues.push(`${label}: position is not walkable`);
    if (agent.disguiseIntegrity < 0 || agent.disguiseIntegrity > MASK_MAX) issues.push(`${label}: mask out of range`);
    if (agent.stress < 0 || agent.stress > config.psychology.maxStress) issues.push(`${label}: stress out of range`);
    if (agent.health > agent.maxHealth) issues.push(`${label}: health above maximum`);
    if (agent.revealed && agent.trueNature !== "Infected") issues.push(`${label}: revealed but not infected`);
    if (agent.alive !== agent.health > 0) issues.push(`${label}: alive flag disagrees with health`);
  }
  if (players > 1) issues.push("more than one player");

  for (const entry of snapshot.trust) {
    if (!ids.has(entry.observerId) || !ids.has(entry.subjectId)) issues.push(`trust ${entry.observerId}->${entry.subjectId}: unknown agent`);
    if (entry.score < 0 || entry.score > TRUST_MAX) issues.push(`trust ${entry.observerId}->${entry.subjectId}: out of range`);
  }
  for (const job of snapshot.jobs.crafting) {
    if (!ids.has(job.agentId)) issues.push(`craft job: unknown agent ${job.agentId}`);
  }
  for (const [deviceId] of snapshot.security.disabled) {
    if (!deviceIds.includes(deviceId)) issues.push(`security: unknown device ${deviceId}`);
  }
  for (const entry of snapshot.security.log) {
    if (!deviceIds.includes(entry.deviceId)) issues.push(`security log: unknown device ${entry.deviceId}`);
    if (!ids.has(entry.agentId)) issues.push(`security log: unknown agent ${entry.agentId}`);
  }
  if (snapshot.security.log.length > config.security.logSize) issues.push("security log longer than its limit");
  return issues;
}

/** Writes a validated snapshot over a freshly built world. */
export function applySnapshot(world: World, snapshot: Snapshot): void {
  world.setTurn(snapshot.turn);
  world.paranoia = snapshot.paranoia;
  world.environment = { ...snapshot.environment };

  for (const agent of snapshot.agents) world.addAgent(structuredClone(agent));

  for (const room of snapshot.rooms) {
    const state = world.map.roomState(room.id);
    if (!state) continue;
    state.dark = room.dark;
    state.frozen = room.frozen;
    state.barricade = room.barricade;
    state.bloody = room.bloody;
    state.destroyed = room.destroyed;
    state.items = [...room.items];
  }

  world.trust.load(snapshot.trust);
  world.ai = { alertTurns: snapshot.ai.alertTurns, detectionCooldowns: new Map(snapshot.ai.detectionCooldowns) };
  world.security = {
    disabled: new Map(snapshot.security.disabled),
    log: snapshot.security.log.map((e) => ({ ...e, position: { ...e.position } })),
  };
  world.stationEvents = { cooldowns: new Map(snapshot.stationEvents.cooldowns) };
  world.jobs = {
    crafting: snapshot.jobs.crafting.map((j) => ({ ...j })),
    rescueCountdown: snapshot.jobs.rescueCountdown,
    rescueArrived: snapshot.jobs.rescueArrived,
  };
  world.outcome = snapshot.outcome ? { ...snapshot.outcome } : null;
}

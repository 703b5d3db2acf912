import type { SimulationContext } from "../../context.js";
import { Priority } from "../../core/event-bus.js";
import type { PanicEffect, SimulationEvent } from "../../types.js";
import { manhattan, samePoint, type StationMap } from "../../world/station-map.js";
import type { Agent, AgentBehavior, BehaviorMode, Point, ScheduleEntry } from "../../world/types.js";
import type { World } from "../../world/world.js";
import { resolveExchange } from "../combat-system.js";
import { moveItem } from "../environment-system.js";
import { assimilate, checkAssimilation } from "../infection-system.js";
import { relocate } from "../movement.js";
import { runDetection } from "./detection.js";
import { findPath } from "./pathfinding.js";

const IDLE: AgentBehavior = { mode: "Scheduled", targetId: null, waypoint: null, turnsRemaining: 0 };

/** Modes a thrown item can pull an NPC out of. */
const DISTRACTIBLE: ReadonlySet<BehaviorMode> = new Set(["Scheduled", "Wandering", "Searching", "Pursuing", "Flanking"]);

export function registerAiSystem(ctx: SimulationContext): void {
  ctx.bus.subscribe(["TurnAdvance"], () => runAiSystem(ctx), Priority.AI);
  ctx.bus.subscribe(
    ["Reveal", "PanicReport", "LynchMobTrigger", "Distraction"],
    (event) => reactToEvent(ctx, event),
    Priority.AI,
  );
}

/**
 * One decision per living NPC in roster order, then the detection pass.
 * Restrained agents neither move nor observe.
 */
export function runAiSystem(ctx: SimulationContext): void {
  const { world } = ctx;
  if (world.ai.alertTurns > 0) world.ai.alertTurns--;

  for (const agent of world.livingAgents()) {
    if (!agent.alive || agent.restrained) continue;
    if (agent.isPlayer) thaw(agent);
    else decide(ctx, agent);
  }
  runDetection(ctx);
}

function resetBehavior(agent: Agent): void {
  agent.behavior = { ...IDLE };
}

/** Counts a freeze down. Returns true while the agent stays frozen this turn. */
function thaw(agent: Agent): boolean {
  if (agent.behavior.mode !== "Frozen") return false;
  agent.behavior.turnsRemaining--;
  if (agent.behavior.turnsRemaining <= 0) resetBehavior(agent);
  return true;
}

function decide(ctx: SimulationContext, agent: Agent): void {
  const { world } = ctx;
  const behavior = agent.behavior;

  if (thaw(agent)) return;
  if (behavior.mode === "Hunting" || agent.revealed) {
    hunt(ctx, agent);
    return;
  }
  if (agent.trueNature === "Infected" && tryAssimilation(ctx, agent)) return;

  switch (behavior.mode) {
    case "Lynching": {
      const target = behavior.targetId ? world.getAgent(behavior.targetId) : undefined;
      if (!target?.alive || target.restrained) {
        resetBehavior(agent);
        break;
      }
      if (world.coLocated(agent, target)) resolveExchange(ctx, agent, target);
      else stepToward(ctx, agent, target.position);
      return;
    }
    case "Flanking": {
      behavior.turnsRemaining--;
      if (behavior.waypoint && !samePoint(agent.position, behavior.waypoint)) {
        stepToward(ctx, agent, behavior.waypoint);
      } else {
        agent.behavior = {
          mode: "Pursuing",
          targetId: behavior.targetId,
          waypoint: null,
          turnsRemaining: ctx.config.ai.pursuitTurns,
        };
        return;
      }
      if (behavior.turnsRemaining <= 0) resetBehavior(agent);
      return;
    }
    case "Pursuing": {
      const target = behavior.targetId ? world.getAgent(behavior.targetId) : undefined;
      behavior.turnsRemaining--;
      if (target?.alive && !world.coLocated(agent, target)) stepToward(ctx, agent, target.position);
      if (!target?.alive || behavior.turnsRemaining <= 0) resetBehavior(agent);
      return;
    }
    case "Searching":
    case "Fleeing": {
      behavior.turnsRemaining--;
      if (behavior.waypoint && !samePoint(agent.position, behavior.waypoint)) stepToward(ctx, agent, behavior.waypoint);
      if (behavior.turnsRemaining <= 0 || (behavior.waypoint && samePoint(agent.position, behavior.waypoint))) {
        resetBehavior(agent);
      }
      return;
    }
    default:
      break;
  }
  followSchedule(ctx, agent);
}

// ── Schedules ──

/** Windows whose end is not after their start wrap past midnight. */
export function inWindow(entry: ScheduleEntry, hour: number): boolean {
  if (entry.start < entry.end) return hour >= entry.start && hour < entry.end;
  return hour >= entry.start || hour < entry.end;
}

export function scheduledRoom(schedule: readonly ScheduleEntry[], hour: number): string | null {
  return schedule.find((entry) => inWindow(entry, hour))?.room ?? null;
}

function usableRoom(map: StationMap, roomId: string): boolean {
  const state = map.roomState(roomId);
  return state !== undefined && !state.destroyed;
}

/**
 * The scheduled room when it still stands, otherwise the habitat room whose
 * anchor is nearest. Null when nothing in the habitat is usable either.
 */
export function resolveDestination(world: World, agent: Agent, roomId: string): string | null {
  const map = world.map;
  if (usableRoom(map, roomId)) return roomId;

  let best: string | null = null;
  let bestDistance = Infinity;
  for (const candidate of agent.habitat) {
    const def = map.room(candidate);
    if (!def || !usableRoom(map, candidate)) continue;
    const d = manhattan(agent.position, def.anchor);
    if (d < bestDistance) {
      best = candidate;
      bestDistance = d;
    }
  }
  return best;
}

function followSchedule(ctx: SimulationContext, agent: Agent): void {
  const { world, rng, resolution, config } = ctx;
  const roomId = scheduledRoom(agent.schedule, world.hour);

  if (roomId === null) {
    agent.behavior = { ...IDLE, mode: "Wandering" };
    if (!resolution.chance(config.ai.wanderChance)) return;
    const options = openNeighbors(world.map, agent.position);
    if (options.length > 0) relocate(ctx, agent, rng.choose(options));
    return;
  }

  agent.behavior = { ...IDLE };
  const destination = resolveDestination(world, agent, roomId);
  if (destination === null || world.roomOf(agent) === destination) return;
  const anchor = world.map.room(destination)?.anchor;
  if (anchor) stepToward(ctx, agent, anchor);
}

// ── Movement ──

export function openNeighbors(map: StationMap, from: Point): Point[] {
  return [
    { x: from.x, y: from.y - 1 },
    { x: from.x + 1, y: from.y },
    { x: from.x, y: from.y + 1 },
    { x: from.x - 1, y: from.y },
  ].filter((p) => map.isWalkable(p) && map.canEnter(from, p));
}

/** Takes the first step of a shortest path. Returns false when there is none. */
function stepToward(ctx: SimulationContext, agent: Agent, goal: Point): boolean {
  const result = findPath(ctx.world.map, agent.position, goal, { diagonals: ctx.config.ai.diagonals });
  if (!result || result.path.length < 2) return false;
  relocate(ctx, agent, result.path[1]);
  return true;
}

// ── Hostile behavior ──

function hunt(ctx: SimulationContext, agent: Agent): void {
  const { world } = ctx;
  agent.behavior = { ...IDLE, mode: "Hunting" };

  let prey: Agent | null = null;
  let preyDistance = Infinity;
  for (const candidate of world.livingAgents()) {
    if (candidate.trueNature !== "Human") continue;
    const d = manhattan(agent.position, candidate.position);
    if (d < preyDistance) {
      prey = candidate;
      preyDistance = d;
    }
  }
  if (!prey) return;

  agent.behavior.targetId = prey.id;
  if (world.coLocated(agent, prey)) resolveExchange(ctx, agent, prey);
  else stepToward(ctx, agent, prey.position);
}

/** A masked carrier alone with exactly one human may take it. */
function tryAssimilation(ctx: SimulationContext, agent: Agent): boolean {
  const { world, resolution, config } = ctx;
  const humans = world.agentsAt(world.locationOf(agent)).filter((a) => a.trueNature === "Human");
  if (humans.length !== 1) return false;
  const target = humans[0];
  if (checkAssimilation(world, agent, target) !== null) return false;
  if (!resolution.chance(config.infection.npcAssimilationChance)) return false;
  assimilate(ctx, agent, target);
  return true;
}

// ── Reactions ──

function reactToEvent(ctx: SimulationContext, event: SimulationEvent): void {
  const { world } = ctx;

  switch (event.type) {
    case "Reveal": {
      const agent = world.requireAgent(event.payload.agentId);
      if (!agent.isPlayer) agent.behavior = { ...IDLE, mode: "Hunting" };
      break;
    }
    case "PanicReport":
      applyPanic(ctx, world.requireAgent(event.payload.agentId), event.payload.effect);
      break;
    case "LynchMobTrigger": {
      const targetId = event.payload.targetId;
      for (const agent of world.livingAgents()) {
        if (agent.isPlayer || agent.id === targetId || agent.restrained || agent.revealed) continue;
        if (agent.behavior.mode === "Frozen" || agent.behavior.mode === "Fleeing") continue;
        agent.behavior = { mode: "Lynching", targetId, waypoint: null, turnsRemaining: 0 };
      }
      break;
    }
    case "Distraction": {
      const { agentId, landing, noise } = event.payload;
      const range = noise + ctx.config.distraction.hearingBonus;
      for (const listener of world.livingAgents()) {
        if (listener.isPlayer || listener.id === agentId || listener.restrained) continue;
        if (!DISTRACTIBLE.has(listener.behavior.mode)) continue;
        if (manhattan(listener.position, landing) > range) continue;
        listener.behavior = {
          mode: "Searching",
          targetId: null,
          waypoint: { ...landing },
          turnsRemaining: ctx.config.distraction.searchTurns,
        };
      }
      break;
    }
    default:
      break;
  }
}

function applyPanic(ctx: SimulationContext, agent: Agent, effect: PanicEffect): void {
  const { world, rng, bus, config } = ctx;

  switch (effect) {
    case "Freeze":
      // The same turn's AI pass counts one off; the player stays frozen through the next action window.
      agent.behavior = { ...IDLE, mode: "Frozen", turnsRemaining: agent.isPlayer ? 2 : 1 };
      break;
    case "Flee": {
      if (agent.isPlayer) {
        const options = openNeighbors(world.map, agent.position);
        if (options.length > 0) relocate(ctx, agent, rng.choose(options));
        break;
      }
      const room = world.roomOf(agent);
      const neighbors = room ? world.map.adjacentRooms(room) : [];
      let waypoint: Point | null = null;
      if (neighbors.length > 0) {
        waypoint = world.map.room(rng.choose(neighbors))?.anchor ?? null;
      } else {
        // Corridors have no adjacent rooms; bolt for an open cell instead.
        const cells = openNeighbors(world.map, agent.position);
        if (cells.length > 0) waypoint = rng.choose(cells);
      }
      if (waypoint === null) break;
      agent.behavior = { mode: "Fleeing", targetId: null, waypoint, turnsRemaining: config.ai.fleeTurns };
      break;
    }
    case "DropItem": {
      const room = world.roomOf(agent);
      const item = agent.inventory[0];
      if (room === null || item === undefined) break;
      agent.inventory.splice(0, 1);
      moveItem(ctx, room, item, "put");
      bus.publish({ type: "ItemDropped", payload: { agentId: agent.id, item, roomId: room } });
      break;
    }
    case "Scream":
      for (const listener of world.livingAgents()) {
        if (listener.id === agent.id || listener.isPlayer || listener.restrained) continue;
        if (listener.behavior.mode !== "Scheduled" && listener.behavior.mode !== "Wandering") continue;
        if (manhattan(listener.position, agent.position) > config.ai.screamRadius) continue;
        listener.behavior = {
          mode: "Searching",
          targetId: agent.id,
          waypoint: { ...agent.position },
          turnsRemaining: config.ai.searchTurns,
        };
      }
      break;
    default:
      break;
  }
}

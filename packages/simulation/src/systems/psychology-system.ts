import type { SimulationContext } from "../context.js";
import { Priority } from "../core/event-bus.js";
import { clamp } from "../core/resolution.js";
import type { PanicEffect, StressCause } from "../types.js";
import type { Agent } from "../world/types.js";

export const PANIC_EFFECTS: readonly PanicEffect[] = ["DropItem", "Freeze", "Scream", "Flee", "LashOut"];

const MAX_PARANOIA = 100;
const SENSITIVE_LOGIC = 4;
const SENSITIVE_EMPATHY = 2;

export function registerPsychologySystem(ctx: SimulationContext): void {
  ctx.bus.subscribe(["TurnAdvance"], () => runPsychologySystem(ctx), Priority.Psychology);
  ctx.bus.subscribe(
    ["Assimilation"],
    (event) => {
      if (event.type === "Assimilation") onAssimilation(ctx, event.payload.location, event.payload.targetId);
    },
    Priority.Psychology,
  );
}

export function panicThreshold(agent: Agent, panicMargin: number): number {
  return agent.attributes.Resolve + panicMargin;
}

export function runPsychologySystem(ctx: SimulationContext): void {
  updateParanoia(ctx);

  const { world, config } = ctx;
  const rules = config.psychology;
  const temperature = world.effectiveTemperature();

  const living = world.livingAgents().filter((a) => !a.revealed);
  const occupancy = new Map<string, number>();
  for (const agent of world.livingAgents()) {
    const key = world.locationOf(agent);
    occupancy.set(key, (occupancy.get(key) ?? 0) + 1);
  }

  for (const agent of living) {
    let stressed = false;
    if (temperature < 0) {
      addStress(ctx, agent, Math.max(1, Math.floor(Math.abs(temperature) / rules.coldStressDivisor)), "cold");
      stressed = true;
    }
    if (agent.trueNature === "Human" && occupancy.get(world.locationOf(agent)) === 1) {
      addStress(ctx, agent, rules.isolationStress, "isolation");
      stressed = true;
    }
    if (!stressed) addStress(ctx, agent, -rules.recoveryPerTurn, "recovery");
  }

  for (const agent of living) {
    if (agent.alive) resolvePanic(ctx, agent);
  }
}

function updateParanoia(ctx: SimulationContext): void {
  const { world, config } = ctx;
  const rules = config.psychology;

  let gain = rules.paranoiaPerTurn;
  const player = world.player();
  const playerRoom = player?.alive ? world.roomOf(player) : null;
  if (playerRoom !== null && world.map.roomState(playerRoom)?.bloody) gain += rules.bloodyRoomParanoia;
  raiseParanoia(ctx, gain);
}

/** Adds to station paranoia, capped at 100, and announces every threshold crossed. */
export function raiseParanoia(ctx: SimulationContext, amount: number): void {
  const { world, bus, config } = ctx;
  const before = world.paranoia;
  world.paranoia = clamp(before + amount, 0, MAX_PARANOIA);

  for (const threshold of config.psychology.paranoiaThresholds) {
    if (before < threshold && world.paranoia >= threshold) {
      bus.publish({ type: "ParanoiaThreshold", payload: { threshold, direction: "up", paranoia: world.paranoia } });
    } else if (before >= threshold && world.paranoia < threshold) {
      bus.publish({ type: "ParanoiaThreshold", payload: { threshold, direction: "down", paranoia: world.paranoia } });
    }
  }
}

export function addStress(ctx: SimulationContext, agent: Agent, amount: number, cause: StressCause): void {
  const next = clamp(agent.stress + amount, 0, ctx.config.psychology.maxStress);
  const delta = next - agent.stress;
  agent.stress = next;
  if (delta !== 0) {
    ctx.bus.publish({ type: "StressChange", payload: { agentId: agent.id, delta, stress: next, cause } });
  }
}

/**
 * Above the threshold the agent rolls Resolve against the overshoot. No
 * successes means panic, with one of the fixed effects picked uniformly.
 */
function resolvePanic(ctx: SimulationContext, agent: Agent): void {
  const { world, resolution, rng, bus, config } = ctx;
  const threshold = panicThreshold(agent, config.psychology.panicMargin);
  if (agent.stress <= threshold) return;

  const intensity = agent.stress - threshold;
  if (resolution.rollPool(agent.attributes.Resolve, intensity) > 0) return;

  const effect = rng.choose(PANIC_EFFECTS);
  const witnesses = world.agentsAt(world.locationOf(agent)).filter((a) => a.id !== agent.id);
  const victimId = effect === "LashOut" && witnesses.length > 0 ? rng.choose(witnesses).id : null;

  bus.publish({ type: "PanicReport", payload: { agentId: agent.id, effect, victimId } });

  for (const witness of witnesses) {
    if (!witness.revealed) addStress(ctx, witness, config.psychology.panicCascadeStress, "panicCascade");
  }
}

/** Sensitive humans in or next to the room feel the harvest. */
function onAssimilation(ctx: SimulationContext, location: string, victimId: string): void {
  const { world } = ctx;
  const nearby = new Set([location, ...(world.map.room(location) ? world.map.adjacentRooms(location) : [])]);
  for (const agent of world.livingAgents()) {
    if (agent.trueNature !== "Human" || agent.id === victimId) continue;
    if (!nearby.has(world.locationOf(agent))) continue;
    const sensitive =
      agent.attributes.Logic >= SENSITIVE_LOGIC || (agent.skills.Empathy ?? 0) >= SENSITIVE_EMPATHY;
    if (sensitive) addStress(ctx, agent, ctx.config.psychology.psychicTremorStress, "psychicTremor");
  }
}

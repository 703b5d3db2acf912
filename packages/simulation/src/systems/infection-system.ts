import type { SimulationContext } from "../context.js";
import { Priority } from "../core/event-bus.js";
import { clamp, clamp01 } from "../core/resolution.js";
import type { ErrorKind, RevealReason, SimulationEvent } from "../types.js";
import type { Agent } from "../world/types.js";
import type { World } from "../world/world.js";

const MASK_MAX = 100;

const BIOLOGICAL_TELLS = [
  "breath does not fog in the cold air",
  "skin is warm to the touch despite the frost",
  "eyes fail to track a passing light",
  "voice falls half a beat out of sync",
  "a tremor runs under the skin of one hand",
] as const;

export function registerInfectionSystem(ctx: SimulationContext): void {
  ctx.bus.subscribe(["TurnAdvance"], () => runInfectionSystem(ctx), Priority.Infection);
  ctx.bus.subscribe(["BloodTest", "CombatLog"], (event) => onInfectionEvidence(ctx, event), Priority.Infection);
}

/** Communion, then mask decay and slips, then reveal checks. */
export function runInfectionSystem(ctx: SimulationContext): void {
  const infectedThisTurn = runCommunion(ctx);

  const pending = new Map<string, RevealReason[]>();
  for (const agent of ctx.world.livingAgents()) {
    if (agent.trueNature !== "Infected" || agent.revealed || infectedThisTurn.has(agent.id)) continue;
    decayMask(ctx, agent);
    if (agent.disguiseIntegrity <= 0) addReason(pending, agent.id, "MaskDepleted");
    if (agent.health <= 1) addReason(pending, agent.id, "CriticalWound");
  }

  for (const [agentId, reasons] of pending) {
    reveal(ctx, ctx.world.requireAgent(agentId), reasons);
  }
}

// ── Communion ──

/** Probability that one human catches the infection this turn. */
export function communionProbability(
  baseChance: number,
  maskIntegrity: number,
  paranoia: number,
): number {
  return clamp01(baseChance * (1 - maskIntegrity / 100) * (1 + paranoia / 100));
}

/**
 * Passive transmission among co-located agents. Only agents infected before
 * this pass spread; the newly infected start with a full mask.
 */
function runCommunion(ctx: SimulationContext): Set<string> {
  const { world, resolution, bus, config } = ctx;
  const infected = new Set<string>();

  const groups = new Map<string, Agent[]>();
  for (const agent of world.livingAgents()) {
    const key = world.locationOf(agent);
    const group = groups.get(key);
    if (group) group.push(agent);
    else groups.set(key, [agent]);
  }

  for (const [location, members] of groups) {
    if (members.length < 2) continue;
    const carriers = members.filter((a) => a.trueNature === "Infected");
    if (carriers.length === 0) continue;

    // The weakest mask in the room leaks the most.
    const source = carriers.reduce((weakest, a) => (maskOf(a) < maskOf(weakest) ? a : weakest));
    const base = world.isDarkAt(source.position)
      ? config.infection.darkBaseChance
      : config.infection.lightBaseChance;
    const probability = communionProbability(base, maskOf(source), world.paranoia);

    for (const human of members) {
      if (human.trueNature !== "Human") continue;
      if (!resolution.chance(probability)) continue;
      human.trueNature = "Infected";
      human.disguiseIntegrity = MASK_MAX;
      infected.add(human.id);
      bus.publish({
        type: "Communion",
        payload: { sourceId: source.id, targetId: human.id, location, probability },
      });
    }
  }

  return infected;
}

function maskOf(agent: Agent): number {
  return agent.revealed ? 0 : agent.disguiseIntegrity;
}

// ── Mask decay ──

export function maskDecayAmount(ctx: SimulationContext, agent: Agent): number {
  const { world, config } = ctx;
  const rules = config.infection;
  let amount = rules.baseDecay;
  if (world.effectiveTemperature() < rules.coldDecayThreshold) amount *= rules.coldDecayMultiplier;
  if (world.paranoia > rules.paranoiaDecayThreshold) amount *= rules.paranoiaDecayMultiplier;

  const room = world.roomOf(agent);
  if (room !== null && !agent.habitat.includes(room)) amount += rules.habitatPenalty;
  return amount;
}

function decayMask(ctx: SimulationContext, agent: Agent): void {
  const { world, resolution, rng, bus, config } = ctx;
  const amount = maskDecayAmount(ctx, agent);
  agent.disguiseIntegrity = clamp(agent.disguiseIntegrity - amount, 0, MASK_MAX);
  bus.publish({
    type: "MaskDecay",
    payload: { agentId: agent.id, amount, integrity: agent.disguiseIntegrity },
  });

  if (world.effectiveTemperature() < config.infection.slipTemperature) {
    const slipChance = (1 - agent.disguiseIntegrity / MASK_MAX) * config.infection.slipChanceScale;
    if (resolution.chance(slipChance)) {
      bus.publish({ type: "BiologicalSlip", payload: { agentId: agent.id, tell: rng.choose(BIOLOGICAL_TELLS) } });
    }
  }
}

// ── Reveal ──

function addReason(pending: Map<string, RevealReason[]>, agentId: string, reason: RevealReason): void {
  const reasons = pending.get(agentId);
  if (reasons) reasons.push(reason);
  else pending.set(agentId, [reason]);
}

/**
 * Terminal transition to Revealed. Calling it again for a revealed agent does
 * nothing, so simultaneous triggers produce a single Reveal event.
 */
export function reveal(ctx: SimulationContext, agent: Agent, reasons: RevealReason[]): boolean {
  if (agent.trueNature !== "Infected" || agent.revealed || !agent.alive) return false;
  agent.revealed = true;
  agent.maxHealth = ctx.config.infection.revealedHealth;
  agent.health = ctx.config.infection.revealedHealth;
  ctx.bus.publish({ type: "Reveal", payload: { agentId: agent.id, reasons } });
  return true;
}

function onInfectionEvidence(ctx: SimulationContext, event: SimulationEvent): void {
  if (event.type === "BloodTest") {
    if (!event.payload.positive) return;
    reveal(ctx, ctx.world.requireAgent(event.payload.subjectId), ["BloodTest"]);
  } else if (event.type === "CombatLog") {
    // A blow that kills outright leaves nothing to reveal.
    const target = ctx.world.requireAgent(event.payload.targetId);
    if (target.health > 0 && target.health <= 1) reveal(ctx, target, ["CriticalWound"]);
  }
}

// ── Assimilation ──

export interface AssimilationCheck {
  error: ErrorKind;
  reason: string;
}

/** Null when `actor` may assimilate `target` right now. */
export function checkAssimilation(world: World, actor: Agent, target: Agent): AssimilationCheck | null {
  if (!actor.alive || !target.alive) return { error: "InvalidTarget", reason: "both agents must be alive" };
  if (actor.id === target.id) return { error: "InvalidTarget", reason: "cannot assimilate oneself" };
  if (actor.trueNature !== "Infected") return { error: "IllegalTransition", reason: "only the infected assimilate" };
  if (actor.revealed) return { error: "IllegalTransition", reason: "a revealed organism cannot pass unseen" };
  if (target.trueNature !== "Human") return { error: "IllegalTransition", reason: "target is already infected" };
  if (!world.coLocated(actor, target)) return { error: "InvalidTarget", reason: "target is not here" };

  const witnesses = world
    .agentsAt(world.locationOf(actor))
    .filter((a) => a.id !== target.id && a.trueNature === "Human");
  if (witnesses.length > 0) return { error: "PreconditionFailed", reason: "there are witnesses" };
  return null;
}

/** Converts the target outright and restores the actor's mask. Caller checks first. */
export function assimilate(ctx: SimulationContext, actor: Agent, target: Agent): void {
  const knowledge = [`Protocol: ${target.role}`, `Memory: ${target.name}`];
  target.trueNature = "Infected";
  target.disguiseIntegrity = MASK_MAX;
  actor.disguiseIntegrity = MASK_MAX;
  for (const tag of knowledge) {
    if (!actor.knowledgeTags.includes(tag)) actor.knowledgeTags.push(tag);
  }
  ctx.bus.publish({
    type: "Assimilation",
    payload: { actorId: actor.id, targetId: target.id, location: ctx.world.locationOf(actor), knowledge },
  });
}

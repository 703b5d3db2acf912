import type { SimulationContext } from "../context.js";
import { Priority } from "../core/event-bus.js";
import type { InterrogationResponse, SimulationEvent, TrustCause } from "../types.js";
import type { Agent, AgentId } from "../world/types.js";
import type { World } from "../world/world.js";
import { panicThreshold } from "./psychology-system.js";

export interface LynchTarget {
  agentId: AgentId;
  meanTrust: number;
}

export function registerTrustSystem(ctx: SimulationContext): void {
  ctx.bus.subscribe(["TurnAdvance"], () => runTrustSystem(ctx), Priority.Trust);
  ctx.bus.subscribe(
    ["EvidenceTagged", "Interrogation", "Accusation", "PanicReport", "BiologicalSlip"],
    (event) => applySocialEvent(ctx, event),
    Priority.Trust,
  );
}

/** Paranoia erodes trust between every pair of the living, then the lynch condition is checked. */
export function runTrustSystem(ctx: SimulationContext): void {
  const { world, bus, config } = ctx;
  const erosion = Math.floor(world.paranoia / config.trust.paranoiaDecayDivisor);
  if (erosion > 0) world.trust.erode(world.livingAgents().map((a) => a.id), erosion);

  const target = lynchTarget(world, config.trust.lynchThreshold);
  if (target) {
    bus.publish({ type: "LynchMobTrigger", payload: { targetId: target.agentId, meanTrust: target.meanTrust } });
  }
}

/**
 * The living agent the rest of the station trusts least, when that mean falls
 * below the threshold. Recomputed on every call; nothing is stored.
 */
export function lynchTarget(world: World, threshold: number): LynchTarget | null {
  const living = world.livingAgents();
  const ids = living.map((a) => a.id);
  let worst: LynchTarget | null = null;
  for (const agent of living) {
    if (agent.restrained) continue;
    const meanTrust = world.trust.meanTrustIn(agent.id, ids);
    if (meanTrust < threshold && (worst === null || meanTrust < worst.meanTrust)) {
      worst = { agentId: agent.id, meanTrust };
    }
  }
  return worst;
}

function shift(ctx: SimulationContext, observerId: AgentId, subjectId: AgentId, delta: number, cause: TrustCause): void {
  if (observerId === subjectId || delta === 0) return;
  const trust = ctx.world.trust.adjust(observerId, subjectId, delta);
  ctx.bus.publish({ type: "TrustChange", payload: { observerId, subjectId, delta, trust, cause } });
}

function applySocialEvent(ctx: SimulationContext, event: SimulationEvent): void {
  const { world, config } = ctx;
  const rules = config.trust;

  switch (event.type) {
    case "EvidenceTagged": {
      for (const observer of world.livingAgents()) {
        shift(ctx, observer.id, event.payload.subjectId, rules.evidenceDelta, "evidence");
      }
      break;
    }
    case "Interrogation": {
      const { interrogatorId, subjectId, response } = event.payload;
      const delta =
        response === "Honest" ? rules.honestDelta : response === "Evasive" ? rules.evasiveDelta : rules.hostileDelta;
      shift(ctx, interrogatorId, subjectId, delta, "interrogation");
      break;
    }
    case "Accusation": {
      const { accuserId, accusedId, supporters, opposers, upheld } = event.payload;
      if (upheld) {
        world.requireAgent(accusedId).restrained = true;
        break;
      }
      shift(ctx, accusedId, accuserId, rules.failedAccusationAccusedDelta, "failedAccusation");
      for (const voter of [...supporters, ...opposers]) {
        shift(ctx, voter, accuserId, rules.failedAccusationVoterDelta, "accusationVote");
      }
      break;
    }
    case "PanicReport": {
      if (event.payload.effect === "LashOut" && event.payload.victimId !== null) {
        shift(ctx, event.payload.victimId, event.payload.agentId, rules.lashOutDelta, "lashOut");
      }
      break;
    }
    case "BiologicalSlip": {
      const slipper = world.requireAgent(event.payload.agentId);
      for (const witness of world.agentsAt(world.locationOf(slipper))) {
        if (witness.trueNature === "Human") shift(ctx, witness.id, slipper.id, rules.slipWitnessDelta, "biologicalSlip");
      }
      break;
    }
  }
}

// ── Social actions ──

/**
 * Decides how `subject` answers questioning. A subject that already distrusts
 * the interrogator turns hostile. An infected subject hides behind Influence and
 * Deception; if the interrogator's Logic and Empathy win the contest the answers
 * come out evasive. A human past the panic threshold is evasive regardless.
 */
export function interrogate(ctx: SimulationContext, interrogator: Agent, subject: Agent): InterrogationResponse {
  const { world, resolution, bus, config } = ctx;
  let response: InterrogationResponse = "Honest";

  if (world.trust.get(subject.id, interrogator.id) < config.trust.hostileBelow) {
    response = "Hostile";
  } else if (subject.trueNature === "Infected") {
    const contest = resolution.contest(
      interrogator.attributes.Logic + (interrogator.skills.Empathy ?? 0),
      subject.attributes.Influence + (subject.skills.Deception ?? 0),
    );
    if (contest.winner === "A") response = "Evasive";
  } else if (subject.stress > panicThreshold(subject, config.psychology.panicMargin)) {
    response = "Evasive";
  }

  bus.publish({ type: "Interrogation", payload: { interrogatorId: interrogator.id, subjectId: subject.id, response } });
  return response;
}

/**
 * Puts an accusation to everyone present. A voter sides with the accuser when
 * it trusts the accused less than the accuser. A majority of supporters
 * restrains the accused; otherwise the accusation backfires.
 */
export function accuse(ctx: SimulationContext, accuser: Agent, accused: Agent): boolean {
  const { world, bus } = ctx;
  const voters = world
    .agentsAt(world.locationOf(accuser))
    .filter((a) => a.id !== accuser.id && a.id !== accused.id && !a.restrained);

  const supporters: AgentId[] = [];
  const opposers: AgentId[] = [];
  for (const voter of voters) {
    if (world.trust.get(voter.id, accused.id) < world.trust.get(voter.id, accuser.id)) supporters.push(voter.id);
    else opposers.push(voter.id);
  }

  const upheld = supporters.length > opposers.length;
  bus.publish({
    type: "Accusation",
    payload: { accuserId: accuser.id, accusedId: accused.id, supporters, opposers, upheld },
  });
  return upheld;
}

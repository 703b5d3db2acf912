import type { SimulationContext } from "../../context.js";
import { manhattan, type StationMap } from "../../world/station-map.js";
import { pairKey } from "../../world/trust-matrix.js";
import type { Agent, Point } from "../../world/types.js";
import type { World } from "../../world/world.js";
import { observerPool, rollDetection, subjectPool } from "./stealth.js";

/**
 * Same room, or within reach when either side stands in a corridor.
 * Walls between two rooms block sight.
 */
export function canObserve(world: World, observer: Agent, subject: Agent, range: number): boolean {
  const a = world.roomOf(observer);
  const b = world.roomOf(subject);
  if (a !== null && b !== null) return a === b;
  return manhattan(observer.position, subject.position) <= range;
}

/** Every NPC that can see the player gets one contest, unless the pair is cooling down. */
export function runDetection(ctx: SimulationContext): void {
  const { world, resolution, bus, config } = ctx;
  const player = world.player();
  if (!player?.alive) return;

  for (const observer of world.livingAgents()) {
    if (observer.isPlayer || observer.restrained || observer.revealed) continue;
    if (observer.behavior.mode === "Frozen") continue;
    if (!canObserve(world, observer, player, config.stealth.observationRange)) continue;

    const key = pairKey(observer.id, player.id);
    const readyAt = world.ai.detectionCooldowns.get(key);
    if (readyAt !== undefined && world.turn < readyAt) continue;

    const obs = observerPool(
      observer,
      { dark: world.isDarkAt(observer.position), noise: player.noise, alert: world.ai.alertTurns > 0 },
      config.stealth,
      config.ai.alertObservationBonus,
    );
    const sub = subjectPool(player, { dark: world.isDarkAt(player.position), noise: player.noise }, config.stealth);
    const roll = rollDetection(resolution, obs, sub, config.stealth.baseDetectionRate);
    world.ai.detectionCooldowns.set(key, world.turn + config.stealth.cooldownTurns);

    bus.publish({
      type: "DetectionReport",
      payload: { observerId: observer.id, subjectId: player.id, detected: roll.detected, probability: roll.probability },
    });

    if (!roll.detected) continue;
    if (observer.trueNature === "Infected") broadcastAmbush(ctx, observer, player);
    else raiseStationAlert(ctx, observer, player);
  }
}

// ── Alert propagation ──

/**
 * Two ways into the target's location, as far apart as the layout allows.
 * Rooms use their entry cells; in a corridor the open neighbours are used.
 */
export function flankingPoints(map: StationMap, target: Point): Point[] {
  const room = map.roomAt(target);
  const candidates = room
    ? map.entryPoints(room)
    : [
        { x: target.x, y: target.y - 1 },
        { x: target.x + 1, y: target.y },
        { x: target.x, y: target.y + 1 },
        { x: target.x - 1, y: target.y },
      ].filter((p) => map.canEnter(p, target) && map.isWalkable(p));
  if (candidates.length <= 1) return candidates;

  let best: [Point, Point] = [candidates[0], candidates[1]];
  let bestDistance = manhattan(best[0], best[1]);
  for (let i = 0; i < candidates.length; i++) {
    for (let j = i + 1; j < candidates.length; j++) {
      const d = manhattan(candidates[i], candidates[j]);
      if (d > bestDistance) {
        best = [candidates[i], candidates[j]];
        bestDistance = d;
      }
    }
  }
  return best;
}

function broadcastAmbush(ctx: SimulationContext, source: Agent, target: Agent): void {
  const { world, resolution, bus, config } = ctx;
  source.behavior = { mode: "Pursuing", targetId: target.id, waypoint: null, turnsRemaining: config.ai.pursuitTurns };
  if (!resolution.chance(config.ai.broadcastChance)) return;

  const recipients = world
    .livingAgents()
    .filter(
      (a) =>
        a.id !== source.id &&
        !a.isPlayer &&
        !a.restrained &&
        a.trueNature === "Infected" &&
        !a.revealed &&
        manhattan(a.position, source.position) <= config.ai.broadcastRadius,
    );
  const entryPoints = flankingPoints(world.map, target.position);

  recipients.forEach((agent, i) => {
    agent.behavior =
      entryPoints.length > 0
        ? {
            mode: "Flanking",
            targetId: target.id,
            waypoint: entryPoints[i % entryPoints.length],
            turnsRemaining: config.ai.pursuitTurns * 2,
          }
        : { mode: "Pursuing", targetId: target.id, waypoint: null, turnsRemaining: config.ai.pursuitTurns };
  });

  bus.publish({
    type: "AlertBroadcast",
    payload: { sourceId: source.id, targetId: target.id, recipients: recipients.map((a) => a.id), entryPoints },
  });
}

function raiseStationAlert(ctx: SimulationContext, observer: Agent, subject: Agent): void {
  const { world, bus, config } = ctx;
  if (world.ai.alertTurns >= config.ai.alertDuration / 2) return;
  world.ai.alertTurns = config.ai.alertDuration;
  bus.publish({
    type: "StationAlert",
    payload: { observerId: observer.id, subjectId: subject.id, turns: config.ai.alertDuration },
  });
}

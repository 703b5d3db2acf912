import type { SimulationContext } from "../context.js";
import { Priority } from "../core/event-bus.js";
import type { EndingKind, GameOutcome } from "../world/types.js";
import type { World } from "../world/world.js";

export function registerEndgameSystem(ctx: SimulationContext): void {
  ctx.bus.subscribe(["TurnAdvance"], () => checkEndgame(ctx), Priority.Endgame);
}

export function evaluateEnding(world: World): EndingKind | null {
  const player = world.player();
  if (player) {
    if (!player.alive) return "PlayerKilled";
    if (player.trueNature === "Infected") return "PlayerAssimilated";
    if (world.jobs.rescueArrived) return "Rescued";
  }
  const infectedAlive = world.livingAgents().some((a) => a.trueNature === "Infected");
  return infectedAlive ? null : "StationCleansed";
}

/** Settles the game once. Later calls leave the recorded outcome alone. */
export function checkEndgame(ctx: SimulationContext): GameOutcome | null {
  const { world, bus } = ctx;
  if (world.outcome) return world.outcome;

  const ending = evaluateEnding(world);
  if (!ending) return null;

  const victory = ending === "Rescued" || ending === "StationCleansed";
  world.outcome = { ending, victory, turn: world.turn };
  bus.publish({ type: "GameOver", payload: { ending, victory } });
  return world.outcome;
}

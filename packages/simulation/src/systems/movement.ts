import type { SimulationContext } from "../context.js";
import type { Agent, Point, Posture } from "../world/types.js";

const MOVEMENT_NOISE: Record<Posture, number> = {
  Standing: 2,
  Crouching: 1,
  Crawling: 0,
  Hiding: 0,
};

export function movementNoise(posture: Posture): number {
  return MOVEMENT_NOISE[posture];
}

/** Puts the agent on `to` and publishes a Movement event for the step. Callers validate the step first. */
export function relocate(ctx: SimulationContext, agent: Agent, to: Point): void {
  const { world, bus } = ctx;
  const from = { ...agent.position };
  const fromLocation = world.locationOf(agent);
  agent.position = { x: to.x, y: to.y };
  agent.noise = movementNoise(agent.posture);
  bus.publish({
    type: "Movement",
    payload: { agentId: agent.id, from, to: { ...agent.position }, fromLocation, toLocation: world.locationOf(agent) },
  });
}

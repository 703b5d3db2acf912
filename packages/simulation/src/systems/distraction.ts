import type { SimulationContext } from "../context.js";
import type { StationMap } from "../world/station-map.js";
import type { Agent, Point } from "../world/types.js";
import { moveItem } from "./environment-system.js";

/**
 * Where an item thrown from `from` along (dx, dy) comes down: the last open
 * cell before a wall, a barricaded door or the end of its flight. Null when
 * the very first cell is blocked.
 */
export function throwLanding(map: StationMap, from: Point, dx: number, dy: number, distance: number): Point | null {
  let landing: Point | null = null;
  let previous = from;
  for (let step = 1; step <= distance; step++) {
    const next = { x: from.x + dx * step, y: from.y + dy * step };
    if (!map.isWalkable(next) || !map.canEnter(previous, next)) break;
    landing = next;
    previous = next;
  }
  return landing;
}

/** An item that comes down in a corridor is lost in the drifts. */
export function throwItem(ctx: SimulationContext, actor: Agent, index: number, landing: Point, noise: number): void {
  const { world, bus } = ctx;
  const [item] = actor.inventory.splice(index, 1);
  const roomId = world.map.roomAt(landing);
  if (roomId !== null) moveItem(ctx, roomId, item, "put");
  bus.publish({
    type: "Distraction",
    payload: { agentId: actor.id, item, landing: { ...landing }, location: world.map.locationKey(landing), noise },
  });
}

import type { SimulationContext } from "../context.js";
import { Priority } from "../core/event-bus.js";
import type { SimulationEvent } from "../types.js";
import { samePoint } from "../world/station-map.js";
import type { Agent, DeviceDefinition, Facing, Point, SecurityLogEntry } from "../world/types.js";

const FACING: Record<Facing, Point> = {
  N: { x: 0, y: -1 },
  S: { x: 0, y: 1 },
  E: { x: 1, y: 0 },
  W: { x: -1, y: 0 },
};

export function registerSecuritySystem(ctx: SimulationContext): void {
  ctx.bus.subscribe(["TurnAdvance"], () => tickDevices(ctx), Priority.Security);
  ctx.bus.subscribe(["Movement"], (event) => onMovement(ctx, event), Priority.Security);
}

/**
 * Cells a camera covers: a cone that widens by one cell on each side per step
 * away from the lens. Walls do not block it.
 */
export function watchedCells(device: DeviceDefinition): Point[] {
  if (device.kind === "motionSensor") return [{ ...device.position }];
  const dir = FACING[device.facing];
  const cells: Point[] = [];
  for (let dist = 1; dist <= device.range; dist++) {
    const cx = device.position.x + dir.x * dist;
    const cy = device.position.y + dir.y * dist;
    const spread = dist - 1;
    for (let offset = -spread; offset <= spread; offset++) {
      cells.push(dir.x !== 0 ? { x: cx, y: cy + offset } : { x: cx + offset, y: cy });
    }
  }
  return cells;
}

export function isOperational(ctx: SimulationContext, deviceId: string): boolean {
  return !ctx.world.security.disabled.has(deviceId);
}

function onMovement(ctx: SimulationContext, event: SimulationEvent): void {
  if (event.type !== "Movement") return;
  const { world, bus, config, devices } = ctx;
  const { agentId, to } = event.payload;

  for (const device of devices.values()) {
    if (!isOperational(ctx, device.id)) continue;
    if (!watchedCells(device).some((cell) => samePoint(cell, to))) continue;

    const log = world.security.log;
    log.push({ turn: world.turn, deviceId: device.id, agentId, position: { ...to }, read: false });
    if (log.length > config.security.logSize) log.splice(0, log.length - config.security.logSize);

    bus.publish({
      type: "SecurityDetection",
      payload: { deviceId: device.id, kind: device.kind, roomId: device.room, agentId, position: { ...to } },
    });
  }
}

function tickDevices(ctx: SimulationContext): void {
  const { world, bus } = ctx;
  for (const [deviceId, turns] of [...world.security.disabled]) {
    if (turns > 1) {
      world.security.disabled.set(deviceId, turns - 1);
      continue;
    }
    world.security.disabled.delete(deviceId);
    bus.publish({ type: "DeviceRestored", payload: { deviceId } });
  }
}

/** Callers check that the device is operational and the actor is in its room. */
export function sabotageDevice(ctx: SimulationContext, actor: Agent, device: DeviceDefinition): void {
  const { world, bus, config } = ctx;
  world.security.disabled.set(device.id, config.security.sabotageTurns);
  actor.noise = config.security.sabotageNoise;
  bus.publish({
    type: "DeviceSabotaged",
    payload: { agentId: actor.id, deviceId: device.id, turns: config.security.sabotageTurns },
  });
}

/** Reports every unread log entry, then marks the whole log read. */
export function reviewConsole(ctx: SimulationContext, actor: Agent): void {
  const log = ctx.world.security.log;
  const entries = log
    .filter((e) => !e.read)
    .map(({ turn, deviceId, agentId, position }) => ({ turn, deviceId, agentId, position: { ...position } }));
  for (const entry of log) entry.read = true;
  ctx.bus.publish({ type: "ConsoleReviewed", payload: { agentId: actor.id, entries } });
}

export function unreadAlerts(log: readonly SecurityLogEntry[]): number {
  return log.filter((e) => !e.read).length;
}

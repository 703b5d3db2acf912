import type { SimulationContext } from "../context.js";
import { Priority } from "../core/event-bus.js";
import { clamp } from "../core/resolution.js";
import type { StationEventCategory } from "../types.js";
import { markBloody, moveItem, setPower, shiftTemperature, startNortheasterly } from "./environment-system.js";
import { raiseParanoia } from "./psychology-system.js";

export interface StationEventDefinition {
  id: string;
  name: string;
  category: StationEventCategory;
  weight: number;
  minTurn: number;
  cooldown: number;
  /** Only while the power is in this state. */
  requiresPower?: boolean;
  /** Only while a carrier is alive. */
  requiresInfected?: boolean;
  effect?: (ctx: SimulationContext) => void;
}

export const STATION_EVENTS: readonly StationEventDefinition[] = [
  {
    id: "sudden_blizzard",
    name: "Sudden Blizzard",
    category: "weather",
    weight: 8,
    minTurn: 1,
    cooldown: 10,
    effect: (ctx) => {
      startNortheasterly(ctx);
      shiftTemperature(ctx, -10);
    },
  },
  {
    id: "temperature_plunge",
    name: "Temperature Plunge",
    category: "weather",
    weight: 15,
    minTurn: 1,
    cooldown: 0,
    effect: (ctx) => shiftTemperature(ctx, -5),
  },
  { id: "calm_weather", name: "Brief Calm", category: "weather", weight: 10, minTurn: 1, cooldown: 0 },
  {
    id: "lights_flicker",
    name: "Lights Flicker",
    category: "equipment",
    weight: 20,
    minTurn: 1,
    cooldown: 0,
    requiresPower: true,
  },
  {
    id: "generator_sputter",
    name: "Generator Sputter",
    category: "equipment",
    weight: 5,
    minTurn: 1,
    cooldown: 15,
    requiresPower: true,
    effect: (ctx) => setPower(ctx, false, "failure", ctx.config.events.generatorOutageTurns),
  },
  { id: "radio_static", name: "Radio Static", category: "equipment", weight: 12, minTurn: 1, cooldown: 0 },
  {
    id: "hidden_supplies",
    name: "Hidden Supplies",
    category: "discovery",
    weight: 5,
    minTurn: 5,
    cooldown: 0,
    effect: findSupplies,
  },
  { id: "old_journal", name: "Old Journal Entry", category: "discovery", weight: 8, minTurn: 3, cooldown: 0 },
  {
    id: "distant_scream",
    name: "Distant Scream",
    category: "atmosphere",
    weight: 6,
    minTurn: 10,
    cooldown: 0,
    requiresInfected: true,
    effect: (ctx) => raiseParanoia(ctx, 15),
  },
  {
    id: "shadow_movement",
    name: "Shadow Movement",
    category: "atmosphere",
    weight: 15,
    minTurn: 5,
    cooldown: 0,
    effect: (ctx) => raiseParanoia(ctx, 5),
  },
  {
    id: "dogs_howl",
    name: "Dogs Howling",
    category: "atmosphere",
    weight: 10,
    minTurn: 1,
    cooldown: 0,
    requiresInfected: true,
  },
  {
    id: "power_outage_scare",
    name: "Momentary Blackout",
    category: "atmosphere",
    weight: 8,
    minTurn: 1,
    cooldown: 0,
    requiresPower: true,
    effect: (ctx) => raiseParanoia(ctx, 10),
  },
  {
    id: "strange_sounds",
    name: "Inhuman Sounds",
    category: "creature",
    weight: 4,
    minTurn: 15,
    cooldown: 0,
    requiresInfected: true,
    effect: (ctx) => raiseParanoia(ctx, 15),
  },
  {
    id: "blood_trail",
    name: "Blood Trail Discovered",
    category: "creature",
    weight: 3,
    minTurn: 10,
    cooldown: 0,
    requiresInfected: true,
    effect: bloodTrail,
  },
];

export function registerStationEventSystem(ctx: SimulationContext): void {
  ctx.bus.subscribe(["TurnAdvance"], () => runStationEvents(ctx), Priority.Events);
}

/** Ticks cooldowns, then rolls for at most one event. */
export function runStationEvents(ctx: SimulationContext): void {
  const { world, resolution, bus, config } = ctx;
  const cooldowns = world.stationEvents.cooldowns;
  for (const [id, turns] of [...cooldowns]) {
    if (turns > 1) cooldowns.set(id, turns - 1);
    else cooldowns.delete(id);
  }

  const chance = config.events.baseChance + world.paranoia * config.events.paranoiaWeight;
  if (chance <= 0 || !resolution.chance(clamp(chance, 0, 1))) return;

  const event = pickEvent(ctx, eligibleEvents(ctx));
  if (!event) return;
  if (event.cooldown > 0) cooldowns.set(event.id, event.cooldown);

  bus.publish({ type: "StationEvent", payload: { eventId: event.id, name: event.name, category: event.category } });
  event.effect?.(ctx);
}

export function eligibleEvents(ctx: SimulationContext): StationEventDefinition[] {
  const { world } = ctx;
  const carrierAlive = world.livingAgents().some((a) => a.trueNature === "Infected");
  return STATION_EVENTS.filter(
    (event) =>
      world.turn >= event.minTurn &&
      !world.stationEvents.cooldowns.has(event.id) &&
      (event.requiresPower === undefined || event.requiresPower === world.environment.powerOn) &&
      (!event.requiresInfected || carrierAlive),
  );
}

/** Weighted pick with one draw. */
function pickEvent(ctx: SimulationContext, events: readonly StationEventDefinition[]): StationEventDefinition | null {
  const total = events.reduce((sum, e) => sum + e.weight, 0);
  if (total <= 0) return null;
  let roll = ctx.rng.nextFloat() * total;
  for (const event of events) {
    roll -= event.weight;
    if (roll < 0) return event;
  }
  return events[events.length - 1] ?? null;
}

function findSupplies(ctx: SimulationContext): void {
  const { world, rng, bus, supplies } = ctx;
  const player = world.player();
  const roomId = player?.alive ? world.roomOf(player) : null;
  if (roomId === null || supplies.length === 0) return;
  const item = rng.choose(supplies);
  moveItem(ctx, roomId, item, "put");
  bus.publish({ type: "SuppliesFound", payload: { roomId, item } });
}

function bloodTrail(ctx: SimulationContext): void {
  const { world, rng } = ctx;
  const player = world.player();
  const roomId = player?.alive ? world.roomOf(player) : null;
  const adjacent = roomId === null ? [] : world.map.adjacentRooms(roomId);
  if (adjacent.length === 0) return;
  markBloody(ctx, rng.choose(adjacent));
  raiseParanoia(ctx, 8);
}

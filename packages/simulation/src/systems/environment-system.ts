import type { SimulationContext } from "../context.js";
import { Priority } from "../core/event-bus.js";
import { clamp } from "../core/resolution.js";
import type { PowerCause, SabotageTarget } from "../types.js";
import type { AgentId } from "../world/types.js";

const MAX_STORM = 100;

export function registerEnvironmentSystem(ctx: SimulationContext): void {
  ctx.bus.subscribe(["TurnAdvance"], () => runEnvironmentSystem(ctx), Priority.Environment);
  ctx.bus.subscribe(
    ["AgentDeath"],
    (event) => {
      if (event.type === "AgentDeath") markBloody(ctx, event.payload.location);
    },
    Priority.Environment,
  );
}

/** Power countdown, temperature, weather, room conditions, then sabotage. */
export function runEnvironmentSystem(ctx: SimulationContext): void {
  tickPower(ctx);
  updateTemperature(ctx);
  updateWeather(ctx);
  refreshRoomConditions(ctx);
  attemptSabotage(ctx);
}

function tickPower(ctx: SimulationContext): void {
  const env = ctx.world.environment;
  if (env.powerOn || env.powerRestoreCountdown <= 0) return;
  env.powerRestoreCountdown--;
  if (env.powerRestoreCountdown === 0) setPower(ctx, true, "restored");
}

function updateTemperature(ctx: SimulationContext): void {
  const { world, config } = ctx;
  const env = world.environment;
  const rules = config.environment;
  const before = env.temperature;
  env.temperature = env.powerOn
    ? Math.min(rules.maxTemperature, before + rules.heatingRate)
    : Math.max(rules.minTemperature, before - rules.coolingRate);
  announceTemperature(ctx, env.temperature - before);
}

function announceTemperature(ctx: SimulationContext, delta: number): void {
  const { world, bus } = ctx;
  if (delta === 0) return;
  bus.publish({
    type: "TemperatureChange",
    payload: { temperature: world.environment.temperature, effectiveTemperature: world.effectiveTemperature(), delta },
  });
}

/** Moves the base temperature by `delta` within the configured limits. */
export function shiftTemperature(ctx: SimulationContext, delta: number): void {
  const env = ctx.world.environment;
  const rules = ctx.config.environment;
  const before = env.temperature;
  env.temperature = clamp(before + delta, rules.minTemperature, rules.maxTemperature);
  announceTemperature(ctx, env.temperature - before);
  refreshRoomConditions(ctx);
}

function announceWeather(ctx: SimulationContext): void {
  const env = ctx.world.environment;
  ctx.bus.publish({
    type: "WeatherChange",
    payload: { stormIntensity: env.stormIntensity, windChill: env.windChill, northeasterly: env.northeasterlyTurns > 0 },
  });
}

export function startNortheasterly(ctx: SimulationContext): void {
  ctx.world.environment.northeasterlyTurns = ctx.config.environment.northeasterlyTurns;
  announceWeather(ctx);
  refreshRoomConditions(ctx);
}

/** Storm intensity drifts by 2d6-7 style steps; a Northeasterly occasionally rolls in. */
function updateWeather(ctx: SimulationContext): void {
  const { world, rng, resolution, config } = ctx;
  const env = world.environment;
  const rules = config.environment;

  env.stormIntensity = clamp(env.stormIntensity + rng.rollDie(6) * 2 - 7, 0, MAX_STORM);
  env.windChill = -Math.floor(env.stormIntensity / 10);

  if (env.northeasterlyTurns > 0) {
    env.northeasterlyTurns--;
  } else if (resolution.chance(rules.northeasterlyChance)) {
    env.northeasterlyTurns = rules.northeasterlyTurns;
  }
  announceWeather(ctx);
}

/**
 * Derives dark and frozen flags for every room from power, backup power,
 * barricades and the effective temperature. Publishes only the flips.
 */
export function refreshRoomConditions(ctx: SimulationContext): void {
  const { world, bus, config } = ctx;
  const map = world.map;
  const freezing = world.effectiveTemperature() < config.environment.freezeThreshold;

  for (const room of map.rooms()) {
    const state = map.roomState(room.id);
    if (!state) continue;

    const dark = (!world.environment.powerOn && !room.flags.includes("backupPower")) || state.barricade > 0;
    if (dark !== state.dark) {
      state.dark = dark;
      bus.publish({ type: "RoomStateChange", payload: { roomId: room.id, condition: "dark", active: dark } });
    }

    const frozen = freezing && !room.flags.includes("heated");
    if (frozen !== state.frozen) {
      state.frozen = frozen;
      bus.publish({ type: "RoomStateChange", payload: { roomId: room.id, condition: "frozen", active: frozen } });
    }
  }
}

export function setPower(
  ctx: SimulationContext,
  on: boolean,
  cause: PowerCause,
  outageTurns = ctx.config.environment.powerOutageTurns,
): void {
  const env = ctx.world.environment;
  if (env.powerOn === on) return;
  env.powerOn = on;
  env.powerRestoreCountdown = on ? 0 : outageTurns;
  ctx.bus.publish({ type: "PowerChange", payload: { powerOn: on, cause } });
  refreshRoomConditions(ctx);
}

export function setBarricade(ctx: SimulationContext, agentId: AgentId, roomId: string, strength: number): void {
  const state = ctx.world.map.roomState(roomId);
  if (!state) return;
  state.barricade = clamp(strength, 0, ctx.config.barricade.maxStrength);
  ctx.bus.publish({ type: "BarricadeChange", payload: { agentId, roomId, strength: state.barricade } });
  refreshRoomConditions(ctx);
}

export function moveItem(ctx: SimulationContext, roomId: string, item: string, direction: "take" | "put"): boolean {
  const state = ctx.world.map.roomState(roomId);
  if (!state) return false;
  if (direction === "put") {
    state.items.push(item);
    return true;
  }
  const index = state.items.findIndex((i) => i.toLowerCase() === item.toLowerCase());
  if (index === -1) return false;
  state.items.splice(index, 1);
  return true;
}

export function markBloody(ctx: SimulationContext, location: string): void {
  const state = ctx.world.map.roomState(location);
  if (!state || state.bloody) return;
  state.bloody = true;
  ctx.bus.publish({ type: "RoomStateChange", payload: { roomId: location, condition: "bloody", active: true } });
}

// ── Sabotage ──

function attemptSabotage(ctx: SimulationContext): void {
  const { world, rng, resolution, bus, config } = ctx;
  const saboteurs = world
    .livingAgents()
    .filter((a) => a.trueNature === "Infected" && !a.revealed && !a.isPlayer && !a.restrained);
  if (saboteurs.length === 0) return;
  if (!resolution.chance(config.environment.sabotageChance)) return;

  const env = world.environment;
  const targets: SabotageTarget[] = [];
  if (env.powerOn) targets.push("power");
  if (env.radioOperational) targets.push("radio");
  if (env.bloodBankIntact) targets.push("bloodBank");
  if (targets.length === 0) return;

  const saboteur = rng.choose(saboteurs);
  const target = rng.choose(targets);
  bus.publish({ type: "Sabotage", payload: { agentId: saboteur.id, target } });

  switch (target) {
    case "power":
      setPower(ctx, false, "sabotage");
      break;
    case "radio":
      env.radioOperational = false;
      break;
    case "bloodBank":
      env.bloodBankIntact = false;
      for (const room of world.map.roomsWithFlag("infirmary")) markBloody(ctx, room.id);
      break;
  }
}

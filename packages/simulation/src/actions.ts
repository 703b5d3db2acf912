import type { SimulationContext } from "./context.js";
import { resolveExchange } from "./systems/combat-system.js";
import { throwItem, throwLanding } from "./systems/distraction.js";
import { checkEndgame } from "./systems/endgame-system.js";
import { moveItem, setBarricade, setPower } from "./systems/environment-system.js";
import { assimilate, checkAssimilation } from "./systems/infection-system.js";
import { cancelCraft, hasAll, queueCraft, startRescueCountdown } from "./systems/job-system.js";
import { relocate } from "./systems/movement.js";
import { isOperational, reviewConsole, sabotageDevice } from "./systems/security-system.js";
import { accuse, interrogate } from "./systems/trust-system.js";
import type { Action, ActionResult, ErrorKind } from "./types.js";
import { samePoint } from "./world/station-map.js";
import type { Agent, AgentId } from "./world/types.js";

const BLOOD_TEST_KIT = ["Scalpel", "Copper Wire"];

interface Rejection {
  ok: false;
  error: ErrorKind;
  reason: string;
}

interface Plan {
  ok: true;
  apply: () => void;
}

function reject(error: ErrorKind, reason: string): Rejection {
  return { ok: false, error, reason };
}

function plan(apply: () => void): Plan {
  return { ok: true, apply };
}

/**
 * Validates an action completely before touching any state, then applies it.
 * A rejected action leaves the world as it was and publishes only
 * ActionRejected.
 */
export function applyAction(ctx: SimulationContext, agentId: AgentId, action: Action): ActionResult {
  const { bus } = ctx;
  const mark = bus.size;

  const result = validate(ctx, agentId, action);
  if (!result.ok) {
    bus.publish({
      type: "ActionRejected",
      payload: { agentId, action: action.kind, error: result.error, reason: result.reason },
    });
    return { accepted: false, events: bus.since(mark), error: result.error, reason: result.reason };
  }

  result.apply();
  checkEndgame(ctx);
  return { accepted: true, events: bus.since(mark) };
}

function validate(ctx: SimulationContext, agentId: AgentId, action: Action): Rejection | Plan {
  const { world } = ctx;
  const actor = world.getAgent(agentId);
  if (!actor) return reject("InvalidTarget", `unknown agent '${agentId}'`);
  if (!actor.alive) return reject("InvalidTarget", `${actor.name} is dead`);
  if (world.outcome) return reject("PreconditionFailed", "the game is over");
  if (actor.restrained) return reject("PreconditionFailed", `${actor.name} is restrained`);
  if (actor.behavior.mode === "Frozen") return reject("PreconditionFailed", `${actor.name} is frozen in panic`);

  const checked = planFor(ctx, actor, action);
  if (!checked.ok) return checked;
  return plan(() => {
    actor.noise = 0;
    checked.apply();
  });
}

/** Looks up a living, co-located agent other than the actor. */
function presentTarget(ctx: SimulationContext, actor: Agent, targetId: AgentId): Agent | Rejection {
  const { world } = ctx;
  const target = world.getAgent(targetId);
  if (!target) return reject("InvalidTarget", `unknown agent '${targetId}'`);
  if (target.id === actor.id) return reject("InvalidTarget", "cannot target oneself");
  if (!target.alive) return reject("InvalidTarget", `${target.name} is dead`);
  if (!world.coLocated(actor, target)) return reject("InvalidTarget", `${target.name} is not here`);
  return target;
}

function isRejection(value: Agent | Rejection): value is Rejection {
  return "ok" in value;
}

function planFor(ctx: SimulationContext, actor: Agent, action: Action): Rejection | Plan {
  const { world, bus, config } = ctx;
  const map = world.map;

  switch (action.kind) {
    case "wait":
      return plan(() => undefined);

    case "move": {
      const { dx, dy } = action;
      if (!Number.isInteger(dx) || !Number.isInteger(dy)) return reject("InvalidTarget", "steps must be whole cells");
      const diagonal = Math.abs(dx) === 1 && Math.abs(dy) === 1;
      if (Math.abs(dx) + Math.abs(dy) !== 1 && !(diagonal && config.ai.diagonals)) {
        return reject("InvalidTarget", "can only step to a neighbouring cell");
      }
      if (actor.posture === "Hiding") return reject("PreconditionFailed", "cannot move while hiding");

      const from = actor.position;
      const to = { x: from.x + dx, y: from.y + dy };
      if (!map.isWalkable(to)) return reject("InvalidTarget", "the way is blocked");
      if (diagonal && (!map.isWalkable({ x: to.x, y: from.y }) || !map.isWalkable({ x: from.x, y: to.y }))) {
        return reject("InvalidTarget", "cannot cut the corner");
      }
      if (!map.canEnter(from, to)) return reject("ResourceExhausted", "the door is barricaded");
      return plan(() => {
        actor.cover = "None";
        relocate(ctx, actor, to);
      });
    }

    case "posture":
      return plan(() => {
        actor.posture = action.posture;
        bus.publish({ type: "PostureChanged", payload: { agentId: actor.id, posture: action.posture } });
      });

    case "takeCover":
      if (world.roomOf(actor) === null) return reject("PreconditionFailed", "there is no cover in a corridor");
      return plan(() => {
        actor.cover = action.cover;
        bus.publish({ type: "CoverTaken", payload: { agentId: actor.id, cover: action.cover } });
      });

    case "pickUp": {
      const roomId = world.roomOf(actor);
      if (roomId === null) return reject("PreconditionFailed", "nothing lies in the corridor");
      const wanted = action.item.toLowerCase();
      const item = map.roomState(roomId)?.items.find((i) => i.toLowerCase() === wanted);
      if (item === undefined) return reject("InvalidTarget", `no ${action.item} here`);
      return plan(() => {
        moveItem(ctx, roomId, item, "take");
        actor.inventory.push(item);
        bus.publish({ type: "ItemPickedUp", payload: { agentId: actor.id, item, roomId } });
      });
    }

    case "drop": {
      const roomId = world.roomOf(actor);
      if (roomId === null) return reject("PreconditionFailed", "items can only be left in a room");
      const wanted = action.item.toLowerCase();
      const index = actor.inventory.findIndex((i) => i.toLowerCase() === wanted);
      if (index === -1) return reject("InvalidTarget", `not carrying ${action.item}`);
      const item = actor.inventory[index];
      return plan(() => {
        actor.inventory.splice(index, 1);
        moveItem(ctx, roomId, item, "put");
        bus.publish({ type: "ItemDropped", payload: { agentId: actor.id, item, roomId } });
      });
    }

    case "attack": {
      const target = presentTarget(ctx, actor, action.targetId);
      if (isRejection(target)) return target;
      return plan(() => {
        resolveExchange(ctx, actor, target);
      });
    }

    case "bloodTest": {
      const target = presentTarget(ctx, actor, action.targetId);
      if (isRejection(target)) return target;
      if (target.revealed) return reject("IllegalTransition", `${target.name} is already revealed`);
      if (!hasAll(actor.inventory, BLOOD_TEST_KIT)) {
        return reject("PreconditionFailed", `a blood test needs ${BLOOD_TEST_KIT.join(" and ")}`);
      }
      if (!world.environment.bloodBankIntact) return reject("PreconditionFailed", "the blood bank is ruined");
      return plan(() => {
        bus.publish({
          type: "BloodTest",
          payload: { testerId: actor.id, subjectId: target.id, positive: target.trueNature === "Infected" },
        });
      });
    }

    case "tagEvidence": {
      const target = presentTarget(ctx, actor, action.targetId);
      if (isRejection(target)) return target;
      return plan(() => {
        bus.publish({ type: "EvidenceTagged", payload: { taggerId: actor.id, subjectId: target.id } });
      });
    }

    case "interrogate": {
      const target = presentTarget(ctx, actor, action.targetId);
      if (isRejection(target)) return target;
      if (target.revealed) return reject("IllegalTransition", `${target.name} cannot be questioned like a human`);
      return plan(() => {
        interrogate(ctx, actor, target);
      });
    }

    case "accuse": {
      const target = presentTarget(ctx, actor, action.targetId);
      if (isRejection(target)) return target;
      if (target.revealed) return reject("IllegalTransition", `${target.name} is already revealed`);
      if (target.restrained) return reject("PreconditionFailed", `${target.name} is already restrained`);
      return plan(() => {
        accuse(ctx, actor, target);
      });
    }

    case "assimilate": {
      const target = world.getAgent(action.targetId);
      if (!target) return reject("InvalidTarget", `unknown agent '${action.targetId}'`);
      const problem = checkAssimilation(world, actor, target);
      if (problem) return reject(problem.error, problem.reason);
      return plan(() => assimilate(ctx, actor, target));
    }

    case "craft": {
      const recipe = ctx.recipes.get(action.recipeId);
      if (!recipe) return reject("InvalidTarget", `unknown recipe '${action.recipeId}'`);
      if (world.jobs.crafting.some((j) => j.agentId === actor.id)) {
        return reject("ResourceExhausted", `${actor.name} is already crafting`);
      }
      if (!hasAll(actor.inventory, recipe.ingredients)) {
        return reject("PreconditionFailed", `${recipe.name} needs ${recipe.ingredients.join(", ")}`);
      }
      return plan(() => queueCraft(ctx, actor, recipe.id, recipe.craftTime));
    }

    case "cancelCraft":
      if (!world.jobs.crafting.some((j) => j.agentId === actor.id)) {
        return reject("PreconditionFailed", "nothing is being crafted");
      }
      return plan(() => {
        cancelCraft(ctx, actor);
      });

    case "sendSos": {
      const roomId = world.roomOf(actor);
      if (roomId === null || !map.hasFlag(roomId, "radio")) return reject("PreconditionFailed", "no radio here");
      if (!world.environment.radioOperational) return reject("PreconditionFailed", "the radio is wrecked");
      if (world.jobs.rescueCountdown !== null) return reject("ResourceExhausted", "an SOS has already gone out");
      return plan(() => startRescueCountdown(ctx, actor));
    }

    case "barricade": {
      const roomId = world.roomOf(actor);
      if (roomId === null) return reject("PreconditionFailed", "only a room can be barricaded");
      const strength = map.roomState(roomId)?.barricade ?? 0;
      if (strength >= config.barricade.maxStrength) return reject("ResourceExhausted", "the barricade is as strong as it gets");
      return plan(() => setBarricade(ctx, actor.id, roomId, strength + 1));
    }

    case "breakBarricade": {
      const state = map.roomState(action.roomId);
      if (!state) return reject("InvalidTarget", `unknown room '${action.roomId}'`);
      const atBarricade =
        world.roomOf(actor) === action.roomId ||
        map.entryPoints(action.roomId).some((p) => samePoint(p, actor.position));
      if (!atBarricade) return reject("InvalidTarget", "not at the barricade");
      if (state.barricade <= 0) return reject("PreconditionFailed", "there is no barricade");
      return plan(() => setBarricade(ctx, actor.id, action.roomId, state.barricade - 1));
    }

    case "restorePower": {
      const roomId = world.roomOf(actor);
      if (roomId === null || !map.hasFlag(roomId, "generator")) return reject("PreconditionFailed", "no generator here");
      if (world.environment.powerOn) return reject("PreconditionFailed", "the power is already on");
      return plan(() => setPower(ctx, true, "repaired"));
    }

    case "throw": {
      const { dx, dy } = action;
      if (!Number.isInteger(dx) || !Number.isInteger(dy) || Math.abs(dx) > 1 || Math.abs(dy) > 1 || (dx === 0 && dy === 0)) {
        return reject("InvalidTarget", "throw toward one of the eight neighbouring cells");
      }
      const wanted = action.item.toLowerCase();
      const index = actor.inventory.findIndex((i) => i.toLowerCase() === wanted);
      if (index === -1) return reject("InvalidTarget", `not carrying ${action.item}`);
      const item = actor.inventory[index];
      const noise = ctx.items.get(item)?.throwNoise;
      if (noise === undefined) return reject("PreconditionFailed", `${item} cannot be thrown`);
      const landing = throwLanding(map, actor.position, dx, dy, config.distraction.throwDistance);
      if (!landing) return reject("InvalidTarget", "there is nowhere for it to land");
      return plan(() => throwItem(ctx, actor, index, landing, noise));
    }

    case "sabotageDevice": {
      const device = ctx.devices.get(action.deviceId);
      if (!device) return reject("InvalidTarget", `unknown device '${action.deviceId}'`);
      if (world.roomOf(actor) !== device.room) return reject("InvalidTarget", "the device is not here");
      if (!isOperational(ctx, device.id)) return reject("PreconditionFailed", "the device is already disabled");
      return plan(() => sabotageDevice(ctx, actor, device));
    }

    case "checkConsole": {
      const roomId = world.roomOf(actor);
      if (roomId === null || !map.hasFlag(roomId, "radio")) return reject("PreconditionFailed", "no security console here");
      return plan(() => reviewConsole(ctx, actor));
    }
  }
}

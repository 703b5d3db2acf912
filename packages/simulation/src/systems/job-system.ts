import type { SimulationContext } from "../context.js";
import { Priority } from "../core/event-bus.js";
import type { Agent, CraftJob } from "../world/types.js";

export function registerJobSystem(ctx: SimulationContext): void {
  ctx.bus.subscribe(["TurnAdvance"], () => runJobSystem(ctx), Priority.Jobs);
}

/** Counts every job down by one turn and settles the ones that reach zero. */
export function runJobSystem(ctx: SimulationContext): void {
  const { world, bus } = ctx;
  const jobs = world.jobs;

  const remaining: CraftJob[] = [];
  for (const job of jobs.crafting) {
    const crafter = world.getAgent(job.agentId);
    if (!crafter?.alive) {
      bus.publish({ type: "CraftCancelled", payload: { agentId: job.agentId, recipeId: job.recipeId, reason: "agentLost" } });
      continue;
    }
    job.turnsRemaining--;
    if (job.turnsRemaining > 0) {
      remaining.push(job);
      continue;
    }
    completeCraft(ctx, crafter, job);
  }
  jobs.crafting = remaining;

  if (jobs.rescueCountdown !== null && !jobs.rescueArrived) {
    jobs.rescueCountdown--;
    if (jobs.rescueCountdown <= 0) {
      jobs.rescueCountdown = 0;
      jobs.rescueArrived = true;
      bus.publish({ type: "RescueArrived", payload: { turn: world.turn } });
    }
  }
}

/** Ingredients leave the inventory only here, when the countdown reaches zero. */
function completeCraft(ctx: SimulationContext, crafter: Agent, job: CraftJob): void {
  const recipe = ctx.recipes.get(job.recipeId);
  if (!recipe || !hasAll(crafter.inventory, recipe.ingredients)) {
    ctx.bus.publish({
      type: "CraftCancelled",
      payload: { agentId: crafter.id, recipeId: job.recipeId, reason: "missingIngredients" },
    });
    return;
  }
  for (const ingredient of recipe.ingredients) {
    crafter.inventory.splice(crafter.inventory.indexOf(ingredient), 1);
  }
  crafter.inventory.push(recipe.name);
  ctx.bus.publish({ type: "CraftCompleted", payload: { agentId: crafter.id, recipeId: recipe.id, item: recipe.name } });
}

export function hasAll(inventory: readonly string[], items: readonly string[]): boolean {
  const pool = [...inventory];
  for (const item of items) {
    const index = pool.indexOf(item);
    if (index === -1) return false;
    pool.splice(index, 1);
  }
  return true;
}

export function queueCraft(ctx: SimulationContext, crafter: Agent, recipeId: string, turns: number): void {
  ctx.world.jobs.crafting.push({ agentId: crafter.id, recipeId, turnsRemaining: turns });
  ctx.bus.publish({ type: "CraftQueued", payload: { agentId: crafter.id, recipeId, turns } });
}

/** Dropping the job is the whole cancellation; nothing was consumed yet. */
export function cancelCraft(ctx: SimulationContext, crafter: Agent): boolean {
  const jobs = ctx.world.jobs;
  const job = jobs.crafting.find((j) => j.agentId === crafter.id);
  if (!job) return false;
  jobs.crafting = jobs.crafting.filter((j) => j !== job);
  ctx.bus.publish({ type: "CraftCancelled", payload: { agentId: crafter.id, recipeId: job.recipeId, reason: "cancelled" } });
  return true;
}

export function startRescueCountdown(ctx: SimulationContext, sender: Agent): void {
  const turns = ctx.config.jobs.rescueTurns;
  ctx.world.jobs.rescueCountdown = turns;
  ctx.bus.publish({ type: "SosSent", payload: { agentId: sender.id, turnsUntilRescue: turns } });
}

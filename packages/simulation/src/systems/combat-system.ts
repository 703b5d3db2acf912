import type { BalanceConfig } from "../balance-config.js";
import type { SimulationContext } from "../context.js";
import type { Agent, ItemDefinition, Skill } from "../world/types.js";

export interface Weapon {
  name: string;
  damage: number;
  skill: Skill;
}

export interface ExchangeResult {
  firstId: string;
  attackerHealth: number;
  defenderHealth: number;
  deaths: string[];
}

const NOISE_OF_COMBAT = 4;

/** Prowess including the bonus a revealed organism fights with. */
export function effectiveProwess(agent: Agent, config: BalanceConfig): number {
  return agent.attributes.Prowess + (agent.revealed ? config.infection.alienProwessBonus : 0);
}

/** Hardest-hitting carried weapon, claws once revealed, otherwise bare hands. */
export function weaponOf(agent: Agent, items: ReadonlyMap<string, ItemDefinition>, config: BalanceConfig): Weapon {
  if (agent.revealed) return { name: "Claws", damage: config.combat.clawDamage, skill: "Melee" };

  let best: Weapon = { name: "Fists", damage: config.combat.unarmedDamage, skill: "Melee" };
  for (const name of agent.inventory) {
    const def = items.get(name);
    if (def?.skill && def.damage > best.damage) best = { name: def.name, damage: def.damage, skill: def.skill };
  }
  return best;
}

/**
 * One exchange of blows. Both sides roll initiative on their Prowess pool,
 * the winner strikes first (the attacker on a tie) and the other strikes
 * back if still standing. Every roll is a plain pool or contest.
 */
export function resolveExchange(ctx: SimulationContext, attacker: Agent, defender: Agent): ExchangeResult {
  const { resolution, bus, config } = ctx;

  const attackerRoll = resolution.rollPool(effectiveProwess(attacker, config), 0);
  const defenderRoll = resolution.rollPool(effectiveProwess(defender, config), 0);
  const [first, second] = defenderRoll > attackerRoll ? [defender, attacker] : [attacker, defender];

  bus.publish({
    type: "Initiative",
    payload: { attackerId: attacker.id, defenderId: defender.id, attackerRoll, defenderRoll, firstId: first.id },
  });

  attacker.noise = NOISE_OF_COMBAT;
  defender.noise = NOISE_OF_COMBAT;

  const deaths: string[] = [];
  strike(ctx, first, second, deaths);
  if (second.alive && first.alive) strike(ctx, second, first, deaths);

  return { firstId: first.id, attackerHealth: attacker.health, defenderHealth: defender.health, deaths };
}

function strike(ctx: SimulationContext, striker: Agent, target: Agent, deaths: string[]): void {
  const { world, resolution, bus, config, items } = ctx;

  const cover = target.cover;
  if (cover === "Full") {
    bus.publish({
      type: "CombatLog",
      payload: {
        strikerId: striker.id,
        targetId: target.id,
        hit: false,
        blocked: true,
        attackSuccesses: 0,
        defenseSuccesses: 0,
        damage: 0,
        targetHealth: target.health,
      },
    });
    return;
  }

  const weapon = weaponOf(striker, items, config);
  let attackPool = effectiveProwess(striker, config) + (striker.skills[weapon.skill] ?? 0);
  if (world.isDarkAt(striker.position)) attackPool -= config.combat.darknessAttackPenalty;
  const defensePool =
    effectiveProwess(target, config) + (target.skills.Melee ?? 0) + config.combat.coverBonus[cover];

  const contest = resolution.contest(resolution.adjustPool(attackPool, 0), defensePool);
  const hit = contest.winner === "A";
  const damage = hit ? weapon.damage + (contest.successesA - contest.successesB) : 0;
  if (hit) target.health = Math.max(0, target.health - damage);

  bus.publish({
    type: "CombatLog",
    payload: {
      strikerId: striker.id,
      targetId: target.id,
      hit,
      blocked: false,
      attackSuccesses: contest.successesA,
      defenseSuccesses: contest.successesB,
      damage,
      targetHealth: target.health,
    },
  });

  if (target.health === 0 && target.alive) {
    target.alive = false;
    deaths.push(target.id);
    bus.publish({
      type: "AgentDeath",
      payload: { agentId: target.id, killerId: striker.id, location: world.locationOf(target) },
    });
  }
}

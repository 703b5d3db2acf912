import type { BalanceConfig } from "./balance-config.js";
import type { Recipe } from "./config/station-config.js";
import type { EventBus } from "./core/event-bus.js";
import type { RandomnessEngine } from "./core/random.js";
import type { ResolutionEngine } from "./core/resolution.js";
import type { DeviceDefinition, ItemDefinition } from "./world/types.js";
import type { World } from "./world/world.js";

/** Passed to every system entry point. There are no module-level singletons. */
export interface SimulationContext {
  readonly world: World;
  readonly rng: RandomnessEngine;
  readonly resolution: ResolutionEngine;
  readonly bus: EventBus;
  readonly config: BalanceConfig;
  readonly items: ReadonlyMap<string, ItemDefinition>;
  readonly recipes: ReadonlyMap<string, Recipe>;
  readonly devices: ReadonlyMap<string, DeviceDefinition>;
  /** Item names station events may hand out. */
  readonly supplies: readonly string[];
}

export { Engine } from "./engine.js";
export type { EngineOptions, RestoreOptions } from "./engine.js";
export {
  BALANCE_CONFIGS,
  BALANCE_EASY,
  BALANCE_HARD,
  BALANCE_NORMAL,
  getBalanceConfig,
  isDifficulty,
} from "./balance-config.js";
export type { BalanceConfig, Difficulty } from "./balance-config.js";
export { loadCrewRoster, loadRecipes, loadStationDefinition } from "./config/station-config.js";
export type { CrewMember, CrewMemberDefinition, Recipe, StationDefinition } from "./config/station-config.js";
export { ConfigError, SimulationError, SnapshotError } from "./core/errors.js";
export { Priority } from "./core/event-bus.js";
export type { EventHandler } from "./core/event-bus.js";
export { SNAPSHOT_VERSION, snapshotSchema } from "./snapshot.js";
export { unreadAlerts } from "./systems/security-system.js";
export type { Snapshot } from "./snapshot.js";
export type {
  Action,
  ActionKind,
  ActionResult,
  ErrorKind,
  EventOf,
  EventPayloads,
  EventType,
  SimulationEvent,
} from "./types.js";
export type {
  Agent,
  AgentId,
  CoverLevel,
  EndingKind,
  GameOutcome,
  InfectionState,
  Point,
  Posture,
  RoomDefinition,
  RoomState,
} from "./world/types.js";
export type { World } from "./world/world.js";

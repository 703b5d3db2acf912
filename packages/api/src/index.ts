export { appRouter, type AppRouter } from "./app-router.js";
export type { Context } from "./trpc.js";
export type { StoredEvent, NewStoredEvent, IEventStore } from "./event-store/types.js";
export { SqliteEventStore } from "./event-store/sqlite-event-store.js";
export { SimulationService } from "./simulation-service.js";
export type {
  AdvanceTurnResult,
  AgentView,
  EventLogQuery,
  RoomView,
  SimulationOptions,
  StateView,
} from "./simulation-service.js";

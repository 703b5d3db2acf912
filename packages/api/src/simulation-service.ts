import { Engine, unreadAlerts } from "@whiteout/simulation";
import type {
  Action,
  ActionResult,
  CoverLevel,
  Difficulty,
  GameOutcome,
  Point,
  Posture,
  SimulationEvent,
  Snapshot,
} from "@whiteout/simulation";
import type { IEventStore, NewStoredEvent, StoredEvent } from "./event-store/types.js";

export interface SimulationOptions {
  seed: string;
  difficulty?: Difficulty;
}

export type PublicNature = "Human" | "Infected" | "Unknown";

/** What the presentation layer may know about an agent. */
export interface AgentView {
  id: string;
  name: string;
  role: string;
  isPlayer: boolean;
  position: Point;
  location: string;
  alive: boolean;
  health: number;
  maxHealth: number;
  stress: number;
  posture: Posture;
  cover: CoverLevel;
  restrained: boolean;
  revealed: boolean;
  nature: PublicNature;
  inventory: string[];
}

export interface RoomView {
  id: string;
  name: string;
  flags: string[];
  dark: boolean;
  frozen: boolean;
  barricade: number;
  bloody: boolean;
  destroyed: boolean;
  items: string[];
  occupants: string[];
}

export interface StateView {
  turn: number;
  hour: number;
  paranoia: number;
  outcome: GameOutcome | null;
  temperature: number;
  effectiveTemperature: number;
  powerOn: boolean;
  rescueCountdown: number | null;
  /** Security log entries nobody has reviewed at a console yet. */
  securityAlerts: number;
}

export interface AdvanceTurnResult {
  turn: number;
  hour: number;
  events: SimulationEvent[];
  outcome: GameOutcome | null;
}

export interface EventLogQuery {
  agentId?: string;
  type?: string;
  fromTurn?: number;
  toTurn?: number;
}

const ACTOR_FIELDS = [
  "agentId",
  "actorId",
  "attackerId",
  "strikerId",
  "testerId",
  "taggerId",
  "interrogatorId",
  "accuserId",
  "observerId",
  "sourceId",
] as const;

const TARGET_FIELDS = ["targetId", "defenderId", "subjectId", "accusedId", "victimId"] as const;

function firstAgentField(payload: Record<string, unknown>, fields: readonly string[]): string | null {
  for (const field of fields) {
    const value = payload[field];
    if (typeof value === "string") return value;
  }
  return null;
}

export function toStoredEvent(event: SimulationEvent): NewStoredEvent {
  const payload: Record<string, unknown> = event.payload;
  return {
    turn: event.turn,
    seq: event.seq,
    type: event.type,
    agentId: firstAgentField(payload, ACTOR_FIELDS),
    targetId: firstAgentField(payload, TARGET_FIELDS),
    payload: event.payload,
  };
}

/**
 * One running game behind the transport layer. Forwards commands to the
 * engine, writes every event it returns to the audit store and shapes
 * read models that keep hidden information hidden.
 */
export class SimulationService {
  private engine: Engine;
  private eventStore: IEventStore;
  private difficulty: Difficulty | undefined;

  constructor(eventStore: IEventStore, options: SimulationOptions) {
    this.eventStore = eventStore;
    this.difficulty = options.difficulty;
    this.engine = new Engine({ seed: options.seed, difficulty: options.difficulty });
    console.log(`SimulationService: new game (seed "${options.seed}", ${options.difficulty ?? "normal"})`);
  }

  get currentTurn(): number {
    return this.engine.turn;
  }

  applyAction(agentId: string, action: Action): ActionResult {
    const result = this.engine.applyAction(agentId, action);
    this.record(result.events);
    if (!result.accepted) {
      console.log(`SimulationService: ${action.kind} by ${agentId} rejected (${result.error}: ${result.reason})`);
    }
    this.logOutcome(result.events);
    return result;
  }

  advanceTurn(): AdvanceTurnResult {
    const events = this.engine.advanceTurn();
    this.record(events);
    this.logOutcome(events);
    return {
      turn: this.engine.turn,
      hour: this.engine.world.hour,
      events,
      outcome: this.engine.outcome,
    };
  }

  snapshot(): Snapshot {
    return this.engine.snapshotState();
  }

  /** Replaces the running game. Throws SnapshotError and keeps the old game on bad input. */
  restore(raw: unknown): StateView {
    const engine = Engine.restore(raw, { difficulty: this.difficulty });
    this.engine = engine;
    this.eventStore.clear();
    console.log(`SimulationService: restored game at turn ${engine.turn}`);
    return this.getState();
  }

  reset(options: SimulationOptions): StateView {
    this.engine = new Engine({ seed: options.seed, difficulty: options.difficulty });
    this.difficulty = options.difficulty;
    this.eventStore.clear();
    console.log(`SimulationService: reset (seed "${options.seed}", ${options.difficulty ?? "normal"})`);
    return this.getState();
  }

  getEventLog(query: EventLogQuery = {}): StoredEvent[] {
    const { agentId, type, fromTurn, toTurn } = query;
    let events: StoredEvent[];
    if (agentId !== undefined) {
      events = this.eventStore.getByAgent(agentId, fromTurn, toTurn);
    } else if (fromTurn !== undefined || toTurn !== undefined) {
      events = this.eventStore.getByTurnRange(fromTurn ?? 0, toTurn ?? this.engine.turn);
    } else if (type !== undefined) {
      return this.eventStore.getByType(type);
    } else {
      return this.eventStore.getAll();
    }
    return type === undefined ? events : events.filter((e) => e.type === type);
  }

  getState(): StateView {
    const world = this.engine.world;
    return {
      turn: world.turn,
      hour: world.hour,
      paranoia: world.paranoia,
      outcome: world.outcome,
      temperature: world.environment.temperature,
      effectiveTemperature: world.effectiveTemperature(),
      powerOn: world.environment.powerOn,
      rescueCountdown: world.jobs.rescueCountdown,
      securityAlerts: unreadAlerts(world.security.log),
    };
  }

  getAgents(): AgentView[] {
    const world = this.engine.world;
    return world.allAgents().map((a) => ({
      id: a.id,
      name: a.name,
      role: a.role,
      isPlayer: a.isPlayer,
      position: { ...a.position },
      location: world.locationOf(a),
      alive: a.alive,
      health: a.health,
      maxHealth: a.maxHealth,
      stress: a.stress,
      posture: a.posture,
      cover: a.cover,
      restrained: a.restrained,
      revealed: a.revealed,
      // Only the player's own nature and exposed organisms are common knowledge.
      nature: a.revealed ? "Infected" : a.isPlayer ? a.trueNature : "Unknown",
      inventory: [...a.inventory],
    }));
  }

  getRooms(): RoomView[] {
    const world = this.engine.world;
    const map = world.map;
    return map.rooms().map((room) => {
      const state = map.roomState(room.id);
      return {
        id: room.id,
        name: room.name,
        flags: [...room.flags],
        dark: state?.dark ?? false,
        frozen: state?.frozen ?? false,
        barricade: state?.barricade ?? 0,
        bloody: state?.bloody ?? false,
        destroyed: state?.destroyed ?? false,
        items: [...(state?.items ?? [])],
        occupants: world.livingAgents().filter((a) => world.roomOf(a) === room.id).map((a) => a.id),
      };
    });
  }

  private record(events: readonly SimulationEvent[]): void {
    if (events.length > 0) this.eventStore.append(events.map(toStoredEvent));
  }

  private logOutcome(events: readonly SimulationEvent[]): void {
    for (const event of events) {
      if (event.type === "GameOver") {
        console.log(`SimulationService: game over at turn ${event.turn} (${event.payload.ending})`);
      }
    }
  }
}

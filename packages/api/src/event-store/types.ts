export interface StoredEvent {
  id: number;
  turn: number;
  seq: number;
  type: string;
  /** The agent who acted or was affected first, when the event names one. */
  agentId: string | null;
  /** The other agent involved, if any. */
  targetId: string | null;
  payload: unknown;
}

export type NewStoredEvent = Omit<StoredEvent, "id">;

export interface IEventStore {
  append(events: NewStoredEvent[]): void;
  getByAgent(agentId: string, fromTurn?: number, toTurn?: number): StoredEvent[];
  getByType(type: string): StoredEvent[];
  getByTurnRange(fromTurn: number, toTurn: number): StoredEvent[];
  getAll(): StoredEvent[];
  clear(): void;
  close(): void;
}

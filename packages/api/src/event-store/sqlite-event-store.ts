import Database from "better-sqlite3";
import { z } from "zod";
import type { IEventStore, NewStoredEvent, StoredEvent } from "./types.js";

const rowSchema = z.object({
  id: z.number().int(),
  turn: z.number().int(),
  seq: z.number().int(),
  type: z.string(),
  agent_id: z.string().nullable(),
  target_id: z.string().nullable(),
  payload: z.string(),
});

export class SqliteEventStore implements IEventStore {
  private db: Database.Database;

  constructor(dbPath: string = ":memory:") {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.init();
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        turn INTEGER NOT NULL,
        seq INTEGER NOT NULL,
        type TEXT NOT NULL,
        agent_id TEXT,
        target_id TEXT,
        payload TEXT NOT NULL
      )
    `);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_events_turn ON events(turn)`);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_events_type ON events(type)`);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_events_agent ON events(agent_id)`);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_events_target ON events(target_id)`);
  }

  append(events: NewStoredEvent[]): void {
    const stmt = this.db.prepare(`
      INSERT INTO events (turn, seq, type, agent_id, target_id, payload)
      VALUES (@turn, @seq, @type, @agentId, @targetId, @payload)
    `);

    const insertMany = this.db.transaction((evts: NewStoredEvent[]) => {
      for (const e of evts) stmt.run({ ...e, payload: JSON.stringify(e.payload) });
    });

    insertMany(events);
  }

  getByAgent(agentId: string, fromTurn?: number, toTurn?: number): StoredEvent[] {
    let sql = `SELECT * FROM events WHERE (agent_id = ? OR target_id = ?)`;
    const params: (string | number)[] = [agentId, agentId];

    if (fromTurn !== undefined) {
      sql += ` AND turn >= ?`;
      params.push(fromTurn);
    }
    if (toTurn !== undefined) {
      sql += ` AND turn <= ?`;
      params.push(toTurn);
    }
    sql += ` ORDER BY seq ASC`;

    return this.db.prepare(sql).all(...params).map(rowToEvent);
  }

  getByType(type: string): StoredEvent[] {
    return this.db.prepare(`SELECT * FROM events WHERE type = ? ORDER BY seq ASC`).all(type).map(rowToEvent);
  }

  getByTurnRange(fromTurn: number, toTurn: number): StoredEvent[] {
    return this.db
      .prepare(`SELECT * FROM events WHERE turn >= ? AND turn <= ? ORDER BY seq ASC`)
      .all(fromTurn, toTurn)
      .map(rowToEvent);
  }

  getAll(): StoredEvent[] {
    return this.db.prepare(`SELECT * FROM events ORDER BY seq ASC`).all().map(rowToEvent);
  }

  clear(): void {
    this.db.exec(`DELETE FROM events`);
  }

  close(): void {
    this.db.close();
  }
}

function rowToEvent(row: unknown): StoredEvent {
  const r = rowSchema.parse(row);
  const payload: unknown = JSON.parse(r.payload);
  return {
    id: r.id,
    turn: r.turn,
    seq: r.seq,
    type: r.type,
    agentId: r.agent_id,
    targetId: r.target_id,
    payload,
  };
}

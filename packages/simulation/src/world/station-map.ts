import { ConfigError } from "../core/errors.js";
import type { StationDefinition } from "../config/station-config.js";
import type { Point, RoomDefinition, RoomFlag, RoomState } from "./types.js";

const WALL = "#";
const CORRIDOR = ".";

export function manhattan(a: Point, b: Point): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function samePoint(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

function cellKey(p: Point): string {
  return `${p.x},${p.y}`;
}

/**
 * Grid of walls, corridor cells and room cells built from an ASCII layout,
 * plus vent links and the mutable per-room state.
 */
export class StationMap {
  readonly width: number;
  readonly height: number;
  private readonly cells: (string | null)[][];
  private readonly roomDefs = new Map<string, RoomDefinition>();
  private readonly states = new Map<string, RoomState>();
  private readonly vents = new Map<string, Point[]>();
  private readonly ventCells: Point[] = [];

  private constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.cells = Array.from({ length: height }, () => Array.from({ length: width }, () => null));
  }

  static fromDefinition(def: StationDefinition): StationMap {
    const map = new StationMap(def.width, def.height);
    if (def.layout.length !== def.height) {
      throw new ConfigError("station", `layout has ${def.layout.length} rows, expected ${def.height}`);
    }

    const byGlyph = new Map(def.rooms.map((r) => [r.glyph, r]));
    const bounds = new Map<string, { x1: number; y1: number; x2: number; y2: number; anchor: Point }>();

    def.layout.forEach((row, y) => {
      if (row.length !== def.width) {
        throw new ConfigError("station", `layout row ${y} has ${row.length} cells, expected ${def.width}`);
      }
      [...row].forEach((glyph, x) => {
        if (glyph === WALL) {
          map.cells[y][x] = WALL;
          return;
        }
        if (glyph === CORRIDOR) return;
        const room = byGlyph.get(glyph);
        if (!room) throw new ConfigError("station", `unknown glyph '${glyph}' at ${x},${y}`);
        map.cells[y][x] = room.id;
        const b = bounds.get(room.id);
        if (!b) {
          bounds.set(room.id, { x1: x, y1: y, x2: x, y2: y, anchor: { x, y } });
        } else {
          b.x1 = Math.min(b.x1, x);
          b.y1 = Math.min(b.y1, y);
          b.x2 = Math.max(b.x2, x);
          b.y2 = Math.max(b.y2, y);
        }
      });
    });

    for (const room of def.rooms) {
      const b = bounds.get(room.id);
      if (!b) throw new ConfigError("station", `room '${room.id}' has no cells in the layout`);
      map.roomDefs.set(room.id, {
        id: room.id,
        name: room.name,
        glyph: room.glyph,
        flags: [...room.flags],
        bounds: { x1: b.x1, y1: b.y1, x2: b.x2, y2: b.y2 },
        anchor: b.anchor,
      });
      map.states.set(room.id, { dark: false, frozen: false, barricade: 0, bloody: false, destroyed: false, items: [] });
    }

    for (const vent of def.vents) {
      const a = { x: vent.a[0], y: vent.a[1] };
      const b = { x: vent.b[0], y: vent.b[1] };
      if (!map.isWalkable(a) || !map.isWalkable(b)) {
        throw new ConfigError("station", `vent ${cellKey(a)} <-> ${cellKey(b)} ends in a wall`);
      }
      map.linkVent(a, b);
      map.linkVent(b, a);
    }

    for (const item of def.items) {
      const state = map.states.get(item.room);
      if (!state) throw new ConfigError("station", `item '${item.name}' placed in unknown room '${item.room}'`);
      state.items.push(item.name);
    }

    return map;
  }

  inBounds(p: Point): boolean {
    return p.x >= 0 && p.y >= 0 && p.x < this.width && p.y < this.height;
  }

  isWalkable(p: Point): boolean {
    return this.inBounds(p) && this.cells[p.y][p.x] !== WALL;
  }

  roomAt(p: Point): string | null {
    if (!this.inBounds(p)) return null;
    const cell = this.cells[p.y][p.x];
    return cell === WALL ? null : cell;
  }

  /** Room id for room cells, the exact cell for corridors. Agents sharing a key are co-located. */
  locationKey(p: Point): string {
    return this.roomAt(p) ?? `cell:${cellKey(p)}`;
  }

  /** Entering a barricaded or destroyed room from outside is not possible. */
  canEnter(from: Point, to: Point): boolean {
    if (!this.isWalkable(to)) return false;
    const target = this.roomAt(to);
    if (target === null || target === this.roomAt(from)) return true;
    const state = this.states.get(target);
    return !!state && state.barricade === 0 && !state.destroyed;
  }

  ventExits(p: Point): readonly Point[] {
    return this.vents.get(cellKey(p)) ?? [];
  }

  ventEndpoints(): readonly Point[] {
    return this.ventCells;
  }

  room(id: string): RoomDefinition | undefined {
    return this.roomDefs.get(id);
  }

  rooms(): RoomDefinition[] {
    return [...this.roomDefs.values()];
  }

  roomState(id: string): RoomState | undefined {
    return this.states.get(id);
  }

  hasFlag(roomId: string, flag: RoomFlag): boolean {
    return this.roomDefs.get(roomId)?.flags.includes(flag) ?? false;
  }

  roomsWithFlag(flag: RoomFlag): RoomDefinition[] {
    return this.rooms().filter((r) => r.flags.includes(flag));
  }

  cellsOf(roomId: string): Point[] {
    const def = this.roomDefs.get(roomId);
    if (!def) return [];
    const out: Point[] = [];
    for (let y = def.bounds.y1; y <= def.bounds.y2; y++) {
      for (let x = def.bounds.x1; x <= def.bounds.x2; x++) {
        if (this.cells[y][x] === roomId) out.push({ x, y });
      }
    }
    return out;
  }

  /** Walkable cells outside the room that touch it orthogonally, in row-major order. */
  entryPoints(roomId: string): Point[] {
    const seen = new Set<string>();
    const out: Point[] = [];
    for (const cell of this.cellsOf(roomId)) {
      for (const [dx, dy] of ORTHOGONAL) {
        const p = { x: cell.x + dx, y: cell.y + dy };
        if (!this.isWalkable(p) || this.roomAt(p) === roomId || seen.has(cellKey(p))) continue;
        seen.add(cellKey(p));
        out.push(p);
      }
    }
    return out.sort((a, b) => a.y - b.y || a.x - b.x);
  }

  /** Rooms that touch this one directly or through a shared corridor cell. */
  adjacentRooms(roomId: string): string[] {
    const found = new Set<string>();
    for (const entry of this.entryPoints(roomId)) {
      const other = this.roomAt(entry);
      if (other !== null) {
        found.add(other);
        continue;
      }
      for (const [dx, dy] of ORTHOGONAL) {
        const neighbor = this.roomAt({ x: entry.x + dx, y: entry.y + dy });
        if (neighbor !== null && neighbor !== roomId) found.add(neighbor);
      }
    }
    return [...this.roomDefs.keys()].filter((id) => found.has(id));
  }

  private linkVent(from: Point, to: Point): void {
    const key = cellKey(from);
    const exits = this.vents.get(key);
    if (exits) {
      exits.push(to);
    } else {
      this.vents.set(key, [to]);
      this.ventCells.push(from);
    }
  }
}

const ORTHOGONAL: readonly (readonly [number, number])[] = [
  [0, -1],
  [1, 0],
  [0, 1],
  [-1, 0],
];

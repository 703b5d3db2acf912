import type { Point } from "../../world/types.js";

/** What the search needs from a map. StationMap satisfies it. */
export interface PathGrid {
  isWalkable(p: Point): boolean;
  canEnter(from: Point, to: Point): boolean;
  ventExits(p: Point): readonly Point[];
  ventEndpoints(): readonly Point[];
}

export interface PathOptions {
  diagonals?: boolean;
}

export interface PathResult {
  /** Every cell from start to goal, both included. */
  path: Point[];
  cost: number;
}

// ── Directions ──

const ORTHOGONAL_DIRS: readonly Point[] = [
  { x: 0, y: -1 },
  { x: 1, y: 0 },
  { x: 0, y: 1 },
  { x: -1, y: 0 },
];

const DIAGONAL_DIRS: readonly Point[] = [
  { x: 1, y: -1 },
  { x: 1, y: 1 },
  { x: -1, y: 1 },
  { x: -1, y: -1 },
];

const NO_HEADING = -1;
const VENT_HEADING = 8;

// ── Priority queue ──

interface Node {
  x: number;
  y: number;
  heading: number;
  steps: number;
  turns: number;
  f: number;
  order: number;
  parent: Node | null;
}

function before(a: Node, b: Node): boolean {
  if (a.f !== b.f) return a.f < b.f;
  if (a.turns !== b.turns) return a.turns < b.turns;
  return a.order < b.order;
}

class NodeHeap {
  private items: Node[] = [];

  get size(): number {
    return this.items.length;
  }

  push(node: Node): void {
    const items = this.items;
    items.push(node);
    let i = items.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!before(items[i], items[parent])) break;
      [items[i], items[parent]] = [items[parent], items[i]];
      i = parent;
    }
  }

  pop(): Node | undefined {
    const items = this.items;
    const top = items[0];
    const last = items.pop();
    if (items.length > 0 && last) {
      items[0] = last;
      let i = 0;
      for (;;) {
        const l = 2 * i + 1;
        const r = l + 1;
        let best = i;
        if (l < items.length && before(items[l], items[best])) best = l;
        if (r < items.length && before(items[r], items[best])) best = r;
        if (best === i) break;
        [items[i], items[best]] = [items[best], items[i]];
        i = best;
      }
    }
    return top;
  }
}

// ── Search ──

/**
 * A* over walkable cells and vent links with unit step cost.
 *
 * Search states are (cell, heading) so that among equally short routes the one
 * with the fewest direction changes wins; remaining ties go to the earliest
 * expanded candidate, so identical inputs give identical paths. Returns null
 * when the goal cannot be reached.
 */
export function findPath(grid: PathGrid, start: Point, goal: Point, options: PathOptions = {}): PathResult | null {
  if (!grid.isWalkable(start) || !grid.isWalkable(goal)) return null;
  if (start.x === goal.x && start.y === goal.y) return { path: [{ ...start }], cost: 0 };

  const diagonals = options.diagonals ?? false;
  const dirs = diagonals ? [...ORTHOGONAL_DIRS, ...DIAGONAL_DIRS] : ORTHOGONAL_DIRS;
  const distance = diagonals ? chebyshev : manhattanDistance;
  const vents = grid.ventEndpoints();
  const goalToVent = nearestVent(goal, vents, distance);

  const heuristic = (p: Point): number => {
    const direct = distance(p, goal);
    if (vents.length === 0) return direct;
    return Math.min(direct, nearestVent(p, vents, distance) + 1 + goalToVent);
  };

  const open = new NodeHeap();
  const closed = new Set<string>();
  let order = 0;
  open.push({ ...start, heading: NO_HEADING, steps: 0, turns: 0, f: heuristic(start), order: order++, parent: null });

  const enqueue = (from: Node, to: Point, heading: number): void => {
    if (closed.has(stateKey(to.x, to.y, heading))) return;
    const turned = from.heading !== NO_HEADING && from.heading !== heading ? 1 : 0;
    const steps = from.steps + 1;
    open.push({
      x: to.x,
      y: to.y,
      heading,
      steps,
      turns: from.turns + turned,
      f: steps + heuristic(to),
      order: order++,
      parent: from,
    });
  };

  while (open.size > 0) {
    const node = open.pop();
    if (!node) break;
    const key = stateKey(node.x, node.y, node.heading);
    if (closed.has(key)) continue;
    closed.add(key);

    if (node.x === goal.x && node.y === goal.y) return { path: unwind(node), cost: node.steps };

    for (let d = 0; d < dirs.length; d++) {
      const dir = dirs[d];
      const next = { x: node.x + dir.x, y: node.y + dir.y };
      if (!grid.canEnter(node, next)) continue;
      if (dir.x !== 0 && dir.y !== 0) {
        // No cutting corners past a wall or a sealed door.
        if (!grid.canEnter(node, { x: node.x + dir.x, y: node.y })) continue;
        if (!grid.canEnter(node, { x: node.x, y: node.y + dir.y })) continue;
      }
      enqueue(node, next, d);
    }

    for (const exit of grid.ventExits(node)) {
      if (grid.canEnter(node, exit)) enqueue(node, exit, VENT_HEADING);
    }
  }

  return null;
}

function unwind(node: Node): Point[] {
  const path: Point[] = [];
  for (let n: Node | null = node; n; n = n.parent) path.push({ x: n.x, y: n.y });
  return path.reverse();
}

function stateKey(x: number, y: number, heading: number): string {
  return `${x},${y},${heading}`;
}

function manhattanDistance(a: Point, b: Point): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

function chebyshev(a: Point, b: Point): number {
  return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}

function nearestVent(p: Point, vents: readonly Point[], distance: (a: Point, b: Point) => number): number {
  let best = Infinity;
  for (const v of vents) best = Math.min(best, distance(p, v));
  return best;
}

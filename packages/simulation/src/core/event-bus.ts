import type { EventDraft, EventType, SimulationEvent } from "../types.js";

/** Dispatch order within a turn. Lower runs first. */
export const Priority = {
  Environment: 100,
  Events: 120,
  Jobs: 150,
  Security: 160,
  Infection: 200,
  Psychology: 300,
  Trust: 350,
  AI: 400,
  Endgame: 500,
  Observer: 1000,
} as const;

export type EventHandler = (event: SimulationEvent) => void;

interface Subscription {
  types: readonly EventType[] | null;
  handler: EventHandler;
  priority: number;
  order: number;
}

/**
 * Synchronous publish/subscribe with a fixed dispatch order.
 *
 * Handlers run in (priority, subscription order). Publishing from inside a
 * handler dispatches the nested event to completion before the outer
 * dispatch continues. Every published event is appended to the log.
 */
export class EventBus {
  private subscriptions: Subscription[] = [];
  private log: SimulationEvent[] = [];
  private nextOrder = 0;
  private nextSeq: number;

  constructor(
    private readonly currentTurn: () => number,
    firstSeq = 0,
  ) {
    this.nextSeq = firstSeq;
  }

  subscribe(types: readonly EventType[], handler: EventHandler, priority: number = Priority.Observer): () => void {
    return this.add({ types: [...types], handler, priority, order: this.nextOrder++ });
  }

  subscribeAll(handler: EventHandler, priority: number = Priority.Observer): () => void {
    return this.add({ types: null, handler, priority, order: this.nextOrder++ });
  }

  publish(draft: EventDraft): SimulationEvent {
    const event: SimulationEvent = Object.freeze({ ...draft, turn: this.currentTurn(), seq: this.nextSeq++ });
    this.log.push(event);

    // Snapshot the list so a handler that subscribes mid-dispatch is not called for this event.
    for (const sub of [...this.subscriptions]) {
      if (sub.types === null || sub.types.includes(event.type)) sub.handler(event);
    }
    return event;
  }

  get events(): readonly SimulationEvent[] {
    return this.log;
  }

  get sequence(): number {
    return this.nextSeq;
  }

  /** Events appended since `mark`, a value previously read from `size`. */
  since(mark: number): SimulationEvent[] {
    return this.log.slice(mark);
  }

  get size(): number {
    return this.log.length;
  }

  private add(sub: Subscription): () => void {
    this.subscriptions.push(sub);
    this.subscriptions.sort((a, b) => a.priority - b.priority || a.order - b.order);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s !== sub);
    };
  }
}

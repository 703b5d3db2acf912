import { describe, it, expect } from "vitest";
import { EventBus, Priority } from "../core/event-bus.js";

describe("EventBus", () => {
  it("stamps events with the current turn and a running sequence", () => {
    let turn = 3;
    const bus = new EventBus(() => turn, 10);
    const first = bus.publish({ type: "TurnAdvance", payload: { turn: 3, hour: 22 } });
    turn = 4;
    const second = bus.publish({ type: "RescueArrived", payload: { turn: 4 } });

    expect([first.turn, first.seq]).toEqual([3, 10]);
    expect([second.turn, second.seq]).toEqual([4, 11]);
    expect(bus.sequence).toBe(12);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it("runs handlers by priority, then by subscription order", () => {
    const bus = new EventBus(() => 0);
    const calls: string[] = [];
    bus.subscribe(["TurnAdvance"], () => calls.push("observer"));
    bus.subscribe(["TurnAdvance"], () => calls.push("ai"), Priority.AI);
    bus.subscribe(["TurnAdvance"], () => calls.push("environment"), Priority.Environment);
    bus.subscribe(["TurnAdvance"], () => calls.push("ai-2"), Priority.AI);

    bus.publish({ type: "TurnAdvance", payload: { turn: 1, hour: 20 } });
    expect(calls).toEqual(["environment", "ai", "ai-2", "observer"]);
  });

  it("finishes a nested event before the outer dispatch continues", () => {
    const bus = new EventBus(() => 0);
    const calls: string[] = [];
    bus.subscribe(
      ["TurnAdvance"],
      () => {
        calls.push("outer-first");
        bus.publish({ type: "RescueArrived", payload: { turn: 1 } });
      },
      Priority.Jobs,
    );
    bus.subscribe(["TurnAdvance"], () => calls.push("outer-second"), Priority.Endgame);
    bus.subscribe(["RescueArrived"], () => calls.push("nested"), Priority.Endgame);

    bus.publish({ type: "TurnAdvance", payload: { turn: 1, hour: 20 } });
    expect(calls).toEqual(["outer-first", "nested", "outer-second"]);
    expect(bus.events.map((e) => e.type)).toEqual(["TurnAdvance", "RescueArrived"]);
  });

  it("only delivers the subscribed types", () => {
    const bus = new EventBus(() => 0);
    const seen: string[] = [];
    bus.subscribe(["RescueArrived"], (e) => seen.push(e.type));
    bus.subscribeAll((e) => seen.push(`all:${e.type}`));

    bus.publish({ type: "TurnAdvance", payload: { turn: 1, hour: 20 } });
    bus.publish({ type: "RescueArrived", payload: { turn: 1 } });
    expect(seen).toEqual(["all:TurnAdvance", "RescueArrived", "all:RescueArrived"]);
  });

  it("stops delivering after unsubscribe", () => {
    const bus = new EventBus(() => 0);
    let count = 0;
    const off = bus.subscribe(["RescueArrived"], () => count++);
    bus.publish({ type: "RescueArrived", payload: { turn: 1 } });
    off();
    bus.publish({ type: "RescueArrived", payload: { turn: 2 } });
    expect(count).toBe(1);
  });

  it("returns the events appended since a mark", () => {
    const bus = new EventBus(() => 0);
    bus.publish({ type: "RescueArrived", payload: { turn: 1 } });
    const mark = bus.size;
    bus.publish({ type: "TurnAdvance", payload: { turn: 2, hour: 21 } });
    expect(bus.since(mark).map((e) => e.type)).toEqual(["TurnAdvance"]);
  });
});

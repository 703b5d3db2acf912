import { describe, it, expect } from "vitest";
import { throwLanding } from "../systems/distraction.js";
import { agent, crewMember, testEngine } from "./fixtures.js";

function station() {
  const engine = testEngine([
    crewMember("p", "alpha", { isPlayer: true }),
    crewMember("n", "bravo"),
    crewMember("far", "alpha"),
    crewMember("thing", "bravo", { infected: true }),
  ]);
  agent(engine, "p").position = { x: 2, y: 0 };
  agent(engine, "p").inventory.push("Whiskey", "Scalpel");
  agent(engine, "n").position = { x: 8, y: 2 };
  agent(engine, "far").position = { x: 0, y: 2 };
  return engine;
}

describe("throwLanding", () => {
  it("flies the full distance over open floor, diagonals included", () => {
    const engine = station();
    expect(throwLanding(engine.world.map, { x: 2, y: 0 }, 1, 0, 4)).toEqual({ x: 6, y: 0 });
    expect(throwLanding(engine.world.map, { x: 2, y: 0 }, 1, 1, 4)).toEqual({ x: 4, y: 2 });
  });

  it("drops before a wall and finds nowhere when the first cell is blocked", () => {
    const engine = station();
    expect(throwLanding(engine.world.map, { x: 2, y: 1 }, 1, 0, 4)).toEqual({ x: 3, y: 1 });
    expect(throwLanding(engine.world.map, { x: 0, y: 0 }, -1, 0, 4)).toBeNull();
  });
});

describe("throwing an item", () => {
  it("lands in the room it reaches and sends NPCs within earshot to the noise", () => {
    const engine = station();

    const result = engine.applyAction("p", { kind: "throw", item: "whiskey", dx: 1, dy: 0 });

    expect(result.accepted).toBe(true);
    expect(result.events.map((e) => e.payload)).toEqual([
      { agentId: "p", item: "Whiskey", landing: { x: 6, y: 0 }, location: "bravo", noise: 4 },
    ]);
    expect(agent(engine, "p").inventory).toEqual(["Scalpel"]);
    expect(engine.world.map.roomState("bravo")?.items).toEqual(["Rope", "Whiskey", "Whiskey"]);

    const searching = { mode: "Searching", targetId: null, waypoint: { x: 6, y: 0 }, turnsRemaining: 3 };
    expect(agent(engine, "n").behavior).toEqual(searching);
    expect(agent(engine, "thing").behavior).toEqual(searching);
    expect(agent(engine, "far").behavior.mode).toBe("Scheduled");
  });

  it("loses an item that comes down in a corridor", () => {
    const engine = station();
    agent(engine, "p").position = { x: 2, y: 1 };

    const result = engine.applyAction("p", { kind: "throw", item: "Whiskey", dx: 1, dy: 0 });

    expect(result.events[0]?.payload).toMatchObject({ landing: { x: 3, y: 1 }, location: "cell:3,1" });
    expect(engine.world.map.roomState("alpha")?.items).toEqual(["Scalpel", "Copper Wire"]);
    expect(engine.world.map.roomState("bravo")?.items).toEqual(["Rope", "Whiskey"]);
  });

  it("stops at a barricaded door", () => {
    const engine = station();
    agent(engine, "n").position = { x: 6, y: 0 };
    expect(engine.applyAction("n", { kind: "barricade" }).accepted).toBe(true);

    const result = engine.applyAction("p", { kind: "throw", item: "Whiskey", dx: 1, dy: 0 });

    expect(result.events[0]?.payload).toMatchObject({ landing: { x: 5, y: 0 }, location: "cell:5,0" });
  });

  it("leaves panicked and hunting NPCs alone", () => {
    const engine = station();
    agent(engine, "n").behavior = { mode: "Fleeing", targetId: null, waypoint: { x: 8, y: 0 }, turnsRemaining: 2 };

    engine.applyAction("p", { kind: "throw", item: "Whiskey", dx: 1, dy: 0 });

    expect(agent(engine, "n").behavior.mode).toBe("Fleeing");
  });

  it("refuses items that are missing or cannot be thrown and bad directions", () => {
    const engine = station();
    expect(engine.applyAction("p", { kind: "throw", item: "Rope", dx: 1, dy: 0 })).toMatchObject({
      error: "InvalidTarget",
      reason: "not carrying Rope",
    });
    expect(engine.applyAction("p", { kind: "throw", item: "Scalpel", dx: 1, dy: 0 })).toMatchObject({
      error: "PreconditionFailed",
      reason: "Scalpel cannot be thrown",
    });
    expect(engine.applyAction("p", { kind: "throw", item: "Whiskey", dx: 0, dy: 0 })).toMatchObject({
      error: "InvalidTarget",
    });
    expect(engine.applyAction("p", { kind: "throw", item: "Whiskey", dx: 2, dy: 0 })).toMatchObject({
      error: "InvalidTarget",
    });
    expect(agent(engine, "p").inventory).toEqual(["Whiskey", "Scalpel"]);
  });

  it("needs somewhere for the item to land", () => {
    const engine = station();
    agent(engine, "p").position = { x: 0, y: 0 };
    expect(engine.applyAction("p", { kind: "throw", item: "Whiskey", dx: -1, dy: 0 })).toMatchObject({
      error: "InvalidTarget",
      reason: "there is nowhere for it to land",
    });
  });
});

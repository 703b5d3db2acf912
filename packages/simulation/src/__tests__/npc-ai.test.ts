import { describe, it, expect } from "vitest";
import { Priority } from "../core/event-bus.js";
import { canObserve, flankingPoints } from "../systems/ai/detection.js";
import { inWindow, resolveDestination, scheduledRoom } from "../systems/ai/npc-ai.js";
import { agent, crewMember, quietConfig, testEngine } from "./fixtures.js";

const STEADY = { Prowess: 2, Logic: 2, Influence: 2, Resolve: 10 };

describe("schedules", () => {
  it("matches plain and overnight windows", () => {
    const day = { start: 8, end: 16, room: "alpha" };
    expect(inWindow(day, 8)).toBe(true);
    expect(inWindow(day, 15)).toBe(true);
    expect(inWindow(day, 16)).toBe(false);

    const night = { start: 22, end: 6, room: "bravo" };
    expect(inWindow(night, 23)).toBe(true);
    expect(inWindow(night, 3)).toBe(true);
    expect(inWindow(night, 12)).toBe(false);

    expect(inWindow({ start: 0, end: 0, room: "alpha" }, 13)).toBe(true);
  });

  it("takes the first window that covers the hour", () => {
    const schedule = [
      { start: 8, end: 16, room: "alpha" },
      { start: 16, end: 8, room: "bravo" },
    ];
    expect(scheduledRoom(schedule, 9)).toBe("alpha");
    expect(scheduledRoom(schedule, 19)).toBe("bravo");
    expect(scheduledRoom([], 19)).toBeNull();
  });

  it("falls back to the nearest habitat room when the scheduled one is destroyed", () => {
    const engine = testEngine([
      crewMember("n", "alpha", { habitat: ["alpha", "bravo"] }),
      crewMember("thing", "bravo", { infected: true }),
    ]);
    const n = agent(engine, "n");
    expect(resolveDestination(engine.world, n, "alpha")).toBe("alpha");

    const alpha = engine.world.map.roomState("alpha");
    if (alpha) alpha.destroyed = true;
    expect(resolveDestination(engine.world, n, "alpha")).toBe("bravo");

    n.habitat = ["alpha"];
    expect(resolveDestination(engine.world, n, "alpha")).toBeNull();
  });

  it("walks an NPC to its scheduled room one cell per turn", () => {
    const engine = testEngine([
      crewMember("n", "alpha", { attributes: STEADY, schedule: [{ start: 0, end: 0, room: "bravo" }] }),
      crewMember("thing", "bravo", { infected: true }),
    ]);

    engine.advanceTurn();
    expect(agent(engine, "n").position).toEqual({ x: 1, y: 0 });

    for (let i = 0; i < 5; i++) engine.advanceTurn();
    expect(agent(engine, "n").position).toEqual({ x: 6, y: 0 });
    expect(engine.world.roomOf(agent(engine, "n"))).toBe("bravo");

    engine.advanceTurn();
    expect(agent(engine, "n").position).toEqual({ x: 6, y: 0 });
  });
});

describe("hostile behavior", () => {
  it("sends a revealed organism after the nearest human", () => {
    const engine = testEngine([
      crewMember("h", "alpha", { attributes: STEADY }),
      crewMember("thing", "bravo", { infected: true }),
    ]);
    agent(engine, "thing").revealed = true;

    engine.advanceTurn();

    const thing = agent(engine, "thing");
    expect(thing.position).toEqual({ x: 5, y: 0 });
    expect(thing.behavior).toMatchObject({ mode: "Hunting", targetId: "h" });
  });

  it("attacks a human sharing its location", () => {
    const engine = testEngine(
      [crewMember("h", "alpha", { attributes: STEADY }), crewMember("thing", "alpha", { infected: true })],
      quietConfig((c) => (c.infection.lightBaseChance = 0)),
    );
    agent(engine, "thing").revealed = true;

    const events = engine.advanceTurn();

    const initiative = events.find((e) => e.type === "Initiative");
    expect(initiative?.payload).toMatchObject({ attackerId: "thing", defenderId: "h" });
  });
});

describe("detection", () => {
  it("sees within a room but not through walls between rooms", () => {
    const engine = testEngine([
      crewMember("a", "alpha"),
      crewMember("b", "alpha"),
      crewMember("c", "bravo", { infected: true }),
    ]);
    const world = engine.world;
    expect(canObserve(world, agent(engine, "a"), agent(engine, "b"), 2)).toBe(true);
    expect(canObserve(world, agent(engine, "a"), agent(engine, "c"), 20)).toBe(false);

    agent(engine, "b").position = { x: 4, y: 0 };
    expect(canObserve(world, agent(engine, "a"), agent(engine, "b"), 4)).toBe(true);
    expect(canObserve(world, agent(engine, "a"), agent(engine, "b"), 3)).toBe(false);
  });

  it("picks the two entry points furthest apart", () => {
    const engine = testEngine([crewMember("thing", "alpha", { infected: true })]);
    const map = engine.world.map;
    expect(flankingPoints(map, { x: 0, y: 0 })).toEqual([
      { x: 3, y: 0 },
      { x: 3, y: 2 },
    ]);
    expect(flankingPoints(map, { x: 4, y: 0 })).toEqual([
      { x: 5, y: 0 },
      { x: 3, y: 0 },
    ]);
  });

  it("has a carrier that spots the player call the others to flank", () => {
    const config = quietConfig((c) => {
      c.stealth.baseDetectionRate = 1;
      c.ai.broadcastChance = 1;
    });
    const engine = testEngine(
      [
        crewMember("p", "alpha", { isPlayer: true, attributes: STEADY }),
        crewMember("spotter", "alpha", { infected: true }),
        crewMember("ally", "bravo", { infected: true }),
      ],
      config,
    );

    const events = engine.advanceTurn();

    const report = events.find((e) => e.type === "DetectionReport");
    expect(report?.payload).toEqual({ observerId: "spotter", subjectId: "p", detected: true, probability: 1 });
    const broadcast = events.find((e) => e.type === "AlertBroadcast");
    expect(broadcast?.payload).toEqual({
      sourceId: "spotter",
      targetId: "p",
      recipients: ["ally"],
      entryPoints: [
        { x: 3, y: 0 },
        { x: 3, y: 2 },
      ],
    });
    expect(agent(engine, "spotter").behavior).toEqual({ mode: "Pursuing", targetId: "p", waypoint: null, turnsRemaining: 5 });
    expect(agent(engine, "ally").behavior).toEqual({
      mode: "Flanking",
      targetId: "p",
      waypoint: { x: 3, y: 0 },
      turnsRemaining: 10,
    });
  });

  it("has a human that spots the player raise a station alert and then cool down", () => {
    const engine = testEngine(
      [
        crewMember("p", "alpha", { isPlayer: true, attributes: STEADY }),
        crewMember("h", "alpha", { attributes: STEADY }),
        crewMember("thing", "bravo", { infected: true }),
      ],
      quietConfig((c) => (c.stealth.baseDetectionRate = 1)),
    );

    const first = engine.advanceTurn();
    expect(first.find((e) => e.type === "StationAlert")?.payload).toEqual({ observerId: "h", subjectId: "p", turns: 10 });
    expect(engine.world.ai.alertTurns).toBe(10);

    expect(engine.advanceTurn().some((e) => e.type === "DetectionReport")).toBe(false);
    expect(engine.advanceTurn().some((e) => e.type === "DetectionReport")).toBe(false);
    expect(engine.world.ai.alertTurns).toBe(8);
    expect(engine.advanceTurn().some((e) => e.type === "DetectionReport")).toBe(true);
  });
});

describe("panic reactions", () => {
  function panicking() {
    return testEngine([
      crewMember("p", "alpha", { isPlayer: true }),
      crewMember("x", "alpha"),
      crewMember("near", "alpha"),
      crewMember("thing", "bravo", { infected: true }),
    ]);
  }

  it("sends scheduled NPCs within earshot to search", () => {
    const engine = panicking();
    engine.context.bus.publish({ type: "PanicReport", payload: { agentId: "x", effect: "Scream", victimId: null } });

    const searching = { mode: "Searching", targetId: "x", waypoint: { x: 0, y: 0 }, turnsRemaining: 5 };
    expect(agent(engine, "near").behavior).toEqual(searching);
    expect(agent(engine, "thing").behavior).toEqual(searching);
    expect(agent(engine, "p").behavior.mode).toBe("Scheduled");
  });

  it("freezes the agent so it cannot act", () => {
    const engine = panicking();
    engine.context.bus.publish({ type: "PanicReport", payload: { agentId: "x", effect: "Freeze", victimId: null } });

    expect(engine.applyAction("x", { kind: "wait" })).toMatchObject({ accepted: false, error: "PreconditionFailed" });
  });

  it("keeps a player frozen by a turn's panic out of the next action window", () => {
    const engine = panicking();
    let fired = false;
    engine.context.bus.subscribe(
      ["TurnAdvance"],
      () => {
        if (fired) return;
        fired = true;
        engine.context.bus.publish({ type: "PanicReport", payload: { agentId: "p", effect: "Freeze", victimId: null } });
      },
      Priority.Psychology,
    );

    engine.advanceTurn();
    expect(engine.applyAction("p", { kind: "wait" })).toMatchObject({ accepted: false, error: "PreconditionFailed" });

    engine.advanceTurn();
    expect(agent(engine, "p").behavior.mode).toBe("Scheduled");
    expect(engine.applyAction("p", { kind: "wait" }).accepted).toBe(true);
  });

  it("sends an NPC panicking in a corridor toward an open cell", () => {
    const engine = panicking();
    agent(engine, "x").position = { x: 4, y: 0 };

    engine.context.bus.publish({ type: "PanicReport", payload: { agentId: "x", effect: "Flee", victimId: null } });

    const behavior = agent(engine, "x").behavior;
    expect(behavior).toMatchObject({ mode: "Fleeing", targetId: null, turnsRemaining: engine.context.config.ai.fleeTurns });
    expect([{ x: 3, y: 0 }, { x: 5, y: 0 }]).toContainEqual(behavior.waypoint);
  });

  it("makes the agent drop what it carries first", () => {
    const engine = panicking();
    engine.applyAction("x", { kind: "pickUp", item: "Scalpel" });
    const mark = engine.context.bus.size;

    engine.context.bus.publish({ type: "PanicReport", payload: { agentId: "x", effect: "DropItem", victimId: null } });

    expect(engine.context.bus.since(mark).map((e) => e.type)).toEqual(["PanicReport", "ItemDropped"]);
    expect(agent(engine, "x").inventory).toEqual([]);
    expect(engine.world.map.roomState("alpha")?.items).toContain("Scalpel");
  });
});

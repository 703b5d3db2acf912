import { describe, it, expect } from "vitest";
import { hasAll } from "../systems/job-system.js";
import { agent, crewMember, testEngine } from "./fixtures.js";

const STEADY = { Prowess: 2, Logic: 2, Influence: 2, Resolve: 10 };

function station() {
  return testEngine([
    crewMember("p", "bravo", { isPlayer: true, attributes: STEADY }),
    crewMember("n", "bravo"),
    crewMember("thing", "alpha", { infected: true }),
  ]);
}

function eventsOf(events: readonly { type: string }[], type: string) {
  return events.filter((e) => e.type === type);
}

describe("hasAll", () => {
  it("counts duplicates", () => {
    expect(hasAll(["Rope", "Rope"], ["Rope", "Rope"])).toBe(true);
    expect(hasAll(["Rope"], ["Rope", "Rope"])).toBe(false);
    expect(hasAll([], [])).toBe(true);
  });
});

describe("crafting", () => {
  it("produces the item once the craft time has passed", () => {
    const engine = station();
    engine.applyAction("p", { kind: "pickUp", item: "rope" });
    const queued = engine.applyAction("p", { kind: "craft", recipeId: "noose" });

    expect(queued.events.map((e) => e.payload)).toEqual([{ agentId: "p", recipeId: "noose", turns: 2 }]);
    expect(agent(engine, "p").inventory).toEqual(["Rope"]);

    expect(eventsOf(engine.advanceTurn(), "CraftCompleted")).toEqual([]);
    const completed = eventsOf(engine.advanceTurn(), "CraftCompleted");
    expect(completed.map((e) => e.type)).toEqual(["CraftCompleted"]);
    expect(agent(engine, "p").inventory).toEqual(["Noose"]);
    expect(engine.world.jobs.crafting).toEqual([]);
  });

  it("cancels when an ingredient is gone at completion", () => {
    const engine = station();
    engine.applyAction("p", { kind: "pickUp", item: "Rope" });
    engine.applyAction("p", { kind: "craft", recipeId: "noose" });
    engine.applyAction("p", { kind: "drop", item: "Rope" });

    engine.advanceTurn();
    const cancelled = engine.advanceTurn().find((e) => e.type === "CraftCancelled");

    expect(cancelled?.payload).toEqual({ agentId: "p", recipeId: "noose", reason: "missingIngredients" });
    expect(agent(engine, "p").inventory).toEqual([]);
  });

  it("drops the job of a crafter who died", () => {
    const engine = station();
    engine.applyAction("n", { kind: "pickUp", item: "Rope" });
    engine.applyAction("n", { kind: "craft", recipeId: "noose" });
    const crafter = agent(engine, "n");
    crafter.health = 0;
    crafter.alive = false;

    const cancelled = engine.advanceTurn().find((e) => e.type === "CraftCancelled");

    expect(cancelled?.payload).toEqual({ agentId: "n", recipeId: "noose", reason: "agentLost" });
    expect(engine.world.jobs.crafting).toEqual([]);
  });

  it("allows one job per agent and cancels it on request", () => {
    const engine = station();
    engine.applyAction("p", { kind: "pickUp", item: "Rope" });
    engine.applyAction("p", { kind: "craft", recipeId: "noose" });

    expect(engine.applyAction("p", { kind: "craft", recipeId: "noose" })).toMatchObject({
      accepted: false,
      error: "ResourceExhausted",
    });

    const cancelled = engine.applyAction("p", { kind: "cancelCraft" });
    expect(cancelled.events.map((e) => e.payload)).toEqual([{ agentId: "p", recipeId: "noose", reason: "cancelled" }]);
    expect(agent(engine, "p").inventory).toEqual(["Rope"]);
    expect(engine.applyAction("p", { kind: "cancelCraft" })).toMatchObject({
      accepted: false,
      error: "PreconditionFailed",
    });
  });

  it("rejects unknown recipes and missing ingredients", () => {
    const engine = station();
    expect(engine.applyAction("p", { kind: "craft", recipeId: "flamethrower" })).toMatchObject({
      accepted: false,
      error: "InvalidTarget",
    });
    expect(engine.applyAction("p", { kind: "craft", recipeId: "noose" })).toMatchObject({
      accepted: false,
      error: "PreconditionFailed",
    });
  });
});

describe("rescue", () => {
  it("arrives after the countdown and ends the game in victory", () => {
    const engine = station();
    const sos = engine.applyAction("p", { kind: "sendSos" });
    expect(sos.events.map((e) => e.payload)).toEqual([{ agentId: "p", turnsUntilRescue: 20 }]);

    for (let i = 0; i < 19; i++) engine.advanceTurn();
    expect(engine.outcome).toBeNull();
    expect(engine.world.jobs.rescueCountdown).toBe(1);

    const last = engine.advanceTurn();
    expect(last.filter((e) => e.type === "RescueArrived" || e.type === "GameOver").map((e) => e.payload)).toEqual([
      { turn: 20 },
      { ending: "Rescued", victory: true },
    ]);
    expect(engine.outcome).toEqual({ ending: "Rescued", victory: true, turn: 20 });
    expect(engine.advanceTurn()).toEqual([]);
  });

  it("accepts a single SOS", () => {
    const engine = station();
    engine.applyAction("p", { kind: "sendSos" });
    expect(engine.applyAction("p", { kind: "sendSos" })).toMatchObject({ accepted: false, error: "ResourceExhausted" });
  });
});

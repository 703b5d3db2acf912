import { describe, it, expect } from "vitest";
import { ConfigError } from "../core/errors.js";
import { Engine } from "../engine.js";
import type { SimulationEvent } from "../types.js";
import { crewMember, quietConfig, testEngine } from "./fixtures.js";

function play(seed: string, turns: number): Engine {
  const engine = new Engine({ seed });
  for (let i = 0; i < turns; i++) engine.advanceTurn();
  return engine;
}

describe("Engine", () => {
  it("replays the same seed into the same event log", () => {
    const a = play("replay", 12);
    const b = play("replay", 12);
    expect(JSON.stringify(b.eventLog)).toBe(JSON.stringify(a.eventLog));
  });

  it("replays actions that draw randomness between turns", () => {
    const script = (seed: string): Engine => {
      const engine = testEngine(
        [
          crewMember("p", "alpha", { isPlayer: true }),
          crewMember("n", "alpha"),
          crewMember("v", "alpha"),
          crewMember("thing", "bravo", { infected: true }),
        ],
        quietConfig(),
        seed,
      );
      for (let i = 0; i < 6; i++) {
        engine.applyAction("p", { kind: "attack", targetId: "n" });
        engine.applyAction("p", { kind: "interrogate", targetId: "v" });
        engine.applyAction("v", { kind: "accuse", targetId: "n" });
        engine.advanceTurn();
      }
      return engine;
    };

    const a = script("action-replay");
    const b = script("action-replay");
    expect(a.eventLog.some((e) => e.type === "Initiative")).toBe(true);
    expect(JSON.stringify(b.eventLog)).toBe(JSON.stringify(a.eventLog));
  });

  it("diverges for a different seed", () => {
    const a = play("replay", 12);
    const b = play("another", 12);
    expect(JSON.stringify(b.eventLog)).not.toBe(JSON.stringify(a.eventLog));
  });

  it("seeds the configured number of carriers among the non-player crew", () => {
    for (const seed of ["one", "two", "three"]) {
      const engine = new Engine({ seed });
      const infected = engine.world.allAgents().filter((a) => a.trueNature === "Infected");
      expect(infected).toHaveLength(2);
      expect(infected.some((a) => a.isPlayer)).toBe(false);
      expect(engine.world.player()?.trueNature).toBe("Human");
    }
    const hard = new Engine({ seed: "one", difficulty: "hard" });
    expect(hard.world.allAgents().filter((a) => a.trueNature === "Infected")).toHaveLength(3);
  });

  it("starts everyone at their room's anchor with full health and mask", () => {
    const engine = new Engine({ seed: "one" });
    const player = engine.getAgent("macready");
    expect(player).toMatchObject({ position: { x: 5, y: 5 }, health: 10, disguiseIntegrity: 100, stress: 0 });
    expect(engine.getAgent("nobody")).toBeUndefined();
  });

  it("advances the clock from the evening start hour", () => {
    const engine = testEngine([crewMember("a", "alpha"), crewMember("thing", "bravo", { infected: true })]);
    let last: SimulationEvent[] = [];
    for (let i = 0; i < 6; i++) last = engine.advanceTurn();

    expect(last[0]).toMatchObject({ type: "TurnAdvance", turn: 6, payload: { turn: 6, hour: 1 } });
    expect(engine.world.hour).toBe(1);
  });

  it("runs observers after every system has finished the turn", () => {
    const engine = testEngine([crewMember("a", "alpha"), crewMember("thing", "bravo", { infected: true })]);
    const seen: number[] = [];
    const unsubscribe = engine.subscribe(["TurnAdvance"], () => seen.push(engine.context.bus.size));

    engine.advanceTurn();
    expect(seen).toEqual([engine.context.bus.size]);

    unsubscribe();
    engine.advanceTurn();
    expect(seen).toHaveLength(1);
  });

  it("stops once the game is over", () => {
    const engine = testEngine([crewMember("p", "alpha", { isPlayer: true })]);
    const events = engine.advanceTurn();

    expect(events.at(-1)?.payload).toEqual({ ending: "StationCleansed", victory: true });
    expect(engine.outcome).toEqual({ ending: "StationCleansed", victory: true, turn: 1 });
    expect(engine.advanceTurn()).toEqual([]);
    expect(engine.turn).toBe(1);
  });

  it("refuses a crew it cannot place", () => {
    expect(() =>
      testEngine([crewMember("a", "alpha", { isPlayer: true }), crewMember("b", "alpha", { isPlayer: true })]),
    ).toThrow(new ConfigError("crew", "more than one player"));
    expect(() => testEngine([crewMember("a", "alpha"), crewMember("a", "bravo")])).toThrow(
      new ConfigError("crew", "duplicate id 'a'"),
    );
    expect(() => testEngine([crewMember("a", "hangar")])).toThrow(
      new ConfigError("crew", "a: unknown start room 'hangar'"),
    );
  });

  it("honours explicit infection flags over random seeding", () => {
    const engine = testEngine(
      [crewMember("a", "alpha"), crewMember("b", "alpha", { infected: true }), crewMember("c", "bravo")],
      quietConfig((c) => (c.infection.initialInfected = 2)),
    );
    expect(engine.world.allAgents().map((a) => a.trueNature)).toEqual(["Human", "Infected", "Human"]);
  });
});

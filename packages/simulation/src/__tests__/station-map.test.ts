import { describe, it, expect } from "vitest";
import { loadStationDefinition } from "../config/station-config.js";
import { ConfigError } from "../core/errors.js";
import { StationMap } from "../world/station-map.js";
import { TEST_STATION } from "./fixtures.js";

describe("StationMap", () => {
  const map = StationMap.fromDefinition(loadStationDefinition());

  it("resolves rooms, corridors and walls", () => {
    expect(map.roomAt({ x: 0, y: 0 })).toBe("infirmary");
    expect(map.roomAt({ x: 4, y: 0 })).toBeNull();
    expect(map.locationKey({ x: 4, y: 0 })).toBe("cell:4,0");
    expect(map.locationKey({ x: 6, y: 6 })).toBe("rec_room");
    expect(map.isWalkable({ x: 12, y: 5 })).toBe(false);
    expect(map.isWalkable({ x: 20, y: 0 })).toBe(false);
  });

  it("anchors each room on its first cell", () => {
    expect(map.room("rec_room")?.anchor).toEqual({ x: 5, y: 5 });
    expect(map.room("generator")?.anchor).toEqual({ x: 15, y: 15 });
  });

  it("lists entry points in row-major order", () => {
    const entries = map.entryPoints("lab");
    expect(entries).toHaveLength(14);
    expect(entries[0]).toEqual({ x: 10, y: 10 });
    expect(entries[4]).toEqual({ x: 9, y: 11 });
    expect(entries[13]).toEqual({ x: 13, y: 14 });
  });

  it("finds rooms that share a corridor", () => {
    expect(map.adjacentRooms("infirmary")).toEqual(["mess_hall", "sleeping_quarters"]);
  });

  it("links vents both ways", () => {
    expect(map.ventExits({ x: 0, y: 0 })).toEqual([{ x: 13, y: 13 }]);
    expect(map.ventExits({ x: 13, y: 13 })).toEqual([{ x: 0, y: 0 }]);
  });

  it("places the starting items", () => {
    expect(map.roomState("rec_room")?.items).toEqual(["Whiskey", "Flamethrower"]);
  });

  it("keeps a barricaded room shut from outside only", () => {
    const small = StationMap.fromDefinition(TEST_STATION);
    const state = small.roomState("alpha");
    if (!state) throw new Error("alpha missing");
    state.barricade = 1;
    expect(small.canEnter({ x: 3, y: 0 }, { x: 2, y: 0 })).toBe(false);
    expect(small.canEnter({ x: 2, y: 0 }, { x: 3, y: 0 })).toBe(true);
    expect(small.canEnter({ x: 1, y: 0 }, { x: 2, y: 0 })).toBe(true);
  });

  it("rejects layouts that do not match their dimensions", () => {
    expect(() => StationMap.fromDefinition({ ...TEST_STATION, height: 4 })).toThrow(ConfigError);
    expect(() => StationMap.fromDefinition({ ...TEST_STATION, layout: ["AAA...BBB", "AAA.#.BB", "AAA...BBB"] })).toThrow(
      ConfigError,
    );
  });

  it("rejects unknown glyphs and vents into walls", () => {
    expect(() => StationMap.fromDefinition({ ...TEST_STATION, layout: ["AAA...BBB", "AAA.X.BBB", "AAA...BBB"] })).toThrow(
      ConfigError,
    );
    expect(() =>
      StationMap.fromDefinition({ ...TEST_STATION, vents: [{ a: [0, 0], b: [4, 1] }] }),
    ).toThrow(ConfigError);
  });
});

import { describe, expect, it } from "vitest";
import { createSequentialIdGenerator } from "@/lib/midi/ids";
import { addCcPoint, createCcLane, drawCcValue, removeCcPoint, setCcType, updateCcPoint } from "./cc-lane.reducer";

describe("cc lane reducer", () => {
  it("keeps points sorted by time and clamps values", () => {
    let lane = createCcLane();
    lane = addCcPoint(lane, { id: "b", time: 2, value: 1.4 });
    lane = addCcPoint(lane, { id: "a", time: -1, value: 0.5 });
    expect(lane.points).toEqual([
      { id: "a", time: 0, value: 0.5 },
      { id: "b", time: 2, value: 1 },
    ]);
  });

  it("clears the points when the controller type changes", () => {
    const lane = addCcPoint(createCcLane("modWheel"), { id: "a", time: 0, value: 0.5 });
    expect(setCcType(lane, "modWheel")).toBe(lane);
    expect(setCcType(lane, "pan")).toEqual({ ccType: "pan", points: [] });
  });

  it("updates and re-sorts a point", () => {
    let lane = createCcLane();
    lane = addCcPoint(lane, { id: "a", time: 0, value: 0 });
    lane = addCcPoint(lane, { id: "b", time: 1, value: 0 });
    lane = updateCcPoint(lane, "a", { time: 3, value: -2 });
    expect(lane.points.map((p) => [p.id, p.time, p.value])).toEqual([
      ["b", 1, 0],
      ["a", 3, 0],
    ]);
  });

  it("removes a point", () => {
    const lane = addCcPoint(createCcLane(), { id: "a", time: 0, value: 0 });
    expect(removeCcPoint(lane, "a").points).toEqual([]);
  });

  it("replaces the value at an existing time when drawing", () => {
    const ids = createSequentialIdGenerator("p");
    let lane = drawCcValue(createCcLane(), 1, 0.2, ids);
    lane = drawCcValue(lane, 1, 0.8, ids);
    lane = drawCcValue(lane, 2, 0.4, ids);
    expect(lane.points).toEqual([
      { id: "p1", time: 1, value: 0.8 },
      { id: "p2", time: 2, value: 0.4 },
    ]);
  });
});

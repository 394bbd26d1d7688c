import { describe, expect, it } from "vitest";
import type { CcLane } from "@/lib/audio/types";
import { ccCenterValue, ccValueAt, fromRawCcValue, toRawCcValue } from "./cc";

describe("raw CC values", () => {
  it("maps the unit range onto the controller range", () => {
    expect(toRawCcValue("modWheel", 0)).toBe(0);
    expect(toRawCcValue("modWheel", 1)).toBe(127);
    expect(toRawCcValue("pitchBend", 0)).toBe(-8192);
    expect(toRawCcValue("pitchBend", 1)).toBe(8191);
    expect(fromRawCcValue("volume", 127)).toBe(1);
  });

  it("clamps out-of-range input", () => {
    expect(toRawCcValue("pan", 2)).toBe(127);
    expect(toRawCcValue("pan", -1)).toBe(0);
  });
});

describe("ccValueAt", () => {
  const lane: CcLane = {
    ccType: "expression",
    points: [
      { id: "p1", time: 1, value: 0.2 },
      { id: "p2", time: 3, value: 0.6 },
    ],
  };

  it("interpolates linearly between points", () => {
    expect(ccValueAt(lane, 2)).toBeCloseTo(0.4);
  });

  it("holds the first and last values outside the points", () => {
    expect(ccValueAt(lane, 0)).toBe(0.2);
    expect(ccValueAt(lane, 10)).toBe(0.6);
  });

  it("returns the controller centre for an empty lane", () => {
    expect(ccValueAt({ ccType: "modWheel", points: [] }, 2)).toBe(ccCenterValue("modWheel"));
    expect(ccCenterValue("modWheel")).toBeCloseTo(63 / 127);
  });
});

import { describe, expect, it } from "vitest";
import { beatToX, createCoordinates, pitchToY, xToBeat, yToPitch } from "./coords";

describe("geometry", () => {
  it("maps beats and pixels linearly", () => {
    expect(beatToX(2.5, 80)).toBe(200);
    expect(xToBeat(200, 80)).toBe(2.5);
  });

  it("inverts the pitch axis", () => {
    expect(pitchToY(127, 16, 127)).toBe(0);
    expect(pitchToY(60, 16, 127)).toBe(1072);
    expect(yToPitch(1072, 16, 127)).toBe(60);
    expect(yToPitch(1087.9, 16, 127)).toBe(60);
    expect(yToPitch(1088, 16, 127)).toBe(59);
  });

  it("round-trips the top edge of every row", () => {
    for (let p = 0; p <= 127; p++) {
      expect(yToPitch(pitchToY(p, 12, 127), 12, 127)).toBe(p);
    }
  });
});

describe("createCoordinates", () => {
  it("applies the scroll offsets", () => {
    const c = createCoordinates({ pixelsPerBeat: 100, pixelsPerNote: 10, scrollX: 50, scrollY: 600 }, 127);
    expect(c.xToBeat(50)).toBe(1);
    expect(c.beatToX(1)).toBe(50);
    expect(c.yToPitch(0)).toBe(67);
    expect(c.pitchToY(67)).toBe(0);
  });

  it("clamps pitches on request", () => {
    const c = createCoordinates({ pixelsPerBeat: 100, pixelsPerNote: 10, scrollX: 0, scrollY: 0 }, 127);
    expect(c.yToPitch(5000)).toBe(-373);
    expect(c.yToPitchClamped(5000)).toBe(0);
    expect(c.yToPitchClamped(-20)).toBe(127);
  });
});

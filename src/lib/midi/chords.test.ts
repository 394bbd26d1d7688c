import { describe, expect, it } from "vitest";
import { DEFAULT_CHORD, chordDisplayName, chordPitches, maxInversion } from "./chords";

describe("chordPitches", () => {
  it("builds a root-position triad at the requested octave", () => {
    expect(chordPitches(DEFAULT_CHORD)).toEqual([60, 64, 67]);
    expect(chordPitches({ root: "A", type: "minor", inversion: 0, octave: 3 })).toEqual([57, 60, 64]);
  });

  it("raises the lowest note an octave per inversion", () => {
    expect(chordPitches({ ...DEFAULT_CHORD, inversion: 1 })).toEqual([64, 67, 72]);
    expect(chordPitches({ ...DEFAULT_CHORD, inversion: 2 })).toEqual([67, 72, 76]);
  });

  it("keeps extended intervals above the octave", () => {
    expect(chordPitches({ root: "C", type: "add9", inversion: 0, octave: 4 })).toEqual([60, 64, 67, 74]);
  });
});

describe("chord naming", () => {
  it("includes the inversion when there is one", () => {
    expect(chordDisplayName(DEFAULT_CHORD)).toBe("C Maj");
    expect(chordDisplayName({ root: "F#", type: "minor7", inversion: 1, octave: 4 })).toBe("F# Min7 (1st inv)");
  });

  it("reports the highest inversion", () => {
    expect(maxInversion("dominant7")).toBe(3);
  });
});

import { describe, expect, it } from "vitest";
import type { MidiNote } from "@/lib/audio/types";
import { createCoordinates } from "./coords";
import { findNoteAt, findNoteSpanning, getHitAt, getLoopMarkerAt } from "./hit";

// 100 px per beat, 10 px per row, pitch 60 row spans y ∈ [670, 680)
const coords = createCoordinates({ pixelsPerBeat: 100, pixelsPerNote: 10, scrollX: 0, scrollY: 0 }, 127);

function note(id: string, pitch: number, time: number, duration: number): MidiNote {
  return { id, pitch, time, duration, velocity: 100, selected: false };
}

describe("getHitAt", () => {
  const notes = [note("a", 60, 1, 2)]; // x ∈ [100, 300]

  it("detects the note body", () => {
    expect(getHitAt(200, 675, notes, coords, 9)).toEqual({ type: "note", noteId: "a" });
  });

  it("gives edges priority over the body", () => {
    expect(getHitAt(105, 675, notes, coords, 9)).toEqual({ type: "resize", noteId: "a", edge: "left" });
    expect(getHitAt(295, 675, notes, coords, 9)).toEqual({ type: "resize", noteId: "a", edge: "right" });
  });

  it("accepts the band just outside the note", () => {
    expect(getHitAt(305, 675, notes, coords, 9)).toEqual({ type: "resize", noteId: "a", edge: "right" });
  });

  it("requires the pointer to be on the note row for edges", () => {
    expect(getHitAt(105, 665, notes, coords, 9)).toEqual({ type: "empty" });
  });

  it("returns empty elsewhere", () => {
    expect(getHitAt(500, 675, notes, coords, 9)).toEqual({ type: "empty" });
  });
});

describe("note lookups", () => {
  const notes = [note("a", 60, 0, 1), note("b", 64, 2, 2)];

  it("finds a note by beat and row, end excluded", () => {
    expect(findNoteAt(notes, 0.5, 60)?.id).toBe("a");
    expect(findNoteAt(notes, 1, 60)).toBeNull();
    expect(findNoteAt(notes, 0.5, 61)).toBeNull();
  });

  it("finds a note spanning a beat at any pitch", () => {
    expect(findNoteSpanning(notes, 3)?.id).toBe("b");
    expect(findNoteSpanning(notes, 2)).toBeNull();
  });
});

describe("getLoopMarkerAt", () => {
  const loop = { start: 1, end: 5 };

  it("checks the start and end markers within the radius", () => {
    expect(getLoopMarkerAt(95, loop, coords, 10)).toBe("start");
    expect(getLoopMarkerAt(508, loop, coords, 10)).toBe("end");
  });

  it("falls back to the region between the markers", () => {
    expect(getLoopMarkerAt(300, loop, coords, 10)).toBe("middle");
    expect(getLoopMarkerAt(700, loop, coords, 10)).toBeNull();
  });
});

import { describe, expect, it } from "vitest";
import { noteEnd, type MidiNote } from "@/lib/audio/types";
import {
  autoExtendClipLength,
  autoExtendLoop,
  autoExtendLoopForNotes,
  cloneClip,
  clipContentEqual,
  clipsEqual,
  createMidiClip,
  removeNotes,
  selectInRect,
  selectOnly,
  setLoopLength,
  sliceNote,
  toggleNoteSelection,
  type LoopLimits,
} from "./midi-clip.reducer";

const limits: LoopLimits = { minLength: 0.25, maxLength: 256, beatsPerBar: 4 };

function note(id: string, pitch: number, time: number, duration: number, selected = false): MidiNote {
  return { id, pitch, time, duration, velocity: 100, selected };
}

describe("createMidiClip", () => {
  it("defaults to a one-bar loop with the clip length following it", () => {
    const clip = createMidiClip({ id: "c", trackId: "t" });
    expect(clip).toMatchObject({ loopStart: 0, loopLength: 4, lengthBeats: 4, notes: [] });
  });
});

describe("cloneClip / equality", () => {
  it("copies notes so snapshots share nothing with the live clip", () => {
    const clip = createMidiClip({ id: "c", trackId: "t", notes: [note("a", 60, 0, 1)] });
    const copy = cloneClip(clip);
    expect(copy.notes[0]).not.toBe(clip.notes[0]);
    expect(clipsEqual(copy, clip)).toBe(true);
  });

  it("ignores selection in content equality only", () => {
    const a = createMidiClip({ id: "c", trackId: "t", notes: [note("a", 60, 0, 1)] });
    const b = createMidiClip({ id: "c", trackId: "t", notes: [note("a", 60, 0, 1, true)] });
    expect(clipsEqual(a, b)).toBe(false);
    expect(clipContentEqual(a, b)).toBe(true);
  });
});

describe("sliceNote", () => {
  const clip = createMidiClip({ id: "c", trackId: "t", notes: [note("a", 60, 1, 2)] });

  it("splits strictly inside and conserves the interval", () => {
    const next = sliceNote(clip, "a", 2.5, ["l", "r"]);
    expect(next).not.toBeNull();
    const notes = next?.notes ?? [];
    expect(notes.map((n) => n.id)).toEqual(["l", "r"]);
    const [left, right] = notes;
    expect(left.time).toBe(1);
    expect(noteEnd(left)).toBe(right.time);
    expect(noteEnd(right)).toBe(3);
  });

  it("rejects a beat on or outside the boundaries", () => {
    expect(sliceNote(clip, "a", 1, ["l", "r"])).toBeNull();
    expect(sliceNote(clip, "a", 3, ["l", "r"])).toBeNull();
    expect(sliceNote(clip, "a", 4, ["l", "r"])).toBeNull();
    expect(sliceNote(clip, "missing", 2, ["l", "r"])).toBeNull();
  });
});

describe("selection", () => {
  const clip = createMidiClip({
    id: "c",
    trackId: "t",
    notes: [note("a", 60, 0, 1, true), note("b", 62, 1, 1), note("c", 64, 2, 1, true)],
  });

  it("toggles one note and deselects the others when exclusive", () => {
    const next = toggleNoteSelection(clip, "b", true);
    expect(next.notes.map((n) => n.selected)).toEqual([false, true, false]);
  });

  it("keeps the others when not exclusive", () => {
    const next = toggleNoteSelection(clip, "a", false);
    expect(next.notes.map((n) => n.selected)).toEqual([false, false, true]);
  });

  it("selects exactly the given ids", () => {
    expect(selectOnly(clip, new Set(["b"])).notes.map((n) => n.selected)).toEqual([false, true, false]);
  });

  it("removes notes by id", () => {
    expect(removeNotes(clip, new Set(["a", "c"])).notes.map((n) => n.id)).toEqual(["b"]);
  });
});

describe("selectInRect", () => {
  const clip = createMidiClip({ id: "c", trackId: "t", notes: [note("a", 60, 2, 2)] });

  it("selects on partial time overlap with the pitch inside", () => {
    const next = selectInRect(clip, { beatA: 3, beatB: 5, pitchA: 59, pitchB: 61 });
    expect(next.notes[0].selected).toBe(true);
  });

  it("does not select when the intervals only touch", () => {
    const next = selectInRect(clip, { beatA: 4, beatB: 5, pitchA: 59, pitchB: 61 });
    expect(next.notes[0].selected).toBe(false);
  });

  it("accepts reversed corners", () => {
    const next = selectInRect(clip, { beatA: 5, beatB: 3, pitchA: 61, pitchB: 59 });
    expect(next.notes[0].selected).toBe(true);
  });

  it("requires the pitch to be in the span", () => {
    const next = selectInRect(clip, { beatA: 0, beatB: 8, pitchA: 61, pitchB: 70 });
    expect(next.notes[0].selected).toBe(false);
  });
});

describe("loop length", () => {
  const clip = createMidiClip({ id: "c", trackId: "t", loopLength: 4 });

  it("clamps to [grid, max] and syncs the clip length", () => {
    expect(setLoopLength(clip, 0.1, limits)).toMatchObject({ loopLength: 0.25, lengthBeats: 0.25 });
    expect(setLoopLength(clip, 300, limits)).toMatchObject({ loopLength: 256, lengthBeats: 256 });
    expect(setLoopLength(clip, 6, limits)).toMatchObject({ loopLength: 6, lengthBeats: 6 });
  });

  it("auto-extends to the next multiple of four beats", () => {
    expect(autoExtendLoop(clip, 4.5, limits)).toMatchObject({ loopLength: 8, lengthBeats: 8 });
    expect(autoExtendLoop(clip, 9, limits)).toMatchObject({ loopLength: 12, lengthBeats: 12 });
  });

  it("never shrinks the loop", () => {
    expect(autoExtendLoop(clip, 4, limits)).toBe(clip);
    expect(autoExtendLoop(clip, 1, limits)).toBe(clip);
  });

  it("caps the extension at the maximum", () => {
    expect(autoExtendLoop(clip, 300, limits).loopLength).toBe(256);
  });

  it("extends for the latest end among several notes", () => {
    const next = autoExtendLoopForNotes(clip, [note("a", 60, 0, 1), note("b", 60, 6, 3)], limits);
    expect(next.loopLength).toBe(12);
  });

  it("grows only the clip length to the bar containing an end", () => {
    expect(autoExtendClipLength(clip, 5, 4)).toMatchObject({ loopLength: 4, lengthBeats: 8 });
    expect(autoExtendClipLength(clip, 3, 4)).toBe(clip);
  });
});

import { afterEach, describe, expect, it, vi } from "vitest";
import { noteEnd } from "@/lib/audio/types";
import { note, setupEditor, xOf, yOf } from "./test-helpers";

describe("editing scenarios", () => {
  it("creates a snapped, selected note on a click (scenario 1)", () => {
    const { editor, notes, click, calls } = setupEditor();
    click(xOf(0) + 10, yOf(60));

    expect(notes()).toEqual([{ id: "n1", pitch: 60, velocity: 100, time: 0, duration: 1, selected: true }]);
    expect(editor.getClip().loopLength).toBe(4);
    expect(editor.commandLog.undoLabel).toBe("Add note");
    expect(calls).toEqual(["on track-1 60 100", "off track-1 60 64"]);
  });

  it("stretches, undoes and redoes the note (scenarios 2 and 3)", () => {
    const { editor, notes, click } = setupEditor();
    click(xOf(0) + 10, yOf(60));

    expect(editor.applyStretch(2)).toBe(true);
    expect(notes()[0]).toMatchObject({ time: 0, duration: 2 });
    expect(editor.commandLog.undoHistory).toEqual(["Stretch notes", "Add note"]);

    expect(editor.undo()).toBe(true);
    expect(notes()[0]).toMatchObject({ time: 0, duration: 1 });
    expect(editor.commandLog.redoLabel).toBe("Stretch notes");

    expect(editor.redo()).toBe(true);
    expect(notes()[0]).toMatchObject({ time: 0, duration: 2 });
  });

  it("slices the created note into two halves (scenario 4)", () => {
    const { editor, notes, click } = setupEditor();
    click(xOf(0) + 10, yOf(60));

    expect(editor.sliceNote("n1", 0.5)).toBe(true);
    const [left, right] = notes();
    expect(notes().map((n) => n.id)).toEqual(["n2", "n3"]);
    expect([left.time, noteEnd(left)]).toEqual([0, 0.5]);
    expect([right.time, noteEnd(right)]).toEqual([0.5, 1]);
    expect(editor.commandLog.undoLabel).toBe("Slice note");
  });

  it("auto-extends the loop to the next bar (scenario 5)", () => {
    const { editor, click } = setupEditor({ loopLength: 4 });
    click(xOf(3.5) + 1, yOf(60));

    const clip = editor.getClip();
    expect(clip.notes[0]).toMatchObject({ time: 3.5, duration: 1 });
    expect(clip.loopLength).toBe(8);
    expect(clip.lengthBeats).toBe(8);
  });

  it("box-selects by overlap without pushing a command (scenario 6)", () => {
    const { editor, notes, drag } = setupEditor({ notes: [note("a", 60, 0, 2), note("b", 60, 5, 1)] });
    editor.setStickyTool("select");
    drag({ x: xOf(1), y: yOf(62) }, { x: xOf(3), y: yOf(58) });

    expect(notes().map((n) => n.selected)).toEqual([true, false]);
    expect(editor.commandLog.canUndo).toBe(false);
  });
});

describe("pointer gestures", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("moves a note with snap, retuning the audition", () => {
    const { editor, notes, drag, calls } = setupEditor({ notes: [note("a", 60, 1, 1)] });
    drag({ x: 150, y: yOf(60) }, { x: 255, y: yOf(60) - 20 });

    expect(notes()[0]).toMatchObject({ id: "a", time: 2, pitch: 62, selected: true });
    expect(editor.commandLog.undoLabel).toBe("Move note");
    expect(calls).toEqual(["on track-1 60 100", "off track-1 60 64", "on track-1 62 100", "off track-1 62 64"]);

    editor.undo();
    expect(notes()[0]).toMatchObject({ time: 1, pitch: 60, selected: false });
  });

  it("moves the whole selection with shift bypassing the snap", () => {
    const { editor, notes, drag, setModifiers } = setupEditor({
      notes: [note("a", 60, 1, 1, true), note("b", 64, 2, 1, true)],
    });
    setModifiers({ shift: true });
    drag({ x: 150, y: yOf(60) }, { x: 255, y: yOf(60) });

    expect(notes()[0].time).toBeCloseTo(2.05);
    expect(notes()[1].time).toBeCloseTo(3.05);
    expect(editor.commandLog.undoLabel).toBe("Move 2 notes");
  });

  it("keeps moved notes at or after beat 0", () => {
    const { notes, drag } = setupEditor({ notes: [note("a", 60, 1, 1)] });
    drag({ x: 150, y: yOf(60) }, { x: -150, y: yOf(60) });
    expect(notes()[0].time).toBe(0);
  });

  it("extends the loop when a note is dragged past it", () => {
    const { editor, drag } = setupEditor({ notes: [note("a", 60, 3, 1)] });
    drag({ x: 350, y: yOf(60) }, { x: 650, y: yOf(60) });
    expect(editor.getClip().notes[0].time).toBe(6);
    expect(editor.getClip().loopLength).toBe(8);
  });

  it("snaps moved pitches to the scale when scale-lock is on", () => {
    const { editor, notes, drag } = setupEditor({ notes: [note("a", 60, 1, 1)] });
    editor.setScale({ root: "C", type: "major" });
    editor.setScaleLock(true);
    // C# is equidistant from C and D: the lower one wins
    drag({ x: 150, y: yOf(60) }, { x: 150, y: yOf(61) });
    expect(notes()[0].pitch).toBe(60);
    expect(editor.commandLog.canUndo).toBe(false);
  });

  it("pushes nothing when a drag ends where it started", () => {
    const { editor, drag } = setupEditor({ notes: [note("a", 60, 1, 1, true)] });
    drag({ x: 150, y: yOf(60) }, { x: 170, y: yOf(60) }, { x: 150, y: yOf(60) });
    expect(editor.commandLog.canUndo).toBe(false);
  });

  it("toggles selection on a click, shift keeping the others", () => {
    const { notes, click, setModifiers } = setupEditor({
      notes: [note("a", 60, 0, 1), note("b", 64, 2, 1, true)],
    });
    click(50, yOf(60));
    expect(notes().map((n) => n.selected)).toEqual([true, false]);

    setModifiers({ shift: true });
    click(250, yOf(64));
    expect(notes().map((n) => n.selected)).toEqual([true, true]);
    click(50, yOf(60));
    expect(notes().map((n) => n.selected)).toEqual([false, true]);
  });

  it("deselects everything on a click in empty space with the select tool", () => {
    const { editor, notes, click } = setupEditor({ notes: [note("a", 60, 0, 1, true)] });
    editor.setStickyTool("select");
    click(500, yOf(70));
    expect(notes()[0].selected).toBe(false);
    expect(notes()).toHaveLength(1);
  });

  it("resizes from the right edge with a one-grid minimum", () => {
    const { editor, notes, drag } = setupEditor({ notes: [note("a", 60, 1, 1)] });
    drag({ x: 198, y: yOf(60) }, { x: 260, y: yOf(60) });
    expect(notes()[0]).toMatchObject({ time: 1, duration: 1.5 });
    expect(editor.commandLog.undoLabel).toBe("Resize note");
    expect(editor.store.getState().lastNoteDuration).toBe(1.5);

    drag({ x: 248, y: yOf(60) }, { x: 90, y: yOf(60) });
    expect(notes()[0].duration).toBe(0.25);
  });

  it("resizes from the left edge keeping the end fixed", () => {
    const { notes, drag } = setupEditor({ notes: [note("a", 60, 1, 1)] });
    drag({ x: 102, y: yOf(60) }, { x: 52, y: yOf(60) });
    expect(notes()[0]).toMatchObject({ time: 0.5, duration: 1.5 });
  });

  it("uses the last resized duration for new notes", () => {
    const { notes, drag, click } = setupEditor({ notes: [note("a", 60, 1, 1)] });
    drag({ x: 198, y: yOf(60) }, { x: 260, y: yOf(60) });
    click(xOf(4) + 5, yOf(72));
    expect(notes()[1]).toMatchObject({ pitch: 72, time: 4, duration: 1.5 });
  });

  it("erases every note crossed while alt is held, once each", () => {
    const { editor, notes, drag, setModifiers, onToolModeChanged } = setupEditor({
      notes: [note("a", 60, 0, 1), note("b", 60, 2, 1), note("c", 72, 0, 1)],
    });
    setModifiers({ alt: true });
    expect(onToolModeChanged).toHaveBeenLastCalledWith("eraser");

    drag({ x: 50, y: yOf(60) }, { x: 250, y: yOf(60) }, { x: 260, y: yOf(60) });
    expect(notes().map((n) => n.id)).toEqual(["c"]);
    expect(editor.commandLog.undoHistory).toEqual(["Delete 2 notes"]);

    setModifiers({});
    expect(onToolModeChanged).toHaveBeenLastCalledWith("draw");
  });

  it("duplicates a note by ctrl-dragging it", () => {
    const { editor, notes, drag, setModifiers } = setupEditor({ notes: [note("a", 60, 1, 1)] });
    setModifiers({ ctrlOrCmd: true });
    drag({ x: 150, y: yOf(60) }, { x: 350, y: yOf(60) });

    expect(notes()).toEqual([
      { id: "a", pitch: 60, velocity: 100, time: 1, duration: 1, selected: false },
      { id: "n1", pitch: 60, velocity: 100, time: 3, duration: 1, selected: true },
    ]);
    expect(editor.commandLog.undoLabel).toBe("Duplicate note");

    editor.undo();
    expect(notes().map((n) => n.id)).toEqual(["a"]);
  });

  it("clones in place on a duplicate-tool click", () => {
    const { editor, notes, click } = setupEditor({ notes: [note("a", 60, 1, 1)] });
    editor.setStickyTool("duplicate");
    click(150, yOf(60));
    expect(notes().map((n) => [n.id, n.time, n.selected])).toEqual([
      ["a", 1, false],
      ["n1", 1, false],
    ]);
    expect(editor.commandLog.undoLabel).toBe("Duplicate note");
  });

  it("slices the note spanning the beat on a ctrl-click in empty space", () => {
    const { editor, notes, click, setModifiers } = setupEditor({ notes: [note("a", 60, 0, 2)] });
    setModifiers({ ctrlOrCmd: true });
    click(xOf(1), yOf(70));
    expect(notes().map((n) => [n.id, n.time, n.duration])).toEqual([
      ["n1", 0, 1],
      ["n2", 1, 1],
    ]);
    expect(editor.commandLog.undoLabel).toBe("Slice note");
  });

  it("slices at the snapped beat with the slice tool", () => {
    const { editor, notes, click } = setupEditor({ notes: [note("a", 60, 0, 1)] });
    editor.setStickyTool("slice");
    click(60, yOf(60));
    expect(notes().map((n) => [n.time, n.duration])).toEqual([
      [0, 0.5],
      [0.5, 0.5],
    ]);
  });

  it("moves a just-created note when the click turns into a drag", () => {
    const { editor, notes, drag } = setupEditor();
    drag({ x: 10, y: yOf(60) }, { x: 210, y: yOf(60) });
    expect(notes()).toHaveLength(1);
    expect(notes()[0]).toMatchObject({ id: "n1", time: 2 });
    expect(editor.commandLog.undoHistory).toEqual(["Move note", "Add note"]);
  });

  it("paints notes along the drag when painting is enabled", () => {
    const { editor, notes, drag } = setupEditor({ config: { paintOnDrag: true } });
    drag({ x: 10, y: yOf(60) }, { x: 350, y: yOf(60) });
    expect(notes().map((n) => n.time)).toEqual([0, 1, 2, 3]);
    expect(editor.commandLog.undoHistory).toEqual(["Paint 3 notes", "Add note"]);
  });

  it("stamps a chord on the clicked row and releases the preview later", () => {
    vi.useFakeTimers();
    const { editor, notes, click, calls } = setupEditor();
    editor.toggleChordPalette();
    click(10, yOf(62));

    expect(notes().map((n) => n.pitch)).toEqual([62, 66, 69]);
    expect(notes().every((n) => n.selected && n.time === 0)).toBe(true);
    expect(editor.commandLog.undoLabel).toBe("Add chord");
    expect(calls).toEqual(["on track-1 62 100", "on track-1 66 100", "on track-1 69 100"]);

    vi.advanceTimersByTime(500);
    expect(calls.slice(3)).toEqual(["off track-1 62 64", "off track-1 66 64", "off track-1 69 64"]);
  });

  it("treats pointer cancel like pointer up", () => {
    const { editor, notes } = setupEditor({ notes: [note("a", 60, 1, 1)] });
    editor.pointerDown({ x: 150, y: yOf(60) });
    editor.pointerMove({ x: 250, y: yOf(60) });
    editor.pointerCancel();
    expect(notes()[0].time).toBe(2);
    expect(editor.commandLog.undoLabel).toBe("Move note");
    expect(editor.store.getState().session).toEqual({ kind: "idle" });
  });

  it("edits velocities in the lane as one command", () => {
    const { editor, notes } = setupEditor({ notes: [note("a", 60, 0, 1), note("b", 64, 2, 1)] });
    editor.velocityLane.pointerDown({ x: 50, y: 25 });
    editor.velocityLane.pointerMove({ x: 250, y: 50 });
    editor.pointerUp();

    expect(notes().map((n) => n.velocity)).toEqual([95, 64]);
    expect(editor.commandLog.undoHistory).toEqual(["Change velocity"]);
  });

  it("blocks undo while a gesture is in progress", () => {
    const { editor } = setupEditor();
    editor.pointerDown({ x: 10, y: yOf(60) });
    expect(editor.undo()).toBe(false);
    editor.pointerUp();
    expect(editor.undo()).toBe(true);
    expect(editor.getClip().notes).toEqual([]);
  });
});

describe("host integration", () => {
  it("notifies the host on commits and on undo", () => {
    const { editor, onClipUpdated } = setupEditor();
    editor.addNote(0, 60);
    expect(onClipUpdated).toHaveBeenCalledTimes(1);
    editor.undo();
    expect(onClipUpdated).toHaveBeenCalledTimes(2);
    expect(onClipUpdated).toHaveBeenLastCalledWith(expect.objectContaining({ notes: [] }));
  });

  it("mirrors the history state in the store", () => {
    const { editor } = setupEditor();
    editor.addNote(0, 60);
    expect(editor.store.getState().history).toEqual({
      canUndo: true,
      canRedo: false,
      undoLabel: "Add note",
      redoLabel: null,
    });
  });

  it("keeps editing without an audio engine", () => {
    const { notes, click } = setupEditor({ engine: null });
    click(10, yOf(60));
    expect(notes()).toHaveLength(1);
  });

  it("clears the history when another clip is loaded", () => {
    const { editor } = setupEditor();
    editor.addNote(0, 60);
    editor.loadClip({ ...editor.getClip(), id: "clip-2", notes: [] });
    expect(editor.commandLog.canUndo).toBe(false);
    expect(editor.getClip().id).toBe("clip-2");
  });
});

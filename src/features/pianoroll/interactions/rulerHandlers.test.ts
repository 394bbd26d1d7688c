import { describe, expect, it } from "vitest";
import { note, setupEditor, yOf } from "../test-helpers";

describe("ruler handlers", () => {
  it("places the insert marker on a click", () => {
    const { editor } = setupEditor();
    editor.ruler.pointerDown({ x: 550, y: 10 });
    editor.ruler.pointerUp();
    expect(editor.store.getState().insertMarker).toBe(5.5);
    expect(editor.store.getState().ruler).toEqual({ kind: "idle" });
  });

  it("drags the loop end, growing the clip to the bar", () => {
    const { editor } = setupEditor();
    editor.ruler.pointerDown({ x: 398, y: 10 });
    editor.ruler.pointerMove({ x: 612, y: 10 });
    editor.ruler.pointerUp();

    const clip = editor.getClip();
    expect([clip.loopStart, clip.loopLength, clip.lengthBeats]).toEqual([0, 6, 8]);
    expect(editor.commandLog.undoHistory).toEqual(["Change loop"]);

    editor.undo();
    expect(editor.getClip().loopLength).toBe(4);
  });

  it("drags the loop start with the end fixed", () => {
    const { editor } = setupEditor();
    editor.ruler.pointerDown({ x: 3, y: 10 });
    editor.ruler.pointerMove({ x: 130, y: 10 });
    editor.ruler.pointerUp();

    const clip = editor.getClip();
    expect(clip.loopStart).toBe(1.25);
    expect(clip.loopLength).toBe(2.75);
  });

  it("keeps at least one grid cell when the start passes the end", () => {
    const { editor } = setupEditor();
    editor.ruler.pointerDown({ x: 3, y: 10 });
    editor.ruler.pointerMove({ x: 900, y: 10 });
    editor.ruler.pointerUp();
    expect(editor.getClip().loopStart).toBe(3.75);
    expect(editor.getClip().loopLength).toBe(0.25);
  });

  it("snaps loop markers down to the grid line like note edits", () => {
    const { editor } = setupEditor();
    editor.ruler.pointerDown({ x: 3, y: 10 });
    editor.ruler.pointerMove({ x: 138, y: 10 });
    editor.ruler.pointerUp();
    expect(editor.getClip().loopStart).toBe(1.25);
  });

  it("caps the loop length when the start is dragged far back", () => {
    const { editor } = setupEditor();
    editor.setLoopLength(200);
    editor.setLoopStart(100);

    editor.ruler.pointerDown({ x: 10002, y: 10 });
    editor.ruler.pointerMove({ x: 0, y: 10 });
    editor.ruler.pointerUp();

    const clip = editor.getClip();
    expect([clip.loopStart, clip.loopLength, clip.lengthBeats]).toEqual([44, 256, 300]);
    expect(editor.commandLog.undoLabel).toBe("Change loop");
  });

  it("moves the whole loop region from its middle", () => {
    const { editor } = setupEditor();
    editor.ruler.pointerDown({ x: 200, y: 10 });
    editor.ruler.pointerMove({ x: 310, y: 10 });
    editor.ruler.pointerUp();

    const clip = editor.getClip();
    expect([clip.loopStart, clip.loopLength, clip.lengthBeats]).toEqual([1, 4, 8]);
  });

  it("pushes nothing when the loop ends where it started", () => {
    const { editor } = setupEditor();
    editor.ruler.pointerDown({ x: 398, y: 10 });
    editor.ruler.pointerMove({ x: 401, y: 10 });
    editor.ruler.pointerUp();
    expect(editor.commandLog.canUndo).toBe(false);
  });

  it("zooms on a vertical drag and keeps the pressed beat under the pointer", () => {
    const { editor, runScheduled } = setupEditor();
    editor.ruler.pointerDown({ x: 550, y: 0 });
    editor.ruler.pointerMove({ x: 550, y: 50 });
    expect(editor.store.getState().view.pixelsPerBeat).toBe(150);

    runScheduled();
    expect(editor.store.getState().view.scrollX).toBe(275);

    editor.ruler.pointerMove({ x: 450, y: -200 });
    runScheduled();
    // bounded by the loop plus margin fitting the 1000 px view
    expect(editor.store.getState().view.pixelsPerBeat).toBe(50);
    expect(editor.store.getState().view.scrollX).toBe(0);

    editor.ruler.pointerUp();
    expect(editor.store.getState().insertMarker).toBeNull();
  });

  it("ignores the ruler while a grid gesture is running", () => {
    const { editor } = setupEditor({ notes: [note("a", 60, 1, 1)] });
    editor.pointerDown({ x: 150, y: yOf(60) });
    editor.ruler.pointerDown({ x: 398, y: 10 });
    expect(editor.store.getState().ruler).toEqual({ kind: "idle" });
  });
});

// @vitest-environment jsdom
import { act, renderHook } from "@testing-library/react";
import { describe, expect, it } from "vitest";
import { setupEditor } from "../test-helpers";
import { usePianoRollEditor } from "./usePianoRollEditor";

describe("usePianoRollEditor", () => {
  it("re-renders with the selected slice of editor state", () => {
    const { editor } = setupEditor();
    const { result } = renderHook(() => usePianoRollEditor(editor, (s) => s.clip.notes.length));
    expect(result.current).toBe(0);

    act(() => {
      editor.addNote(0, 60);
    });
    expect(result.current).toBe(1);
  });

  it("follows the history labels", () => {
    const { editor } = setupEditor();
    const { result } = renderHook(() => usePianoRollEditor(editor, (s) => s.history.undoLabel));
    expect(result.current).toBeNull();

    act(() => {
      editor.addNote(0, 60);
    });
    expect(result.current).toBe("Add note");
  });
});

// src/features/pianoroll/test-helpers.ts
// Harnais partagé par les tests de l'éditeur (géométrie : 100 px / beat, 10 px / rangée).

import { vi } from "vitest";
import type { PianoRollConfig } from "@/core/config/editor-config";
import type { MidiClip, MidiNote, ModifierState, PianoRollAudioEngine } from "@/lib/audio/types";
import { createSequentialIdGenerator } from "@/lib/midi/ids";
import type { RandomSource } from "@/lib/midi/transforms";
import { NO_MODIFIERS } from "./core/tool-mode";
import { createPianoRollEditor, type PianoRollEditorOptions } from "./editor";
import { createMidiClip } from "./state/midi-clip.reducer";

export const PX_PER_BEAT = 100;
export const PX_PER_NOTE = 10;

export function note(id: string, pitch: number, time: number, duration: number, selected = false): MidiNote {
  return { id, pitch, time, duration, velocity: 100, selected };
}

/** x viewport d'un beat (scroll 0). */
export const xOf = (beat: number) => beat * PX_PER_BEAT;
/** y viewport au milieu de la rangée d'un pitch (scroll 0, maxPitch 127). */
export const yOf = (pitch: number) => (127 - pitch) * PX_PER_NOTE + PX_PER_NOTE / 2;

export type EditorSetup = {
  notes?: MidiNote[];
  loopLength?: number;
  config?: Partial<PianoRollConfig>;
  engine?: PianoRollAudioEngine | null;
  random?: RandomSource;
  reloadClip?: (clipId: string) => MidiClip | null | undefined;
  initial?: PianoRollEditorOptions["initial"];
};

export function setupEditor(setup: EditorSetup = {}) {
  let mods: ModifierState = NO_MODIFIERS;
  const calls: string[] = [];
  const scheduled: Array<() => void> = [];
  const onClipUpdated = vi.fn();
  const onToolModeChanged = vi.fn();

  const engine: PianoRollAudioEngine | null =
    setup.engine === undefined
      ? {
          noteOn: (track, pitch, velocity) => {
            calls.push(`on ${track} ${pitch} ${velocity}`);
          },
          noteOff: (track, pitch, velocity) => {
            calls.push(`off ${track} ${pitch} ${velocity}`);
          },
        }
      : setup.engine;

  const editor = createPianoRollEditor({
    clip: createMidiClip({ id: "clip-1", trackId: "track-1", notes: setup.notes, loopLength: setup.loopLength }),
    config: { defaultPixelsPerBeat: PX_PER_BEAT, defaultPixelsPerNote: PX_PER_NOTE, ...setup.config },
    engine,
    modifiers: () => mods,
    idGenerator: createSequentialIdGenerator("n"),
    random: setup.random ?? (() => 0.5),
    scheduleAfterLayout: (fn) => {
      scheduled.push(fn);
    },
    onClipUpdated,
    onToolModeChanged,
    reloadClip: setup.reloadClip,
    initial: { view: { width: 1000, height: 600 }, ...setup.initial },
  });

  return {
    editor,
    calls,
    scheduled,
    onClipUpdated,
    onToolModeChanged,
    setModifiers(next: Partial<ModifierState>) {
      mods = { ...NO_MODIFIERS, ...next };
      editor.notifyModifiersChanged();
    },
    notes: () => editor.getClip().notes,
    /** Appui + relâchement sans mouvement. */
    click(x: number, y: number) {
      editor.pointerDown({ x, y });
      editor.pointerUp();
    },
    drag(from: { x: number; y: number }, ...path: Array<{ x: number; y: number }>) {
      editor.pointerDown(from);
      for (const p of path) editor.pointerMove(p);
      editor.pointerUp();
    },
    runScheduled() {
      for (const fn of scheduled.splice(0)) fn();
    },
  };
}

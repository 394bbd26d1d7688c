// src/features/pianoroll/interactions/pointerUpHandler.ts

import {
  addNotes,
  clipContentEqual,
  deselectAll,
  findNote,
  selectedNotes,
  toggleNoteSelection,
} from "../state/midi-clip.reducer";
import type { InteractionSession } from "../types";
import { countLabel, newNote, refreshModifierOverride, type PianoRollCtx } from "./context";

export type PointerUpHandlerCtx = PianoRollCtx;

type Pressed = Extract<InteractionSession, { kind: "pressed" }>;

/** Relâchement avant le seuil de drag. */
function click(ctx: PianoRollCtx, s: Pressed) {
  const { store, history } = ctx;
  const clip = store.getState().clip;
  const { intent } = s;

  switch (intent.kind) {
    case "note":
      // shift : bascule sans toucher aux autres notes
      history.write(toggleNoteSelection(clip, intent.noteId, !intent.shift));
      return;

    case "duplicate": {
      // Copie en place, non sélectionnée
      const note = findNote(clip, intent.noteId);
      if (!note) return;
      const sources = note.selected ? selectedNotes(clip) : [note];
      const clones = sources.map((n) => newNote(ctx, { ...n, selected: false }));
      history.commit(countLabel("Duplicate", clones.length), addNotes(clip, clones));
      return;
    }

    case "emptySelect":
      if (selectedNotes(clip).length > 0) history.write(deselectAll(clip));
      return;

    case "created":
    case "none":
      return;
  }
}

/**
 * Crée le handler de pointerUp (et pointerCancel) pour la grille de notes.
 * - stop la note de pré-écoute (toujours)
 * - commit du geste en une seule commande, si le clip a changé
 * - reset de la session + relecture des modificateurs
 */
export function createPointerUpHandlerCtx(ctx: PointerUpHandlerCtx) {
  const { store, history, audition } = ctx;

  return (): void => {
    const state = store.getState();
    const s = state.session;
    const clip = state.clip;

    switch (s.kind) {
      case "pressed":
        click(ctx, s);
        break;

      case "moving":
        if (s.commitAlways || !clipContentEqual(s.before, clip)) history.commitToHistory(s.before, s.label);
        break;

      case "resizing": {
        const note = findNote(clip, s.noteId);
        if (note && !clipContentEqual(s.before, clip)) {
          history.commitToHistory(s.before, "Resize note");
          state.setLastNoteDuration(note.duration);
        }
        break;
      }

      case "painting":
        if (s.painted > 0) history.commitToHistory(s.before, countLabel("Paint", s.painted));
        break;

      case "erasing":
        if (s.erased.size > 0) history.commitToHistory(s.before, countLabel("Delete", s.erased.size));
        break;

      case "velocityEditing":
        if (!clipContentEqual(s.before, clip)) history.commitToHistory(s.before, "Change velocity");
        break;

      case "selecting":
      case "idle":
        break;
    }

    audition.stop();
    store.getState().setSession({ kind: "idle" });
    refreshModifierOverride(ctx);
  };
}

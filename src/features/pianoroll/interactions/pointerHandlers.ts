// src/features/pianoroll/interactions/pointerHandlers.ts

import type { MidiNote, ModifierState, ToolMode } from "@/lib/audio/types";
import { findNoteSpanning, getHitAt } from "../core/hit";
import { resolveToolMode } from "../core/tool-mode";
import { findNote, removeNotes } from "../state/midi-clip.reducer";
import type { PointerInput, PressIntent } from "../types";
import {
  getCoordinates,
  pitchAtY,
  refreshModifierOverride,
  snapBeat,
  type PianoRollCtx,
} from "./context";
import { addNoteAt, sliceNoteAt, stampChordAt } from "./editOperations";

export type PointerDownHandlerCtx = PianoRollCtx;

function press(ctx: PianoRollCtx, origin: PointerInput, intent: PressIntent, modifiers: ModifierState) {
  ctx.store.getState().setSession({ kind: "pressed", origin, intent, modifiers });
}

/**
 * Gomme : la note sous le pointeur est supprimée dès l'appui,
 * les suivantes au fil du drag (une seule fois chacune).
 */
function beginErase(ctx: PianoRollCtx, note: MidiNote | undefined) {
  const { store, history } = ctx;
  const before = history.saveToHistory();
  const erased = new Set<string>();
  if (note) {
    history.write(removeNotes(store.getState().clip, new Set([note.id])));
    erased.add(note.id);
  }
  store.getState().setSession({ kind: "erasing", erased, before });
}

function pressOnNote(ctx: PianoRollCtx, p: PointerInput, note: MidiNote, tool: ToolMode, mods: ModifierState) {
  const { audition } = ctx;

  switch (tool) {
    case "slice": {
      const beat = snapBeat(ctx, getCoordinates(ctx).xToBeat(p.x), mods.shift);
      sliceNoteAt(ctx, note.id, beat);
      press(ctx, p, { kind: "none" }, mods);
      return;
    }
    case "duplicate":
      audition.start(note.pitch, note.velocity);
      press(ctx, p, { kind: "duplicate", noteId: note.id }, mods);
      return;
    default:
      audition.start(note.pitch, note.velocity);
      press(ctx, p, { kind: "note", noteId: note.id, shift: mods.shift }, mods);
  }
}

function pressOnEmpty(ctx: PianoRollCtx, p: PointerInput, tool: ToolMode, mods: ModifierState) {
  const { store, config, audition } = ctx;
  const state = store.getState();
  const coords = getCoordinates(ctx);
  const beat = snapBeat(ctx, coords.xToBeat(p.x));

  // cmd/ctrl sur le vide : découpe la note qui recouvre ce beat (toutes hauteurs)
  if (tool === "duplicate") {
    if (mods.ctrlOrCmd) {
      const spanning = findNoteSpanning(state.clip.notes, beat);
      if (spanning) sliceNoteAt(ctx, spanning.id, beat);
    }
    press(ctx, p, { kind: "none" }, mods);
    return;
  }

  if (tool === "slice") {
    press(ctx, p, { kind: "none" }, mods);
    return;
  }

  if (tool === "select" || mods.shift) {
    press(ctx, p, { kind: "emptySelect" }, mods);
    return;
  }

  // Crayon
  const pitch = pitchAtY(ctx, p.y);
  if (state.chordPalette.visible) {
    stampChordAt(ctx, beat, pitch);
    press(ctx, p, { kind: "none" }, mods);
    return;
  }

  const note = addNoteAt(ctx, beat, pitch);
  audition.start(note.pitch, config.defaultVelocity);
  press(ctx, p, { kind: "created", noteId: note.id }, mods);
}

/**
 * Créateur de gestionnaire pour le pointer down dans la grille de notes.
 * Ordre de résolution :
 * 1) gomme (outil ou alt)
 * 2) bord de note → resize (crayon / sélection)
 * 3) corps de note → sélection / déplacement / duplication / découpe
 * 4) vide → création, accord, sélection rectangle, découpe (cmd/ctrl)
 */
export function createPointerDownHandlerCtx(ctx: PointerDownHandlerCtx) {
  const { store, config, history } = ctx;

  return (p: PointerInput): void => {
    const state = store.getState();
    if (state.session.kind !== "idle" || state.ruler.kind !== "idle") return;

    refreshModifierOverride(ctx);
    const mods = ctx.external.modifiers();
    const tool = resolveToolMode(state.stickyTool, mods);

    const clip = store.getState().clip;
    const hit = getHitAt(p.x, p.y, clip.notes, getCoordinates(ctx), config.resizeEdgePx);
    const note = hit.type === "empty" ? undefined : findNote(clip, hit.noteId);

    if (tool === "eraser") {
      beginErase(ctx, note);
      return;
    }

    if (hit.type === "resize" && note && (tool === "draw" || tool === "select")) {
      store.getState().setSession({
        kind: "resizing",
        noteId: note.id,
        edge: hit.edge,
        original: note,
        before: history.saveToHistory(),
      });
      return;
    }

    if (note) {
      pressOnNote(ctx, p, note, tool, mods);
      return;
    }
    pressOnEmpty(ctx, p, tool, mods);
  };
}

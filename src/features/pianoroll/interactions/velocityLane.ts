// src/features/pianoroll/interactions/velocityLane.ts

import { noteEnd } from "@/lib/audio/types";
import { replaceNotes } from "../state/midi-clip.reducer";
import type { PointerInput } from "../types";
import { getCoordinates, type PianoRollCtx } from "./context";

export type VelocityLaneHandlers = {
  pointerDown: (p: PointerInput) => void;
  pointerMove: (p: PointerInput) => void;
};

/** y dans la lane (0 = haut) → vélocité 1..127. */
export function velocityFromLaneY(y: number, laneHeight: number): number {
  if (!(laneHeight > 0)) return 1;
  const v = Math.round((1 - y / laneHeight) * 127);
  return Math.max(1, Math.min(127, v));
}

/**
 * Règle la vélocité des notes qui recouvrent le beat sous le pointeur
 * (seulement les notes sélectionnées s'il y en a).
 */
function paintVelocity(ctx: PianoRollCtx, p: PointerInput) {
  const { store, history } = ctx;
  const { clip, view } = store.getState();
  const beat = getCoordinates(ctx).xToBeat(p.x);
  const velocity = velocityFromLaneY(p.y, view.velocityLaneHeight);
  const onlySelected = clip.notes.some((n) => n.selected);

  let changed = false;
  const notes = clip.notes.map((n) => {
    if (onlySelected && !n.selected) return n;
    if (beat < n.time || beat >= noteEnd(n) || n.velocity === velocity) return n;
    changed = true;
    return { ...n, velocity };
  });
  if (changed) history.write(replaceNotes(clip, notes));
}

/**
 * Lane de vélocité sous la grille. Le geste se termine par le pointerUp
 * de la grille ("Change velocity", une commande par geste).
 */
export function createVelocityLaneHandlersCtx(ctx: PianoRollCtx): VelocityLaneHandlers {
  const { store, history } = ctx;

  return {
    pointerDown(p) {
      const state = store.getState();
      if (state.session.kind !== "idle" || state.ruler.kind !== "idle") return;
      state.setSession({ kind: "velocityEditing", before: history.saveToHistory() });
      paintVelocity(ctx, p);
    },

    pointerMove(p) {
      if (store.getState().session.kind !== "velocityEditing") return;
      paintVelocity(ctx, p);
    },
  };
}

// src/features/pianoroll/interactions/rulerHandlers.ts

import type { MidiClip } from "@/lib/audio/types";
import { getLoopMarkerAt } from "../core/hit";
import { anchoredScrollX, clampScrollX, zoomFromDrag } from "../core/zoom";
import { autoExtendClipLength, clampLoopLength, clipsEqual } from "../state/midi-clip.reducer";
import type { LoopMarker, PointerInput, RulerSession } from "../types";
import { getCoordinates, getLoopLimits, snapBeat, type PianoRollCtx } from "./context";
import { getMaxScrollX, getZoomBounds } from "./viewOperations";

export type RulerHandlers = {
  pointerDown: (p: PointerInput) => void;
  pointerMove: (p: PointerInput) => void;
  pointerUp: () => void;
};

type LoopDrag = Extract<RulerSession, { kind: "loopDrag" }>;
type RulerZoom = Extract<RulerSession, { kind: "rulerZoom" }>;

/** Beat de la règle, même snap "floor" que la grille de notes. */
function rulerBeat(ctx: PianoRollCtx, x: number): number {
  return snapBeat(ctx, getCoordinates(ctx).xToBeat(x));
}

/* -------------------------------------------------------
 * Loop drags : start (fin fixe), end (début fixe), middle (région entière)
 * ------------------------------------------------------*/
function dragLoop(ctx: PianoRollCtx, s: LoopDrag, p: PointerInput) {
  const { store, config, history } = ctx;
  const clip = store.getState().clip;
  const limits = getLoopLimits(ctx);
  const beat = rulerBeat(ctx, p.x);
  const start = clip.loopStart;
  const end = clip.loopStart + clip.loopLength;

  let next: MidiClip;
  switch (s.marker) {
    case "start": {
      // Longueur bornée à [grid, max] : le début ne recule pas au-delà de end - max
      const loopStart = Math.max(0, end - limits.maxLength, Math.min(end - limits.minLength, beat));
      const loopLength = clampLoopLength(end - loopStart, limits);
      next = autoExtendClipLength({ ...clip, loopStart, loopLength }, loopStart + loopLength, config.beatsPerBar);
      break;
    }
    case "end": {
      const loopLength = clampLoopLength(beat - start, limits);
      next = autoExtendClipLength({ ...clip, loopLength }, start + loopLength, config.beatsPerBar);
      break;
    }
    case "middle": {
      const loopStart = Math.max(0, start + (beat - s.lastBeat));
      next = autoExtendClipLength({ ...clip, loopStart }, loopStart + clip.loopLength, config.beatsPerBar);
      store.getState().setRuler({ ...s, lastBeat: beat });
      break;
    }
  }

  if (!clipsEqual(clip, next)) history.write(next);
}

/* -------------------------------------------------------
 * Zoom / pan : drag vertical = zoom, le beat ancré suit le pointeur
 * ------------------------------------------------------*/
function zoomAndPan(ctx: PianoRollCtx, s: RulerZoom, p: PointerInput) {
  const { store, config } = ctx;
  const ppb = zoomFromDrag(s.startPixelsPerBeat, p.y - s.startY, config.zoomSensitivityPx, getZoomBounds(ctx));
  store.getState().setView({ pixelsPerBeat: ppb });

  // Correction de scroll après le layout (l'étendue scrollable dépend du zoom)
  const anchorBeat = s.anchorBeat;
  const anchorX = p.x;
  ctx.external.scheduleAfterLayout(() => {
    const { view, setView } = store.getState();
    const target = anchoredScrollX(anchorBeat, view.pixelsPerBeat, anchorX);
    setView({ scrollX: clampScrollX(target, getMaxScrollX(ctx)) });
  });
}

/**
 * Handlers de la règle temporelle (x partagé avec la grille de notes).
 * Un appui sur un marqueur de boucle (rayon loopMarkerHitPx) démarre un drag
 * de boucle ; sinon le geste est un clic (marqueur d'insertion) ou un zoom/pan.
 */
export function createRulerHandlersCtx(ctx: PianoRollCtx): RulerHandlers {
  const { store, config, history } = ctx;

  return {
    pointerDown(p) {
      const state = store.getState();
      if (state.session.kind !== "idle" || state.ruler.kind !== "idle") return;

      const { clip } = state;
      const marker: LoopMarker | null = getLoopMarkerAt(
        p.x,
        { start: clip.loopStart, end: clip.loopStart + clip.loopLength },
        getCoordinates(ctx),
        config.loopMarkerHitPx,
      );

      if (marker) {
        state.setRuler({ kind: "loopDrag", marker, lastBeat: rulerBeat(ctx, p.x), before: history.saveToHistory() });
        return;
      }
      state.setRuler({ kind: "rulerPressed", origin: p });
    },

    pointerMove(p) {
      const state = store.getState();
      const ruler = state.ruler;

      switch (ruler.kind) {
        case "rulerPressed": {
          const { origin } = ruler;
          if (Math.hypot(p.x - origin.x, p.y - origin.y) < config.dragSlopPx) return;
          const zoom: RulerZoom = {
            kind: "rulerZoom",
            startY: origin.y,
            startPixelsPerBeat: state.view.pixelsPerBeat,
            anchorBeat: getCoordinates(ctx).xToBeat(origin.x),
          };
          state.setRuler(zoom);
          zoomAndPan(ctx, zoom, p);
          return;
        }
        case "rulerZoom":
          zoomAndPan(ctx, ruler, p);
          return;
        case "loopDrag":
          dragLoop(ctx, ruler, p);
          return;
        case "idle":
          return;
      }
    },

    pointerUp() {
      const state = store.getState();
      const ruler = state.ruler;

      if (ruler.kind === "rulerPressed") {
        // Clic : marqueur d'insertion (collage)
        state.setInsertMarker(Math.max(0, getCoordinates(ctx).xToBeat(ruler.origin.x)));
      } else if (ruler.kind === "loopDrag" && !clipsEqual(ruler.before, state.clip)) {
        history.commitToHistory(ruler.before, "Change loop");
      }
      store.getState().setRuler({ kind: "idle" });
    },
  };
}

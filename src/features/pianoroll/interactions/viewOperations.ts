// src/features/pianoroll/interactions/viewOperations.ts

import { clampScrollX, clampZoom, maxScrollX, totalBeats, zoomBounds, type ZoomBounds } from "../core/zoom";
import type { PianoRollCtx } from "./context";

const ZOOM_STEP = 1.5;
const MIN_PIXELS_PER_NOTE = 4;
const MAX_PIXELS_PER_NOTE = 64;

export function getZoomBounds(ctx: PianoRollCtx): ZoomBounds {
  const { view, clip } = ctx.store.getState();
  return zoomBounds(view.width, clip.loopLength, {
    minZoomBeats: ctx.config.minZoomBeats,
    marginBeats: ctx.config.zoomMarginBeats,
  });
}

export function getMaxScrollX(ctx: PianoRollCtx, pixelsPerBeat?: number): number {
  const { view, clip } = ctx.store.getState();
  const ppb = pixelsPerBeat ?? view.pixelsPerBeat;
  return maxScrollX(totalBeats(clip, ctx.config.zoomMarginBeats), ppb, view.width);
}

export function getMaxScrollY(ctx: PianoRollCtx): number {
  const { view } = ctx.store.getState();
  const rows = ctx.config.maxPitch - ctx.config.minPitch + 1;
  return Math.max(0, rows * view.pixelsPerNote - view.height);
}

/** Zoom borné ; le scroll est re-borné à la nouvelle étendue. */
export function setPixelsPerBeat(ctx: PianoRollCtx, pixelsPerBeat: number): void {
  if (!Number.isFinite(pixelsPerBeat)) return;
  const ppb = clampZoom(pixelsPerBeat, getZoomBounds(ctx));
  const { view, setView } = ctx.store.getState();
  setView({ pixelsPerBeat: ppb, scrollX: clampScrollX(view.scrollX, getMaxScrollX(ctx, ppb)) });
}

export function zoomIn(ctx: PianoRollCtx): void {
  setPixelsPerBeat(ctx, ctx.store.getState().view.pixelsPerBeat * ZOOM_STEP);
}

export function zoomOut(ctx: PianoRollCtx): void {
  setPixelsPerBeat(ctx, ctx.store.getState().view.pixelsPerBeat / ZOOM_STEP);
}

export function setScroll(ctx: PianoRollCtx, scrollX: number, scrollY: number): void {
  const { view, setView } = ctx.store.getState();
  setView({
    scrollX: Number.isFinite(scrollX) ? clampScrollX(scrollX, getMaxScrollX(ctx)) : view.scrollX,
    scrollY: Number.isFinite(scrollY) ? Math.max(0, Math.min(getMaxScrollY(ctx), scrollY)) : view.scrollY,
  });
}

/** Taille du viewport (resize de la fenêtre hôte) ; le zoom est re-borné. */
export function setViewSize(ctx: PianoRollCtx, width: number, height: number): void {
  if (!(width > 0) || !(height > 0)) return;
  const { view, setView } = ctx.store.getState();
  setView({ width, height });
  setPixelsPerBeat(ctx, view.pixelsPerBeat);
  setScroll(ctx, ctx.store.getState().view.scrollX, view.scrollY);
}

export function setPixelsPerNote(ctx: PianoRollCtx, pixelsPerNote: number): void {
  if (!Number.isFinite(pixelsPerNote)) return;
  const ppn = Math.max(MIN_PIXELS_PER_NOTE, Math.min(MAX_PIXELS_PER_NOTE, pixelsPerNote));
  const { view, setView } = ctx.store.getState();
  setView({ pixelsPerNote: ppn });
  setScroll(ctx, view.scrollX, view.scrollY);
}

// src/features/pianoroll/interactions/context.ts

import type { MidiClip, MidiNote, PianoRollAudioEngine, ToolMode } from "@/lib/audio/types";
import type { PianoRollConfig } from "@/core/config/editor-config";
import { effectiveGridDivision, snapToGrid } from "@/lib/midi/grid";
import type { IdGenerator } from "@/lib/midi/ids";
import { snapPitchToScale } from "@/lib/midi/scales";
import type { RandomSource } from "@/lib/midi/transforms";
import type { DevLogger } from "@/lib/log/dev-log";
import { createCoordinates, type Coordinates } from "../core/coords";
import { modifierOverride, resolveToolMode, type ModifierSource } from "../core/tool-mode";
import type { ClipHistory } from "../state/clip-history";
import type { LoopLimits } from "../state/midi-clip.reducer";
import type { PianoRollStoreApi } from "../state/pianoroll.store";
import type { AuditionController } from "./audition";

// ================= Grouped context shared by every handler =================
export type PianoRollCtx = {
  store: PianoRollStoreApi;
  config: PianoRollConfig;
  history: ClipHistory;
  audition: AuditionController;
  external: {
    engine: PianoRollAudioEngine | null | undefined;
    ids: IdGenerator;
    modifiers: ModifierSource;
    random: RandomSource;
    /** Exécute `fn` après la passe de layout courante (correction de scroll du zoom) */
    scheduleAfterLayout: (fn: () => void) => void;
    logger: DevLogger;
  };
  callbacks: {
    onToolModeChanged?: (tool: ToolMode) => void;
    /** Relit le clip côté hôte (après un quantize moteur) */
    reloadClip?: (clipId: string) => MidiClip | null | undefined;
  };
};

export function getCoordinates(ctx: PianoRollCtx): Coordinates {
  const { view } = ctx.store.getState();
  return createCoordinates(view, ctx.config.maxPitch, ctx.config.minPitch);
}

/** Division de grille effective (adaptative / triolet compris). */
export function getGridDivision(ctx: PianoRollCtx): number {
  const { grid, view } = ctx.store.getState();
  return effectiveGridDivision(grid, view.pixelsPerBeat);
}

/** Snap "floor" sur la grille effective ; `bypass` (shift) désactive le snap. */
export function snapBeat(ctx: PianoRollCtx, beat: number, bypass: boolean = false): number {
  const { grid } = ctx.store.getState();
  return snapToGrid(beat, getGridDivision(ctx), grid.snap && !bypass);
}

/** Applique le scale-lock (si actif) à un pitch. */
export function lockPitch(ctx: PianoRollCtx, pitch: number): number {
  const { scale, scaleLock } = ctx.store.getState();
  const clamped = clampPitch(ctx, pitch);
  return scaleLock ? clampPitch(ctx, snapPitchToScale(clamped, scale)) : clamped;
}

export function clampPitch(ctx: PianoRollCtx, pitch: number): number {
  return Math.max(ctx.config.minPitch, Math.min(ctx.config.maxPitch, pitch));
}

/** Rangée sous le pointeur, bornée, scale-lock compris. */
export function pitchAtY(ctx: PianoRollCtx, y: number): number {
  return lockPitch(ctx, getCoordinates(ctx).yToPitchClamped(y));
}

export function getLoopLimits(ctx: PianoRollCtx): LoopLimits {
  return {
    minLength: getGridDivision(ctx),
    maxLength: ctx.config.maxLoopBeats,
    beatsPerBar: ctx.config.beatsPerBar,
  };
}

/** "Move note" / "Move 3 notes" */
export function countLabel(verb: string, count: number): string {
  return count === 1 ? `${verb} note` : `${verb} ${count} notes`;
}

/** Nouvelle note avec un id frais (un `id` présent dans `init` est remplacé). */
export function newNote(ctx: PianoRollCtx, init: Omit<MidiNote, "id">): MidiNote {
  return {
    pitch: init.pitch,
    velocity: init.velocity,
    time: init.time,
    duration: init.duration,
    selected: init.selected,
    id: ctx.external.ids(),
  };
}

/* -------------------------------------------------------
 * Outil effectif
 * ------------------------------------------------------*/
export function getEffectiveTool(ctx: PianoRollCtx): ToolMode {
  const { stickyTool, modifierOverride: override } = ctx.store.getState();
  return override ?? stickyTool;
}

/**
 * Relit les modificateurs et met à jour la surcharge d'outil.
 * Ignoré pendant un move / resize : l'outil est figé jusqu'au pointer-up.
 */
export function refreshModifierOverride(ctx: PianoRollCtx): void {
  const state = ctx.store.getState();
  if (state.session.kind === "moving" || state.session.kind === "resizing") return;

  const previous = getEffectiveTool(ctx);
  const mods = ctx.external.modifiers();
  const override = modifierOverride(mods);
  if (override !== state.modifierOverride) state.setModifierOverride(override);

  const next = resolveToolMode(state.stickyTool, mods);
  if (next !== previous) notifyToolMode(ctx, next);
}

export function notifyToolMode(ctx: PianoRollCtx, tool: ToolMode): void {
  const cb = ctx.callbacks.onToolModeChanged;
  if (!cb) return;
  try {
    cb(tool);
  } catch (err) {
    ctx.external.logger.warn("onToolModeChanged", err);
  }
}

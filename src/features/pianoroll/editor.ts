// src/features/pianoroll/editor.ts

import type { CcLane, CcPoint, CcType, MidiClip, MidiNote, PianoRollAudioEngine, ToolMode } from "@/lib/audio/types";
import { resolvePianoRollConfig, type PianoRollConfig } from "@/core/config/editor-config";
import type { ChordConfiguration } from "@/lib/midi/chords";
import type { GridSettings } from "@/lib/midi/grid";
import { defaultIdGenerator, type IdGenerator } from "@/lib/midi/ids";
import type { Scale } from "@/lib/midi/scales";
import type { RandomSource } from "@/lib/midi/transforms";
import { createDevLogger } from "@/lib/log/dev-log";
import { NO_MODIFIERS, type ModifierSource } from "./core/tool-mode";
import { createClipHistory } from "./state/clip-history";
import type { CommandLog } from "./state/command-log";
import { createPianoRollStore, type PianoRollStoreApi, type PianoRollStoreInit } from "./state/pianoroll.store";
import type { KeyInput, PointerInput, QuantizeSettings } from "./types";
import {
  addLanePoint,
  addNoteAt,
  copySelection,
  createAuditionController,
  createPointerDownHandlerCtx,
  createPointerMoveHandlerCtx,
  createPointerUpHandlerCtx,
  createRulerHandlersCtx,
  createVelocityLaneHandlersCtx,
  cutSelection,
  deleteSelection,
  deselectAllNotes,
  drawLaneValue,
  duplicateSelection,
  handleKeyDown,
  humanizeSelection,
  laneValueAt,
  legatoSelection,
  paste,
  quantizeClipViaEngine,
  quantizeSelection,
  randomizeVelocities,
  redo,
  removeLanePoint,
  reverseSelection,
  selectAllNotes,
  setLaneCcType,
  setLoopLengthBeats,
  setLoopStartBeat,
  setPixelsPerBeat,
  setPixelsPerNote,
  setScroll,
  setStickyTool,
  setViewSize,
  sliceNoteAt,
  stretchSelection,
  swingSelection,
  transposeSelection,
  undo,
  updateLanePoint,
  zoomIn,
  zoomOut,
  type PianoRollCtx,
  type RulerHandlers,
  type VelocityLaneHandlers,
} from "./interactions";
import { getEffectiveTool, getGridDivision, lockPitch, refreshModifierOverride, snapBeat } from "./interactions/context";

export type PianoRollEditorOptions = {
  clip: MidiClip;
  ccLane?: CcLane;
  config?: Partial<PianoRollConfig>;
  engine?: PianoRollAudioEngine | null;
  /** État courant des modificateurs (défaut : aucun) */
  modifiers?: ModifierSource;
  idGenerator?: IdGenerator;
  random?: RandomSource;
  /** Défaut : setTimeout(fn, 0) */
  scheduleAfterLayout?: (fn: () => void) => void;
  onClipUpdated?: (clip: MidiClip) => void;
  onToolModeChanged?: (tool: ToolMode) => void;
  reloadClip?: (clipId: string) => MidiClip | null | undefined;
  initial?: Omit<PianoRollStoreInit, "clip" | "ccLane">;
};

export type PianoRollEditor = {
  readonly store: PianoRollStoreApi;
  readonly config: PianoRollConfig;
  readonly commandLog: CommandLog<MidiClip>;

  getClip: () => MidiClip;
  getTool: () => ToolMode;
  getGridDivision: () => number;
  /** Remplace le clip édité (changement de clip côté hôte) et vide l'historique. */
  loadClip: (clip: MidiClip) => void;

  // ---- Grille de notes ----
  pointerDown: (p: PointerInput) => void;
  pointerMove: (p: PointerInput) => void;
  pointerUp: () => void;
  pointerCancel: () => void;
  ruler: RulerHandlers;
  velocityLane: VelocityLaneHandlers;

  // ---- Clavier / outils ----
  handleKeyDown: (input: KeyInput) => boolean;
  notifyModifiersChanged: () => void;
  setStickyTool: (tool: ToolMode) => void;
  undo: () => boolean;
  redo: () => boolean;

  // ---- Édition ----
  addNote: (time: number, pitch: number) => MidiNote;
  sliceNote: (noteId: string, beat: number) => boolean;
  copy: () => boolean;
  cut: () => boolean;
  paste: () => boolean;
  duplicateSelection: () => boolean;
  deleteSelection: () => boolean;
  selectAll: () => void;
  deselectAll: () => void;

  // ---- Transformations ----
  quantizeSelection: () => boolean;
  applySwing: (amount: number) => boolean;
  applyStretch: (factor: number) => boolean;
  applyHumanize: (amount: number) => boolean;
  applyLegato: () => boolean;
  reverseNotes: () => boolean;
  randomizeVelocity: (amount: number) => boolean;
  transpose: (semitones: number) => boolean;
  quantizeClipViaEngine: (division?: number) => boolean;

  // ---- Boucle ----
  setLoopLength: (beats: number) => boolean;
  setLoopStart: (beat: number) => boolean;
  setInsertMarker: (beat: number | null) => void;

  // ---- Lane CC ----
  setCcType: (ccType: CcType) => void;
  addCcPoint: (time: number, value: number) => string;
  updateCcPoint: (id: string, patch: Partial<Omit<CcPoint, "id">>) => void;
  removeCcPoint: (id: string) => void;
  drawCcValue: (time: number, value: number) => void;
  ccValueAt: (time: number) => number;

  // ---- Vue ----
  zoomIn: () => void;
  zoomOut: () => void;
  setPixelsPerBeat: (pixelsPerBeat: number) => void;
  setPixelsPerNote: (pixelsPerNote: number) => void;
  setViewSize: (width: number, height: number) => void;
  setScroll: (scrollX: number, scrollY: number) => void;

  // ---- Réglages ----
  setGrid: (patch: Partial<GridSettings>) => void;
  setQuantize: (patch: Partial<QuantizeSettings>) => void;
  setScale: (scale: Scale) => void;
  setScaleLock: (on: boolean) => void;
  setChord: (chord: ChordConfiguration) => void;
  toggleChordPalette: () => void;
  setAuditionEnabled: (on: boolean) => void;

  /** Coupe la note tenue et joue les relâchements d'accords en attente. */
  dispose: () => void;
};

const defaultScheduleAfterLayout = (fn: () => void) => {
  setTimeout(fn, 0);
};

/**
 * Session d'édition d'un clip : store, historique, audition et handlers,
 * sans dépendance à un DOM ni à un moteur audio concret.
 */
export function createPianoRollEditor(options: PianoRollEditorOptions): PianoRollEditor {
  const config = resolvePianoRollConfig(options.config);
  const logger = createDevLogger("PianoRoll");

  const store = createPianoRollStore({ ...options.initial, clip: options.clip, ccLane: options.ccLane }, config);

  const history = createClipHistory({
    store,
    limit: config.undoLimit,
    onClipUpdated: options.onClipUpdated,
    logger,
  });

  const audition = createAuditionController({
    engine: options.engine,
    getTrackId: () => store.getState().clip.trackId,
    isEnabled: () => store.getState().auditionEnabled,
    releaseVelocity: config.auditionReleaseVelocity,
    chordPreviewMs: config.chordPreviewMs,
    logger,
  });

  const ctx: PianoRollCtx = {
    store,
    config,
    history,
    audition,
    external: {
      engine: options.engine,
      ids: options.idGenerator ?? defaultIdGenerator,
      modifiers: options.modifiers ?? (() => NO_MODIFIERS),
      random: options.random ?? Math.random,
      scheduleAfterLayout: options.scheduleAfterLayout ?? defaultScheduleAfterLayout,
      logger,
    },
    callbacks: {
      onToolModeChanged: options.onToolModeChanged,
      reloadClip: options.reloadClip,
    },
  };

  const pointerUp = createPointerUpHandlerCtx(ctx);
  const state = () => store.getState();

  return {
    store,
    config,
    commandLog: history.log,

    getClip: () => state().clip,
    getTool: () => getEffectiveTool(ctx),
    getGridDivision: () => getGridDivision(ctx),
    loadClip(clip) {
      audition.stop();
      state().setSession({ kind: "idle" });
      state().setRuler({ kind: "idle" });
      state().setClip(clip);
      history.log.clear();
    },

    pointerDown: createPointerDownHandlerCtx(ctx),
    pointerMove: createPointerMoveHandlerCtx(ctx),
    pointerUp,
    pointerCancel: pointerUp,
    ruler: createRulerHandlersCtx(ctx),
    velocityLane: createVelocityLaneHandlersCtx(ctx),

    handleKeyDown: (input) => handleKeyDown(ctx, input),
    notifyModifiersChanged: () => refreshModifierOverride(ctx),
    setStickyTool: (tool) => setStickyTool(ctx, tool),
    undo: () => undo(ctx),
    redo: () => redo(ctx),

    addNote: (time, pitch) => addNoteAt(ctx, snapBeat(ctx, time), lockPitch(ctx, Math.round(pitch))),
    sliceNote: (noteId, beat) => sliceNoteAt(ctx, noteId, beat),
    copy: () => copySelection(ctx),
    cut: () => cutSelection(ctx),
    paste: () => paste(ctx),
    duplicateSelection: () => duplicateSelection(ctx),
    deleteSelection: () => deleteSelection(ctx),
    selectAll: () => selectAllNotes(ctx),
    deselectAll: () => deselectAllNotes(ctx),

    quantizeSelection: () => quantizeSelection(ctx),
    applySwing: (amount) => swingSelection(ctx, amount),
    applyStretch: (factor) => stretchSelection(ctx, factor),
    applyHumanize: (amount) => humanizeSelection(ctx, amount),
    applyLegato: () => legatoSelection(ctx),
    reverseNotes: () => reverseSelection(ctx),
    randomizeVelocity: (amount) => randomizeVelocities(ctx, amount),
    transpose: (semitones) => transposeSelection(ctx, semitones),
    quantizeClipViaEngine: (division) => quantizeClipViaEngine(ctx, division),

    setLoopLength: (beats) => setLoopLengthBeats(ctx, beats),
    setLoopStart: (beat) => setLoopStartBeat(ctx, beat),
    setInsertMarker: (beat) => state().setInsertMarker(beat === null ? null : Math.max(0, beat)),

    setCcType: (ccType) => setLaneCcType(ctx, ccType),
    addCcPoint: (time, value) => addLanePoint(ctx, time, value),
    updateCcPoint: (id, patch) => updateLanePoint(ctx, id, patch),
    removeCcPoint: (id) => removeLanePoint(ctx, id),
    drawCcValue: (time, value) => drawLaneValue(ctx, time, value),
    ccValueAt: (time) => laneValueAt(ctx, time),

    zoomIn: () => zoomIn(ctx),
    zoomOut: () => zoomOut(ctx),
    setPixelsPerBeat: (ppb) => setPixelsPerBeat(ctx, ppb),
    setPixelsPerNote: (ppn) => setPixelsPerNote(ctx, ppn),
    setViewSize: (width, height) => setViewSize(ctx, width, height),
    setScroll: (scrollX, scrollY) => setScroll(ctx, scrollX, scrollY),

    setGrid: (patch) => state().setGrid(patch),
    setQuantize: (patch) => state().setQuantize(patch),
    setScale: (scale) => state().setScale(scale),
    setScaleLock: (on) => state().setScaleLock(on),
    setChord: (chord) => state().setChord(chord),
    toggleChordPalette: () => state().toggleChordPalette(),
    setAuditionEnabled: (on) => {
      if (!on) audition.stop();
      state().setAuditionEnabled(on);
    },

    dispose: () => audition.dispose(),
  };
}

// src/features/pianoroll/state/pianoroll.store.ts

import { createStore, type StoreApi } from "zustand/vanilla";
import type { CcLane, MidiClip, MidiNote, ToolMode } from "@/lib/audio/types";
import type { PianoRollConfig } from "@/core/config/editor-config";
import { DEFAULT_CHORD, type ChordConfiguration } from "@/lib/midi/chords";
import type { GridSettings } from "@/lib/midi/grid";
import type { Scale } from "@/lib/midi/scales";
import type { InteractionSession, PianoRollView, QuantizeSettings, RulerSession } from "../types";
import { createCcLane } from "./cc-lane.reducer";

/**
 * PianoRollState
 * --------------
 * État d'une session d'édition (un clip ouvert dans l'éditeur).
 *
 * Contient :
 * - le clip édité et la lane CC
 * - l'outil collant + la surcharge des modificateurs
 * - la session d'interaction en cours (grille / règle)
 * - presse-papiers, dernière durée utilisée, marqueur d'insertion
 * - grille, gamme, palette d'accords, audition
 * - la vue (zoom / scroll / taille)
 * - un miroir de l'historique (pour l'UI)
 */
export type PianoRollState = {
  clip: MidiClip;
  ccLane: CcLane;

  stickyTool: ToolMode;
  // Outil imposé par alt / cmd-ctrl (null = aucun modificateur)
  modifierOverride: ToolMode | null;

  session: InteractionSession;
  ruler: RulerSession;

  // Notes copiées, détachées du clip (selected = false)
  clipboard: ReadonlyArray<MidiNote>;
  // Durée "collante" des nouvelles notes (mise à jour au resize)
  lastNoteDuration: number;
  // Position de collage (null = beat 0)
  insertMarker: number | null;

  chordPalette: { visible: boolean; chord: ChordConfiguration };
  scale: Scale;
  scaleLock: boolean;
  grid: GridSettings;
  quantize: QuantizeSettings;
  auditionEnabled: boolean;

  view: PianoRollView;

  history: {
    canUndo: boolean;
    canRedo: boolean;
    undoLabel: string | null;
    redoLabel: string | null;
  };
};

/**
 * PianoRollActions
 * ----------------
 * Mutateurs simples de l'état. Les éditions du clip passent par l'éditeur
 * (historique + notification hôte), jamais directement par `setClip`.
 */
export type PianoRollActions = {
  setClip: (clip: MidiClip) => void;
  setCcLane: (lane: CcLane) => void;

  setStickyTool: (tool: ToolMode) => void;
  setModifierOverride: (tool: ToolMode | null) => void;

  setSession: (session: InteractionSession) => void;
  setRuler: (ruler: RulerSession) => void;

  setClipboard: (notes: ReadonlyArray<MidiNote>) => void;
  setLastNoteDuration: (beats: number) => void;
  setInsertMarker: (beat: number | null) => void;

  toggleChordPalette: () => void;
  setChord: (chord: ChordConfiguration) => void;
  setScale: (scale: Scale) => void;
  setScaleLock: (on: boolean) => void;
  setGrid: (patch: Partial<GridSettings>) => void;
  setQuantize: (patch: Partial<QuantizeSettings>) => void;
  setAuditionEnabled: (on: boolean) => void;

  setView: (patch: Partial<PianoRollView>) => void;
  setHistory: (history: PianoRollState["history"]) => void;
};

export type PianoRollStore = PianoRollState & PianoRollActions;
export type PianoRollStoreApi = StoreApi<PianoRollStore>;

export type PianoRollStoreInit = {
  clip: MidiClip;
  ccLane?: CcLane;
  tool?: ToolMode;
  grid?: Partial<GridSettings>;
  scale?: Scale;
  scaleLock?: boolean;
  view?: Partial<PianoRollView>;
};

const DEFAULT_VIEW_WIDTH = 1280;
const DEFAULT_VIEW_HEIGHT = 640;
const DEFAULT_VELOCITY_LANE_HEIGHT = 100;

/**
 * Store d'une session d'édition (Zustand vanilla : utilisable hors React,
 * lié aux composants via `usePianoRollEditor`).
 */
export function createPianoRollStore(init: PianoRollStoreInit, config: PianoRollConfig): PianoRollStoreApi {
  return createStore<PianoRollStore>()((set) => ({
    clip: init.clip,
    ccLane: init.ccLane ?? createCcLane(),

    // Outil par défaut : crayon
    stickyTool: init.tool ?? "draw",
    modifierOverride: null,

    session: { kind: "idle" },
    ruler: { kind: "idle" },

    clipboard: [],
    lastNoteDuration: config.defaultNoteDuration,
    insertMarker: null,

    chordPalette: { visible: false, chord: DEFAULT_CHORD },
    scale: init.scale ?? { root: "C", type: "major" },
    scaleLock: init.scaleLock ?? false,
    grid: {
      division: config.defaultGridDivision,
      snap: true,
      triplet: false,
      adaptive: false,
      ...init.grid,
    },
    quantize: { division: null, triplet: false, strength: 1 },
    auditionEnabled: config.auditionEnabled,

    view: {
      pixelsPerBeat: config.defaultPixelsPerBeat,
      pixelsPerNote: config.defaultPixelsPerNote,
      scrollX: 0,
      scrollY: 0,
      width: DEFAULT_VIEW_WIDTH,
      height: DEFAULT_VIEW_HEIGHT,
      velocityLaneHeight: DEFAULT_VELOCITY_LANE_HEIGHT,
      ...init.view,
    },

    history: { canUndo: false, canRedo: false, undoLabel: null, redoLabel: null },

    // --- Clip / lanes ---

    setClip: (clip) => set({ clip }),
    setCcLane: (ccLane) => set({ ccLane }),

    // --- Outils ---

    setStickyTool: (stickyTool) => set({ stickyTool }),
    setModifierOverride: (modifierOverride) => set({ modifierOverride }),

    // --- Sessions ---

    setSession: (session) => set({ session }),
    setRuler: (ruler) => set({ ruler }),

    // --- Session extras ---

    setClipboard: (clipboard) => set({ clipboard }),
    setLastNoteDuration: (lastNoteDuration) => set({ lastNoteDuration }),
    setInsertMarker: (insertMarker) => set({ insertMarker }),

    toggleChordPalette: () =>
      set((s) => ({ chordPalette: { ...s.chordPalette, visible: !s.chordPalette.visible } })),
    setChord: (chord) => set((s) => ({ chordPalette: { ...s.chordPalette, chord } })),
    setScale: (scale) => set({ scale }),
    setScaleLock: (scaleLock) => set({ scaleLock }),
    setGrid: (patch) => set((s) => ({ grid: { ...s.grid, ...patch } })),
    setQuantize: (patch) => set((s) => ({ quantize: { ...s.quantize, ...patch } })),
    setAuditionEnabled: (auditionEnabled) => set({ auditionEnabled }),

    // --- Vue ---

    setView: (patch) => set((s) => ({ view: { ...s.view, ...patch } })),
    setHistory: (history) => set({ history }),
  }));
}

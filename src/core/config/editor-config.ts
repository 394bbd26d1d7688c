// src/core/config/editor-config.ts
// Centralisation des constantes et flags de l'éditeur piano roll.

/**
 * Réglages de l'éditeur.
 * Tout est exprimé en beats, pixels CSS ou valeurs MIDI.
 */
export type PianoRollConfig = {
  /** Pitch le plus haut affiché (ligne 0 à l'écran) */
  maxPitch: number;
  minPitch: number;
  /** Division de grille par défaut (0.25 = double-croche) */
  defaultGridDivision: number;
  /** Durée initiale d'une note dessinée (avant tout resize) */
  defaultNoteDuration: number;
  defaultVelocity: number;
  /** Bande de détection des bords de note pour le resize */
  resizeEdgePx: number;
  /** Distance minimale avant qu'un appui devienne un drag */
  dragSlopPx: number;
  /** Rayon de hit-test des marqueurs de boucle dans la règle */
  loopMarkerHitPx: number;
  maxLoopBeats: number;
  beatsPerBar: number;
  /** Marge (en beats) ajoutée après la boucle pour le zoom minimum */
  zoomMarginBeats: number;
  /** Plus petite fenêtre visible (0.25 = une double-croche remplit la vue) */
  minZoomBeats: number;
  /** Pixels de drag vertical pour doubler le zoom */
  zoomSensitivityPx: number;
  chordPreviewMs: number;
  auditionReleaseVelocity: number;
  defaultPixelsPerBeat: number;
  defaultPixelsPerNote: number;
  /** Mode "peinture" : un drag depuis une note créée en pose d'autres */
  paintOnDrag: boolean;
  auditionEnabled: boolean;
  /** Profondeur max de la pile d'annulation (null = illimitée) */
  undoLimit: number | null;
};

export const DEFAULT_PIANO_ROLL_CONFIG: Readonly<PianoRollConfig> = Object.freeze({
  maxPitch: 127,
  minPitch: 0,
  defaultGridDivision: 0.25,
  defaultNoteDuration: 1,
  defaultVelocity: 100,
  resizeEdgePx: 9,
  dragSlopPx: 3,
  loopMarkerHitPx: 10,
  maxLoopBeats: 256,
  beatsPerBar: 4,
  zoomMarginBeats: 16,
  minZoomBeats: 0.25,
  zoomSensitivityPx: 100,
  chordPreviewMs: 500,
  auditionReleaseVelocity: 64,
  defaultPixelsPerBeat: 80,
  defaultPixelsPerNote: 16,
  paintOnDrag: false,
  auditionEnabled: true,
  undoLimit: null,
});

type NumericKey = {
  [K in keyof PianoRollConfig]: PianoRollConfig[K] extends number ? K : never;
}[keyof PianoRollConfig];

// Bornes acceptées pour chaque réglage numérique : hors bornes → valeur par défaut.
const NUMERIC_BOUNDS: Record<NumericKey, readonly [min: number, max: number]> = {
  maxPitch: [0, 127],
  minPitch: [0, 127],
  defaultGridDivision: [1 / 64, 16],
  defaultNoteDuration: [1 / 64, 256],
  defaultVelocity: [1, 127],
  resizeEdgePx: [0, 64],
  dragSlopPx: [0, 64],
  loopMarkerHitPx: [0, 64],
  maxLoopBeats: [1, 4096],
  beatsPerBar: [1, 32],
  zoomMarginBeats: [0, 1024],
  minZoomBeats: [1 / 64, 16],
  zoomSensitivityPx: [1, 10_000],
  chordPreviewMs: [0, 60_000],
  auditionReleaseVelocity: [0, 127],
  defaultPixelsPerBeat: [1, 10_000],
  defaultPixelsPerNote: [1, 256],
};

function sanitizeNumber(key: NumericKey, value: number | undefined): number {
  const fallback = DEFAULT_PIANO_ROLL_CONFIG[key];
  if (value === undefined || !Number.isFinite(value)) return fallback;
  const [min, max] = NUMERIC_BOUNDS[key];
  return value >= min && value <= max ? value : fallback;
}

/**
 * Fusionne une surcharge partielle avec les valeurs par défaut.
 * Les nombres non finis ou hors bornes reprennent leur valeur par défaut.
 */
export function resolvePianoRollConfig(partial: Partial<PianoRollConfig> = {}): PianoRollConfig {
  const num = (key: NumericKey): number => sanitizeNumber(key, partial[key]);

  const limit = partial.undoLimit;
  const undoLimit =
    limit === undefined || limit === null || !Number.isInteger(limit) || limit < 1
      ? DEFAULT_PIANO_ROLL_CONFIG.undoLimit
      : limit;

  const resolved: PianoRollConfig = {
    maxPitch: num("maxPitch"),
    minPitch: num("minPitch"),
    defaultGridDivision: num("defaultGridDivision"),
    defaultNoteDuration: num("defaultNoteDuration"),
    defaultVelocity: Math.round(num("defaultVelocity")),
    resizeEdgePx: num("resizeEdgePx"),
    dragSlopPx: num("dragSlopPx"),
    loopMarkerHitPx: num("loopMarkerHitPx"),
    maxLoopBeats: num("maxLoopBeats"),
    beatsPerBar: num("beatsPerBar"),
    zoomMarginBeats: num("zoomMarginBeats"),
    minZoomBeats: num("minZoomBeats"),
    zoomSensitivityPx: num("zoomSensitivityPx"),
    chordPreviewMs: num("chordPreviewMs"),
    auditionReleaseVelocity: num("auditionReleaseVelocity"),
    defaultPixelsPerBeat: num("defaultPixelsPerBeat"),
    defaultPixelsPerNote: num("defaultPixelsPerNote"),
    paintOnDrag: partial.paintOnDrag ?? DEFAULT_PIANO_ROLL_CONFIG.paintOnDrag,
    auditionEnabled: partial.auditionEnabled ?? DEFAULT_PIANO_ROLL_CONFIG.auditionEnabled,
    undoLimit,
  };

  if (resolved.minPitch > resolved.maxPitch) {
    resolved.minPitch = DEFAULT_PIANO_ROLL_CONFIG.minPitch;
    resolved.maxPitch = DEFAULT_PIANO_ROLL_CONFIG.maxPitch;
  }
  return resolved;
}

// ---- Flags de debug ----

/** Les warnings dev sont actifs hors production, ou si PIANOROLL_DEBUG=1. */
export function isDevLoggingEnabled(): boolean {
  if (typeof process === "undefined") return true;
  if (process.env.PIANOROLL_DEBUG === "1") return true;
  return process.env.NODE_ENV !== "production";
}

/** Les traces debug (opérations ignorées) demandent PIANOROLL_DEBUG=1. */
export function isDebugTraceEnabled(): boolean {
  return typeof process !== "undefined" && process.env.PIANOROLL_DEBUG === "1";
}

// src/lib/audio/types.ts

// ---- Notes / Clips ----

/**
 * Déclaration d'une note MIDI dans un clip.
 * - id : identifiant stable (un nouvel id est créé à chaque duplication / découpe)
 * - pitch : numéro de note 0..127 (MIDI)
 * - velocity : intensité MIDI 1..127
 * - time : position de départ en beats (relative au début du clip)
 * - duration : durée de la note en beats (> 0)
 * - selected : note sélectionnée dans l'éditeur
 */
export type MidiNote = {
  readonly id: string;
  readonly pitch: number;    // 0..127
  readonly velocity: number; // 1..127
  readonly time: number;     // en beats, relatif au début du clip
  readonly duration: number; // en beats
  readonly selected: boolean;
};

/**
 * Déclaration d'un clip MIDI édité par le piano roll.
 * - loopStart / loopLength : région de boucle (en beats)
 * - lengthBeats : longueur du clip dans l'arrangement (en beats)
 *
 * `loopLength` reste dans [gridDivision, 256] et s'étend automatiquement
 * (arrondi à la mesure suivante) quand une note dépasse la fin de boucle.
 */
export type MidiClip = {
  readonly id: string;
  readonly trackId: string;
  readonly name?: string;
  readonly notes: ReadonlyArray<MidiNote>;
  readonly loopStart: number;
  readonly loopLength: number;
  readonly lengthBeats: number;
};

/** Fin d'une note en beats. */
export function noteEnd(note: Pick<MidiNote, "time" | "duration">): number {
  return note.time + note.duration;
}

// ---- CC / Automation ----

/**
 * Types de contrôleurs disponibles dans la lane CC.
 * pitchBend n'est pas un CC MIDI (ccNumber = -1).
 */
export type CcType =
  | "modWheel"
  | "breath"
  | "volume"
  | "pan"
  | "expression"
  | "sustain"
  | "pitchBend";

/** Point d'automation (valeur normalisée 0..1). */
export type CcPoint = {
  readonly id: string;
  readonly time: number;  // en beats
  readonly value: number; // 0..1
};

/**
 * Lane CC : un seul type de contrôleur à la fois.
 * Changer `ccType` vide les points (type et données sont couplés).
 */
export type CcLane = {
  readonly ccType: CcType;
  readonly points: ReadonlyArray<CcPoint>; // triés par time
};

// ---- Moteur audio externe ----

/**
 * Interface minimale du moteur audio consommée par l'éditeur.
 * Tous les appels sont fire-and-forget.
 */
export interface PianoRollAudioEngine {
  noteOn(trackId: string, pitch: number, velocity: number): void;
  noteOff(trackId: string, pitch: number, velocity: number): void;
  /** Quantize côté moteur : l'appelant doit recharger le clip ensuite. */
  quantizeClip?(clipId: string, gridDivision: number): void;
}

// ---- Outils ----

/** Outils de l'éditeur (outil "collant" sélectionné dans la toolbar). */
export type ToolMode = "draw" | "select" | "eraser" | "duplicate" | "slice";

/** État courant des touches modificatrices. */
export type ModifierState = {
  readonly shift: boolean;
  readonly alt: boolean;
  /** Cmd (macOS) ou Ctrl (autres plateformes) */
  readonly ctrlOrCmd: boolean;
};

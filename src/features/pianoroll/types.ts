// src/features/pianoroll/types.ts

import type { MidiClip, MidiNote, ModifierState } from "@/lib/audio/types";
import type { NoteEdge } from "./core/hit";

/** Position du pointeur en pixels CSS, relative au viewport de la zone concernée. */
export type PointerInput = {
  x: number;
  y: number;
};

export type PointerOrigin = PointerInput;

/**
 * Ce qu'un appui deviendra :
 * - note : clic = sélection, drag = déplacement
 * - duplicate : clic = copie en place, drag = copie déplacée
 * - created : note posée à l'appui, un drag la déplace (ou peint)
 * - emptySelect : clic = désélection, drag = sélection rectangle
 * - none : l'action a déjà eu lieu à l'appui (slice, accord, rien)
 */
export type PressIntent =
  | { kind: "note"; noteId: string; shift: boolean }
  | { kind: "duplicate"; noteId: string }
  | { kind: "created"; noteId: string }
  | { kind: "emptySelect" }
  | { kind: "none" };

/**
 * Session d'interaction dans la grille de notes (union étiquetée :
 * une seule forme valide à la fois).
 */
export type InteractionSession =
  | { kind: "idle" }
  | {
      kind: "pressed";
      origin: PointerOrigin;
      intent: PressIntent;
      modifiers: ModifierState;
    }
  | {
      kind: "selecting";
      originBeat: number;
      originPitch: number;
    }
  | {
      kind: "moving";
      origin: PointerOrigin;
      /** Note sous le pointeur (audition) */
      anchorNoteId: string;
      /** Positions au début du drag, par id : le déplacement est toujours relatif à elles */
      dragStart: ReadonlyMap<string, MidiNote>;
      before: MidiClip;
      label: string;
      /** Commit même sans déplacement (duplication) */
      commitAlways: boolean;
    }
  | {
      kind: "resizing";
      noteId: string;
      edge: NoteEdge;
      original: MidiNote;
      before: MidiClip;
    }
  | {
      kind: "painting";
      pitch: number;
      velocity: number;
      lastBeat: number;
      painted: number;
      before: MidiClip;
    }
  | {
      kind: "erasing";
      erased: ReadonlySet<string>;
      before: MidiClip;
    }
  | {
      kind: "velocityEditing";
      before: MidiClip;
    };

export type LoopMarker = "start" | "end" | "middle";

/** Gestes de la règle (exclusifs avec ceux de la grille). */
export type RulerSession =
  | { kind: "idle" }
  | { kind: "rulerPressed"; origin: PointerOrigin }
  | {
      kind: "loopDrag";
      marker: LoopMarker;
      /** Dernier beat aligné (drag de la région entière) */
      lastBeat: number;
      before: MidiClip;
    }
  | {
      kind: "rulerZoom";
      startY: number;
      startPixelsPerBeat: number;
      anchorBeat: number;
    };

export type PianoRollView = {
  pixelsPerBeat: number;
  pixelsPerNote: number;
  scrollX: number;
  scrollY: number;
  width: number;
  height: number;
  velocityLaneHeight: number;
};

/** Touche pressée, indépendante de l'API d'événements de l'hôte. */
export type KeyInput = {
  key: string;
  shift?: boolean;
  alt?: boolean;
  ctrlOrCmd?: boolean;
};

export type QuantizeSettings = {
  /** null = utiliser la grille de snap effective */
  division: number | null;
  triplet: boolean;
  /** 0..1, 1 = quantize complet */
  strength: number;
};

// src/features/pianoroll/core/hit.ts

import { noteEnd, type MidiNote } from "@/lib/audio/types";
import type { Coordinates } from "./coords";

export type NoteEdge = "left" | "right";

export type Hit =
  | { type: "empty" }
  | { type: "note"; noteId: string }
  | { type: "resize"; noteId: string; edge: NoteEdge };

export type LoopMarkerHit = "start" | "end" | "middle" | null;

/**
 * Bord de note sous le pointeur, dans une bande de `edgePx` de part et d'autre.
 * Le pointeur doit être dans la rangée de la note ; le bord gauche est prioritaire.
 */
export function getEdgeAt(
  x: number,
  y: number,
  note: MidiNote,
  coords: Coordinates,
  edgePx: number,
): NoteEdge | null {
  const top = coords.pitchToY(note.pitch);
  if (y < top || y >= top + coords.pixelsPerNote) return null;

  const startX = coords.beatToX(note.time);
  const endX = coords.beatToX(noteEnd(note));
  if (Math.abs(x - startX) < edgePx) return "left";
  if (Math.abs(x - endX) < edgePx) return "right";
  return null;
}

/** Note dont l'intervalle [time, end) contient `beat` sur la rangée `pitch`. */
export function findNoteAt(notes: ReadonlyArray<MidiNote>, beat: number, pitch: number): MidiNote | null {
  // Scan inversé : les dernières notes sont dessinées au-dessus
  for (let i = notes.length - 1; i >= 0; i--) {
    const n = notes[i];
    if (n.pitch === pitch && beat >= n.time && beat < noteEnd(n)) return n;
  }
  return null;
}

/** Première note (toutes hauteurs) qui recouvre `beat`, bornes exclues. */
export function findNoteSpanning(notes: ReadonlyArray<MidiNote>, beat: number): MidiNote | null {
  return notes.find((n) => beat > n.time && beat < noteEnd(n)) ?? null;
}

/**
 * getHitAt
 *
 * Détecte ce qui est sous le pointeur dans la grille de notes :
 * - bord gauche / droit d'une note (resize), prioritaire sur le corps
 * - corps d'une note (move / sélection)
 * - vide
 */
export function getHitAt(
  x: number,
  y: number,
  notes: ReadonlyArray<MidiNote>,
  coords: Coordinates,
  edgePx: number,
): Hit {
  for (let i = notes.length - 1; i >= 0; i--) {
    const n = notes[i];
    const edge = getEdgeAt(x, y, n, coords, edgePx);
    if (edge) return { type: "resize", noteId: n.id, edge };
  }

  const hit = findNoteAt(notes, coords.xToBeat(x), coords.yToPitch(y));
  return hit ? { type: "note", noteId: hit.id } : { type: "empty" };
}

// ================= RULER =================

/**
 * Hit-test des marqueurs de boucle dans la règle (x en pixels viewport).
 * Début puis fin dans un rayon de `radiusPx`, puis l'intérieur de la région.
 */
export function getLoopMarkerAt(
  x: number,
  loop: { start: number; end: number },
  coords: Coordinates,
  radiusPx: number,
): LoopMarkerHit {
  const beat = coords.xToBeat(x);
  const radiusBeats = radiusPx / coords.pixelsPerBeat;

  if (Math.abs(beat - loop.start) < radiusBeats) return "start";
  if (Math.abs(beat - loop.end) < radiusBeats) return "end";
  if (beat > loop.start && beat < loop.end) return "middle";
  return null;
}

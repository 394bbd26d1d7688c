// src/features/pianoroll/state/midi-clip.reducer.ts

import { noteEnd, type MidiClip, type MidiNote } from "@/lib/audio/types";

/**
 * Réducteurs purs sur un clip MIDI : chaque fonction retourne un nouveau clip
 * (jamais de mutation en place), ce qui permet de garder les snapshots
 * d'historique tels quels.
 */

export type LoopLimits = {
  /** Plus petite longueur de boucle autorisée (une division de grille) */
  minLength: number;
  maxLength: number;
  beatsPerBar: number;
};

export type SelectionRect = {
  beatA: number;
  beatB: number;
  pitchA: number;
  pitchB: number;
};

/* -------------------------------------------------------
 * 1. CRÉATION / COPIE
 * ------------------------------------------------------*/
export function createMidiClip(init: {
  id: string;
  trackId: string;
  name?: string;
  notes?: ReadonlyArray<MidiNote>;
  loopStart?: number;
  loopLength?: number;
  lengthBeats?: number;
}): MidiClip {
  const loopLength = init.loopLength ?? 4;
  return {
    id: init.id,
    trackId: init.trackId,
    name: init.name,
    notes: init.notes ?? [],
    loopStart: init.loopStart ?? 0,
    loopLength,
    lengthBeats: init.lengthBeats ?? loopLength,
  };
}

/** Copie profonde (les snapshots d'historique ne partagent rien avec le clip vivant). */
export function cloneClip(clip: MidiClip): MidiClip {
  return { ...clip, notes: clip.notes.map((n) => ({ ...n })) };
}

/** Égalité structurelle des notes (ordre compris) et de la région de boucle. */
export function clipsEqual(a: MidiClip, b: MidiClip): boolean {
  if (a === b) return true;
  if (
    a.loopStart !== b.loopStart ||
    a.loopLength !== b.loopLength ||
    a.lengthBeats !== b.lengthBeats ||
    a.notes.length !== b.notes.length
  ) {
    return false;
  }
  return a.notes.every((n, i) => {
    const m = b.notes[i];
    return (
      n.id === m.id &&
      n.pitch === m.pitch &&
      n.time === m.time &&
      n.duration === m.duration &&
      n.velocity === m.velocity &&
      n.selected === m.selected
    );
  });
}

/** Même chose sans tenir compte de la sélection (changement "visible" du contenu). */
export function clipContentEqual(a: MidiClip, b: MidiClip): boolean {
  const strip = (c: MidiClip): MidiClip => ({ ...c, notes: c.notes.map((n) => ({ ...n, selected: false })) });
  return clipsEqual(strip(a), strip(b));
}

/* -------------------------------------------------------
 * 2. NOTES
 * ------------------------------------------------------*/
export function replaceNotes(clip: MidiClip, notes: ReadonlyArray<MidiNote>): MidiClip {
  return { ...clip, notes };
}

export function addNotes(clip: MidiClip, notes: ReadonlyArray<MidiNote>): MidiClip {
  return { ...clip, notes: [...clip.notes, ...notes] };
}

export function removeNotes(clip: MidiClip, ids: ReadonlySet<string>): MidiClip {
  return { ...clip, notes: clip.notes.filter((n) => !ids.has(n.id)) };
}

export function updateNote(clip: MidiClip, id: string, patch: Partial<Omit<MidiNote, "id">>): MidiClip {
  return { ...clip, notes: clip.notes.map((n) => (n.id === id ? { ...n, ...patch } : n)) };
}

export function findNote(clip: MidiClip, id: string): MidiNote | undefined {
  return clip.notes.find((n) => n.id === id);
}

export function selectedNotes(clip: MidiClip): MidiNote[] {
  return clip.notes.filter((n) => n.selected);
}

/**
 * Découpe une note en deux à `beat` (strictement à l'intérieur).
 * Les deux moitiés reçoivent de nouveaux ids ; null si la découpe est refusée.
 */
export function sliceNote(
  clip: MidiClip,
  id: string,
  beat: number,
  ids: readonly [left: string, right: string],
): MidiClip | null {
  const note = findNote(clip, id);
  if (!note || beat <= note.time || beat >= noteEnd(note)) return null;

  const left: MidiNote = { ...note, id: ids[0], duration: beat - note.time };
  const right: MidiNote = { ...note, id: ids[1], time: beat, duration: noteEnd(note) - beat };
  return { ...clip, notes: [...clip.notes.filter((n) => n.id !== id), left, right] };
}

/* -------------------------------------------------------
 * 3. SÉLECTION
 * ------------------------------------------------------*/
export function selectAll(clip: MidiClip): MidiClip {
  return { ...clip, notes: clip.notes.map((n) => (n.selected ? n : { ...n, selected: true })) };
}

export function deselectAll(clip: MidiClip): MidiClip {
  return { ...clip, notes: clip.notes.map((n) => (n.selected ? { ...n, selected: false } : n)) };
}

/** Sélectionne exactement les ids donnés. */
export function selectOnly(clip: MidiClip, ids: ReadonlySet<string>): MidiClip {
  return {
    ...clip,
    notes: clip.notes.map((n) => {
      const selected = ids.has(n.id);
      return n.selected === selected ? n : { ...n, selected };
    }),
  };
}

/**
 * Clic sur une note : bascule sa sélection.
 * - exclusive : toutes les autres notes sont désélectionnées
 * - sinon (shift) : les autres gardent leur état
 */
export function toggleNoteSelection(clip: MidiClip, id: string, exclusive: boolean): MidiClip {
  return {
    ...clip,
    notes: clip.notes.map((n) => {
      if (n.id === id) return { ...n, selected: !n.selected };
      if (exclusive && n.selected) return { ...n, selected: false };
      return n;
    }),
  };
}

/**
 * Sélection rectangle par recouvrement : une note est sélectionnée si son
 * intervalle [time, end) recoupe l'intervalle de temps du rectangle et si sa
 * hauteur est dans l'intervalle de pitch (bornes incluses).
 */
export function selectInRect(clip: MidiClip, rect: SelectionRect): MidiClip {
  const minBeat = Math.min(rect.beatA, rect.beatB);
  const maxBeat = Math.max(rect.beatA, rect.beatB);
  const minPitch = Math.min(rect.pitchA, rect.pitchB);
  const maxPitch = Math.max(rect.pitchA, rect.pitchB);

  return {
    ...clip,
    notes: clip.notes.map((n) => {
      const selected = n.time < maxBeat && noteEnd(n) > minBeat && n.pitch >= minPitch && n.pitch <= maxPitch;
      return n.selected === selected ? n : { ...n, selected };
    }),
  };
}

/* -------------------------------------------------------
 * 4. LOOP : longueur / début / extension automatique
 * ------------------------------------------------------*/
export function clampLoopLength(length: number, limits: LoopLimits): number {
  if (!Number.isFinite(length)) return limits.minLength;
  return Math.max(limits.minLength, Math.min(limits.maxLength, length));
}

/** Nouvelle longueur de boucle ; la longueur du clip suit (synchro à sens unique). */
export function setLoopLength(clip: MidiClip, length: number, limits: LoopLimits): MidiClip {
  const loopLength = clampLoopLength(length, limits);
  return { ...clip, loopLength, lengthBeats: loopLength };
}

export function setLoopStart(clip: MidiClip, start: number): MidiClip {
  return { ...clip, loopStart: Math.max(0, Number.isFinite(start) ? start : 0) };
}

function roundUpToBar(beats: number, beatsPerBar: number): number {
  return Math.ceil(beats / beatsPerBar) * beatsPerBar;
}

/**
 * Étend la boucle à la mesure suivante quand `end` la dépasse.
 * Ne réduit jamais la boucle ; la longueur du clip suit si elle grandit.
 */
export function autoExtendLoop(clip: MidiClip, end: number, limits: LoopLimits): MidiClip {
  if (!(end > clip.loopLength)) return clip;
  const loopLength = Math.min(limits.maxLength, roundUpToBar(end, limits.beatsPerBar));
  if (loopLength <= clip.loopLength) return clip;
  return { ...clip, loopLength, lengthBeats: Math.max(clip.lengthBeats, loopLength) };
}

/** Auto-extension pour un lot de notes (move / paste / resize). */
export function autoExtendLoopForNotes(clip: MidiClip, notes: ReadonlyArray<MidiNote>, limits: LoopLimits): MidiClip {
  if (notes.length === 0) return clip;
  return autoExtendLoop(clip, Math.max(...notes.map(noteEnd)), limits);
}

/** Agrandit le clip (pas la boucle) jusqu'à la mesure contenant `end`. */
export function autoExtendClipLength(clip: MidiClip, end: number, beatsPerBar: number): MidiClip {
  if (!(end > clip.lengthBeats)) return clip;
  return { ...clip, lengthBeats: roundUpToBar(end, beatsPerBar) };
}

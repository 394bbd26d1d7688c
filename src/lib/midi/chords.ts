// src/lib/midi/chords.ts

import { NOTE_NAMES, type NoteName } from "./scales";

export type ChordType =
  | "major"
  | "minor"
  | "dominant7"
  | "major7"
  | "minor7"
  | "diminished"
  | "augmented"
  | "sus2"
  | "sus4"
  | "diminished7"
  | "add9"
  | "sixth"
  | "minor6";

type ChordDefinition = {
  readonly displayName: string;
  readonly intervals: ReadonlyArray<number>;
};

export const CHORD_DEFINITIONS: Readonly<Record<ChordType, ChordDefinition>> = {
  major: { displayName: "Maj", intervals: [0, 4, 7] },
  minor: { displayName: "Min", intervals: [0, 3, 7] },
  dominant7: { displayName: "7", intervals: [0, 4, 7, 10] },
  major7: { displayName: "Maj7", intervals: [0, 4, 7, 11] },
  minor7: { displayName: "Min7", intervals: [0, 3, 7, 10] },
  diminished: { displayName: "Dim", intervals: [0, 3, 6] },
  augmented: { displayName: "Aug", intervals: [0, 4, 8] },
  sus2: { displayName: "Sus2", intervals: [0, 2, 7] },
  sus4: { displayName: "Sus4", intervals: [0, 5, 7] },
  diminished7: { displayName: "Dim7", intervals: [0, 3, 6, 9] },
  add9: { displayName: "Add9", intervals: [0, 4, 7, 14] },
  sixth: { displayName: "6", intervals: [0, 4, 7, 9] },
  minor6: { displayName: "Min6", intervals: [0, 3, 7, 9] },
};

/**
 * Accord prêt à être posé par la palette.
 * - inversion : 0 = état fondamental, 1 = premier renversement…
 * - octave : octave de la fondamentale (C4 = 60)
 */
export type ChordConfiguration = {
  readonly root: NoteName;
  readonly type: ChordType;
  readonly inversion: number;
  readonly octave: number;
};

export const DEFAULT_CHORD: ChordConfiguration = { root: "C", type: "major", inversion: 0, octave: 4 };

export function maxInversion(type: ChordType): number {
  return CHORD_DEFINITIONS[type].intervals.length - 1;
}

/** Pitches MIDI triés de l'accord, renversement appliqué. */
export function chordPitches(chord: ChordConfiguration): number[] {
  const base = NOTE_NAMES.indexOf(chord.root) + (chord.octave + 1) * 12;
  const notes = CHORD_DEFINITIONS[chord.type].intervals.map((i) => base + i);
  const byPitch = (a: number, b: number) => a - b;

  // Chaque renversement remonte la note la plus grave d'une octave
  for (let i = 0; i < chord.inversion && i < notes.length; i++) {
    notes.sort(byPitch);
    notes[0] += 12;
  }
  return notes.sort(byPitch);
}

export function chordDisplayName(chord: ChordConfiguration): string {
  const base = `${chord.root} ${CHORD_DEFINITIONS[chord.type].displayName}`;
  if (chord.inversion === 0) return base;
  const inv = ["", "1st", "2nd", "3rd"][chord.inversion] ?? `${chord.inversion}th`;
  return `${base} (${inv} inv)`;
}

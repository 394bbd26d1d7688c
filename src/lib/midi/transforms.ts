// src/lib/midi/transforms.ts

import { noteEnd, type MidiNote } from "@/lib/audio/types";

/** Source aléatoire uniforme dans [0, 1) (injectable pour les tests). */
export type RandomSource = () => number;

const SWING_MAX_DELAY_BEATS = 0.33;
const HUMANIZE_MAX_OFFSET_BEATS = 0.1;
const VELOCITY_MAX_VARIATION = 50;

function clampVelocity(v: number): number {
  return Math.max(1, Math.min(127, v));
}

function selectedOf(notes: ReadonlyArray<MidiNote>): MidiNote[] {
  return notes.filter((n) => n.selected);
}

/**
 * Quantize the selected notes: each start moves toward the nearest grid line.
 * `strength` (0..1) allows a partial move; duration is left untouched.
 */
export function quantizeNotes(
  notes: ReadonlyArray<MidiNote>,
  division: number,
  strength: number = 1,
): MidiNote[] {
  if (!(division > 0)) return notes.slice();
  return notes.map((n) => {
    if (!n.selected) return n;
    const target = Math.round(n.time / division) * division;
    const time = strength >= 1 ? target : n.time + (target - n.time) * strength;
    return { ...n, time: Math.max(0, time) };
  });
}

/** Selected notes on an odd eighth slot are delayed by `amount * 0.33` beats. */
export function applySwing(notes: ReadonlyArray<MidiNote>, amount: number): MidiNote[] {
  const delay = amount * SWING_MAX_DELAY_BEATS;
  return notes.map((n) => {
    if (!n.selected) return n;
    const eighthSlot = Math.round(n.time / 0.5);
    return eighthSlot % 2 === 1 ? { ...n, time: n.time + delay } : n;
  });
}

/** Time-scale the selection around its earliest start. */
export function applyStretch(notes: ReadonlyArray<MidiNote>, factor: number): MidiNote[] {
  const selected = selectedOf(notes);
  if (selected.length === 0 || !(factor > 0)) return notes.slice();

  const anchor = Math.min(...selected.map((n) => n.time));
  return notes.map((n) => {
    if (!n.selected) return n;
    return {
      ...n,
      time: anchor + (n.time - anchor) * factor,
      duration: n.duration * factor,
    };
  });
}

/** Independent uniform start offset in [-0.1a, +0.1a] beats, never before 0. */
export function applyHumanize(
  notes: ReadonlyArray<MidiNote>,
  amount: number,
  random: RandomSource = Math.random,
): MidiNote[] {
  const maxOffset = HUMANIZE_MAX_OFFSET_BEATS * amount;
  return notes.map((n) => {
    if (!n.selected) return n;
    const offset = (random() * 2 - 1) * maxOffset;
    return { ...n, time: Math.max(0, n.time + offset) };
  });
}

/**
 * Per pitch, extend each selected note so that it ends where the next
 * selected note of the same pitch starts. The last note of each pitch keeps
 * its duration, as does a note sharing its start with the next one.
 */
export function applyLegato(notes: ReadonlyArray<MidiNote>): MidiNote[] {
  const byPitch = new Map<number, MidiNote[]>();
  for (const n of selectedOf(notes)) {
    const group = byPitch.get(n.pitch);
    if (group) group.push(n);
    else byPitch.set(n.pitch, [n]);
  }

  const nextDuration = new Map<string, number>();
  for (const group of byPitch.values()) {
    group.sort((a, b) => a.time - b.time);
    for (let i = 0; i < group.length - 1; i++) {
      const cur = group[i];
      const next = group[i + 1];
      const duration = next.time - cur.time;
      if (duration > 0) nextDuration.set(cur.id, duration);
    }
  }

  return notes.map((n) => {
    const duration = nextDuration.get(n.id);
    return duration === undefined ? n : { ...n, duration };
  });
}

/** Mirror each selected note's centre around the selection midpoint. */
export function reverseNotes(notes: ReadonlyArray<MidiNote>): MidiNote[] {
  const selected = selectedOf(notes);
  if (selected.length === 0) return notes.slice();

  const start = Math.min(...selected.map((n) => n.time));
  const end = Math.max(...selected.map(noteEnd));
  const center = (start + end) / 2;

  return notes.map((n) => {
    if (!n.selected) return n;
    const noteCenter = n.time + n.duration / 2;
    const mirrored = 2 * center - noteCenter;
    return { ...n, time: Math.max(0, mirrored - n.duration / 2) };
  });
}

/**
 * Random integer velocity offset in [-round(50a), +round(50a)], clamped to
 * 1..127. Targets the selection, or every note when nothing is selected.
 * A non-positive amount returns the notes unchanged.
 */
export function randomizeVelocity(
  notes: ReadonlyArray<MidiNote>,
  amount: number,
  random: RandomSource = Math.random,
): MidiNote[] {
  if (!(amount > 0)) return notes.slice();

  const maxVariation = Math.round(amount * VELOCITY_MAX_VARIATION);
  const hasSelection = notes.some((n) => n.selected);

  return notes.map((n) => {
    if (hasSelection && !n.selected) return n;
    const variation = Math.floor(random() * (maxVariation * 2 + 1)) - maxVariation;
    return { ...n, velocity: clampVelocity(n.velocity + variation) };
  });
}

/**
 * Shift the selection by `semitones`. Returns null (nothing applied) when any
 * selected note would leave 0..127.
 */
export function transposeNotes(notes: ReadonlyArray<MidiNote>, semitones: number): MidiNote[] | null {
  for (const n of notes) {
    if (!n.selected) continue;
    const pitch = n.pitch + semitones;
    if (pitch < 0 || pitch > 127) return null;
  }
  return notes.map((n) => (n.selected ? { ...n, pitch: n.pitch + semitones } : n));
}

/** "Transpose up 2 semitones", "Transpose down 1 octave"… */
export function transposeLabel(semitones: number): string {
  const direction = semitones > 0 ? "up" : "down";
  const amount = Math.abs(semitones);
  if (amount === 12) return `Transpose ${direction} 1 octave`;
  return `Transpose ${direction} ${amount} ${amount === 1 ? "semitone" : "semitones"}`;
}

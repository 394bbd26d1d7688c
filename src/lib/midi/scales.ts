// src/lib/midi/scales.ts

export const NOTE_NAMES = ["C", "C#", "D", "D#", "E", "F", "F#", "G", "G#", "A", "A#", "B"] as const;

export type NoteName = (typeof NOTE_NAMES)[number];

export type ScaleType =
  | "major"
  | "minor"
  | "dorian"
  | "phrygian"
  | "lydian"
  | "mixolydian"
  | "harmonicMinor"
  | "pentatonicMajor"
  | "pentatonicMinor"
  | "blues"
  | "chromatic";

type ScaleDefinition = {
  readonly displayName: string;
  /** Demi-tons depuis la tonique */
  readonly intervals: ReadonlyArray<number>;
};

export const SCALE_DEFINITIONS: Readonly<Record<ScaleType, ScaleDefinition>> = {
  major: { displayName: "Major", intervals: [0, 2, 4, 5, 7, 9, 11] },
  minor: { displayName: "Minor", intervals: [0, 2, 3, 5, 7, 8, 10] },
  dorian: { displayName: "Dorian", intervals: [0, 2, 3, 5, 7, 9, 10] },
  phrygian: { displayName: "Phrygian", intervals: [0, 1, 3, 5, 7, 8, 10] },
  lydian: { displayName: "Lydian", intervals: [0, 2, 4, 6, 7, 9, 11] },
  mixolydian: { displayName: "Mixolydian", intervals: [0, 2, 4, 5, 7, 9, 10] },
  harmonicMinor: { displayName: "Harmonic Minor", intervals: [0, 2, 3, 5, 7, 8, 11] },
  pentatonicMajor: { displayName: "Pentatonic Major", intervals: [0, 2, 4, 7, 9] },
  pentatonicMinor: { displayName: "Pentatonic Minor", intervals: [0, 3, 5, 7, 10] },
  blues: { displayName: "Blues", intervals: [0, 3, 5, 6, 7, 10] },
  chromatic: { displayName: "Chromatic", intervals: [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11] },
};

/** Gamme utilisée pour le scale-lock (configuration uniquement, sans état). */
export type Scale = {
  readonly root: NoteName;
  readonly type: ScaleType;
};

const MIN_PITCH = 0;
const MAX_PITCH = 127;

function pitchClassOffset(pitch: number, scale: Scale): number {
  const root = NOTE_NAMES.indexOf(scale.root);
  return (((pitch - root) % 12) + 12) % 12;
}

export function containsPitch(scale: Scale, pitch: number): boolean {
  return SCALE_DEFINITIONS[scale.type].intervals.includes(pitchClassOffset(pitch, scale));
}

/**
 * Nearest in-scale pitch. Searches down and up from `pitch`, inside 0..127;
 * on equal distance the lower neighbour wins.
 */
export function snapPitchToScale(pitch: number, scale: Scale): number {
  if (containsPitch(scale, pitch)) return pitch;

  let below = pitch;
  while (below >= MIN_PITCH && !containsPitch(scale, below)) below--;
  let above = pitch;
  while (above <= MAX_PITCH && !containsPitch(scale, above)) above++;

  if (below < MIN_PITCH) return Math.min(above, MAX_PITCH);
  if (above > MAX_PITCH) return below;
  return pitch - below <= above - pitch ? below : above;
}

/** Degré 1-based de la note dans la gamme (0 si hors gamme). */
export function scaleDegree(scale: Scale, pitch: number): number {
  if (!containsPitch(scale, pitch)) return 0;
  return SCALE_DEFINITIONS[scale.type].intervals.indexOf(pitchClassOffset(pitch, scale)) + 1;
}

export function isScaleRoot(scale: Scale, pitch: number): boolean {
  return pitchClassOffset(pitch, scale) === 0;
}

export function pitchesInRange(scale: Scale, minPitch: number, maxPitch: number): number[] {
  const out: number[] = [];
  for (let p = minPitch; p <= maxPitch; p++) {
    if (containsPitch(scale, p)) out.push(p);
  }
  return out;
}

export function scaleDisplayName(scale: Scale): string {
  return `${scale.root} ${SCALE_DEFINITIONS[scale.type].displayName}`;
}

/** "C4" pour 60, "A#-1" pour 10. */
export function pitchName(pitch: number): string {
  const octave = Math.floor(pitch / 12) - 1;
  return `${NOTE_NAMES[((pitch % 12) + 12) % 12]}${octave}`;
}

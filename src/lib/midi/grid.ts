// src/lib/midi/grid.ts

/**
 * Grid helpers for the piano roll.
 * A grid division is expressed in beats (0.25 = sixteenth note).
 */

// Absorbs float noise so that a value already on the grid stays there
// (e.g. 3 * (0.25 * 2/3) / (0.25 * 2/3) = 2.9999999999999996).
const GRID_EPSILON = 1e-9;

export type GridDivisionOption = {
  readonly label: string;
  readonly beats: number;
};

/** Divisions offered by the grid selector, coarsest first. */
export const GRID_DIVISIONS: ReadonlyArray<GridDivisionOption> = [
  { label: "1/1", beats: 4 },
  { label: "1/2", beats: 2 },
  { label: "1/4", beats: 1 },
  { label: "1/8", beats: 0.5 },
  { label: "1/16", beats: 0.25 },
  { label: "1/32", beats: 0.125 },
];

// Candidates for the adaptive grid, smallest to largest (1/128 → 4 bars).
const ADAPTIVE_DIVISIONS = [0.03125, 0.0625, 0.125, 0.25, 0.5, 1, 2, 4, 8, 16] as const;
const ADAPTIVE_MIN_CELL_PX = 20;
const ADAPTIVE_MAX_CELL_PX = 40;

export type GridSettings = {
  /** Division choisie par l'utilisateur (ignorée si adaptive) */
  division: number;
  snap: boolean;
  triplet: boolean;
  adaptive: boolean;
};

function isValidDivision(division: number): boolean {
  return Number.isFinite(division) && division > 0;
}

/**
 * Floor snap: the grid line at or before `beat`. Identity when snapping is
 * disabled or the division is not a positive number.
 */
export function snapToGrid(beat: number, division: number, enabled: boolean = true): number {
  if (!enabled || !isValidDivision(division)) return beat;
  return Math.floor(beat / division + GRID_EPSILON) * division;
}

/** Nearest grid line (used by quantize and loop-region drags). */
export function snapToGridRound(beat: number, division: number): number {
  if (!isValidDivision(division)) return beat;
  return Math.round(beat / division) * division;
}

/** Triplets split a beat in three instead of four: ×2/3. */
export function applyTripletModifier(division: number): number {
  return (division * 2) / 3;
}

/**
 * Division keeping grid cells between 20 and 40 px wide at the given zoom.
 * Falls back to the first division at least 20 px wide, then to 4 bars.
 */
export function adaptiveGridDivision(pixelsPerBeat: number): number {
  for (const div of ADAPTIVE_DIVISIONS) {
    const cell = div * pixelsPerBeat;
    if (cell >= ADAPTIVE_MIN_CELL_PX && cell <= ADAPTIVE_MAX_CELL_PX) return div;
  }
  for (const div of ADAPTIVE_DIVISIONS) {
    if (div * pixelsPerBeat >= ADAPTIVE_MIN_CELL_PX) return div;
  }
  return ADAPTIVE_DIVISIONS[ADAPTIVE_DIVISIONS.length - 1];
}

/** Division actually used for snapping, after adaptive and triplet settings. */
export function effectiveGridDivision(settings: GridSettings, pixelsPerBeat: number): number {
  const base = settings.adaptive ? adaptiveGridDivision(pixelsPerBeat) : settings.division;
  return settings.triplet ? applyTripletModifier(base) : base;
}

export function gridDivisionLabel(division: number, triplet: boolean = false): string {
  const suffix = triplet ? "T" : "";
  if (division >= 16) return `4 Bar${suffix}`;
  if (division >= 8) return `2 Bar${suffix}`;
  if (division >= 4) return `1 Bar${suffix}`;
  if (division >= 2) return `1/2${suffix}`;
  if (division >= 1) return `1/4${suffix}`;
  if (division >= 0.5) return `1/8${suffix}`;
  if (division >= 0.25) return `1/16${suffix}`;
  if (division >= 0.125) return `1/32${suffix}`;
  if (division >= 0.0625) return `1/64${suffix}`;
  return `1/128${suffix}`;
}

// src/features/pianoroll/core/coords.ts

/**
 * Coordinate conversion utilities for the piano roll.
 * All functions are pure and side-effect free.
 * Pixel values are CSS px in content space (scroll already applied).
 */

export function beatToX(beat: number, pxPerBeat: number): number {
  return beat * pxPerBeat;
}

export function xToBeat(x: number, pxPerBeat: number): number {
  return x / pxPerBeat;
}

/** Inverted axis: higher pitches sit higher on screen. */
export function pitchToY(pitch: number, pxPerNote: number, maxPitch: number): number {
  return (maxPitch - pitch) * pxPerNote;
}

export function yToPitch(y: number, pxPerNote: number, maxPitch: number): number {
  return maxPitch - Math.floor(y / pxPerNote);
}

export type ViewGeometry = {
  pixelsPerBeat: number;
  pixelsPerNote: number;
  scrollX: number;
  scrollY: number;
};

export type Coordinates = {
  /** Viewport x (pointer) → beat */
  xToBeat: (x: number) => number;
  beatToX: (beat: number) => number;
  yToPitch: (y: number) => number;
  /** Same, clamped to [minPitch, maxPitch] */
  yToPitchClamped: (y: number) => number;
  pitchToY: (pitch: number) => number;
  pixelsPerBeat: number;
  pixelsPerNote: number;
};

/**
 * Binds the converters to a view. Inputs and outputs are viewport pixels:
 * the scroll offsets are added/removed here.
 */
export function createCoordinates(view: ViewGeometry, maxPitch: number, minPitch: number = 0): Coordinates {
  const { pixelsPerBeat, pixelsPerNote, scrollX, scrollY } = view;
  const toPitch = (y: number) => yToPitch(y + scrollY, pixelsPerNote, maxPitch);
  return {
    xToBeat: (x) => xToBeat(x + scrollX, pixelsPerBeat),
    beatToX: (beat) => beatToX(beat, pixelsPerBeat) - scrollX,
    yToPitch: toPitch,
    yToPitchClamped: (y) => Math.max(minPitch, Math.min(maxPitch, toPitch(y))),
    pitchToY: (pitch) => pitchToY(pitch, pixelsPerNote, maxPitch) - scrollY,
    pixelsPerBeat,
    pixelsPerNote,
  };
}

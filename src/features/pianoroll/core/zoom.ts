// src/features/pianoroll/core/zoom.ts

/**
 * Zoom horizontal (pixels par beat) et scroll associé.
 * Bornes dynamiques :
 * - max : `minZoomBeats` (une double-croche) remplit la largeur de vue
 * - min : la boucle + `marginBeats` tient dans la largeur de vue
 */

export type ZoomBounds = { min: number; max: number };

export type ZoomLimits = {
  minZoomBeats: number;
  marginBeats: number;
};

export function maxPixelsPerBeat(viewWidth: number, minZoomBeats: number): number {
  return viewWidth / minZoomBeats;
}

export function minPixelsPerBeat(viewWidth: number, loopLength: number, marginBeats: number): number {
  return viewWidth / (loopLength + marginBeats);
}

export function zoomBounds(viewWidth: number, loopLength: number, limits: ZoomLimits): ZoomBounds {
  const max = maxPixelsPerBeat(viewWidth, limits.minZoomBeats);
  const min = Math.min(minPixelsPerBeat(viewWidth, loopLength, limits.marginBeats), max);
  return { min, max };
}

export function clampZoom(pixelsPerBeat: number, bounds: ZoomBounds): number {
  return Math.max(bounds.min, Math.min(bounds.max, pixelsPerBeat));
}

/**
 * Zoom d'un drag vertical dans la règle : facteur `1 + dy / sensitivity`
 * appliqué au zoom de départ (drag vers le bas = zoom avant), borné.
 */
export function zoomFromDrag(
  startPixelsPerBeat: number,
  dy: number,
  sensitivityPx: number,
  bounds: ZoomBounds,
): number {
  const factor = 1 + dy / sensitivityPx;
  return clampZoom(startPixelsPerBeat * factor, bounds);
}

/** Scroll qui garde `anchorBeat` sous le pixel viewport `anchorX`. */
export function anchoredScrollX(anchorBeat: number, pixelsPerBeat: number, anchorX: number): number {
  return anchorBeat * pixelsPerBeat - anchorX;
}

/** Étendue scrollable : longueur du clip (ou fin de boucle) + marge. */
export function totalBeats(
  clip: { lengthBeats: number; loopStart: number; loopLength: number },
  marginBeats: number,
): number {
  return Math.max(clip.lengthBeats, clip.loopStart + clip.loopLength) + marginBeats;
}

export function maxScrollX(total: number, pixelsPerBeat: number, viewWidth: number): number {
  return Math.max(0, total * pixelsPerBeat - viewWidth);
}

export function clampScrollX(scrollX: number, maxScroll: number): number {
  return Math.max(0, Math.min(maxScroll, scrollX));
}

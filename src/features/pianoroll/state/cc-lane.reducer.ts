// src/features/pianoroll/state/cc-lane.reducer.ts

import type { CcLane, CcPoint, CcType } from "@/lib/audio/types";
import { clampUnit } from "@/lib/midi/cc";

export function createCcLane(ccType: CcType = "modWheel"): CcLane {
  return { ccType, points: [] };
}

function sortByTime(points: ReadonlyArray<CcPoint>): CcPoint[] {
  return [...points].sort((a, b) => a.time - b.time);
}

/**
 * Change le contrôleur de la lane. Le type et les données sont couplés :
 * changer de type vide les points.
 */
export function setCcType(lane: CcLane, ccType: CcType): CcLane {
  if (lane.ccType === ccType) return lane;
  return { ccType, points: [] };
}

export function addCcPoint(lane: CcLane, point: CcPoint): CcLane {
  const clean: CcPoint = { ...point, time: Math.max(0, point.time), value: clampUnit(point.value) };
  return { ...lane, points: sortByTime([...lane.points, clean]) };
}

export function updateCcPoint(lane: CcLane, id: string, patch: Partial<Omit<CcPoint, "id">>): CcLane {
  return {
    ...lane,
    points: sortByTime(
      lane.points.map((p) => {
        if (p.id !== id) return p;
        return {
          ...p,
          time: Math.max(0, patch.time ?? p.time),
          value: clampUnit(patch.value ?? p.value),
        };
      }),
    ),
  };
}

export function removeCcPoint(lane: CcLane, id: string): CcLane {
  return { ...lane, points: lane.points.filter((p) => p.id !== id) };
}

/**
 * Dessin à main levée : remplace le point déjà présent à `time` (à `tolerance`
 * près) ou en ajoute un nouveau.
 */
export function drawCcValue(
  lane: CcLane,
  time: number,
  value: number,
  newId: () => string,
  tolerance: number = 1e-6,
): CcLane {
  const existing = lane.points.find((p) => Math.abs(p.time - time) <= tolerance);
  if (existing) return updateCcPoint(lane, existing.id, { value });
  return addCcPoint(lane, { id: newId(), time, value });
}

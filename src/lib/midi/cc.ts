// src/lib/midi/cc.ts

import type { CcLane, CcType } from "@/lib/audio/types";

type CcDefinition = {
  readonly ccNumber: number; // -1 pour le pitch bend
  readonly displayName: string;
  readonly minRaw: number;
  readonly maxRaw: number;
};

export const CC_DEFINITIONS: Readonly<Record<CcType, CcDefinition>> = {
  modWheel: { ccNumber: 1, displayName: "Mod Wheel", minRaw: 0, maxRaw: 127 },
  breath: { ccNumber: 2, displayName: "Breath", minRaw: 0, maxRaw: 127 },
  volume: { ccNumber: 7, displayName: "Volume", minRaw: 0, maxRaw: 127 },
  pan: { ccNumber: 10, displayName: "Pan", minRaw: 0, maxRaw: 127 },
  expression: { ccNumber: 11, displayName: "Expression", minRaw: 0, maxRaw: 127 },
  sustain: { ccNumber: 64, displayName: "Sustain", minRaw: 0, maxRaw: 127 },
  pitchBend: { ccNumber: -1, displayName: "Pitch Bend", minRaw: -8192, maxRaw: 8191 },
};

export function isPitchBend(type: CcType): boolean {
  return CC_DEFINITIONS[type].ccNumber === -1;
}

export function clampUnit(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

/** Valeur normalisée 0..1 → valeur brute entière dans la plage du contrôleur. */
export function toRawCcValue(type: CcType, normalized: number): number {
  const { minRaw, maxRaw } = CC_DEFINITIONS[type];
  return Math.round(minRaw + clampUnit(normalized) * (maxRaw - minRaw));
}

export function fromRawCcValue(type: CcType, raw: number): number {
  const { minRaw, maxRaw } = CC_DEFINITIONS[type];
  return clampUnit((raw - minRaw) / (maxRaw - minRaw));
}

/** Valeur centrale (repos) du contrôleur, normalisée. */
export function ccCenterValue(type: CcType): number {
  const { minRaw, maxRaw } = CC_DEFINITIONS[type];
  return fromRawCcValue(type, Math.trunc((minRaw + maxRaw) / 2));
}

/**
 * Valeur de la lane à `time` : interpolation linéaire entre les points,
 * valeur du premier / dernier point en dehors, centre si la lane est vide.
 */
export function ccValueAt(lane: CcLane, time: number): number {
  const pts = lane.points;
  if (pts.length === 0) return ccCenterValue(lane.ccType);

  const first = pts[0];
  const last = pts[pts.length - 1];
  if (time <= first.time) return first.value;
  if (time >= last.time) return last.value;

  for (let i = 0; i < pts.length - 1; i++) {
    const a = pts[i];
    const b = pts[i + 1];
    if (time >= a.time && time <= b.time) {
      if (b.time === a.time) return b.value;
      const t = (time - a.time) / (b.time - a.time);
      return a.value + (b.value - a.value) * t;
    }
  }
  return ccCenterValue(lane.ccType);
}

// src/features/pianoroll/interactions/ccOperations.ts

import type { CcPoint, CcType } from "@/lib/audio/types";
import { ccValueAt } from "@/lib/midi/cc";
import { addCcPoint, drawCcValue, removeCcPoint, setCcType, updateCcPoint } from "../state/cc-lane.reducer";
import type { PianoRollCtx } from "./context";

// La lane CC ne fait pas partie du snapshot de clip : pas de commande d'historique.

export function setLaneCcType(ctx: PianoRollCtx, ccType: CcType): void {
  const state = ctx.store.getState();
  state.setCcLane(setCcType(state.ccLane, ccType));
}

/** Ajoute un point et retourne son id. */
export function addLanePoint(ctx: PianoRollCtx, time: number, value: number): string {
  const state = ctx.store.getState();
  const id = ctx.external.ids();
  state.setCcLane(addCcPoint(state.ccLane, { id, time, value }));
  return id;
}

export function updateLanePoint(ctx: PianoRollCtx, id: string, patch: Partial<Omit<CcPoint, "id">>): void {
  const state = ctx.store.getState();
  state.setCcLane(updateCcPoint(state.ccLane, id, patch));
}

export function removeLanePoint(ctx: PianoRollCtx, id: string): void {
  const state = ctx.store.getState();
  state.setCcLane(removeCcPoint(state.ccLane, id));
}

export function drawLaneValue(ctx: PianoRollCtx, time: number, value: number): void {
  const state = ctx.store.getState();
  state.setCcLane(drawCcValue(state.ccLane, time, value, ctx.external.ids));
}

export function laneValueAt(ctx: PianoRollCtx, time: number): number {
  return ccValueAt(ctx.store.getState().ccLane, time);
}

// src/features/pianoroll/core/tool-mode.ts

import type { ModifierState, ToolMode } from "@/lib/audio/types";

export const NO_MODIFIERS: ModifierState = Object.freeze({ shift: false, alt: false, ctrlOrCmd: false });

/** Lecture de l'état courant des modificateurs (injectée par l'hôte). */
export type ModifierSource = () => ModifierState;

/**
 * Outil temporaire imposé par les modificateurs maintenus :
 * alt → gomme, cmd/ctrl → duplication. Shift ne change pas d'outil.
 */
export function modifierOverride(mods: ModifierState): ToolMode | null {
  if (mods.alt) return "eraser";
  if (mods.ctrlOrCmd) return "duplicate";
  return null;
}

/** Outil effectif = surcharge des modificateurs, sinon outil "collant". */
export function resolveToolMode(sticky: ToolMode, mods: ModifierState): ToolMode {
  return modifierOverride(mods) ?? sticky;
}

/** Raccourcis clavier sans modificateur pour l'outil collant. */
export const TOOL_SHORTCUTS: Readonly<Record<string, ToolMode>> = {
  z: "draw",
  x: "select",
  c: "eraser",
  v: "duplicate",
  b: "slice",
};

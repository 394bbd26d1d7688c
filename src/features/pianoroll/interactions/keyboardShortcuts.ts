// src/features/pianoroll/interactions/keyboardShortcuts.ts

import type { ToolMode } from "@/lib/audio/types";
import { TOOL_SHORTCUTS } from "../core/tool-mode";
import type { KeyInput } from "../types";
import { getEffectiveTool, notifyToolMode, type PianoRollCtx } from "./context";
import {
  copySelection,
  cutSelection,
  deleteSelection,
  deselectAllNotes,
  duplicateSelection,
  paste,
  quantizeSelection,
  selectAllNotes,
  transposeSelection,
} from "./editOperations";

/** Outil "collant" + notification de l'hôte si l'outil effectif change. */
export function setStickyTool(ctx: PianoRollCtx, tool: ToolMode): void {
  const previous = getEffectiveTool(ctx);
  ctx.store.getState().setStickyTool(tool);
  const next = getEffectiveTool(ctx);
  if (next !== previous) notifyToolMode(ctx, next);
}

/** Geste en cours sur la grille ou la règle (son snapshot `before` est ouvert). */
export function isGestureActive(ctx: PianoRollCtx): boolean {
  const { session, ruler } = ctx.store.getState();
  return session.kind !== "idle" || ruler.kind !== "idle";
}

/** Annulation bloquée pendant un geste en cours. */
export function undo(ctx: PianoRollCtx): boolean {
  if (isGestureActive(ctx)) return false;
  return ctx.history.undo();
}

export function redo(ctx: PianoRollCtx): boolean {
  if (isGestureActive(ctx)) return false;
  return ctx.history.redo();
}

/**
 * Raccourcis clavier du piano roll. Retourne true si la touche est consommée
 * (l'hôte peut alors appeler preventDefault).
 *
 * Les lettres seules (outils, q, k) exigent l'absence de cmd/ctrl, alt et shift :
 * "c" = gomme, "cmd+c" = copier.
 *
 * Pendant un geste, les raccourcis qui modifient le clip sont consommés sans
 * effet : le commit du geste repart de son snapshot `before`.
 */
export function handleKeyDown(ctx: PianoRollCtx, input: KeyInput): boolean {
  const shift = input.shift ?? false;
  const alt = input.alt ?? false;
  const mod = input.ctrlOrCmd ?? false;
  const key = input.key.length === 1 ? input.key.toLowerCase() : input.key;
  const busy = isGestureActive(ctx);
  const edit = (run: () => void): true => {
    if (!busy) run();
    return true;
  };

  // ---- Suppression ----
  if (key === "Delete" || key === "Backspace") {
    return edit(() => deleteSelection(ctx));
  }

  // ---- Cmd / Ctrl ----
  if (mod) {
    switch (key) {
      case "z":
        if (shift) redo(ctx);
        else undo(ctx);
        return true;
      case "c":
        copySelection(ctx);
        return true;
      case "x":
        return edit(() => cutSelection(ctx));
      case "v":
        return edit(() => paste(ctx));
      case "d":
      case "b":
        return edit(() => duplicateSelection(ctx));
      case "a":
        return edit(() => selectAllNotes(ctx));
      default:
        return false;
    }
  }

  if (key === "Escape") {
    return edit(() => deselectAllNotes(ctx));
  }

  // ---- Transposition (flèches) ----
  if ((key === "ArrowUp" || key === "ArrowDown") && !alt) {
    const step = shift ? 12 : 1;
    return edit(() => transposeSelection(ctx, key === "ArrowUp" ? step : -step));
  }

  // ---- Lettres seules ----
  if (alt || shift) return false;

  if (key === "q") {
    return edit(() => quantizeSelection(ctx));
  }
  if (key === "k") {
    ctx.store.getState().toggleChordPalette();
    return true;
  }

  const tool = TOOL_SHORTCUTS[key];
  if (tool) {
    setStickyTool(ctx, tool);
    return true;
  }
  return false;
}

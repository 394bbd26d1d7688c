// src/features/pianoroll/state/clip-history.ts

import type { MidiClip } from "@/lib/audio/types";
import type { DevLogger } from "@/lib/log/dev-log";
import { CommandLog } from "./command-log";
import { cloneClip } from "./midi-clip.reducer";
import type { PianoRollStoreApi } from "./pianoroll.store";

export type ClipHistory = {
  readonly log: CommandLog<MidiClip>;
  /** Écrit le clip vivant (frame de drag, sélection…) et notifie l'hôte. Ne crée pas de commande. */
  write: (clip: MidiClip) => void;
  /** Snapshot "avant" d'une mutation. */
  saveToHistory: () => MidiClip;
  /** Empile { before, after = clip courant }. */
  commitToHistory: (before: MidiClip, label: string) => void;
  /** save → write(next) → commit, en un appel. */
  commit: (label: string, next: MidiClip) => void;
  undo: () => boolean;
  redo: () => boolean;
};

export type ClipHistoryOptions = {
  store: PianoRollStoreApi;
  limit: number | null;
  onClipUpdated?: (clip: MidiClip) => void;
  logger: DevLogger;
};

/**
 * Historique d'un clip : relie le CommandLog au store.
 * Toute écriture du clip (live ou via undo/redo) passe par `write`,
 * qui est aussi le seul point de notification de l'hôte.
 */
export function createClipHistory(options: ClipHistoryOptions): ClipHistory {
  const { store, onClipUpdated, logger } = options;

  function write(clip: MidiClip) {
    store.getState().setClip(clip);
    if (!onClipUpdated) return;
    try {
      onClipUpdated(clip);
    } catch (err) {
      logger.warn("onClipUpdated", err);
    }
  }

  const log = new CommandLog<MidiClip>({
    apply: (state) => write(cloneClip(state)),
    limit: options.limit,
  });

  // Miroir de l'état d'historique pour l'UI
  log.subscribe(() => {
    store.getState().setHistory({
      canUndo: log.canUndo,
      canRedo: log.canRedo,
      undoLabel: log.undoLabel,
      redoLabel: log.redoLabel,
    });
  });

  const saveToHistory = () => cloneClip(store.getState().clip);

  const commitToHistory = (before: MidiClip, label: string) => {
    log.record({ beforeState: before, afterState: cloneClip(store.getState().clip), label });
  };

  return {
    log,
    write,
    saveToHistory,
    commitToHistory,
    commit(label, next) {
      const before = saveToHistory();
      write(next);
      commitToHistory(before, label);
    },
    undo: () => log.undo(),
    redo: () => log.redo(),
  };
}

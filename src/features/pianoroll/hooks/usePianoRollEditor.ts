// src/features/pianoroll/hooks/usePianoRollEditor.ts

import { useStore } from "zustand/react";
import type { PianoRollEditor } from "../editor";
import type { PianoRollStore } from "../state/pianoroll.store";

/**
 * Abonne un composant React à l'état d'une session d'édition.
 * Le sélecteur doit retourner une valeur stable (ou un primitif) pour
 * éviter les re-renders inutiles.
 */
export function usePianoRollEditor<T>(editor: PianoRollEditor, selector: (state: PianoRollStore) => T): T {
  return useStore(editor.store, selector);
}

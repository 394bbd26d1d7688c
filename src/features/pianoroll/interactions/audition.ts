// src/features/pianoroll/interactions/audition.ts

import type { PianoRollAudioEngine } from "@/lib/audio/types";
import type { DevLogger } from "@/lib/log/dev-log";

export type AuditionOptions = {
  engine: PianoRollAudioEngine | null | undefined;
  getTrackId: () => string | undefined;
  isEnabled: () => boolean;
  /** Vélocité des note-off envoyés au moteur */
  releaseVelocity: number;
  /** Délai avant le relâchement automatique d'un accord pré-écouté */
  chordPreviewMs: number;
  logger: DevLogger;
};

export type AuditionController = {
  /** Pitch de la note tenue (null = aucune) */
  readonly heldPitch: number | null;
  start: (pitch: number, velocity: number) => void;
  changePitch: (pitch: number, velocity: number) => void;
  stop: () => void;
  previewChord: (pitches: ReadonlyArray<number>, velocity: number) => void;
  /** Annule les relâchements d'accords en attente (en les jouant tout de suite) */
  dispose: () => void;
};

/**
 * Pré-écoute des notes pendant l'édition.
 * Une seule note tenue à la fois ; le moteur est optionnel et chaque appel
 * est isolé : une erreur moteur est loggée, jamais propagée.
 */
export function createAuditionController(options: AuditionOptions): AuditionController {
  const { engine, getTrackId, isEnabled, releaseVelocity, chordPreviewMs, logger } = options;

  let held: { trackId: string; pitch: number } | null = null;
  const pendingChords = new Map<ReturnType<typeof setTimeout>, () => void>();

  function noteOn(where: string, trackId: string, pitch: number, velocity: number) {
    if (!engine) return;
    try {
      engine.noteOn(trackId, pitch, velocity);
    } catch (err) {
      logger.warn(where, err);
    }
  }

  function noteOff(where: string, trackId: string, pitch: number) {
    if (!engine) return;
    try {
      engine.noteOff(trackId, pitch, releaseVelocity);
    } catch (err) {
      logger.warn(where, err);
    }
  }

  /** Track courante si la pré-écoute est possible, sinon null. */
  function target(): string | null {
    if (!engine || !isEnabled()) return null;
    return getTrackId() ?? null;
  }

  function stop() {
    if (!held) return;
    const { trackId, pitch } = held;
    held = null;
    noteOff("stop", trackId, pitch);
  }

  return {
    get heldPitch() {
      return held?.pitch ?? null;
    },

    start(pitch, velocity) {
      stop();
      const trackId = target();
      if (trackId === null) return;
      held = { trackId, pitch };
      noteOn("start", trackId, pitch, velocity);
    },

    changePitch(pitch, velocity) {
      if (!held || held.pitch === pitch) return;
      const { trackId, pitch: previous } = held;
      held = { trackId, pitch };
      noteOff("changePitch", trackId, previous);
      noteOn("changePitch", trackId, pitch, velocity);
    },

    stop,

    previewChord(pitches, velocity) {
      const trackId = target();
      if (trackId === null || pitches.length === 0) return;

      const notes = [...pitches];
      for (const p of notes) noteOn("previewChord", trackId, p, velocity);

      const release = () => {
        for (const p of notes) noteOff("previewChord", trackId, p);
      };
      const timer = setTimeout(() => {
        pendingChords.delete(timer);
        release();
      }, chordPreviewMs);
      pendingChords.set(timer, release);
    },

    dispose() {
      stop();
      for (const [timer, release] of pendingChords) {
        clearTimeout(timer);
        release();
      }
      pendingChords.clear();
    },
  };
}

// src/features/pianoroll/interactions/editOperations.ts

import { noteEnd, type MidiNote } from "@/lib/audio/types";
import { clampUnit } from "@/lib/midi/cc";
import { chordPitches } from "@/lib/midi/chords";
import { applyTripletModifier } from "@/lib/midi/grid";
import {
  applyHumanize,
  applyLegato,
  applyStretch,
  applySwing,
  quantizeNotes,
  randomizeVelocity,
  reverseNotes,
  transposeLabel,
  transposeNotes,
} from "@/lib/midi/transforms";
import {
  addNotes,
  autoExtendLoop,
  autoExtendLoopForNotes,
  clipsEqual,
  deselectAll,
  findNote,
  removeNotes,
  replaceNotes,
  selectAll,
  selectedNotes,
  setLoopLength,
  setLoopStart,
  sliceNote,
} from "../state/midi-clip.reducer";
import { countLabel, getGridDivision, getLoopLimits, newNote, type PianoRollCtx } from "./context";

/* -------------------------------------------------------
 * 1. CRÉATION / DÉCOUPE
 * ------------------------------------------------------*/

/**
 * Pose une note (durée = dernière durée utilisée), sélectionnée seule.
 * `time` doit déjà être aligné sur la grille.
 */
export function addNoteAt(ctx: PianoRollCtx, time: number, pitch: number): MidiNote {
  const { config, history } = ctx;
  const { clip, lastNoteDuration } = ctx.store.getState();

  const note = newNote(ctx, {
    pitch,
    velocity: config.defaultVelocity,
    time: Math.max(0, time),
    duration: lastNoteDuration,
    selected: true,
  });
  const next = autoExtendLoop(addNotes(deselectAll(clip), [note]), noteEnd(note), getLoopLimits(ctx));
  history.commit("Add note", next);
  return note;
}

/**
 * Tampon d'accord : la note la plus grave de l'accord courant est posée sur
 * `pitch`, les hauteurs hors clavier sont ignorées. Pré-écoute de l'accord.
 */
export function stampChordAt(ctx: PianoRollCtx, time: number, pitch: number): MidiNote[] {
  const { config, history, audition } = ctx;
  const { clip, lastNoteDuration, chordPalette } = ctx.store.getState();

  const pitches = chordPitches(chordPalette.chord);
  if (pitches.length === 0) return [];

  const shift = pitch - pitches[0];
  const notes = pitches
    .map((p) => p + shift)
    .filter((p) => p >= config.minPitch && p <= config.maxPitch)
    .map((p) =>
      newNote(ctx, {
        pitch: p,
        velocity: config.defaultVelocity,
        time: Math.max(0, time),
        duration: lastNoteDuration,
        selected: true,
      }),
    );
  if (notes.length === 0) return [];

  const next = autoExtendLoopForNotes(addNotes(deselectAll(clip), notes), notes, getLoopLimits(ctx));
  history.commit("Add chord", next);
  audition.previewChord(
    notes.map((n) => n.pitch),
    config.defaultVelocity,
  );
  return notes;
}

/** Découpe une note en deux à `beat` (strictement à l'intérieur). */
export function sliceNoteAt(ctx: PianoRollCtx, noteId: string, beat: number): boolean {
  const { clip } = ctx.store.getState();
  const note = findNote(clip, noteId);
  if (!note || beat <= note.time || beat >= noteEnd(note)) {
    ctx.external.logger.debug("sliceNoteAt", "outside note", noteId, beat);
    return false;
  }

  const next = sliceNote(clip, noteId, beat, [ctx.external.ids(), ctx.external.ids()]);
  if (!next) return false;
  ctx.history.commit("Slice note", next);
  return true;
}

/* -------------------------------------------------------
 * 2. PRESSE-PAPIERS / SÉLECTION
 * ------------------------------------------------------*/
export function copySelection(ctx: PianoRollCtx): boolean {
  const state = ctx.store.getState();
  const selected = selectedNotes(state.clip);
  if (selected.length === 0) return false;
  state.setClipboard(selected.map((n) => ({ ...n, selected: false })));
  return true;
}

export function cutSelection(ctx: PianoRollCtx): boolean {
  if (!copySelection(ctx)) return false;
  const { clip } = ctx.store.getState();
  const ids = new Set(selectedNotes(clip).map((n) => n.id));
  ctx.history.commit(countLabel("Cut", ids.size), removeNotes(clip, ids));
  return true;
}

/**
 * Colle le presse-papiers au marqueur d'insertion (ou au beat 0), décalé
 * de l'écart entre le marqueur et la note la plus tôt du presse-papiers.
 */
export function paste(ctx: PianoRollCtx): boolean {
  const { clip, clipboard, insertMarker } = ctx.store.getState();
  if (clipboard.length === 0) return false;

  const target = insertMarker ?? 0;
  const offset = target - Math.min(...clipboard.map((n) => n.time));
  const pasted = clipboard.map((n) =>
    newNote(ctx, { ...n, time: Math.max(0, n.time + offset), selected: true }),
  );

  const next = autoExtendLoopForNotes(addNotes(deselectAll(clip), pasted), pasted, getLoopLimits(ctx));
  ctx.history.commit(countLabel("Paste", pasted.length), next);
  return true;
}

/** Copies placées juste après l'étendue de la sélection ; les copies deviennent la sélection. */
export function duplicateSelection(ctx: PianoRollCtx): boolean {
  const { clip } = ctx.store.getState();
  const selected = selectedNotes(clip);
  if (selected.length === 0) return false;

  const start = Math.min(...selected.map((n) => n.time));
  const end = Math.max(...selected.map(noteEnd));
  const offset = end - start;
  const copies = selected.map((n) => newNote(ctx, { ...n, time: n.time + offset, selected: true }));

  const next = autoExtendLoopForNotes(addNotes(deselectAll(clip), copies), copies, getLoopLimits(ctx));
  ctx.history.commit(countLabel("Duplicate", copies.length), next);
  return true;
}

export function deleteSelection(ctx: PianoRollCtx): boolean {
  const { clip } = ctx.store.getState();
  const ids = new Set(selectedNotes(clip).map((n) => n.id));
  if (ids.size === 0) return false;
  ctx.history.commit(countLabel("Delete", ids.size), removeNotes(clip, ids));
  return true;
}

export function selectAllNotes(ctx: PianoRollCtx): void {
  const { clip } = ctx.store.getState();
  const next = selectAll(clip);
  if (!clipsEqual(clip, next)) ctx.history.write(next);
}

export function deselectAllNotes(ctx: PianoRollCtx): void {
  const { clip } = ctx.store.getState();
  const next = deselectAll(clip);
  if (!clipsEqual(clip, next)) ctx.history.write(next);
}

/* -------------------------------------------------------
 * 3. TRANSFORMATIONS (une commande par opération)
 * ------------------------------------------------------*/
function commitSelectionTransform(
  ctx: PianoRollCtx,
  label: string,
  transform: (notes: ReadonlyArray<MidiNote>) => MidiNote[] | null,
): boolean {
  const { clip } = ctx.store.getState();
  if (selectedNotes(clip).length === 0) {
    ctx.external.logger.debug("transform", label, "empty selection");
    return false;
  }

  const notes = transform(clip.notes);
  if (!notes) {
    ctx.external.logger.debug("transform", label, "rejected");
    return false;
  }

  const touched = notes.filter((n) => n.selected);
  ctx.history.commit(label, autoExtendLoopForNotes(replaceNotes(clip, notes), touched, getLoopLimits(ctx)));
  return true;
}

/** Division de quantize : réglage explicite (triolet compris) ou grille effective. */
export function getQuantizeDivision(ctx: PianoRollCtx): number {
  const { quantize } = ctx.store.getState();
  if (quantize.division === null) return getGridDivision(ctx);
  return quantize.triplet ? applyTripletModifier(quantize.division) : quantize.division;
}

export function quantizeSelection(ctx: PianoRollCtx): boolean {
  const { clip, quantize } = ctx.store.getState();
  const count = selectedNotes(clip).length;
  const division = getQuantizeDivision(ctx);
  return commitSelectionTransform(ctx, countLabel("Quantize", count), (notes) =>
    quantizeNotes(notes, division, clampUnit(quantize.strength)),
  );
}

export function swingSelection(ctx: PianoRollCtx, amount: number): boolean {
  return commitSelectionTransform(ctx, "Apply swing", (notes) => applySwing(notes, clampUnit(amount)));
}

export function stretchSelection(ctx: PianoRollCtx, factor: number): boolean {
  if (!(factor > 0) || !Number.isFinite(factor)) return false;
  return commitSelectionTransform(ctx, "Stretch notes", (notes) => applyStretch(notes, factor));
}

export function humanizeSelection(ctx: PianoRollCtx, amount: number): boolean {
  return commitSelectionTransform(ctx, "Humanize notes", (notes) =>
    applyHumanize(notes, clampUnit(amount), ctx.external.random),
  );
}

export function legatoSelection(ctx: PianoRollCtx): boolean {
  return commitSelectionTransform(ctx, "Apply legato", applyLegato);
}

export function reverseSelection(ctx: PianoRollCtx): boolean {
  return commitSelectionTransform(ctx, "Reverse notes", reverseNotes);
}

export function transposeSelection(ctx: PianoRollCtx, semitones: number): boolean {
  if (!Number.isInteger(semitones) || semitones === 0) return false;
  return commitSelectionTransform(ctx, transposeLabel(semitones), (notes) => transposeNotes(notes, semitones));
}

/** Sélection, ou tout le clip si rien n'est sélectionné. */
export function randomizeVelocities(ctx: PianoRollCtx, amount: number): boolean {
  const { clip } = ctx.store.getState();
  const a = clampUnit(amount);
  if (clip.notes.length === 0 || a <= 0) return false;
  ctx.history.commit("Randomize velocity", replaceNotes(clip, randomizeVelocity(clip.notes, a, ctx.external.random)));
  return true;
}

/* -------------------------------------------------------
 * 4. BOUCLE
 * ------------------------------------------------------*/
export function setLoopLengthBeats(ctx: PianoRollCtx, beats: number): boolean {
  const { clip } = ctx.store.getState();
  const next = setLoopLength(clip, beats, getLoopLimits(ctx));
  if (clipsEqual(clip, next)) return false;
  ctx.history.commit("Change loop length", next);
  return true;
}

export function setLoopStartBeat(ctx: PianoRollCtx, beat: number): boolean {
  const { clip } = ctx.store.getState();
  const next = setLoopStart(clip, beat);
  if (clipsEqual(clip, next)) return false;
  ctx.history.commit("Change loop start", next);
  return true;
}

/* -------------------------------------------------------
 * 5. QUANTIZE MOTEUR
 * ------------------------------------------------------*/

/**
 * Quantize de tout le clip par le moteur, puis relecture du clip côté hôte
 * (appliquée sans commande). Sans moteur : quantize local, commande "Quantize clip".
 */
export function quantizeClipViaEngine(ctx: PianoRollCtx, division?: number): boolean {
  const div = division ?? getGridDivision(ctx);
  if (!(div > 0) || !Number.isFinite(div)) return false;

  const { engine, logger } = ctx.external;
  const { clip } = ctx.store.getState();

  if (engine?.quantizeClip) {
    try {
      engine.quantizeClip(clip.id, div);
    } catch (err) {
      logger.warn("quantizeClipViaEngine", err);
      return false;
    }

    const reload = ctx.callbacks.reloadClip;
    if (!reload) return true;
    try {
      const fresh = reload(clip.id);
      if (fresh) ctx.history.write(fresh);
    } catch (err) {
      logger.warn("reloadClip", err);
    }
    return true;
  }

  if (clip.notes.length === 0) return false;
  const wasSelected = new Set(selectedNotes(clip).map((n) => n.id));
  const quantized = quantizeNotes(
    clip.notes.map((n) => ({ ...n, selected: true })),
    div,
  ).map((n) => ({ ...n, selected: wasSelected.has(n.id) }));

  ctx.history.commit("Quantize clip", replaceNotes(clip, quantized));
  return true;
}

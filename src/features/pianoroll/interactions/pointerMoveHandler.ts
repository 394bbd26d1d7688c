// src/features/pianoroll/interactions/pointerMoveHandler.ts

import { noteEnd, type MidiNote } from "@/lib/audio/types";
import { getHitAt } from "../core/hit";
import {
  addNotes,
  autoExtendLoop,
  autoExtendLoopForNotes,
  clipsEqual,
  deselectAll,
  findNote,
  removeNotes,
  replaceNotes,
  selectInRect,
  selectOnly,
  selectedNotes,
  updateNote,
} from "../state/midi-clip.reducer";
import type { InteractionSession, PointerInput } from "../types";
import {
  countLabel,
  getCoordinates,
  getGridDivision,
  getLoopLimits,
  lockPitch,
  newNote,
  snapBeat,
  type PianoRollCtx,
} from "./context";

export type PointerMoveHandlerCtx = PianoRollCtx;

type Session<K extends InteractionSession["kind"]> = Extract<InteractionSession, { kind: K }>;

function toDragStart(notes: ReadonlyArray<MidiNote>): ReadonlyMap<string, MidiNote> {
  return new Map(notes.map((n) => [n.id, n]));
}

/* -------------------------------------------------------
 * 1. Appui → drag (au-delà de dragSlopPx)
 * ------------------------------------------------------*/
function beginDrag(ctx: PianoRollCtx, pressed: Session<"pressed">): InteractionSession {
  const { store, config, history } = ctx;
  const { intent, origin } = pressed;
  const clip = store.getState().clip;

  switch (intent.kind) {
    case "note": {
      const note = findNote(clip, intent.noteId);
      if (!note) return { kind: "idle" };
      const before = history.saveToHistory();
      // Drag d'une note non sélectionnée : elle devient la sélection
      if (!note.selected) history.write(selectOnly(clip, new Set([note.id])));
      const moving = selectedNotes(store.getState().clip);
      return {
        kind: "moving",
        origin,
        anchorNoteId: note.id,
        dragStart: toDragStart(moving),
        before,
        label: countLabel("Move", moving.length),
        commitAlways: false,
      };
    }

    case "duplicate": {
      const note = findNote(clip, intent.noteId);
      if (!note) return { kind: "idle" };
      const before = history.saveToHistory();
      const sources = note.selected ? selectedNotes(clip) : [note];
      const clones = sources.map((n) => newNote(ctx, { ...n, selected: true }));
      const anchor = clones[sources.indexOf(note)];
      history.write(addNotes(deselectAll(clip), clones));
      return {
        kind: "moving",
        origin,
        anchorNoteId: anchor.id,
        dragStart: toDragStart(clones),
        before,
        label: countLabel("Duplicate", clones.length),
        commitAlways: true,
      };
    }

    case "created": {
      const note = findNote(clip, intent.noteId);
      if (!note) return { kind: "idle" };
      if (config.paintOnDrag) {
        return {
          kind: "painting",
          pitch: note.pitch,
          velocity: note.velocity,
          lastBeat: note.time,
          painted: 0,
          before: history.saveToHistory(),
        };
      }
      return {
        kind: "moving",
        origin,
        anchorNoteId: note.id,
        dragStart: toDragStart([note]),
        before: history.saveToHistory(),
        label: countLabel("Move", 1),
        commitAlways: false,
      };
    }

    case "emptySelect": {
      const coords = getCoordinates(ctx);
      return {
        kind: "selecting",
        originBeat: coords.xToBeat(origin.x),
        originPitch: coords.yToPitchClamped(origin.y),
      };
    }

    case "none":
      return { kind: "idle" };
  }
}

/* -------------------------------------------------------
 * 2. Frames de drag
 * ------------------------------------------------------*/

/**
 * Déplacement relatif aux positions de départ : le delta de temps est celui
 * de la note ancre une fois alignée (shift = sans snap), borné pour qu'aucune
 * note ne passe avant 0.
 */
function moveNotes(ctx: PianoRollCtx, s: Session<"moving">, p: PointerInput) {
  const { store, config, history, audition } = ctx;
  const anchor = s.dragStart.get(s.anchorNoteId);
  if (!anchor) return;

  const coords = getCoordinates(ctx);
  const shift = ctx.external.modifiers().shift;
  const targetStart = snapBeat(ctx, anchor.time + (p.x - s.origin.x) / coords.pixelsPerBeat, shift);

  let deltaBeat = targetStart - anchor.time;
  const minStart = Math.min(...[...s.dragStart.values()].map((n) => n.time));
  if (minStart + deltaBeat < 0) deltaBeat = -minStart;
  const deltaPitch = -Math.round((p.y - s.origin.y) / coords.pixelsPerNote);

  const clip = store.getState().clip;
  const moved: MidiNote[] = [];
  const notes = clip.notes.map((n) => {
    const start = s.dragStart.get(n.id);
    if (!start) return n;
    const next: MidiNote = {
      ...n,
      time: Math.min(config.maxLoopBeats, start.time + deltaBeat),
      pitch: lockPitch(ctx, start.pitch + deltaPitch),
    };
    moved.push(next);
    return next;
  });

  history.write(autoExtendLoopForNotes(replaceNotes(clip, notes), moved, getLoopLimits(ctx)));

  const anchorNow = moved.find((n) => n.id === s.anchorNoteId);
  if (anchorNow) audition.changePitch(anchorNow.pitch, anchorNow.velocity);
}

/** Resize d'un bord, durée minimale = une division de grille. */
function resizeNote(ctx: PianoRollCtx, s: Session<"resizing">, p: PointerInput) {
  const { store, config, history } = ctx;
  const grid = getGridDivision(ctx);
  const beat = snapBeat(ctx, getCoordinates(ctx).xToBeat(p.x), ctx.external.modifiers().shift);
  const o = s.original;
  const clip = store.getState().clip;

  if (s.edge === "right") {
    const duration = Math.max(grid, Math.min(config.maxLoopBeats, beat - o.time));
    const next = updateNote(clip, s.noteId, { duration });
    history.write(autoExtendLoop(next, o.time + duration, getLoopLimits(ctx)));
    return;
  }

  const end = noteEnd(o);
  const time = Math.max(0, Math.min(end - grid, beat));
  history.write(updateNote(clip, s.noteId, { time, duration: end - time }));
}

/** Peinture : une note toutes les `lastNoteDuration` le long du drag. */
function paintNotes(ctx: PianoRollCtx, s: Session<"painting">, p: PointerInput) {
  const { store, config, history } = ctx;
  const { clip, lastNoteDuration: duration, setSession } = store.getState();
  if (!(duration > 0)) return;

  const beat = snapBeat(ctx, getCoordinates(ctx).xToBeat(p.x));
  let { lastBeat, painted } = s;
  const added: MidiNote[] = [];
  while (beat >= lastBeat + duration && lastBeat + duration <= config.maxLoopBeats) {
    lastBeat += duration;
    painted += 1;
    added.push(
      newNote(ctx, { pitch: s.pitch, velocity: s.velocity, time: lastBeat, duration, selected: false }),
    );
  }
  if (added.length === 0) return;

  history.write(autoExtendLoopForNotes(addNotes(clip, added), added, getLoopLimits(ctx)));
  setSession({ ...s, lastBeat, painted });
}

function eraseAt(ctx: PianoRollCtx, s: Session<"erasing">, p: PointerInput) {
  const { store, config, history } = ctx;
  const { clip, setSession } = store.getState();
  const hit = getHitAt(p.x, p.y, clip.notes, getCoordinates(ctx), config.resizeEdgePx);
  if (hit.type === "empty" || s.erased.has(hit.noteId)) return;

  history.write(removeNotes(clip, new Set([hit.noteId])));
  setSession({ ...s, erased: new Set([...s.erased, hit.noteId]) });
}

/** Sélection rectangle recalculée en direct (recouvrement). */
function boxSelect(ctx: PianoRollCtx, s: Session<"selecting">, p: PointerInput) {
  const { store, history } = ctx;
  const coords = getCoordinates(ctx);
  const clip = store.getState().clip;
  const next = selectInRect(clip, {
    beatA: s.originBeat,
    beatB: coords.xToBeat(p.x),
    pitchA: s.originPitch,
    pitchB: coords.yToPitchClamped(p.y),
  });
  if (!clipsEqual(clip, next)) history.write(next);
}

/**
 * Créateur de gestionnaire pour le pointer move dans la grille de notes.
 */
export function createPointerMoveHandlerCtx(ctx: PointerMoveHandlerCtx) {
  const { store, config } = ctx;

  return (p: PointerInput): void => {
    let session = store.getState().session;

    if (session.kind === "pressed") {
      const { origin } = session;
      if (Math.hypot(p.x - origin.x, p.y - origin.y) < config.dragSlopPx) return;
      session = beginDrag(ctx, session);
      store.getState().setSession(session);
    }

    switch (session.kind) {
      case "moving":
        moveNotes(ctx, session, p);
        return;
      case "resizing":
        resizeNote(ctx, session, p);
        return;
      case "painting":
        paintNotes(ctx, session, p);
        return;
      case "erasing":
        eraseAt(ctx, session, p);
        return;
      case "selecting":
        boxSelect(ctx, session, p);
        return;
      default:
        return;
    }
  };
}

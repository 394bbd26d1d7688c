// src/index.ts

export { createPianoRollEditor } from "./features/pianoroll/editor";
export type { PianoRollEditor, PianoRollEditorOptions } from "./features/pianoroll/editor";
export { usePianoRollEditor } from "./features/pianoroll/hooks/usePianoRollEditor";

export type {
  KeyInput,
  InteractionSession,
  LoopMarker,
  PianoRollView,
  PointerInput,
  QuantizeSettings,
  RulerSession,
} from "./features/pianoroll/types";
export type { PianoRollState, PianoRollStore, PianoRollStoreApi } from "./features/pianoroll/state/pianoroll.store";
export { CommandLog } from "./features/pianoroll/state/command-log";
export type { Command, CommandLogOptions } from "./features/pianoroll/state/command-log";
export * from "./features/pianoroll/state/midi-clip.reducer";
export * from "./features/pianoroll/state/cc-lane.reducer";

export * from "./features/pianoroll/core/coords";
export * from "./features/pianoroll/core/hit";
export * from "./features/pianoroll/core/tool-mode";
export * from "./features/pianoroll/core/zoom";

export * from "./lib/audio/types";
export * from "./lib/midi/grid";
export * from "./lib/midi/scales";
export * from "./lib/midi/chords";
export * from "./lib/midi/transforms";
export * from "./lib/midi/cc";
export * from "./lib/midi/ids";

export { DEFAULT_PIANO_ROLL_CONFIG, resolvePianoRollConfig } from "./core/config/editor-config";
export type { PianoRollConfig } from "./core/config/editor-config";
export { createDevLogger } from "./lib/log/dev-log";
export type { DevLogger } from "./lib/log/dev-log";

export { createPointerDownHandlerCtx } from "./pointerHandlers";
export type { PointerDownHandlerCtx } from "./pointerHandlers";

export { createPointerMoveHandlerCtx } from "./pointerMoveHandler";
export type { PointerMoveHandlerCtx } from "./pointerMoveHandler";

export { createPointerUpHandlerCtx } from "./pointerUpHandler";
export type { PointerUpHandlerCtx } from "./pointerUpHandler";

export { createRulerHandlersCtx } from "./rulerHandlers";
export type { RulerHandlers } from "./rulerHandlers";

export { createVelocityLaneHandlersCtx, velocityFromLaneY } from "./velocityLane";
export type { VelocityLaneHandlers } from "./velocityLane";

export { createAuditionController } from "./audition";
export type { AuditionController, AuditionOptions } from "./audition";

export { handleKeyDown, redo, setStickyTool, undo } from "./keyboardShortcuts";

export * from "./editOperations";
export * from "./ccOperations";
export * from "./viewOperations";

export type { PianoRollCtx } from "./context";

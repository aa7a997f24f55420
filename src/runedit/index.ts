export { RunEditEngine } from "./engine/runedit-engine";
export type {
  EditableTextEntry,
  EditableTextInit,
  FrameInput,
} from "./engine/runedit-engine";
export {
  BLACK,
  WHITE,
  defaultCursorConfig,
  defaultSelectionConfig,
  resolveCursorConfig,
  resolveSelectionConfig,
} from "./engine/config";
export type {
  CursorConfig,
  EngineOptions,
  SelectionConfig,
} from "./engine/config";
export { ClickHistory } from "./engine/click-history";
export type { ClickHistoryEntry, ClickKind } from "./engine/click-history";
export { Editor } from "./engine/editor";
export type { EditorAction, Motion } from "./engine/editor";
export {
  EditorSession,
  createEditorState,
  withEditorSession,
} from "./engine/editor-session";
export type { EditorState } from "./engine/editor-session";
export { reconcileSections } from "./engine/reconcile";
export { handleClick, handleKeyboardInput } from "./engine/input-dispatch";
export type {
  ClickDispatch,
  EditableText,
  KeyboardDispatch,
} from "./engine/input-dispatch";
export { actionsForKey, logicalKeyFromDom } from "./engine/keys";
export type { KeyboardInput, LogicalKey, NamedKey } from "./engine/keys";
export { hitTest } from "./engine/hit-test";
export type { HitOutput, HitRegion } from "./engine/hit-test";
export {
  caretPosition,
  cursorGlyph,
  highlightSelection,
} from "./engine/glyph-geometry";
export type {
  CaretPosition,
  CursorGlyph,
  SelectionSpan,
} from "./engine/glyph-geometry";
export {
  extractCaretRects,
  extractSelectionRects,
} from "./engine/draw-rects";
export type { DisplayNode, RenderTarget } from "./engine/draw-rects";
export { TextBuffer } from "./core/text-buffer";
export type { BufferLine, BufferSize, LineEnding } from "./core/text-buffer";
export { AttrsList } from "./core/attrs-list";
export type { StyledSpan } from "./core/attrs-list";
export type { LayoutEngine } from "./core/layout";
export type * from "./core/types";
export { compareCursors, cursorsEqual, maxCursor, minCursor } from "./core/cursor";
export { MonospaceLayout, hitRun, isRtlText } from "./layout/monospace-layout";
export type { MonospaceLayoutOptions } from "./layout/monospace-layout";
export {
  BufferSizeError,
  ClickClassificationError,
  CursorRangeError,
  SessionConflictError,
  SpanRangeError,
} from "./shared/errors";
export { createLogger } from "./shared/logger";
export type { Logger } from "./shared/logger";
export { EditorOverlay, clipDrawRect, toCssColor } from "./react/EditorOverlay";
export type { EditorOverlayProps } from "./react/EditorOverlay";

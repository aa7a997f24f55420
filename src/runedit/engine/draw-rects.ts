import type { DrawRect, LayoutRun, Rect, Size, Vec2 } from "../core/types";
import type { CursorConfig, SelectionConfig } from "./config";
import type { EditorState } from "./editor-session";
import { caretPosition, highlightSelection } from "./glyph-geometry";

/** Where and how a text is displayed, as reported by the host. */
export type DisplayNode = {
  /** Centre of the node in window space. */
  center: Vec2;
  size: Size;
  visible: boolean;
  clip: Rect | null;
  camera: string | null;
  stackIndex: number;
};

export type RenderTarget = {
  defaultCamera: string | null;
  /** Physical pixels per logical pixel. */
  scaleFactor: number;
};

type Placement = {
  origin: Vec2;
  camera: string;
};

/**
 * Top-left corner of the node aligned to the nearest physical pixel, or null
 * when the node is not drawn at all.
 */
function placeNode(node: DisplayNode, target: RenderTarget): Placement | null {
  const camera = node.camera ?? target.defaultCamera;
  if (camera === null) {
    return null;
  }
  // Hidden, or collapsed by a parent.
  if (!node.visible || node.size.width === 0 || node.size.height === 0) {
    return null;
  }
  const scale = target.scaleFactor > 0 ? target.scaleFactor : 1;
  const snap = (value: number) => Math.round(value * scale) / scale;
  return {
    origin: {
      x: snap(node.center.x - node.size.width / 2),
      y: snap(node.center.y - node.size.height / 2),
    },
    camera,
  };
}

export type CaretExtraction = {
  node: DisplayNode;
  state: EditorState;
  runs: LayoutRun[];
  config: CursorConfig;
  target: RenderTarget;
};

export function extractCaretRects({
  node,
  state,
  runs,
  config,
  target,
}: CaretExtraction): DrawRect[] {
  const cursor = state.cursor;
  if (!cursor) {
    return [];
  }
  const placement = placeNode(node, target);
  if (!placement) {
    return [];
  }

  const rects: DrawRect[] = [];
  for (const run of runs) {
    const position = caretPosition(cursor, run);
    if (!position) {
      continue;
    }
    rects.push({
      kind: "caret",
      x: placement.origin.x + position.x - config.width / 2,
      y: placement.origin.y + position.y,
      width: config.width,
      height: run.lineHeight,
      color: config.color,
      clip: node.clip,
      camera: placement.camera,
      stackIndex: node.stackIndex,
    });
  }
  return rects;
}

export type SelectionExtraction = {
  node: DisplayNode;
  state: EditorState;
  bufferWidth: number | null;
  runs: LayoutRun[];
  config: SelectionConfig;
  target: RenderTarget;
};

export function extractSelectionRects({
  node,
  state,
  bufferWidth,
  runs,
  config,
  target,
}: SelectionExtraction): DrawRect[] {
  if (state.selection.type === "none") {
    return [];
  }
  const placement = placeNode(node, target);
  if (!placement) {
    return [];
  }

  const rects: DrawRect[] = [];
  for (const run of runs) {
    const span = highlightSelection(state.selectionBounds, bufferWidth, run);
    if (!span) {
      continue;
    }
    rects.push({
      kind: "selection",
      x: placement.origin.x + span.x,
      y: placement.origin.y + span.y,
      width: span.width,
      height: run.lineHeight,
      color: config.color,
      clip: node.clip,
      camera: placement.camera,
      stackIndex: node.stackIndex,
    });
  }
  return rects;
}

import type { TextBuffer } from "./text-buffer";
import type { Cursor, LayoutRun } from "./types";

/**
 * Shaping and layout boundary. Runs are regenerated from the buffer on every
 * call and treated as read-only by the editor.
 */
export type LayoutEngine = {
  readonly lineHeight: number;
  layoutRuns(buffer: TextBuffer): LayoutRun[];
  /** Resolves a buffer-local position (top-left origin, y down) to a cursor. */
  hit(buffer: TextBuffer, x: number, y: number): Cursor | null;
};

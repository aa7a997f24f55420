import type { Cursor } from "./types";

export function compareCursors(a: Cursor, b: Cursor): number {
  if (a.line !== b.line) {
    return a.line - b.line;
  }
  return a.index - b.index;
}

export function cursorsEqual(a: Cursor, b: Cursor): boolean {
  return a.line === b.line && a.index === b.index;
}

export function minCursor(a: Cursor, b: Cursor): Cursor {
  return compareCursors(a, b) <= 0 ? a : b;
}

export function maxCursor(a: Cursor, b: Cursor): Cursor {
  return compareCursors(a, b) >= 0 ? a : b;
}

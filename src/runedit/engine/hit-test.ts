import type { LayoutEngine } from "../core/layout";
import type { TextBuffer } from "../core/text-buffer";
import type { Vec2 } from "../core/types";
import { BufferSizeError } from "../shared/errors";

export type HitRegion<K> = {
  key: K;
  buffer: TextBuffer;
  /** Centre of the region in window space. */
  center: Vec2;
};

export type HitOutput<K> = {
  key: K;
  /** Section index of the styled span under the pointer. */
  spanIndex: number;
  /** Pointer position relative to the region's top-left corner. */
  position: Vec2;
};

/**
 * Finds the region under the pointer and the text offset it points at.
 *
 * Regions are tried in iteration order and the first one containing the
 * pointer wins; stacking order is not considered.
 */
export function hitTest<K>(
  pointer: Vec2 | null,
  regions: Iterable<HitRegion<K>>,
  layout: LayoutEngine,
): HitOutput<K> | null {
  if (!pointer) {
    return null;
  }

  for (const region of regions) {
    const { width, height } = region.buffer.size;
    if (width === null || height === null) {
      throw new BufferSizeError(
        "A hit-testable buffer needs both a width and a height",
      );
    }
    const left = region.center.x - width / 2;
    const top = region.center.y - height / 2;
    const inside =
      pointer.x >= left &&
      pointer.x <= left + width &&
      pointer.y >= top &&
      pointer.y <= top + height;
    if (!inside) {
      continue;
    }

    const position = { x: pointer.x - left, y: pointer.y - top };
    const cursor = layout.hit(region.buffer, position.x, position.y);
    if (cursor) {
      const line = region.buffer.lines[cursor.line];
      return {
        key: region.key,
        spanIndex: line.attrs.getSpan(cursor.index),
        position,
      };
    }
  }

  return null;
}

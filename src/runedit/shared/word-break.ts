import { wordSegments } from "./segmenter";

/**
 * Find word boundaries at a given offset.
 * Returns the start and end offsets of the word (or non-word segment) at the position.
 */
export function getWordBoundariesAt(
  text: string,
  offset: number,
): { start: number; end: number } {
  if (text.length === 0) {
    return { start: 0, end: 0 };
  }

  const clampedOffset = Math.max(0, Math.min(offset, text.length));
  const segments = wordSegments(text);

  for (let i = 0; i < segments.length; i += 1) {
    const seg = segments[i];
    const segEnd = seg.index + seg.segment.length;

    if (clampedOffset >= seg.index && clampedOffset < segEnd) {
      return { start: seg.index, end: segEnd };
    }

    if (clampedOffset === segEnd && i === segments.length - 1) {
      return { start: seg.index, end: segEnd };
    }
  }

  if (segments.length > 0) {
    const lastSeg = segments[segments.length - 1];
    return {
      start: lastSeg.index,
      end: lastSeg.index + lastSeg.segment.length,
    };
  }

  return { start: 0, end: 0 };
}

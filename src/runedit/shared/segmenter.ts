export type GraphemeSegment = {
  segment: string;
  index: number;
};

export type WordSegment = GraphemeSegment & {
  isWordLike: boolean;
};

const graphemeSegmenter = new Intl.Segmenter(undefined, {
  granularity: "grapheme",
});

const wordSegmenter = new Intl.Segmenter("en", { granularity: "word" });

function isAsciiText(text: string): boolean {
  for (let i = 0; i < text.length; i += 1) {
    if (text.charCodeAt(i) > 0x7f) {
      return false;
    }
  }
  return true;
}

export function graphemeSegments(text: string): GraphemeSegment[] {
  // "\r\n" is a single grapheme, so the fast path only holds without it.
  if (isAsciiText(text) && !text.includes("\r\n")) {
    const segments: GraphemeSegment[] = [];
    for (let i = 0; i < text.length; i += 1) {
      segments.push({ segment: text[i] ?? "", index: i });
    }
    return segments;
  }
  return Array.from(graphemeSegmenter.segment(text), (segment) => ({
    segment: segment.segment,
    index: segment.index,
  }));
}

export function graphemeCount(text: string): number {
  if (isAsciiText(text) && !text.includes("\r\n")) {
    return text.length;
  }

  let count = 0;
  for (const _segment of graphemeSegmenter.segment(text)) {
    count += 1;
  }
  return count;
}

export function wordSegments(text: string): WordSegment[] {
  return Array.from(wordSegmenter.segment(text), (segment) => ({
    segment: segment.segment,
    index: segment.index,
    isWordLike: segment.isWordLike ?? false,
  }));
}

/** Offset of the grapheme boundary strictly before `offset` (0 at the start). */
export function previousGraphemeBoundary(text: string, offset: number): number {
  if (offset <= 0) {
    return 0;
  }

  let previous = 0;
  for (const segment of graphemeSegments(text)) {
    if (segment.index >= offset) {
      break;
    }
    previous = segment.index;
  }
  return previous;
}

/** Offset of the grapheme boundary strictly after `offset` (text length at the end). */
export function nextGraphemeBoundary(text: string, offset: number): number {
  if (offset >= text.length) {
    return text.length;
  }

  for (const segment of graphemeSegments(text)) {
    const end = segment.index + segment.segment.length;
    if (end > offset) {
      return end;
    }
  }
  return text.length;
}

/**
 * Clamps `offset` into the text and moves it back to the start of the
 * grapheme cluster it lands in.
 */
export function snapToGraphemeBoundary(text: string, offset: number): number {
  const clamped = Math.max(0, Math.min(offset, text.length));
  if (clamped === 0 || clamped === text.length) {
    return clamped;
  }

  for (const segment of graphemeSegments(text)) {
    const end = segment.index + segment.segment.length;
    if (clamped === segment.index) {
      return clamped;
    }
    if (clamped < end) {
      return segment.index;
    }
  }
  return text.length;
}

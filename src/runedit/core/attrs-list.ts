import { SpanRangeError } from "../shared/errors";

/**
 * A styled range within one line. `metadata` identifies the external text
 * section the range belongs to.
 */
export type StyledSpan = {
  start: number;
  end: number;
  metadata: number;
};

/**
 * Styled spans of one line, kept in offset order. Spans may leave gaps;
 * offsets inside a gap resolve to `defaultMetadata`.
 */
export class AttrsList {
  private entries: StyledSpan[] = [];

  constructor(public defaultMetadata = 0) {}

  add(start: number, end: number, metadata: number): void {
    this.entries.push({ start, end, metadata });
    this.entries.sort((a, b) => a.start - b.start);
  }

  spans(): readonly StyledSpan[] {
    return this.entries;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  /** Metadata of the span covering `index`, else the default. */
  getSpan(index: number): number {
    for (const span of this.entries) {
      if (index >= span.start && index < span.end) {
        return span.metadata;
      }
    }
    return this.defaultMetadata;
  }

  /**
   * Opens room for `length` inserted units at `index`. The span that touches
   * `index` from the left grows; spans after it shift.
   */
  insertGap(index: number, length: number): void {
    if (length <= 0) {
      return;
    }
    for (const span of this.entries) {
      const grows =
        (span.start < index && index <= span.end) ||
        (index === 0 && span.start === 0);
      if (grows) {
        span.end += length;
      } else if (span.start >= index) {
        span.start += length;
        span.end += length;
      }
    }
  }

  removeRange(start: number, end: number): void {
    if (end <= start) {
      return;
    }
    const removed = end - start;
    const mapOffset = (offset: number): number => {
      if (offset <= start) {
        return offset;
      }
      if (offset >= end) {
        return offset - removed;
      }
      return start;
    };
    this.entries = this.entries
      .map((span) => ({
        start: mapOffset(span.start),
        end: mapOffset(span.end),
        metadata: span.metadata,
      }))
      .filter((span) => span.start < span.end);
  }

  /**
   * Moves everything at or after `index` into a new list, rebased to 0.
   * The new list resolves gaps to `tailDefault`.
   */
  splitOff(index: number, tailDefault = this.defaultMetadata): AttrsList {
    const tail = new AttrsList(tailDefault);
    const kept: StyledSpan[] = [];
    for (const span of this.entries) {
      if (span.end <= index) {
        kept.push(span);
        continue;
      }
      if (span.start < index) {
        kept.push({ start: span.start, end: index, metadata: span.metadata });
      }
      tail.entries.push({
        start: Math.max(span.start, index) - index,
        end: span.end - index,
        metadata: span.metadata,
      });
    }
    this.entries = kept;
    return tail;
  }

  /** Appends `other`'s spans shifted by `offset`. */
  append(other: AttrsList, offset: number): void {
    for (const span of other.entries) {
      this.entries.push({
        start: span.start + offset,
        end: span.end + offset,
        metadata: span.metadata,
      });
    }
  }

  /** Rewrites every metadata value, the default included. */
  remapMetadata(map: (metadata: number) => number): void {
    this.defaultMetadata = map(this.defaultMetadata);
    for (const span of this.entries) {
      span.metadata = map(span.metadata);
    }
  }

  clone(): AttrsList {
    const copy = new AttrsList(this.defaultMetadata);
    copy.entries = this.entries.map((span) => ({ ...span }));
    return copy;
  }

  validate(lineLength: number): void {
    let previousEnd = 0;
    this.entries.forEach((span, i) => {
      if (span.start >= span.end) {
        throw new SpanRangeError(
          `Span ${i} is empty or inverted: ${span.start}..${span.end}`,
        );
      }
      if (span.start < previousEnd) {
        throw new SpanRangeError(
          `Span ${i} (${span.start}..${span.end}) overlaps the previous span ending at ${previousEnd}`,
        );
      }
      if (span.end > lineLength) {
        throw new SpanRangeError(
          `Span ${i} (${span.start}..${span.end}) runs past the line length ${lineLength}`,
        );
      }
      previousEnd = span.end;
    });
  }
}

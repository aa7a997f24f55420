import { describe, expect, it } from "vitest";
import { AttrsList } from "./attrs-list";
import { SpanRangeError } from "../shared/errors";

function twoSpans(): AttrsList {
  const attrs = new AttrsList(0);
  attrs.add(2, 7, 1);
  attrs.add(9, 12, 2);
  return attrs;
}

describe("AttrsList", () => {
  it("resolves offsets to the covering span or the default", () => {
    const attrs = twoSpans();

    expect(attrs.getSpan(2)).toBe(1);
    expect(attrs.getSpan(6)).toBe(1);
    expect(attrs.getSpan(7)).toBe(0);
    expect(attrs.getSpan(11)).toBe(2);
    expect(attrs.getSpan(12)).toBe(0);
  });

  it("keeps spans sorted regardless of insertion order", () => {
    const attrs = new AttrsList();
    attrs.add(5, 6, 3);
    attrs.add(0, 2, 4);

    expect(attrs.spans().map((span) => span.start)).toEqual([0, 5]);
  });

  it("grows the span touching an insertion from the left", () => {
    const attrs = twoSpans();
    attrs.insertGap(7, 2);

    expect(attrs.spans()).toEqual([
      { start: 2, end: 9, metadata: 1 },
      { start: 11, end: 14, metadata: 2 },
    ]);
  });

  it("grows a span that starts at offset 0 when inserting at 0", () => {
    const attrs = new AttrsList();
    attrs.add(0, 4, 1);
    attrs.insertGap(0, 3);

    expect(attrs.spans()).toEqual([{ start: 0, end: 7, metadata: 1 }]);
  });

  it("shrinks and drops spans inside a removed range", () => {
    const attrs = twoSpans();
    attrs.removeRange(5, 10);

    expect(attrs.spans()).toEqual([
      { start: 2, end: 5, metadata: 1 },
      { start: 5, end: 7, metadata: 2 },
    ]);

    attrs.removeRange(5, 7);
    expect(attrs.spans()).toEqual([{ start: 2, end: 5, metadata: 1 }]);
  });

  it("splits spans across a line break", () => {
    const attrs = twoSpans();
    const tail = attrs.splitOff(5, 9);

    expect(attrs.spans()).toEqual([{ start: 2, end: 5, metadata: 1 }]);
    expect(tail.spans()).toEqual([
      { start: 0, end: 2, metadata: 1 },
      { start: 4, end: 7, metadata: 2 },
    ]);
    expect(tail.defaultMetadata).toBe(9);
  });

  it("appends another list at an offset", () => {
    const head = new AttrsList();
    head.add(0, 3, 1);
    const tail = new AttrsList();
    tail.add(0, 2, 2);
    head.append(tail, 3);

    expect(head.spans()).toEqual([
      { start: 0, end: 3, metadata: 1 },
      { start: 3, end: 5, metadata: 2 },
    ]);
  });

  it("remaps metadata including the default", () => {
    const attrs = new AttrsList(2);
    attrs.add(0, 1, 2);
    attrs.remapMetadata((metadata) => metadata - 1);

    expect(attrs.defaultMetadata).toBe(1);
    expect(attrs.spans()).toEqual([{ start: 0, end: 1, metadata: 1 }]);
  });

  it("clones independently", () => {
    const attrs = twoSpans();
    const copy = attrs.clone();
    copy.removeRange(0, 12);

    expect(copy.isEmpty()).toBe(true);
    expect(attrs.spans()).toHaveLength(2);
  });

  describe("validate", () => {
    it("accepts gapped spans inside the line", () => {
      expect(() => twoSpans().validate(21)).not.toThrow();
    });

    it("rejects overlapping spans", () => {
      const attrs = new AttrsList();
      attrs.add(0, 5, 1);
      attrs.add(3, 8, 2);

      expect(() => attrs.validate(10)).toThrow(SpanRangeError);
    });

    it("rejects spans past the end of the line", () => {
      const attrs = new AttrsList();
      attrs.add(0, 5, 1);

      expect(() => attrs.validate(4)).toThrow(
        "Span 0 (0..5) runs past the line length 4",
      );
    });

    it("rejects empty spans", () => {
      const attrs = new AttrsList();
      attrs.add(3, 3, 1);

      expect(() => attrs.validate(4)).toThrow(SpanRangeError);
    });
  });
});

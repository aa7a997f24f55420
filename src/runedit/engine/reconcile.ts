import type { TextBuffer } from "../core/text-buffer";
import type { TextSection } from "../core/types";

/**
 * Rebuilds section values from the buffer's styled spans after an edit.
 *
 * Spans may leave unstyled gaps. A gap takes the style of the span after it;
 * a gap at the end of a line takes the style of the span before it. So for a
 * 21-unit line with spans 2..7 and 9..12, 0..7 goes to the first span's
 * section and 7..21 to the second's.
 *
 * Sections that end up with no text are removed, except that the last
 * remaining section is cleared instead. Span metadata in the buffer is
 * renumbered to match the surviving sections.
 */
export function reconcileSections(
  buffer: TextBuffer,
  sections: TextSection[],
): void {
  const updates = new Map<number, string>();
  const push = (sectionIndex: number, text: string) => {
    updates.set(sectionIndex, (updates.get(sectionIndex) ?? "") + text);
  };

  for (const line of buffer.lines) {
    const { text, ending, attrs } = line;
    const spans = attrs.spans();
    if (spans.length === 0) {
      push(attrs.defaultMetadata, text + ending);
      continue;
    }

    let position = 0;
    let owner = attrs.defaultMetadata;
    for (const span of spans) {
      owner = span.metadata;
      // Any gap before the span is pushed along with it.
      push(owner, text.slice(position, span.end));
      position = span.end;
      if (position === text.length) {
        push(owner, ending);
      }
    }
    if (position < text.length) {
      push(owner, text.slice(position) + ending);
    }
  }

  const emptied: number[] = [];
  sections.forEach((section, sectionIndex) => {
    const value = updates.get(sectionIndex);
    if (value === undefined) {
      emptied.push(sectionIndex);
    } else {
      section.value = value;
    }
  });

  const removed: number[] = [];
  // Highest index first so the remaining indices stay valid.
  for (const sectionIndex of emptied.reverse()) {
    if (sections.length > 1) {
      sections.splice(sectionIndex, 1);
      removed.push(sectionIndex);
    } else {
      sections[0].value = "";
    }
  }

  if (removed.length > 0) {
    const lastIndex = sections.length - 1;
    const shift = (metadata: number) => {
      const below = removed.filter((index) => index < metadata).length;
      return Math.min(metadata - below, lastIndex);
    };
    for (const line of buffer.lines) {
      line.attrs.remapMetadata(shift);
    }
  }
}

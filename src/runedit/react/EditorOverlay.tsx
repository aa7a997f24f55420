import type { CSSProperties } from "react";
import type { Color, DrawRect, Rect } from "../core/types";

export type EditorOverlayProps = {
  rects: DrawRect[];
  className?: string;
};

const overlayStyle: CSSProperties = {
  position: "absolute",
  inset: 0,
  pointerEvents: "none",
  userSelect: "none",
};

function linearToSrgb(channel: number): number {
  const clamped = Math.max(0, Math.min(channel, 1));
  const encoded =
    clamped <= 0.0031308
      ? clamped * 12.92
      : 1.055 * Math.pow(clamped, 1 / 2.4) - 0.055;
  return Math.round(encoded * 255);
}

export function toCssColor(color: Color): string {
  return `rgba(${linearToSrgb(color.r)}, ${linearToSrgb(color.g)}, ${linearToSrgb(color.b)}, ${color.a})`;
}

/** The part of `rect` inside its clip region, or null when nothing is left. */
export function clipDrawRect(rect: DrawRect): Rect | null {
  if (!rect.clip) {
    return { x: rect.x, y: rect.y, width: rect.width, height: rect.height };
  }
  const left = Math.max(rect.x, rect.clip.x);
  const top = Math.max(rect.y, rect.clip.y);
  const right = Math.min(rect.x + rect.width, rect.clip.x + rect.clip.width);
  const bottom = Math.min(rect.y + rect.height, rect.clip.y + rect.clip.height);
  if (right <= left || bottom <= top) {
    return null;
  }
  return { x: left, y: top, width: right - left, height: bottom - top };
}

export function EditorOverlay({ rects, className }: EditorOverlayProps) {
  const overlayClassName = className
    ? `runedit-overlay ${className}`
    : "runedit-overlay";

  return (
    <div className={overlayClassName} aria-hidden="true" style={overlayStyle}>
      {rects.map((rect, index) => {
        const visible = clipDrawRect(rect);
        if (!visible) {
          return null;
        }
        return (
          <div
            key={`${rect.kind}-${index}`}
            className={
              rect.kind === "caret" ? "runedit-caret" : "runedit-selection-rect"
            }
            style={{
              position: "absolute",
              left: `${visible.x}px`,
              top: `${visible.y}px`,
              width: `${visible.width}px`,
              height: `${visible.height}px`,
              backgroundColor: toCssColor(rect.color),
            }}
          />
        );
      })}
    </div>
  );
}

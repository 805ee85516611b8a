export interface ViewportSize {
  readonly width: number;
  readonly height: number;
}

/** Same shape as pixi.js `PointData`, so points pass straight through to display objects. */
export interface Point2D {
  readonly x: number;
  readonly y: number;
}

export interface EdgeInsets {
  readonly left: number;
  readonly top: number;
  readonly right: number;
  readonly bottom: number;
}

/**
 * What the host knows about the current layout: the logical size, the padding
 * reserved by device chrome (notches, system bars, home indicators) and the
 * insets of whatever currently covers the view (e.g. an onscreen keyboard).
 */
export interface LayoutContext {
  readonly size: ViewportSize;
  readonly viewPadding: EdgeInsets;
  readonly viewInsets: EdgeInsets;
}

export const EDGE_INSETS_ZERO: EdgeInsets = Object.freeze({
  left: 0,
  top: 0,
  right: 0,
  bottom: 0,
});

export function edgeInsetsAll(value: number): EdgeInsets {
  return { left: value, top: value, right: value, bottom: value };
}

export function edgeInsetsOnly(sides: Partial<EdgeInsets>): EdgeInsets {
  return {
    left: sides.left ?? 0,
    top: sides.top ?? 0,
    right: sides.right ?? 0,
    bottom: sides.bottom ?? 0,
  };
}

export function edgeInsetsSymmetric(sides: {
  readonly horizontal?: number;
  readonly vertical?: number;
}): EdgeInsets {
  const horizontal = sides.horizontal ?? 0;
  const vertical = sides.vertical ?? 0;

  return { left: horizontal, top: vertical, right: horizontal, bottom: vertical };
}

export function addEdgeInsets(first: EdgeInsets, second: EdgeInsets): EdgeInsets {
  return {
    left: first.left + second.left,
    top: first.top + second.top,
    right: first.right + second.right,
    bottom: first.bottom + second.bottom,
  };
}

/** Shorter edge becomes the width, so baselines are always compared in portrait. */
export function toPortraitSize(size: ViewportSize): ViewportSize {
  return {
    width: Math.min(size.width, size.height),
    height: Math.max(size.width, size.height),
  };
}

export function isLayoutContext(value: ViewportSize | LayoutContext): value is LayoutContext {
  return 'size' in value;
}

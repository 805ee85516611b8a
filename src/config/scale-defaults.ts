import type { ViewportSize } from '../shared/geometry';

export const DEFAULT_BASE_WIDTH = 360;
export const DEFAULT_BASE_HEIGHT = 640;

export const DEFAULT_SCALE_CONFIG = Object.freeze({
  baseWidth: DEFAULT_BASE_WIDTH,
  baseHeight: DEFAULT_BASE_HEIGHT,
  fontMultiplierPhone: 1,
  fontMultiplierTablet: 0.9,
  iconMultiplierPhone: 1,
  iconMultiplierTablet: 1.1,
  alignmentTabletBias: 0.85,
});

/** Used when no display can be read, e.g. under a headless test runner. */
export const FALLBACK_VIEWPORT: ViewportSize = Object.freeze({
  width: DEFAULT_BASE_WIDTH,
  height: DEFAULT_BASE_HEIGHT,
});

export const TABLET_AVERAGE_RATIO_THRESHOLD = 1.2;
export const TABLET_MIN_LOGICAL_WIDTH = 600;
export const TABLET_SCALE_DEFLATION = 0.95;

export const LIFECYCLE_LOG_LIMIT = 200;

export const SAFE_AREA_CSS_PROPERTIES = Object.freeze({
  top: '--safe-area-inset-top',
  right: '--safe-area-inset-right',
  bottom: '--safe-area-inset-bottom',
  left: '--safe-area-inset-left',
});

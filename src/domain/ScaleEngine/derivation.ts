import {
  TABLET_AVERAGE_RATIO_THRESHOLD,
  TABLET_MIN_LOGICAL_WIDTH,
  TABLET_SCALE_DEFLATION,
} from '../../config/scale-defaults';
import { toPortraitSize, type ViewportSize } from '../../shared/geometry';

export interface ScaleBaseline {
  readonly baseWidth: number;
  readonly baseHeight: number;
}

export interface ViewportMetrics {
  readonly width: number;
  readonly height: number;
  readonly averageRatio: number;
  readonly scaleFactor: number;
  readonly isTablet: boolean;
}

/**
 * Heuristic, not device detection: any unusually wide logical viewport counts
 * as a tablet even when its ratio to the baseline is modest.
 */
export function isTabletViewport(averageRatio: number, logicalWidth: number): boolean {
  return averageRatio > TABLET_AVERAGE_RATIO_THRESHOLD || logicalWidth >= TABLET_MIN_LOGICAL_WIDTH;
}

export function deriveViewportMetrics(size: ViewportSize, baseline: ScaleBaseline): ViewportMetrics {
  const { width, height } = toPortraitSize(size);
  const baseWidthRatio = width / baseline.baseWidth;
  const baseHeightRatio = height / baseline.baseHeight;
  const averageRatio = (baseWidthRatio + baseHeightRatio) / 2;
  const isTablet = isTabletViewport(averageRatio, width);

  // Tablets are deflated once, before any per-category multiplier.
  const scaleFactor = averageRatio * (isTablet ? TABLET_SCALE_DEFLATION : 1);

  return {
    width,
    height,
    averageRatio,
    scaleFactor,
    isTablet,
  };
}

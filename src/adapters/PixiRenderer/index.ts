import type { PointData, Rectangle } from 'pixi.js';

import type { MetricsSource, ResponsiveScaler } from '../../application';
import type { Point2D } from '../../shared/geometry';

type RendererResizeListener = (screenWidth: number, screenHeight: number, resolution: number) => void;

/**
 * The part of a pixi.js `Renderer` the adapter needs. `screen` is measured in
 * CSS pixels, which are the logical units the engine works in.
 */
export interface PixiRendererLike {
  readonly screen: Pick<Rectangle, 'width' | 'height'>;
  on(event: 'resize', listener: RendererResizeListener): unknown;
  off(event: 'resize', listener: RendererResizeListener): unknown;
}

export interface PositionTarget {
  readonly position: {
    set(x: number, y: number): unknown;
  };
}

export function createPixiRendererMetricsSource(renderer: PixiRendererLike): MetricsSource {
  return {
    readViewport: () => {
      const { width, height } = renderer.screen;

      if (width <= 0 || height <= 0) {
        return null;
      }

      return { width, height };
    },
    subscribe: (listener) => {
      const handleResize: RendererResizeListener = () => {
        listener();
      };

      renderer.on('resize', handleResize);

      return () => {
        renderer.off('resize', handleResize);
      };
    },
  };
}

export function toPixiPoint(point: Point2D): PointData {
  return { x: point.x, y: point.y };
}

/** Places a display object at a design-space offset scaled for the current viewport. */
export function applyScaledPosition(
  target: PositionTarget,
  designOffset: Point2D,
  scaler: ResponsiveScaler,
): PointData {
  const scaled = toPixiPoint(scaler.offset(designOffset));

  target.position.set(scaled.x, scaled.y);
  return scaled;
}

import type { MetricsSource } from '../../application';
import { SAFE_AREA_CSS_PROPERTIES } from '../../config/scale-defaults';
import { EDGE_INSETS_ZERO, type EdgeInsets, type LayoutContext } from '../../shared/geometry';

type ViewportChangeEvent = 'resize' | 'orientationchange';

interface VisualViewportLike {
  readonly width: number;
  readonly height: number;
  readonly offsetTop: number;
  readonly offsetLeft: number;
}

/** The part of `window` the adapter reads; a real `Window` satisfies it. */
export interface BrowserViewportHost {
  readonly innerWidth: number;
  readonly innerHeight: number;
  readonly visualViewport?: VisualViewportLike | null;
  addEventListener(type: ViewportChangeEvent, listener: () => void): void;
  removeEventListener(type: ViewportChangeEvent, listener: () => void): void;
}

/** Satisfied by `getComputedStyle(document.documentElement)`. */
export interface SafeAreaStyleSource {
  getPropertyValue(property: string): string;
}

const VIEWPORT_CHANGE_EVENTS: readonly ViewportChangeEvent[] = ['resize', 'orientationchange'];

function parseCssPixels(rawValue: string): number {
  const parsed = Number.parseFloat(rawValue.trim());

  if (!Number.isFinite(parsed) || parsed < 0) {
    return 0;
  }

  return parsed;
}

/**
 * Reads `--safe-area-inset-*` custom properties. The host stylesheet is
 * expected to declare them on the root element, e.g.
 * `--safe-area-inset-top: env(safe-area-inset-top, 0px)`.
 */
export function readCssSafeAreaInsets(style: SafeAreaStyleSource): EdgeInsets {
  return {
    left: parseCssPixels(style.getPropertyValue(SAFE_AREA_CSS_PROPERTIES.left)),
    top: parseCssPixels(style.getPropertyValue(SAFE_AREA_CSS_PROPERTIES.top)),
    right: parseCssPixels(style.getPropertyValue(SAFE_AREA_CSS_PROPERTIES.right)),
    bottom: parseCssPixels(style.getPropertyValue(SAFE_AREA_CSS_PROPERTIES.bottom)),
  };
}

/** Space the visual viewport does not cover, e.g. an onscreen keyboard. */
export function readVisualViewportInsets(host: BrowserViewportHost): EdgeInsets {
  const visualViewport = host.visualViewport;

  if (!visualViewport) {
    return EDGE_INSETS_ZERO;
  }

  const right = host.innerWidth - visualViewport.width - visualViewport.offsetLeft;
  const bottom = host.innerHeight - visualViewport.height - visualViewport.offsetTop;

  return {
    left: Math.max(0, visualViewport.offsetLeft),
    top: Math.max(0, visualViewport.offsetTop),
    right: Math.max(0, right),
    bottom: Math.max(0, bottom),
  };
}

export function readBrowserLayoutContext(
  host: BrowserViewportHost,
  safeAreaStyle: SafeAreaStyleSource | null = null,
): LayoutContext {
  return {
    size: {
      width: host.innerWidth,
      height: host.innerHeight,
    },
    viewPadding: safeAreaStyle ? readCssSafeAreaInsets(safeAreaStyle) : EDGE_INSETS_ZERO,
    viewInsets: readVisualViewportInsets(host),
  };
}

export function createBrowserMetricsSource(host: BrowserViewportHost): MetricsSource {
  return {
    readViewport: () => {
      if (host.innerWidth <= 0 || host.innerHeight <= 0) {
        return null;
      }

      return {
        width: host.innerWidth,
        height: host.innerHeight,
      };
    },
    subscribe: (listener) => {
      const handleChange = (): void => {
        listener();
      };

      VIEWPORT_CHANGE_EVENTS.forEach((eventName) => {
        host.addEventListener(eventName, handleChange);
      });

      return () => {
        VIEWPORT_CHANGE_EVENTS.forEach((eventName) => {
          host.removeEventListener(eventName, handleChange);
        });
      };
    },
  };
}

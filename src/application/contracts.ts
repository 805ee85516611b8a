import type { PlatformFlags, PlatformInfoProvider, PlatformKind } from '../domain/Platform';
import type {
  MetricsSource,
  ScaleConfig,
  ScaleConfigureOptions,
  ScaleEngine,
  ScaleEngineOptions,
  ScaleLifecycleLogEntry,
  ViewportSnapshot,
  ViewportSnapshotListener,
} from '../domain/ScaleEngine';
import type { EdgeInsets, LayoutContext, Point2D } from '../shared/geometry';
import type { MODULE_IDS } from '../shared/module-ids';

export type {
  MetricsSource,
  PlatformFlags,
  PlatformInfoProvider,
  PlatformKind,
  ScaleConfig,
  ScaleConfigureOptions,
  ScaleEngine,
  ScaleLifecycleLogEntry,
  ViewportSnapshot,
  ViewportSnapshotListener,
};

export interface ScaleError {
  readonly code: string;
  readonly message: string;
  readonly context: Readonly<Record<string, unknown>>;
}

export interface ScaleOkResult<TValue> {
  readonly type: 'ok';
  readonly value: TValue;
}

export interface ScaleValidationErrorResult {
  readonly type: 'validationError';
  readonly error: ScaleError;
}

export type ScaleResult<TValue> = ScaleOkResult<TValue> | ScaleValidationErrorResult;

/** Number and geometry shortcuts bound to one engine. */
export interface ResponsiveScaler {
  readonly moduleName: typeof MODULE_IDS.responsiveScaler;
  responsive: (value: number) => number;
  responsiveFont: (value: number) => number;
  responsiveIcon: (value: number) => number;
  /** Fraction (0..1) of the viewport width in logical units. */
  vw: (pct: number) => number;
  /** Fraction (0..1) of the viewport height in logical units. */
  vh: (pct: number) => number;
  offset: (point: Point2D) => Point2D;
  insets: (insets: EdgeInsets) => EdgeInsets;
  alignment: (point: Point2D) => Point2D;
  safeContentInsets: (context: LayoutContext, contentPadding: EdgeInsets) => EdgeInsets;
}

export type ResponsiveLayerOptions = ScaleEngineOptions;

export interface ResponsiveLayer {
  readonly engine: ScaleEngine;
  readonly scaler: ResponsiveScaler;
  dispose: () => void;
}

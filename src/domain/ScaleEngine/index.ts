import {
  DEFAULT_SCALE_CONFIG,
  FALLBACK_VIEWPORT,
  LIFECYCLE_LOG_LIMIT,
} from '../../config/scale-defaults';
import { toErrorMessage } from '../../shared/errors';
import {
  isLayoutContext,
  type EdgeInsets,
  type LayoutContext,
  type Point2D,
  type ViewportSize,
} from '../../shared/geometry';
import { MODULE_IDS } from '../../shared/module-ids';
import { clamp, isPositiveFiniteNumber } from '../../shared/runtime-guards';
import { resolvePlatformFlags, type PlatformFlags, type PlatformInfoProvider } from '../Platform';
import { deriveViewportMetrics, type ViewportMetrics } from './derivation';

export { deriveViewportMetrics, isTabletViewport } from './derivation';
export type { ScaleBaseline, ViewportMetrics } from './derivation';

export interface ScaleConfig {
  readonly baseWidth: number;
  readonly baseHeight: number;
  readonly fontMultiplierPhone: number;
  readonly fontMultiplierTablet: number;
  readonly iconMultiplierPhone: number;
  readonly iconMultiplierTablet: number;
  /** 0..1, pulls alignments toward the center on tablets. */
  readonly alignmentTabletBias: number;
}

export interface ScaleConfigureOptions extends Partial<ScaleConfig> {
  /**
   * Omitted keeps the current subscription as it is. Leaving it out never
   * unsubscribes, unlike helpers that default the flag to `false` on every
   * configure call; pass `false` explicitly to stop listening.
   */
  readonly listenForMetrics?: boolean;
}

export type ViewportSource = 'metrics' | 'fallback' | 'manual';

export interface ViewportSnapshot extends ViewportMetrics {
  readonly source: ViewportSource;
}

/** Port for whatever reports the platform's current viewport in logical units. */
export interface MetricsSource {
  /** `null` when no display is available. */
  readViewport: () => ViewportSize | null;
  subscribe: (listener: () => void) => () => void;
}

type ScaleLifecycleEventType =
  | 'engine-created'
  | 'configure'
  | 'config-warning'
  | 'refresh'
  | 'metrics-recompute'
  | 'metrics-fallback'
  | 'metrics-subscribed'
  | 'metrics-unsubscribed'
  | 'metrics-unavailable'
  | 'listener-error'
  | 'dispose';

export interface ScaleLifecycleLogEntry {
  readonly type: ScaleLifecycleEventType;
  readonly at: number;
  readonly context: Readonly<Record<string, unknown>>;
}

export type ViewportSnapshotListener = (snapshot: ViewportSnapshot) => void;

export interface ScaleEngineOptions {
  readonly metricsSource?: MetricsSource;
  readonly platform?: PlatformInfoProvider;
  readonly config?: ScaleConfigureOptions;
  readonly now?: () => number;
  readonly logger?: (entry: ScaleLifecycleLogEntry) => void;
}

export interface ScaleEngine {
  readonly moduleName: typeof MODULE_IDS.scaleEngine;
  configure: (options: ScaleConfigureOptions) => void;
  refresh: (input: ViewportSize | LayoutContext) => void;
  getSnapshot: () => ViewportSnapshot;
  getConfig: () => ScaleConfig;
  getPlatformFlags: () => PlatformFlags;
  isListeningForMetrics: () => boolean;
  scale: (value: number) => number;
  scaleFont: (value: number) => number;
  scaleIcon: (value: number) => number;
  scaleOffset: (dx: number, dy: number) => Point2D;
  scaleAlignment: (x: number, y: number) => Point2D;
  scalePadding: (insets?: Partial<EdgeInsets>) => EdgeInsets;
  percentOfWidth: (pct: number) => number;
  percentOfHeight: (pct: number) => number;
  viewPaddingOf: (context: LayoutContext) => EdgeInsets;
  viewInsetsOf: (context: LayoutContext) => EdgeInsets;
  subscribe: (listener: ViewportSnapshotListener) => () => void;
  getLifecycleLog: () => readonly ScaleLifecycleLogEntry[];
  dispose: () => void;
}

const NUMERIC_CONFIG_KEYS = [
  'baseWidth',
  'baseHeight',
  'fontMultiplierPhone',
  'fontMultiplierTablet',
  'iconMultiplierPhone',
  'iconMultiplierTablet',
] as const;

const OTHER_PLATFORM: PlatformInfoProvider = { kind: 'other' };

export function createScaleEngine(options: ScaleEngineOptions = {}): ScaleEngine {
  const metricsSource = options.metricsSource ?? null;
  const platform = options.platform ?? OTHER_PLATFORM;
  const now = options.now ?? Date.now;
  const logger =
    options.logger ??
    ((entry: ScaleLifecycleLogEntry) => {
      console.debug(`[${MODULE_IDS.scaleEngine}] ${entry.type}`, entry.context);
    });

  const lifecycleLog: ScaleLifecycleLogEntry[] = [];
  const listeners = new Set<ViewportSnapshotListener>();

  let config: ScaleConfig = { ...DEFAULT_SCALE_CONFIG };
  let snapshot: ViewportSnapshot = {
    ...deriveViewportMetrics(FALLBACK_VIEWPORT, config),
    source: 'fallback',
  };
  let lastManualSize: ViewportSize | null = null;
  let unsubscribeMetrics: (() => void) | null = null;

  const record = (
    type: ScaleLifecycleEventType,
    context: Readonly<Record<string, unknown>> = {},
  ): void => {
    const entry: ScaleLifecycleLogEntry = {
      type,
      at: now(),
      context,
    };

    lifecycleLog.push(entry);
    if (lifecycleLog.length > LIFECYCLE_LOG_LIMIT) {
      lifecycleLog.splice(0, lifecycleLog.length - LIFECYCLE_LOG_LIMIT);
    }
    logger(entry);
  };

  const notifyListeners = (): void => {
    const current = snapshot;

    for (const listener of listeners) {
      // A listener that recomputed has already delivered the newer snapshot.
      if (snapshot !== current) {
        return;
      }

      try {
        listener(current);
      } catch (error: unknown) {
        record('listener-error', {
          reason: toErrorMessage(error),
        });
      }
    }
  };

  const assignSize = (size: ViewportSize, source: ViewportSource): void => {
    snapshot = {
      ...deriveViewportMetrics(size, config),
      source,
    };
    notifyListeners();
  };

  const recomputeFromMetrics = (): void => {
    const viewport = metricsSource?.readViewport() ?? null;

    lastManualSize = null;

    if (!viewport) {
      record('metrics-fallback', {
        hasMetricsSource: metricsSource !== null,
      });
      assignSize(FALLBACK_VIEWPORT, 'fallback');
      return;
    }

    assignSize(viewport, 'metrics');
    record('metrics-recompute', {
      width: snapshot.width,
      height: snapshot.height,
      scaleFactor: snapshot.scaleFactor,
      isTablet: snapshot.isTablet,
    });
  };

  const recomputeFromLastSource = (): void => {
    if (lastManualSize) {
      assignSize(lastManualSize, 'manual');
      return;
    }

    recomputeFromMetrics();
  };

  const startListening = (): void => {
    if (unsubscribeMetrics) {
      return;
    }

    if (!metricsSource) {
      record('metrics-unavailable');
      return;
    }

    unsubscribeMetrics = metricsSource.subscribe(recomputeFromMetrics);
    record('metrics-subscribed');
  };

  const stopListening = (): void => {
    if (!unsubscribeMetrics) {
      return;
    }

    unsubscribeMetrics();
    unsubscribeMetrics = null;
    record('metrics-unsubscribed');
  };

  const warnOnDegenerateValues = (overrides: ScaleConfigureOptions): void => {
    for (const key of NUMERIC_CONFIG_KEYS) {
      const value = overrides[key];

      if (value !== undefined && !isPositiveFiniteNumber(value)) {
        record('config-warning', {
          field: key,
          value,
        });
      }
    }
  };

  const configure = (overrides: ScaleConfigureOptions): void => {
    warnOnDegenerateValues(overrides);

    config = {
      baseWidth: overrides.baseWidth ?? config.baseWidth,
      baseHeight: overrides.baseHeight ?? config.baseHeight,
      fontMultiplierPhone: overrides.fontMultiplierPhone ?? config.fontMultiplierPhone,
      fontMultiplierTablet: overrides.fontMultiplierTablet ?? config.fontMultiplierTablet,
      iconMultiplierPhone: overrides.iconMultiplierPhone ?? config.iconMultiplierPhone,
      iconMultiplierTablet: overrides.iconMultiplierTablet ?? config.iconMultiplierTablet,
      alignmentTabletBias:
        overrides.alignmentTabletBias === undefined
          ? config.alignmentTabletBias
          : clamp(overrides.alignmentTabletBias, 0, 1),
    };

    record('configure', {
      config,
      listenForMetrics: overrides.listenForMetrics ?? null,
    });

    recomputeFromLastSource();

    if (overrides.listenForMetrics === true) {
      startListening();
    } else if (overrides.listenForMetrics === false) {
      stopListening();
    }
  };

  const scale = (value: number): number => value * snapshot.scaleFactor;

  const engine: ScaleEngine = {
    moduleName: MODULE_IDS.scaleEngine,
    configure,
    refresh: (input) => {
      const size = isLayoutContext(input) ? input.size : input;

      lastManualSize = { width: size.width, height: size.height };
      assignSize(lastManualSize, 'manual');
      record('refresh', {
        width: snapshot.width,
        height: snapshot.height,
        scaleFactor: snapshot.scaleFactor,
        isTablet: snapshot.isTablet,
      });
    },
    getSnapshot: () => snapshot,
    getConfig: () => config,
    getPlatformFlags: () => resolvePlatformFlags(platform.kind, snapshot.isTablet),
    isListeningForMetrics: () => unsubscribeMetrics !== null,
    scale,
    scaleFont: (value) =>
      scale(value * (snapshot.isTablet ? config.fontMultiplierTablet : config.fontMultiplierPhone)),
    scaleIcon: (value) =>
      scale(value * (snapshot.isTablet ? config.iconMultiplierTablet : config.iconMultiplierPhone)),
    scaleOffset: (dx, dy) => ({ x: scale(dx), y: scale(dy) }),
    scaleAlignment: (x, y) => {
      const bias = snapshot.isTablet ? config.alignmentTabletBias : 1;
      return { x: x * bias, y: y * bias };
    },
    scalePadding: (insets = {}) => ({
      left: scale(insets.left ?? 0),
      top: scale(insets.top ?? 0),
      right: scale(insets.right ?? 0),
      bottom: scale(insets.bottom ?? 0),
    }),
    percentOfWidth: (pct) => snapshot.width * clamp(pct, 0, 1),
    percentOfHeight: (pct) => snapshot.height * clamp(pct, 0, 1),
    viewPaddingOf: (context) => context.viewPadding,
    viewInsetsOf: (context) => context.viewInsets,
    subscribe: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    getLifecycleLog: () => lifecycleLog,
    dispose: () => {
      stopListening();
      listeners.clear();
      record('dispose');
    },
  };

  recomputeFromMetrics();
  record('engine-created', {
    platform: platform.kind,
    source: snapshot.source,
  });

  if (options.config) {
    configure(options.config);
  }

  return engine;
}

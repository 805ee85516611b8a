export {
  createResponsiveLayer,
  createResponsiveScaler,
  parseScaleConfigInput,
} from './application';
export type {
  MetricsSource,
  PlatformFlags,
  PlatformInfoProvider,
  PlatformKind,
  ResponsiveLayer,
  ResponsiveLayerOptions,
  ResponsiveScaler,
  ScaleConfig,
  ScaleConfigureOptions,
  ScaleEngine,
  ScaleError,
  ScaleLifecycleLogEntry,
  ScaleResult,
  ViewportSnapshot,
  ViewportSnapshotListener,
} from './application';
export { createScaleEngine, deriveViewportMetrics, isTabletViewport } from './domain/ScaleEngine';
export type { ScaleEngineOptions, ViewportMetrics, ViewportSource } from './domain/ScaleEngine';
export { isPlatformKind, resolvePlatformFlags } from './domain/Platform';
export {
  createBrowserMetricsSource,
  readBrowserLayoutContext,
  readCssSafeAreaInsets,
  readVisualViewportInsets,
} from './adapters/BrowserViewport';
export type { BrowserViewportHost, SafeAreaStyleSource } from './adapters/BrowserViewport';
export {
  applyScaledPosition,
  createPixiRendererMetricsSource,
  toPixiPoint,
} from './adapters/PixiRenderer';
export type { PixiRendererLike, PositionTarget } from './adapters/PixiRenderer';
export {
  createStaticPlatformInfo,
  createUserAgentPlatformInfo,
  detectNativePlatformKind,
} from './adapters/PlatformDetect';
export type { UserAgentPlatformOptions } from './adapters/PlatformDetect';
export {
  EDGE_INSETS_ZERO,
  addEdgeInsets,
  edgeInsetsAll,
  edgeInsetsOnly,
  edgeInsetsSymmetric,
  toPortraitSize,
} from './shared/geometry';
export type { EdgeInsets, LayoutContext, Point2D, ViewportSize } from './shared/geometry';
export { DEFAULT_SCALE_CONFIG, FALLBACK_VIEWPORT } from './config/scale-defaults';

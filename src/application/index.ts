import type {
  ResponsiveLayer,
  ResponsiveLayerOptions,
  ResponsiveScaler,
  ScaleConfigureOptions,
  ScaleEngine,
  ScaleResult,
} from './contracts';
import { createScaleEngine } from '../domain/ScaleEngine';
import { addEdgeInsets } from '../shared/geometry';
import { MODULE_IDS } from '../shared/module-ids';
import { isRecordLike } from '../shared/runtime-guards';

export * from './contracts';

const NUMERIC_OPTION_KEYS = [
  'baseWidth',
  'baseHeight',
  'fontMultiplierPhone',
  'fontMultiplierTablet',
  'iconMultiplierPhone',
  'iconMultiplierTablet',
  'alignmentTabletBias',
] as const;

type NumericOptionKey = (typeof NUMERIC_OPTION_KEYS)[number];

const KNOWN_OPTION_KEYS: ReadonlySet<string> = new Set<string>([
  ...NUMERIC_OPTION_KEYS,
  'listenForMetrics',
]);

function validationError<TValue>(
  code: string,
  message: string,
  context: Readonly<Record<string, unknown>> = {},
): ScaleResult<TValue> {
  return {
    type: 'validationError',
    error: { code, message, context },
  };
}

/**
 * Checks untyped configuration, e.g. design tokens loaded from JSON. Only the
 * types are checked; value ranges stay the engine's business.
 */
export function parseScaleConfigInput(value: unknown): ScaleResult<ScaleConfigureOptions> {
  if (!isRecordLike(value) || Array.isArray(value)) {
    return validationError('config/not-an-object', 'Scale configuration must be an object.', {
      receivedType: value === null ? 'null' : Array.isArray(value) ? 'array' : typeof value,
    });
  }

  const unknownKeys = Object.keys(value).filter((key) => !KNOWN_OPTION_KEYS.has(key));
  if (unknownKeys.length > 0) {
    return validationError('config/unknown-key', `Unknown scale option: ${unknownKeys[0]}.`, {
      unknownKeys,
    });
  }

  const numericOptions: Partial<Record<NumericOptionKey, number>> = {};

  for (const key of NUMERIC_OPTION_KEYS) {
    const optionValue = value[key];

    if (optionValue === undefined) {
      continue;
    }

    if (typeof optionValue !== 'number' || Number.isNaN(optionValue)) {
      return validationError('config/invalid-number', `Scale option ${key} must be a number.`, {
        field: key,
        value: optionValue,
      });
    }

    numericOptions[key] = optionValue;
  }

  const listenForMetrics = value.listenForMetrics;
  if (listenForMetrics !== undefined && typeof listenForMetrics !== 'boolean') {
    return validationError(
      'config/invalid-boolean',
      'Scale option listenForMetrics must be a boolean.',
      {
        field: 'listenForMetrics',
        value: listenForMetrics,
      },
    );
  }

  return {
    type: 'ok',
    value: listenForMetrics === undefined ? numericOptions : { ...numericOptions, listenForMetrics },
  };
}

export function createResponsiveScaler(engine: ScaleEngine): ResponsiveScaler {
  return {
    moduleName: MODULE_IDS.responsiveScaler,
    responsive: (value) => engine.scale(value),
    responsiveFont: (value) => engine.scaleFont(value),
    responsiveIcon: (value) => engine.scaleIcon(value),
    vw: (pct) => engine.percentOfWidth(pct),
    vh: (pct) => engine.percentOfHeight(pct),
    offset: (point) => engine.scaleOffset(point.x, point.y),
    insets: (insets) => engine.scalePadding(insets),
    alignment: (point) => engine.scaleAlignment(point.x, point.y),
    safeContentInsets: (context, contentPadding) =>
      addEdgeInsets(engine.scalePadding(contentPadding), engine.viewPaddingOf(context)),
  };
}

export function createResponsiveLayer(options: ResponsiveLayerOptions = {}): ResponsiveLayer {
  const engine = createScaleEngine(options);
  const scaler = createResponsiveScaler(engine);

  return {
    engine,
    scaler,
    dispose: () => {
      engine.dispose();
    },
  };
}

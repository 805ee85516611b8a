import { describe, expect, it } from 'vitest';

import {
  createResponsiveLayer,
  createResponsiveScaler,
  parseScaleConfigInput,
} from '../src/application';
import { createScaleEngine } from '../src/domain/ScaleEngine';
import { edgeInsetsAll, edgeInsetsOnly } from '../src/shared/geometry';

describe('responsive scaler', () => {
  it('is the identity at the baseline', () => {
    const engine = createScaleEngine({ logger: () => undefined });
    const scaler = createResponsiveScaler(engine);
    engine.refresh({ width: 360, height: 640 });

    expect(scaler.responsive(10)).toBe(10);
    expect(scaler.responsiveFont(16)).toBe(16);
    expect(scaler.responsiveIcon(24)).toBe(24);
    expect(scaler.alignment({ x: 1, y: -1 })).toEqual({ x: 1, y: -1 });
    expect(scaler.insets({ left: 4, top: 8, right: 12, bottom: 16 })).toEqual({
      left: 4,
      top: 8,
      right: 12,
      bottom: 16,
    });
    expect(scaler.offset({ x: 10, y: 20 })).toEqual({ x: 10, y: 20 });
    expect(scaler.vw(0.5)).toBe(180);
    expect(scaler.vh(0.25)).toBe(160);
  });

  it('forwards every shortcut to the engine on tablets', () => {
    const engine = createScaleEngine({ logger: () => undefined });
    const scaler = createResponsiveScaler(engine);
    engine.refresh({ width: 800, height: 1280 });
    const factor = engine.getSnapshot().scaleFactor;

    expect(scaler.responsive(10)).toBeCloseTo(10 * factor, 10);
    expect(scaler.responsiveFont(20)).toBeCloseTo(20 * factor * 0.9, 10);
    expect(scaler.responsiveIcon(30)).toBeCloseTo(30 * factor * 1.1, 10);
    expect(scaler.vw(0.6)).toBeCloseTo(480, 10);
    expect(scaler.vh(0.1)).toBeCloseTo(128, 10);

    const alignment = scaler.alignment({ x: 1, y: -1 });
    expect(alignment.x).toBeCloseTo(0.85, 10);
    expect(alignment.y).toBeCloseTo(-0.85, 10);
  });

  it('adds the safe area to scaled content padding', () => {
    const engine = createScaleEngine({ logger: () => undefined });
    const scaler = createResponsiveScaler(engine);
    const context = {
      size: { width: 390, height: 844 },
      viewPadding: edgeInsetsOnly({ top: 24, bottom: 34 }),
      viewInsets: edgeInsetsAll(0),
    };
    engine.refresh(context);

    const contentInsets = scaler.safeContentInsets(context, edgeInsetsAll(16));

    expect(contentInsets.top).toBeCloseTo(scaler.responsive(16) + 24, 10);
    expect(contentInsets.bottom).toBeCloseTo(scaler.responsive(16) + 34, 10);
    expect(contentInsets.left).toBeCloseTo(scaler.responsive(16), 10);
  });

  it('composes an engine with its scaler and disposes both', () => {
    const layer = createResponsiveLayer({
      platform: { kind: 'android' },
      config: { baseWidth: 720, baseHeight: 1280 },
      logger: () => undefined,
    });

    expect(layer.engine.getConfig().baseWidth).toBe(720);
    expect(layer.engine.getPlatformFlags().isAndroid).toBe(true);
    expect(layer.scaler.responsive(10)).toBe(5);

    layer.dispose();
    expect(layer.engine.getLifecycleLog().at(-1)?.type).toBe('dispose');
  });
});

describe('scale config input parsing', () => {
  it('accepts a partial configuration', () => {
    expect(parseScaleConfigInput({ baseWidth: 375, listenForMetrics: true })).toEqual({
      type: 'ok',
      value: { baseWidth: 375, listenForMetrics: true },
    });
    expect(parseScaleConfigInput({})).toEqual({ type: 'ok', value: {} });
  });

  it('keeps out-of-range numbers for the engine to handle', () => {
    expect(parseScaleConfigInput({ alignmentTabletBias: 4, baseHeight: -1 })).toEqual({
      type: 'ok',
      value: { baseHeight: -1, alignmentTabletBias: 4 },
    });
  });

  it('rejects non-object input', () => {
    expect(parseScaleConfigInput(null)).toEqual({
      type: 'validationError',
      error: {
        code: 'config/not-an-object',
        message: 'Scale configuration must be an object.',
        context: { receivedType: 'null' },
      },
    });
  });

  it('rejects arrays', () => {
    expect(parseScaleConfigInput([])).toEqual({
      type: 'validationError',
      error: {
        code: 'config/not-an-object',
        message: 'Scale configuration must be an object.',
        context: { receivedType: 'array' },
      },
    });
  });

  it('rejects unknown keys', () => {
    const result = parseScaleConfigInput({ baseWidth: 360, baseDepth: 10 });

    expect(result.type).toBe('validationError');
    if (result.type === 'validationError') {
      expect(result.error.code).toBe('config/unknown-key');
      expect(result.error.message).toBe('Unknown scale option: baseDepth.');
    }
  });

  it('rejects wrongly typed values', () => {
    const numberResult = parseScaleConfigInput({ fontMultiplierTablet: '0.9' });
    expect(numberResult).toEqual({
      type: 'validationError',
      error: {
        code: 'config/invalid-number',
        message: 'Scale option fontMultiplierTablet must be a number.',
        context: { field: 'fontMultiplierTablet', value: '0.9' },
      },
    });

    const booleanResult = parseScaleConfigInput({ listenForMetrics: 'yes' });
    expect(booleanResult.type === 'validationError' && booleanResult.error.code).toBe(
      'config/invalid-boolean',
    );
  });
});

import { describe, expect, it } from 'vitest';

import {
  createStaticPlatformInfo,
  createUserAgentPlatformInfo,
  detectNativePlatformKind,
} from '../src/adapters/PlatformDetect';
import { createScaleEngine } from '../src/domain/ScaleEngine';

const ANDROID_UA = 'Mozilla/5.0 (Linux; Android 14; Pixel 8) AppleWebKit/537.36 Mobile Safari/537.36';
const IPHONE_UA = 'Mozilla/5.0 (iPhone; CPU iPhone OS 17_0 like Mac OS X) AppleWebKit/605.1.15';
const IPADOS_UA = 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 Safari/605.1.15';

describe('platform detect adapter', () => {
  it('reports web for any plain browser', () => {
    expect(createUserAgentPlatformInfo({ userAgent: ANDROID_UA }).kind).toBe('web');
    expect(createUserAgentPlatformInfo({ userAgent: IPHONE_UA, isNativeShell: false }).kind).toBe(
      'web',
    );
  });

  it('detects the native platform inside a native shell', () => {
    expect(createUserAgentPlatformInfo({ userAgent: ANDROID_UA, isNativeShell: true }).kind).toBe(
      'android',
    );
    expect(createUserAgentPlatformInfo({ userAgent: IPHONE_UA, isNativeShell: true }).kind).toBe(
      'ios',
    );
  });

  it('tells iPadOS from desktop Safari by touch points', () => {
    expect(detectNativePlatformKind(IPADOS_UA, 5)).toBe('ios');
    expect(detectNativePlatformKind(IPADOS_UA)).toBe('other');
  });

  it('feeds the engine platform flags', () => {
    const engine = createScaleEngine({
      platform: createStaticPlatformInfo('web'),
      logger: () => undefined,
    });

    expect(engine.getPlatformFlags()).toEqual({
      isWeb: true,
      isAndroid: false,
      isIos: false,
      isPad: false,
      isTV: false,
    });
  });
});

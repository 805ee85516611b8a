import type { PlatformInfoProvider, PlatformKind } from '../../application';

export interface UserAgentPlatformOptions {
  readonly userAgent: string;
  /**
   * True when the page runs inside a native shell (Capacitor, Cordova and the
   * like). A plain browser always reports `'web'`, whatever the device.
   */
  readonly isNativeShell?: boolean;
  /** iPadOS sends a desktop Safari user agent; touch points tell it apart. */
  readonly maxTouchPoints?: number;
}

const ANDROID_PATTERN = /android/i;
const IOS_PATTERN = /iphone|ipad|ipod/i;
const MAC_PATTERN = /macintosh/i;

export function createStaticPlatformInfo(kind: PlatformKind): PlatformInfoProvider {
  return { kind };
}

export function detectNativePlatformKind(userAgent: string, maxTouchPoints = 0): PlatformKind {
  if (ANDROID_PATTERN.test(userAgent)) {
    return 'android';
  }

  if (IOS_PATTERN.test(userAgent)) {
    return 'ios';
  }

  if (MAC_PATTERN.test(userAgent) && maxTouchPoints > 1) {
    return 'ios';
  }

  return 'other';
}

export function createUserAgentPlatformInfo(options: UserAgentPlatformOptions): PlatformInfoProvider {
  if (!options.isNativeShell) {
    return createStaticPlatformInfo('web');
  }

  return createStaticPlatformInfo(
    detectNativePlatformKind(options.userAgent, options.maxTouchPoints),
  );
}

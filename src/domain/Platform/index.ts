export type PlatformKind = 'web' | 'android' | 'ios' | 'other';

export interface PlatformInfoProvider {
  readonly kind: PlatformKind;
}

export interface PlatformFlags {
  readonly isWeb: boolean;
  readonly isAndroid: boolean;
  readonly isIos: boolean;
  readonly isPad: boolean;
  /** No runtime exposes a TV signal, so this is always false. */
  readonly isTV: boolean;
}

export const PLATFORM_KINDS: readonly PlatformKind[] = ['web', 'android', 'ios', 'other'];

export function isPlatformKind(value: unknown): value is PlatformKind {
  return typeof value === 'string' && PLATFORM_KINDS.some((kind) => kind === value);
}

export function resolvePlatformFlags(kind: PlatformKind, isTablet: boolean): PlatformFlags {
  const isIos = kind === 'ios';

  return {
    isWeb: kind === 'web',
    isAndroid: kind === 'android',
    isIos,
    isPad: isIos && isTablet,
    isTV: false,
  };
}

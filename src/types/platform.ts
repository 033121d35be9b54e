export type PlatformId = 'twitter' | 'linkedin' | 'facebook' | 'instagram';

export interface PlatformSpec {
  readonly identifier: PlatformId;
  readonly characterLimit: number;
  readonly displayName: string;
}

/**
 * Anything that claims to describe a platform. Values coming from the CLI
 * or a config file are checked against PLATFORM_SPECS before use.
 */
export interface PlatformRef {
  readonly identifier: string;
  readonly characterLimit: number;
}

export const PLATFORM_IDS: readonly PlatformId[] = Object.freeze([
  'twitter',
  'linkedin',
  'facebook',
  'instagram',
]);

export const PLATFORM_SPECS: Readonly<Record<PlatformId, PlatformSpec>> = Object.freeze({
  twitter: Object.freeze({ identifier: 'twitter', characterLimit: 280, displayName: 'Twitter (X)' }),
  linkedin: Object.freeze({ identifier: 'linkedin', characterLimit: 3000, displayName: 'LinkedIn' }),
  facebook: Object.freeze({ identifier: 'facebook', characterLimit: 63206, displayName: 'Facebook' }),
  instagram: Object.freeze({ identifier: 'instagram', characterLimit: 2200, displayName: 'Instagram' }),
});

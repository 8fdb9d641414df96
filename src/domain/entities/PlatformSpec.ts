/**
 * Per-platform constraints used to shape generated copy.
 */
export interface PlatformSpec {
    /** Maximum post length in characters */
    readonly maxLength: number;
    readonly style: string;
    readonly format: string;
}

export type PlatformName = 'facebook' | 'instagram' | 'twitter' | 'linkedin' | 'tiktok';

export const DEFAULT_PLATFORM: PlatformName = 'facebook';

const PLATFORM_SPECS: Readonly<Record<PlatformName, PlatformSpec>> = Object.freeze({
    facebook: Object.freeze({
        maxLength: 2000,
        style: 'friendly and engaging, use emojis',
        format: 'short paragraphs with strong call-to-action',
    }),
    instagram: Object.freeze({
        maxLength: 2200,
        style: 'visual and inspiring, use emojis and hashtags',
        format: 'short paragraphs + 10-15 relevant hashtags',
    }),
    twitter: Object.freeze({
        maxLength: 280,
        style: 'concise and impactful',
        format: 'brief message with 2-3 hashtags',
    }),
    linkedin: Object.freeze({
        maxLength: 3000,
        style: 'professional and educational',
        format: 'long-form post with clear benefit points',
    }),
    tiktok: Object.freeze({
        maxLength: 2200,
        style: 'energetic and trendy',
        format: 'video script with strong hook and call-to-action',
    }),
});

export const ALL_PLATFORMS: readonly PlatformName[] = Object.freeze([
    'facebook',
    'instagram',
    'twitter',
    'linkedin',
    'tiktok',
]);

export function normalizePlatformName(name: string): string {
    return name.trim().toLowerCase();
}

export function isKnownPlatform(name: string): name is PlatformName {
    return (ALL_PLATFORMS as readonly string[]).includes(name);
}

/**
 * Looks up the spec for a platform, case-insensitively.
 * Unknown platforms get the facebook spec rather than an error.
 */
export function specFor(platformName: string): PlatformSpec {
    const key = normalizePlatformName(platformName);
    return isKnownPlatform(key) ? PLATFORM_SPECS[key] : PLATFORM_SPECS[DEFAULT_PLATFORM];
}

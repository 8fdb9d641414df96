import {
    ALL_PLATFORMS,
    isKnownPlatform,
    specFor,
} from '../../../src/domain/entities/PlatformSpec';

describe('PlatformSpec table', () => {
    it('should return a spec for every known platform', () => {
        for (const platform of ALL_PLATFORMS) {
            const spec = specFor(platform);
            expect(spec.maxLength).toBeGreaterThan(0);
            expect(spec.style).not.toBe('');
            expect(spec.format).not.toBe('');
        }
    });

    it('should keep twitter within 280 characters', () => {
        expect(specFor('twitter')).toEqual({
            maxLength: 280,
            style: 'concise and impactful',
            format: 'brief message with 2-3 hashtags',
        });
    });

    it('should look up platforms case-insensitively', () => {
        expect(specFor('LinkedIn')).toBe(specFor('linkedin'));
        expect(specFor('  TIKTOK ')).toBe(specFor('tiktok'));
    });

    it('should fall back to the facebook spec for unknown platforms', () => {
        expect(specFor('myspace')).toBe(specFor('facebook'));
        expect(specFor('')).toBe(specFor('facebook'));
    });

    it('should not allow the table to be modified at runtime', () => {
        const spec = specFor('instagram');
        expect(Object.isFrozen(spec)).toBe(true);
        expect(Object.isFrozen(ALL_PLATFORMS)).toBe(true);
    });

    it('should recognise only the five supported platforms', () => {
        expect(ALL_PLATFORMS).toEqual(['facebook', 'instagram', 'twitter', 'linkedin', 'tiktok']);
        expect(isKnownPlatform('instagram')).toBe(true);
        expect(isKnownPlatform('Instagram')).toBe(false);
        expect(isKnownPlatform('pinterest')).toBe(false);
    });
});

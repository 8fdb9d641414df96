export type LanguageCode = 'en' | 'ar' | 'es' | 'pt' | 'fr';

export const DEFAULT_LANGUAGE: LanguageCode = 'en';

const LANGUAGE_INSTRUCTIONS: Readonly<Record<LanguageCode, string>> = Object.freeze({
    en: 'Write in English',
    ar: 'Write in Arabic (Modern Standard Arabic or Moroccan Darija if appropriate)',
    es: 'Write in Spanish',
    pt: 'Write in Portuguese',
    fr: 'Write in French',
});

export const SUPPORTED_LANGUAGES: readonly LanguageCode[] = Object.freeze(['en', 'ar', 'es', 'pt', 'fr']);

export function isSupportedLanguage(code: string): code is LanguageCode {
    return (SUPPORTED_LANGUAGES as readonly string[]).includes(code);
}

/**
 * Returns the writing-language directive for a code; unknown codes get English.
 */
export function languageInstructionFor(code: string): string {
    return isSupportedLanguage(code) ? LANGUAGE_INSTRUCTIONS[code] : LANGUAGE_INSTRUCTIONS[DEFAULT_LANGUAGE];
}

import extensionLanguages from '../data/languages.json';
import { increment, mostCommon } from '../utils/counter';

const EXTENSION_LANGUAGES: ReadonlyMap<string, string> = new Map(Object.entries(extensionLanguages));

export const MAX_LANGUAGES = 10;

export function languageForExtension(extension: string): string | undefined {
    return EXTENSION_LANGUAGES.get(extension.toLowerCase());
}

/**
 * Turn an extension histogram into language percentages over classified files only.
 * Keeps the ten most common languages; no classified file yields an empty map.
 */
export function classifyLanguages(extensionCounts: ReadonlyMap<string, number>): Record<string, number> {
    const languageCounts = new Map<string, number>();
    for (const [extension, count] of extensionCounts) {
        const language = languageForExtension(extension);
        if (language) increment(languageCounts, language, count);
    }

    let total = 0;
    for (const count of languageCounts.values()) total += count;
    if (total === 0) return {};

    const languages: Record<string, number> = {};
    for (const [language, count] of mostCommon(languageCounts, MAX_LANGUAGES)) {
        languages[language] = Math.round((count / total) * 1000) / 10;
    }
    return languages;
}

/**
 * Keyword matching for diagnosis text.
 * Keywords of four or more letters match as a word prefix ("neurolog" matches
 * "neurological"); shorter ones ("mi", "gi", "acs") must equal a whole word.
 */

const STEM_MIN_LENGTH = 4;

export const words = (text: string): string[] => text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);

export function matchesKeyword(text: string, keyword: string): boolean {
    const key = keyword.toLowerCase();
    return words(text).some(word => (key.length >= STEM_MIN_LENGTH ? word.startsWith(key) : word === key));
}

export const matchesAny = (text: string, keywords: readonly string[]): boolean =>
    keywords.some(keyword => matchesKeyword(text, keyword));

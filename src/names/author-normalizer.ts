import type { NormalizedAuthors } from '../types/index.js';

/**
 * Name parts that trail the surname and are never abbreviated.
 */
export const NAME_SUFFIXES: ReadonlySet<string> = new Set([
    'I', 'II', 'III', 'IV', 'V', 'VI', 'VII', 'VIII', 'Jr.', 'Sr.',
]);

/** Kept as-is when they open a name */
export const NAME_PREFIXES: ReadonlySet<string> = new Set(['Dr.']);

/** Kept as-is anywhere after the first word */
export const NAME_PREPOSITIONS: ReadonlySet<string> = new Set(['van', 'von', 'der', 'de', 'den']);

const FOLDINGS: ReadonlyArray<[string, string]> = [
    ['ä', 'ae'],
    ['ö', 'oe'],
    ['ü', 'ue'],
    ['ß', 'ss'],
];

/**
 * Lowercase a name and fold the German diacritics to ASCII.
 * "Hans Müller" → "hans mueller"
 */
export function simplifyName(name: string): string {
    let simple = name.toLowerCase();
    for (const [from, to] of FOLDINGS) {
        simple = simple.replaceAll(from, to);
    }
    return simple;
}

/**
 * Surname of an already-normalized display name: its last whitespace-separated word.
 */
export function surnameOf(displayName: string): string {
    const words = displayName.trim().split(/\s+/);
    return words[words.length - 1] ?? '';
}

/**
 * Replace ";" and the word "and" with commas, one pass per pattern.
 * Shared by author and keyword fields.
 */
export function normalizeSeparators(value: string): string {
    return value
        .replaceAll(';', ',')
        .replaceAll(', and ', ', ')
        .replaceAll(',and ', ', ')
        .replaceAll(' and ', ', ');
}

function isEscaped(value: string): boolean {
    return value.length >= 2 && value.startsWith('{') && value.endsWith('}');
}

function isInitials(word: string): boolean {
    return word.length <= 3 && !NAME_SUFFIXES.has(word) && /^[A-Z]*$/.test(word);
}

/**
 * Abbreviate a given name: "Carl" → "C.", "Jean-Paul" → "J.-P.".
 */
function abbreviate(word: string): string {
    const dash = word.indexOf('-');
    if (dash >= 0 && dash + 1 < word.length) {
        return `${word[0]}.-${word[dash + 1]}.`;
    }
    return `${word[0]}.`;
}

function shouldAbbreviate(word: string): boolean {
    return word.length > 2 || (word.length >= 1 && !word.endsWith('.'));
}

/**
 * Turn one author token into its list of words in display order.
 */
function parseAuthorWords(token: string): string[] {
    let words = token.split(' ');

    // "Gauss CF" → "C. F. Gauss"
    const last = words[words.length - 1] ?? '';
    if (isInitials(last)) {
        words = [...Array.from(last, (c) => `${c}.`), ...words.slice(0, -1)];
    }

    let suffixCount = 0;
    for (let i = words.length - 1; i >= 0; i--) {
        const word = words[i];
        if (word === undefined || !NAME_SUFFIXES.has(word)) break;
        suffixCount++;
    }

    const givenCount = Math.max(0, words.length - 1 - suffixCount);
    return words.map((word, j) => {
        if (j >= givenCount) return word;
        if (j === 0 && NAME_PREFIXES.has(word)) return word;
        if (j > 0 && NAME_PREPOSITIONS.has(word)) return word;
        return shouldAbbreviate(word) ? abbreviate(word) : word;
    });
}

/**
 * Simplified forms for one author. A hyphenated first word gives one entry
 * per segment: "J.-P. Sartre" → ["j. sartre", "p. sartre"].
 */
function simplifiedVariants(words: string[]): string[] {
    const first = words[0] ?? '';
    if (words.length <= 1) {
        return [simplifyName(first)];
    }
    const surname = words[words.length - 1] ?? '';
    return first.split('-').map((segment) => simplifyName(`${segment} ${surname}`));
}

/**
 * Join display names for the rewritten authors field.
 * ≥3: "A, B, and C"; 2: "A and B"; 1: "A".
 */
export function joinDisplayNames(names: string[]): string {
    if (names.length > 2) {
        return `${names.slice(0, -1).join(', ')}, and ${names[names.length - 1]}`;
    }
    return names.join(' and ');
}

/**
 * Parse a freeform authors field into its normalized views.
 *
 * Never throws. Blank tokens are dropped and the remaining authors
 * re-indexed; input with no author at all yields the single blank
 * entry `[""]`, which record validation rejects.
 */
export function normalizeAuthors(rawAuthors: string): NormalizedAuthors {
    const trimmed = rawAuthors.trim();

    if (isEscaped(trimmed)) {
        return {
            escaped: true,
            displayAuthorsList: [trimmed.slice(1, -1)],
            simplifiedAuthorsList: [],
            bibtexString: null,
            displayString: rawAuthors,
        };
    }

    const tokens = normalizeSeparators(rawAuthors)
        .split(',')
        .map((token) => token.trim())
        .filter((token) => token.length > 0);

    if (tokens.length === 0) {
        return {
            escaped: false,
            displayAuthorsList: [''],
            simplifiedAuthorsList: [],
            bibtexString: '',
            displayString: '',
        };
    }

    const displayAuthorsList: string[] = [];
    const simplifiedAuthorsList: string[] = [];

    for (const token of tokens) {
        const words = parseAuthorWords(token);
        displayAuthorsList.push(words.join(' '));
        simplifiedAuthorsList.push(...simplifiedVariants(words));
    }

    return {
        escaped: false,
        displayAuthorsList,
        simplifiedAuthorsList,
        bibtexString: displayAuthorsList.join(' and '),
        displayString: joinDisplayNames(displayAuthorsList),
    };
}

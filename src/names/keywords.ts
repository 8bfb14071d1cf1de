import { normalizeSeparators } from './author-normalizer.js';

/**
 * Normalize a keywords field: same separators as authors, each keyword
 * trimmed and lowercased, re-joined with ", ".
 * "Vision; Deep Learning and GANs" → "vision, deep learning, gans"
 */
export function normalizeKeywords(keywords: string): string {
    return normalizeSeparators(keywords)
        .split(',')
        .map((keyword) => keyword.trim().toLowerCase())
        .join(', ');
}

/**
 * Split a normalized keywords field into its keywords.
 */
export function splitKeywords(keywords: string): string[] {
    return keywords.split(',').map((keyword) => keyword.trim());
}

/**
 * Whether the title already ends with a sentence mark, so templates
 * don't append another one.
 */
export function titleEndsWithPunctuation(title: string): boolean {
    return /[.!?]$/.test(title);
}

/**
 * Form-style URL encoding: like encodeURIComponent, but spaces become "+"
 * and only letters, digits and "_.-~" stay unescaped.
 */
export function quotePlus(value: string): string {
    return encodeURIComponent(value)
        .replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`)
        .replace(/%20/g, '+');
}

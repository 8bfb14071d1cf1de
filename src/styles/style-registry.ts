import type { PublicationRecord } from '../records/publication-record.js';
import { titleEndsWithPunctuation } from '../names/keywords.js';
import { formatBibtexEntry } from './bibtex.js';

export type StyleFormatter = (record: PublicationRecord) => string;

/**
 * Requested style has not been registered.
 */
export class UnknownStyleError extends Error {
    constructor(public readonly style: string) {
        super(`Unknown citation style: ${style}`);
        this.name = 'UnknownStyleError';
    }
}

/**
 * Named citation styles. Names are matched case-insensitively and looked
 * up at format time, so styles registered after a record was built apply
 * to it as well.
 */
export class StyleRegistry {
    private styles = new Map<string, StyleFormatter>();

    register(name: string, formatter: StyleFormatter): this {
        this.styles.set(name.toLowerCase(), formatter);
        return this;
    }

    has(name: string): boolean {
        return this.styles.has(name.toLowerCase());
    }

    names(): string[] {
        return [...this.styles.keys()].sort();
    }

    format(name: string, record: PublicationRecord): string {
        const formatter = this.styles.get(name.toLowerCase());
        if (!formatter) {
            throw new UnknownStyleError(name);
        }
        return formatter(record);
    }
}

function sentence(text: string): string {
    return titleEndsWithPunctuation(text) ? text : `${text}.`;
}

/**
 * Harvard: "A. Smith and B. Jones (2020) Title. Journal, 12(3), pp. 1-10."
 */
export function formatHarvard(record: PublicationRecord): string {
    const parts = [`${record.authors} (${record.year ?? 'n.d.'}) ${sentence(record.title)}`];

    const venue = record.journalOrBookTitle();
    if (venue) {
        let source = venue;
        if (record.volume !== null) {
            source += `, ${record.volume}`;
            if (record.number !== null) source += `(${record.number})`;
        }
        if (record.pages) source += `, pp. ${record.pages}`;
        parts.push(sentence(source));
    }

    return parts.join(' ');
}

/**
 * Plain: "A. Smith and B. Jones. Title. Journal, 2020."
 */
export function formatPlain(record: PublicationRecord): string {
    const tail = [record.journalOrBookTitle(), record.year === null ? '' : String(record.year)]
        .filter((part) => part.length > 0)
        .join(', ');

    const parts = [sentence(record.authors), sentence(record.title)];
    if (tail) parts.push(sentence(tail));
    return parts.join(' ');
}

/**
 * Registry with the bundled styles: bibtex, harvard, plain.
 */
export function createDefaultRegistry(): StyleRegistry {
    return new StyleRegistry()
        .register('bibtex', formatBibtexEntry)
        .register('harvard', formatHarvard)
        .register('plain', formatPlain);
}

import type { PublicationRecord } from '../records/publication-record.js';

/**
 * BibTeX author value. An escaped literal keeps its braces so BibTeX
 * treats it as a single corporate name.
 */
export function bibtexAuthors(record: PublicationRecord): string {
    return record.authorsBibtex ?? `{${record.authorsList[0] ?? ''}}`;
}

/**
 * Format a record as one BibTeX entry. Empty fields are left out.
 */
export function formatBibtexEntry(record: PublicationRecord): string {
    const fields: Array<[string, string]> = [
        ['author', bibtexAuthors(record)],
        ['title', record.title],
        ['journal', record.journal],
        ['booktitle', record.bookTitle],
        ['publisher', record.publisher],
        ['institution', record.institution],
        ['year', record.year === null ? '' : String(record.year)],
        ['month', record.monthBibtex()],
        ['volume', record.volume === null ? '' : String(record.volume)],
        ['number', record.number === null ? '' : String(record.number)],
        ['edition', record.edition],
        ['address', record.location],
        ['series', record.series],
        ['pages', record.pages],
        ['note', record.note],
        ['keywords', record.keywords],
        ['url', record.url],
        ['urldate', record.urldate ?? ''],
        ['doi', record.doi],
        ['isbn', record.isbn],
        ['issn', record.issn],
    ];

    const body = fields
        .filter(([, value]) => value.length > 0)
        .map(([name, value]) => `  ${name} = {${value}}`)
        .join(',\n');

    return `@${record.type}{${record.citekey ?? ''},\n${body}\n}`;
}

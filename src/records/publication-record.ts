import type { Publication, PublicationInput, NormalizedAuthors } from '../types/index.js';
import { normalizeAuthors, surnameOf } from '../names/author-normalizer.js';
import { normalizeKeywords, splitKeywords, titleEndsWithPunctuation, quotePlus } from '../names/keywords.js';
import { InvalidRecordStateError } from '../citekey/citekey-generator.js';
import { createDefaultRegistry, type StyleRegistry } from '../styles/style-registry.js';

const MONTH_NAMES = [
    'January', 'February', 'March', 'April', 'May', 'June',
    'July', 'August', 'September', 'October', 'November', 'December',
] as const;

let defaultRegistry: StyleRegistry | null = null;

function getDefaultRegistry(): StyleRegistry {
    if (!defaultRegistry) {
        defaultRegistry = createDefaultRegistry();
    }
    return defaultRegistry;
}

/**
 * A bibliographic record with its derived author views.
 *
 * Author and keyword normalization run on every construction, so a record
 * loaded from the store carries the same views as a freshly entered one.
 * Only the rewritten `authors` string and `citekey` are ever persisted.
 */
export class PublicationRecord {
    readonly id: number | null;
    readonly type: string;
    readonly citekey: string | null;
    readonly title: string;
    readonly year: number | null;
    readonly month: number | null;
    readonly journal: string;
    readonly bookTitle: string;
    readonly publisher: string;
    readonly institution: string;
    readonly volume: number | null;
    readonly number: number | null;
    readonly edition: string;
    readonly location: string;
    readonly series: string;
    readonly pages: string;
    readonly note: string;
    readonly url: string;
    readonly urldate: string | null;
    readonly code: string;
    readonly doi: string;
    readonly external: boolean;
    readonly abstract: string;
    readonly isbn: string;
    readonly issn: string;
    readonly createdAt: string | null;

    /** Normalized keywords, e.g. "vision, deep learning" */
    readonly keywords: string;

    /** Rewritten authors field */
    readonly authors: string;
    readonly authorsList: string[];
    readonly authorsListSimple: string[];

    /** null when the authors field was escaped with {} */
    readonly authorsBibtex: string | null;
    readonly authorsEscapedLiteral: boolean;

    readonly titleEndsWithPunct: boolean;

    private readonly styles: StyleRegistry;
    private readonly rawAuthors: string;
    private readonly rawKeywords: string;

    constructor(input: PublicationInput, styles?: StyleRegistry) {
        this.id = input.id ?? null;
        this.type = input.type ?? 'article';
        this.citekey = input.citekey || null;
        this.title = input.title;
        this.year = input.year ?? null;
        this.month = input.month ?? null;
        this.journal = input.journal ?? '';
        this.bookTitle = input.book_title ?? '';
        this.publisher = input.publisher ?? '';
        this.institution = input.institution ?? '';
        this.volume = input.volume ?? null;
        this.number = input.number ?? null;
        this.edition = input.edition ?? '';
        this.location = input.location ?? '';
        this.series = input.series ?? '';
        this.pages = input.pages ?? '';
        this.note = input.note ?? '';
        this.url = input.url ?? '';
        this.urldate = input.urldate ?? null;
        this.code = input.code ?? '';
        this.doi = input.doi ?? '';
        this.external = input.external ?? false;
        this.abstract = input.abstract ?? '';
        this.isbn = input.isbn ?? '';
        this.issn = input.issn ?? '';
        this.createdAt = input.created_at ?? null;
        this.styles = styles ?? getDefaultRegistry();
        this.rawAuthors = input.authors;
        this.rawKeywords = input.keywords ?? '';

        this.keywords = normalizeKeywords(input.keywords ?? '');
        this.titleEndsWithPunct = titleEndsWithPunctuation(this.title);

        const normalized: NormalizedAuthors = normalizeAuthors(input.authors);
        this.authors = normalized.displayString;
        this.authorsList = normalized.displayAuthorsList;
        this.authorsListSimple = normalized.simplifiedAuthorsList;
        this.authorsBibtex = normalized.bibtexString;
        this.authorsEscapedLiteral = normalized.escaped;
    }

    /**
     * Whether at least one non-blank author was parsed.
     */
    hasAuthors(): boolean {
        return this.authorsList.some((author) => author.trim().length > 0);
    }

    firstAuthor(): string {
        return this.authorsList[0] ?? '';
    }

    /**
     * Last word of the first author's display name; the citation key stem.
     */
    firstAuthorSurname(): string {
        return surnameOf(this.firstAuthor());
    }

    journalOrBookTitle(): string {
        return this.journal || this.bookTitle;
    }

    /** "Jan".."Dec", or "" without a month */
    monthBibtex(): string {
        return this.monthLong().slice(0, 3);
    }

    monthLong(): string {
        if (this.month === null) return '';
        return MONTH_NAMES[this.month - 1] ?? '';
    }

    /**
     * Title cut to fit a list row: at a word boundary between characters
     * 40 and 62 where possible, hard-cut at 61 otherwise.
     */
    shortTitle(): string {
        if (this.title.length < 64) {
            return this.title;
        }

        const index = this.title.lastIndexOf(' ', 61);
        if (index < 40) {
            return `${this.title.slice(0, 61)}...`;
        }
        return `${this.title.slice(0, index)}...`;
    }

    /**
     * Keyword and URL-safe keyword pairs for tag links.
     */
    keywordsEscaped(): Array<[string, string]> {
        return splitKeywords(this.keywords)
            .filter((keyword) => keyword.length > 0)
            .map((keyword) => [keyword, quotePlus(keyword)]);
    }

    /**
     * Author and lowercase "+"-joined author pairs for author links.
     */
    authorsEscaped(): Array<[string, string]> {
        return this.authorsList.map((author) => [author, author.toLowerCase().replaceAll(' ', '+')]);
    }

    /**
     * Z39.88-2004 ContextObject (COinS) for reference managers.
     */
    toOpenUrl(siteDomain: string): string {
        const context = ['ctx_ver=Z39.88-2004'];

        const domainParts = siteDomain.split('.');
        let referrer = '';
        if (domainParts.length > 2) {
            referrer = domainParts[domainParts.length - 2] ?? '';
        } else if (domainParts.length > 1) {
            referrer = domainParts[0] ?? '';
        }

        if (this.bookTitle && !this.journal) {
            context.push('rft_val_fmt=info:ofi/fmt:kev:mtx:book');
            context.push(`rfr_id=info:sid/${siteDomain}:${referrer}`);
            context.push(`rft_id=${quotePlus(this.doi)}`);
            context.push(`rft.btitle=${quotePlus(this.title)}`);
            if (this.publisher) context.push(`rft.pub=${quotePlus(this.publisher)}`);
        } else {
            context.push('rft_val_fmt=info:ofi/fmt:kev:mtx:journal');
            context.push(`rfr_id=info:sid/${siteDomain}:${referrer}`);
            context.push(`rft_id=${quotePlus(this.doi)}`);
            context.push(`rft.atitle=${quotePlus(this.title)}`);
            if (this.journal) context.push(`rft.jtitle=${quotePlus(this.journal)}`);
            if (this.volume) context.push(`rft.volume=${this.volume}`);
            if (this.pages) context.push(`rft.pages=${quotePlus(this.pages)}`);
            if (this.number) context.push(`rft.issue=${this.number}`);
        }

        if (this.month) {
            context.push(`rft.date=${this.year ?? ''}-${this.month}-1`);
        } else {
            context.push(`rft.date=${this.year ?? ''}`);
        }

        for (const author of this.authorsList) {
            context.push(`rft.au=${quotePlus(author)}`);
        }

        if (this.isbn) context.push(`rft.isbn=${quotePlus(this.isbn)}`);
        if (this.issn) context.push(`rft.issn=${quotePlus(this.issn)}`);

        return context.join('&');
    }

    /**
     * Format this record in a registered style, looked up at call time.
     */
    format(styleName: string): string {
        return this.styles.format(styleName, this);
    }

    /**
     * Copy with surrounding whitespace removed from the free-text fields.
     * Authors and keywords are normalized from the same input as this record.
     */
    clean(): PublicationRecord {
        return new PublicationRecord({
            ...this.toRow(),
            authors: this.rawAuthors,
            keywords: this.rawKeywords,
            title: this.title.trim(),
            journal: this.journal.trim(),
            book_title: this.bookTitle.trim(),
            publisher: this.publisher.trim(),
            institution: this.institution.trim(),
        }, this.styles);
    }

    /**
     * @throws InvalidRecordStateError for a record that cannot be stored
     */
    validate(): void {
        if (!this.hasAuthors()) {
            throw new InvalidRecordStateError('Publication needs at least one author', 'authors');
        }
        if (!this.title.trim()) {
            throw new InvalidRecordStateError('Publication needs a title', 'title');
        }
        if (this.month !== null && (!Number.isInteger(this.month) || this.month < 1 || this.month > 12)) {
            throw new InvalidRecordStateError(`Month must be 1-12, got ${this.month}`, 'month');
        }
        if (this.year !== null && (!Number.isInteger(this.year) || this.year < 0)) {
            throw new InvalidRecordStateError(`Year must be a positive integer, got ${this.year}`, 'year');
        }
    }

    /**
     * Persisted shape of this record.
     */
    toRow(): Publication {
        const row: Publication = {
            type: this.type,
            citekey: this.citekey,
            title: this.title,
            authors: this.authors,
            year: this.year,
            month: this.month,
            journal: this.journal,
            book_title: this.bookTitle,
            publisher: this.publisher,
            institution: this.institution,
            volume: this.volume,
            number: this.number,
            edition: this.edition,
            location: this.location,
            series: this.series,
            pages: this.pages,
            note: this.note,
            keywords: this.keywords,
            url: this.url,
            urldate: this.urldate,
            code: this.code,
            doi: this.doi,
            external: this.external,
            abstract: this.abstract,
            isbn: this.isbn,
            issn: this.issn,
        };
        if (this.id !== null) row.id = this.id;
        if (this.createdAt !== null) row.created_at = this.createdAt;
        return row;
    }
}

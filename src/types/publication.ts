/**
 * The persisted shape of a bibliographic record.
 * Derived author views are not stored; they are recomputed from `authors`
 * every time a record is constructed.
 */
export interface Publication {
    /** Store identity (SQLite rowid), absent until first insert */
    id?: number;

    /** BibTeX entry type, e.g. "article", "inproceedings" */
    type: string;

    /** Citation key. Left null to have one generated on insert. */
    citekey: string | null;

    title: string;

    /** Authors separated by commas, semicolons or "and". Wrap in {} to keep as-is. */
    authors: string;

    year: number | null;

    /** Month number, 1-12 */
    month: number | null;

    journal: string;
    book_title: string;
    publisher: string;
    institution: string;
    volume: number | null;

    /** Issue number */
    number: number | null;

    edition: string;
    location: string;
    series: string;
    pages: string;
    note: string;

    /** Keywords separated by commas */
    keywords: string;

    url: string;

    /** ISO date (YYYY-MM-DD) the URL was visited */
    urldate: string | null;

    /** Link to a page with code */
    code: string;

    doi: string;

    /** Written outside the owning group */
    external: boolean;

    abstract: string;
    isbn: string;
    issn: string;

    created_at?: string;
}

/**
 * Raw input for a new record. Only title and authors are required;
 * everything else falls back to an empty value.
 */
export type PublicationInput = Pick<Publication, 'title' | 'authors'> &
    Partial<Omit<Publication, 'title' | 'authors'>>;

/**
 * Output of author normalization.
 */
export interface NormalizedAuthors {
    /** True when the raw field was wrapped in {} and left unparsed */
    escaped: boolean;

    /** One abbreviated name per author, in input order */
    displayAuthorsList: string[];

    /** Lowercase folded names; hyphenated given names yield one entry per segment */
    simplifiedAuthorsList: string[];

    /** Names joined with " and "; null for escaped input */
    bibtexString: string | null;

    /** Rewritten authors field, e.g. "A. Smith, B. Jones, and C. Lee" */
    displayString: string;
}

/**
 * A sibling record as seen by the citation key scan.
 */
export interface KeySibling {
    id: number;
    surname: string;
}

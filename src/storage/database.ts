import Database from 'better-sqlite3';
import type { Publication, PublicationInput, KeySibling } from '../types/index.js';
import { PublicationRecord } from '../records/publication-record.js';
import { generateCiteKey, nextCiteKey } from '../citekey/citekey-generator.js';
import type { StyleRegistry } from '../styles/style-registry.js';
import { getLogger } from '../utils/logger.js';

/**
 * Resolved per call so a logger configured after import is picked up.
 */
function logger() {
    return getLogger('storage');
}

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
CREATE TABLE IF NOT EXISTS publications (
  id INTEGER PRIMARY KEY,
  type TEXT NOT NULL DEFAULT 'article',
  citekey TEXT UNIQUE,
  title TEXT NOT NULL,
  authors TEXT NOT NULL,
  year INTEGER,
  month INTEGER,
  journal TEXT NOT NULL DEFAULT '',
  book_title TEXT NOT NULL DEFAULT '',
  publisher TEXT NOT NULL DEFAULT '',
  institution TEXT NOT NULL DEFAULT '',
  volume INTEGER,
  number INTEGER,
  edition TEXT NOT NULL DEFAULT '',
  location TEXT NOT NULL DEFAULT '',
  series TEXT NOT NULL DEFAULT '',
  pages TEXT NOT NULL DEFAULT '',
  note TEXT NOT NULL DEFAULT '',
  keywords TEXT NOT NULL DEFAULT '',
  url TEXT NOT NULL DEFAULT '',
  urldate TEXT,
  code TEXT NOT NULL DEFAULT '',
  doi TEXT NOT NULL DEFAULT '',
  external INTEGER NOT NULL DEFAULT 0,
  abstract TEXT NOT NULL DEFAULT '',
  isbn TEXT NOT NULL DEFAULT '',
  issn TEXT NOT NULL DEFAULT '',
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE INDEX IF NOT EXISTS idx_publications_year ON publications(year);
CREATE INDEX IF NOT EXISTS idx_publications_year_month ON publications(year, month);
`;

/**
 * Row as stored: booleans are integers.
 */
type PublicationRow = Omit<Publication, 'external'> & { id: number; external: number };

function fromRow(row: PublicationRow): Publication {
    return { ...row, external: row.external !== 0 };
}

function toParams(publication: Publication): Omit<PublicationRow, 'id' | 'created_at'> {
    const { id: _id, created_at: _createdAt, ...fields } = publication;
    return { ...fields, external: publication.external ? 1 : 0 };
}

/**
 * Escape LIKE wildcards so a surname is matched literally.
 */
function likeContains(value: string): string {
    return `%${value.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

/**
 * A citation key could not be made unique.
 */
export class DuplicateCiteKeyError extends Error {
    readonly code = 'DUPLICATE_CITEKEY';

    constructor(public readonly citekey: string) {
        super(`Citation key already in use: ${citekey}`);
        this.name = 'DuplicateCiteKeyError';
    }
}

function isUniqueViolation(error: unknown): boolean {
    return error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

/** Publications per year, newest first; a missing year is "n.d." */
export interface YearCount {
    year: string;
    count: number;
}

/**
 * Publication library wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, citation key assignment, and CRUD.
 */
export class PublicationDatabase {
    private db: Database.Database;
    private readonly keyRetries: number;
    private readonly styles: StyleRegistry | undefined;

    constructor(dbPath: string, options: { keyRetries?: number; styles?: StyleRegistry; timeout?: number } = {}) {
        this.db = new Database(dbPath, { timeout: options.timeout ?? 5000 });
        this.keyRetries = options.keyRetries ?? 3;
        this.styles = options.styles;

        this.db.pragma('journal_mode = WAL');

        this.migrate();

        logger().debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true }) as number;

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            logger().info('Database migrated to v1');
        }
    }

    private toRecord(row: PublicationRow): PublicationRecord {
        return new PublicationRecord(fromRow(row), this.styles);
    }

    // ─── Reads ────────────────────────────────────────────────

    getPublicationById(id: number): PublicationRecord | undefined {
        const row = this.db.prepare('SELECT * FROM publications WHERE id = ?').get(id) as PublicationRow | undefined;
        return row ? this.toRecord(row) : undefined;
    }

    getPublicationByCitekey(citekey: string): PublicationRecord | undefined {
        const row = this.db.prepare('SELECT * FROM publications WHERE citekey = ?').get(citekey) as PublicationRow | undefined;
        return row ? this.toRecord(row) : undefined;
    }

    /**
     * All publications in display order: newest year first, then month
     * descending, then most recently inserted.
     */
    getAllPublications(): PublicationRecord[] {
        const rows = this.db.prepare(
            'SELECT * FROM publications ORDER BY year DESC, month DESC, id DESC'
        ).all() as PublicationRow[];
        return rows.map((row) => this.toRecord(row));
    }

    getPublicationCount(): number {
        const row = this.db.prepare('SELECT COUNT(*) as count FROM publications').get() as { count: number };
        return row.count;
    }

    /**
     * Candidates for the citation key scan: same year (a missing year matches
     * missing years), authors containing the surname case-insensitively,
     * ordered by month then id ascending. Unlike display order this is
     * ascending, and keys already handed out depend on it.
     */
    getKeySiblings(year: number | null, surname: string): PublicationRecord[] {
        const rows = this.db.prepare(`
      SELECT * FROM publications
      WHERE year IS ? AND authors LIKE ? ESCAPE '\\'
      ORDER BY month ASC, id ASC
    `).all(year, likeContains(surname)) as PublicationRow[];
        return rows.map((row) => this.toRecord(row));
    }

    /**
     * Sibling entries for `generateCiteKey`. The query runs on first
     * iteration, so an unkeyable record fails before touching the store.
     */
    private *keySiblings(year: number | null, surname: string): Generator<KeySibling> {
        for (const record of this.getKeySiblings(year, surname)) {
            if (record.id === null) continue;
            yield { id: record.id, surname: record.firstAuthorSurname() };
        }
    }

    /**
     * Citation key this record gets against the current library.
     * A persisted record counts only the siblings ordered before itself.
     */
    computeCiteKey(record: PublicationRecord): string {
        const surname = record.firstAuthorSurname();
        return generateCiteKey(surname, record.year, this.keySiblings(record.year, surname), record.id);
    }

    /**
     * Generated key for `record`, advanced past keys held by unrelated
     * records up to `keyRetries` times.
     */
    private assignCiteKey(record: PublicationRecord): string {
        let candidate = this.computeCiteKey(record);

        for (let attempt = 0; this.isTakenByOther(candidate, record.id); attempt++) {
            if (attempt >= this.keyRetries) {
                throw new DuplicateCiteKeyError(candidate);
            }
            const next = nextCiteKey(candidate, record.firstAuthorSurname(), record.year);
            logger().warn({ taken: candidate, next }, 'Citation key taken, trying next letter');
            candidate = next;
        }

        return candidate;
    }

    private isTakenByOther(citekey: string, id: number | null): boolean {
        const holder = this.db.prepare('SELECT id FROM publications WHERE citekey = ?').get(citekey) as { id: number } | undefined;
        return holder !== undefined && holder.id !== id;
    }

    // ─── Writes ───────────────────────────────────────────────

    /**
     * Validate and insert a publication. Without a citekey one is generated;
     * the sibling scan and the insert share one IMMEDIATE transaction, so
     * concurrent writers on the same file are serialized.
     *
     * @throws InvalidRecordStateError for a record without authors or title
     * @throws DuplicateCiteKeyError when the key is taken
     */
    insertPublication(input: PublicationInput): PublicationRecord {
        // A new row never takes over the identity of a stored one.
        const { id: _id, created_at: _createdAt, ...fields } = input;
        const record = new PublicationRecord(fields, this.styles).clean();
        record.validate();

        const stmt = this.db.prepare(`
      INSERT INTO publications (type, citekey, title, authors, year, month, journal, book_title, publisher, institution, volume, number, edition, location, series, pages, note, keywords, url, urldate, code, doi, external, abstract, isbn, issn)
      VALUES (@type, @citekey, @title, @authors, @year, @month, @journal, @book_title, @publisher, @institution, @volume, @number, @edition, @location, @series, @pages, @note, @keywords, @url, @urldate, @code, @doi, @external, @abstract, @isbn, @issn)
    `);

        const insert = this.db.transaction((): number => {
            const citekey = record.citekey ?? this.assignCiteKey(record);
            const result = stmt.run(toParams({ ...record.toRow(), citekey }));
            logger().debug({ citekey, id: Number(result.lastInsertRowid) }, 'Publication inserted');
            return Number(result.lastInsertRowid);
        });

        const id = this.runWrite(() => insert.immediate(), record.citekey);
        return this.mustGet(id);
    }

    /**
     * Apply changes to a stored publication. Clearing the citekey
     * (null or "") regenerates it with the record itself in the scan.
     * Returns undefined when no publication has this id.
     */
    updatePublication(id: number, changes: Partial<PublicationInput>): PublicationRecord | undefined {
        const existing = this.getPublicationById(id);
        if (!existing) return undefined;

        const record = new PublicationRecord({ ...existing.toRow(), ...changes, id }, this.styles).clean();
        record.validate();

        const stmt = this.db.prepare(`
      UPDATE publications SET
        type = @type, citekey = @citekey, title = @title, authors = @authors, year = @year, month = @month,
        journal = @journal, book_title = @book_title, publisher = @publisher, institution = @institution,
        volume = @volume, number = @number, edition = @edition, location = @location, series = @series,
        pages = @pages, note = @note, keywords = @keywords, url = @url, urldate = @urldate, code = @code,
        doi = @doi, external = @external, abstract = @abstract, isbn = @isbn, issn = @issn
      WHERE id = @id
    `);

        const update = this.db.transaction((): void => {
            const citekey = record.citekey ?? this.assignCiteKey(record);
            stmt.run({ ...toParams({ ...record.toRow(), citekey }), id });
        });

        this.runWrite(() => update.immediate(), record.citekey);
        logger().debug({ id }, 'Publication updated');
        return this.mustGet(id);
    }

    deletePublication(id: number): boolean {
        const result = this.db.prepare('DELETE FROM publications WHERE id = ?').run(id);
        return result.changes > 0;
    }

    /**
     * Run a write, turning a unique violation on the citekey into
     * DuplicateCiteKeyError.
     */
    private runWrite<T>(write: () => T, citekey: string | null): T {
        try {
            return write();
        } catch (error) {
            if (isUniqueViolation(error)) {
                throw new DuplicateCiteKeyError(citekey ?? '(generated)');
            }
            throw error;
        }
    }

    private mustGet(id: number): PublicationRecord {
        const record = this.getPublicationById(id);
        if (!record) {
            throw new Error(`Publication ${id} vanished after write`);
        }
        return record;
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): {
        publications: number;
        external: number;
        byYear: YearCount[];
    } {
        const publications = this.getPublicationCount();
        const external = (this.db.prepare('SELECT COUNT(*) as count FROM publications WHERE external = 1').get() as { count: number }).count;

        const yearRows = this.db.prepare(
            'SELECT year, COUNT(*) as count FROM publications GROUP BY year ORDER BY year DESC'
        ).all() as Array<{ year: number | null; count: number }>;
        const byYear = yearRows.map((row): YearCount => ({
            year: row.year === null ? 'n.d.' : String(row.year),
            count: row.count,
        }));

        return { publications, external, byYear };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Execute a function within a transaction.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        logger().debug('Database closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}

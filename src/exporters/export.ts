import { PublicationDatabase } from '../storage/database.js';
import type { PublicationRecord } from '../records/publication-record.js';
import { formatBibtexEntry } from '../styles/bibtex.js';
import { writeFileSync } from 'node:fs';
import { getLogger } from '../utils/logger.js';

// ─── Types ───────────────────────────────────────────────

export type ExportFormat = 'bibtex' | 'json' | 'csv';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['bibtex', 'json', 'csv'];

export const EXPORT_EXTENSIONS: Record<ExportFormat, string> = {
    bibtex: '.bib',
    json: '.json',
    csv: '.csv',
};

export function isExportFormat(value: string): value is ExportFormat {
    return EXPORT_FORMATS.some((format) => format === value);
}

// ─── Main Export Function ────────────────────────────────

/**
 * Export every publication of a library file in the given format,
 * in display order.
 */
export function exportLibrary(
    dbPath: string,
    outputPath: string,
    format: ExportFormat
): void {
    const db = new PublicationDatabase(dbPath);

    try {
        const records = db.getAllPublications();
        const content = renderExport(records, format);

        writeFileSync(outputPath, content, 'utf-8');
        getLogger('export').info({ format, outputPath, publications: records.length }, 'Library exported');
    } finally {
        db.close();
    }
}

export function renderExport(records: PublicationRecord[], format: ExportFormat): string {
    switch (format) {
        case 'bibtex':
            return exportBibtex(records);
        case 'json':
            return exportJson(records);
        case 'csv':
            return exportCsv(records);
    }
}

// ─── Format Implementations ─────────────────────────────

function exportBibtex(records: PublicationRecord[]): string {
    return records.map((record) => formatBibtexEntry(record)).join('\n\n') + '\n';
}

function exportJson(records: PublicationRecord[]): string {
    return JSON.stringify({
        bibkeys: {
            version: '1.0.0',
            exported_at: new Date().toISOString(),
        },
        publications: records.map((r) => ({
            id: r.id,
            citekey: r.citekey,
            type: r.type,
            title: r.title,
            authors: r.authorsList,
            authors_simple: r.authorsListSimple,
            year: r.year,
            month: r.month,
            venue: r.journalOrBookTitle() || null,
            doi: r.doi || null,
            url: r.url || null,
            keywords: r.keywordsEscaped().map(([keyword]) => keyword),
            external: r.external,
        })),
    }, null, 2);
}

function csvField(value: string): string {
    if (/[",\n]/.test(value)) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}

function exportCsv(records: PublicationRecord[]): string {
    const header = 'citekey,authors,title,year,month,venue,doi';
    const lines = records.map((r) => [
        r.citekey ?? '',
        r.authors,
        r.title,
        r.year === null ? '' : String(r.year),
        r.month === null ? '' : String(r.month),
        r.journalOrBookTitle(),
        r.doi,
    ].map(csvField).join(','));

    return [header, ...lines].join('\n') + '\n';
}

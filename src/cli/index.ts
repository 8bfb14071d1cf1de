#!/usr/bin/env node
import { Command } from 'commander';
import { resolveConfig, isLogLevel } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { normalizeAuthors } from '../names/author-normalizer.js';
import { exportLibrary, isExportFormat, EXPORT_EXTENSIONS, EXPORT_FORMATS } from '../exporters/export.js';
import { withDatabase } from './with-database.js';
import type { BibkeysConfig, PublicationInput } from '../types/index.js';

interface AddOptions {
    title: string;
    authors: string;
    type: string;
    year?: string;
    month?: string;
    journal?: string;
    bookTitle?: string;
    publisher?: string;
    volume?: string;
    number?: string;
    pages?: string;
    doi?: string;
    url?: string;
    keywords?: string;
    citekey?: string;
    external: boolean;
}

const VERSION = '1.0.0';

const program = new Command();

program
    .name('bibkeys')
    .description('Normalize author lists and assign citation keys for a publication library.')
    .version(VERSION)
    .option('--db <path>', 'Library database path')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs');

/**
 * Resolve config from the global flags and start the logger.
 */
async function setup(): Promise<BibkeysConfig> {
    const opts = program.opts<{ db?: string; logLevel?: string; jsonLogs?: boolean }>();
    const cliConfig: Partial<BibkeysConfig> = {};
    if (opts.db) cliConfig.db = opts.db;
    if (opts.logLevel && isLogLevel(opts.logLevel)) cliConfig.logLevel = opts.logLevel;
    if (opts.jsonLogs) cliConfig.jsonLogs = true;

    const config = await resolveConfig(cliConfig);
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

function parseOptionalInt(value: string | undefined): number | null {
    if (value === undefined) return null;
    const parsed = parseInt(value, 10);
    return Number.isNaN(parsed) ? null : parsed;
}

// ─── NORMALIZE command ────────────────────────────────────

program
    .command('normalize')
    .description('Show how an authors field is parsed')
    .argument('<authors>', 'Authors field, e.g. "Gauss CF and Jean-Paul Sartre"')
    .action((authors: string) => {
        console.log(JSON.stringify(normalizeAuthors(authors), null, 2));
    });

// ─── ADD command ──────────────────────────────────────────

program
    .command('add')
    .description('Add a publication and print its citation key')
    .requiredOption('-t, --title <title>', 'Title')
    .requiredOption('-a, --authors <authors>', 'Authors separated by commas or "and"; wrap in {} to keep as-is')
    .option('-y, --year <year>', 'Year')
    .option('-m, --month <month>', 'Month number (1-12)')
    .option('--type <type>', 'BibTeX entry type', 'article')
    .option('-j, --journal <journal>', 'Journal')
    .option('-b, --book-title <title>', 'Book or proceedings title')
    .option('--publisher <publisher>', 'Publisher')
    .option('--volume <n>', 'Volume')
    .option('--number <n>', 'Issue number')
    .option('--pages <pages>', 'Pages')
    .option('--doi <doi>', 'DOI')
    .option('--url <url>', 'URL')
    .option('-k, --keywords <keywords>', 'Keywords separated by commas')
    .option('--citekey <key>', 'Citation key (generated when omitted)')
    .option('--external', 'Written outside the group', false)
    .action(async (opts: AddOptions) => {
        const config = await setup();
        const logger = getLogger();

        const input: PublicationInput = {
            title: opts.title,
            authors: opts.authors,
            type: opts.type,
            year: parseOptionalInt(opts.year),
            month: parseOptionalInt(opts.month),
            journal: opts.journal ?? '',
            book_title: opts.bookTitle ?? '',
            publisher: opts.publisher ?? '',
            volume: parseOptionalInt(opts.volume),
            number: parseOptionalInt(opts.number),
            pages: opts.pages ?? '',
            doi: opts.doi ?? '',
            url: opts.url ?? '',
            keywords: opts.keywords ?? '',
            citekey: opts.citekey ?? null,
            external: opts.external,
        };

        withDatabase(config.db, 'Add', (db) => {
            const record = db.insertPublication(input);
            logger.info({ citekey: record.citekey, id: record.id }, 'Publication added');
            console.log(record.citekey);
        }, { keyRetries: config.keyRetries });
    });

// ─── LIST command ─────────────────────────────────────────

program
    .command('list')
    .description('List publications, newest first')
    .action(async () => {
        const config = await setup();

        withDatabase(config.db, 'List', (db) => {
            for (const record of db.getAllPublications()) {
                console.log(`${record.citekey ?? '-'}\t${record.authors}\t${record.shortTitle()}`);
            }
        });
    });

// ─── SHOW command ─────────────────────────────────────────

program
    .command('show')
    .description('Format one publication in a citation style')
    .argument('<citekey>', 'Citation key')
    .option('-s, --style <style>', 'Style name: bibtex | harvard | plain')
    .option('--openurl', 'Print the OpenURL context object instead')
    .action(async (citekey: string, opts: { style?: string; openurl?: boolean }) => {
        const config = await setup();

        withDatabase(config.db, 'Show', (db) => {
            const record = db.getPublicationByCitekey(citekey);
            if (!record) {
                console.error(`No publication with key ${citekey}`);
                process.exitCode = 1;
                return;
            }
            console.log(opts.openurl
                ? record.toOpenUrl(config.siteDomain)
                : record.format(opts.style ?? config.defaultStyle));
        });
    });

// ─── EXPORT command ───────────────────────────────────────

program
    .command('export')
    .description('Export the library to BibTeX, JSON, or CSV')
    .requiredOption('-f, --format <format>', `Export format: ${EXPORT_FORMATS.join(' | ')}`)
    .option('-o, --out <path>', 'Output file path')
    .action(async (opts: { format: string; out?: string }) => {
        const config = await setup();

        const format = opts.format.toLowerCase();
        if (!isExportFormat(format)) {
            console.error(`Invalid format: ${format}. Valid: ${EXPORT_FORMATS.join(', ')}`);
            process.exitCode = 1;
            return;
        }

        const outputPath = opts.out ?? config.db.replace(/\.db$/, '') + EXPORT_EXTENSIONS[format];

        try {
            exportLibrary(config.db, outputPath, format);
            console.log(`Exported to ${outputPath}`);
        } catch (error) {
            getLogger().error({ error }, 'Export failed');
            process.exitCode = 1;
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show library statistics')
    .action(async () => {
        const config = await setup();

        withDatabase(config.db, 'Inspect', (db) => {
            const stats = db.getStats();

            console.log('\nLibrary Statistics\n');
            console.log(`  Publications: ${stats.publications}`);
            console.log(`  External:     ${stats.external}`);

            if (stats.byYear.length > 0) {
                console.log('\n  By Year:');
                for (const { year, count } of stats.byYear) {
                    console.log(`    ${year}: ${count}`);
                }
            }

            console.log('');
        });
    });

await program.parseAsync();

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { withDatabase } from '../cli/with-database.js';
import type { PublicationDatabase } from '../storage/database.js';
import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';

describe('withDatabase', () => {
    let tmpDir: string;
    let dbPath: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bibkeys-cli-'));
        dbPath = path.join(tmpDir, 'cli.db');
        process.exitCode = undefined;
    });

    afterEach(() => {
        process.exitCode = undefined;
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should close the database and set exit code 1 when the command fails', () => {
        const opened: PublicationDatabase[] = [];

        withDatabase(dbPath, 'Add', (db) => {
            opened.push(db);
            throw new Error('insert failed');
        });

        expect(process.exitCode).toBe(1);
        expect(opened[0]?.getRawDb().open).toBe(false);
    });

    it('should close the database and leave the exit code alone on success', () => {
        const opened: PublicationDatabase[] = [];

        withDatabase(dbPath, 'Add', (db) => {
            opened.push(db);
            db.insertPublication({ title: 'T', authors: 'Alice Smith', year: 2020 });
        });

        expect(process.exitCode).toBeUndefined();
        expect(opened[0]?.getRawDb().open).toBe(false);
    });

    it('should pass key retries through to the database', () => {
        withDatabase(dbPath, 'Seed', (db) => {
            db.insertPublication({ title: 'Other', authors: 'Zed Zulu', year: 2019, citekey: 'Smith2020a' });
        });

        withDatabase(dbPath, 'Add', (db) => {
            db.insertPublication({ title: 'T', authors: 'Alice Smith', year: 2020 });
        }, { keyRetries: 0 });

        expect(process.exitCode).toBe(1);
    });
});

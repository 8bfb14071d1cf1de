import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { resolveConfig, loadEnvVars, isLogLevel } from '../utils/config.js';
import { DEFAULT_CONFIG } from '../types/index.js';

describe('Config', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'bibkeys-config-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    describe('DEFAULT_CONFIG', () => {
        it('should log at info in pretty mode', () => {
            expect(DEFAULT_CONFIG.logLevel).toBe('info');
            expect(DEFAULT_CONFIG.jsonLogs).toBe(false);
        });

        it('should retry taken keys three times', () => {
            expect(DEFAULT_CONFIG.keyRetries).toBe(3);
        });
    });

    describe('loadEnvVars', () => {
        it('should read BIBKEYS_* variables', () => {
            expect(loadEnvVars({ BIBKEYS_DB: 'env.db', BIBKEYS_SITE_DOMAIN: 'lab.example.org', BIBKEYS_LOG_LEVEL: 'debug' })).toEqual({
                db: 'env.db',
                siteDomain: 'lab.example.org',
                logLevel: 'debug',
            });
        });

        it('should ignore an unknown log level', () => {
            expect(loadEnvVars({ BIBKEYS_LOG_LEVEL: 'loud' })).toEqual({});
        });
    });

    describe('resolveConfig', () => {
        it('should fall back to defaults', async () => {
            const config = await resolveConfig({}, { searchFrom: dir, env: {} });
            expect(config).toEqual({ ...DEFAULT_CONFIG, db: './bibkeys.db' });
        });

        it('should layer file, env and CLI flags', async () => {
            writeFileSync(join(dir, 'bibkeys.config.json'), JSON.stringify({
                db: 'file.db',
                keyRetries: 5,
                defaultStyle: 'plain',
                siteDomain: 'file.example.org',
            }));

            const config = await resolveConfig(
                { db: 'cli.db' },
                { searchFrom: dir, env: { BIBKEYS_SITE_DOMAIN: 'env.example.org' } }
            );

            expect(config).toEqual({
                ...DEFAULT_CONFIG,
                db: 'cli.db',
                keyRetries: 5,
                defaultStyle: 'plain',
                siteDomain: 'env.example.org',
            });
        });
    });

    it('should recognize log levels', () => {
        expect(isLogLevel('warn')).toBe(true);
        expect(isLogLevel('trace')).toBe(false);
    });
});

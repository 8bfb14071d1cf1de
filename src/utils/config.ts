import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type BibkeysConfig, type LogLevel } from '../types/index.js';
import { getLogger } from './logger.js';

const LOG_LEVELS: ReadonlySet<string> = new Set(['error', 'warn', 'info', 'debug']);

/**
 * Load configuration from bibkeys.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults are used then.
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<BibkeysConfig> | null> {
    const explorer = cosmiconfig('bibkeys', {
        searchPlaces: ['bibkeys.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return result.config as Partial<BibkeysConfig>;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.has(value);
}

/**
 * Read BIBKEYS_* environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): Partial<BibkeysConfig> {
    const config: Partial<BibkeysConfig> = {};

    if (env['BIBKEYS_DB']) config.db = env['BIBKEYS_DB'];
    if (env['BIBKEYS_SITE_DOMAIN']) config.siteDomain = env['BIBKEYS_SITE_DOMAIN'];

    const level = env['BIBKEYS_LOG_LEVEL'];
    if (level && isLogLevel(level)) config.logLevel = level;

    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 * Callers leave unset flags out of `cliFlags` rather than passing undefined.
 */
export async function resolveConfig(
    cliFlags: Partial<BibkeysConfig>,
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<BibkeysConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    return {
        ...DEFAULT_CONFIG,
        db: './bibkeys.db',
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
    };
}

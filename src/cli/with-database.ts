import { PublicationDatabase } from '../storage/database.js';
import { getLogger } from '../utils/logger.js';

/**
 * Run a command body against an open library. A failure is logged and sets
 * exit code 1; the database is closed either way.
 */
export function withDatabase(
    dbPath: string,
    action: string,
    body: (db: PublicationDatabase) => void,
    options: { keyRetries?: number } = {},
): void {
    const db = new PublicationDatabase(dbPath, options);
    try {
        body(db);
    } catch (error) {
        getLogger('cli').error({ error }, `${action} failed`);
        process.exitCode = 1;
    } finally {
        db.close();
    }
}

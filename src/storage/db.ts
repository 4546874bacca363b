import Database from 'better-sqlite3';
import { existsSync, unlinkSync } from 'fs';

export interface DatabaseIntegrityResult {
    ok: boolean;
    errors: string[];
}

function messageOf(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

export function checkDatabaseIntegrity(db: Database.Database): DatabaseIntegrityResult {
    try {
        const rows = db.pragma('integrity_check') as { integrity_check: string }[];
        const errors = rows
            .map(row => row.integrity_check)
            .filter(msg => msg !== 'ok');

        return { ok: errors.length === 0, errors };
    } catch (e) {
        return { ok: false, errors: [messageOf(e)] };
    }
}

/**
 * Remove a corrupted database file and its WAL/SHM siblings so a fresh one can be created.
 */
function discardCorruptedDatabase(path: string, reason: string): void {
    console.error(`[Database] Corruption detected at ${path}: ${reason}`);

    const files = [path, `${path}-wal`, `${path}-shm`];
    try {
        for (const file of files) {
            if (existsSync(file)) {
                unlinkSync(file);
                console.error(`[Database] Removed ${file}`);
            }
        }
    } catch (e) {
        throw new Error(`Database is corrupted and cleanup failed (${messageOf(e)}). Please manually delete: ${files.join(', ')}`);
    }
}

function open(path: string): Database.Database {
    const db = new Database(path);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    return db;
}

export function initDB(path: string): Database.Database {
    console.error(`[Database] Opening database: ${path}`);

    let db: Database.Database;
    try {
        db = open(path);
    } catch (e) {
        const message = messageOf(e);
        if (!message.includes('SQLITE_CORRUPT') && !message.includes('malformed')) {
            throw e;
        }
        discardCorruptedDatabase(path, message);
        db = open(path);
    }

    // An in-memory database has nothing to recover
    if (path === ':memory:') return db;

    const integrity = checkDatabaseIntegrity(db);
    if (integrity.ok) return db;

    integrity.errors.forEach(err => console.error(`[Database]   - ${err}`));
    db.close();
    discardCorruptedDatabase(path, integrity.errors.join(', '));
    console.error('[Database] Fresh database created after corruption recovery');
    return open(path);
}

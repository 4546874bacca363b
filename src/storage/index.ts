import Database from 'better-sqlite3';
import { join, isAbsolute } from 'path';
import { existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { initDB } from './db.js';
import { migrate } from './migrations.js';

export const APP_DIR_NAME = 'kinematics-mcp';
export const DEFAULT_DB_FILE = 'kinematics.db';

let dbInstance: Database.Database | null = null;
let configuredDbPath: string | null = null;

/**
 * Platform-specific app data directory:
 * - Windows: %APPDATA%/kinematics-mcp
 * - macOS: ~/Library/Application Support/kinematics-mcp
 * - Linux: $XDG_DATA_HOME/kinematics-mcp or ~/.local/share/kinematics-mcp
 */
function getAppDataDir(): string {
    let appDataDir: string;

    if (process.platform === 'win32') {
        appDataDir = process.env.APPDATA || join(homedir(), 'AppData', 'Roaming');
    } else if (process.platform === 'darwin') {
        appDataDir = join(homedir(), 'Library', 'Application Support');
    } else {
        appDataDir = process.env.XDG_DATA_HOME || join(homedir(), '.local', 'share');
    }

    const dir = join(appDataDir, APP_DIR_NAME);
    if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
        console.error(`[Database] Created app data directory: ${dir}`);
    }
    return dir;
}

/**
 * Priority: configureDbPath(), KINEMATICS_MCP_DB_PATH, then the app data directory.
 */
function resolveDbPath(path?: string): string {
    const dbPath = path || configuredDbPath || process.env.KINEMATICS_MCP_DB_PATH || DEFAULT_DB_FILE;

    // SQLite in-memory database
    if (dbPath === ':memory:') {
        return dbPath;
    }

    if (isAbsolute(dbPath)) {
        return dbPath;
    }

    if (dbPath === DEFAULT_DB_FILE) {
        return join(getAppDataDir(), DEFAULT_DB_FILE);
    }

    return join(process.cwd(), dbPath);
}

/**
 * Set the database path before the first getDb() call.
 */
export function configureDbPath(path: string): void {
    if (dbInstance) {
        throw new Error('Cannot configure database path after database has been initialized');
    }
    configuredDbPath = path === ':memory:' || isAbsolute(path) ? path : join(process.cwd(), path);
}

export function getDbPath(): string {
    return resolveDbPath();
}

export function getDb(path?: string): Database.Database {
    if (!dbInstance) {
        const resolvedPath = resolveDbPath(path);
        console.error(`[Database] Initializing database at: ${resolvedPath}`);
        dbInstance = initDB(resolvedPath);
        migrate(dbInstance);
    }
    return dbInstance;
}

/**
 * Close the database, checkpointing the WAL into the main file first.
 */
export function closeDb(): void {
    if (!dbInstance) return;

    try {
        dbInstance.pragma('wal_checkpoint(TRUNCATE)');
    } catch (e) {
        console.error('[Database] WAL checkpoint failed:', e instanceof Error ? e.message : String(e));
    }
    dbInstance.close();
    dbInstance = null;
    configuredDbPath = null;
    console.error('[Database] Database closed');
}

export * from './db.js';
export * from './migrations.js';
export * from './audit.repo.js';
export * from './event-log.repo.js';

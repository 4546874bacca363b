import Database from 'better-sqlite3';
import { z } from 'zod';
import { EventLog } from '../schema/audit.js';

interface EventRow {
    id: number;
    type: string;
    payload: string; // JSON
    timestamp: string;
}

const PayloadSchema = z.record(z.unknown());

export class EventLogRepository {
    constructor(private db: Database.Database) { }

    append(type: string, payload: Record<string, unknown>, timestamp: string = new Date().toISOString()): number {
        const info = this.db.prepare(`
            INSERT INTO event_logs (type, payload, timestamp)
            VALUES (?, ?, ?)
        `).run(type, JSON.stringify(payload), timestamp);

        return Number(info.lastInsertRowid);
    }

    findByType(type: string, limit: number = 50): EventLog[] {
        const rows = this.db.prepare(`
            SELECT id, type, payload, timestamp
            FROM event_logs
            WHERE type = ?
            ORDER BY id DESC
            LIMIT ?
        `).all(type, limit) as EventRow[];

        return rows.map(row => ({
            id: row.id,
            type: row.type,
            payload: PayloadSchema.parse(JSON.parse(row.payload)),
            timestamp: row.timestamp
        }));
    }
}

import Database from 'better-sqlite3';
import { AuditLog, AuditLogSchema, AuditDetailsSchema } from '../schema/audit.js';

interface AuditRow {
    id: number;
    action: string;
    actorId: string | null;
    targetId: string | null;
    details: string | null; // JSON
    timestamp: string;
}

export class AuditRepository {
    constructor(private db: Database.Database) { }

    create(log: Omit<AuditLog, 'id'>): AuditLog {
        const validated = AuditLogSchema.omit({ id: true }).parse(log);

        const stmt = this.db.prepare(`
            INSERT INTO audit_logs (action, actor_id, target_id, details, timestamp)
            VALUES (@action, @actorId, @targetId, @details, @timestamp)
        `);

        const info = stmt.run({
            action: validated.action,
            actorId: validated.actorId ?? null,
            targetId: validated.targetId ?? null,
            details: validated.details ? JSON.stringify(validated.details) : null,
            timestamp: validated.timestamp
        });

        return {
            ...validated,
            actorId: validated.actorId ?? null,
            targetId: validated.targetId ?? null,
            id: Number(info.lastInsertRowid)
        };
    }

    list(limit: number = 50): AuditLog[] {
        const stmt = this.db.prepare(`
            SELECT id, action, actor_id as actorId, target_id as targetId, details, timestamp
            FROM audit_logs
            ORDER BY id DESC
            LIMIT ?
        `);

        const rows = stmt.all(limit) as AuditRow[];
        return rows.map(row => this.rowToLog(row));
    }

    findByAction(action: string): AuditLog[] {
        const stmt = this.db.prepare(`
            SELECT id, action, actor_id as actorId, target_id as targetId, details, timestamp
            FROM audit_logs
            WHERE action = ?
            ORDER BY id DESC
        `);

        const rows = stmt.all(action) as AuditRow[];
        return rows.map(row => this.rowToLog(row));
    }

    private rowToLog(row: AuditRow): AuditLog {
        return {
            id: row.id,
            action: row.action,
            actorId: row.actorId,
            targetId: row.targetId,
            details: row.details ? AuditDetailsSchema.parse(JSON.parse(row.details)) : undefined,
            timestamp: row.timestamp
        };
    }
}

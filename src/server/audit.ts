import Database from 'better-sqlite3';
import { AuditRepository } from '../storage/audit.repo.js';
import { getDb } from '../storage/index.js';
import { readSessionId } from './types.js';

/**
 * Records every tool call (arguments, result or error, duration) in audit_logs.
 * A failed audit write is logged and never reaches the caller.
 */
export class AuditLogger {
    private repo: AuditRepository;

    constructor(db: Database.Database = getDb()) {
        this.repo = new AuditRepository(db);
    }

    wrapHandler<A, R>(toolName: string, handler: (args: A) => Promise<R>): (args: A) => Promise<R> {
        return async (args: A) => {
            const startTime = Date.now();
            let result: R | undefined;
            let error: string | undefined;

            try {
                result = await handler(args);
                return result;
            } catch (e) {
                error = e instanceof Error ? e.message : String(e);
                throw e;
            } finally {
                try {
                    this.repo.create({
                        action: toolName,
                        actorId: readSessionId(args),
                        targetId: null,
                        details: {
                            args,
                            result,
                            error,
                            duration: Date.now() - startTime
                        },
                        timestamp: new Date().toISOString()
                    });
                } catch (logError) {
                    console.error('[Audit] Failed to write audit log:', logError);
                }
            }
        };
    }
}

import { z } from 'zod';

export const AuditDetailsSchema = z.object({
    args: z.unknown().optional(),
    result: z.unknown().optional(),
    error: z.string().optional(),
    duration: z.number().nonnegative().optional()
});

export type AuditDetails = z.infer<typeof AuditDetailsSchema>;

export const AuditLogSchema = z.object({
    id: z.number().int(),
    action: z.string().min(1),
    actorId: z.string().nullable().optional()
        .describe('Session that issued the tool call'),
    targetId: z.string().nullable().optional(),
    details: AuditDetailsSchema.optional(),
    timestamp: z.string().datetime()
});

export type AuditLog = z.infer<typeof AuditLogSchema>;

export const EventLogSchema = z.object({
    id: z.number().int(),
    type: z.string().min(1),
    payload: z.record(z.unknown()),
    timestamp: z.string().datetime()
});

export type EventLog = z.infer<typeof EventLogSchema>;

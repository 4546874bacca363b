import { z, ZodRawShape } from 'zod';

export const DEFAULT_SESSION_ID = 'default';

export interface SessionContext {
    sessionId: string;
}

export type ToolResponse = {
    content: { type: 'text'; text: string }[];
};

export type ToolHandler = (args: unknown) => Promise<ToolResponse>;

/**
 * Registers one tool with the MCP server. Kept as a function type so tool
 * modules can be exercised without a transport.
 */
export type ToolRegistrar = (name: string, description: string, shape: ZodRawShape, handler: ToolHandler) => void;

export interface EventNotification {
    method: string;
    params: {
        topic: string;
        payload: unknown;
        sessionId: string;
    };
}

export type Notifier = (notification: EventNotification) => Promise<void>;

const SessionArgsSchema = z.object({
    sessionId: z.string().min(1).optional()
});

export function readSessionId(args: unknown): string {
    const parsed = SessionArgsSchema.safeParse(args);
    return (parsed.success && parsed.data.sessionId) || DEFAULT_SESSION_ID;
}

export function textResponse(...texts: string[]): ToolResponse {
    return { content: texts.map(text => ({ type: 'text' as const, text })) };
}

/**
 * Split the optional `sessionId` off the tool arguments and validate the rest.
 */
export function withSession<S extends z.ZodTypeAny, R>(
    schema: S,
    handler: (args: z.infer<S>, ctx: SessionContext) => Promise<R>
): (args: unknown) => Promise<R> {
    return async (args: unknown) => {
        const sessionId = readSessionId(args);
        return handler(schema.parse(args), { sessionId });
    };
}

import { z } from 'zod';
import { PubSub } from '../engine/pubsub.js';
import { Notifier, ToolRegistrar, textResponse, withSession } from './types.js';

export const EVENT_NOTIFICATION_METHOD = 'notifications/kinematics/event';

export const EventTools = {
    SUBSCRIBE: {
        name: 'subscribe_to_events',
        description: 'Subscribe to kinematics updates. Every edit of a session publishes an event, delivered as a JSON-RPC notification.',
        inputSchema: z.object({
            topics: z.array(z.enum(['kinematics'])).min(1)
        })
    },
    UNSUBSCRIBE: {
        name: 'unsubscribe_from_events',
        description: 'Unsubscribe from all event topics',
        inputSchema: z.object({})
    }
} as const;

export function registerEventTools(register: ToolRegistrar, notify: Notifier, pubsub: PubSub) {
    // Subscriptions per session
    const activeSubscriptions: Map<string, Array<() => void>> = new Map();

    const dropSubscriptions = (sessionId: string) => {
        (activeSubscriptions.get(sessionId) ?? []).forEach(unsub => unsub());
        activeSubscriptions.delete(sessionId);
    };

    register(
        EventTools.SUBSCRIBE.name,
        EventTools.SUBSCRIBE.description,
        EventTools.SUBSCRIBE.inputSchema.extend({ sessionId: z.string().optional() }).shape,
        withSession(EventTools.SUBSCRIBE.inputSchema, async (args, ctx) => {
            const { sessionId } = ctx;
            dropSubscriptions(sessionId);

            const subs = args.topics.map(topic =>
                pubsub.subscribe(topic, payload => {
                    notify({
                        method: EVENT_NOTIFICATION_METHOD,
                        params: { topic, payload, sessionId }
                    }).catch(e => {
                        console.error(`[Events] Notification to session ${sessionId} failed:`, e instanceof Error ? e.message : String(e));
                    });
                })
            );
            activeSubscriptions.set(sessionId, subs);

            return textResponse(`Subscribed to topics: ${args.topics.join(', ')}`);
        })
    );

    register(
        EventTools.UNSUBSCRIBE.name,
        EventTools.UNSUBSCRIBE.description,
        EventTools.UNSUBSCRIBE.inputSchema.extend({ sessionId: z.string().optional() }).shape,
        withSession(EventTools.UNSUBSCRIBE.inputSchema, async (_args, ctx) => {
            dropSubscriptions(ctx.sessionId);
            return textResponse('Unsubscribed from all topics');
        })
    );
}

export type Topic = 'kinematics';

export type Subscriber = (payload: unknown) => void;

/**
 * In-process topic fan-out. `subscribe` hands back its own unsubscribe.
 */
export class PubSub {
    private subscribers: Map<Topic, Set<Subscriber>> = new Map();

    subscribe(topic: Topic, callback: Subscriber): () => void {
        const callbacks = this.subscribers.get(topic) ?? new Set<Subscriber>();
        this.subscribers.set(topic, callbacks);
        callbacks.add(callback);

        return () => {
            callbacks.delete(callback);
        };
    }

    publish(topic: Topic, payload: unknown): void {
        const callbacks = this.subscribers.get(topic);
        if (!callbacks) return;

        for (const callback of [...callbacks]) {
            try {
                callback(payload);
            } catch (e) {
                console.error(`[PubSub] Subscriber on '${topic}' failed:`, e instanceof Error ? e.message : String(e));
            }
        }
    }

    subscriberCount(topic: Topic): number {
        return this.subscribers.get(topic)?.size ?? 0;
    }
}

import { EventEmitter } from 'node:events';
import type { StreamEvent, StreamEventBody, StreamEventType } from '../src/types/stream';

const FIRST_TO_DROP: ReadonlySet<StreamEventType> = new Set(['log', 'progress', 'connected']);
const NEVER_DROP: ReadonlySet<StreamEventType> = new Set(['final_result', 'error']);

interface ClientQueue {
    events: StreamEvent[];
    seq: number;
    dropped: number;
    /** Bumped by every subscribe; an older subscription stops when it changes. */
    generation: number;
    /** A subscriber is attached; its queue goes away when it stops. */
    subscribed: boolean;
    wake?: () => void;
}

export interface BroadcasterStats {
    clients: number;
    queued: number;
    dropped: number;
}

/**
 * Per-client ordered event queues. Producers publish, one consumer per client
 * drains through `subscribe`.
 */
export class Broadcaster {
    private queues = new Map<string, ClientQueue>();
    private emitter = new EventEmitter();

    constructor(private queueBound: number) {
        if (!Number.isInteger(queueBound) || queueBound < 1) {
            throw new RangeError(`Queue bound must be a positive integer, got ${queueBound}`);
        }
    }

    private ensure(clientId: string): ClientQueue {
        let queue = this.queues.get(clientId);
        if (!queue) {
            queue = { events: [], seq: 0, dropped: 0, generation: 0, subscribed: false };
            this.queues.set(clientId, queue);
        }
        return queue;
    }

    private stamp(queue: ClientQueue, body: StreamEventBody): StreamEvent {
        queue.seq += 1;
        return { ...body, seq: queue.seq, timestamp: new Date().toISOString() };
    }

    /** Removes the oldest droppable event. Returns false when only final events remain. */
    private evict(queue: ClientQueue): boolean {
        let index = queue.events.findIndex(e => FIRST_TO_DROP.has(e.type));
        if (index < 0) index = queue.events.findIndex(e => !NEVER_DROP.has(e.type));
        if (index < 0) return false;
        queue.events.splice(index, 1);
        queue.dropped += 1;
        return true;
    }

    publish(clientId: string, body: StreamEventBody): StreamEvent {
        const queue = this.ensure(clientId);
        const event = this.stamp(queue, body);
        queue.events.push(event);
        while (queue.events.length > this.queueBound) {
            if (!this.evict(queue)) break;
        }
        queue.wake?.();
        return event;
    }

    /**
     * Yields `connected` first, then every queued and future event in order.
     * `connected` carries seq 0 and is not counted, so ids never go backwards.
     * Never ends on its own; when the consumer stops (return, throw or abort)
     * the client is disconnected. A newer subscription for the same client
     * ends this one without disconnecting.
     */
    async *subscribe(clientId: string, signal?: AbortSignal): AsyncGenerator<StreamEvent> {
        const queue = this.ensure(clientId);
        queue.wake?.();
        queue.generation += 1;
        queue.subscribed = true;
        const generation = queue.generation;
        const isCurrent = () => this.queues.get(clientId) === queue && queue.generation === generation;

        try {
            yield { type: 'connected', clientId, seq: 0, timestamp: new Date().toISOString() };
            while (!signal?.aborted && isCurrent()) {
                const event = queue.events.shift();
                if (event) {
                    yield event;
                    continue;
                }
                await this.waitForEvent(queue, signal);
            }
        } finally {
            if (isCurrent()) this.disconnect(clientId);
        }
    }

    private waitForEvent(queue: ClientQueue, signal?: AbortSignal): Promise<void> {
        return new Promise<void>(resolve => {
            const done = () => {
                signal?.removeEventListener('abort', done);
                if (queue.wake === done) queue.wake = undefined;
                resolve();
            };
            queue.wake = done;
            signal?.addEventListener('abort', done, { once: true });
        });
    }

    disconnect(clientId: string): void {
        const queue = this.queues.get(clientId);
        if (!queue) return;
        this.queues.delete(clientId);
        queue.wake?.();
        console.log(`[Broadcaster] Client ${clientId} disconnected (${queue.events.length} undelivered, ${queue.dropped} dropped)`);
        this.emitter.emit('disconnect', clientId);
    }

    /**
     * Drops the queue of a client nobody is subscribed to, without the
     * disconnect notification. Returns false while a subscriber is attached.
     */
    release(clientId: string): boolean {
        const queue = this.queues.get(clientId);
        if (!queue || queue.subscribed) return false;
        this.queues.delete(clientId);
        console.log(`[Broadcaster] Released idle client ${clientId} (${queue.events.length} undelivered)`);
        return true;
    }

    /** Returns an unsubscribe function. */
    onDisconnect(listener: (clientId: string) => void): () => void {
        this.emitter.on('disconnect', listener);
        return () => {
            this.emitter.off('disconnect', listener);
        };
    }

    hasClient(clientId: string): boolean {
        return this.queues.has(clientId);
    }

    pendingEvents(clientId: string): number {
        return this.queues.get(clientId)?.events.length ?? 0;
    }

    stats(): BroadcasterStats {
        let queued = 0;
        let dropped = 0;
        for (const queue of this.queues.values()) {
            queued += queue.events.length;
            dropped += queue.dropped;
        }
        return { clients: this.queues.size, queued, dropped };
    }
}

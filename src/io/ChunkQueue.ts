import { QueueOverflowError, StreamStateError } from '../errors';
import { RingBuffer } from '../utils/RingBuffer';
import type { OverflowPolicy } from '../config';

export type QueueState = 'open' | 'closed' | 'errored';

export interface ChunkQueueHooks {
    /** Called once when the queue fills up under the `pause` policy */
    onPause?: () => void;
    /** Called once the reader brings the queue back under capacity */
    onResume?: () => void;
}

/**
 * Bounded FIFO of inbound chunks with a single consumer.
 *
 * The state tag separates "empty but more may come" (the reader waits) from
 * "empty and finished" (end-of-stream) and "failed" (the stored error is
 * thrown once the buffered chunks are drained).
 */
export class ChunkQueue {
    private readonly ring: RingBuffer<Uint8Array>;
    // In-flight chunks that arrived after a pause was requested.
    private readonly staged: Uint8Array[] = [];
    private state: QueueState = 'open';
    private failure: Error | null = null;
    private waiter: (() => void) | null = null;
    private paused = false;
    private dropped = 0;

    constructor(
        capacity: number,
        private readonly policy: OverflowPolicy = 'pause',
        private readonly hooks: ChunkQueueHooks = {}
    ) {
        this.ring = new RingBuffer<Uint8Array>(capacity);
    }

    public get capacity(): number {
        return this.ring.capacity;
    }

    public get length(): number {
        return this.ring.length + this.staged.length;
    }

    public get droppedChunks(): number {
        return this.dropped;
    }

    public get isPaused(): boolean {
        return this.paused;
    }

    public getState(): QueueState {
        return this.state;
    }

    /**
     * Enqueues a chunk from the producer side. Never blocks.
     *
     * @returns false when the chunk was not kept (queue finished, or dropped
     * by the overflow policy)
     */
    public push(chunk: Uint8Array): boolean {
        if (this.state !== 'open') return false;

        if (this.ring.isFull) {
            switch (this.policy) {
                case 'pause':
                    this.staged.push(chunk);
                    this.wake();
                    return true;
                case 'drop-newest':
                    this.dropped++;
                    return false;
                case 'drop-oldest':
                    if (this.ring.push(chunk) !== undefined) this.dropped++;
                    this.wake();
                    return true;
                case 'error':
                    this.fail(new QueueOverflowError(this.ring.capacity));
                    return false;
            }
        }

        this.ring.push(chunk);
        if (this.policy === 'pause' && this.ring.isFull && !this.paused) {
            this.paused = true;
            this.hooks.onPause?.();
        }
        this.wake();
        return true;
    }

    /**
     * Dequeues the oldest chunk if one is buffered.
     */
    public shift(): Uint8Array | undefined {
        const chunk = this.ring.shift();
        if (chunk === undefined) return undefined;

        const next = this.staged.shift();
        if (next !== undefined) this.ring.push(next);

        if (this.paused && this.length < this.ring.capacity) {
            this.paused = false;
            this.hooks.onResume?.();
        }
        return chunk;
    }

    /**
     * Waits for the next chunk.
     *
     * @returns the chunk, or `null` once the queue is closed and drained
     * @throws the stored failure once the queue is errored and drained
     */
    public async next(): Promise<Uint8Array | null> {
        for (;;) {
            const chunk = this.shift();
            if (chunk !== undefined) return chunk;
            if (this.state === 'closed') return null;
            if (this.state === 'errored' && this.failure) throw this.failure;

            if (this.waiter) {
                throw new StreamStateError('Another read is already waiting on this stream');
            }
            await new Promise<void>((resolve) => {
                this.waiter = resolve;
            });
        }
    }

    /**
     * Marks the end of production. Buffered chunks remain readable.
     */
    public close(): void {
        if (this.state !== 'open') return;
        this.state = 'closed';
        this.wake();
    }

    /**
     * Terminates production with an error, reported after buffered chunks.
     */
    public fail(error: Error): void {
        if (this.state !== 'open') return;
        this.state = 'errored';
        this.failure = error;
        this.wake();
    }

    /**
     * Drops everything buffered and finishes the queue.
     */
    public discard(): void {
        this.ring.clear();
        this.staged.length = 0;
        if (this.paused) {
            this.paused = false;
            this.hooks.onResume?.();
        }
        this.close();
    }

    private wake(): void {
        const waiter = this.waiter;
        this.waiter = null;
        waiter?.();
    }
}

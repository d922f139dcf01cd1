/**
 * A fixed-size Ring Buffer (Circular Buffer) implementation.
 *
 * O(1) push and shift without the reindexing cost of `Array.prototype.shift`.
 * Backs the inbound chunk queue, which is drained one chunk per read.
 */
export class RingBuffer<T> {
    private buffer: (T | undefined)[];
    private readonly cap: number;
    private readPtr: number = 0;
    private writePtr: number = 0;
    private count: number = 0;

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new RangeError('RingBuffer capacity must be a positive integer');
        }
        this.cap = capacity;
        this.buffer = new Array<T | undefined>(capacity);
    }

    /**
     * Adds an item to the end of the buffer.
     * If the buffer is full, the oldest item is overwritten and returned.
     */
    public push(item: T): T | undefined {
        let evicted: T | undefined;
        if (this.count === this.cap) {
            evicted = this.buffer[this.readPtr];
            this.readPtr = (this.readPtr + 1) % this.cap;
            this.count--;
        }

        this.buffer[this.writePtr] = item;
        this.writePtr = (this.writePtr + 1) % this.cap;
        this.count++;
        return evicted;
    }

    /**
     * Removes and returns the oldest item from the buffer.
     * Returns undefined if empty.
     */
    public shift(): T | undefined {
        if (this.count === 0) return undefined;

        const item = this.buffer[this.readPtr];
        this.buffer[this.readPtr] = undefined; // GC help
        this.readPtr = (this.readPtr + 1) % this.cap;
        this.count--;

        return item;
    }

    public get length(): number {
        return this.count;
    }

    public get capacity(): number {
        return this.cap;
    }

    public get isFull(): boolean {
        return this.count === this.cap;
    }

    public clear(): void {
        this.readPtr = 0;
        this.writePtr = 0;
        this.count = 0;
        this.buffer.fill(undefined);
    }
}

import { StreamStateError, UnexpectedEndError } from '../errors';
import { ByteAccumulator, EMPTY_BYTES } from '../utils/buffers';
import type { SharedTransport } from '../transport/SharedTransport';
import type { InboundBridge } from './InboundBridge';

/**
 * Read side of a socket stream.
 *
 * Two contracts share one carry-over buffer (the unread rest of the last
 * dequeued chunk) and the bridge's chunk queue:
 *
 * - `read(buf)` copies up to `buf.length` bytes and returns the count. A
 *   result smaller than requested marks a chunk boundary; 0 for a non-empty
 *   `buf` means end-of-stream.
 * - `fillBuffer()` / `consume(n)` expose the buffered bytes without copying.
 *
 * Only one read operation may be pending at a time.
 */
export class ReadHalf implements AsyncIterable<Uint8Array> {
    private carry: Uint8Array = EMPTY_BYTES;
    private busy = false;
    private released = false;

    constructor(
        private readonly bridge: InboundBridge,
        private readonly shared: SharedTransport
    ) {
        shared.retain();
    }

    /** Bytes held in the carry-over buffer */
    public get bufferedLength(): number {
        return this.carry.length;
    }

    /** Chunks waiting in the queue behind the carry-over buffer */
    public get queuedChunks(): number {
        return this.bridge.queue.length;
    }

    /** Chunks discarded by a drop overflow policy */
    public get droppedChunks(): number {
        return this.bridge.queue.droppedChunks;
    }

    public get isReleased(): boolean {
        return this.released;
    }

    public read(buf: Uint8Array): Promise<number> {
        return this.exclusive(() => this.readInto(buf));
    }

    /**
     * Returns every buffered-but-unconsumed byte, waiting for the next chunk
     * when nothing is buffered. Empty at end-of-stream.
     */
    public fillBuffer(): Promise<Uint8Array> {
        return this.exclusive(() => this.fill());
    }

    /**
     * Marks the first `n` bytes returned by `fillBuffer()` as used.
     *
     * @throws {RangeError} if `n` is not an integer within the buffered length
     */
    public consume(n: number): void {
        this.assertUsable();
        if (!Number.isInteger(n) || n < 0 || n > this.carry.length) {
            throw new RangeError(`consume(${n}) is outside the buffered range 0..${this.carry.length}`);
        }
        this.advance(n);
    }

    /**
     * Reads up to and including `delimiter`. Returns fewer bytes, without the
     * delimiter, if the stream ends or fails first; an empty array at
     * end-of-stream. A failure is thrown by the next read.
     */
    public readUntil(delimiter: number): Promise<Uint8Array> {
        if (!Number.isInteger(delimiter) || delimiter < 0 || delimiter > 0xff) {
            return Promise.reject(new RangeError(`Delimiter must be a byte value, got ${delimiter}`));
        }

        return this.exclusive(async () => {
            const out = new ByteAccumulator();
            for (;;) {
                const available = await this.fillAfter(out);
                if (available.length === 0) return out.toBytes();

                const index = available.indexOf(delimiter);
                if (index >= 0) {
                    out.append(available.subarray(0, index + 1));
                    this.advance(index + 1);
                    return out.toBytes();
                }
                out.append(available);
                this.advance(available.length);
            }
        });
    }

    /**
     * Reads exactly `n` bytes.
     *
     * @throws {UnexpectedEndError} if the stream ends first
     */
    public readExact(n: number): Promise<Uint8Array> {
        if (!Number.isInteger(n) || n < 0) {
            return Promise.reject(new RangeError(`readExact length must be a non-negative integer, got ${n}`));
        }

        return this.exclusive(async () => {
            const out = new Uint8Array(n);
            let filled = 0;
            while (filled < n) {
                const available = await this.fill();
                if (available.length === 0) throw new UnexpectedEndError(n, filled);

                const take = Math.min(available.length, n - filled);
                out.set(available.subarray(0, take), filled);
                filled += take;
                this.advance(take);
            }
            return out;
        });
    }

    /**
     * Collects everything until end-of-stream, or until a failure once some
     * bytes are collected.
     */
    public readToEnd(): Promise<Uint8Array> {
        return this.exclusive(async () => {
            const out = new ByteAccumulator();
            for (;;) {
                const available = await this.fillAfter(out);
                if (available.length === 0) return out.toBytes();
                out.append(available);
                this.advance(available.length);
            }
        });
    }

    /**
     * Yields buffered views until end-of-stream.
     */
    public async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array> {
        for (;;) {
            const chunk = await this.fillBuffer();
            if (chunk.length === 0) return;
            this.consume(chunk.length);
            yield chunk;
        }
    }

    /**
     * Stops receiving, discards unread data and gives up this half's share of
     * the transport. A pending read resolves as end-of-stream.
     */
    public release(): void {
        if (this.released) return;
        this.released = true;
        this.carry = EMPTY_BYTES;
        this.bridge.detach();
        this.shared.release();
    }

    private async readInto(buf: Uint8Array): Promise<number> {
        if (buf.length === 0) return 0;

        if (this.carry.length === 0) {
            const chunk = await this.bridge.queue.next();
            if (chunk === null) return 0;

            if (chunk.length <= buf.length) {
                buf.set(chunk);
                return chunk.length;
            }
            this.carry = chunk;
        }

        const amount = Math.min(this.carry.length, buf.length);
        buf.set(this.carry.subarray(0, amount));
        this.advance(amount);
        return amount;
    }

    private async fill(): Promise<Uint8Array> {
        if (this.carry.length === 0) {
            const chunk = await this.bridge.queue.next();
            if (chunk === null || this.released) return EMPTY_BYTES;
            this.carry = chunk;
        }
        return this.carry;
    }

    /**
     * `fill()` for helpers that collect into `out`: a failure after some bytes
     * were collected ends the collection instead. The queue keeps the error,
     * so the next read throws it.
     */
    private async fillAfter(out: ByteAccumulator): Promise<Uint8Array> {
        try {
            return await this.fill();
        } catch (error) {
            if (out.length > 0) return EMPTY_BYTES;
            throw error;
        }
    }

    private advance(n: number): void {
        this.carry = n === this.carry.length ? EMPTY_BYTES : this.carry.subarray(n);
    }

    private async exclusive<T>(op: () => Promise<T>): Promise<T> {
        this.assertUsable();
        if (this.busy) {
            throw new StreamStateError('A read is already in progress on this stream');
        }
        this.busy = true;
        try {
            return await op();
        } finally {
            this.busy = false;
        }
    }

    private assertUsable(): void {
        if (this.released) {
            throw new StreamStateError('Read half has been released');
        }
    }
}

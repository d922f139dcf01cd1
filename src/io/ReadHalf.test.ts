import { describe, it, expect } from 'vitest';
import { ReadHalf } from './ReadHalf';
import { InboundBridge } from './InboundBridge';
import { SharedTransport } from '../transport/SharedTransport';
import { QueueOverflowError, StreamStateError, TransportError, UnexpectedEndError } from '../errors';
import type { OverflowPolicy } from '../config';
import { MockTransport, bytes, flushMicrotasks, silentLogger } from '../test-utils/mocks';

function setup(capacity: number = 4, overflow: OverflowPolicy = 'pause') {
    const transport = new MockTransport('ws://test.local');
    transport.open();
    transport.simulateOpen();
    const logger = silentLogger();
    const bridge = new InboundBridge(transport, { capacity, overflow, isOpen: () => true }, logger);
    bridge.attach();
    const shared = new SharedTransport(transport, logger);
    const reader = new ReadHalf(bridge, shared);
    return { transport, bridge, shared, reader };
}

/** Deterministic pseudo-random sizes in 1..max */
function sizes(seed: number, max: number): () => number {
    let state = seed;
    return () => {
        state = (state * 1103515245 + 12345) % 2147483648;
        return (state % max) + 1;
    };
}

describe('ReadHalf', () => {
    describe('read()', () => {
        it('returns a short read for a chunk smaller than the buffer', async () => {
            const { transport, reader } = setup();
            transport.simulateMessage(bytes(0, 1, 2, 3));

            const buf = new Uint8Array(1024);
            expect(await reader.read(buf)).toBe(4);
            expect(buf.subarray(0, 4)).toEqual(bytes(0, 1, 2, 3));
            expect(buf[4]).toBe(0);
        });

        it('splits a chunk larger than the buffer across reads', async () => {
            const { transport, reader } = setup();
            transport.simulateMessage(bytes(1, 2, 3, 4, 5, 6, 7, 8, 9, 10));

            const first = new Uint8Array(4);
            expect(await reader.read(first)).toBe(4);
            expect(first).toEqual(bytes(1, 2, 3, 4));
            expect(reader.bufferedLength).toBe(6);

            const second = new Uint8Array(3);
            expect(await reader.read(second)).toBe(3);
            expect(second).toEqual(bytes(5, 6, 7));

            const third = new Uint8Array(10).fill(0xff);
            expect(await reader.read(third)).toBe(3);
            expect(third.subarray(0, 3)).toEqual(bytes(8, 9, 10));
            expect(third[3]).toBe(0xff);
            expect(reader.bufferedLength).toBe(0);
        });

        it('drains the carry-over without joining it to the next chunk', async () => {
            const { transport, reader } = setup();
            transport.simulateMessage(bytes(1, 2, 3));
            transport.simulateMessage(bytes(4));

            const buf = new Uint8Array(2);
            expect(await reader.read(buf)).toBe(2);

            const wide = new Uint8Array(10);
            expect(await reader.read(wide)).toBe(1);
            expect(wide[0]).toBe(3);
            expect(await reader.read(wide)).toBe(1);
            expect(wide[0]).toBe(4);
        });

        it('waits for the next message when nothing is buffered', async () => {
            const { transport, reader } = setup();
            const buf = new Uint8Array(8);
            let result: number | null = null;
            const pending = reader.read(buf).then((n) => { result = n; });

            await flushMicrotasks();
            expect(result).toBeNull();

            transport.simulateMessage(bytes(9, 9));
            await pending;
            expect(result).toBe(2);
        });

        it('returns 0 for an empty buffer without waiting', async () => {
            const { reader } = setup();
            expect(await reader.read(new Uint8Array(0))).toBe(0);
        });

        it('returns buffered data, then 0 at end-of-stream', async () => {
            const { transport, reader } = setup();
            transport.simulateMessage(bytes(1, 2));
            transport.simulateClose(1000, 'done');

            const buf = new Uint8Array(8);
            expect(await reader.read(buf)).toBe(2);
            expect(await reader.read(buf)).toBe(0);
            expect(await reader.read(buf)).toBe(0);
        });

        it('skips zero-length and text messages', async () => {
            const { transport, reader } = setup();
            transport.simulateMessage(new Uint8Array(0));
            transport.simulateMessage('hello');
            transport.simulateMessage(bytes(5));

            const buf = new Uint8Array(8);
            expect(await reader.read(buf)).toBe(1);
            expect(buf[0]).toBe(5);
        });

        it('fails with TransportError once buffered data is drained', async () => {
            const { transport, reader } = setup();
            transport.simulateMessage(bytes(1));
            transport.simulateError(new Error('reset'));

            const buf = new Uint8Array(8);
            expect(await reader.read(buf)).toBe(1);

            const failure = reader.read(buf);
            await expect(failure).rejects.toBeInstanceOf(TransportError);
            await expect(reader.read(buf)).rejects.toThrow('Transport error: reset');
        });

        it('rejects a second read while one is pending', async () => {
            const { transport, reader } = setup();
            const first = reader.read(new Uint8Array(4));

            await expect(reader.read(new Uint8Array(4))).rejects.toBeInstanceOf(StreamStateError);
            await expect(reader.fillBuffer()).rejects.toThrow('A read is already in progress on this stream');

            transport.simulateMessage(bytes(1));
            expect(await first).toBe(1);
        });

        it('reassembles the byte sequence for any chunking and buffer sizes', async () => {
            const { transport, reader } = setup(3);
            const payload = Uint8Array.from({ length: 1000 }, (_, i) => (i * 7) % 256);

            const chunkSize = sizes(42, 97);
            for (let offset = 0; offset < payload.length;) {
                const end = Math.min(payload.length, offset + chunkSize());
                transport.simulateMessage(payload.slice(offset, end));
                offset = end;
            }
            transport.simulateClose();

            const received: number[] = [];
            const bufSize = sizes(7, 64);
            for (;;) {
                const buf = new Uint8Array(bufSize());
                const n = await reader.read(buf);
                if (n === 0) break;
                received.push(...buf.subarray(0, n));
            }
            expect(Uint8Array.from(received)).toEqual(payload);
        });
    });

    describe('fillBuffer() / consume()', () => {
        it('returns the same buffered bytes until consumed', async () => {
            const { transport, reader } = setup();
            transport.simulateMessage(bytes(1, 2, 3));

            const a = await reader.fillBuffer();
            const b = await reader.fillBuffer();
            expect(a).toEqual(bytes(1, 2, 3));
            expect(b).toBe(a);
        });

        it('advances past consumed bytes', async () => {
            const { transport, reader } = setup();
            transport.simulateMessage(bytes(1, 2, 3));

            await reader.fillBuffer();
            reader.consume(1);
            expect(await reader.fillBuffer()).toEqual(bytes(2, 3));
            expect(reader.bufferedLength).toBe(2);
        });

        it('fetches the next chunk after a full consume', async () => {
            const { transport, reader } = setup();
            transport.simulateMessage(bytes(1, 2, 3));
            transport.simulateMessage(bytes(4));

            const first = await reader.fillBuffer();
            reader.consume(first.length);
            expect(reader.bufferedLength).toBe(0);
            expect(await reader.fillBuffer()).toEqual(bytes(4));
        });

        it('rejects consume counts outside the buffered range', async () => {
            const { transport, reader } = setup();
            transport.simulateMessage(bytes(1, 2, 3));
            await reader.fillBuffer();

            expect(() => reader.consume(4)).toThrow(RangeError);
            expect(() => reader.consume(-1)).toThrow(RangeError);
            expect(() => reader.consume(1.5)).toThrow('consume(1.5) is outside the buffered range 0..3');
            reader.consume(0);
            expect(reader.bufferedLength).toBe(3);
        });

        it('returns an empty view at end-of-stream', async () => {
            const { transport, reader } = setup();
            transport.simulateClose();
            expect((await reader.fillBuffer()).length).toBe(0);
        });
    });

    describe('readUntil()', () => {
        it('splits on the delimiter regardless of message boundaries', async () => {
            const { transport, reader } = setup();
            transport.simulateMessage(bytes(0, 1));
            transport.simulateMessage(bytes(2, 3, 93, 42));
            transport.simulateMessage(bytes(34, 93, 0, 0, 1, 2));
            transport.simulateMessage(bytes(93));

            expect(await reader.readUntil(93)).toEqual(bytes(0, 1, 2, 3, 93));
            expect(await reader.readUntil(93)).toEqual(bytes(42, 34, 93));
            expect(await reader.readUntil(93)).toEqual(bytes(0, 0, 1, 2, 93));
        });

        it('returns the remainder without a delimiter at end-of-stream', async () => {
            const { transport, reader } = setup();
            transport.simulateMessage(bytes(7, 8));
            transport.simulateClose();

            expect(await reader.readUntil(93)).toEqual(bytes(7, 8));
            expect(await reader.readUntil(93)).toEqual(new Uint8Array(0));
        });

        it('returns collected bytes before a transport failure, which the next read throws', async () => {
            const { transport, reader } = setup();
            transport.simulateMessage(bytes(1, 2, 3));
            transport.simulateError(new Error('reset'));

            expect(await reader.readUntil(93)).toEqual(bytes(1, 2, 3));
            expect(reader.bufferedLength).toBe(0);
            await expect(reader.read(new Uint8Array(8))).rejects.toBeInstanceOf(TransportError);
        });

        it('throws a failure when nothing was collected', async () => {
            const { transport, reader } = setup();
            transport.simulateError(new Error('reset'));

            await expect(reader.readUntil(93)).rejects.toThrow('Transport error: reset');
        });

        it('rejects a delimiter that is not a byte', async () => {
            const { reader } = setup();
            await expect(reader.readUntil(256)).rejects.toBeInstanceOf(RangeError);
        });
    });

    describe('readExact() / readToEnd()', () => {
        it('reads exactly n bytes across chunks', async () => {
            const { transport, reader } = setup();
            transport.simulateMessage(bytes(1, 2));
            transport.simulateMessage(bytes(3, 4, 5));

            expect(await reader.readExact(4)).toEqual(bytes(1, 2, 3, 4));
            expect(reader.bufferedLength).toBe(1);
        });

        it('throws UnexpectedEndError when the stream ends short', async () => {
            const { transport, reader } = setup();
            transport.simulateMessage(bytes(1, 2));
            transport.simulateClose();

            const failure = reader.readExact(5);
            await expect(failure).rejects.toBeInstanceOf(UnexpectedEndError);
            await expect(failure).rejects.toThrow('Unexpected end of stream: wanted 5 bytes, got 2');
        });

        it('readToEnd() returns the kept chunks before an overflow failure', async () => {
            const { transport, reader } = setup(2, 'error');
            transport.simulateMessage(bytes(1));
            transport.simulateMessage(bytes(2));
            transport.simulateMessage(bytes(3));

            expect(await reader.readToEnd()).toEqual(bytes(1, 2));
            await expect(reader.readToEnd()).rejects.toBeInstanceOf(QueueOverflowError);
        });

        it('collects everything until end-of-stream', async () => {
            const { transport, reader } = setup();
            transport.simulateMessage(bytes(1));
            transport.simulateMessage(bytes(2, 3));
            transport.simulateClose();

            expect(await reader.readToEnd()).toEqual(bytes(1, 2, 3));
        });
    });

    it('iterates chunks until end-of-stream', async () => {
        const { transport, reader } = setup();
        transport.simulateMessage(bytes(1));
        transport.simulateMessage(bytes(2, 3));
        transport.simulateClose();

        const chunks: number[][] = [];
        for await (const chunk of reader) {
            chunks.push(Array.from(chunk));
        }
        expect(chunks).toEqual([[1], [2, 3]]);
    });

    it('pauses the transport at capacity and resumes as the reader drains', async () => {
        const { transport, reader } = setup(2);
        transport.simulateMessage(bytes(1));
        transport.simulateMessage(bytes(2));
        transport.simulateMessage(bytes(3));

        expect(transport.pauseCalls).toBe(1);
        expect(transport.paused).toBe(true);
        expect(reader.queuedChunks).toBe(3);

        const buf = new Uint8Array(8);
        expect(await reader.read(buf)).toBe(1);
        expect(transport.resumeCalls).toBe(0);
        expect(await reader.read(buf)).toBe(1);
        expect(transport.resumeCalls).toBe(1);
        expect(transport.paused).toBe(false);
        expect(await reader.read(buf)).toBe(1);
        expect(buf[0]).toBe(3);
    });

    it('counts chunks dropped under drop-newest', async () => {
        const { transport, reader } = setup(2, 'drop-newest');
        transport.simulateMessage(bytes(1));
        transport.simulateMessage(bytes(2));
        transport.simulateMessage(bytes(3));
        transport.simulateClose();

        expect(reader.droppedChunks).toBe(1);
        expect(await reader.readToEnd()).toEqual(bytes(1, 2));
        expect(transport.pauseCalls).toBe(0);
    });

    describe('release()', () => {
        it('ends a pending read and closes the transport with the last share', async () => {
            const { transport, shared, reader } = setup();
            const pending = reader.read(new Uint8Array(4));

            reader.release();

            expect(await pending).toBe(0);
            expect(reader.isReleased).toBe(true);
            expect(shared.refCount).toBe(0);
            expect(transport.closeCalls).toBe(1);
        });

        it('rejects reads after release', async () => {
            const { reader } = setup();
            reader.release();
            reader.release();

            await expect(reader.read(new Uint8Array(4))).rejects.toThrow('Read half has been released');
            expect(() => reader.consume(0)).toThrow(StreamStateError);
        });
    });
});

import { EventEmitter as NodeEventEmitter } from 'events';
import { vi } from 'vitest';
import type WebSocket from 'ws';
import { SendError } from '../errors';
import { EventEmitter } from '../utils/EventEmitter';
import { Logger, LogLevel } from '../utils/Logger';
import type { Transport, TransportEvents, TransportStatus } from '../transport/Transport';
import type { SocketFactory } from '../transport/WebSocketTransport';

export interface MockTransportOptions {
    /** Fire `open` on the next microtask after open() */
    autoOpen?: boolean;
    /** Deliver every sent message back as an inbound message */
    echo?: boolean;
}

/**
 * In-process Transport. Events are driven by the test through the
 * simulate* methods; close() completes on the next microtask.
 */
export class MockTransport extends EventEmitter<TransportEvents> implements Transport {
    static instances: MockTransport[] = [];

    public status: TransportStatus = 'IDLE';
    public readonly sent: Uint8Array[] = [];
    public openCalls = 0;
    public closeCalls = 0;
    public pauseCalls = 0;
    public resumeCalls = 0;
    public paused = false;

    constructor(public readonly url: string, private readonly options: MockTransportOptions = {}) {
        super();
        MockTransport.instances.push(this);
    }

    public open(): void {
        this.openCalls++;
        this.setStatus('CONNECTING');
        if (this.options.autoOpen) {
            queueMicrotask(() => this.simulateOpen());
        }
    }

    public getStatus(): TransportStatus {
        return this.status;
    }

    public send(data: Uint8Array): void {
        if (this.status !== 'OPEN') {
            throw new SendError(`Cannot send on a transport that is ${this.status.toLowerCase()}`);
        }
        const copy = data.slice();
        this.sent.push(copy);
        if (this.options.echo) {
            queueMicrotask(() => this.simulateMessage(copy.slice()));
        }
    }

    public close(code: number = 1000, reason: string = ''): void {
        this.closeCalls++;
        if (this.status === 'CLOSING' || this.status === 'CLOSED') return;
        this.setStatus('CLOSING');
        queueMicrotask(() => this.simulateClose(code, reason));
    }

    public pause(): void {
        this.pauseCalls++;
        this.paused = true;
    }

    public resume(): void {
        this.resumeCalls++;
        this.paused = false;
    }

    public simulateOpen(): void {
        this.setStatus('OPEN');
        this.emit('open');
    }

    public simulateMessage(payload: unknown): void {
        this.emit('message', payload);
    }

    public simulateError(error: Error): void {
        this.emit('error', error);
    }

    public simulateClose(code: number = 1000, reason: string = ''): void {
        if (this.status === 'CLOSED') return;
        this.setStatus('CLOSED');
        this.emit('close', code, reason);
    }

    private setStatus(status: TransportStatus): void {
        if (this.status === status) return;
        this.status = status;
        this.emit('status', status);
    }
}

/**
 * Stand-in for a `ws` client socket: a Node EventEmitter with the socket
 * methods the transport calls replaced by spies.
 */
export class MockSocket extends NodeEventEmitter {
    static CONNECTING = 0;
    static OPEN = 1;
    static CLOSING = 2;
    static CLOSED = 3;

    public readyState = MockSocket.CONNECTING;
    public binaryType = 'nodebuffer';

    send = vi.fn((_data: unknown, cb?: (err?: Error) => void) => {
        cb?.();
    });
    close = vi.fn((_code?: number, _reason?: string) => {
        this.readyState = MockSocket.CLOSING;
    });
    terminate = vi.fn(() => {
        this.readyState = MockSocket.CLOSED;
    });
    pause = vi.fn();
    resume = vi.fn();

    constructor(
        public readonly url: string,
        public readonly protocols?: string[],
        public readonly options?: WebSocket.ClientOptions
    ) {
        super();
    }

    simulateOpen(): void {
        this.readyState = MockSocket.OPEN;
        this.emit('open');
    }

    simulateMessage(data: unknown, isBinary: boolean = true): void {
        this.emit('message', data, isBinary);
    }

    simulateError(error: Error): void {
        this.emit('error', error);
    }

    simulateClose(code: number = 1000, reason: string = ''): void {
        this.readyState = MockSocket.CLOSED;
        this.emit('close', code, Buffer.from(reason));
    }
}

/**
 * Socket factory that records every MockSocket it creates.
 */
export function createMockSocketFactory(): { factory: SocketFactory; sockets: MockSocket[] } {
    const sockets: MockSocket[] = [];
    const factory: SocketFactory = (url, protocols, options) => {
        const socket = new MockSocket(url, protocols, options);
        sockets.push(socket);
        return socket as unknown as WebSocket;
    };
    return { factory, sockets };
}

/**
 * Waits for queued microtasks and promise callbacks to run.
 */
export function flushMicrotasks(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
}

export function bytes(...values: number[]): Uint8Array {
    return new Uint8Array(values);
}

/**
 * Logger that prints nothing; children inherit the level.
 */
export function silentLogger(): Logger {
    const logger = new Logger('test');
    logger.setLogLevel(LogLevel.NONE);
    return logger;
}

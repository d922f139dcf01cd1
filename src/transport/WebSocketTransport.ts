import WebSocket from 'ws';
import { SendError, toError } from '../errors';
import { EventEmitter } from '../utils/EventEmitter';
import { Logger } from '../utils/Logger';
import type { BinaryType } from '../config';
import type { Transport, TransportEvents, TransportStatus } from './Transport';

export type SocketFactory = (
    url: string,
    protocols: string[] | undefined,
    options: WebSocket.ClientOptions
) => WebSocket;

export interface WebSocketTransportConfig {
    protocols?: string[];
    headers?: Record<string, string>;
    /** Handshake timeout handed to `ws`, in ms */
    handshakeTimeout?: number;
    /** How `ws` hands out binary messages (default: 'nodebuffer') */
    binaryType?: BinaryType;
    /** Creates the underlying socket (default: `new WebSocket(...)` from `ws`) */
    createSocket?: SocketFactory;
}

const NORMAL_CLOSURE = 1000;
const ABNORMAL_CLOSURE = 1006;

const defaultSocketFactory: SocketFactory = (url, protocols, options) =>
    new WebSocket(url, protocols, options);

/**
 * Transport over a `ws` client socket.
 *
 * Single use: once closed, a new transport is needed to reconnect. Binary
 * messages are emitted as they arrive; text frames are emitted as strings so
 * the consumer can decide to skip them.
 */
export class WebSocketTransport extends EventEmitter<TransportEvents> implements Transport {
    private ws: WebSocket | null = null;
    private status: TransportStatus = 'IDLE';
    private paused = false;
    private readonly config: WebSocketTransportConfig;
    private readonly logger: Logger;

    constructor(public readonly url: string, config: WebSocketTransportConfig = {}, logger?: Logger) {
        super();
        this.config = { ...config };
        this.logger = logger ?? new Logger('wsio:transport');
    }

    public getStatus(): TransportStatus {
        return this.status;
    }

    public open(): void {
        if (this.status !== 'IDLE') return;

        this.setStatus('CONNECTING');
        this.logger.conn(`Connecting to ${this.url}`);

        const options: WebSocket.ClientOptions = {};
        if (this.config.headers) options.headers = { ...this.config.headers };
        if (this.config.handshakeTimeout !== undefined) options.handshakeTimeout = this.config.handshakeTimeout;

        let ws: WebSocket;
        try {
            const factory = this.config.createSocket ?? defaultSocketFactory;
            ws = factory(this.url, this.config.protocols, options);
        } catch (e) {
            const error = toError(e);
            this.logger.warn(`Could not create socket for ${this.url}`, error);
            this.setStatus('CLOSED');
            this.emit('error', error);
            this.emit('close', ABNORMAL_CLOSURE, error.message);
            return;
        }

        ws.binaryType = this.config.binaryType ?? 'nodebuffer';
        ws.on('open', () => this.handleOpen());
        ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => this.handleRawMessage(data, isBinary));
        ws.on('error', (err: Error) => {
            this.logger.debug(`Socket error on ${this.url}: ${err.message}`);
            this.emit('error', err);
        });
        ws.on('close', (code: number, reason: Buffer) => this.handleClose(code, reason.toString('utf8')));
        this.ws = ws;
    }

    public send(data: Uint8Array): void {
        const ws = this.ws;
        if (!ws || this.status !== 'OPEN') {
            throw new SendError(`Cannot send on a transport that is ${this.status.toLowerCase()}`);
        }

        try {
            ws.send(data, (err?: Error) => {
                if (err) this.logger.warn(`Send of ${data.length} bytes failed after hand-off`, err);
            });
        } catch (e) {
            throw new SendError(`Send of ${data.length} bytes failed`, toError(e));
        }
    }

    public close(code: number = NORMAL_CLOSURE, reason: string = ''): void {
        if (this.status === 'CLOSING' || this.status === 'CLOSED') return;

        const ws = this.ws;
        if (!ws) {
            this.setStatus('CLOSED');
            this.emit('close', code, reason);
            return;
        }

        this.setStatus('CLOSING');
        this.logger.conn(`Closing ${this.url} (code ${code})`);
        try {
            ws.close(code, reason);
        } catch (e) {
            // ws rejects codes it considers invalid; fall back to a hard close.
            this.logger.warn('Graceful close failed, terminating socket', toError(e));
            ws.terminate();
        }
    }

    public pause(): void {
        if (this.paused) return;
        this.paused = true;
        if (this.status === 'OPEN') this.ws?.pause();
        this.logger.debug('Inbound flow paused');
    }

    public resume(): void {
        if (!this.paused) return;
        this.paused = false;
        if (this.status === 'OPEN') this.ws?.resume();
        this.logger.debug('Inbound flow resumed');
    }

    public get isPaused(): boolean {
        return this.paused;
    }

    private handleOpen(): void {
        this.setStatus('OPEN');
        this.logger.conn(`Connected to ${this.url}`);
        if (this.paused) this.ws?.pause();
        this.emit('open');
    }

    private handleRawMessage(data: WebSocket.RawData, isBinary: boolean): void {
        if (!isBinary) {
            this.emit('message', Buffer.isBuffer(data) ? data.toString('utf8') : String(data));
            return;
        }
        this.emit('message', data);
    }

    private handleClose(code: number, reason: string): void {
        this.ws = null;
        this.setStatus('CLOSED');
        this.logger.conn(`Connection to ${this.url} closed (code ${code}${reason ? `, ${reason}` : ''})`);
        this.emit('close', code, reason);
    }

    private setStatus(s: TransportStatus): void {
        if (this.status === s) return;
        this.status = s;
        this.emit('status', s);
    }
}

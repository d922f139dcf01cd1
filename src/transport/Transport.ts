
/**
 * The event-driven, message-oriented connection the byte stream is built on.
 * This decouples the stream machinery from the socket implementation (the
 * `ws` package in Node, a browser WebSocket, or an in-memory pair in tests).
 */
export type TransportStatus = 'IDLE' | 'CONNECTING' | 'OPEN' | 'CLOSING' | 'CLOSED';

export interface TransportEvents {
    status: [status: TransportStatus];
    open: [];
    message: [payload: unknown];              // Raw payload, decoded by the inbound bridge
    error: [error: Error];
    close: [code: number, reason: string];
}

export interface Transport {
    readonly url: string;

    /** Starts connecting. Outcome is reported through `open`, `error` and `close`. */
    open(): void;
    getStatus(): TransportStatus;

    /**
     * Hands bytes to the connection without buffering.
     * @throws {SendError} if the transport is not open or the send fails
     */
    send(data: Uint8Array): void;

    /** Starts teardown. Safe to call in any state, more than once. */
    close(code?: number, reason?: string): void;

    // Flow control for inbound messages
    pause(): void;
    resume(): void;

    on<K extends keyof TransportEvents>(
        event: K,
        handler: (...args: TransportEvents[K]) => void
    ): () => void;
}

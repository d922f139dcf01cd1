/**
 * Error types for wsio.
 *
 * Every failure the stream surfaces carries a stable `code` so callers can
 * branch on the failure mode without string matching.
 */

/**
 * Base class for all wsio errors.
 */
export class WsioError extends Error {
    constructor(message: string, public readonly code: string) {
        super(message);
        this.name = 'WsioError';
        // Maintains proper stack trace for where error was thrown (V8 only)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, WsioError);
        }
    }
}

/**
 * Thrown when connect options or the address are invalid.
 */
export class ConfigurationError extends WsioError {
    constructor(message: string) {
        super(message, 'CONFIGURATION_ERROR');
        this.name = 'ConfigurationError';
    }
}

/**
 * Thrown when the transport fails to open, is refused, or times out.
 */
export class ConnectionError extends WsioError {
    constructor(
        message: string,
        public readonly cause?: Error
    ) {
        super(message, 'CONNECTION_ERROR');
        this.name = 'ConnectionError';
    }
}

/**
 * Thrown by a write when the transport cannot accept bytes.
 */
export class SendError extends WsioError {
    constructor(
        message: string,
        public readonly cause?: Error
    ) {
        super(message, 'SEND_ERROR');
        this.name = 'SendError';
    }
}

/**
 * An error event raised by the transport after it was open.
 * Terminal for the read half.
 */
export class TransportError extends WsioError {
    constructor(
        message: string,
        public readonly cause?: Error
    ) {
        super(message, 'TRANSPORT_ERROR');
        this.name = 'TransportError';
    }
}

/**
 * Thrown when the inbound queue exceeds capacity under the `error` overflow policy.
 */
export class QueueOverflowError extends WsioError {
    constructor(capacity: number) {
        super(
            `Inbound queue exceeded maximum capacity of ${capacity} chunks. ` +
            'Consider increasing queueCapacity or using the pause overflow policy.',
            'QUEUE_OVERFLOW_ERROR'
        );
        this.name = 'QueueOverflowError';
    }
}

/**
 * Thrown when a stream half is used in a state that does not allow the call.
 */
export class StreamStateError extends WsioError {
    constructor(message: string) {
        super(message, 'STREAM_STATE_ERROR');
        this.name = 'StreamStateError';
    }
}

/**
 * Thrown when the stream ends before an exact-length read is satisfied.
 */
export class UnexpectedEndError extends WsioError {
    constructor(
        public readonly expected: number,
        public readonly received: number
    ) {
        super(
            `Unexpected end of stream: wanted ${expected} bytes, got ${received}`,
            'UNEXPECTED_END_ERROR'
        );
        this.name = 'UnexpectedEndError';
    }
}

/**
 * Normalizes anything thrown or emitted into an Error instance.
 */
export function toError(value: unknown): Error {
    if (value instanceof Error) return value;
    if (typeof value === 'string') return new Error(value);
    return new Error(`Non-error value: ${String(value)}`);
}

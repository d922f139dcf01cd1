/**
 * wsio - read and write a WebSocket as an async byte stream
 *
 * Messages arriving on the socket are queued as chunks and handed out by
 * byte count; writes go out as one message each.
 *
 * @example
 * ```typescript
 * import { connect } from 'wsio';
 *
 * const stream = await connect('localhost:8000');
 * const [reader, writer] = stream.split();
 *
 * writer.write(new Uint8Array([42, 34, 93]));
 *
 * const buf = new Uint8Array(1024);
 * const n = await reader.read(buf);
 * ```
 *
 * @packageDocumentation
 */

export { connect, connectSecure, connectUrl, createWebSocketTransport } from './connect';

// Stream halves
export { SocketStream } from './io/SocketStream';
export type { SocketStreamEvents } from './io/SocketStream';
export { ReadHalf } from './io/ReadHalf';
export { WriteHalf } from './io/WriteHalf';
export { ChunkQueue } from './io/ChunkQueue';
export type { QueueState, ChunkQueueHooks } from './io/ChunkQueue';

// Transports
export type { Transport, TransportEvents, TransportStatus } from './transport/Transport';
export { WebSocketTransport } from './transport/WebSocketTransport';
export type { WebSocketTransportConfig, SocketFactory } from './transport/WebSocketTransport';

// Configuration
export {
    ConnectOptionsSchema,
    DEFAULT_QUEUE_CAPACITY,
    DEFAULT_CONNECT_TIMEOUT,
    DEFAULT_CLOSE_TIMEOUT,
} from './config';
export type {
    ConnectOptions,
    ConnectSettings,
    OverflowPolicy,
    BinaryType,
    TransportFactory,
} from './config';

// Errors
export {
    WsioError,
    ConfigurationError,
    ConnectionError,
    SendError,
    TransportError,
    QueueOverflowError,
    StreamStateError,
    UnexpectedEndError,
} from './errors';

// Logging
export { Logger, LogLevel } from './utils/Logger';

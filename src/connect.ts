import {
    buildUrl,
    resolveConnectOptions,
    validateUrl,
    type ConnectOptions,
    type ConnectSettings,
    type TransportFactory,
} from './config';
import { ConnectionError, toError, type TransportError } from './errors';
import { InboundBridge } from './io/InboundBridge';
import { ReadySignal } from './io/ReadySignal';
import { SocketStream } from './io/SocketStream';
import { SharedTransport } from './transport/SharedTransport';
import { WebSocketTransport } from './transport/WebSocketTransport';
import type { Transport } from './transport/Transport';
import { Logger, LogLevel } from './utils/Logger';

/**
 * Opens `ws://<address>` and resolves once the socket is open.
 *
 * @example
 * ```typescript
 * const stream = await connect('localhost:8000');
 * const [reader, writer] = stream.split();
 * writer.write(new Uint8Array([0, 1, 2, 3, 93]));
 * const line = await reader.readUntil(93);
 * ```
 *
 * @throws {ConfigurationError} for an invalid address or options
 * @throws {ConnectionError} if the socket fails to open or times out
 */
export function connect(address: string, options?: ConnectOptions): Promise<SocketStream> {
    return openStream(() => buildUrl('ws', address), options);
}

/**
 * Opens `wss://<address>`. Same contract as {@link connect}.
 */
export function connectSecure(address: string, options?: ConnectOptions): Promise<SocketStream> {
    return openStream(() => buildUrl('wss', address), options);
}

/**
 * Opens a full `ws:` or `wss:` URL, path and query included.
 */
export function connectUrl(url: string, options?: ConnectOptions): Promise<SocketStream> {
    return openStream(() => validateUrl(url), options);
}

export const createWebSocketTransport: TransportFactory = (url, settings, logger) =>
    new WebSocketTransport(url, {
        protocols: settings.protocols,
        headers: settings.headers,
        handshakeTimeout: settings.handshakeTimeout,
        binaryType: settings.binaryType,
    }, logger);

async function openStream(makeUrl: () => string, options?: ConnectOptions): Promise<SocketStream> {
    const url = makeUrl();
    const { settings, transportFactory, logger: parentLogger } = resolveConnectOptions(options);

    const root = parentLogger ?? new Logger('wsio');
    const scoped = (tag: string): Logger => {
        const child = root.child(tag);
        if (settings.debug) child.setLogLevel(LogLevel.DEBUG);
        return child;
    };
    const log = scoped('connect');

    const transport = (transportFactory ?? createWebSocketTransport)(url, settings, scoped('transport'));
    const ready = new ReadySignal();

    let stream: SocketStream | null = null;
    // Errors between the open event and the stream's construction wait here.
    const heldErrors: TransportError[] = [];
    const bridge = new InboundBridge(transport, {
        capacity: settings.queueCapacity,
        overflow: settings.overflow,
        isOpen: () => ready.isFired,
        onTransportError: (error) => {
            if (stream) stream.reportError(error);
            else heldErrors.push(error);
        },
    }, scoped('bridge'));

    // Sinks go in before the transport starts, so no early message is missed.
    bridge.attach();
    transport.on('open', () => {
        if (!ready.fire()) log.debug('Ignoring repeated open event');
    });

    try {
        await waitForOpen(transport, ready, settings, log);
    } catch (error) {
        bridge.detach();
        try {
            transport.close();
        } catch (e) {
            log.warn(`Could not close ${url} after a failed connect`, toError(e));
        }
        throw error;
    }

    const shared = new SharedTransport(transport, scoped('shared'));
    const opened = new SocketStream(url, shared, bridge, settings.closeTimeout, scoped('stream'));
    stream = opened;
    if (heldErrors.length > 0) {
        // Give the caller a turn to subscribe before replaying.
        setImmediate(() => {
            for (const error of heldErrors) opened.reportError(error);
        });
    }
    log.conn(`Stream ready on ${url}`);
    return opened;
}

function waitForOpen(
    transport: Transport,
    ready: ReadySignal,
    settings: ConnectSettings,
    log: Logger
): Promise<void> {
    const url = transport.url;
    let failWith: (error: ConnectionError) => void = () => { };
    const failure = new Promise<never>((_, reject) => {
        failWith = reject;
    });

    const timer = setTimeout(() => {
        failWith(new ConnectionError(`Timed out after ${settings.connectTimeout}ms connecting to ${url}`));
    }, settings.connectTimeout);
    const offError = transport.on('error', (error) => {
        failWith(new ConnectionError(`Failed to connect to ${url}: ${error.message}`, error));
    });
    const offClose = transport.on('close', (code, reason) => {
        failWith(new ConnectionError(
            `Connection to ${url} closed before opening (code ${code}${reason ? `, ${reason}` : ''})`
        ));
    });

    const opened = Promise.race([ready.wait(), failure]).finally(() => {
        clearTimeout(timer);
        offError();
        offClose();
    });

    log.conn(`Opening ${url}`);
    try {
        transport.open();
    } catch (e) {
        const error = toError(e);
        failWith(new ConnectionError(`Failed to connect to ${url}: ${error.message}`, error));
    }
    return opened;
}

import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { Logger } from './utils/Logger';
import type { Transport } from './transport/Transport';

/**
 * How the inbound queue reacts when a chunk arrives and it is already full.
 *
 * - `pause`: stop reading from the transport until the reader catches up.
 *   Chunks already in flight are kept.
 * - `drop-newest`: discard the arriving chunk.
 * - `drop-oldest`: evict the oldest queued chunk.
 * - `error`: terminate the read side with a QueueOverflowError.
 */
export const OverflowPolicySchema = z.enum(['pause', 'drop-newest', 'drop-oldest', 'error']);
export type OverflowPolicy = z.infer<typeof OverflowPolicySchema>;

export const BinaryTypeSchema = z.enum(['nodebuffer', 'arraybuffer', 'fragments']);
export type BinaryType = z.infer<typeof BinaryTypeSchema>;

export const DEFAULT_QUEUE_CAPACITY = 4;
export const DEFAULT_CONNECT_TIMEOUT = 30000;
export const DEFAULT_CLOSE_TIMEOUT = 5000;

export const ConnectOptionsSchema = z.object({
    /** Inbound chunks held before the overflow policy applies (default: 4) */
    queueCapacity: z.number().int().positive().default(DEFAULT_QUEUE_CAPACITY),
    overflow: OverflowPolicySchema.default('pause'),
    /** Time allowed for the transport to open, in ms (default: 30000) */
    connectTimeout: z.number().int().positive().default(DEFAULT_CONNECT_TIMEOUT),
    /** Time close() waits for the transport to report closed, in ms (default: 5000) */
    closeTimeout: z.number().int().positive().default(DEFAULT_CLOSE_TIMEOUT),
    protocols: z.array(z.string().min(1)).optional(),
    headers: z.record(z.string()).optional(),
    handshakeTimeout: z.number().int().positive().optional(),
    binaryType: BinaryTypeSchema.default('nodebuffer'),
    debug: z.boolean().default(false),
}).strict();

export type ConnectSettings = z.infer<typeof ConnectOptionsSchema>;

/**
 * Creates the transport for a connection. Receives the resolved settings and
 * a logger already tagged for the transport.
 */
export type TransportFactory = (url: string, settings: ConnectSettings, logger: Logger) => Transport;

export type ConnectOptions = z.input<typeof ConnectOptionsSchema> & {
    /** Replaces the default `ws` transport, e.g. for tests or other hosts */
    transportFactory?: TransportFactory;
    /** Parent logger; a child tagged per component is derived from it */
    logger?: Logger;
};

export interface ResolvedConnectOptions {
    settings: ConnectSettings;
    transportFactory?: TransportFactory;
    logger?: Logger;
}

/**
 * Validates connect options and applies defaults.
 *
 * @throws {ConfigurationError} listing every invalid field
 */
export function resolveConnectOptions(options: ConnectOptions = {}): ResolvedConnectOptions {
    const { transportFactory, logger, ...data } = options;
    const result = ConnectOptionsSchema.safeParse(data);

    if (!result.success) {
        const errorMessages = result.error.issues
            .map(e => `${e.path.join('.') || '(root)'}: ${e.message}`)
            .join(', ');
        throw new ConfigurationError(`Invalid connect options: ${errorMessages}`);
    }

    return { settings: result.data, transportFactory, logger };
}

/**
 * Builds a WebSocket URL from a scheme and a bare address such as
 * `localhost:8000` or `example.com/socket`.
 */
export function buildUrl(scheme: 'ws' | 'wss', address: string): string {
    if (address.trim().length === 0) {
        throw new ConfigurationError('Address must not be empty');
    }
    if (address.includes('://')) {
        throw new ConfigurationError(`Address must not include a scheme: ${address}`);
    }
    return validateUrl(`${scheme}://${address}`);
}

/**
 * Checks that a URL parses and uses a WebSocket scheme.
 */
export function validateUrl(url: string): string {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch {
        throw new ConfigurationError(`Invalid WebSocket URL: ${url}`);
    }
    if (parsed.protocol !== 'ws:' && parsed.protocol !== 'wss:') {
        throw new ConfigurationError(`Unsupported URL scheme: ${parsed.protocol}`);
    }
    return url;
}

import { toError } from '../errors';
import { toBytes } from '../utils/buffers';
import { Logger } from '../utils/Logger';

type Decoded = { ok: true; bytes: Uint8Array } | { ok: false; error: Error };

/**
 * Turns raw transport payloads into chunks, preserving delivery order.
 *
 * Synchronous payloads go straight to the sink when nothing is in flight.
 * Payloads that need an async read (Blob) start decoding immediately, so
 * decodes overlap, but chunks reach the sink strictly in the order the
 * payloads were pushed.
 */
export class PayloadDecoder {
    private tail: Promise<void> = Promise.resolve();
    private inFlight = 0;
    private skipped = 0;

    constructor(
        private readonly sink: (chunk: Uint8Array) => void,
        private readonly onFailure: (error: Error) => void,
        private readonly logger: Logger = new Logger('wsio:decoder')
    ) { }

    public get pending(): number {
        return this.inFlight;
    }

    public get skippedPayloads(): number {
        return this.skipped;
    }

    public push(payload: unknown): void {
        const decoded = toBytes(payload);
        if (decoded === null) {
            this.skipped++;
            this.logger.debug(`Ignoring non-binary payload (${describe(payload)})`);
            return;
        }

        if (decoded instanceof Uint8Array && this.inFlight === 0) {
            this.sink(decoded);
            return;
        }

        // Settle now so a rejected decode is handled even while it waits its turn.
        const settled: Promise<Decoded> = Promise.resolve(decoded).then(
            (bytes) => ({ ok: true as const, bytes }),
            (error: unknown) => ({ ok: false as const, error: toError(error) })
        );
        this.enqueue(async () => {
            const result = await settled;
            if (result.ok) {
                this.sink(result.bytes);
            } else {
                this.logger.warn('Failed to decode inbound payload', result.error);
                this.onFailure(result.error);
            }
        });
    }

    /**
     * Runs `action` after every payload pushed so far has reached the sink.
     */
    public settle(action: () => void): void {
        if (this.inFlight === 0) {
            action();
            return;
        }
        this.enqueue(async () => action());
    }

    private enqueue(step: () => Promise<void>): void {
        this.inFlight++;
        this.tail = this.tail
            .then(step)
            .catch((err: unknown) => {
                this.logger.error('Inbound delivery step failed', err);
                this.onFailure(toError(err));
            })
            .finally(() => {
                this.inFlight--;
            });
    }
}

function describe(payload: unknown): string {
    if (typeof payload === 'string') return `text, ${payload.length} chars`;
    if (payload === null) return 'null';
    if (typeof payload === 'object') return payload.constructor?.name ?? 'object';
    return typeof payload;
}

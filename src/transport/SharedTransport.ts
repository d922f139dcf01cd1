import { Logger } from '../utils/Logger';
import { StreamStateError } from '../errors';
import type { Transport } from './Transport';

/**
 * Reference-counted access to one transport from several owners.
 *
 * Each stream half holds one share. The transport is closed when the last
 * share is released, or earlier through an explicit `close()`. Both paths are
 * idempotent.
 */
export class SharedTransport {
    private shares = 0;
    private closed = false;
    private closedPromise: Promise<void> | null = null;

    constructor(
        public readonly transport: Transport,
        private readonly logger: Logger = new Logger('wsio:shared')
    ) { }

    public get refCount(): number {
        return this.shares;
    }

    public retain(): void {
        if (this.closed) {
            throw new StreamStateError('Cannot share a transport that has been closed');
        }
        this.shares++;
    }

    public release(): void {
        if (this.shares === 0) return;
        this.shares--;
        this.logger.debug(`Share released, ${this.shares} remaining`);
        if (this.shares === 0) {
            this.close();
        }
    }

    public send(data: Uint8Array): void {
        this.transport.send(data);
    }

    public close(): void {
        if (this.closed) return;
        this.closed = true;
        this.transport.close();
    }

    /**
     * Resolves once the transport reports CLOSED, or after `timeoutMs`.
     * Never rejects.
     */
    public whenClosed(timeoutMs: number): Promise<void> {
        if (this.transport.getStatus() === 'CLOSED') return Promise.resolve();
        if (this.closedPromise) return this.closedPromise;

        this.closedPromise = new Promise<void>((resolve) => {
            const finish = () => {
                clearTimeout(timer);
                offClose();
                resolve();
            };
            const timer = setTimeout(() => {
                this.logger.warn(`Transport did not report closed within ${timeoutMs}ms`);
                finish();
            }, timeoutMs);
            const offClose = this.transport.on('close', finish);
        });
        return this.closedPromise;
    }
}

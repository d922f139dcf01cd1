import { StreamStateError, toError } from '../errors';
import { Logger } from '../utils/Logger';
import type { SharedTransport } from '../transport/SharedTransport';

/**
 * Write side of a socket stream. Writes go straight to the transport's send
 * primitive: no buffering, no partial writes, no retries.
 */
export class WriteHalf {
    private released = false;
    private closing: Promise<void> | null = null;

    constructor(
        private readonly shared: SharedTransport,
        private readonly closeTimeout: number,
        private readonly logger: Logger = new Logger('wsio:writer')
    ) {
        shared.retain();
    }

    public get isReleased(): boolean {
        return this.released;
    }

    /**
     * Sends all of `data` as one message.
     *
     * @returns `data.length`
     * @throws {SendError} if the transport is not open or rejects the bytes
     * @throws {StreamStateError} after `release()`
     */
    public write(data: Uint8Array): number {
        if (this.released) {
            throw new StreamStateError('Write half has been released');
        }
        this.shared.send(data);
        return data.length;
    }

    /**
     * Nothing is buffered on this side, so there is nothing to flush.
     */
    public flush(): Promise<void> {
        if (this.released) {
            return Promise.reject(new StreamStateError('Write half has been released'));
        }
        return Promise.resolve();
    }

    /**
     * Closes the transport for both halves. Resolves once the transport has
     * closed or the close timeout passed; never rejects.
     */
    public close(): Promise<void> {
        if (this.closing) return this.closing;

        try {
            this.shared.close();
        } catch (e) {
            this.logger.warn('Transport reported an error while closing', toError(e));
        }
        this.closing = this.shared.whenClosed(this.closeTimeout);
        return this.closing;
    }

    /**
     * Gives up this half's share of the transport. The transport stays open
     * while the read half is still held.
     */
    public release(): void {
        if (this.released) return;
        this.released = true;
        this.shared.release();
    }
}

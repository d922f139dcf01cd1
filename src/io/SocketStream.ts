import { StreamStateError } from '../errors';
import { EventEmitter } from '../utils/EventEmitter';
import { Logger } from '../utils/Logger';
import type { SharedTransport } from '../transport/SharedTransport';
import type { TransportError } from '../errors';
import type { InboundBridge } from './InboundBridge';
import { ReadHalf } from './ReadHalf';
import { WriteHalf } from './WriteHalf';

export interface SocketStreamEvents {
    /** Transport failure after open; the read half fails with the same error */
    error: [error: TransportError];
    close: [code: number, reason: string];
}

/**
 * An open socket presented as a byte stream. Use `split()` to get the
 * independent read and write halves.
 */
export class SocketStream extends EventEmitter<SocketStreamEvents> {
    private consumed = false;

    constructor(
        public readonly url: string,
        private readonly shared: SharedTransport,
        private readonly bridge: InboundBridge,
        private readonly closeTimeout: number,
        private readonly logger: Logger = new Logger('wsio:stream')
    ) {
        super();
        shared.transport.on('close', (code, reason) => this.emit('close', code, reason));
    }

    public get isSplit(): boolean {
        return this.consumed;
    }

    /**
     * Consumes the handle and returns its two halves. The transport closes
     * once both halves are released (or either half calls `close()` on the
     * writer).
     */
    public split(): [ReadHalf, WriteHalf] {
        this.take();
        const reader = new ReadHalf(this.bridge, this.shared);
        const writer = new WriteHalf(this.shared, this.closeTimeout, this.logger.child('writer'));
        return [reader, writer];
    }

    /**
     * Emits a transport failure raised after open. Reads see the same error
     * once the buffered data is drained.
     */
    public reportError(error: TransportError): void {
        if (this.listenerCount('error') === 0) {
            this.logger.warn(`No error listener on ${this.url}: ${error.message}`);
        }
        this.emit('error', error);
    }

    /**
     * Closes an unsplit handle.
     */
    public close(): Promise<void> {
        this.take();
        this.bridge.detach();
        this.shared.close();
        return this.shared.whenClosed(this.closeTimeout);
    }

    private take(): void {
        if (this.consumed) {
            throw new StreamStateError('Socket stream has already been split or closed');
        }
        this.consumed = true;
    }
}

import { TransportError } from '../errors';
import { Logger } from '../utils/Logger';
import type { OverflowPolicy } from '../config';
import type { Transport } from '../transport/Transport';
import { ChunkQueue } from './ChunkQueue';
import { PayloadDecoder } from './PayloadDecoder';

export interface InboundBridgeOptions {
    capacity: number;
    overflow: OverflowPolicy;
    /** Error events are only routed into the queue once this returns true */
    isOpen: () => boolean;
    /** Side channel for transport errors raised after the connection opened */
    onTransportError?: (error: TransportError) => void;
}

/**
 * Producer side of the read half: subscribes to the transport's message,
 * error and close events and feeds the chunk queue.
 */
export class InboundBridge {
    public readonly queue: ChunkQueue;
    private readonly decoder: PayloadDecoder;
    private unsubscribers: Array<() => void> = [];

    constructor(
        private readonly transport: Transport,
        private readonly options: InboundBridgeOptions,
        private readonly logger: Logger = new Logger('wsio:bridge')
    ) {
        this.queue = new ChunkQueue(options.capacity, options.overflow, {
            onPause: () => {
                this.logger.debug(`Queue full (${options.capacity} chunks), pausing transport`);
                transport.pause();
            },
            onResume: () => transport.resume(),
        });
        this.decoder = new PayloadDecoder(
            (chunk) => this.deliver(chunk),
            (error) => this.terminate(new TransportError('Inbound payload could not be decoded', error)),
            logger.child('decoder')
        );
    }

    public get isAttached(): boolean {
        return this.unsubscribers.length > 0;
    }

    public get skippedPayloads(): number {
        return this.decoder.skippedPayloads;
    }

    public attach(): void {
        if (this.isAttached) return;
        this.unsubscribers = [
            this.transport.on('message', (payload) => this.decoder.push(payload)),
            this.transport.on('error', (error) => this.handleError(error)),
            this.transport.on('close', (code, reason) => this.handleClose(code, reason)),
        ];
    }

    /**
     * Stops listening and throws away anything not yet read.
     */
    public detach(): void {
        for (const unsubscribe of this.unsubscribers) unsubscribe();
        this.unsubscribers = [];
        this.queue.discard();
    }

    private deliver(chunk: Uint8Array): void {
        // A zero-length chunk would read as end-of-stream.
        if (chunk.length === 0) return;
        if (!this.queue.push(chunk) && this.queue.getState() === 'open') {
            this.logger.warn(`Dropped inbound chunk of ${chunk.length} bytes (${this.queue.droppedChunks} dropped so far)`);
        }
    }

    private handleError(error: Error): void {
        // Errors before open belong to the connect attempt.
        if (!this.options.isOpen()) return;

        const transportError = new TransportError(`Transport error: ${error.message}`, error);
        this.logger.warn(transportError.message);
        this.options.onTransportError?.(transportError);
        this.terminate(transportError);
    }

    private handleClose(code: number, reason: string): void {
        this.logger.debug(`Transport closed (code ${code}${reason ? `, ${reason}` : ''}), ending stream`);
        this.decoder.settle(() => this.queue.close());
    }

    private terminate(error: TransportError): void {
        this.decoder.settle(() => this.queue.fail(error));
    }
}

/**
 * @module Buffers
 * @description
 * Byte helpers shared by the inbound bridge and the read helpers. Payloads
 * arrive from the transport in whatever shape the host hands out (Node
 * Buffers, ArrayBuffers, fragment lists, Blobs); everything past the decoder
 * sees plain, privately owned Uint8Arrays.
 */

export const EMPTY_BYTES = new Uint8Array(0);

/**
 * Converts a transport payload into an owned byte array.
 *
 * @returns the bytes, a promise of them when the payload needs an async read
 * (Blob), or `null` when the payload is not binary.
 */
export function toBytes(data: unknown): Uint8Array | Promise<Uint8Array> | null {
    if (data instanceof Uint8Array) {
        // Node Buffers may be slices of a shared pool; copy out.
        return new Uint8Array(data);
    }
    if (data instanceof ArrayBuffer) {
        return new Uint8Array(data.slice(0));
    }
    if (ArrayBuffer.isView(data)) {
        return new Uint8Array(data.buffer, data.byteOffset, data.byteLength).slice();
    }
    if (Array.isArray(data)) {
        const fragments: Uint8Array[] = [];
        for (const fragment of data) {
            if (!(fragment instanceof Uint8Array)) return null;
            fragments.push(fragment);
        }
        return concatBytes(fragments);
    }
    if (typeof Blob !== 'undefined' && data instanceof Blob) {
        return data.arrayBuffer().then((buffer) => new Uint8Array(buffer));
    }
    return null;
}

/**
 * Concatenates byte arrays into one freshly allocated array.
 */
export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
    let total = 0;
    for (const part of parts) total += part.length;

    const out = new Uint8Array(total);
    let offset = 0;
    for (const part of parts) {
        out.set(part, offset);
        offset += part.length;
    }
    return out;
}

/**
 * Growable byte accumulator used by the read helpers.
 */
export class ByteAccumulator {
    private parts: Uint8Array[] = [];
    private total = 0;

    append(bytes: Uint8Array): void {
        if (bytes.length === 0) return;
        // Callers pass views into the read half's carry-over; keep a private copy.
        this.parts.push(bytes.slice());
        this.total += bytes.length;
    }

    get length(): number {
        return this.total;
    }

    toBytes(): Uint8Array {
        if (this.parts.length === 1) return this.parts[0];
        return concatBytes(this.parts);
    }
}

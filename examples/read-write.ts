import { connect } from '../src';

// Round trip against a local echo server: `wsio echo --port 8000`
async function main() {
    const stream = await connect('localhost:8000');
    const [reader, writer] = stream.split();

    writer.write(new Uint8Array([0, 1, 2, 3, 93]));
    writer.write(new Uint8Array([42, 34, 93]));
    writer.write(new Uint8Array([0, 0, 1, 2, 93]));

    for (let i = 0; i < 3; i++) {
        const line = await reader.readUntil(93);
        console.log('line:', Array.from(line));
    }

    writer.write(new Uint8Array([0, 1, 2, 3, 93]));
    const buf = new Uint8Array(1024);
    const n = await reader.read(buf);
    console.log(`read ${n} bytes:`, Array.from(buf.subarray(0, n)));

    await writer.close();
    reader.release();
    writer.release();
}

main().catch((err: unknown) => {
    console.error('ERROR:', err);
    process.exit(1);
});

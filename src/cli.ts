#!/usr/bin/env node
import cac from 'cac';
import { WebSocketServer } from 'ws';
import { version } from '../package.json';
import { connect, connectSecure } from './connect';
import { OverflowPolicySchema } from './config';
import { toError } from './errors';
import { Logger, LogLevel } from './utils/Logger';

const cli = cac('wsio');
const logger = new Logger('wsio:cli');

interface PipeOptions {
    secure?: boolean;
    timeout?: number;
    capacity?: number;
    overflow?: string;
    debug?: boolean;
}

cli
    .command('pipe <address>', 'Pipe stdin to a WebSocket and its bytes to stdout')
    .option('--secure', 'Use wss:// instead of ws://')
    .option('--timeout <ms>', 'Connect timeout in milliseconds', { default: 30000 })
    .option('--capacity <chunks>', 'Inbound queue capacity', { default: 4 })
    .option('--overflow <policy>', 'pause | drop-newest | drop-oldest | error', { default: 'pause' })
    .option('--debug', 'Verbose connection logging')
    .action(async (address: string, options: PipeOptions) => {
        if (options.debug) logger.setLogLevel(LogLevel.DEBUG);

        const overflow = OverflowPolicySchema.safeParse(options.overflow);
        if (!overflow.success) {
            logger.error(`Unknown overflow policy: ${options.overflow}`);
            process.exit(1);
        }

        const open = options.secure ? connectSecure : connect;
        const stream = await open(address, {
            connectTimeout: Number(options.timeout),
            queueCapacity: Number(options.capacity),
            overflow: overflow.data,
            debug: Boolean(options.debug),
            logger,
        });
        const [reader, writer] = stream.split();
        stream.on('error', (error) => logger.error(error.message));

        process.stdin.on('data', (chunk: Buffer) => {
            try {
                writer.write(chunk);
            } catch (e) {
                logger.error(`Write failed: ${toError(e).message}`);
                process.stdin.pause();
            }
        });
        process.stdin.once('end', () => {
            logger.debug('stdin ended, closing socket');
            writer.close().catch((e: unknown) => logger.error('Close failed', e));
        });

        for await (const chunk of reader) {
            process.stdout.write(chunk);
        }
        reader.release();
        writer.release();
        process.stdin.destroy();
    });

cli
    .command('echo', 'Run a local server that sends every binary message back')
    .option('--port <port>', 'Port to listen on', { default: 8000 })
    .option('--host <host>', 'Interface to bind', { default: '127.0.0.1' })
    .action((options: { port: number; host: string }) => {
        const server = new WebSocketServer({ port: Number(options.port), host: options.host });
        server.on('listening', () => logger.info(`Echo server listening on ws://${options.host}:${options.port}`));
        server.on('connection', (socket) => {
            socket.on('message', (data, isBinary) => {
                if (isBinary) socket.send(data);
            });
        });
        server.on('error', (error) => {
            logger.error(`Echo server failed: ${error.message}`);
            process.exit(1);
        });
    });

cli.help();
cli.version(version);

async function main(): Promise<void> {
    cli.parse(process.argv, { run: false });
    await cli.runMatchedCommand();
}

main().catch((e: unknown) => {
    logger.error(toError(e).message);
    process.exit(1);
});

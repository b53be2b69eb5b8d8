import 'reflect-metadata';
import { toError } from '@multibody/core-util';
import { MultiBodyConfig, MultiBodyFactory } from '@multibody/http-server';
import { ProdServerMeta } from './ProdServerMeta';

const DEFAULT_PORT = 8200;

function readPort(value: string | undefined): number {
    const port = Number(value);
    return Number.isInteger(port) && port > 0 ? port : DEFAULT_PORT;
}

/**
 * Start the example server on PORT (default 8200) and run until SIGTERM or SIGINT.
 */
export async function main(): Promise<void> {
    console.log('[Server] Starting multi-body example server...');
    const server = await MultiBodyFactory.create(new ProdServerMeta(), MultiBodyConfig.fromEnv());
    await server.start(readPort(process.env['PORT']));

    await new Promise<void>((resolve) => {
        process.once('SIGTERM', () => {
            console.log('[Server] Received SIGTERM signal, shutting down...');
            resolve();
        });
        process.once('SIGINT', () => {
            console.log('[Server] Received SIGINT signal, shutting down...');
            resolve();
        });
    });
    await server.stop();
}

if (require.main === module) {
    main().catch((err: unknown) => {
        const error = toError(err);
        console.error('[Server] Error during startup:', error);
        process.exit(1);
    });
}

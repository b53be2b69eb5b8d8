import { Readable } from 'node:stream';
import { RouterRequest } from '@multibody/http-api';

/**
 * ExpressRouterRequest - body source over an Express request stream.
 * Takes any Readable; an Express Request is one.
 */
export class ExpressRouterRequest implements RouterRequest {
    constructor(private readonly req: Readable) {}

    /**
     * Read the request stream to its end and decode it as UTF-8.
     * Chunks are joined as bytes so multi-byte characters split across
     * chunks decode correctly.
     */
    readBody(): Promise<string> {
        return new Promise((resolve, reject) => {
            const chunks: Buffer[] = [];
            this.req.on('data', (chunk: Buffer | string) => {
                chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
            });
            this.req.on('end', () => {
                resolve(Buffer.concat(chunks).toString('utf8'));
            });
            this.req.on('error', (err: Error) => {
                reject(err);
            });
        });
    }
}

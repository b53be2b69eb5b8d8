/**
 * Anything that can read a request body once. RouterRequest satisfies it.
 */
export interface BodySource {
    readBody(): Promise<string>;
}

/**
 * RequestBodyCache - read-once access to one request's body.
 *
 * The first read() stores the pending promise before anything awaits it, so
 * parameters resolved concurrently share the single read of the stream. A
 * failed read is cached as well; it is not retried.
 */
export class RequestBodyCache {
    private pending?: Promise<string>;

    constructor(private readonly source: BodySource) {}

    read(): Promise<string> {
        if (!this.pending) {
            this.pending = this.source.readBody();
        }
        return this.pending;
    }

    isRead(): boolean {
        return this.pending !== undefined;
    }
}

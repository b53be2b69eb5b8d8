/**
 * RouterRequest - the one thing a binding needs from an HTTP request: its body.
 *
 * Implementations:
 * - ExpressRouterRequest (in @multibody/http-server) reads an Express request stream
 * - TestRouterRequest (in @multibody/http-server testing) serves a fixed body
 */
export interface RouterRequest {
    /**
     * Read the request body as UTF-8 text.
     * The underlying stream can only be consumed once; callers go through
     * the request's RequestBodyCache instead of calling this directly.
     */
    readBody(): Promise<string>;
}

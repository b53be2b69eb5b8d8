/**
 * RouterResponse - Minimal abstraction over the underlying HTTP response.
 */
export interface RouterResponse {
    setStatus(code: number): void;

    setHeader(name: string, value: string): void;

    /**
     * Send response body and end the response.
     */
    send(body: string): void;

    /**
     * Used to prevent double-sending responses.
     */
    isHeadersSent(): boolean;
}

import { Response } from 'express';
import { RouterResponse } from '@multibody/http-api';

/**
 * ExpressRouterResponse - where ExpressWrapper writes a handler's JSON
 * result or the ProtocolError of a failed binding.
 */
export class ExpressRouterResponse implements RouterResponse {
    constructor(private readonly res: Response) {}

    setStatus(code: number): void {
        this.res.status(code);
    }

    setHeader(name: string, value: string): void {
        this.res.setHeader(name, value);
    }

    send(body: string): void {
        this.res.send(body);
    }

    /**
     * True once Express has flushed the status line, e.g. after a
     * partial write by a failing handler; no error body can follow then.
     */
    isHeadersSent(): boolean {
        return this.res.headersSent;
    }
}

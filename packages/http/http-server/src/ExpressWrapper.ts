import { Request, Response } from 'express';
import { RouteMetadata, RouterReqResp } from '@multibody/http-api';
import { RouteHandler } from './RouteHandler';
import { MethodMeta } from './MethodMeta';
import { ErrorTranslator } from './ErrorTranslator';
import { ExpressRouterRequest } from './express/ExpressRouterRequest';
import { ExpressRouterResponse } from './express/ExpressRouterResponse';

/**
 * ExpressWrapper - runs one route for one request.
 *
 * Builds the MethodMeta (with a fresh BindingContext), invokes the route
 * handler and writes the JSON result, or the error as a ProtocolError.
 * The body stream is left unread here; the @MultiBody parameters read it.
 */
export class ExpressWrapper {
    constructor(
        private readonly handler: RouteHandler<unknown>,
        private readonly routeMeta: RouteMetadata,
        private readonly errorTranslator: ErrorTranslator,
    ) {}

    async execute(req: Request, res: Response): Promise<void> {
        await this.handle(new RouterReqResp(new ExpressRouterRequest(req), new ExpressRouterResponse(res)));
    }

    /**
     * The request cycle on the router abstractions, shared by Express and the
     * in-process route invoker.
     */
    async handle(reqResp: RouterReqResp): Promise<void> {
        try {
            const meta = new MethodMeta(this.routeMeta, reqResp);
            const result = await this.handler.execute(meta);
            if (result === undefined) {
                throw new Error(`Route ${this.routeMeta.methodName} is not returning a response`);
            }

            const response = reqResp.response;
            response.setStatus(200);
            response.setHeader('Content-Type', 'application/json');
            response.send(JSON.stringify(result));
        } catch (err: unknown) {
            this.errorTranslator.writeError(reqResp.response, err);
        }
    }
}

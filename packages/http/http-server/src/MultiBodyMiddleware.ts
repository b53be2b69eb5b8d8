import { NextFunction, Request, Response } from 'express';
import { inject, injectable } from 'inversify';
import { EndpointNotFoundError, RouteMetadata } from '@multibody/http-api';
import { toError } from '@multibody/core-util';
import { provideSingleton } from './decorators';
import { RouteHandler } from './RouteHandler';
import { ErrorTranslator } from './ErrorTranslator';
import { ExpressWrapper } from './ExpressWrapper';
import { ExpressRouterResponse } from './express/ExpressRouterResponse';
import { MultiBodyConfig, MULTIBODY_CONFIG_TOKEN } from './config/MultiBodyConfig';

/**
 * MultiBodyMiddleware - Express middleware of the server.
 *
 * 1. globalErrorHandler - outermost layer, turns anything that escaped a
 *    route into a JSON 500
 * 2. logRequests - request start/end lines when logging is enabled
 * 3. notFound - JSON 404 for requests no route matched
 */
@provideSingleton()
@injectable()
export class MultiBodyMiddleware {
    constructor(
        @inject(ErrorTranslator) private readonly errorTranslator: ErrorTranslator,
        @inject(MULTIBODY_CONFIG_TOKEN) private readonly config: MultiBodyConfig,
    ) {}

    async globalErrorHandler(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            // await catches both a synchronous throw from next() and a rejected downstream promise
            await next();
        } catch (err: unknown) {
            const error = toError(err);
            console.error('[GlobalErrorHandler] Caught unhandled error:', req.method, req.path, error);
            this.errorTranslator.writeError(new ExpressRouterResponse(res), error);
        }
    }

    async logRequests(req: Request, res: Response, next: NextFunction): Promise<void> {
        if (!this.config.loggingEnabled) {
            await next();
            return;
        }
        console.log('[MultiBodyServer] Request START:', req.method, req.path);
        await next();
        console.log('[MultiBodyServer] Request END:', req.method, req.path, res.statusCode);
    }

    notFound(req: Request, res: Response): void {
        this.errorTranslator.writeError(
            new ExpressRouterResponse(res),
            new EndpointNotFoundError(`No route for ${req.method} ${req.path}`),
        );
    }

    createExpressWrapper(handler: RouteHandler<unknown>, routeMeta: RouteMetadata): ExpressWrapper {
        return new ExpressWrapper(handler, routeMeta, this.errorTranslator);
    }
}

import { RouterReqResp, RouterRequest, RouterResponse } from '@multibody/http-api';
import { ExpressWrapper } from './ExpressWrapper';

/**
 * Runs one route in process, through the same wrapper Express uses but on
 * caller-supplied request and response objects. For tests.
 *
 * ```typescript
 * const rename = server.createRouteInvoker('POST', '/profile/rename');
 * const response = new TestRouterResponse();
 * await rename.invoke(TestRouterRequest.json({ id: 7, name: 'Alice' }), response);
 * ```
 */
export class RouteInvoker {
    constructor(private readonly wrapper: ExpressWrapper) {}

    async invoke(request: RouterRequest, response: RouterResponse): Promise<void> {
        await this.wrapper.handle(new RouterReqResp(request, response));
    }
}

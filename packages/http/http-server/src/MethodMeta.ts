import { RouteMetadata, RouterReqResp } from '@multibody/http-api';
import { BindingContext } from '@multibody/http-binding';

/**
 * Metadata about the method being invoked, one instance per request.
 *
 * Created by ExpressWrapper when handling a request:
 * - routeMeta: static route information (httpMethod, path, methodName)
 * - routerReqResp: the request and response abstractions
 * - bindingContext: the request's body cache and binding results
 */
export class MethodMeta {
    routeMeta: RouteMetadata;

    routerReqResp: RouterReqResp;

    /**
     * Shared by every @MultiBody parameter of this request so the body
     * stream is read once.
     */
    bindingContext: BindingContext;

    constructor(routeMeta: RouteMetadata, routerReqResp: RouterReqResp) {
        this.routeMeta = routeMeta;
        this.routerReqResp = routerReqResp;
        this.bindingContext = new BindingContext(routerReqResp.request);
    }
}

import { RouteInvoker } from './RouteInvoker';

/**
 * MultiBodyServer - public interface of the server.
 *
 * Initialization is hidden inside MultiBodyFactory.create().
 *
 * ```typescript
 * // Production
 * const server = await MultiBodyFactory.create(new ProdServerMeta(), MultiBodyConfig.fromEnv());
 * await server.start(8200);
 *
 * // Testing, no HTTP
 * const server = await MultiBodyFactory.create(new ProdServerMeta(), new MultiBodyConfig(), overrides);
 * const invoker = server.createRouteInvoker('POST', '/profile/rename');
 * ```
 */
export interface MultiBodyServer {
    /**
     * Start Express. Resolves once the server is listening.
     */
    start(port?: number): Promise<void>;

    stop(): Promise<void>;

    /**
     * Invoke a registered route in process, without Express or a socket.
     * Throws EndpointNotFoundError when no route matches.
     */
    createRouteInvoker(httpMethod: string, path: string): RouteInvoker;
}

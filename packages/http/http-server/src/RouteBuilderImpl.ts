import { Container, inject, injectable } from 'inversify';
import { EndpointNotFoundError } from '@multibody/http-api';
import { getParameterBindings } from '@multibody/http-binding';
import { RouteBuilder, RouteDefinition } from './WebAppMeta';
import { provideSingleton } from './decorators';
import { RouteHandler } from './RouteHandler';
import { MethodMeta } from './MethodMeta';
import { HandlerMethodInvoker, PreparedInvocation } from './resolvers/HandlerMethodInvoker';
import { MethodParameter } from './resolvers/MethodParameter';

/**
 * RouteHandlerWithMeta - pairs a route handler with its definition.
 */
export class RouteHandlerWithMeta {
    constructor(
        public handler: RouteHandler<unknown>,
        public definition: RouteDefinition,
    ) {}
}

/**
 * RouteBuilderImpl - registers routes and builds their handlers.
 *
 * For each route, once at registration:
 * 1. resolves the controller from the application container;
 * 2. reads the method's parameter bindings, which builds the binding
 *    descriptors;
 * 3. pairs every parameter with its argument resolver.
 * Nothing of this is repeated per request.
 *
 * Registered in the framework container via @provideSingleton() but
 * resolves controllers from the application container, set with
 * setContainer() once that exists.
 */
@provideSingleton()
@injectable()
export class RouteBuilderImpl implements RouteBuilder {
    private routes: Map<string, RouteHandlerWithMeta> = new Map();
    private container?: Container;

    constructor(@inject(HandlerMethodInvoker) private readonly invoker: HandlerMethodInvoker) {}

    setContainer(container: Container): void {
        this.container = container;
    }

    /**
     * Register a route under "METHOD:path" (e.g. "POST:/profile/rename").
     */
    addRoute(route: RouteDefinition): void {
        if (!this.container) {
            throw new Error('Container not set. Call setContainer() before registering routes.');
        }

        const routeMeta = route.routeMeta;
        const key = RouteBuilderImpl.routeKey(routeMeta.httpMethod, routeMeta.path);

        const controller = this.container.get(route.controllerClass);
        const method: unknown = Reflect.get(controller, routeMeta.methodName);
        if (typeof method !== 'function') {
            throw new Error(`Method ${routeMeta.methodName} not found on controller ${route.controllerClass.name}`);
        }
        const controllerMethod: Function = method;

        const declaringClass = RouteBuilderImpl.bindingDeclaringClass(route);
        const invocation: PreparedInvocation = this.invoker.prepare(
            MethodParameter.forMethod(declaringClass, routeMeta.methodName),
        );

        const handler = new (class extends RouteHandler<unknown> {
            async execute(meta: MethodMeta): Promise<unknown> {
                const args = await invocation.resolveArguments(meta);
                const result: unknown = await Reflect.apply(controllerMethod, controller, args);
                return result;
            }
        })();

        this.routes.set(key, new RouteHandlerWithMeta(handler, route));
    }

    getRoutes(): Map<string, RouteHandlerWithMeta> {
        return this.routes;
    }

    /**
     * Look up a registered route. Throws EndpointNotFoundError when none matches.
     */
    getRoute(httpMethod: string, path: string): RouteHandlerWithMeta {
        const route = this.routes.get(RouteBuilderImpl.routeKey(httpMethod, path));
        if (!route) {
            throw new EndpointNotFoundError(`No route for ${httpMethod.toUpperCase()} ${path}`);
        }
        return route;
    }

    private static routeKey(httpMethod: string, path: string): string {
        return `${httpMethod.toUpperCase()}:${path}`;
    }

    /**
     * The controller when it redeclares the method's parameter decorators,
     * else the API prototype that declares the route.
     */
    private static bindingDeclaringClass(route: RouteDefinition): Function {
        const onController = getParameterBindings(route.controllerClass, route.routeMeta.methodName);
        const decorated = onController.some((b) => b.descriptor !== undefined || b.errorsSink);
        return decorated ? route.controllerClass : route.apiClass;
    }
}

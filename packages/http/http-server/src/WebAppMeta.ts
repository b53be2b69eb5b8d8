import { ContainerModule, Newable } from 'inversify';
import { RouteMetadata } from '@multibody/http-api';

/**
 * A route configuration that can be registered with the router.
 */
export interface Routes {
    configure(routeBuilder: RouteBuilder): void;
}

/**
 * Builder for registering routes. Implemented by RouteBuilderImpl.
 */
export interface RouteBuilder {
    addRoute(route: RouteDefinition): void;
}

/**
 * A class the DI container can construct.
 */
export type ControllerClass = Newable<object>;

/**
 * Definition of a single route.
 * `apiClass` declares the route and, unless the controller redeclares
 * them, its @MultiBody parameters.
 */
export class RouteDefinition {
    constructor(
        public routeMeta: RouteMetadata,
        public apiClass: Function,
        public controllerClass: ControllerClass,
    ) {}
}

/**
 * Main application metadata: the entry point the server calls to configure
 * the application.
 */
export interface WebAppMeta {
    getDIModules(): ContainerModule[];

    getRoutes(): Routes[];
}

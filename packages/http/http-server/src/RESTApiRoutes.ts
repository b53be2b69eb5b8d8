import { getRoutes, isApiInterface, RouteMetadata } from '@multibody/http-api';
import { ControllerClass, RouteBuilder, RouteDefinition, Routes } from './WebAppMeta';
import { isController } from './decorators';

/**
 * RESTApiRoutes - wire an API interface to its controller.
 *
 * Reads the route decorators of the API prototype class and registers a
 * route per method, dispatching to the controller method of the same name.
 *
 * Usage:
 * ```typescript
 * getRoutes(): Routes[] {
 *   return [new RESTApiRoutes(ProfileApiPrototype, ProfileController)];
 * }
 * ```
 */
export class RESTApiRoutes implements Routes {
    constructor(
        private readonly apiMetaClass: Function,
        private readonly controllerClass: ControllerClass,
    ) {
        if (!isApiInterface(apiMetaClass)) {
            throw new Error(`Class ${apiMetaClass.name} must be decorated with @ApiInterface()`);
        }
        if (!isController(controllerClass)) {
            throw new Error(`Class ${controllerClass.name} must be decorated with @Controller()`);
        }
        this.validateControllerImplementsApi();
    }

    private validateControllerImplementsApi(): void {
        for (const route of getRoutes(this.apiMetaClass)) {
            const method: unknown = Reflect.get(this.controllerClass.prototype, route.methodName);
            if (typeof method !== 'function') {
                throw new Error(
                    `Controller ${this.controllerClass.name} must implement method ${route.methodName} from API ${this.apiMetaClass.name}`,
                );
            }
        }
    }

    configure(routeBuilder: RouteBuilder): void {
        for (const route of getRoutes(this.apiMetaClass)) {
            this.registerRoute(routeBuilder, route);
        }
    }

    private registerRoute(routeBuilder: RouteBuilder, route: RouteMetadata): void {
        if (!route.httpMethod || !route.path) {
            throw new Error(
                `Method ${route.methodName} in ${this.apiMetaClass.name} must have both an HTTP method and a @Path decorator`,
            );
        }
        routeBuilder.addRoute(new RouteDefinition(route, this.apiMetaClass, this.controllerClass));
    }
}

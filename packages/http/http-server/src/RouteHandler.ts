import { MethodMeta } from './MethodMeta';

/**
 * Handler class for routes.
 * Takes the request's MethodMeta and returns the controller method result.
 *
 * This is a class instead of a function type to make it easier to trace
 * who is calling what in the debugger.
 */
export abstract class RouteHandler<TResult = unknown> {
    abstract execute(meta: MethodMeta): Promise<TResult>;
}

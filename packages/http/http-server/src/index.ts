/**
 * @multibody/http-server
 *
 * Express and Inversify integration of multi-body parameter binding:
 * routes, argument resolvers, error translation and the server itself.
 */

export { MultiBodyServer } from './MultiBodyServer';
export { MultiBodyServerImpl } from './MultiBodyServerImpl';
export { MultiBodyFactory } from './MultiBodyFactory';
export { MultiBodyMiddleware } from './MultiBodyMiddleware';
export { MultiBodyConfig, MULTIBODY_CONFIG_TOKEN } from './config/MultiBodyConfig';
export { MultiBodyModule } from './modules/MultiBodyModule';

export { Routes, RouteBuilder, RouteDefinition, ControllerClass, WebAppMeta } from './WebAppMeta';
export { RESTApiRoutes } from './RESTApiRoutes';
export { RouteBuilderImpl, RouteHandlerWithMeta } from './RouteBuilderImpl';
export { RouteHandler } from './RouteHandler';
export { MethodMeta } from './MethodMeta';
export { Controller, isController, provideSingleton, ROUTING_METADATA_KEYS } from './decorators';

export { ArgumentResolver, ARGUMENT_RESOLVER_TOKEN } from './resolvers/ArgumentResolver';
export { MethodParameter } from './resolvers/MethodParameter';
export { MultiBodyArgumentResolver } from './resolvers/MultiBodyArgumentResolver';
export { BindingErrorsArgumentResolver } from './resolvers/BindingErrorsArgumentResolver';
export { HandlerMethodInvoker, PreparedInvocation } from './resolvers/HandlerMethodInvoker';

export { ErrorTranslator } from './ErrorTranslator';
export { ExpressWrapper } from './ExpressWrapper';
export { RouteInvoker } from './RouteInvoker';
export { ExpressRouterRequest } from './express/ExpressRouterRequest';
export { ExpressRouterResponse } from './express/ExpressRouterResponse';

export { TestRouterRequest } from './testing/TestRouterRequest';
export { TestRouterResponse } from './testing/TestRouterResponse';

import express, { Express, Request, Response } from 'express';
import { Server } from 'node:http';
import { Container, ContainerModule, inject, injectable } from 'inversify';
import { buildProviderModule } from '@inversifyjs/binding-decorators';
import { provideSingleton } from './decorators';
import { WebAppMeta } from './WebAppMeta';
import { MultiBodyServer } from './MultiBodyServer';
import { MultiBodyMiddleware } from './MultiBodyMiddleware';
import { RouteBuilderImpl } from './RouteBuilderImpl';
import { RouteInvoker } from './RouteInvoker';

type ExpressRouteHandler = (req: Request, res: Response) => Promise<void>;

/**
 * MultiBodyServerImpl - server implementation, created by MultiBodyFactory.
 *
 * Two containers:
 * 1. the framework container: config, resolvers, route builder, middleware
 * 2. the application container (child of the first): the app's modules,
 *    controllers and test overrides
 */
@provideSingleton()
@injectable()
export class MultiBodyServerImpl implements MultiBodyServer {
    private meta?: WebAppMeta;
    private appContainer?: Container;
    private server?: Server;
    private port: number = 8200;

    constructor(
        @inject(RouteBuilderImpl) private readonly routeBuilder: RouteBuilderImpl,
        @inject(MultiBodyMiddleware) private readonly middleware: MultiBodyMiddleware,
    ) {}

    /**
     * Load the application modules and register the routes. Called once by
     * MultiBodyFactory.create().
     *
     * @param overrides - loaded last so it can replace application bindings
     */
    async initialize(frameworkContainer: Container, meta: WebAppMeta, overrides?: ContainerModule): Promise<void> {
        if (this.appContainer) {
            return;
        }

        this.meta = meta;
        const appContainer = new Container({ parent: frameworkContainer });
        this.routeBuilder.setContainer(appContainer);

        await appContainer.load(buildProviderModule());
        for (const module of meta.getDIModules()) {
            await appContainer.load(module);
        }
        if (overrides) {
            await appContainer.load(overrides);
        }

        for (const routes of meta.getRoutes()) {
            routes.configure(this.routeBuilder);
        }

        this.appContainer = appContainer;
    }

    async start(port: number = 8200): Promise<void> {
        if (!this.meta) {
            throw new Error('Server not initialized. Use MultiBodyFactory.create().');
        }
        this.port = port;

        const app = express();
        app.use(this.middleware.globalErrorHandler.bind(this.middleware));
        app.use(this.middleware.logRequests.bind(this.middleware));
        const routeCount = this.registerExpressRoutes(app);
        app.use(this.middleware.notFound.bind(this.middleware));

        await new Promise<void>((resolve, reject) => {
            this.server = app.listen(this.port, (error?: Error) => {
                if (error) {
                    console.error('[MultiBodyServer] Failed to start server:', error);
                    reject(error);
                    return;
                }
                console.log(`[MultiBodyServer] Server listening on http://localhost:${this.port}`);
                console.log(`[MultiBodyServer] Registered ${routeCount} routes`);
                resolve();
            });
        });
    }

    private registerExpressRoutes(app: Express): number {
        let count = 0;
        for (const routeWithMeta of this.routeBuilder.getRoutes().values()) {
            const routeMeta = routeWithMeta.definition.routeMeta;
            const wrapper = this.middleware.createExpressWrapper(routeWithMeta.handler, routeMeta);
            this.registerHandler(app, routeMeta.httpMethod, routeMeta.path, wrapper.execute.bind(wrapper));
            count++;
        }
        return count;
    }

    private registerHandler(app: Express, httpMethod: string, path: string, handler: ExpressRouteHandler): void {
        switch (httpMethod.toLowerCase()) {
            case 'get':
                app.get(path, handler);
                break;
            case 'post':
                app.post(path, handler);
                break;
            case 'put':
                app.put(path, handler);
                break;
            case 'delete':
                app.delete(path, handler);
                break;
            case 'patch':
                app.patch(path, handler);
                break;
            default:
                console.warn(`[MultiBodyServer] Unknown HTTP method: ${httpMethod}`);
        }
    }

    async stop(): Promise<void> {
        const server = this.server;
        if (!server) {
            return;
        }

        await new Promise<void>((resolve, reject) => {
            server.close((err?: Error) => {
                if (err) {
                    console.error('[MultiBodyServer] Error stopping server:', err);
                    reject(err);
                    return;
                }
                console.log('[MultiBodyServer] Server stopped');
                resolve();
            });
        });
        this.server = undefined;
    }

    createRouteInvoker(httpMethod: string, path: string): RouteInvoker {
        if (!this.meta) {
            throw new Error('Server not initialized. Use MultiBodyFactory.create().');
        }
        const route = this.routeBuilder.getRoute(httpMethod, path);
        const wrapper = this.middleware.createExpressWrapper(route.handler, route.definition.routeMeta);
        return new RouteInvoker(wrapper);
    }
}

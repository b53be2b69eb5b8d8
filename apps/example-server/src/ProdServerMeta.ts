import { ContainerModule } from 'inversify';
import { RESTApiRoutes, Routes, WebAppMeta } from '@multibody/http-server';
import { InversifyModule } from './modules/InversifyModule';
import { OrderApiPrototype } from './api/OrderApi';
import { OrderController } from './controllers/OrderController';

/**
 * ProdServerMeta - the application's DI modules and routes.
 */
export class ProdServerMeta implements WebAppMeta {
    getDIModules(): ContainerModule[] {
        return [InversifyModule];
    }

    getRoutes(): Routes[] {
        return [new RESTApiRoutes(OrderApiPrototype, OrderController)];
    }
}

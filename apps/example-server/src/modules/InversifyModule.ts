import { ContainerModule } from 'inversify';
import { InMemoryOrderStore, OrderStore, TYPES } from '../store/OrderStore';

/**
 * InversifyModule - application bindings.
 *
 * Controllers with @provideSingleton() are registered automatically; this
 * module only binds the services they depend on.
 */
export const InversifyModule = new ContainerModule((options) => {
    const { bind } = options;

    bind<OrderStore>(TYPES.OrderStore).to(InMemoryOrderStore).inSingletonScope();
});

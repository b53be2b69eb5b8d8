import { Container, ContainerModule } from 'inversify';
import { buildProviderModule } from '@inversifyjs/binding-decorators';
import { WebAppMeta } from './WebAppMeta';
import { MultiBodyConfig, MULTIBODY_CONFIG_TOKEN } from './config/MultiBodyConfig';
import { MultiBodyModule } from './modules/MultiBodyModule';
import { MultiBodyServer } from './MultiBodyServer';
import { MultiBodyServerImpl } from './MultiBodyServerImpl';

/**
 * MultiBodyFactory - creates initialized servers.
 *
 * 1. creates the framework container and binds the config
 * 2. loads MultiBodyModule (binder, validator, argument resolvers)
 * 3. loads the provider module for @provideSingleton classes
 * 4. resolves MultiBodyServerImpl and initializes it
 *
 * ```typescript
 * const appOverrides = new ContainerModule((options) => {
 *     options.bind(ProfileStore).toConstantValue(new InMemoryProfileStore());
 * });
 * const server = await MultiBodyFactory.create(new ProdServerMeta(), new MultiBodyConfig(), appOverrides);
 * ```
 */
export class MultiBodyFactory {
    static async create(
        meta: WebAppMeta,
        config: MultiBodyConfig = new MultiBodyConfig(),
        appOverrides?: ContainerModule,
    ): Promise<MultiBodyServer> {
        const frameworkContainer = new Container();
        frameworkContainer.bind<MultiBodyConfig>(MULTIBODY_CONFIG_TOKEN).toConstantValue(config);

        await frameworkContainer.load(MultiBodyModule);
        await frameworkContainer.load(buildProviderModule());

        const serverImpl = frameworkContainer.get(MultiBodyServerImpl);
        await serverImpl.initialize(frameworkContainer, meta, appOverrides);
        return serverImpl;
    }
}

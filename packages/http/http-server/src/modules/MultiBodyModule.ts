import { ContainerModule } from 'inversify';
import { BindingValidator, KeyedBodyBinder } from '@multibody/http-binding';
import { ArgumentResolver, ARGUMENT_RESOLVER_TOKEN } from '../resolvers/ArgumentResolver';
import { MultiBodyArgumentResolver } from '../resolvers/MultiBodyArgumentResolver';
import { BindingErrorsArgumentResolver } from '../resolvers/BindingErrorsArgumentResolver';
import { HandlerMethodInvoker } from '../resolvers/HandlerMethodInvoker';

/**
 * MultiBodyModule - framework DI bindings for multi-body parameters.
 *
 * Loaded into the framework container by MultiBodyFactory. The resolvers are
 * bound to ARGUMENT_RESOLVER_TOKEN and collected by HandlerMethodInvoker
 * with @multiInject, in the order bound here.
 */
export const MultiBodyModule = new ContainerModule((options) => {
    const { bind } = options;

    bind<KeyedBodyBinder>(KeyedBodyBinder).toConstantValue(new KeyedBodyBinder());
    bind<BindingValidator>(BindingValidator).toConstantValue(new BindingValidator());

    bind<ArgumentResolver>(ARGUMENT_RESOLVER_TOKEN).to(MultiBodyArgumentResolver).inSingletonScope();
    bind<ArgumentResolver>(ARGUMENT_RESOLVER_TOKEN).to(BindingErrorsArgumentResolver).inSingletonScope();

    bind<HandlerMethodInvoker>(HandlerMethodInvoker).toSelf().inSingletonScope();
});

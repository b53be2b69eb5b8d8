import { MethodMeta } from '../MethodMeta';
import { MethodParameter } from './MethodParameter';

/**
 * Supplies the value of one kind of controller method parameter.
 * Implementations are bound to ARGUMENT_RESOLVER_TOKEN and collected with @multiInject.
 */
export interface ArgumentResolver {
    supportsParameter(parameter: MethodParameter): boolean;

    resolveArgument(parameter: MethodParameter, meta: MethodMeta): Promise<unknown>;
}

/**
 * DI token every ArgumentResolver is bound to.
 */
export const ARGUMENT_RESOLVER_TOKEN = Symbol.for('ArgumentResolver');

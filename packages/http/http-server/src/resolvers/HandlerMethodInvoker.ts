import { injectable, multiInject } from 'inversify';
import { HttpInternalServerError } from '@multibody/http-api';
import { MethodMeta } from '../MethodMeta';
import { ArgumentResolver, ARGUMENT_RESOLVER_TOKEN } from './ArgumentResolver';
import { MethodParameter } from './MethodParameter';

/**
 * HandlerMethodInvoker - resolves the arguments of a controller method.
 *
 * Each parameter goes to the first registered resolver that supports it.
 * Parameters are resolved in declaration order, one after the other, so a
 * @BindingErrors() sink sees the result of the parameter before it.
 */
@injectable()
export class HandlerMethodInvoker {
    constructor(@multiInject(ARGUMENT_RESOLVER_TOKEN) private readonly resolvers: ArgumentResolver[]) {}

    /**
     * Find the resolver of every parameter.
     * Throws HttpInternalServerError for a parameter no resolver supports.
     */
    prepare(parameters: MethodParameter[]): PreparedInvocation {
        const resolved = parameters.map((parameter) => {
            const resolver = this.resolvers.find((r) => r.supportsParameter(parameter));
            if (!resolver) {
                throw new HttpInternalServerError(
                    `No argument resolver supports parameter ${parameter}; decorate it with @MultiBody() or @BindingErrors()`,
                );
            }
            return new ResolvedParameter(parameter, resolver);
        });
        return new PreparedInvocation(resolved);
    }
}

class ResolvedParameter {
    constructor(
        public readonly parameter: MethodParameter,
        public readonly resolver: ArgumentResolver,
    ) {}
}

/**
 * The parameters of one route paired with their resolvers.
 */
export class PreparedInvocation {
    constructor(private readonly parameters: ResolvedParameter[]) {}

    async resolveArguments(meta: MethodMeta): Promise<unknown[]> {
        const args: unknown[] = [];
        for (const { parameter, resolver } of this.parameters) {
            args.push(await resolver.resolveArgument(parameter, meta));
        }
        return args;
    }
}

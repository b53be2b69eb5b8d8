import { injectable } from 'inversify';
import { HttpInternalServerError } from '@multibody/http-api';
import { BindingResult } from '@multibody/http-binding';
import { MethodMeta } from '../MethodMeta';
import { ArgumentResolver } from './ArgumentResolver';
import { MethodParameter } from './MethodParameter';

/**
 * Resolves @BindingErrors() parameters to the BindingResult of the
 * @MultiBody parameter declared directly before them. When that parameter
 * was not validated (absent, or validation off) the result is empty.
 */
@injectable()
export class BindingErrorsArgumentResolver implements ArgumentResolver {
    supportsParameter(parameter: MethodParameter): boolean {
        return parameter.binding.errorsSink;
    }

    async resolveArgument(parameter: MethodParameter, meta: MethodMeta): Promise<unknown> {
        const name = parameter.preceding?.descriptor?.bindingName();
        if (name === undefined) {
            throw new HttpInternalServerError(
                `@BindingErrors() at ${parameter} must directly follow a named @MultiBody parameter`,
            );
        }
        return meta.bindingContext.getResult(name) ?? new BindingResult(name);
    }
}

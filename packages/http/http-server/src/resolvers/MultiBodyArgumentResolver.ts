import { inject, injectable } from 'inversify';
import { HttpInternalServerError } from '@multibody/http-api';
import {
    BindingDescriptor,
    BindingResult,
    BindingValidator,
    KeyedBodyBinder,
    ValidationFailedError,
    valueOrThrow,
} from '@multibody/http-binding';
import { MethodMeta } from '../MethodMeta';
import { MultiBodyConfig, MULTIBODY_CONFIG_TOKEN } from '../config/MultiBodyConfig';
import { ArgumentResolver } from './ArgumentResolver';
import { MethodParameter } from './MethodParameter';

/**
 * MultiBodyArgumentResolver - resolves @MultiBody parameters.
 *
 * Reads the body through the request's BindingContext (one read however
 * many parameters bind from it), binds the parameter's key, then validates
 * the bound value when its @MultiBody asks for it.
 *
 * Validation errors go to the @BindingErrors() parameter declared right
 * after this one; without such a sink they fail the request with
 * ValidationFailedError (400).
 */
@injectable()
export class MultiBodyArgumentResolver implements ArgumentResolver {
    constructor(
        @inject(KeyedBodyBinder) private readonly binder: KeyedBodyBinder,
        @inject(BindingValidator) private readonly validator: BindingValidator,
        @inject(MULTIBODY_CONFIG_TOKEN) private readonly config: MultiBodyConfig,
    ) {}

    supportsParameter(parameter: MethodParameter): boolean {
        return parameter.binding.descriptor !== undefined;
    }

    async resolveArgument(parameter: MethodParameter, meta: MethodMeta): Promise<unknown> {
        const descriptor = parameter.binding.descriptor;
        if (!descriptor) {
            throw new HttpInternalServerError(`${parameter} is not a @MultiBody parameter`);
        }

        const body = await meta.bindingContext.readBody();
        const outcome = this.binder.resolve(descriptor, body);
        if (this.config.loggingEnabled) {
            console.log(`[MultiBodyArgumentResolver] ${parameter} ${descriptor} -> ${outcome.status}`);
        }

        const value = valueOrThrow(outcome);
        if (value !== null && this.config.validationEnabled && BindingValidator.isRequested(descriptor)) {
            await this.validate(value, descriptor, parameter, meta);
        }
        return value;
    }

    private async validate(
        value: unknown,
        descriptor: BindingDescriptor,
        parameter: MethodParameter,
        meta: MethodMeta,
    ): Promise<void> {
        const result = new BindingResult(descriptor.bindingName() ?? parameter.toString());
        result.addErrors(await this.validator.validate(value, descriptor.validation));
        meta.bindingContext.attachResult(result);

        if (result.hasErrors() && !parameter.followedByErrorsSink) {
            throw new ValidationFailedError(result);
        }
    }
}

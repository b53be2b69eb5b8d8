import 'reflect-metadata';
import { BindingDescriptor, ValidationHints } from './BindingDescriptor';
import { Shape, Shapes } from './Shape';
import { parameterNames } from './parameterNames';

/**
 * Metadata keys for parameter bindings, stored per method on the prototype.
 */
export const BINDING_METADATA_KEYS = {
    MULTI_BODY: 'multibody:multi-body-params',
    BINDING_ERRORS: 'multibody:binding-errors-params',
};

export interface MultiBodyOptions {
    /** Body key to bind from. Defaults to the parameter name. */
    key?: string;
    /** Parameter name, for code whose source does not keep names. */
    name?: string;
    /** Default true. */
    required?: boolean;
    /** Let object and map shapes fall back to the whole body. Default true. */
    parseAllFields?: boolean;
    /** Overrides the shape derived from the parameter's design type. */
    shape?: Shape;
    /** Validate the bound value; an array gives the validation groups. */
    validate?: boolean | readonly string[];
}

class MultiBodyParameter {
    constructor(
        public readonly index: number,
        public readonly options: MultiBodyOptions,
    ) {}
}

function readIndexedMetadata<T>(key: string, target: Object, methodName: string | symbol, guard: (v: unknown) => v is T): T[] {
    const existing: unknown = Reflect.getOwnMetadata(key, target, methodName);
    return Array.isArray(existing) ? existing.filter(guard) : [];
}

function isMultiBodyParameter(value: unknown): value is MultiBodyParameter {
    return value instanceof MultiBodyParameter;
}

function isIndex(value: unknown): value is number {
    return typeof value === 'number';
}

/**
 * Bind a handler parameter from one key of the shared JSON request body.
 *
 * Usage:
 * ```typescript
 * @Post()
 * @Path('/orders')
 * create(
 *     @MultiBody('customer') customer: Customer,
 *     @MultiBody({ key: 'items', shape: Shapes.collection(Shapes.object(OrderItem)) }) items: OrderItem[],
 *     @MultiBody({ required: false }) note: string | null,
 * ): Promise<OrderResponse>
 * ```
 */
export function MultiBody(keyOrOptions?: string | MultiBodyOptions): ParameterDecorator {
    const options: MultiBodyOptions = typeof keyOrOptions === 'string' ? { key: keyOrOptions } : keyOrOptions ?? {};

    return (target: Object, propertyKey: string | symbol | undefined, parameterIndex: number) => {
        if (propertyKey === undefined) {
            throw new Error('@MultiBody() can only decorate method parameters');
        }
        const params = readIndexedMetadata(BINDING_METADATA_KEYS.MULTI_BODY, target, propertyKey, isMultiBodyParameter);
        params.push(new MultiBodyParameter(parameterIndex, options));
        Reflect.defineMetadata(BINDING_METADATA_KEYS.MULTI_BODY, params, target, propertyKey);
    };
}

/**
 * Mark a parameter as the sink for the validation errors of the parameter
 * declared directly before it. Its type is BindingResult.
 */
export function BindingErrors(): ParameterDecorator {
    return (target: Object, propertyKey: string | symbol | undefined, parameterIndex: number) => {
        if (propertyKey === undefined) {
            throw new Error('@BindingErrors() can only decorate method parameters');
        }
        const indexes = readIndexedMetadata(BINDING_METADATA_KEYS.BINDING_ERRORS, target, propertyKey, isIndex);
        indexes.push(parameterIndex);
        Reflect.defineMetadata(BINDING_METADATA_KEYS.BINDING_ERRORS, indexes, target, propertyKey);
    };
}

/**
 * How one parameter of a handler method is filled.
 * `descriptor` is set for @MultiBody parameters.
 */
export class ParameterBinding {
    constructor(
        public readonly index: number,
        public readonly designType: unknown,
        public readonly descriptor: BindingDescriptor | undefined,
        public readonly errorsSink: boolean,
    ) {}
}

function validationHints(validate: MultiBodyOptions['validate']): ValidationHints | undefined {
    if (validate === undefined || validate === false) {
        return undefined;
    }
    return validate === true ? {} : { groups: validate };
}

function createDescriptor(options: MultiBodyOptions, designType: unknown, sourceName: string | undefined): BindingDescriptor {
    return new BindingDescriptor({
        parameterName: options.name ?? sourceName,
        explicitKey: options.key,
        required: options.required,
        parseAllFields: options.parseAllFields,
        targetShape: options.shape ?? Shapes.fromDesignType(designType),
        validation: validationHints(options.validate),
    });
}

/**
 * Read the parameter bindings of a method declared on a class.
 * Descriptors are built here, once, from the decorator options, the emitted
 * design types and the parameter names in the method source.
 */
export function getParameterBindings(declaringClass: Function, methodName: string): ParameterBinding[] {
    const prototype: object = declaringClass.prototype;
    const method: unknown = Reflect.get(prototype, methodName);

    const designTypes: unknown = Reflect.getMetadata('design:paramtypes', prototype, methodName);
    const types: unknown[] = Array.isArray(designTypes) ? designTypes : [];
    const names = typeof method === 'function' ? parameterNames(method) : [];
    const multiBody = readIndexedMetadata(BINDING_METADATA_KEYS.MULTI_BODY, prototype, methodName, isMultiBodyParameter);
    const sinks = readIndexedMetadata(BINDING_METADATA_KEYS.BINDING_ERRORS, prototype, methodName, isIndex);

    const declaredCount = typeof method === 'function' ? method.length : 0;
    const count = Math.max(
        types.length,
        declaredCount,
        ...multiBody.map((p) => p.index + 1),
        ...sinks.map((i) => i + 1),
    );

    const bindings: ParameterBinding[] = [];
    for (let index = 0; index < count; index++) {
        const param = multiBody.find((p) => p.index === index);
        const descriptor = param ? createDescriptor(param.options, types[index], names[index]) : undefined;
        bindings.push(new ParameterBinding(index, types[index], descriptor, sinks.includes(index)));
    }
    return bindings;
}

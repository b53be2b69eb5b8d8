/**
 * @multibody/http-binding
 *
 * Binds several handler parameters from keys of one shared JSON request body.
 * Framework independent: the server package adapts it to its argument
 * resolvers.
 */

export {
    Shape,
    Shapes,
    PrimitiveKind,
    PrimitiveShape,
    TextShape,
    CollectionShape,
    MapShape,
    ObjectShape,
    StructuralShape,
    ClassType,
    describeShape,
    declaredFields,
    isStructural,
} from './Shape';

export { BindingDescriptor, BindingDescriptorInit, ValidationHints } from './BindingDescriptor';
export { BindingOutcome, bound, absent, failed, valueOrThrow } from './BindingOutcome';
export { KeyedBodyBinder } from './KeyedBodyBinder';
export { StructuralDecoder, ClassTransformerDecoder, DecodeResult } from './StructuralDecoder';
export { JsonBody } from './JsonBody';
export { readPrimitive, asBoolean, asText, PrimitiveValue } from './JsonScalars';
export { BodySource, RequestBodyCache } from './RequestBodyCache';
export { BindingContext } from './BindingContext';
export { BindingResult, FieldError } from './BindingResult';
export { BindingValidator } from './BindingValidator';
export {
    MultiBody,
    MultiBodyOptions,
    BindingErrors,
    ParameterBinding,
    getParameterBindings,
    BINDING_METADATA_KEYS,
} from './decorators';
export { parameterNames } from './parameterNames';

export {
    MalformedBodyError,
    MissingRequiredKeyError,
    StructuralDecodeError,
    ValidationFailedError,
    MissingParameterNameError,
    BindingError,
    isBindingError,
    BINDING_ERROR_SUBTYPES,
} from './errors';

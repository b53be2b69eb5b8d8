import { HttpBadRequestError, HttpInternalServerError } from '@multibody/http-api';
import { BindingResult } from './BindingResult';

/**
 * ProtocolError.subType values of the binding errors.
 */
export const BINDING_ERROR_SUBTYPES = {
    MALFORMED_BODY: 'malformedBody',
    MISSING_REQUIRED_KEY: 'missingRequiredKey',
    STRUCTURAL_DECODE: 'structuralDecode',
    VALIDATION_FAILED: 'validationFailed',
    MISSING_PARAMETER_NAME: 'missingParameterName',
};

/**
 * The request body is not a JSON document.
 */
export class MalformedBodyError extends HttpBadRequestError {
    constructor(detail: string, cause?: Error) {
        super(
            `Malformed JSON request body: ${detail}`,
            undefined,
            undefined,
            cause,
            BINDING_ERROR_SUBTYPES.MALFORMED_BODY,
        );
        this.name = 'MalformedBodyError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * A required value was not found under its key, nor by the whole-body fallback.
 */
export class MissingRequiredKeyError extends HttpBadRequestError {
    public readonly key: string;

    constructor(key: string) {
        super(
            `required param ${key} is not present`,
            key,
            undefined,
            undefined,
            BINDING_ERROR_SUBTYPES.MISSING_REQUIRED_KEY,
        );
        this.name = 'MissingRequiredKeyError';
        this.key = key;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * A value was found but its JSON node type does not fit the declared shape.
 */
export class StructuralDecodeError extends HttpBadRequestError {
    public readonly path: string;

    constructor(path: string, expected: string, actual: string, cause?: Error) {
        super(
            `Cannot decode ${actual} at ${path} as ${expected}`,
            path,
            undefined,
            cause,
            BINDING_ERROR_SUBTYPES.STRUCTURAL_DECODE,
        );
        this.name = 'StructuralDecodeError';
        this.path = path;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Post-decode validation failed and no @BindingErrors() parameter takes the errors.
 */
export class ValidationFailedError extends HttpBadRequestError {
    public readonly bindingResult: BindingResult;

    constructor(bindingResult: BindingResult) {
        super(
            `Validation failed for ${bindingResult.objectName} with ${bindingResult.getErrorCount()} error(s)`,
            bindingResult.objectName,
            undefined,
            undefined,
            BINDING_ERROR_SUBTYPES.VALIDATION_FAILED,
        );
        this.name = 'ValidationFailedError';
        this.bindingResult = bindingResult;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * The binding has neither an explicit key nor a parameter name.
 * A configuration error; reported as 500.
 */
export class MissingParameterNameError extends HttpInternalServerError {
    constructor(location: string) {
        super(
            `Parameter name not available for ${location}; give @MultiBody a key or a name`,
            undefined,
            BINDING_ERROR_SUBTYPES.MISSING_PARAMETER_NAME,
        );
        this.name = 'MissingParameterNameError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Failures KeyedBodyBinder reports through a failed BindingOutcome.
 */
export type BindingError =
    | MalformedBodyError
    | MissingRequiredKeyError
    | StructuralDecodeError
    | MissingParameterNameError;

export function isBindingError(error: unknown): error is BindingError {
    return (
        error instanceof MalformedBodyError ||
        error instanceof MissingRequiredKeyError ||
        error instanceof StructuralDecodeError ||
        error instanceof MissingParameterNameError
    );
}

/**
 * HTTP error classes.
 * Anything thrown from a route that extends HttpError is translated into a
 * ProtocolError body with the error's status code.
 */

/**
 * One field-level violation reported back to the client.
 */
export class ProtocolViolation {
    constructor(
        public field: string,
        public messages: string[],
    ) {}
}

/**
 * ProtocolError - Data class for the error response body.
 */
export class ProtocolError {
    public message?: string;
    public subType?: string;
    public field?: string;
    public name?: string;
    public guiAlertMessage?: string;
    public violations?: ProtocolViolation[];
}

/**
 * HttpError - Base error class with HTTP status code.
 */
export class HttpError extends Error {
    public code: number;
    public subType?: string;
    public readonly httpCause?: Error;

    constructor(message: string, code: number, subType?: string, cause?: Error) {
        super(message);
        this.code = code;
        this.subType = subType;
        this.httpCause = cause;
    }
}

/**
 * HttpNotFoundError - 404 Not Found.
 */
export class HttpNotFoundError extends HttpError {
    constructor(message: string, cause?: Error) {
        super(message, 404, undefined, cause);
        this.name = 'EntityNotFoundError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * EndpointNotFoundError - 404 for a method/path pair with no route.
 */
export class EndpointNotFoundError extends HttpNotFoundError {
    constructor(message: string, cause?: Error) {
        super(message, cause);
        this.name = 'EndpointNotFoundError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpBadRequestError - 400 Bad Request.
 * Used for binding and validation errors with an optional field and GUI message.
 */
export class HttpBadRequestError extends HttpError {
    public field?: string;
    public guiMessage?: string;

    constructor(message: string, field?: string, guiMessage?: string, cause?: Error, subType?: string) {
        super(message, 400, subType, cause);
        this.name = 'BadRequest';
        this.field = field;
        this.guiMessage = guiMessage;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpInternalServerError - 500 Internal Server Error.
 */
export class HttpInternalServerError extends HttpError {
    constructor(message: string, cause?: Error, subType?: string) {
        super(message, 500, subType, cause);
        this.name = 'InternalServerError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

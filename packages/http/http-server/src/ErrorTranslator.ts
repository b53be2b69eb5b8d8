import { injectable } from 'inversify';
import {
    EndpointNotFoundError,
    HttpBadRequestError,
    HttpError,
    HttpInternalServerError,
    HttpNotFoundError,
    ProtocolError,
    ProtocolViolation,
    RouterResponse,
} from '@multibody/http-api';
import { ValidationFailedError } from '@multibody/http-binding';
import { toError } from '@multibody/core-util';
import { provideSingleton } from './decorators';

/**
 * ErrorTranslator - writes errors as JSON ProtocolError bodies.
 *
 * - HttpBadRequestError → 400 with field and guiAlertMessage; a
 *   ValidationFailedError also carries one violation per failing field
 * - HttpNotFoundError → 404
 * - HttpInternalServerError → 500
 * - any other HttpError → its own code
 * - anything else → 500 "Internal Server Error"
 */
@provideSingleton()
@injectable()
export class ErrorTranslator {
    writeError(response: RouterResponse, error: unknown): void {
        if (response.isHeadersSent()) {
            return;
        }

        const protocolError = new ProtocolError();

        if (error instanceof HttpError) {
            protocolError.message = error.message;
            protocolError.subType = error.subType;
            protocolError.name = error.name;

            if (error instanceof HttpBadRequestError) {
                console.log('[ExpressWrapper] Bad Request:', error.message);
                protocolError.field = error.field;
                protocolError.guiAlertMessage = error.guiMessage;
                if (error instanceof ValidationFailedError) {
                    protocolError.violations = error.bindingResult
                        .getFieldErrors()
                        .map((e) => new ProtocolViolation(e.field, [...e.messages]));
                }
            } else if (error instanceof EndpointNotFoundError) {
                console.log('[ExpressWrapper] Endpoint Not Found:', error.message);
            } else if (error instanceof HttpNotFoundError) {
                console.log('[ExpressWrapper] Not Found:', error.message);
            } else if (error instanceof HttpInternalServerError) {
                console.error('[ExpressWrapper] Internal Server Error:', error.message);
            } else {
                console.log('[ExpressWrapper] Generic HttpError:', error.message);
            }

            this.send(response, error.code, protocolError);
        } else {
            const err = toError(error);
            protocolError.message = 'Internal Server Error';
            console.error('[ExpressWrapper] Unexpected error:', err);
            this.send(response, 500, protocolError);
        }
    }

    private send(response: RouterResponse, code: number, protocolError: ProtocolError): void {
        response.setStatus(code);
        response.setHeader('Content-Type', 'application/json');
        response.send(JSON.stringify(protocolError));
    }
}

/**
 * @multibody/http-api
 *
 * HTTP API definition package: route decorators, the request/response
 * abstractions and the HttpError hierarchy.
 *
 * ```
 * http-api (defines the contract)
 *    ↑
 *    ├── http-binding (multi-body parameter binding)
 *    └── http-server (Express integration: contract → handlers)
 * ```
 */

export {
    ApiInterface,
    Get,
    Post,
    Put,
    Delete,
    Patch,
    Path,
    getRoutes,
    isApiInterface,
    RouteMetadata,
    METADATA_KEYS,
} from './decorators';

export { RouterRequest } from './RouterRequest';
export { RouterResponse } from './RouterResponse';
export { RouterReqResp } from './RouterReqResp';

export {
    ProtocolError,
    ProtocolViolation,
    HttpError,
    HttpNotFoundError,
    EndpointNotFoundError,
    HttpBadRequestError,
    HttpInternalServerError,
} from './errors';

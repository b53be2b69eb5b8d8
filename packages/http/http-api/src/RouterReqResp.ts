import { RouterRequest } from './RouterRequest';
import { RouterResponse } from './RouterResponse';

/**
 * RouterReqResp - The request and response abstractions of one exchange.
 */
export class RouterReqResp {
    constructor(
        public readonly request: RouterRequest,
        public readonly response: RouterResponse
    ) {}
}

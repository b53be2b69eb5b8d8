import { BindingResult } from './BindingResult';
import { BodySource, RequestBodyCache } from './RequestBodyCache';

/**
 * BindingContext - per-request binding state.
 *
 * Holds the request's body cache and the binding results attached by the
 * parameters bound so far. One instance per request, discarded with it.
 */
export class BindingContext {
    private readonly bodyCache: RequestBodyCache;
    private readonly results = new Map<string, BindingResult>();

    constructor(source: BodySource) {
        this.bodyCache = new RequestBodyCache(source);
    }

    readBody(): Promise<string> {
        return this.bodyCache.read();
    }

    attachResult(result: BindingResult): void {
        this.results.set(result.objectName, result);
    }

    getResult(name: string): BindingResult | undefined {
        return this.results.get(name);
    }

    getResults(): ReadonlyMap<string, BindingResult> {
        return this.results;
    }
}

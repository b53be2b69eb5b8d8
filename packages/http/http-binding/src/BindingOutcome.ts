import { BindingError } from './errors';

/**
 * Result of binding one parameter.
 * `absent` is a legitimate outcome (optional and not found), not an error.
 */
export type BindingOutcome =
    | { readonly status: 'bound'; readonly value: unknown }
    | { readonly status: 'absent' }
    | { readonly status: 'failed'; readonly error: BindingError };

export function bound(value: unknown): BindingOutcome {
    return { status: 'bound', value };
}

export function absent(): BindingOutcome {
    return { status: 'absent' };
}

export function failed(error: BindingError): BindingOutcome {
    return { status: 'failed', error };
}

/**
 * The value a handler receives: the bound value, or null when absent.
 * Throws the failure's error.
 */
export function valueOrThrow(outcome: BindingOutcome): unknown {
    switch (outcome.status) {
        case 'bound':
            return outcome.value;
        case 'absent':
            return null;
        case 'failed':
            throw outcome.error;
    }
}

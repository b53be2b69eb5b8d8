import { Shape, describeShape } from './Shape';

/**
 * Validation hints passed to the validator (class-validator groups).
 */
export interface ValidationHints {
    readonly groups?: readonly string[];
}

export interface BindingDescriptorInit {
    parameterName?: string;
    explicitKey?: string;
    required?: boolean;
    parseAllFields?: boolean;
    targetShape: Shape;
    validation?: ValidationHints;
}

/**
 * BindingDescriptor - how one parameter is bound from the shared body.
 *
 * Built once when the route is registered and frozen; reused for every
 * request. `required` and `parseAllFields` default to true.
 */
export class BindingDescriptor {
    readonly parameterName?: string;
    readonly explicitKey?: string;
    readonly required: boolean;
    readonly parseAllFields: boolean;
    readonly targetShape: Shape;
    readonly validation?: ValidationHints;

    constructor(init: BindingDescriptorInit) {
        this.parameterName = init.parameterName;
        this.explicitKey = init.explicitKey;
        this.required = init.required ?? true;
        this.parseAllFields = init.parseAllFields ?? true;
        this.targetShape = init.targetShape;
        this.validation = init.validation;
        Object.freeze(this);
    }

    hasExplicitKey(): boolean {
        return this.explicitKey !== undefined && this.explicitKey.length > 0;
    }

    /**
     * The body key to look up: the explicit key if non-empty, else the parameter name.
     */
    lookupKey(): string | undefined {
        if (this.hasExplicitKey()) {
            return this.explicitKey;
        }
        return this.parameterName || undefined;
    }

    /**
     * Name the binding result is attached under.
     */
    bindingName(): string | undefined {
        return this.parameterName || this.lookupKey();
    }

    toString(): string {
        const key = this.lookupKey() ?? '<unnamed>';
        return `${key}:${describeShape(this.targetShape)} required=${this.required} parseAllFields=${this.parseAllFields}`;
    }
}

/**
 * A validation failure on one field of a bound value.
 * `field` is a dotted path relative to the bound value, e.g. `address.city`
 * or `[2].name` for an element of a bound collection.
 */
export class FieldError {
    constructor(
        public readonly field: string,
        public readonly rejectedValue: unknown,
        public readonly messages: string[],
    ) {}
}

/**
 * BindingResult - the validation errors collected for one bound parameter.
 *
 * Attached to the request's BindingContext under the binding name whether or
 * not it has errors, and handed to a @BindingErrors() parameter declared
 * directly after the bound one.
 */
export class BindingResult {
    private readonly fieldErrors: FieldError[] = [];

    constructor(public readonly objectName: string) {}

    addError(error: FieldError): void {
        this.fieldErrors.push(error);
    }

    addErrors(errors: readonly FieldError[]): void {
        this.fieldErrors.push(...errors);
    }

    hasErrors(): boolean {
        return this.fieldErrors.length > 0;
    }

    getErrorCount(): number {
        return this.fieldErrors.length;
    }

    getFieldErrors(): readonly FieldError[] {
        return this.fieldErrors;
    }
}

import { validate, ValidationError } from 'class-validator';
import { BindingDescriptor, ValidationHints } from './BindingDescriptor';
import { FieldError } from './BindingResult';

/**
 * BindingValidator - post-decode validation on class-validator.
 *
 * Validates a bound object, or each object element of a bound collection,
 * against its class-validator decorators. Primitives and strings have
 * nothing to validate.
 */
export class BindingValidator {
    async validate(target: unknown, hints: ValidationHints = {}): Promise<FieldError[]> {
        if (Array.isArray(target)) {
            const errors: FieldError[] = [];
            for (const [i, element] of target.entries()) {
                errors.push(...(await this.validateValue(element, hints, `[${i}]`)));
            }
            return errors;
        }
        return this.validateValue(target, hints, '');
    }

    /**
     * Whether a descriptor asks for validation at all.
     */
    static isRequested(descriptor: BindingDescriptor): boolean {
        return descriptor.validation !== undefined;
    }

    private async validateValue(target: unknown, hints: ValidationHints, prefix: string): Promise<FieldError[]> {
        if (typeof target !== 'object' || target === null || target instanceof Map) {
            return [];
        }
        const groups = hints.groups && hints.groups.length > 0 ? [...hints.groups] : undefined;
        const errors = await validate(target, { groups, forbidUnknownValues: false });
        return flattenErrors(errors, prefix);
    }
}

function joinPath(prefix: string, property: string): string {
    return prefix.length > 0 ? `${prefix}.${property}` : property;
}

/**
 * Flatten class-validator's error tree into one FieldError per failing property.
 */
function flattenErrors(errors: ValidationError[], prefix: string): FieldError[] {
    const fieldErrors: FieldError[] = [];
    for (const error of errors) {
        const field = joinPath(prefix, error.property);
        if (error.constraints) {
            fieldErrors.push(new FieldError(field, error.value, Object.values(error.constraints)));
        }
        if (error.children && error.children.length > 0) {
            fieldErrors.push(...flattenErrors(error.children, field));
        }
    }
    return fieldErrors;
}

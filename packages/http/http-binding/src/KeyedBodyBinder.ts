import { toError } from '@multibody/core-util';
import { BindingDescriptor } from './BindingDescriptor';
import { BindingOutcome, absent, bound, failed } from './BindingOutcome';
import { JsonBody, stringifyJson } from './JsonBody';
import { readPrimitive, asText } from './JsonScalars';
import { MapShape, ObjectShape, Shape } from './Shape';
import { ClassTransformerDecoder, StructuralDecoder } from './StructuralDecoder';
import { MissingParameterNameError, MissingRequiredKeyError, isBindingError } from './errors';

/**
 * KeyedBodyBinder - binds one parameter from a key of the shared JSON body.
 *
 * Lookup order:
 * 1. the value under the explicit key, else under the parameter name;
 * 2. for object and map shapes that parse all fields, the whole body decoded
 *    against the shape ("flat" style, no wrapper key).
 *
 * Failures are returned as a failed outcome, never thrown. Anything that is
 * not a binding failure (a bug in a DTO constructor, say) propagates.
 */
export class KeyedBodyBinder {
    constructor(private readonly decoder: StructuralDecoder = new ClassTransformerDecoder()) {}

    resolve(descriptor: BindingDescriptor, jsonBody: string): BindingOutcome {
        try {
            return this.resolveBody(descriptor, JsonBody.parse(jsonBody));
        } catch (err: unknown) {
            const error = toError(err);
            if (isBindingError(error)) {
                return failed(error);
            }
            throw error;
        }
    }

    private resolveBody(descriptor: BindingDescriptor, body: JsonBody): BindingOutcome {
        const key = descriptor.lookupKey();
        if (key === undefined) {
            return failed(new MissingParameterNameError(descriptor.toString()));
        }

        if (descriptor.hasExplicitKey() && !body.has(key) && descriptor.required) {
            return failed(new MissingRequiredKeyError(key));
        }

        if (body.has(key)) {
            return this.decodePresent(body.get(key), descriptor.targetShape, key);
        }
        return this.resolveMissing(descriptor, body, key);
    }

    /**
     * A value node was found; required and parseAllFields play no part here.
     */
    private decodePresent(node: unknown, shape: Shape, key: string): BindingOutcome {
        switch (shape.kind) {
            case 'primitive':
                return this.toOutcome(readPrimitive(node, shape, key));
            case 'text':
                return this.toOutcome(asText(node, key));
            default:
                return this.toOutcome(this.decoder.decode(stringifyJson(node), shape, key).value);
        }
    }

    private resolveMissing(descriptor: BindingDescriptor, body: JsonBody, key: string): BindingOutcome {
        const shape = descriptor.targetShape;
        if ((shape.kind === 'object' || shape.kind === 'map') && descriptor.parseAllFields) {
            return this.decodeWholeBody(descriptor, shape, body, key);
        }

        const mustHaveValue = shape.kind === 'primitive' && !shape.nullable;
        if (mustHaveValue || descriptor.required) {
            return failed(new MissingRequiredKeyError(key));
        }
        return absent();
    }

    /**
     * Decode the entire body against the shape, for bodies that carry the
     * object's fields as top-level keys. A map is taken as is; a required
     * object none of whose fields got a value counts as not found.
     */
    private decodeWholeBody(
        descriptor: BindingDescriptor,
        shape: ObjectShape | MapShape,
        body: JsonBody,
        key: string,
    ): BindingOutcome {
        const result = this.decoder.decode(body.text, shape);
        if (shape.kind === 'object' && descriptor.required && result.populatedFields.size === 0) {
            return failed(new MissingRequiredKeyError(key));
        }
        return this.toOutcome(result.value);
    }

    private toOutcome(value: unknown): BindingOutcome {
        return value === null ? absent() : bound(value);
    }
}

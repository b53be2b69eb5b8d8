import { plainToInstance } from 'class-transformer';
import { toError } from '@multibody/core-util';
import { CollectionShape, MapShape, ObjectShape, Shape, StructuralShape, describeShape, fieldShape } from './Shape';
import { readPrimitive, asText } from './JsonScalars';
import { describeNode, isJsonObject, parseJson, toPlainJson } from './JsonBody';
import { StructuralDecodeError } from './errors';

/**
 * Decoded value plus the declared fields of an object shape that received a
 * non-null value. The set is empty for collections and maps.
 */
export interface DecodeResult {
    readonly value: unknown;
    readonly populatedFields: ReadonlySet<string>;
}

/**
 * Generic JSON-to-structure decoder.
 * Fails with StructuralDecodeError when the JSON does not fit the shape.
 */
export interface StructuralDecoder {
    decode(jsonText: string, shape: StructuralShape, path?: string): DecodeResult;
}

const NO_FIELDS: ReadonlySet<string> = new Set<string>();

/**
 * StructuralDecoder on class-transformer.
 *
 * Object shapes copy only their declared fields into a plainToInstance()
 * call, so extra keys in the body are ignored. Nested classes follow the
 * DTO's own @Type() decorators. Each field that has a shape (see
 * fieldShape()) is decoded with it first, so a field of the wrong JSON type
 * fails with its dotted path.
 */
export class ClassTransformerDecoder implements StructuralDecoder {
    decode(jsonText: string, shape: StructuralShape, path: string = '$'): DecodeResult {
        let node: unknown;
        try {
            node = parseJson(jsonText);
        } catch (err: unknown) {
            const error = toError(err);
            throw new StructuralDecodeError(path, describeShape(shape), 'invalid JSON', error);
        }
        return this.decodeNode(node, shape, path);
    }

    private decodeNode(node: unknown, shape: StructuralShape, path: string): DecodeResult {
        if (node === null) {
            return { value: null, populatedFields: NO_FIELDS };
        }
        switch (shape.kind) {
            case 'collection':
                return { value: this.decodeCollection(node, shape, path), populatedFields: NO_FIELDS };
            case 'map':
                return { value: this.decodeMap(node, shape, path), populatedFields: NO_FIELDS };
            case 'object':
                return this.decodeObject(node, shape, path);
        }
    }

    private decodeValue(node: unknown, shape: Shape | undefined, path: string): unknown {
        if (!shape) {
            return toPlainJson(node);
        }
        switch (shape.kind) {
            case 'primitive':
                return readPrimitive(node, shape, path);
            case 'text':
                return asText(node, path);
            default:
                return this.decodeNode(node, shape, path).value;
        }
    }

    private decodeCollection(node: unknown, shape: CollectionShape, path: string): unknown[] {
        if (!Array.isArray(node)) {
            throw new StructuralDecodeError(path, describeShape(shape), describeNode(node));
        }
        return node.map((element: unknown, i) => this.decodeValue(element, shape.element, `${path}[${i}]`));
    }

    private decodeMap(node: unknown, shape: MapShape, path: string): Record<string, unknown> | Map<string, unknown> {
        if (!isJsonObject(node)) {
            throw new StructuralDecodeError(path, describeShape(shape), describeNode(node));
        }
        const entries = Object.entries(node).map(
            ([key, value]): [string, unknown] => [key, this.decodeValue(value, shape.value, `${path}.${key}`)],
        );
        return shape.container === 'map' ? new Map(entries) : Object.fromEntries(entries);
    }

    private decodeObject(node: unknown, shape: ObjectShape, path: string): DecodeResult {
        if (!isJsonObject(node)) {
            throw new StructuralDecodeError(path, describeShape(shape), describeNode(node));
        }

        const declared: Record<string, unknown> = {};
        const decoded = new Map<string, unknown>();
        const populated = new Set<string>();
        for (const field of shape.fields) {
            if (!Object.prototype.hasOwnProperty.call(node, field)) {
                continue;
            }
            const value = node[field];
            declared[field] = toPlainJson(value);
            if (value !== null && value !== undefined) {
                populated.add(field);
            }

            const declaredShape = fieldShape(shape, field);
            if (declaredShape) {
                const fieldValue = this.decodeValue(value, declaredShape, `${path}.${field}`);
                if (isTyped(declaredShape)) {
                    decoded.set(field, fieldValue);
                }
            }
        }

        const instance = plainToInstance(shape.type, declared);
        decoded.forEach((value, field) => Reflect.set(instance, field, value));
        return { value: instance, populatedFields: populated };
    }
}

/**
 * Whether decoding with the shape gives a better value than class-transformer.
 * Untyped collections and records are only checked; @Type() fills their elements.
 */
function isTyped(shape: Shape): boolean {
    switch (shape.kind) {
        case 'collection':
            return shape.element !== undefined;
        case 'map':
            return shape.value !== undefined || shape.container === 'map';
        default:
            return true;
    }
}

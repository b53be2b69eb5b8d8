/**
 * Shape - the target structure a bound value is decoded into.
 *
 * Shapes are built once, when a route is registered, either explicitly with
 * the Shapes factory or from the parameter's emitted design type. The binder
 * dispatches on `kind` and never inspects runtime types of the target.
 */

import 'reflect-metadata';

export type PrimitiveKind = 'int' | 'short' | 'long' | 'float' | 'double' | 'byte' | 'boolean' | 'char';

/**
 * A class the structural decoder can instantiate.
 */
export type ClassType<T extends object = object> = new () => T;

export interface PrimitiveShape {
    readonly kind: 'primitive';
    readonly primitive: PrimitiveKind;
    /** false for kinds that must always carry a value (a missing key is then an error). */
    readonly nullable: boolean;
}

export interface TextShape {
    readonly kind: 'text';
}

export interface CollectionShape {
    readonly kind: 'collection';
    /** Elements are passed through as parsed JSON when absent. */
    readonly element?: Shape;
}

export interface MapShape {
    readonly kind: 'map';
    readonly value?: Shape;
    /** 'record' decodes to a plain object, 'map' to an ES Map. */
    readonly container: 'record' | 'map';
}

export interface ObjectShape {
    readonly kind: 'object';
    readonly type: ClassType;
    /** Declared field names; only these are copied from the JSON object. */
    readonly fields: readonly string[];
    /** Field shapes that replace the ones derived from emitted `design:type` metadata. */
    readonly fieldShapes?: Readonly<Record<string, Shape>>;
}

export type Shape = PrimitiveShape | TextShape | CollectionShape | MapShape | ObjectShape;

export type StructuralShape = CollectionShape | MapShape | ObjectShape;

export function isStructural(shape: Shape): shape is StructuralShape {
    return shape.kind === 'collection' || shape.kind === 'map' || shape.kind === 'object';
}

export function isClassType(value: unknown): value is ClassType {
    return typeof value === 'function' && value.prototype !== undefined;
}

/**
 * Field names of a DTO class, read from a fresh instance.
 * Every declared field is an own property of the instance since class
 * fields are compiled with define semantics.
 */
export function declaredFields(type: ClassType): string[] {
    return Object.keys(new type());
}

function primitive(kind: PrimitiveKind, nullable: boolean): PrimitiveShape {
    return { kind: 'primitive', primitive: kind, nullable };
}

export const Shapes = {
    primitive,
    int: (nullable = false): PrimitiveShape => primitive('int', nullable),
    short: (nullable = false): PrimitiveShape => primitive('short', nullable),
    long: (nullable = false): PrimitiveShape => primitive('long', nullable),
    float: (nullable = false): PrimitiveShape => primitive('float', nullable),
    double: (nullable = false): PrimitiveShape => primitive('double', nullable),
    byte: (nullable = false): PrimitiveShape => primitive('byte', nullable),
    boolean: (nullable = false): PrimitiveShape => primitive('boolean', nullable),
    char: (nullable = false): PrimitiveShape => primitive('char', nullable),

    text: (): TextShape => ({ kind: 'text' }),

    collection: (element?: Shape): CollectionShape => ({ kind: 'collection', element }),

    map: (value?: Shape): MapShape => ({ kind: 'map', value, container: 'record' }),

    esMap: (value?: Shape): MapShape => ({ kind: 'map', value, container: 'map' }),

    object: (
        type: ClassType,
        fields?: readonly string[],
        fieldShapes?: Readonly<Record<string, Shape>>,
    ): ObjectShape => ({
        kind: 'object',
        type,
        fields: fields ?? declaredFields(type),
        fieldShapes,
    }),

    /**
     * Shape for a parameter's emitted `design:paramtypes` entry.
     * `number` and `boolean` become nullable primitives, `string` text,
     * arrays collections of raw JSON, `Map` an ES Map, interfaces, unions and
     * `object` plain records, classes object shapes.
     */
    fromDesignType(designType: unknown): Shape {
        if (designType === Number) {
            return primitive('double', true);
        }
        if (designType === Boolean) {
            return primitive('boolean', true);
        }
        if (designType === String) {
            return Shapes.text();
        }
        if (designType === Array) {
            return Shapes.collection();
        }
        if (designType === Map) {
            return Shapes.esMap();
        }
        if (designType !== Object && isClassType(designType)) {
            return Shapes.object(designType);
        }
        return Shapes.map();
    },
};

// Design types that say nothing about the JSON a field takes
const UNCHECKED_DESIGN_TYPES = new Set<unknown>([undefined, Object, Function, Promise, Date, Set, Symbol]);

const derivedFieldShapes = new WeakMap<ObjectShape, Map<string, Shape | undefined>>();

/**
 * Shape a field of an object shape is decoded with, or undefined when the
 * field's JSON is taken as is.
 *
 * A field only has emitted `design:type` metadata when it carries a
 * decorator (`@Type()`, a class-validator rule, ...). Derived shapes are
 * computed on first use, so classes that refer to themselves do not recurse.
 */
export function fieldShape(shape: ObjectShape, field: string): Shape | undefined {
    const explicit = shape.fieldShapes?.[field];
    if (explicit) {
        return explicit;
    }

    let cache = derivedFieldShapes.get(shape);
    if (!cache) {
        cache = new Map();
        derivedFieldShapes.set(shape, cache);
    }
    if (!cache.has(field)) {
        const designType: unknown = Reflect.getMetadata('design:type', shape.type.prototype, field);
        cache.set(field, UNCHECKED_DESIGN_TYPES.has(designType) ? undefined : Shapes.fromDesignType(designType));
    }
    return cache.get(field);
}

/**
 * Short human readable form used in error messages and logs,
 * e.g. `int`, `double?`, `collection<text>`, `object<Address>`.
 */
export function describeShape(shape: Shape): string {
    switch (shape.kind) {
        case 'primitive':
            return shape.nullable ? `${shape.primitive}?` : shape.primitive;
        case 'text':
            return 'text';
        case 'collection':
            return shape.element ? `collection<${describeShape(shape.element)}>` : 'collection';
        case 'map':
            return shape.value ? `map<${describeShape(shape.value)}>` : 'map';
        case 'object':
            return `object<${shape.type.name}>`;
    }
}

import { PrimitiveKind, PrimitiveShape } from './Shape';
import { describeNode, isJsonNumber } from './JsonBody';
import { StructuralDecodeError } from './errors';

export type PrimitiveValue = number | boolean | string;

/**
 * A number read from a node. Integer literals stay exact as bigint and
 * narrow by wrapping; literals with a fraction or exponent are doubles and
 * narrow by truncating and saturating.
 */
export type NumericValue = number | bigint;

const INT_MIN = -2147483648;
const INT_MAX = 2147483647;
const LONG_MIN = -(2n ** 63n);
const LONG_MAX = 2n ** 63n - 1n;
const INTEGER_LITERAL = /^-?\d+$/;

function literalValue(literal: string): NumericValue {
    return INTEGER_LITERAL.test(literal) ? BigInt(literal) : Number(literal);
}

/**
 * Numeric value of a scalar node: JSON numbers from their literal,
 * numeric strings parsed.
 */
function numericValue(node: unknown, kind: PrimitiveKind, path: string): NumericValue {
    if (isJsonNumber(node)) {
        return literalValue(node.value);
    }
    if (typeof node === 'number') {
        return Number.isSafeInteger(node) ? BigInt(node) : node;
    }
    if (typeof node === 'string') {
        const trimmed = node.trim();
        if (trimmed.length > 0 && Number.isFinite(Number(trimmed))) {
            return literalValue(trimmed);
        }
    }
    throw new StructuralDecodeError(path, kind, describeNode(node));
}

function toDouble(value: NumericValue): number {
    return typeof value === 'bigint' ? Number(value) : value;
}

/**
 * 32 bit signed value: integers wrap, doubles truncate toward zero and saturate.
 */
export function toInt(value: NumericValue): number {
    if (typeof value === 'bigint') {
        return Number(BigInt.asIntN(32, value));
    }
    if (Number.isNaN(value)) {
        return 0;
    }
    const truncated = Math.min(INT_MAX, Math.max(INT_MIN, Math.trunc(value)));
    // normalise -0
    return truncated + 0;
}

export function toShort(value: NumericValue): number {
    return (toInt(value) << 16) >> 16;
}

export function toByte(value: NumericValue): number {
    return (toInt(value) << 24) >> 24;
}

/**
 * 64 bit signed value: integers wrap, doubles truncate toward zero and saturate.
 */
export function toLong(value: NumericValue): bigint {
    if (typeof value === 'bigint') {
        return BigInt.asIntN(64, value);
    }
    if (Number.isNaN(value)) {
        return 0n;
    }
    if (!Number.isFinite(value)) {
        return value > 0 ? LONG_MAX : LONG_MIN;
    }
    const truncated = BigInt(Math.trunc(value));
    if (truncated > LONG_MAX) {
        return LONG_MAX;
    }
    return truncated < LONG_MIN ? LONG_MIN : truncated;
}

/**
 * A long as a JavaScript number. Values a double cannot hold exactly fail.
 */
function readLong(node: unknown, path: string): number {
    const value = toLong(numericValue(node, 'long', path));
    if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
        throw new StructuralDecodeError(path, 'long', `${value} beyond the safe integer range`);
    }
    return Number(value);
}

/**
 * Truthiness of a node: booleans, the string "true", non-zero numbers.
 * Never fails.
 */
export function asBoolean(node: unknown): boolean {
    if (typeof node === 'boolean') {
        return node;
    }
    if (typeof node === 'string') {
        return node.trim() === 'true';
    }
    if (typeof node === 'number') {
        return node !== 0;
    }
    if (isJsonNumber(node)) {
        return Number(node.value) !== 0;
    }
    return false;
}

/**
 * Text form of a scalar node. Containers have none.
 */
export function asText(node: unknown, path: string): string | null {
    if (node === null) {
        return null;
    }
    if (typeof node === 'string') {
        return node;
    }
    if (typeof node === 'number' || typeof node === 'boolean') {
        return String(node);
    }
    if (isJsonNumber(node)) {
        return String(literalValue(node.value));
    }
    throw new StructuralDecodeError(path, 'text', describeNode(node));
}

type ScalarReader = (node: unknown, path: string) => PrimitiveValue | null;

/**
 * Decode table for non-null scalar nodes, one reader per primitive kind.
 */
const SCALAR_READERS: Record<PrimitiveKind, ScalarReader> = {
    int: (node, path) => toInt(numericValue(node, 'int', path)),
    short: (node, path) => toShort(numericValue(node, 'short', path)),
    long: (node, path) => readLong(node, path),
    float: (node, path) => Math.fround(toDouble(numericValue(node, 'float', path))),
    double: (node, path) => toDouble(numericValue(node, 'double', path)),
    byte: (node, path) => toByte(numericValue(node, 'byte', path)),
    boolean: (node) => asBoolean(node),
    char: (node, path) => {
        const text = asText(node, path);
        return text !== null && text.length > 0 ? text.charAt(0) : null;
    },
};

const ZERO_VALUES: Record<PrimitiveKind, PrimitiveValue> = {
    int: 0,
    short: 0,
    long: 0,
    float: 0,
    double: 0,
    byte: 0,
    boolean: false,
    char: '\u0000',
};

/**
 * Decode a scalar node as a primitive.
 *
 * A JSON null gives null for nullable shapes and the kind's zero value
 * otherwise. A char whose text is empty gives null. Nodes that cannot be
 * coerced fail with StructuralDecodeError.
 */
export function readPrimitive(node: unknown, shape: PrimitiveShape, path: string): PrimitiveValue | null {
    if (node === null) {
        return shape.nullable ? null : ZERO_VALUES[shape.primitive];
    }
    return SCALAR_READERS[shape.primitive](node, path);
}

import { LosslessNumber, isLosslessNumber, parse, stringify } from 'lossless-json';
import { describeJsonValue, toError } from '@multibody/core-util';
import { MalformedBodyError } from './errors';

/**
 * Parse JSON keeping every number as a LosslessNumber, so scalar readers
 * see the literal ("3000000000.0", "9007199254740993") and not a rounded double.
 */
export function parseJson(text: string): unknown {
    return parse(text);
}

export function stringifyJson(node: unknown): string {
    return stringify(node) ?? 'null';
}

export function isJsonNumber(node: unknown): node is LosslessNumber {
    return isLosslessNumber(node);
}

export function isJsonObject(node: unknown): node is Record<string, unknown> {
    return typeof node === 'object' && node !== null && !Array.isArray(node) && !isLosslessNumber(node);
}

/**
 * JSON node type of a parsed node, numbers included.
 */
export function describeNode(node: unknown): string {
    return isLosslessNumber(node) ? 'number' : describeJsonValue(node);
}

/**
 * Plain JavaScript form of a parsed node, for values handed out untyped.
 * Numbers become doubles.
 */
export function toPlainJson(node: unknown): unknown {
    if (isLosslessNumber(node)) {
        return Number(node.value);
    }
    if (Array.isArray(node)) {
        return node.map((element: unknown) => toPlainJson(element));
    }
    if (isJsonObject(node)) {
        return Object.fromEntries(Object.entries(node).map(([key, value]) => [key, toPlainJson(value)]));
    }
    return node;
}

/**
 * A parsed request body and the text it was parsed from.
 * Keys are only looked up on an object root; any other root has no keys.
 */
export class JsonBody {
    private constructor(
        public readonly text: string,
        public readonly root: unknown,
    ) {}

    /**
     * An empty or blank body parses as `{}`.
     */
    static parse(text: string): JsonBody {
        if (text.trim().length === 0) {
            return new JsonBody('{}', {});
        }
        try {
            return new JsonBody(text, parseJson(text));
        } catch (err: unknown) {
            const error = toError(err);
            throw new MalformedBodyError(error.message, error);
        }
    }

    has(key: string): boolean {
        return isJsonObject(this.root) && Object.prototype.hasOwnProperty.call(this.root, key);
    }

    /**
     * Value node under key, or undefined when the key is absent.
     */
    get(key: string): unknown {
        if (!this.has(key) || !isJsonObject(this.root)) {
            return undefined;
        }
        return this.root[key];
    }
}

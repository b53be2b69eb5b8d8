import { toError, describeJsonValue } from '../lib/errorUtils';

describe('toError', () => {
    describe('Error instances', () => {
        it('should return Error instances unchanged', () => {
            const originalError = new Error('body stream closed');
            const result = toError(originalError);

            expect(result).toBe(originalError);
            expect(result.message).toBe('body stream closed');
        });

        it('should return Error subclasses unchanged', () => {
            class DecodeFailure extends Error {
                constructor(message: string) {
                    super(message);
                    this.name = 'DecodeFailure';
                }
            }

            const originalError = new DecodeFailure('bad node');
            const result = toError(originalError);

            expect(result).toBe(originalError);
            expect(result.name).toBe('DecodeFailure');
        });
    });

    describe('Error-like objects', () => {
        it('should keep message, name and stack', () => {
            const result = toError({
                message: 'Unexpected end of JSON input',
                name: 'SyntaxError',
                stack: 'SyntaxError: Unexpected end of JSON input',
            });

            expect(result).toBeInstanceOf(Error);
            expect(result.message).toBe('Unexpected end of JSON input');
            expect(result.name).toBe('SyntaxError');
            expect(result.stack).toBe('SyntaxError: Unexpected end of JSON input');
        });

        it('should stringify a non-string message', () => {
            const result = toError({ message: 42 });

            expect(result.message).toBe('42');
        });
    });

    describe('Objects without message', () => {
        it('should stringify plain objects', () => {
            const result = toError({ key: 'user', status: 400 });

            expect(result.message).toBe('Non-Error object thrown: {"key":"user","status":400}');
        });

        it('should handle objects with circular references', () => {
            const node: Record<string, unknown> = { name: 'circular' };
            node['self'] = node;

            const result = toError(node);

            expect(result.message).toBe('Non-Error object thrown (unable to stringify)');
        });

        it('should handle empty objects', () => {
            expect(toError({}).message).toBe('Non-Error object thrown: {}');
        });
    });

    describe('Primitive values', () => {
        it('should use a string as the message', () => {
            expect(toError('read failed').message).toBe('read failed');
        });

        it('should convert numbers and booleans', () => {
            expect(toError(404).message).toBe('404');
            expect(toError(false).message).toBe('false');
        });

        it('should handle null and undefined', () => {
            expect(toError(null).message).toBe('Null or undefined thrown');
            expect(toError(undefined).message).toBe('Null or undefined thrown');
        });

        it('should handle symbol and bigint', () => {
            expect(toError(Symbol('body')).message).toBe('Symbol(body)');
            expect(toError(BigInt(9007199254740991)).message).toBe('9007199254740991');
        });
    });
});

describe('describeJsonValue', () => {
    it('should name each JSON node type', () => {
        expect(describeJsonValue(null)).toBe('null');
        expect(describeJsonValue([1, 2])).toBe('array');
        expect(describeJsonValue({ a: 1 })).toBe('object');
        expect(describeJsonValue('x')).toBe('string');
        expect(describeJsonValue(3.5)).toBe('number');
        expect(describeJsonValue(true)).toBe('boolean');
        expect(describeJsonValue(undefined)).toBe('undefined');
    });
});

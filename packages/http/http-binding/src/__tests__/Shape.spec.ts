import { Shapes, declaredFields, describeShape, isStructural } from '../Shape';

class Profile {
    nickname?: string;
    age = 0;
}

describe('Shapes', () => {
    it('should map emitted design types to shapes', () => {
        expect(Shapes.fromDesignType(Number)).toEqual({ kind: 'primitive', primitive: 'double', nullable: true });
        expect(Shapes.fromDesignType(Boolean)).toEqual({ kind: 'primitive', primitive: 'boolean', nullable: true });
        expect(Shapes.fromDesignType(String)).toEqual({ kind: 'text' });
        expect(Shapes.fromDesignType(Array)).toEqual({ kind: 'collection', element: undefined });
        expect(Shapes.fromDesignType(Map)).toEqual({ kind: 'map', value: undefined, container: 'map' });
        expect(Shapes.fromDesignType(Object)).toEqual({ kind: 'map', value: undefined, container: 'record' });
        expect(Shapes.fromDesignType(undefined)).toEqual({ kind: 'map', value: undefined, container: 'record' });
        expect(Shapes.fromDesignType(Profile)).toEqual({ kind: 'object', type: Profile, fields: ['nickname', 'age'] });
    });

    it('should read declared fields from an instance', () => {
        expect(declaredFields(Profile)).toEqual(['nickname', 'age']);
    });

    it('should describe shapes briefly', () => {
        expect(describeShape(Shapes.int())).toBe('int');
        expect(describeShape(Shapes.long(true))).toBe('long?');
        expect(describeShape(Shapes.collection(Shapes.object(Profile)))).toBe('collection<object<Profile>>');
        expect(describeShape(Shapes.map(Shapes.text()))).toBe('map<text>');
    });

    it('should tell structural shapes apart', () => {
        expect(isStructural(Shapes.esMap())).toBe(true);
        expect(isStructural(Shapes.object(Profile))).toBe(true);
        expect(isStructural(Shapes.text())).toBe(false);
        expect(isStructural(Shapes.char())).toBe(false);
    });
});

import 'reflect-metadata';
import { Type } from 'class-transformer';
import { IsEmail, IsNotEmpty, IsPositive, IsString, MinLength, ValidateNested } from 'class-validator';
import { BindingValidator } from '../BindingValidator';
import { BindingDescriptor } from '../BindingDescriptor';
import { Shapes } from '../Shape';

class Contact {
    @IsString()
    @IsNotEmpty()
    name: string = '';

    @IsEmail()
    email: string = '';
}

class Signup {
    @MinLength(8, { groups: ['strict'] })
    password: string = '';

    @IsNotEmpty()
    login: string = '';
}

class Item {
    @IsPositive()
    qty: number = 1;
}

class Basket {
    @ValidateNested()
    @Type(() => Item)
    item: Item = new Item();
}

function contact(name: string, email: string): Contact {
    const c = new Contact();
    c.name = name;
    c.email = email;
    return c;
}

describe('BindingValidator', () => {
    const validator = new BindingValidator();

    it('should return no errors for a valid object', async () => {
        expect(await validator.validate(contact('Alice', 'alice@example.com'))).toEqual([]);
    });

    it('should report one field error per failing property', async () => {
        const errors = await validator.validate(contact('', 'not-an-email'));
        const byField = new Map(errors.map((e) => [e.field, e]));

        expect(errors).toHaveLength(2);
        expect(byField.get('name')?.messages).toEqual(['name should not be empty']);
        expect(byField.get('name')?.rejectedValue).toBe('');
        expect(byField.get('email')?.messages).toEqual(['email must be an email']);
    });

    it('should run only the requested groups', async () => {
        const signup = new Signup();
        signup.password = 'abc';

        const strict = await validator.validate(signup, { groups: ['strict'] });
        const all = await validator.validate(signup);

        expect(strict.map((e) => e.field)).toEqual(['password']);
        expect(strict[0].messages).toEqual(['password must be longer than or equal to 8 characters']);
        expect(all.map((e) => e.field).sort()).toEqual(['login', 'password']);
    });

    it('should give dotted paths for nested objects', async () => {
        const basket = new Basket();
        basket.item.qty = -1;

        const errors = await validator.validate(basket);

        expect(errors).toHaveLength(1);
        expect(errors[0].field).toBe('item.qty');
        expect(errors[0].messages).toEqual(['qty must be a positive number']);
    });

    it('should validate each element of a collection', async () => {
        const errors = await validator.validate([contact('Alice', 'alice@example.com'), contact('', 'bob@example.com')]);

        expect(errors.map((e) => e.field)).toEqual(['[1].name']);
    });

    it('should have nothing to validate on scalars, maps and plain records', async () => {
        expect(await validator.validate('text')).toEqual([]);
        expect(await validator.validate(null)).toEqual([]);
        expect(await validator.validate(new Map([['a', 1]]))).toEqual([]);
        expect(await validator.validate({ a: 1 })).toEqual([]);
    });

    it('should tell whether a descriptor asks for validation', () => {
        const plain = new BindingDescriptor({ parameterName: 'c', targetShape: Shapes.object(Contact) });
        const checked = new BindingDescriptor({ parameterName: 'c', targetShape: Shapes.object(Contact), validation: {} });

        expect(BindingValidator.isRequested(plain)).toBe(false);
        expect(BindingValidator.isRequested(checked)).toBe(true);
    });
});

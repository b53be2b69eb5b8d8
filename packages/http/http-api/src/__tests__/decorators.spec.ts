import 'reflect-metadata';
import { ApiInterface, Get, Path, Post, getRoutes, isApiInterface } from '../decorators';
import { EndpointNotFoundError, HttpBadRequestError, HttpError, HttpNotFoundError } from '../errors';

class RenameRequest {
    name: string = '';
}

@ApiInterface()
abstract class AccountApiPrototype {
    @Post()
    @Path('/account/rename')
    rename(id: number, request: RenameRequest): Promise<string> {
        throw new Error(`Must be implemented ${id} ${request.name}`);
    }

    @Get()
    @Path('/account/status')
    status(): Promise<string> {
        throw new Error('Must be implemented');
    }
}

class NotAnApi {}

describe('route decorators', () => {
    it('should mark API interface classes', () => {
        expect(isApiInterface(AccountApiPrototype)).toBe(true);
        expect(isApiInterface(NotAnApi)).toBe(false);
    });

    it('should collect one route per decorated method', () => {
        const routes = getRoutes(AccountApiPrototype);

        expect(routes.map((r) => `${r.httpMethod} ${r.path} ${r.methodName}`).sort()).toEqual([
            'GET /account/status status',
            'POST /account/rename rename',
        ]);
    });

    it('should return no routes for an undecorated class', () => {
        expect(getRoutes(NotAnApi)).toEqual([]);
    });
});

describe('HttpError hierarchy', () => {
    it('should carry status code and field on bad requests', () => {
        const error = new HttpBadRequestError('required param user is not present', 'user');

        expect(error).toBeInstanceOf(HttpError);
        expect(error.code).toBe(400);
        expect(error.field).toBe('user');
        expect(error.name).toBe('BadRequest');
    });

    it('should keep subclass identity for endpoint lookups', () => {
        const error = new EndpointNotFoundError('No route for POST /nowhere');

        expect(error).toBeInstanceOf(HttpNotFoundError);
        expect(error.code).toBe(404);
        expect(error.name).toBe('EndpointNotFoundError');
    });
});

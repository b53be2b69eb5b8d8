import 'reflect-metadata';
import { ContainerModule } from 'inversify';
import { IsInt } from 'class-validator';
import { ApiInterface, EndpointNotFoundError, Path, Post } from '@multibody/http-api';
import { BindingErrors, BindingResult, MultiBody, Shapes } from '@multibody/http-binding';
import { MultiBodyFactory } from '../MultiBodyFactory';
import { MultiBodyServer } from '../MultiBodyServer';
import { MultiBodyConfig } from '../config/MultiBodyConfig';
import { RESTApiRoutes } from '../RESTApiRoutes';
import { Routes, WebAppMeta } from '../WebAppMeta';
import { Controller, provideSingleton } from '../decorators';
import { TestRouterRequest } from '../testing/TestRouterRequest';
import { TestRouterResponse } from '../testing/TestRouterResponse';

class Point {
    @IsInt()
    x?: number;

    @IsInt()
    y?: number;
}

interface MoveResponse {
    id: number;
    label: string | null;
    x?: number;
    y?: number;
}

interface CheckResponse {
    valid: boolean;
    fields: string[];
}

interface GeometryApi {
    move(id: number, label: string | null, to: Point): Promise<MoveResponse>;
    check(to: Point, errors: BindingResult): Promise<CheckResponse>;
}

@ApiInterface()
abstract class GeometryApiPrototype implements GeometryApi {
    @Post()
    @Path('/shapes/move')
    move(
        @MultiBody({ key: 'id', shape: Shapes.long() }) id: number,
        @MultiBody({ required: false }) label: string | null,
        @MultiBody({ validate: true }) to: Point,
    ): Promise<MoveResponse> {
        throw new Error('Method move() must be implemented by subclass');
    }

    @Post()
    @Path('/shapes/check')
    check(@MultiBody({ validate: true }) to: Point, @BindingErrors() errors: BindingResult): Promise<CheckResponse> {
        throw new Error('Method check() must be implemented by subclass');
    }
}

@provideSingleton()
@Controller()
class GeometryController implements GeometryApi {
    async move(id: number, label: string | null, to: Point): Promise<MoveResponse> {
        return { id, label, x: to.x, y: to.y };
    }

    async check(to: Point, errors: BindingResult): Promise<CheckResponse> {
        return { valid: !errors.hasErrors(), fields: errors.getFieldErrors().map((e) => e.field) };
    }
}

class GeometryMeta implements WebAppMeta {
    getDIModules(): ContainerModule[] {
        return [];
    }

    getRoutes(): Routes[] {
        return [new RESTApiRoutes(GeometryApiPrototype, GeometryController)];
    }
}

async function post(server: MultiBodyServer, path: string, body: string): Promise<TestRouterResponse> {
    const response = new TestRouterResponse();
    await server.createRouteInvoker('POST', path).invoke(new TestRouterRequest(body), response);
    return response;
}

describe('MultiBodyServer', () => {
    let server: MultiBodyServer;

    beforeEach(async () => {
        server = await MultiBodyFactory.create(new GeometryMeta(), new MultiBodyConfig());
    });

    afterEach(async () => {
        await server.stop();
    });

    it('should bind every parameter from one read of the body', async () => {
        const request = new TestRouterRequest('{"id":7,"label":"home","to":{"x":1,"y":2}}');
        const response = new TestRouterResponse();

        await server.createRouteInvoker('POST', '/shapes/move').invoke(request, response);

        expect(response.status).toBe(200);
        expect(response.headers.get('content-type')).toBe('application/json');
        expect(response.json()).toEqual({ id: 7, label: 'home', x: 1, y: 2 });
        expect(request.readCount).toBe(1);
    });

    it('should bind an object from top-level keys and pass null for an absent optional key', async () => {
        const response = await post(server, '/shapes/move', '{"id":7,"x":3,"y":4}');

        expect(response.status).toBe(200);
        expect(response.json()).toEqual({ id: 7, label: null, x: 3, y: 4 });
    });

    it('should answer 400 when a required key is missing', async () => {
        const response = await post(server, '/shapes/move', '{"to":{"x":1,"y":2}}');

        expect(response.status).toBe(400);
        expect(response.json()).toEqual({
            message: 'required param id is not present',
            subType: 'missingRequiredKey',
            field: 'id',
            name: 'MissingRequiredKeyError',
        });
    });

    it('should answer 400 when a value does not fit its shape', async () => {
        const response = await post(server, '/shapes/move', '{"id":{"n":1},"to":{"x":1,"y":2}}');

        expect(response.status).toBe(400);
        expect(response.json()).toEqual({
            message: 'Cannot decode object at id as long',
            subType: 'structuralDecode',
            field: 'id',
            name: 'StructuralDecodeError',
        });
    });

    it('should answer 400 when a field of an object does not fit its declared type', async () => {
        const response = await post(server, '/shapes/move', '{"id":1,"to":{"x":"a","y":2}}');

        expect(response.status).toBe(400);
        expect(response.json()).toEqual({
            message: 'Cannot decode string at to.x as double?',
            subType: 'structuralDecode',
            field: 'to.x',
            name: 'StructuralDecodeError',
        });
    });

    it('should answer 400 for a malformed body', async () => {
        const response = await post(server, '/shapes/move', '{"id":');

        expect(response.status).toBe(400);
        expect(response.json()).toMatchObject({ subType: 'malformedBody', name: 'MalformedBodyError' });
    });

    it('should answer 400 with violations when validation fails without an errors parameter', async () => {
        const response = await post(server, '/shapes/move', '{"id":1,"to":{"x":1.5,"y":2}}');

        expect(response.status).toBe(400);
        expect(response.json()).toEqual({
            message: 'Validation failed for to with 1 error(s)',
            subType: 'validationFailed',
            field: 'to',
            name: 'ValidationFailedError',
            violations: [{ field: 'x', messages: ['x must be an integer number'] }],
        });
    });

    it('should hand validation errors to the @BindingErrors() parameter', async () => {
        const response = await post(server, '/shapes/check', '{"x":1.5,"y":2}');

        expect(response.status).toBe(200);
        expect(response.json()).toEqual({ valid: false, fields: ['x'] });
    });

    it('should hand an empty result to the @BindingErrors() parameter when the value is valid', async () => {
        const response = await post(server, '/shapes/check', '{"to":{"x":1,"y":1}}');

        expect(response.json()).toEqual({ valid: true, fields: [] });
    });

    it('should not know routes that were never registered', () => {
        expect(() => server.createRouteInvoker('POST', '/shapes/unknown')).toThrow(EndpointNotFoundError);
    });
});

describe('MultiBodyServer configuration', () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should skip validation when it is disabled', async () => {
        const server = await MultiBodyFactory.create(new GeometryMeta(), new MultiBodyConfig({ validationEnabled: false }));

        const response = await post(server, '/shapes/move', '{"id":1,"to":{"x":1.5,"y":2}}');

        expect(response.status).toBe(200);
        expect(response.json()).toEqual({ id: 1, label: null, x: 1.5, y: 2 });
    });

    it('should log each binding when logging is enabled', async () => {
        const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        const server = await MultiBodyFactory.create(new GeometryMeta(), new MultiBodyConfig({ loggingEnabled: true }));

        await post(server, '/shapes/move', '{"id":1,"to":{"x":1,"y":2}}');

        expect(log).toHaveBeenCalledWith(
            '[MultiBodyArgumentResolver] GeometryApiPrototype.move[0] id:long required=true parseAllFields=true -> bound',
        );
        expect(log).toHaveBeenCalledWith(
            '[MultiBodyArgumentResolver] GeometryApiPrototype.move[1] label:text required=false parseAllFields=true -> absent',
        );
    });
});

interface PingApi {
    ping(value: string): Promise<string>;
}

@ApiInterface()
abstract class PingApiPrototype implements PingApi {
    @Post()
    @Path('/ping')
    ping(value: string): Promise<string> {
        throw new Error('Method ping() must be implemented by subclass');
    }
}

@provideSingleton()
@Controller()
class PingController implements PingApi {
    async ping(value: string): Promise<string> {
        return value;
    }
}

class PingMeta implements WebAppMeta {
    getDIModules(): ContainerModule[] {
        return [];
    }

    getRoutes(): Routes[] {
        return [new RESTApiRoutes(PingApiPrototype, PingController)];
    }
}

describe('route registration', () => {
    it('should refuse a handler parameter no resolver supports', async () => {
        await expect(MultiBodyFactory.create(new PingMeta())).rejects.toThrow(
            'No argument resolver supports parameter PingApiPrototype.ping[0]',
        );
    });

    it('should refuse an API class without @ApiInterface()', () => {
        class Plain {}

        expect(() => new RESTApiRoutes(Plain, PingController)).toThrow('Class Plain must be decorated with @ApiInterface()');
    });
});

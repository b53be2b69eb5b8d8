import 'reflect-metadata';
import { ContainerModule } from 'inversify';
import {
    MultiBodyConfig,
    MultiBodyFactory,
    MultiBodyServer,
    TestRouterRequest,
    TestRouterResponse,
} from '@multibody/http-server';
import { ProdServerMeta } from '../src/ProdServerMeta';
import { InMemoryOrderStore, OrderStore, TYPES } from '../src/store/OrderStore';

const ALICE = { name: 'Alice', email: 'alice@example.com' };

/**
 * Helper: create the server with a store the test can inspect.
 */
async function createServer(store: InMemoryOrderStore): Promise<MultiBodyServer> {
    const overrides = new ContainerModule(async (options) => {
        const { rebind } = options;
        (await rebind<OrderStore>(TYPES.OrderStore)).toConstantValue(store);
    });
    return await MultiBodyFactory.create(new ProdServerMeta(), new MultiBodyConfig(), overrides);
}

/**
 * Helper: POST a JSON payload to a route, in process.
 */
async function post(server: MultiBodyServer, path: string, payload: unknown): Promise<TestRouterResponse> {
    const response = new TestRouterResponse();
    await server.createRouteInvoker('POST', path).invoke(TestRouterRequest.json(payload), response);
    return response;
}

describe('OrderApi', () => {
    let server: MultiBodyServer;
    let store: InMemoryOrderStore;

    beforeEach(async () => {
        store = new InMemoryOrderStore();
        server = await createServer(store);
    });

    afterEach(async () => {
        await server.stop();
    });

    describe('createOrder', () => {
        it('should bind customer, items, note and priority from one body', async () => {
            const request = TestRouterRequest.json({
                customer: ALICE,
                items: [
                    { sku: 'A-1', quantity: 2 },
                    { sku: 'B-2', quantity: 3 },
                ],
                note: 'leave at the door',
                priority: '2',
            });
            const response = new TestRouterResponse();

            await server.createRouteInvoker('POST', '/orders/create').invoke(request, response);

            expect(response.status).toBe(200);
            expect(response.json()).toEqual({
                orderId: 1,
                customerName: 'Alice',
                itemCount: 2,
                totalQuantity: 5,
                note: 'leave at the door',
                priority: 2,
            });
            expect(request.readCount).toBe(1);
            expect(store.size()).toBe(1);
        });

        it('should leave optional keys out', async () => {
            const response = await post(server, '/orders/create', { customer: ALICE, items: [] });

            expect(response.status).toBe(200);
            expect(response.json()).toEqual({ orderId: 1, customerName: 'Alice', itemCount: 0, totalQuantity: 0, priority: 0 });
        });

        it('should reject an invalid item with its index in the field path', async () => {
            const response = await post(server, '/orders/create', {
                customer: ALICE,
                items: [{ sku: 'A-1', quantity: 0 }],
            });

            expect(response.status).toBe(400);
            expect(response.json()).toEqual({
                message: 'Validation failed for items with 1 error(s)',
                subType: 'validationFailed',
                field: 'items',
                name: 'ValidationFailedError',
                violations: [{ field: '[0].quantity', messages: ['quantity must not be less than 1'] }],
            });
            expect(store.size()).toBe(0);
        });

        it('should reject a body without a customer', async () => {
            const response = await post(server, '/orders/create', { items: [] });

            expect(response.status).toBe(400);
            expect(response.json()).toEqual({
                message: 'required param customer is not present',
                subType: 'missingRequiredKey',
                field: 'customer',
                name: 'MissingRequiredKeyError',
            });
        });
    });

    describe('labelOrder', () => {
        it('should label an existing order', async () => {
            await post(server, '/orders/create', { customer: ALICE, items: [{ sku: 'A-1', quantity: 1 }] });

            const response = await post(server, '/orders/label', { id: 1, label: 'gift' });

            expect(response.status).toBe(200);
            expect(response.json()).toEqual({
                orderId: 1,
                customerName: 'Alice',
                itemCount: 1,
                totalQuantity: 1,
                priority: 0,
                label: 'gift',
            });
        });

        it('should answer 404 for an unknown order', async () => {
            const response = await post(server, '/orders/label', { id: 42, label: 'gift' });

            expect(response.status).toBe(404);
            expect(response.json()).toEqual({ message: 'Order 42 not found', name: 'EntityNotFoundError' });
        });
    });

    describe('updateShipping', () => {
        beforeEach(async () => {
            await post(server, '/orders/create', { customer: ALICE, items: [] });
        });

        it('should bind shipping from the top-level keys of the body', async () => {
            const response = await post(server, '/orders/shipping', {
                id: 1,
                carrier: 'UPS',
                address: { street: '1 Main St', city: 'Springfield', zip: '12345' },
            });

            expect(response.status).toBe(200);
            expect(response.json()).toEqual({ accepted: true, carrier: 'UPS', city: 'Springfield' });
        });

        it('should bind shipping from its own key as well', async () => {
            const response = await post(server, '/orders/shipping', {
                id: 1,
                shipping: { carrier: 'DHL', address: { street: '2 Elm St', city: 'Shelbyville' } },
            });

            expect(response.json()).toEqual({ accepted: true, carrier: 'DHL', city: 'Shelbyville' });
        });

        it('should pass validation errors to the handler', async () => {
            const response = await post(server, '/orders/shipping', {
                id: 1,
                carrier: 'UPS',
                address: { street: '1 Main St', city: 'Springfield', zip: '12' },
            });

            expect(response.status).toBe(200);
            expect(response.json()).toEqual({ accepted: false, rejectedFields: ['address.zip'] });
            expect((await store.find(1))?.carrier).toBeUndefined();
        });

        it('should reject a body with no shipping fields at all', async () => {
            const response = await post(server, '/orders/shipping', { id: 1 });

            expect(response.status).toBe(400);
            expect(response.json()).toMatchObject({ message: 'required param shipping is not present', field: 'shipping' });
        });
    });
});

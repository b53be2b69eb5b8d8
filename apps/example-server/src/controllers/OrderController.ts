import { inject } from 'inversify';
import { HttpNotFoundError } from '@multibody/http-api';
import { BindingResult } from '@multibody/http-binding';
import { Controller, provideSingleton } from '@multibody/http-server';
import { CustomerDto, OrderApi, OrderItemDto, OrderResponse, ShippingDto, ShippingResponse } from '../api/OrderApi';
import { OrderRecord, OrderStore, TYPES } from '../store/OrderStore';

/**
 * OrderController - implements OrderApi.
 * The routing and binding decorators live on OrderApiPrototype.
 */
@provideSingleton()
@Controller()
export class OrderController implements OrderApi {
    constructor(@inject(TYPES.OrderStore) private readonly store: OrderStore) {}

    async createOrder(
        customer: CustomerDto,
        items: OrderItemDto[],
        note: string | null,
        priority: number | null,
    ): Promise<OrderResponse> {
        const record = await this.store.create({
            customerName: customer.name ?? '',
            customerEmail: customer.email ?? '',
            lines: items.map((item) => ({ sku: item.sku ?? '', quantity: item.quantity ?? 0 })),
            note,
            priority: priority ?? 0,
        });
        return toOrderResponse(record);
    }

    async labelOrder(orderId: number, label: string): Promise<OrderResponse> {
        const record = await this.load(orderId);
        record.label = label;
        await this.store.update(record);
        return toOrderResponse(record);
    }

    async updateShipping(orderId: number, shipping: ShippingDto, errors: BindingResult): Promise<ShippingResponse> {
        const record = await this.load(orderId);
        if (errors.hasErrors()) {
            return { accepted: false, rejectedFields: errors.getFieldErrors().map((e) => e.field) };
        }

        record.carrier = shipping.carrier;
        record.city = shipping.address?.city;
        await this.store.update(record);
        return { accepted: true, carrier: record.carrier, city: record.city };
    }

    private async load(orderId: number): Promise<OrderRecord> {
        const record = await this.store.find(orderId);
        if (!record) {
            throw new HttpNotFoundError(`Order ${orderId} not found`);
        }
        return record;
    }
}

function toOrderResponse(record: OrderRecord): OrderResponse {
    return {
        orderId: record.id,
        customerName: record.customerName,
        itemCount: record.lines.length,
        totalQuantity: record.lines.reduce((sum, line) => sum + line.quantity, 0),
        note: record.note ?? undefined,
        priority: record.priority,
        label: record.label,
    };
}

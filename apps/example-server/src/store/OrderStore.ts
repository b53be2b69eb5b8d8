import { injectable } from 'inversify';

export interface OrderLine {
    sku: string;
    quantity: number;
}

export interface OrderRecord {
    id: number;
    customerName: string;
    customerEmail: string;
    lines: OrderLine[];
    note: string | null;
    priority: number;
    label?: string;
    carrier?: string;
    city?: string;
}

export type NewOrder = Omit<OrderRecord, 'id'>;

/**
 * Persistence of orders.
 */
export interface OrderStore {
    create(order: NewOrder): Promise<OrderRecord>;

    find(id: number): Promise<OrderRecord | undefined>;

    update(order: OrderRecord): Promise<void>;
}

/**
 * OrderStore kept in a Map, ids counting up from 1.
 */
@injectable()
export class InMemoryOrderStore implements OrderStore {
    private readonly orders = new Map<number, OrderRecord>();
    private nextId = 1;

    async create(order: NewOrder): Promise<OrderRecord> {
        const record: OrderRecord = { ...order, id: this.nextId++ };
        this.orders.set(record.id, record);
        return record;
    }

    async find(id: number): Promise<OrderRecord | undefined> {
        return this.orders.get(id);
    }

    async update(order: OrderRecord): Promise<void> {
        this.orders.set(order.id, order);
    }

    size(): number {
        return this.orders.size;
    }
}

/**
 * DI tokens of the example application.
 */
export const TYPES = {
    OrderStore: Symbol.for('OrderStore'),
};

import 'reflect-metadata';
import { Type } from 'class-transformer';
import { IsEmail, IsInt, IsNotEmpty, IsOptional, IsString, Matches, Min, ValidateNested } from 'class-validator';
import { ApiInterface, Post, Path } from '@multibody/http-api';
import { BindingErrors, BindingResult, MultiBody, Shapes } from '@multibody/http-binding';

// ============================================================
// Request DTOs
// Fields are optional: a DTO is filled from whatever keys the body has
// ============================================================

export class CustomerDto {
    @IsString()
    @IsNotEmpty()
    name?: string;

    @IsEmail()
    email?: string;
}

export class OrderItemDto {
    @IsString()
    @IsNotEmpty()
    sku?: string;

    @IsInt()
    @Min(1)
    quantity?: number;
}

export class AddressDto {
    @IsString()
    @IsNotEmpty()
    street?: string;

    @IsString()
    city?: string;

    @IsOptional()
    @Matches(/^\d{5}$/)
    zip?: string;
}

export class ShippingDto {
    @IsString()
    carrier?: string;

    @ValidateNested()
    @Type(() => AddressDto)
    address?: AddressDto;
}

// ============================================================
// Response DTOs
// ============================================================

export interface OrderResponse {
    orderId?: number;
    customerName?: string;
    itemCount?: number;
    totalQuantity?: number;
    note?: string;
    priority?: number;
    label?: string;
}

export interface ShippingResponse {
    accepted?: boolean;
    carrier?: string;
    city?: string;
    rejectedFields?: string[];
}

// ============================================================
// API Interface & Prototype
// ============================================================

/**
 * OrderApi - the API contract. Controllers implement it.
 */
export interface OrderApi {
    createOrder(
        customer: CustomerDto,
        items: OrderItemDto[],
        note: string | null,
        priority: number | null,
    ): Promise<OrderResponse>;

    labelOrder(orderId: number, label: string): Promise<OrderResponse>;

    updateShipping(orderId: number, shipping: ShippingDto, errors: BindingResult): Promise<ShippingResponse>;
}

/**
 * OrderApiPrototype - routing and binding decorators of OrderApi.
 *
 * Each handler takes several parameters from one JSON body, e.g. for
 * createOrder:
 * ```json
 * { "customer": { "name": "Alice", "email": "alice@example.com" },
 *   "items": [{ "sku": "A-1", "quantity": 2 }],
 *   "note": "leave at the door" }
 * ```
 *
 * Methods throw by default to catch a controller that does not override them.
 */
@ApiInterface()
export abstract class OrderApiPrototype implements OrderApi {
    @Post()
    @Path('/orders/create')
    createOrder(
        @MultiBody({ key: 'customer', validate: true }) customer: CustomerDto,
        @MultiBody({ key: 'items', shape: Shapes.collection(Shapes.object(OrderItemDto)), validate: true })
        items: OrderItemDto[],
        @MultiBody({ required: false }) note: string | null,
        @MultiBody({ required: false, shape: Shapes.int(true) }) priority: number | null,
    ): Promise<OrderResponse> {
        throw new Error('Method createOrder() must be implemented by subclass');
    }

    @Post()
    @Path('/orders/label')
    labelOrder(
        @MultiBody({ key: 'id', shape: Shapes.long() }) orderId: number,
        @MultiBody('label') label: string,
    ): Promise<OrderResponse> {
        throw new Error('Method labelOrder() must be implemented by subclass');
    }

    /**
     * The shipping fields may come wrapped under "shipping" or flat at the
     * top level of the body, next to "id".
     */
    @Post()
    @Path('/orders/shipping')
    updateShipping(
        @MultiBody({ key: 'id', shape: Shapes.long() }) orderId: number,
        @MultiBody({ validate: true }) shipping: ShippingDto,
        @BindingErrors() errors: BindingResult,
    ): Promise<ShippingResponse> {
        throw new Error('Method updateShipping() must be implemented by subclass');
    }
}

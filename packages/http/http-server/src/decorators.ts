import 'reflect-metadata';
import { Newable } from 'inversify';
import { provide } from '@inversifyjs/binding-decorators';

export const ROUTING_METADATA_KEYS = {
    CONTROLLER: 'multibody:controller',
};

/**
 * Mark a class as a controller.
 *
 * Usage:
 * ```typescript
 * @provideSingleton()
 * @Controller()
 * export class ProfileController implements ProfileApi {
 *   // ...
 * }
 * ```
 */
export function Controller(): ClassDecorator {
    return (target: Function) => {
        Reflect.defineMetadata(ROUTING_METADATA_KEYS.CONTROLLER, true, target);
    };
}

export function isController(controllerClass: Function): boolean {
    return Reflect.getMetadata(ROUTING_METADATA_KEYS.CONTROLLER, controllerClass) === true;
}

/**
 * Bind the decorated class to itself in singleton scope.
 * Picked up by buildProviderModule().
 */
export function provideSingleton() {
    return (target: Newable<object>): void => {
        provide(target, (bind) => bind.inSingletonScope())(target);
    };
}

import 'reflect-metadata';

/**
 * Metadata keys for storing API routing information.
 */
export const METADATA_KEYS = {
  API_INTERFACE: 'multibody:api-interface',
  ROUTES: 'multibody:routes',
};

/**
 * Route metadata stored on the API prototype class, one entry per method.
 */
export class RouteMetadata {
  httpMethod: string;
  path: string;
  methodName: string;

  constructor(httpMethod: string, path: string, methodName: string) {
    this.httpMethod = httpMethod;
    this.path = path;
    this.methodName = methodName;
  }
}

/**
 * Mark a class as an API interface.
 *
 * Usage:
 * ```typescript
 * @ApiInterface()
 * abstract class ProfileApiPrototype {
 *   @Post()
 *   @Path('/profile/rename')
 *   rename(@MultiBody('id') id: number, @MultiBody('name') name: string): Promise<RenameResponse> {
 *     throw new Error('Must be implemented');
 *   }
 * }
 * ```
 */
export function ApiInterface(): ClassDecorator {
  return (target: Function) => {
    Reflect.defineMetadata(METADATA_KEYS.API_INTERFACE, true, target);

    if (!Reflect.hasMetadata(METADATA_KEYS.ROUTES, target)) {
      Reflect.defineMetadata(METADATA_KEYS.ROUTES, [], target);
    }
  };
}

/**
 * Find or create the RouteMetadata of a method and let the caller update it.
 */
function updateRoute(
  target: Object,
  propertyKey: string | symbol,
  update: (route: RouteMetadata) => void
): void {
  // For static methods target is the constructor, for instance methods the prototype
  const metadataTarget = typeof target === 'function' ? target : target.constructor;
  const methodName = String(propertyKey);
  const routes = getRoutes(metadataTarget);

  let routeMetadata = routes.find((r) => r.methodName === methodName);
  if (!routeMetadata) {
    routeMetadata = new RouteMetadata('', '', methodName);
    routes.push(routeMetadata);
  }

  update(routeMetadata);
  Reflect.defineMetadata(METADATA_KEYS.ROUTES, routes, metadataTarget);
}

function httpMethod(method: string): MethodDecorator {
  return (target: Object, propertyKey: string | symbol) => {
    updateRoute(target, propertyKey, (route) => {
      route.httpMethod = method;
    });
  };
}

/**
 * @Get decorator for GET requests.
 * Multi-body parameters on a GET route bind from an empty body unless the client sends one.
 */
export function Get(): MethodDecorator {
  return httpMethod('GET');
}

export function Post(): MethodDecorator {
  return httpMethod('POST');
}

export function Put(): MethodDecorator {
  return httpMethod('PUT');
}

export function Delete(): MethodDecorator {
  return httpMethod('DELETE');
}

export function Patch(): MethodDecorator {
  return httpMethod('PATCH');
}

/**
 * @Path decorator to specify the route path.
 */
export function Path(path: string): MethodDecorator {
  return (target: Object, propertyKey: string | symbol) => {
    updateRoute(target, propertyKey, (route) => {
      route.path = path;
    });
  };
}

/**
 * Get all routes declared on an API interface class.
 */
export function getRoutes(apiClass: Function): RouteMetadata[] {
  const routes: unknown = Reflect.getMetadata(METADATA_KEYS.ROUTES, apiClass);
  if (!Array.isArray(routes)) {
    return [];
  }
  return routes.filter((r): r is RouteMetadata => r instanceof RouteMetadata);
}

export function isApiInterface(apiClass: Function): boolean {
  return Reflect.getMetadata(METADATA_KEYS.API_INTERFACE, apiClass) === true;
}

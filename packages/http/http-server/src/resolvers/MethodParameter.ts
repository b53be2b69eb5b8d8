import { ParameterBinding, getParameterBindings } from '@multibody/http-binding';

/**
 * One parameter of a controller method, as seen by the argument resolvers.
 * Built once per route when it is registered.
 */
export class MethodParameter {
    constructor(
        public readonly declaringClass: Function,
        public readonly methodName: string,
        public readonly binding: ParameterBinding,
        /** Binding of the parameter declared directly before this one. */
        public readonly preceding?: ParameterBinding,
        /** The parameter declared directly after this one is a @BindingErrors() sink. */
        public readonly followedByErrorsSink: boolean = false,
    ) {}

    get index(): number {
        return this.binding.index;
    }

    toString(): string {
        return `${this.declaringClass.name}.${this.methodName}[${this.index}]`;
    }

    /**
     * The parameters of a method, in declaration order.
     */
    static forMethod(declaringClass: Function, methodName: string): MethodParameter[] {
        const bindings = getParameterBindings(declaringClass, methodName);
        return bindings.map(
            (binding, i) =>
                new MethodParameter(
                    declaringClass,
                    methodName,
                    binding,
                    bindings[i - 1],
                    bindings[i + 1]?.errorsSink ?? false,
                ),
        );
    }
}
